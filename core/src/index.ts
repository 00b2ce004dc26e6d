// Типы
export * from './types';
export * from './gcode/types';

// Конфигурация
export { splitConfigSchema, parseConfig, loadConfig, DEFAULT_CONFIG } from './config';
export type { SplitConfig, SplitConfigInput } from './config';

// Разбор и состояние принтера
export { classifyLine, parseField } from './gcode/LineClassifier';
export { resolveCommand } from './gcode/CommandResolver';
export { createPrinterState, advanceState, retractionOf } from './state/printer-state';
export { absolute, isAbsolute, requireAbsolute, formatNumber, UNKNOWN, RELATIVE } from './state/axis';
export { LayerRecorder } from './layers/LayerRecorder';

// Разбиение и сценарии
export { planPartition, END_OF_PRINT } from './planning/PartitionPlanner';
export type { PartitionPlan, PartitionOptions, PartAssignment } from './planning/PartitionPlanner';
export { ScaffoldSynthesizer } from './scaffold/ScaffoldSynthesizer';

// Вывод
export { assembleParts } from './output/PartAssembler';
export { writeParts } from './output/PartWriter';
export { FilePartSinkFactory, partFileName } from './output/FilePartSink';
export type { IPartSink, IPartSinkFactory } from './interfaces/PartSink';

// Контроллер
export { GCodeSplitter, splitLines } from './controller/GCodeSplitter';
export type { SplitOptions, SplitResult } from './controller/GCodeSplitter';

// Утилиты
export { Logger } from './utils/logger';
export { ErrorHandler, SplitError } from './utils/error-handler';
