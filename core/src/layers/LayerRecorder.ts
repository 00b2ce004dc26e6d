import {
  ErrorCode,
  FirstMove,
  MinimumX,
  PrinterState,
  RecordedLayer,
  RecordedProgram
} from '../types';
import { classifyLine } from '../gcode/LineClassifier';
import { resolveCommand } from '../gcode/CommandResolver';
import { ClassifiedLine, MoveAxes, OverridePolicy, TrackedCommand } from '../gcode/types';
import { advanceState, createPrinterState } from '../state/printer-state';
import { formatNumber, isAbsolute } from '../state/axis';
import { ErrorHandler } from '../utils/error-handler';

export const IRONING_FEED_RATE = 600;

export interface LayerRecorderOptions {
  overridePolicy: OverridePolicy;
}

interface OpenLayer {
  index: number;
  entry: PrinterState;
  lines: string[];
  firstMove?: FirstMove;
  ironingPath: string[];
  canIron: boolean;
}

/**
 * Feeds every input line through the state tracker and buffers the lines of
 * each `;LAYER:<n>` block together with the state at its entry and exit.
 */
export class LayerRecorder {
  private state: PrinterState = createPrinterState();
  private layers: RecordedLayer[] = [];
  private current: OpenLayer | null = null;
  private layerCount?: number;
  private layerHeight?: number;
  private endFound = false;
  private printMinX?: MinimumX;
  private lineNumber = 0;

  constructor(private options: LayerRecorderOptions) {}

  getState(): PrinterState {
    return this.state;
  }

  accept(line: string): void {
    this.lineNumber++;
    try {
      this.handle(classifyLine(line), line);
    } catch (error) {
      throw ErrorHandler.withLineContext(error, {
        lineNumber: this.lineNumber,
        line,
        layer: this.current?.index
      });
    }
  }

  finish(): RecordedProgram {
    this.closeLayer();

    if (this.layerCount === undefined) {
      throw ErrorHandler.createError(
        ErrorCode.LayerCountMismatch,
        'Overall layer count (;LAYER_COUNT:) was not declared'
      );
    }
    if (this.layers.length !== this.layerCount) {
      throw ErrorHandler.createError(
        ErrorCode.LayerCountMismatch,
        `Declared ${this.layerCount} layers but found ${this.layers.length}`
      );
    }
    if (!this.endFound) {
      throw ErrorHandler.createError(ErrorCode.MissingEndMarker, 'End code marker has not been found');
    }

    return {
      layers: this.layers,
      layerCount: this.layerCount,
      layerHeight: this.layerHeight,
      printMinX: this.printMinX,
      finalState: this.state
    };
  }

  private handle(classified: ClassifiedLine, line: string): void {
    switch (classified.kind) {
      case 'layerHeight':
        this.layerHeight = classified.height;
        return;

      case 'layerCount':
        this.layerCount = classified.count;
        return;

      case 'layer':
        this.openLayer(classified.index);
        return;

      case 'end':
        this.closeLayer();
        this.endFound = true;
        return;

      case 'command': {
        const command = resolveCommand(classified);
        this.state = advanceState(this.state, command, {
          insideLayer: this.current !== null,
          overridePolicy: this.options.overridePolicy
        });
        if (this.current) {
          this.recordCommand(this.current, command, line);
          this.current.lines.push(line);
        }
        return;
      }
    }
  }

  private openLayer(index: number): void {
    if (this.endFound) {
      throw ErrorHandler.createError(
        ErrorCode.LayerSequence,
        `Layer ${index} starts after the end code marker`
      );
    }
    const expected = this.layers.length + (this.current ? 1 : 0);
    if (index !== expected) {
      throw ErrorHandler.createError(
        ErrorCode.LayerSequence,
        `Layer number not consecutive: expected ${expected}, found ${index}`
      );
    }
    this.closeLayer();
    this.current = {
      index,
      entry: this.state,
      lines: [],
      ironingPath: [],
      canIron: true
    };
  }

  private closeLayer(): void {
    if (!this.current) return;
    const { index, entry, lines, firstMove, ironingPath, canIron } = this.current;
    this.layers.push({ index, entry, exit: this.state, lines, firstMove, ironingPath, canIron });
    this.current = null;
  }

  private recordCommand(layer: OpenLayer, command: TrackedCommand, line: string): void {
    if (command.kind === 'setPositioning' && command.xyz === 'relative') {
      layer.canIron = false;
    }
    if (command.kind === 'move') {
      this.recordMove(layer, command.axes, line);
    }
  }

  private recordMove(layer: OpenLayer, axes: MoveAxes, line: string): void {
    const { x, y, z } = this.state;

    // A layer usually opens with a travel move; its endpoint is where a resumed part starts
    if (!layer.firstMove) {
      layer.firstMove = axes.e === undefined
        ? { kind: 'travel', position: { x, y, z } }
        : { kind: 'extrude' };
    }

    if (this.state.xyzMode === 'relative' || !isAbsolute(x) || !isAbsolute(y) || !isAbsolute(z)) {
      layer.canIron = false;
    } else if (layer.canIron) {
      layer.ironingPath.push(
        `G0 X${formatNumber(x.value)} Y${formatNumber(y.value)} Z${formatNumber(z.value)} F${IRONING_FEED_RATE} ; ironing`
      );
    }

    if (axes.x !== undefined && isAbsolute(x)) {
      if (!this.printMinX || x.value < this.printMinX.value) {
        this.printMinX = { value: x.value, layer: layer.index, line: line.trim() };
      }
    }
  }
}
