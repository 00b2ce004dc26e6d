// Axis values

/**
 * A tracked coordinate. `relative` means a relative move was applied and the
 * absolute position can no longer be trusted.
 */
export type AxisValue =
  | { kind: 'absolute'; value: number }
  | { kind: 'unknown' }
  | { kind: 'relative' };

export type PositioningMode = 'absolute' | 'relative';

export type FanState = { kind: 'off' } | { kind: 'duty'; value: number };

export interface IPosition {
  x: AxisValue;
  y: AxisValue;
  z: AxisValue;
}

// Printer state

export interface PrinterState {
  readonly extruderMode: PositioningMode;
  readonly xyzMode: PositioningMode;
  readonly x: AxisValue;
  readonly y: AxisValue;
  readonly z: AxisValue;
  readonly e: AxisValue;
  /** Highest E reached while extruding in absolute mode. */
  readonly eMax: AxisValue;
  readonly bedTemp?: number;
  readonly nozzleTemp?: number;
  readonly initialBedTemp?: number;
  readonly initialNozzleTemp?: number;
  readonly fan?: FanState;
}

// Layers

export type FirstMove =
  | { kind: 'travel'; position: IPosition }
  | { kind: 'extrude' };

export interface RecordedLayer {
  readonly index: number;
  /** State before any command of the layer was applied. */
  readonly entry: PrinterState;
  /** State after the last command of the layer. */
  readonly exit: PrinterState;
  readonly lines: readonly string[];
  readonly firstMove?: FirstMove;
  readonly ironingPath: readonly string[];
  readonly canIron: boolean;
}

export interface MinimumX {
  value: number;
  layer: number;
  line: string;
}

export interface RecordedProgram {
  layers: readonly RecordedLayer[];
  layerCount: number;
  layerHeight?: number;
  printMinX?: MinimumX;
  /** State once the whole input has been consumed. */
  finalState: PrinterState;
}

// Parts

export interface PartRange {
  index: number;
  firstLayer: number;
  lastLayer: number;
  totalParts: number;
}

export interface AssembledPart {
  index: number;
  firstLayer: number;
  lastLayer: number;
  chunks: string[];
}

// Errors

export enum ErrorCode {
  LayerSequence = 'LAYER_SEQUENCE',
  UnknownCommand = 'UNKNOWN_COMMAND',
  MalformedCommand = 'MALFORMED_COMMAND',
  LogicalCoordinates = 'LOGICAL_COORDINATES',
  OverrideInLayer = 'OVERRIDE_IN_LAYER',
  LayerCountMismatch = 'LAYER_COUNT_MISMATCH',
  MissingEndMarker = 'MISSING_END_MARKER',
  UnresolvedPosition = 'UNRESOLVED_POSITION',
  MissingTemperature = 'MISSING_TEMPERATURE',
  MissingLayerHeight = 'MISSING_LAYER_HEIGHT',
  HeightExceeded = 'HEIGHT_EXCEEDED',
  PrimeClearance = 'PRIME_CLEARANCE',
  InvalidConfig = 'INVALID_CONFIG'
}

export interface ISplitErrorDetails {
  lineNumber?: number;
  line?: string;
  layer?: number;
  part?: number;
  issues?: string[];
}

// Splitter events

export interface IProgramSummary {
  layerCount: number;
  layerHeight?: number;
  printMinX?: MinimumX;
}

export interface IPartEvent {
  index: number;
  totalParts: number;
  firstLayer: number;
  lastLayer: number;
  target?: string;
}

export interface SplitterEvents {
  programRead: (summary: IProgramSummary) => void;
  partStarted: (part: IPartEvent) => void;
  partWritten: (part: IPartEvent) => void;
  warning: (message: string) => void;
}
