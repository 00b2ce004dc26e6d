import { PositioningMode } from '../types';

// Типы для классификатора строк G-code
export interface GCodeField {
  letter: string
  raw: string
  /** Absent when the text after the letter is not a number */
  value?: number
}

export type ClassifiedLine =
  | { kind: 'layer'; index: number }
  | { kind: 'layerCount'; count: number }
  | { kind: 'layerHeight'; height: number }
  | { kind: 'end' }
  | GCodeCommand

export interface GCodeCommand {
  kind: 'command'
  /** Upper-cased first word; empty for blank and comment-only lines */
  mnemonic: string
  fields: GCodeField[]
  comment?: string
}

export interface MoveAxes {
  x?: number
  y?: number
  z?: number
  e?: number
}

// Closed set of commands the tracker understands
export type TrackedCommand =
  | { kind: 'setPositioning'; xyz?: PositioningMode; extruder: PositioningMode }
  | { kind: 'bedTemperature'; celsius: number; wait: boolean }
  | { kind: 'nozzleTemperature'; celsius: number; wait: boolean }
  | { kind: 'fanOff' }
  | { kind: 'fanSpeed'; duty: number }
  | { kind: 'move'; rapid: boolean; axes: MoveAxes }
  | { kind: 'setExtruderPosition'; e: number }
  | { kind: 'feedRateOverride' }
  | { kind: 'flowRateOverride' }
  | { kind: 'ignored'; mnemonic: string }

export type OverridePolicy = 'reject' | 'ignore'

export interface TrackingContext {
  /** Whether the command belongs to a recorded layer */
  insideLayer: boolean
  overridePolicy: OverridePolicy
}
