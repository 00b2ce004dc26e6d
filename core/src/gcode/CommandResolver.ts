import { ErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { GCodeCommand, GCodeField, MoveAxes, TrackedCommand } from './types';

// Commands that are known and deliberately left untracked
const IGNORED_COMMANDS = new Set([
  '', // comment-only line
  'M105', // report temperature
  'M413', // power-loss recovery
  'M420', // bed leveling state
  'G28', // home
  'M84' // disable steppers
]);

const FULL_FAN_DUTY = 255;

/**
 * Map a classified command onto the closed set the tracker understands.
 * Anything else fails closed with UNKNOWN_COMMAND.
 */
export function resolveCommand(command: GCodeCommand): TrackedCommand {
  const { mnemonic, fields } = command;

  switch (mnemonic) {
    case 'G90':
      return { kind: 'setPositioning', xyz: 'absolute', extruder: 'absolute' };
    case 'G91':
      return { kind: 'setPositioning', xyz: 'relative', extruder: 'relative' };
    case 'M82':
      return { kind: 'setPositioning', extruder: 'absolute' };
    case 'M83':
      return { kind: 'setPositioning', extruder: 'relative' };

    case 'M140':
    case 'M190':
      return {
        kind: 'bedTemperature',
        celsius: requireSValue(mnemonic, fields),
        wait: mnemonic === 'M190'
      };
    case 'M104':
    case 'M109':
      return {
        kind: 'nozzleTemperature',
        celsius: requireSValue(mnemonic, fields),
        wait: mnemonic === 'M109'
      };

    case 'M107':
      return { kind: 'fanOff' };
    case 'M106': {
      const speed = fields.find(field => field.letter === 'S');
      if (!speed) {
        return { kind: 'fanSpeed', duty: FULL_FAN_DUTY };
      }
      return { kind: 'fanSpeed', duty: requireSValue(mnemonic, fields) };
    }

    case 'G0':
    case 'G1':
      return { kind: 'move', rapid: mnemonic === 'G0', axes: parseAxes(mnemonic, fields) };

    case 'G92':
      return parseSetPosition(fields);

    case 'M220':
      return { kind: 'feedRateOverride' };
    case 'M221':
      return { kind: 'flowRateOverride' };

    default:
      if (IGNORED_COMMANDS.has(mnemonic)) {
        return { kind: 'ignored', mnemonic };
      }
      throw ErrorHandler.createError(ErrorCode.UnknownCommand, `Unknown command ${mnemonic}`);
  }
}

function requireSValue(mnemonic: string, fields: GCodeField[]): number {
  const field = fields.find(f => f.letter === 'S');
  if (!field || field.value === undefined) {
    throw ErrorHandler.createError(
      ErrorCode.MalformedCommand,
      `${mnemonic} requires a numeric S argument`
    );
  }
  return field.value;
}

function parseAxes(mnemonic: string, fields: GCodeField[]): MoveAxes {
  const axes: MoveAxes = {};
  for (const field of fields) {
    switch (field.letter) {
      case 'X':
      case 'Y':
      case 'Z':
      case 'E':
        if (field.value === undefined) {
          throw ErrorHandler.createError(
            ErrorCode.MalformedCommand,
            `${mnemonic} has a non-numeric ${field.letter} argument "${field.raw}"`
          );
        }
        axes[axisKey(field.letter)] = field.value;
        break;
      default:
        // Feed rate and anything else does not affect position
        break;
    }
  }
  return axes;
}

function axisKey(letter: 'X' | 'Y' | 'Z' | 'E'): keyof MoveAxes {
  switch (letter) {
    case 'X': return 'x';
    case 'Y': return 'y';
    case 'Z': return 'z';
    case 'E': return 'e';
  }
}

function parseSetPosition(fields: GCodeField[]): TrackedCommand {
  const logical = fields.find(field => ['X', 'Y', 'Z'].includes(field.letter));
  if (logical || fields.length === 0) {
    throw ErrorHandler.createError(
      ErrorCode.LogicalCoordinates,
      'Logical coordinate systems are unsupported (G92 may only set E)'
    );
  }
  const e = fields.find(field => field.letter === 'E');
  if (!e || e.value === undefined) {
    throw ErrorHandler.createError(ErrorCode.MalformedCommand, 'G92 requires a numeric E argument');
  }
  return { kind: 'setExtruderPosition', e: e.value };
}
