import { AxisValue, ErrorCode, PrinterState } from '../types';
import { MoveAxes, TrackedCommand, TrackingContext } from '../gcode/types';
import { ErrorHandler } from '../utils/error-handler';
import { RELATIVE, UNKNOWN, absolute, isAbsolute } from './axis';

export function createPrinterState(): PrinterState {
  return {
    extruderMode: 'absolute',
    xyzMode: 'absolute',
    x: UNKNOWN,
    y: UNKNOWN,
    z: UNKNOWN,
    e: UNKNOWN,
    eMax: UNKNOWN
  };
}

/**
 * Filament currently pulled back into the nozzle, as E minus E_max (zero or
 * negative). Undefined while either value is not absolute.
 */
export function retractionOf(state: PrinterState): number | undefined {
  if (!isAbsolute(state.e) || !isAbsolute(state.eMax)) {
    return undefined;
  }
  return state.e.value - state.eMax.value;
}

/**
 * One step of the fold over the command stream. The input state is never
 * modified, so any earlier state can serve as a snapshot.
 */
export function advanceState(
  state: PrinterState,
  command: TrackedCommand,
  context: TrackingContext
): PrinterState {
  switch (command.kind) {
    case 'setPositioning':
      return {
        ...state,
        extruderMode: command.extruder,
        xyzMode: command.xyz ?? state.xyzMode
      };

    case 'bedTemperature':
      return {
        ...state,
        bedTemp: command.celsius,
        initialBedTemp: state.initialBedTemp ?? command.celsius
      };

    case 'nozzleTemperature':
      return {
        ...state,
        nozzleTemp: command.celsius,
        initialNozzleTemp: state.initialNozzleTemp ?? command.celsius
      };

    case 'fanOff':
      return { ...state, fan: { kind: 'off' } };

    case 'fanSpeed':
      return { ...state, fan: { kind: 'duty', value: command.duty } };

    case 'move':
      return applyMove(state, command.axes);

    case 'setExtruderPosition':
      return applyExtruderReset(state, command.e);

    case 'feedRateOverride':
    case 'flowRateOverride':
      if (context.insideLayer && context.overridePolicy === 'reject') {
        const what = command.kind === 'feedRateOverride' ? 'Feed rate (M220)' : 'Flow rate (M221)';
        throw ErrorHandler.createError(
          ErrorCode.OverrideInLayer,
          `${what} override inside a layer is not tracked and would break resuming`
        );
      }
      return state;

    case 'ignored':
      return state;

    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command ${JSON.stringify(unreachable)}`);
    }
  }
}

function applyMove(state: PrinterState, axes: MoveAxes): PrinterState {
  let next: PrinterState = state;

  if (axes.e !== undefined) {
    if (state.extruderMode === 'relative') {
      next = { ...next, e: RELATIVE, eMax: RELATIVE };
    } else {
      const raise = !isAbsolute(next.eMax) || axes.e > next.eMax.value;
      next = { ...next, e: absolute(axes.e), eMax: raise ? absolute(axes.e) : next.eMax };
    }
  }

  const moveAxis = (value: number | undefined, current: AxisValue): AxisValue => {
    if (value === undefined) return current;
    return state.xyzMode === 'relative' ? RELATIVE : absolute(value);
  };

  return {
    ...next,
    x: moveAxis(axes.x, state.x),
    y: moveAxis(axes.y, state.y),
    z: moveAxis(axes.z, state.z)
  };
}

// G92 E keeps the retraction depth: E_max - E is the same before and after
function applyExtruderReset(state: PrinterState, e: number): PrinterState {
  const retraction = isAbsolute(state.e) && isAbsolute(state.eMax)
    ? state.eMax.value - state.e.value
    : 0;
  return { ...state, e: absolute(e), eMax: absolute(e + retraction) };
}
