import { AxisValue, ErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';

export const UNKNOWN: AxisValue = { kind: 'unknown' };
export const RELATIVE: AxisValue = { kind: 'relative' };

export function absolute(value: number): AxisValue {
  return { kind: 'absolute', value };
}

export function isAbsolute(axis: AxisValue): axis is { kind: 'absolute'; value: number } {
  return axis.kind === 'absolute';
}

/**
 * Read a coordinate that synthesis depends on. Unknown and relative values
 * throw UNRESOLVED_POSITION naming the axis and where it was needed.
 */
export function requireAbsolute(axis: AxisValue, name: string, where: string): number {
  switch (axis.kind) {
    case 'absolute':
      return axis.value;
    case 'relative':
      throw ErrorHandler.createError(
        ErrorCode.UnresolvedPosition,
        `Only a relative ${name} position is known at ${where}`
      );
    case 'unknown':
      throw ErrorHandler.createError(
        ErrorCode.UnresolvedPosition,
        `No ${name} position is known at ${where}`
      );
  }
}

export function describeAxis(axis: AxisValue): string {
  switch (axis.kind) {
    case 'absolute':
      return formatNumber(axis.value);
    case 'relative':
      return 'rel';
    case 'unknown':
      return '?';
  }
}

// Shortest decimal at 15 significant digits, so 0.1 + 0.2 prints as 0.3
export function formatNumber(value: number): string {
  const rounded = Number(value.toPrecision(15));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}
