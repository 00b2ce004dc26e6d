import { ErrorCode, ISplitErrorDetails } from '../types';

export class SplitError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: ISplitErrorDetails = {}
  ) {
    super(message);
    this.name = 'SplitError';
  }
}

const INPUT_ERRORS: ErrorCode[] = [
  ErrorCode.LayerSequence,
  ErrorCode.UnknownCommand,
  ErrorCode.MalformedCommand,
  ErrorCode.LogicalCoordinates,
  ErrorCode.OverrideInLayer,
  ErrorCode.LayerCountMismatch,
  ErrorCode.MissingEndMarker
];

export class ErrorHandler {
  static createError(code: ErrorCode, message: string, details?: ISplitErrorDetails): SplitError {
    return new SplitError(code, message, details);
  }

  static isSplitError(error: unknown): error is SplitError {
    return error instanceof SplitError;
  }

  // Errors caused by the gcode itself rather than by the configuration
  static isInputError(error: unknown): boolean {
    return ErrorHandler.isSplitError(error) && INPUT_ERRORS.includes(error.code);
  }

  /**
   * Attach the offending input line to an error raised while tracking it.
   * Errors that already carry a line number are returned unchanged.
   */
  static withLineContext(
    error: unknown,
    context: { lineNumber: number; line: string; layer?: number }
  ): Error {
    if (!ErrorHandler.isSplitError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }
    if (error.details.lineNumber !== undefined) {
      return error;
    }
    const where = context.layer === undefined
      ? `line ${context.lineNumber}`
      : `line ${context.lineNumber}, layer ${context.layer}`;
    return new SplitError(
      error.code,
      `${error.message} (${where}): ${context.line.trim()}`,
      { ...error.details, ...context }
    );
  }

  static formatError(error: Error): string {
    if (ErrorHandler.isSplitError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    return error.message;
  }
}
