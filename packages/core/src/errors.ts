/**
 * Core Error Classes
 *
 * @asciihist/core has no dependencies on the other workspace packages, so the
 * engine's error kinds are defined here. Each carries a stable `code` the CLI
 * maps to an exit status.
 */

export type HistogramErrorCode = 'PARSE_ERROR' | 'EMPTY_INPUT' | 'INVALID_BIN_COUNT';

/**
 * Base class for engine failures
 */
export class HistogramError extends Error {
  public readonly code: HistogramErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: HistogramErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A line could not be read as a finite number (strict mode only)
 */
export class ParseError extends HistogramError {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(lineNumber: number, line: string, reason: string) {
    super(`Line ${lineNumber}: ${reason}`, 'PARSE_ERROR', { lineNumber, line, reason });
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * No valid samples were observed
 */
export class EmptyInputError extends HistogramError {
  constructor(skipped: number = 0) {
    super(
      skipped > 0
        ? `No valid samples in input (${skipped} malformed line${skipped === 1 ? '' : 's'} skipped)`
        : 'No valid samples in input',
      'EMPTY_INPUT',
      { skipped }
    );
  }
}

/**
 * Bin count is not a positive integer
 */
export class InvalidBinCountError extends HistogramError {
  public readonly binCount: number;

  constructor(binCount: number) {
    super(`Bin count must be a positive integer (got ${binCount})`, 'INVALID_BIN_COUNT', {
      binCount,
    });
    this.binCount = binCount;
  }
}

export function isHistogramError(error: unknown): error is HistogramError {
  return error instanceof HistogramError;
}
