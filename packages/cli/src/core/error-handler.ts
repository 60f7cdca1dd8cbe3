/**
 * Error Handler - User-facing messages and exit codes
 */

import { isHistogramError } from '@asciihist/core';
import { AppError, logger } from '@asciihist/utils';

/**
 * Process exit codes. Distinct codes let scripts tell an empty input apart
 * from malformed data or bad arguments.
 */
export const ExitCode = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  INVALID_ARGUMENTS: 2,
  EMPTY_INPUT: 3,
  PARSE_ERROR: 4,
  INPUT_NOT_FOUND: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Map an error to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isHistogramError(error)) {
    switch (error.code) {
      case 'EMPTY_INPUT':
        return ExitCode.EMPTY_INPUT;
      case 'PARSE_ERROR':
        return ExitCode.PARSE_ERROR;
      case 'INVALID_BIN_COUNT':
        return ExitCode.INVALID_ARGUMENTS;
    }
  }

  if (error instanceof AppError) {
    switch (error.code) {
      case 'VALIDATION_ERROR':
      case 'CONFIGURATION_ERROR':
        return ExitCode.INVALID_ARGUMENTS;
      case 'NOT_FOUND':
        return ExitCode.INPUT_NOT_FOUND;
    }
  }

  return ExitCode.UNEXPECTED;
}

/**
 * Log error with full context (for debugging)
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (isHistogramError(error) || error instanceof AppError) {
    // Expected failures: the user sees the message, the log keeps the details
    logger.debug('Command failed', {
      code: error.code,
      message: error.message,
      errorContext: error.context,
      ...context,
    });
    return;
  }

  logger.error('Unexpected CLI error', error, context);
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
