/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@asciihist/utils';
 *
 * const logger = createPackageLogger('@asciihist/cli');
 * logger.debug('Read input', { lines: 120 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log helpers for the recurring events of a run
 */
export class LogHelpers {
  /**
   * Log the outcome of reading an input source
   */
  static inputRead(
    logger: Logger,
    source: string,
    accepted: number,
    skipped: number,
    context?: LogContext
  ): void {
    const level = skipped > 0 ? 'warn' : 'debug';
    logger[level]('Input read', { source, accepted, skipped, ...context });
  }

  /**
   * Log performance metric
   */
  static performance(
    logger: Logger,
    operation: string,
    duration: number,
    success: boolean,
    context?: LogContext
  ): void {
    logger.debug('Performance Metric', { operation, duration, success, ...context });
  }
}
