/**
 * @asciihist/utils - Shared utilities package
 *
 * Exports only the ambient stack:
 * - Logger utilities
 * - Configuration loading
 * - Error classes
 */

// Logger and logging utilities
export {
  logger,
  Logger,
  LogLevel,
  winstonLogger,
  createLogger,
  setLogLevel,
  getLogLevel,
} from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
