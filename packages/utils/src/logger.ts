/**
 * Structured Logging
 * ==================
 * Winston-backed logger with namespaces and context propagation.
 *
 * Every console level goes to stderr; stdout carries only the rendered
 * histogram.
 */

import * as path from 'node:path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  namespace?: string;
  lineNumber?: number;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  logDir?: string;
  maxFiles: string;
  maxSize: string;
  production: boolean;
  test: boolean;
}

const config: LoggerConfig = {
  level: process.env.LOG_LEVEL || LogLevel.WARN,
  logDir: process.env.LOG_DIR || undefined,
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
  production: process.env.NODE_ENV === 'production',
  test: process.env.NODE_ENV === 'test',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.production ? structuredFormat : consoleFormat,
    stderrLevels: Object.values(LogLevel),
  }),
];

// File logging only when LOG_DIR is set
if (config.logDir && !config.test) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'asciihist-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'asciihist' },
  transports,
  exitOnError: false,
});

/**
 * Change the level of every transport at runtime (e.g. for `--verbose`).
 */
export function setLogLevel(level: LogLevel): void {
  winstonLogger.level = level;
  for (const transport of winstonLogger.transports) {
    transport.level = level;
  }
}

/**
 * Current effective log level.
 */
export function getLogLevel(): string {
  return winstonLogger.level;
}

class Logger {
  private context: LogContext = {};
  private namespace: string = 'asciihist';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export const logger = new Logger('asciihist');

export { Logger, winstonLogger };
