/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, optional log
 * rotation, and context propagation.
 *
 * Console output is written to stderr so that commands piping a dataset to
 * stdout are not interleaved with log lines.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getLoggingConfig } from './config/index.js';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

// Log context interface
export interface LogContext {
  operation?: string;
  source?: string;
  rowsIn?: number;
  rowsOut?: number;
  [key: string]: unknown;
}

const config = getLoggingConfig();

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${timestamp}] ${level}: ${message}${metaStr ? ' ' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (config.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: config.level,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    })
  );
}

// Skip file logging in test environment to avoid file system side effects
if (config.enableFile && process.env.NODE_ENV !== 'test') {
  fs.mkdirSync(config.logDir, { recursive: true });

  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );
}

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'tabflow' },
  transports,
  silent: transports.length === 0,
  exitOnError: false,
});

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'tabflow';

  /**
   * Create a logger with a specific namespace (package name)
   */
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

  /**
   * Log error message
   */
  error(message: string, error?: Error | unknown, context?: LogContext): void {
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
    } else if (error) {
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
   * Log trace message (most verbose)
   */
  trace(message: string, context?: LogContext): void {
    // Winston doesn't have trace level, use debug
    winstonLogger.debug(message, { ...this.mergeContext(context), level: 'trace' });
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

/**
 * Create a package-specific logger
 */
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('tabflow');

export { Logger, winstonLogger };
