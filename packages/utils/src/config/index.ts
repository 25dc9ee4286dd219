/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and CSV handling.
 */

import * as path from 'path';
import { ConfigurationError } from '../errors.js';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

export interface CsvConfig {
  delimiter: string;
  inferTypes: boolean;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

function parseBoolean(raw: string | undefined, fallback: boolean, key: string): boolean {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new ConfigurationError(`${key} must be true or false, got '${raw}'`, key, { value: raw });
}

/**
 * Load logger configuration from environment variables
 */
export function getLoggingConfig(): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } =
    process.env;

  const level = LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'debug');
  if (!LOG_LEVELS.includes(level)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${level}'`,
      'LOG_LEVEL',
      { value: level }
    );
  }

  return {
    // winston has no trace level; trace messages are emitted at debug
    level: level === 'trace' ? 'debug' : level,
    enableConsole: parseBoolean(LOG_CONSOLE, true, 'LOG_CONSOLE'),
    enableFile: parseBoolean(LOG_FILE, false, 'LOG_FILE'),
    logDir: LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}

/**
 * Load CSV reader/writer defaults from environment variables
 */
export function getCsvConfig(): CsvConfig {
  const { TABFLOW_CSV_DELIMITER, TABFLOW_CSV_INFER_TYPES } = process.env;

  const delimiter = TABFLOW_CSV_DELIMITER ?? ',';
  if (delimiter.length !== 1) {
    throw new ConfigurationError(
      'TABFLOW_CSV_DELIMITER must be a single character',
      'TABFLOW_CSV_DELIMITER',
      { value: delimiter }
    );
  }

  return {
    delimiter,
    inferTypes: parseBoolean(TABFLOW_CSV_INFER_TYPES, true, 'TABFLOW_CSV_INFER_TYPES'),
  };
}
