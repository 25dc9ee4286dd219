/**
 * Error Handler
 * =============
 * Centralized error logging and summarizing.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
  context?: Record<string, unknown>;
}

/**
 * Handle and log error appropriately
 *
 * Operational errors (bad input the caller can fix) are logged at warn level,
 * everything else at error level with its stack.
 */
export function handleError(
  error: Error | unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return {
      handled: true,
      message: err.message,
      code: err.code,
      context: err.context,
    };
  }

  logger.error('Unknown error occurred', err, context);

  return {
    handled: true,
    message: err.message,
    code: 'UNKNOWN_ERROR',
  };
}
