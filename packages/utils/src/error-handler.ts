/**
 * Error Handler
 * =============
 * Centralized logging of errors by kind.
 */

import { AppError, isRunFatalError, toError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
  fatal: boolean;
}

/**
 * Handle and log error appropriately
 *
 * Operational errors are logged as warnings, everything else as errors.
 */
export function handleError(
  error: Error | unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
  const err = toError(error);

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    code: err instanceof AppError ? err.code : 'UNKNOWN_ERROR',
    fatal: isRunFatalError(err),
  };
}

/**
 * Describe an error for per-unit reporting, including its cause chain
 */
export function describeError(error: unknown): string {
  const err = toError(error);
  const cause = err.cause;
  if (cause === undefined || cause === null) {
    return err.message;
  }
  const causeMessage = cause instanceof Error ? cause.message : String(cause);
  return causeMessage && causeMessage !== err.message
    ? `${err.message}: ${causeMessage}`
    : err.message;
}
