/**
 * @wexport/utils - Shared utilities package
 *
 * Logger, error taxonomy, error handling and environment configuration.
 */

export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, describeError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
