/**
 * Custom Error Classes
 * ====================
 * Error taxonomy shared by the exporter packages.
 *
 * Run-fatal: ConfigurationError, and ConnectionError raised before any unit starts.
 * Unit-level: FetchError, SerializationError, CancelledError, and ConnectionError
 * raised while units are running. Unit-level errors are returned as values.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Input validation failure (CLI arguments, malformed values)
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Required field missing or inconsistent. Detected before any network activity.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * The warehouse connection could not be opened, or was lost.
 */
export class ConnectionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', context, true, { cause });
  }
}

/**
 * One sub-range query failed.
 */
export class FetchError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'FETCH_ERROR', context, true, { cause });
  }
}

/**
 * A result set could not be serialized (structural problem in the rows).
 */
export class SerializationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SERIALIZATION_ERROR', context);
  }
}

/**
 * A unit did not run, or was aborted, because the run was cancelled.
 */
export class CancelledError extends AppError {
  constructor(message: string = 'Export cancelled', context?: Record<string, unknown>) {
    super(message, 'CANCELLED', context);
  }
}

/**
 * Writing artifacts to the output location failed.
 */
export class StorageError extends AppError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', { operation, ...context });
  }
}

/**
 * Errors that end the whole run rather than a single unit
 */
export function isRunFatalError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof ConnectionError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
