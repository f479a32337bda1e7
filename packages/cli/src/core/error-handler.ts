/**
 * Error Handler - User-friendly error messages with configured secrets redacted
 */

import {
  CancelledError,
  ConfigurationError,
  ConnectionError,
  handleError as logHandledError,
} from '@wexport/utils';

/**
 * Environment variables holding credentials
 */
export const SECRET_ENV_VARS = ['SNOWFLAKE_PASSWORD', 'CLICKHOUSE_PASSWORD'] as const;

const REDACTED = '[REDACTED]';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

/**
 * Credential values configured in env, longest first
 */
export function secretsFrom(env: Record<string, string | undefined>): string[] {
  return SECRET_ENV_VARS.map((name) => env[name])
    .filter((value): value is string => typeof value === 'string' && value.trim() !== '')
    .sort((a, b) => b.length - a.length);
}

function redact(message: string, secrets: readonly string[]): string {
  return secrets.reduce((text, secret) => text.split(secret).join(REDACTED), message);
}

/**
 * Format error for user display. Warehouse messages pass through unchanged
 * apart from any configured secret value.
 */
export function formatError(error: unknown, secrets: readonly string[] = []): string {
  if (error instanceof Error) {
    return redact(error.message, secrets);
  }

  if (typeof error === 'string') {
    return redact(error, secrets);
  }

  return 'An unexpected error occurred';
}

/**
 * Short hint shown under a fatal error
 */
function hintFor(error: unknown): string | undefined {
  if (error instanceof ConfigurationError) {
    return 'Check the export options and the SNOWFLAKE_* / CLICKHOUSE_* environment variables.';
  }
  if (error instanceof ConnectionError) {
    return 'Check that the warehouse is reachable and the credentials are valid.';
  }
  if (error instanceof CancelledError) {
    return 'The export was cancelled before it finished.';
  }
  return undefined;
}

/**
 * Log a fatal error in full and return the lines to print
 */
export function handleError(
  error: unknown,
  context?: Record<string, unknown>,
  secrets: readonly string[] = []
): string[] {
  logHandledError(error, context);

  const lines = [`Error: ${formatError(error, secrets)}`];
  const hint = hintFor(error);
  if (hint) {
    lines.push(hint);
  }
  return lines;
}
