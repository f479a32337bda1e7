/**
 * Export configuration validation
 */

import { ExportConfigSchema, type ExportConfig, type ExportConfigInput } from '@wexport/core';
import { ConfigurationError } from '@wexport/utils';

/**
 * Validate export parameters. Runs before any connection is opened.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseExportConfig(input: ExportConfigInput): ExportConfig {
  const result = ExportConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.') || 'config';
      return `${field}: ${issue.message}`;
    });
    const firstField = result.error.issues[0]?.path.join('.');
    throw new ConfigurationError(`Invalid export configuration: ${issues.join('; ')}`, firstField, {
      issues,
    });
  }
  return result.data;
}
