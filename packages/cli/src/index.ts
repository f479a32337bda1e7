/**
 * @wexport/cli - Command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/error-handler.js';
export * from './core/coerce.js';
export * from './core/progress-indicator.js';
export * from './commands/export.js';
