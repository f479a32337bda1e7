/**
 * @wexport/core
 *
 * Domain types, ports and configuration schema for the exporter.
 * This package has zero dependencies on other @wexport packages.
 */

export * from './domain/export.js';
export * from './ports/index.js';
export * from './schemas/export-config.js';
