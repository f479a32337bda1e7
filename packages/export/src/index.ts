/**
 * @wexport/export - Date-range partitioned export pipeline
 */

export { toUtcDay, planIntervals, planIntervalsExclusive } from './interval-planner.js';
export type { DateInput } from './interval-planner.js';

export { buildRangeQuery, describeQuery, fetchRecords } from './record-fetcher.js';
export type { FetchResult, FetchOk, FetchErr, FetchOptions } from './record-fetcher.js';

export {
  CSV_DELIMITER,
  CSV_QUOTE,
  CSV_RECORD_DELIMITER,
  renderValue,
  serializeResultSet,
  serializeResultSetToString,
} from './csv-serializer.js';

export { SerializedQueryHandle, withExclusiveAccess } from './serialized-query-handle.js';

export { ParallelExportCoordinator, DEFAULT_CONCURRENCY } from './export-coordinator.js';
export type { CoordinatorOptions } from './export-coordinator.js';

export {
  ARTIFACT_EXTENSION,
  ARCHIVE_EXTENSION,
  artifactName,
  archiveName,
  bundleArtifacts,
  unbundleArtifacts,
} from './artifact-packager.js';
export type { BundleOptions, CompressionLevel } from './artifact-packager.js';

export { parseExportConfig } from './export-config.js';
export { runExport } from './run-export.js';
export type { ArchiveMode, RunExportOptions, ExportRunResult } from './run-export.js';
