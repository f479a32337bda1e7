/**
 * Export run
 * ==========
 * Validate → plan → fan out units → package.
 *
 * Only configuration errors are thrown; everything that goes wrong inside a
 * unit ends up in `outcomes`. The archive is built from successes only, in
 * completion order.
 */

import type {
  DateInterval,
  ExportArtifact,
  ExportConfig,
  ExportConfigInput,
  QueryHandle,
  UnitOutcome,
} from '@wexport/core';
import { isUnitFailure, isUnitSuccess } from '@wexport/core';
import { createLogger } from '@wexport/utils';
import { parseExportConfig } from './export-config.js';
import { planIntervals } from './interval-planner.js';
import { ParallelExportCoordinator, type CoordinatorOptions } from './export-coordinator.js';
import { archiveName, bundleArtifacts, type CompressionLevel } from './artifact-packager.js';

/**
 * - auto: bundle when there are at least two artifacts
 * - always: bundle whenever there is at least one artifact
 * - never: no archive
 */
export type ArchiveMode = 'auto' | 'always' | 'never';

export interface RunExportOptions extends CoordinatorOptions {
  /** @default 'auto' */
  archive?: ArchiveMode;
  compressionLevel?: CompressionLevel;
}

export interface ExportRunResult {
  config: ExportConfig;
  intervals: DateInterval[];
  /** Completion order */
  outcomes: UnitOutcome[];
  /** Successful artifacts, completion order */
  artifacts: ExportArtifact[];
  archive: ExportArtifact | null;
  succeeded: number;
  failed: number;
}

const log = createLogger('export');

function shouldBundle(mode: ArchiveMode, artifactCount: number): boolean {
  switch (mode) {
    case 'never':
      return false;
    case 'always':
      return artifactCount >= 1;
    case 'auto':
      return artifactCount >= 2;
  }
}

export async function runExport(
  handle: QueryHandle,
  input: ExportConfigInput,
  options: RunExportOptions = {}
): Promise<ExportRunResult> {
  const config = parseExportConfig(input);
  const intervals = planIntervals(config.startDate, config.endDate, config.groupBy);

  const runLog = log.child({ table: config.table });
  runLog.info('Planned export', {
    startDate: config.startDate,
    endDate: config.endDate,
    groupBy: config.groupBy,
    units: intervals.length,
  });

  const coordinator = new ParallelExportCoordinator({
    ...options,
    logger: options.logger ?? runLog,
  });
  const outcomes = await coordinator.run(handle, config, intervals);

  const artifacts = outcomes.filter(isUnitSuccess).map((outcome) => outcome.artifact);
  const failed = outcomes.filter(isUnitFailure).length;

  let archive: ExportArtifact | null = null;
  if (shouldBundle(options.archive ?? 'auto', artifacts.length)) {
    const bytes = bundleArtifacts(artifacts, { level: options.compressionLevel });
    if (bytes) {
      archive = { name: archiveName(config.prefix), bytes };
    }
  }

  runLog.info('Export finished', {
    succeeded: artifacts.length,
    failed,
    archive: archive?.name ?? null,
  });

  return {
    config,
    intervals,
    outcomes,
    artifacts,
    archive,
    succeeded: artifacts.length,
    failed,
  };
}
