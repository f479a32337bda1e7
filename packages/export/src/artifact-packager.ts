/**
 * Artifact Packager
 * =================
 * Names artifacts from their interval and bundles them into a zip archive.
 *
 * Entries are stored uncompressed unless a level is given, and carry a fixed
 * timestamp, so the same artifacts in the same order give the same bytes.
 */

import { unzipSync, zipSync, type DeflateOptions, type Zippable } from 'fflate';
import type { DateInterval, ExportArtifact, Granularity } from '@wexport/core';
import { ValidationError } from '@wexport/utils';

export const ARTIFACT_EXTENSION = '.csv';
export const ARCHIVE_EXTENSION = '.zip';

// DOS timestamps start in 1980; any fixed local date after that works
const ENTRY_MTIME = new Date(2000, 0, 1, 0, 0, 0);

const NAME_FORMATS: Record<Exclude<Granularity, 'none'>, string> = {
  day: 'yyyy_MM_dd',
  month: 'yyyy_MM',
  year: 'yyyy',
};

export type CompressionLevel = NonNullable<DeflateOptions['level']>;

export interface BundleOptions {
  /**
   * 0 stores entries as-is
   * @default 0
   */
  level?: CompressionLevel;
}

/**
 * `{prefix}_full.csv`, `{prefix}_YYYY_MM_DD.csv`, `{prefix}_YYYY_MM.csv` or `{prefix}_YYYY.csv`
 */
export function artifactName(interval: DateInterval, granularity: Granularity, prefix: string): string {
  if (granularity === 'none') {
    return `${prefix}_full${ARTIFACT_EXTENSION}`;
  }
  return `${prefix}_${interval.start.toFormat(NAME_FORMATS[granularity])}${ARTIFACT_EXTENSION}`;
}

export function archiveName(prefix: string): string {
  return `${prefix}${ARCHIVE_EXTENSION}`;
}

/**
 * Bundle artifacts into one zip, one entry per artifact, in the given order.
 *
 * @returns null when there is nothing to bundle
 */
export function bundleArtifacts(
  artifacts: readonly ExportArtifact[],
  options: BundleOptions = {}
): Uint8Array | null {
  if (artifacts.length === 0) {
    return null;
  }

  const level = options.level ?? 0;
  const entries: Zippable = {};
  for (const artifact of artifacts) {
    if (Object.prototype.hasOwnProperty.call(entries, artifact.name)) {
      throw new ValidationError(`Duplicate artifact name: ${artifact.name}`, {
        artifact: artifact.name,
      });
    }
    entries[artifact.name] = [artifact.bytes, { level, mtime: ENTRY_MTIME }];
  }

  return zipSync(entries, { level, mtime: ENTRY_MTIME });
}

/**
 * Read an archive produced by bundleArtifacts back into artifacts
 */
export function unbundleArtifacts(archive: Uint8Array): ExportArtifact[] {
  const files = unzipSync(archive);
  return Object.entries(files).map(([name, bytes]) => ({ name, bytes }));
}
