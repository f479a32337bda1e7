/**
 * Progress Indicator
 *
 * Prints one line per completed export unit.
 */

import type { ExportObserver, ExportProgress, UnitOutcome } from '@wexport/core';
import { formatInterval } from '@wexport/core';
import { formatError } from './error-handler.js';

export type LineWriter = (line: string) => void;

/**
 * Format elapsed time
 */
export function formatElapsedTime(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatOutcome(
  outcome: UnitOutcome,
  progress: ExportProgress,
  secrets: readonly string[] = []
): string {
  const counter = `[${progress.completed}/${progress.total}]`;
  if (outcome.kind === 'success') {
    const rows = outcome.rowCount === 1 ? '1 row' : `${outcome.rowCount} rows`;
    return `${counter} ✓ ${outcome.artifact.name} - ${rows}`;
  }
  return `${counter} ✗ ${formatInterval(outcome.interval)} - ${formatError(outcome.error, secrets)}`;
}

/**
 * Observer that reports each unit as it finishes
 */
export class ProgressIndicator implements ExportObserver {
  constructor(
    private readonly write: LineWriter,
    private readonly secrets: readonly string[] = []
  ) {}

  unitCompleted(outcome: UnitOutcome, progress: ExportProgress): void {
    this.write(formatOutcome(outcome, progress, this.secrets));
  }
}
