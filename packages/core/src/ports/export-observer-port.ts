/**
 * Export Observer Port
 *
 * Progress sink for an export run. Keeps the pipeline free of any
 * presentation code.
 */

import type { DateInterval, ExportProgress, UnitOutcome } from '../domain/export.js';

export interface ExportObserver {
  /**
   * A worker picked up the interval at `index` (submission order)
   */
  unitStarted?(interval: DateInterval, index: number): void;

  /**
   * Called exactly once per unit, in completion order.
   * `progress.completed` increases by one on every call.
   */
  unitCompleted?(outcome: UnitOutcome, progress: ExportProgress): void;
}
