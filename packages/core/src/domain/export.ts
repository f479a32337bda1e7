/**
 * Export domain types
 *
 * A run splits one date range into half-open intervals, runs one unit of work
 * (fetch + serialize) per interval and yields one outcome per interval.
 */

import type { DateTime } from 'luxon';

/**
 * How the overall export window is split
 */
export const GRANULARITIES = ['none', 'day', 'month', 'year'] as const;

export type Granularity = (typeof GRANULARITIES)[number];

/**
 * Half-open window [start, end). Both ends are UTC midnights.
 *
 * Invariant: start < end. Produced only by the interval planner.
 */
export interface DateInterval {
  readonly start: DateTime;
  readonly end: DateTime;
}

/**
 * Column names plus row tuples as reported by the warehouse.
 *
 * Invariant: every row has columns.length values.
 */
export interface ResultSet {
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly unknown[]>;
}

/**
 * One named, serialized output (a file's logical name and its bytes)
 */
export interface ExportArtifact {
  readonly name: string;
  readonly bytes: Uint8Array;
}

export interface UnitSuccess {
  readonly kind: 'success';
  readonly interval: DateInterval;
  readonly artifact: ExportArtifact;
  readonly queryText: string;
  readonly rowCount: number;
}

export interface UnitFailure {
  readonly kind: 'failure';
  readonly interval: DateInterval;
  readonly error: Error;
  /** Absent when the unit never got as far as building its query */
  readonly queryText?: string;
}

export type UnitOutcome = UnitSuccess | UnitFailure;

export interface ExportProgress {
  readonly completed: number;
  readonly total: number;
}

export function isUnitSuccess(outcome: UnitOutcome): outcome is UnitSuccess {
  return outcome.kind === 'success';
}

export function isUnitFailure(outcome: UnitOutcome): outcome is UnitFailure {
  return outcome.kind === 'failure';
}

/**
 * Short label for an interval, for logs and progress output
 */
export function formatInterval(interval: DateInterval): string {
  return `${interval.start.toISODate() ?? '?'}..${interval.end.toISODate() ?? '?'}`;
}
