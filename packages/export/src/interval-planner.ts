/**
 * Interval Planner
 * ================
 * Splits a calendar range into contiguous, non-overlapping half-open
 * intervals by day, month, year, or not at all.
 *
 * Callers supply an inclusive end date; internally the end is exclusive
 * (end + 1 day). All arithmetic is on UTC midnights.
 */

import { DateTime, type DurationLikeObject } from 'luxon';
import type { DateInterval, Granularity } from '@wexport/core';
import { ConfigurationError } from '@wexport/utils';

export type DateInput = string | Date | DateTime;

type CalendarUnit = 'day' | 'month' | 'year';

const STEP: Record<CalendarUnit, DurationLikeObject> = {
  day: { days: 1 },
  month: { months: 1 },
  year: { years: 1 },
};

/**
 * Normalize a date input to UTC midnight of the same calendar day
 *
 * Strings are read as ISO dates (YYYY-MM-DD) in UTC.
 */
export function toUtcDay(value: DateInput, field: string = 'date'): DateTime {
  let parsed: DateTime;
  if (typeof value === 'string') {
    parsed = DateTime.fromISO(value, { zone: 'utc' });
  } else if (value instanceof Date) {
    parsed = DateTime.fromJSDate(value, { zone: 'utc' });
  } else {
    parsed = value.setZone('utc');
  }

  if (!parsed.isValid) {
    throw new ConfigurationError(`Invalid ${field}: ${String(value)}`, field, {
      reason: parsed.invalidExplanation ?? parsed.invalidReason,
    });
  }
  return parsed.startOf('day');
}

/**
 * Plan intervals for [start, endExclusive)
 *
 * An empty range yields an empty plan.
 */
export function planIntervalsExclusive(
  start: DateInput,
  endExclusive: DateInput,
  granularity: Granularity
): DateInterval[] {
  const from = toUtcDay(start, 'startDate');
  const until = toUtcDay(endExclusive, 'endDate');

  if (until.toMillis() < from.toMillis()) {
    throw new ConfigurationError('endDate must not be before startDate', 'endDate', {
      startDate: from.toISODate(),
      endDate: until.toISODate(),
    });
  }
  if (until.toMillis() === from.toMillis()) {
    return [];
  }

  if (granularity === 'none') {
    return [{ start: from, end: until }];
  }

  const intervals: DateInterval[] = [];
  let cursor = from;
  while (cursor.toMillis() < until.toMillis()) {
    const boundary = cursor.startOf(granularity).plus(STEP[granularity]);
    const end = boundary.toMillis() < until.toMillis() ? boundary : until;
    intervals.push({ start: cursor, end });
    cursor = end;
  }
  return intervals;
}

/**
 * Plan intervals for the inclusive calendar range [start, endInclusive]
 */
export function planIntervals(
  start: DateInput,
  endInclusive: DateInput,
  granularity: Granularity
): DateInterval[] {
  const from = toUtcDay(start, 'startDate');
  const until = toUtcDay(endInclusive, 'endDate');
  if (until.toMillis() < from.toMillis()) {
    throw new ConfigurationError('endDate must not be before startDate', 'endDate', {
      startDate: from.toISODate(),
      endDate: until.toISODate(),
    });
  }
  return planIntervalsExclusive(from, until.plus({ days: 1 }), granularity);
}
