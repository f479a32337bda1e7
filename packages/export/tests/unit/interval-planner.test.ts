import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import type { DateInterval } from '@wexport/core';
import { ConfigurationError } from '@wexport/utils';
import { planIntervals, planIntervalsExclusive, toUtcDay } from '../../src/interval-planner.js';

function isoPairs(intervals: DateInterval[]): Array<[string | null, string | null]> {
  return intervals.map((interval) => [interval.start.toISODate(), interval.end.toISODate()]);
}

describe('planIntervals', () => {
  it('emits one interval for granularity none', () => {
    expect(isoPairs(planIntervals('2024-01-01', '2024-01-01', 'none'))).toEqual([
      ['2024-01-01', '2024-01-02'],
    ]);
  });

  it('emits one interval per calendar day', () => {
    expect(isoPairs(planIntervals('2024-01-01', '2024-01-03', 'day'))).toEqual([
      ['2024-01-01', '2024-01-02'],
      ['2024-01-02', '2024-01-03'],
      ['2024-01-03', '2024-01-04'],
    ]);
  });

  it('handles leap days', () => {
    expect(isoPairs(planIntervals('2024-02-28', '2024-03-01', 'day'))).toEqual([
      ['2024-02-28', '2024-02-29'],
      ['2024-02-29', '2024-03-01'],
      ['2024-03-01', '2024-03-02'],
    ]);
  });

  it('clips the first and last month', () => {
    expect(isoPairs(planIntervals('2024-01-15', '2024-02-15', 'month'))).toEqual([
      ['2024-01-15', '2024-02-01'],
      ['2024-02-01', '2024-02-16'],
    ]);
  });

  it('emits full months in the middle', () => {
    expect(isoPairs(planIntervals('2023-12-31', '2024-03-01', 'month'))).toEqual([
      ['2023-12-31', '2024-01-01'],
      ['2024-01-01', '2024-02-01'],
      ['2024-02-01', '2024-03-01'],
      ['2024-03-01', '2024-03-02'],
    ]);
  });

  it('clips the first and last year', () => {
    expect(isoPairs(planIntervals('2023-11-30', '2025-02-01', 'year'))).toEqual([
      ['2023-11-30', '2024-01-01'],
      ['2024-01-01', '2025-01-01'],
      ['2025-01-01', '2025-02-02'],
    ]);
  });

  it('keeps a single month inside one interval', () => {
    expect(isoPairs(planIntervals('2024-05-01', '2024-05-31', 'month'))).toEqual([
      ['2024-05-01', '2024-06-01'],
    ]);
  });

  it('rejects an end before the start', () => {
    expect(() => planIntervals('2024-01-03', '2024-01-01', 'day')).toThrow(ConfigurationError);
    expect(() => planIntervals('2024-01-02', '2024-01-01', 'day')).toThrow(
      'endDate must not be before startDate'
    );
  });

  it('rejects an invalid date', () => {
    expect(() => planIntervals('2024-02-30', '2024-03-01', 'day')).toThrow(ConfigurationError);
  });
});

describe('planIntervalsExclusive', () => {
  it('returns an empty plan for a zero-length range', () => {
    expect(planIntervalsExclusive('2024-01-01', '2024-01-01', 'day')).toEqual([]);
    expect(planIntervalsExclusive('2024-01-01', '2024-01-01', 'none')).toEqual([]);
  });

  it('does not advance the end', () => {
    expect(isoPairs(planIntervalsExclusive('2024-01-01', '2024-01-03', 'day'))).toEqual([
      ['2024-01-01', '2024-01-02'],
      ['2024-01-02', '2024-01-03'],
    ]);
  });
});

describe('toUtcDay', () => {
  it('floors DateTime values to UTC midnight', () => {
    const value = DateTime.fromISO('2024-06-10T18:45:00', { zone: 'utc' });
    expect(toUtcDay(value).toISO()).toBe('2024-06-10T00:00:00.000Z');
  });

  it('reads Date values in UTC', () => {
    expect(toUtcDay(new Date(Date.UTC(2024, 5, 10, 23, 0))).toISODate()).toBe('2024-06-10');
  });

  it('names the field in the error', () => {
    expect(() => toUtcDay('not-a-date', 'startDate')).toThrow('Invalid startDate: not-a-date');
  });
});
