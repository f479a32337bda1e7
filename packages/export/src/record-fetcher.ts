/**
 * Record Fetcher
 * ==============
 * Builds the bounded range query for one interval and runs it against the
 * shared handle. Query failures come back as values, never as exceptions.
 */

import type { BoundQuery, DateInterval, QueryHandle, ResultSet, SqlDialect } from '@wexport/core';
import { formatInterval } from '@wexport/core';
import { CancelledError, ConnectionError, FetchError, describeError } from '@wexport/utils';

export type FetchOk = { ok: true; value: ResultSet; query: BoundQuery; queryText: string };

export type FetchErr = {
  ok: false;
  error: FetchError | ConnectionError | CancelledError;
  query: BoundQuery;
  queryText: string;
};

export type FetchResult = FetchOk | FetchErr;

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * SELECT * over [interval.start, interval.end) on the date column.
 *
 * `table` and `dateColumn` must already be validated identifiers; the
 * boundaries are always bound values with an explicit date cast.
 */
export function buildRangeQuery(
  dialect: SqlDialect,
  table: string,
  dateColumn: string,
  interval: DateInterval
): BoundQuery {
  return {
    text:
      `SELECT * FROM ${table} ` +
      `WHERE ${dateColumn} >= ${dialect.dateParameter(0)} ` +
      `AND ${dateColumn} < ${dialect.dateParameter(1)}`,
    binds: [
      { type: 'date', value: interval.start.toFormat('yyyy-MM-dd') },
      { type: 'date', value: interval.end.toFormat('yyyy-MM-dd') },
    ],
  };
}

/**
 * Human-readable form of a bound query, for logs and per-unit reporting
 */
export function describeQuery(query: BoundQuery): string {
  if (query.binds.length === 0) {
    return query.text;
  }
  return `${query.text} -- binds: ${query.binds.map((bind) => bind.value).join(', ')}`;
}

function cancellationFrom(signal: AbortSignal, interval: DateInterval): CancelledError {
  return signal.reason instanceof CancelledError
    ? signal.reason
    : new CancelledError('Export cancelled while the query was running', {
        interval: formatInterval(interval),
      });
}

export async function fetchRecords(
  handle: QueryHandle,
  table: string,
  dateColumn: string,
  interval: DateInterval,
  options: FetchOptions = {}
): Promise<FetchResult> {
  const query = buildRangeQuery(handle.dialect, table, dateColumn, interval);
  const queryText = describeQuery(query);

  try {
    const result = await handle.execute(query, { signal: options.signal });
    return {
      ok: true,
      value: { columns: result.columns, rows: result.rows },
      query,
      queryText,
    };
  } catch (error) {
    if (options.signal?.aborted) {
      return { ok: false, error: cancellationFrom(options.signal, interval), query, queryText };
    }
    if (error instanceof ConnectionError || error instanceof CancelledError) {
      return { ok: false, error, query, queryText };
    }
    return {
      ok: false,
      error: new FetchError(
        `Query failed for ${formatInterval(interval)}: ${describeError(error)}`,
        { interval: formatInterval(interval), table },
        error
      ),
      query,
      queryText,
    };
  }
}
