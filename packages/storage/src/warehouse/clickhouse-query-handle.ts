/**
 * ClickHouse Query Handle
 *
 * QueryHandle over @clickhouse/client. Date boundaries travel as typed query
 * parameters; results come back as JSONCompactEachRowWithNames (names row
 * first, then one array per row).
 *
 * The client keeps an HTTP connection pool, so one handle is safe to share
 * between workers.
 */

import { createClient, type ClickHouseClient } from '@clickhouse/client';
import type {
  BoundQuery,
  QueryExecutionOptions,
  QueryHandle,
  QueryResult,
  SqlDialect,
} from '@wexport/core';
import { ConnectionError, FetchError, createLogger, type ClickHouseConfig } from '@wexport/utils';

const log = createLogger('storage:clickhouse');

const REQUEST_TIMEOUT_MS = 300_000;
const MAX_OPEN_CONNECTIONS = 10;

export const clickHouseDialect: SqlDialect = {
  name: 'clickhouse',
  dateParameter: (position) => `toDate({p${position}:String})`,
};

/**
 * Errors that mean the server is unreachable, as opposed to a bad query
 */
export function isClickHouseConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return (
    message.includes('socket hang up') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('ehostunreach')
  );
}

/**
 * Bind values keyed p0, p1, ... to match dateParameter(position)
 */
function toQueryParams(query: BoundQuery): Record<string, string> {
  return Object.fromEntries(query.binds.map((bind, index) => [`p${index}`, bind.value]));
}

function parseCompactRows(rows: unknown[]): QueryResult {
  const [header, ...data] = rows;
  if (!Array.isArray(header)) {
    return { columns: [], rows: [] };
  }
  return {
    columns: header.map((name) => String(name)),
    rows: data.map((row, index) => {
      if (!Array.isArray(row)) {
        throw new FetchError(`ClickHouse returned a malformed row at position ${index + 1}`);
      }
      return row;
    }),
  };
}

export class ClickHouseQueryHandle implements QueryHandle {
  readonly dialect = clickHouseDialect;
  readonly concurrencySafe = true;

  constructor(private readonly client: ClickHouseClient) {}

  async execute(query: BoundQuery, options: QueryExecutionOptions = {}): Promise<QueryResult> {
    try {
      const resultSet = await this.client.query({
        query: query.text,
        format: 'JSONCompactEachRowWithNames',
        query_params: toQueryParams(query),
        abort_signal: options.signal,
      });
      const rows = await resultSet.json<unknown[]>();
      return parseCompactRows(rows);
    } catch (error) {
      if (isClickHouseConnectionFailure(error)) {
        throw new ConnectionError('Lost connection to ClickHouse', { query: query.text }, error);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Open a client and check that the server answers before any unit starts
 *
 * @throws ConnectionError when the server cannot be reached
 */
export async function connectClickHouse(config: ClickHouseConfig): Promise<ClickHouseQueryHandle> {
  const client = createClient({
    url: `http://${config.host}:${config.port}`,
    username: config.user,
    database: config.database,
    request_timeout: REQUEST_TIMEOUT_MS,
    max_open_connections: MAX_OPEN_CONNECTIONS,
    // Default ClickHouse user often has no password
    ...(config.password !== '' ? { password: config.password } : {}),
  });

  const ping = await client.ping();
  if (!ping.success) {
    await client.close();
    throw new ConnectionError(
      `Could not connect to ClickHouse at ${config.host}:${config.port}`,
      { host: config.host, port: config.port, database: config.database },
      ping.error
    );
  }

  log.info('Connected to ClickHouse', { host: config.host, database: config.database });
  return new ClickHouseQueryHandle(client);
}
