/**
 * Snowflake Query Handle
 *
 * QueryHandle over snowflake-sdk. Statements use positional binds with an
 * explicit TO_DATE cast and return rows as arrays in engine column order.
 *
 * A snowflake-sdk connection is not declared safe for concurrent statements,
 * so the coordinator serializes access to it.
 */

import snowflake from 'snowflake-sdk';
import type { Connection, ConnectionOptions } from 'snowflake-sdk';
import type {
  BoundQuery,
  QueryExecutionOptions,
  QueryHandle,
  QueryResult,
  SqlDialect,
} from '@wexport/core';
import {
  CancelledError,
  ConnectionError,
  FetchError,
  createLogger,
  describeError,
  type SnowflakeConfig,
} from '@wexport/utils';

const log = createLogger('storage:snowflake');

type Statement = ReturnType<Connection['execute']>;

export const snowflakeDialect: SqlDialect = {
  name: 'snowflake',
  dateParameter: () => 'TO_DATE(?)',
};

function toRows(rows: unknown[] | undefined): unknown[][] {
  return (rows ?? []).map((row, index) => {
    if (!Array.isArray(row)) {
      throw new FetchError(`Snowflake returned a malformed row at position ${index + 1}`);
    }
    return row;
  });
}

export class SnowflakeQueryHandle implements QueryHandle {
  readonly dialect = snowflakeDialect;
  readonly concurrencySafe = false;

  constructor(private readonly connection: Connection) {}

  execute(query: BoundQuery, options: QueryExecutionOptions = {}): Promise<QueryResult> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Export cancelled before the query was sent'));
    }

    return new Promise<QueryResult>((resolve, reject) => {
      let statement: Statement | undefined;

      const onAbort = (): void => {
        statement?.cancel((error) => {
          if (error) {
            log.warn('Failed to cancel Snowflake statement', { error: error.message });
          }
        });
        reject(new CancelledError('Export cancelled while the query was running'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      statement = this.connection.execute({
        sqlText: query.text,
        binds: query.binds.map((bind) => bind.value),
        rowMode: 'array',
        // Numbers and dates keep the warehouse's own text form
        fetchAsString: ['Number', 'Date', 'JSON'],
        complete: (error, stmt, rows) => {
          signal?.removeEventListener('abort', onAbort);
          if (error) {
            reject(
              this.connection.isUp()
                ? error
                : new ConnectionError('Lost connection to Snowflake', { query: query.text }, error)
            );
            return;
          }
          try {
            resolve({
              columns: stmt.getColumns().map((column) => column.getName()),
              rows: toRows(rows),
            });
          } catch (mappingError) {
            reject(mappingError);
          }
        },
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.destroy((error) => {
        if (error) {
          reject(new ConnectionError('Failed to close the Snowflake connection', {}, error));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * Open a Snowflake session with password or browser-delegated SSO
 *
 * @throws ConnectionError when the session cannot be established
 */
export async function connectSnowflake(config: SnowflakeConfig): Promise<SnowflakeQueryHandle> {
  const options: ConnectionOptions = {
    account: config.account,
    username: config.username,
    role: config.role,
    warehouse: config.warehouse,
    authenticator: config.authenticator,
    ...(config.password !== undefined ? { password: config.password } : {}),
  };
  const connection = snowflake.createConnection(options);

  try {
    await new Promise<void>((resolve, reject) => {
      const callback = (error: unknown): void => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      };
      if (config.authenticator === 'EXTERNALBROWSER') {
        // Browser SSO needs the async variant; its promise settles through the callback
        connection.connectAsync(callback).catch(reject);
      } else {
        connection.connect(callback);
      }
    });
  } catch (error) {
    throw new ConnectionError(
      `Could not connect to Snowflake account ${config.account}: ${describeError(error)}`,
      { account: config.account, authenticator: config.authenticator },
      error
    );
  }

  log.info('Connected to Snowflake', {
    account: config.account,
    warehouse: config.warehouse,
    authenticator: config.authenticator,
  });
  return new SnowflakeQueryHandle(connection);
}
