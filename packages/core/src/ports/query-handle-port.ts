/**
 * Query Handle Port
 *
 * The only thing the exporter knows about a warehouse: submit SQL text with
 * bound values, receive column names and rows, or an error.
 */

/**
 * A calendar date bound to a query, in YYYY-MM-DD form
 */
export interface DateBind {
  readonly type: 'date';
  readonly value: string;
}

export interface BoundQuery {
  readonly text: string;
  readonly binds: readonly DateBind[];
}

export interface QueryResult {
  readonly columns: string[];
  readonly rows: unknown[][];
}

/**
 * SQL spelling that differs between warehouses
 */
export interface SqlDialect {
  readonly name: string;

  /**
   * Placeholder for the bind at `position` (0-based), cast to a date
   */
  dateParameter(position: number): string;
}

export interface QueryExecutionOptions {
  /**
   * Aborts the running statement where the engine supports it
   */
  signal?: AbortSignal;
}

/**
 * An already-open, authenticated connection.
 *
 * A handle that is not `concurrencySafe` must never see two executions at
 * once; the coordinator serializes access to it.
 */
export interface QueryHandle {
  readonly dialect: SqlDialect;
  readonly concurrencySafe: boolean;

  execute(query: BoundQuery, options?: QueryExecutionOptions): Promise<QueryResult>;

  close(): Promise<void>;
}
