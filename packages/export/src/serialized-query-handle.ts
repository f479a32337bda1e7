/**
 * Serialized Query Handle
 *
 * Wraps a handle that is not safe for concurrent use so that at most one
 * execute (submit + fetch of all rows) runs at a time. Callers still run in
 * parallel around it; only the round-trip is queued.
 */

import type {
  BoundQuery,
  QueryExecutionOptions,
  QueryHandle,
  QueryResult,
  SqlDialect,
} from '@wexport/core';
import { CancelledError } from '@wexport/utils';

export class SerializedQueryHandle implements QueryHandle {
  readonly concurrencySafe = true;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly inner: QueryHandle) {}

  get dialect(): SqlDialect {
    return this.inner.dialect;
  }

  execute(query: BoundQuery, options: QueryExecutionOptions = {}): Promise<QueryResult> {
    const run = this.tail.then(() => {
      // Aborted while waiting for the lock: never reach the warehouse
      if (options.signal?.aborted) {
        throw options.signal.reason instanceof CancelledError
          ? options.signal.reason
          : new CancelledError('Export cancelled while waiting for the connection');
      }
      return this.inner.execute(query, options);
    });
    // The lock is released whether the query succeeded or not
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

/**
 * Return a handle that may be shared by concurrent workers
 */
export function withExclusiveAccess(handle: QueryHandle): QueryHandle {
  return handle.concurrencySafe ? handle : new SerializedQueryHandle(handle);
}
