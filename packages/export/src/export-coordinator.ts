/**
 * Parallel Export Coordinator
 * ===========================
 * Runs one fetch + serialize unit per interval on a fixed-size worker pool
 * that shares a single query handle.
 *
 * - Workers pull the next interval from a shared queue, one query in flight each.
 * - Outcomes are recorded in completion order; each carries its own interval.
 * - A failed unit never cancels, retries or blocks another unit.
 * - After cancellation (signal or deadline) or a lost connection, queued units
 *   are not started and are recorded as failures.
 * - Exactly one outcome per interval.
 */

import type {
  DateInterval,
  ExportConfig,
  ExportObserver,
  ExportProgress,
  QueryHandle,
  UnitFailure,
  UnitOutcome,
} from '@wexport/core';
import { formatInterval } from '@wexport/core';
import {
  CancelledError,
  ConnectionError,
  SerializationError,
  createLogger,
  describeError,
  type Logger,
} from '@wexport/utils';
import { fetchRecords } from './record-fetcher.js';
import { serializeResultSet } from './csv-serializer.js';
import { artifactName } from './artifact-packager.js';
import { withExclusiveAccess } from './serialized-query-handle.js';

export const DEFAULT_CONCURRENCY = 4;

export interface CoordinatorOptions {
  /**
   * Number of workers
   * @default 4
   */
  concurrency?: number;
  observer?: ExportObserver;
  /**
   * External cancellation
   */
  signal?: AbortSignal;
  /**
   * Overall deadline for the run, in milliseconds
   */
  timeoutMs?: number;
  logger?: Logger;
}

type RunConfig = Pick<ExportConfig, 'table' | 'dateColumn' | 'groupBy' | 'prefix'>;

export class ParallelExportCoordinator {
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(private readonly options: CoordinatorOptions = {}) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.log = options.logger ?? createLogger('export');
  }

  async run(
    handle: QueryHandle,
    config: RunConfig,
    intervals: readonly DateInterval[]
  ): Promise<UnitOutcome[]> {
    const total = intervals.length;
    const outcomes: UnitOutcome[] = [];
    if (total === 0) {
      return outcomes;
    }

    const shared = withExclusiveAccess(handle);
    const cancellation = this.createCancellation();
    const signal = cancellation.signal;
    let nextIndex = 0;
    let connectionLost: ConnectionError | null = null;

    const record = (outcome: UnitOutcome): void => {
      outcomes.push(outcome);
      this.notifyCompleted(outcome, { completed: outcomes.length, total });
    };

    const worker = async (): Promise<void> => {
      while (nextIndex < total) {
        const index = nextIndex++;
        const interval = intervals[index];
        if (interval === undefined) {
          break;
        }

        if (signal.aborted) {
          record(this.notStarted(interval, cancelReason(signal, interval)));
          continue;
        }
        if (connectionLost) {
          record(
            this.notStarted(
              interval,
              new ConnectionError(
                'Not started: the warehouse connection was lost',
                { interval: formatInterval(interval) },
                connectionLost
              )
            )
          );
          continue;
        }

        this.notifyStarted(interval, index);
        const outcome = await this.runUnit(shared, config, interval, signal);
        if (outcome.kind === 'failure' && outcome.error instanceof ConnectionError) {
          connectionLost ??= outcome.error;
        }
        record(outcome);
      }
    };

    const workerCount = Math.min(this.concurrency, total);
    this.log.info('Starting export units', {
      table: config.table,
      units: total,
      workers: workerCount,
      serialized: !handle.concurrencySafe,
    });

    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      cancellation.dispose();
    }

    return outcomes;
  }

  /**
   * One unit of work: fetch, then serialize and name.
   */
  private async runUnit(
    handle: QueryHandle,
    config: RunConfig,
    interval: DateInterval,
    signal: AbortSignal
  ): Promise<UnitOutcome> {
    const label = formatInterval(interval);
    const fetched = await fetchRecords(handle, config.table, config.dateColumn, interval, {
      signal,
    });
    this.log.debug('Executed query', { interval: label, query: fetched.queryText });

    if (!fetched.ok) {
      this.log.warn('Unit failed', { interval: label, error: fetched.error.message });
      return { kind: 'failure', interval, error: fetched.error, queryText: fetched.queryText };
    }

    try {
      const bytes = serializeResultSet(fetched.value);
      const name = artifactName(interval, config.groupBy, config.prefix);
      const rowCount = fetched.value.rows.length;
      this.log.info('Unit completed', { interval: label, artifact: name, rows: rowCount });
      return {
        kind: 'success',
        interval,
        artifact: { name, bytes },
        queryText: fetched.queryText,
        rowCount,
      };
    } catch (error) {
      const serializationError =
        error instanceof SerializationError
          ? error
          : new SerializationError(describeError(error), { interval: label });
      this.log.warn('Unit failed', { interval: label, error: serializationError.message });
      return {
        kind: 'failure',
        interval,
        error: serializationError,
        queryText: fetched.queryText,
      };
    }
  }

  private notStarted(interval: DateInterval, error: Error): UnitFailure {
    this.log.debug('Unit not started', { interval: formatInterval(interval), error: error.message });
    return { kind: 'failure', interval, error };
  }

  private notifyStarted(interval: DateInterval, index: number): void {
    try {
      this.options.observer?.unitStarted?.(interval, index);
    } catch (error) {
      this.log.warn('Export observer failed', { hook: 'unitStarted', error: describeError(error) });
    }
  }

  private notifyCompleted(outcome: UnitOutcome, progress: ExportProgress): void {
    try {
      this.options.observer?.unitCompleted?.(outcome, progress);
    } catch (error) {
      this.log.warn('Export observer failed', { hook: 'unitCompleted', error: describeError(error) });
    }
  }

  /**
   * Merge the caller's signal and the deadline into one signal for this run
   */
  private createCancellation(): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const { signal: external, timeoutMs } = this.options;

    const onExternalAbort = (): void => {
      controller.abort(
        external?.reason instanceof CancelledError
          ? external.reason
          : new CancelledError('Export cancelled')
      );
    };
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        controller.abort(
          new CancelledError(`Export deadline of ${timeoutMs}ms exceeded`, { timeoutMs })
        );
      }, timeoutMs);
    }

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer) clearTimeout(timer);
        external?.removeEventListener('abort', onExternalAbort);
      },
    };
  }
}

function cancelReason(signal: AbortSignal, interval: DateInterval): CancelledError {
  const reason = signal.reason instanceof CancelledError ? signal.reason : undefined;
  return new CancelledError(`Not started: ${reason?.message ?? 'export cancelled'}`, {
    interval: formatInterval(interval),
  });
}
