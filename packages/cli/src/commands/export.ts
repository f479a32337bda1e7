/**
 * Export Command - Date-partitioned table export
 *
 * wexport export --table DB.SCHEMA.TABLE --date-column COL --start YYYY-MM-DD --end YYYY-MM-DD
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { GranularitySchema, isUnitFailure, formatInterval, type QueryHandle } from '@wexport/core';
import { parseExportConfig, runExport, type ArchiveMode } from '@wexport/export';
import { DiskArtifactStore, connectClickHouse, connectSnowflake } from '@wexport/storage';
import {
  ValidationError,
  createLogger,
  describeError,
  getClickHouseConfig,
  getSnowflakeConfig,
} from '@wexport/utils';
import { coerceBoolean, coerceNumber } from '../core/coerce.js';
import {
  EXIT_FATAL,
  EXIT_OK,
  EXIT_PARTIAL,
  formatError,
  handleError,
  secretsFrom,
} from '../core/error-handler.js';
import { ProgressIndicator, formatElapsedTime, type LineWriter } from '../core/progress-indicator.js';

const log = createLogger('cli:export');

/**
 * Export command schema
 */
export const exportSchema = z.object({
  table: z.string().min(1),
  dateColumn: z.string().min(1),
  start: z.string().min(1),
  end: z.string().min(1),
  groupBy: GranularitySchema.default('day'),
  prefix: z.string().default('exported_data'),
  concurrency: z.number().int().min(1).max(32).default(4),
  timeout: z.number().int().positive().optional(),
  out: z.string().min(1).default('csv'),
  clean: z.boolean().default(false),
  archive: z.boolean().default(true),
  archiveAlways: z.boolean().default(false),
  warehouse: z.enum(['snowflake', 'clickhouse']).default('snowflake'),
  externalBrowser: z.boolean().default(false),
});

export type ExportArgs = z.infer<typeof exportSchema>;

export type Warehouse = ExportArgs['warehouse'];

export interface ExportCommandContext {
  env: Record<string, string | undefined>;
  /** Progress and summary output */
  write: LineWriter;
  /** Error output */
  writeError: LineWriter;
  signal?: AbortSignal;
  /**
   * Opens the warehouse handle. Defaults to connectSnowflake / connectClickHouse
   * with settings from env.
   */
  connect?: (warehouse: Warehouse, args: ExportArgs) => Promise<QueryHandle>;
}

/**
 * Coerce raw Commander values, then validate
 */
export function parseExportArgs(raw: Record<string, unknown>): ExportArgs {
  const result = exportSchema.safeParse({
    ...raw,
    concurrency: coerceNumber(raw.concurrency, 'concurrency'),
    timeout: coerceNumber(raw.timeout, 'timeout'),
    clean: coerceBoolean(raw.clean, 'clean'),
    archive: coerceBoolean(raw.archive, 'archive'),
    archiveAlways: coerceBoolean(raw.archiveAlways, 'archiveAlways'),
    externalBrowser: coerceBoolean(raw.externalBrowser, 'externalBrowser'),
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid options: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function archiveModeFor(args: Pick<ExportArgs, 'archive' | 'archiveAlways'>): ArchiveMode {
  if (!args.archive) return 'never';
  return args.archiveAlways ? 'always' : 'auto';
}

function defaultConnect(
  env: Record<string, string | undefined>
): (warehouse: Warehouse, args: ExportArgs) => Promise<QueryHandle> {
  return (warehouse, args) =>
    warehouse === 'clickhouse'
      ? connectClickHouse(getClickHouseConfig(env))
      : connectSnowflake(getSnowflakeConfig(env, { externalBrowser: args.externalBrowser }));
}

/**
 * Run one export end to end.
 *
 * @returns process exit code: 0 all units succeeded, 2 some failed, 1 fatal
 */
export async function exportHandler(
  raw: Record<string, unknown>,
  ctx: ExportCommandContext
): Promise<number> {
  const startedAt = Date.now();
  const secrets = secretsFrom(ctx.env);
  let handle: QueryHandle | undefined;

  try {
    const args = parseExportArgs(raw);
    // Everything below up to connect() fails without touching the network
    const config = parseExportConfig({
      table: args.table,
      dateColumn: args.dateColumn,
      startDate: args.start,
      endDate: args.end,
      groupBy: args.groupBy,
      prefix: args.prefix,
    });
    if (args.warehouse === 'clickhouse') {
      getClickHouseConfig(ctx.env);
    } else {
      getSnowflakeConfig(ctx.env, { externalBrowser: args.externalBrowser });
    }

    const store = new DiskArtifactStore(args.out);
    await store.prepare({ clean: args.clean });

    const connect = ctx.connect ?? defaultConnect(ctx.env);
    handle = await connect(args.warehouse, args);

    const result = await runExport(handle, config, {
      concurrency: args.concurrency,
      timeoutMs: args.timeout,
      signal: ctx.signal,
      archive: archiveModeFor(args),
      observer: new ProgressIndicator(ctx.write, secrets),
    });

    await store.writeAll(result.artifacts);
    const archivePath = result.archive ? await store.write(result.archive) : undefined;

    ctx.write('');
    ctx.write(
      `Exported ${result.succeeded} of ${result.outcomes.length} units from ${config.table} ` +
        `to ${store.directory} in ${formatElapsedTime(Date.now() - startedAt)}`
    );
    if (archivePath) {
      ctx.write(`Archive: ${archivePath}`);
    }
    const failures = result.outcomes.filter(isUnitFailure);
    if (failures.length > 0) {
      ctx.write(`${failures.length} unit(s) failed:`);
      for (const failure of failures) {
        ctx.write(`  ${formatInterval(failure.interval)}: ${formatError(failure.error, secrets)}`);
      }
    }

    return failures.length === 0 ? EXIT_OK : EXIT_PARTIAL;
  } catch (error) {
    for (const line of handleError(error, { command: 'export' }, secrets)) {
      ctx.writeError(line);
    }
    return EXIT_FATAL;
  } finally {
    if (handle) {
      await handle.close().catch((error: unknown) => {
        log.warn('Failed to close warehouse connection', { error: describeError(error) });
      });
    }
  }
}

/**
 * Register export commands
 */
export function registerExportCommands(
  program: Command,
  createContext: () => ExportCommandContext
): void {
  program
    .command('export')
    .description('Export a date range of a table as pipe-delimited CSV files')
    .requiredOption('--table <name>', 'Table to export (DATABASE.SCHEMA.TABLE)')
    .requiredOption('--date-column <column>', 'Date column used to partition the export')
    .requiredOption('--start <date>', 'First day to export (YYYY-MM-DD)')
    .requiredOption('--end <date>', 'Last day to export, inclusive (YYYY-MM-DD)')
    .option('--group-by <granularity>', 'Split by none, day, month or year', 'day')
    .option('--prefix <prefix>', 'File name prefix', 'exported_data')
    .option('--concurrency <n>', 'Number of parallel queries', '4')
    .option('--timeout <ms>', 'Overall deadline in milliseconds')
    .option('--out <dir>', 'Output directory', 'csv')
    .option('--clean', 'Empty the output directory first', false)
    .option('--no-archive', 'Do not bundle the files into a zip archive')
    .option('--archive-always', 'Bundle even a single file', false)
    .option('--warehouse <name>', 'snowflake or clickhouse', 'snowflake')
    .option('--external-browser', 'Authenticate to Snowflake through the browser', false)
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await exportHandler(options, createContext());
    });
}
