#!/usr/bin/env node

/**
 * wexport CLI Entry Point
 */

import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@wexport/utils';
import { registerExportCommands } from '../commands/export.js';

const controller = new AbortController();

// First Ctrl-C stops new units from starting; in-flight queries are cancelled
process.once('SIGINT', () => {
  process.stderr.write('\nCancelling export...\n');
  controller.abort();
});

program
  .name('wexport')
  .description('Export date-partitioned warehouse tables to pipe-delimited CSV')
  .version('1.0.0');

registerExportCommands(program, () => ({
  env: process.env,
  write: (line) => process.stdout.write(`${line}\n`),
  writeError: (line) => process.stderr.write(`${line}\n`),
  signal: controller.signal,
}));

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  await program.parseAsync();
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
