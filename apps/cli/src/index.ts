#!/usr/bin/env node
import { flushLoggers, getLogger } from '@lcforge/logger';
import { Command } from 'commander';

import { registerInspectCommand } from './features/inspect/inspect.js';
import { registerProcessCommand } from './features/process/process.js';
import { registerResolveBandCommand } from './features/resolve-band/resolve-band.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('lcforge')
    .description('Turn heterogeneous archival photometry into SNANA light-curve files')
    .version('0.1.0');

  // process - batch conversion of registry objects
  registerProcessCommand(program);

  // inspect - parser chain and band resolution for a single file
  registerInspectCommand(program);

  // resolve-band - vocabulary lookup for raw labels
  registerResolveBandCommand(program);

  await program.parseAsync();
  flushLoggers();
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason: String(reason) }, 'Unhandled rejection');
  flushLoggers();
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error({ error: error.message }, 'Uncaught exception');
  flushLoggers();
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error({ error: String(error) }, 'CLI failed');
  flushLoggers();
  process.exit(1);
});
