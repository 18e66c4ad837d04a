import { toError } from '@lcforge/core';
import { flushLoggers } from '@lcforge/logger';
import type { Command } from 'commander';

import { loadCliEnv } from '../shared/env.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging.js';
import { displayCliError, isJsonRequested, outputSuccess } from '../shared/output.js';
import { ObjectIdsSchema, ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';
import { buildProcessParams, buildProcessResult, exitCodeForResult, formatProcessResult } from './process-utils.js';

/**
 * Register the process command.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Convert registry objects into SNANA light-curve files')
    .argument('[objects...]', 'Object ids to process (default: every object in the registry)')
    .option('--registry <path>', 'Object registry JSON file (default: $LCFORGE_REGISTRY_PATH)')
    .option('--raw-dir <path>', 'Raw archive root (default: $LCFORGE_RAW_DATA_DIR)')
    .option('--out-dir <path>', 'Output root (default: $LCFORGE_OUTPUT_DIR)')
    .option('--metadata <source>', 'Metadata source: simbad or registry', 'simbad')
    .option('--strict-bands', 'Skip an object when any of its band labels is unrecognized')
    .option('--timeout <ms>', 'Timeout for each metadata request in milliseconds')
    .option('--log-level <level>', 'trace, debug, info, warn or error')
    .option('--json', 'Output results in JSON format')
    .action(async (objects: unknown, rawOptions: unknown) => {
      await executeProcessCommand(objects, rawOptions);
    });
}

async function executeProcessCommand(rawObjects: unknown, rawOptions: unknown): Promise<void> {
  const format = isJsonRequested(rawOptions) ? 'json' : 'text';

  const validation = ProcessCommandOptionsSchema.safeParse(rawOptions);
  const objects = ObjectIdsSchema.safeParse(rawObjects ?? []);
  if (!validation.success || !objects.success) {
    const issue = validation.error?.issues[0] ?? objects.error?.issues[0];
    displayCliError('process', new Error(issue?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, format);
  }

  const env = loadCliEnv();
  if (env.isErr()) {
    displayCliError('process', env.error, ExitCodes.CONFIG_ERROR, format);
  }

  const options = validation.data;
  configureCliLogging(env.value, options.logLevel);

  try {
    const handler = new ProcessHandler();
    const result = await handler.execute(buildProcessParams(objects.data, options, env.value));
    if (result.isErr()) {
      displayCliError('process', result.error, ExitCodes.CONFIG_ERROR, format);
    }

    const processResult = buildProcessResult(result.value);
    flushLoggers();
    outputSuccess('process', format, processResult, formatProcessResult(processResult));
    process.exitCode = exitCodeForResult(processResult);
  } catch (error) {
    displayCliError('process', toError(error), ExitCodes.GENERAL_ERROR, format);
  }
}
