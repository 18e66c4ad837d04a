import { ConfigurationError, toError } from '@lcforge/core';
import type { Command } from 'commander';

import { loadCliEnv } from '../shared/env.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging.js';
import { displayCliError, isJsonRequested, outputSuccess } from '../shared/output.js';
import { InspectCommandOptionsSchema } from '../shared/schemas.js';

import { InspectHandler } from './inspect-handler.js';
import { formatInspectResult } from './inspect-utils.js';

/**
 * Register the inspect command.
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show which parser reads a photometry file and how its bands resolve')
    .argument('<file>', 'Path to a raw photometry file')
    .option('--log-level <level>', 'trace, debug, info, warn or error')
    .option('--json', 'Output results in JSON format')
    .action(async (filePath: string, rawOptions: unknown) => {
      await executeInspectCommand(filePath, rawOptions);
    });
}

async function executeInspectCommand(filePath: string, rawOptions: unknown): Promise<void> {
  const format = isJsonRequested(rawOptions) ? 'json' : 'text';

  const validation = InspectCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    displayCliError('inspect', new Error(issue?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, format);
  }

  const env = loadCliEnv();
  if (env.isErr()) {
    displayCliError('inspect', env.error, ExitCodes.CONFIG_ERROR, format);
  }
  configureCliLogging(env.value, validation.data.logLevel);

  try {
    const result = await new InspectHandler().execute({ filePath });
    if (result.isErr()) {
      const exitCode = result.error instanceof ConfigurationError ? ExitCodes.CONFIG_ERROR : ExitCodes.NOT_FOUND;
      displayCliError('inspect', result.error, exitCode, format);
    }
    outputSuccess('inspect', format, result.value, formatInspectResult(result.value));
    if (result.value.outcome.status === 'unparsable') {
      process.exitCode = ExitCodes.VALIDATION_ERROR;
    }
  } catch (error) {
    displayCliError('inspect', toError(error), ExitCodes.GENERAL_ERROR, format);
  }
}
