import { loadPassbandVocabulary } from '@lcforge/core';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { displayCliError, isJsonRequested, outputSuccess } from '../shared/output.js';
import { BandLabelsSchema, ResolveBandCommandOptionsSchema } from '../shared/schemas.js';

import { formatResolveBandResult, resolveBandLabels } from './resolve-band-utils.js';

/**
 * Register the resolve-band command.
 */
export function registerResolveBandCommand(program: Command): void {
  program
    .command('resolve-band')
    .description('Show how raw band labels map onto the passband vocabulary')
    .argument('<labels...>', 'Raw band labels as they appear in photometry files')
    .option('--json', 'Output results in JSON format')
    .action(async (labels: unknown, rawOptions: unknown) => {
      await executeResolveBandCommand(labels, rawOptions);
    });
}

async function executeResolveBandCommand(rawLabels: unknown, rawOptions: unknown): Promise<void> {
  const format = isJsonRequested(rawOptions) ? 'json' : 'text';

  const validation = ResolveBandCommandOptionsSchema.safeParse(rawOptions);
  const labels = BandLabelsSchema.safeParse(rawLabels);
  if (!validation.success || !labels.success) {
    const issue = validation.error?.issues[0] ?? labels.error?.issues[0];
    displayCliError('resolve-band', new Error(issue?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, format);
  }

  const vocabulary = await loadPassbandVocabulary();
  if (vocabulary.isErr()) {
    displayCliError('resolve-band', vocabulary.error, ExitCodes.CONFIG_ERROR, format);
  }

  const result = resolveBandLabels(labels.data, vocabulary.value);
  outputSuccess('resolve-band', format, result, formatResolveBandResult(result));
  if (result.unrecognized > 0) {
    process.exitCode = ExitCodes.VALIDATION_ERROR;
  }
}
