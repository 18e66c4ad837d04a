import fs from 'node:fs/promises';
import path from 'node:path';

import { createRawFile, loadPassbandVocabulary, wrapError, type PassbandVocabulary } from '@lcforge/core';
import { ParserChain, resolvePassband, type ParseOutcome, type PassbandResolution } from '@lcforge/ingestion';
import { err, ok, type Result } from 'neverthrow';

export interface InspectResult {
  fileName: string;
  outcome: ParseOutcome;
  /** Distinct raw band labels in first-seen order, resolved against the vocabulary. */
  bands: PassbandResolution[];
}

export interface InspectHandlerParams {
  filePath: string;
}

/**
 * Runs one local file through the parser chain without writing anything.
 */
export class InspectHandler {
  constructor(
    private readonly parserChain: ParserChain = new ParserChain(),
    private readonly loadVocabulary: () => Promise<Result<PassbandVocabulary, Error>> = () => loadPassbandVocabulary()
  ) {}

  async execute(params: InspectHandlerParams): Promise<Result<InspectResult, Error>> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(params.filePath);
    } catch (error) {
      return wrapError(error, `Cannot read ${params.filePath}`);
    }

    const vocabulary = await this.loadVocabulary();
    if (vocabulary.isErr()) {
      return err(vocabulary.error);
    }

    const fileName = path.basename(params.filePath);
    const outcome = this.parserChain.tryParse(createRawFile(fileName, bytes));
    const labels = outcome.status === 'parsed' ? distinctLabels(outcome.table.map((row) => row.band)) : [];

    return ok({
      bands: labels.map((label) => resolvePassband(label, vocabulary.value)),
      fileName,
      outcome,
    });
  }
}

function distinctLabels(bands: readonly string[]): string[] {
  return [...new Set(bands.map((band) => band.trim()))];
}
