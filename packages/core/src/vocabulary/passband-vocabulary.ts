import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from 'neverthrow';

import { ConfigurationError } from '../errors/index.js';
import { PassbandVocabularyFileSchema, type PassbandVocabularyFile } from '../schemas/reference-data.js';
import { readValidatedJsonFile } from '../utils/json-file.js';

export const DEFAULT_PASSBANDS_PATH = fileURLToPath(new URL('../../data/passbands.json', import.meta.url));

/**
 * Closed set of passbands output may carry, plus the alias table from free-text labels.
 * Built once at startup and never modified.
 */
export interface PassbandVocabulary {
  readonly passbands: ReadonlySet<string>;
  readonly aliases: ReadonlyMap<string, string>;
  /** Labels known to be non-photometric; dropped without being reported as unrecognized. */
  readonly excludedLabels: ReadonlySet<string>;
}

export function createPassbandVocabulary(input: PassbandVocabularyFile): Result<PassbandVocabulary, ConfigurationError> {
  const parsed = PassbandVocabularyFileSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return err(new ConfigurationError(`Invalid passband vocabulary: ${first?.message ?? 'unknown'}`));
  }

  const passbands = new Set(parsed.data.passbands);
  const danglingAliases = Object.entries(parsed.data.aliases).filter(([, target]) => !passbands.has(target));
  if (danglingAliases.length > 0) {
    const listed = danglingAliases.map(([label, target]) => `${label} -> ${target}`).join(', ');
    return err(new ConfigurationError(`Passband aliases point outside the vocabulary: ${listed}`));
  }

  return ok(
    Object.freeze({
      passbands,
      aliases: new Map(Object.entries(parsed.data.aliases)),
      excludedLabels: new Set(parsed.data.excludedLabels),
    })
  );
}

export async function loadPassbandVocabulary(
  filePath: string = DEFAULT_PASSBANDS_PATH
): Promise<Result<PassbandVocabulary, ConfigurationError>> {
  const file = await readValidatedJsonFile(filePath, PassbandVocabularyFileSchema);
  return file.andThen((data) => createPassbandVocabulary(data));
}
