import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from 'neverthrow';

import { ConfigurationError, ZeroPointNotFoundError } from '../errors/index.js';
import { ZeroPointFileSchema, type ZeroPointFile } from '../schemas/reference-data.js';
import { readValidatedJsonFile } from '../utils/json-file.js';

import type { PassbandVocabulary } from './passband-vocabulary.js';

export const DEFAULT_ZERO_POINTS_PATH = fileURLToPath(new URL('../../data/zeropoints.json', import.meta.url));

/**
 * Photon flux at magnitude zero, keyed by lower-cased magnitude system, then passband.
 */
export interface ZeroPointTable {
  readonly systems: ReadonlyMap<string, ReadonlyMap<string, number>>;
}

export function createZeroPointTable(input: ZeroPointFile): Result<ZeroPointTable, ConfigurationError> {
  const parsed = ZeroPointFileSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return err(
      new ConfigurationError(`Invalid zero-point table at ${first?.path.join('.') ?? ''}: ${first?.message ?? 'unknown'}`)
    );
  }

  const systems = new Map<string, ReadonlyMap<string, number>>();
  for (const [system, bands] of Object.entries(parsed.data.systems)) {
    systems.set(system.toLowerCase(), new Map(Object.entries(bands)));
  }
  return ok(Object.freeze({ systems }));
}

export async function loadZeroPointTable(
  filePath: string = DEFAULT_ZERO_POINTS_PATH
): Promise<Result<ZeroPointTable, ConfigurationError>> {
  const file = await readValidatedJsonFile(filePath, ZeroPointFileSchema);
  return file.andThen((data) => createZeroPointTable(data));
}

export function getZeroPointFlux(
  table: ZeroPointTable,
  magSystem: string,
  band: string
): Result<number, ZeroPointNotFoundError> {
  const flux = table.systems.get(magSystem.toLowerCase())?.get(band);
  if (flux === undefined) {
    return err(new ZeroPointNotFoundError(magSystem, band));
  }
  return ok(flux);
}

export interface ZeroPointCoverage {
  readonly magSystem: string;
  /** Vocabulary passbands this system cannot convert, sorted. */
  readonly bandsWithoutZeroPoint: readonly string[];
}

/**
 * Compares each magnitude system in use against the vocabulary.
 * A system the table does not know at all is a configuration error; partial coverage is reported.
 */
export function checkZeroPointCoverage(
  table: ZeroPointTable,
  vocabulary: PassbandVocabulary,
  magSystems: Iterable<string>
): Result<ZeroPointCoverage[], ConfigurationError> {
  const coverage: ZeroPointCoverage[] = [];
  const seen = new Set<string>();

  for (const magSystem of magSystems) {
    const key = magSystem.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    const bands = table.systems.get(key);
    if (bands === undefined) {
      const known = [...table.systems.keys()].join(', ');
      return err(new ConfigurationError(`Magnitude system '${magSystem}' has no zero points (known: ${known})`));
    }

    coverage.push({
      bandsWithoutZeroPoint: [...vocabulary.passbands].filter((band) => !bands.has(band)).sort(),
      magSystem,
    });
  }

  return ok(coverage);
}
