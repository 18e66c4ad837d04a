import type { CanonicalObservation, CanonicalTable, PassbandVocabulary } from '@lcforge/core';

export type PassbandResolution =
  | { readonly kind: 'direct'; readonly label: string; readonly passband: string }
  | { readonly kind: 'alias'; readonly label: string; readonly passband: string }
  | { readonly kind: 'excluded'; readonly label: string }
  | { readonly kind: 'unrecognized'; readonly label: string };

/**
 * Resolve one band label against the vocabulary: excluded labels first, then the alias table,
 * then the vocabulary itself. An alias pointing outside the vocabulary counts as unrecognized.
 */
export function resolvePassband(label: string, vocabulary: PassbandVocabulary): PassbandResolution {
  if (vocabulary.excludedLabels.has(label)) {
    return { kind: 'excluded', label };
  }

  const alias = vocabulary.aliases.get(label);
  if (alias !== undefined) {
    return vocabulary.passbands.has(alias) ? { kind: 'alias', label, passband: alias } : { kind: 'unrecognized', label };
  }

  return vocabulary.passbands.has(label) ? { kind: 'direct', label, passband: label } : { kind: 'unrecognized', label };
}

export interface NormalizationDiagnostics {
  /** Distinct labels, in first-seen order, that reached the alias step. */
  readonly labelsBeforeMapping: readonly string[];
  /** Labels from `labelsBeforeMapping` with no alias entry. */
  readonly labelsWithoutAlias: readonly string[];
  readonly excludedLabels: readonly string[];
  readonly unrecognizedLabels: readonly string[];
  readonly droppedCompositeRows: number;
  readonly droppedDuplicateRows: number;
  readonly droppedExcludedRows: number;
  readonly droppedUnrecognizedRows: number;
}

export interface NormalizationResult {
  readonly observations: CanonicalObservation[];
  readonly diagnostics: NormalizationDiagnostics;
}

/**
 * Merge an object's parsed tables and map every band onto the passband vocabulary.
 *
 * Steps, in order: concatenate in file order, trim labels, drop labels containing "(",
 * drop repeated (time, magnitude) pairs keeping the first, apply aliases, drop anything
 * outside the vocabulary.
 */
export function normalizePassbands(tables: readonly CanonicalTable[], vocabulary: PassbandVocabulary): NormalizationResult {
  let droppedCompositeRows = 0;
  let droppedDuplicateRows = 0;
  let droppedExcludedRows = 0;
  let droppedUnrecognizedRows = 0;

  const seen = new Set<string>();
  const candidates: CanonicalObservation[] = [];
  for (const observation of tables.flat()) {
    const band = observation.band.trim();
    if (band.includes('(')) {
      droppedCompositeRows++;
      continue;
    }

    const key = `${observation.time}|${observation.magnitude}`;
    if (seen.has(key)) {
      droppedDuplicateRows++;
      continue;
    }
    seen.add(key);
    candidates.push({ ...observation, band });
  }

  const labelsBeforeMapping = [...new Set(candidates.map((observation) => observation.band))];
  const excludedLabels = new Set<string>();
  const unrecognizedLabels = new Set<string>();
  const observations: CanonicalObservation[] = [];

  for (const observation of candidates) {
    const resolution = resolvePassband(observation.band, vocabulary);
    switch (resolution.kind) {
      case 'direct':
      case 'alias':
        observations.push({ ...observation, band: resolution.passband });
        break;
      case 'excluded':
        excludedLabels.add(resolution.label);
        droppedExcludedRows++;
        break;
      case 'unrecognized':
        unrecognizedLabels.add(resolution.label);
        droppedUnrecognizedRows++;
        break;
    }
  }

  return {
    diagnostics: {
      droppedCompositeRows,
      droppedDuplicateRows,
      droppedExcludedRows,
      droppedUnrecognizedRows,
      excludedLabels: [...excludedLabels],
      labelsBeforeMapping,
      labelsWithoutAlias: labelsBeforeMapping.filter((label) => !vocabulary.aliases.has(label)),
      unrecognizedLabels: [...unrecognizedLabels],
    },
    observations,
  };
}
