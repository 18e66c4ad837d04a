import type { CanonicalObservation, PassbandVocabulary } from '@lcforge/core';
import { describe, expect, it } from 'vitest';

import { testVocabulary } from '../../shared/test-utils/fakes.js';
import { normalizePassbands, resolvePassband } from '../passband-normalizer.js';

function observation(time: number, magnitude: number, band: string): CanonicalObservation {
  return { band, magnitude, magnitudeError: 0.1, reference: 'N/A', time };
}

describe('resolvePassband', () => {
  const vocabulary = testVocabulary();

  it('classifies labels', () => {
    expect(resolvePassband('B', vocabulary)).toEqual({ kind: 'alias', label: 'B', passband: 'bessellb' });
    expect(resolvePassband('bessellv', vocabulary)).toEqual({ kind: 'direct', label: 'bessellv', passband: 'bessellv' });
    expect(resolvePassband('unfiltered', vocabulary)).toEqual({ kind: 'excluded', label: 'unfiltered' });
    expect(resolvePassband('b', vocabulary)).toEqual({ kind: 'unrecognized', label: 'b' });
  });

  it('treats an alias that leaves the vocabulary as unrecognized', () => {
    const loose: PassbandVocabulary = {
      aliases: new Map([['y', 'z']]),
      excludedLabels: new Set(),
      passbands: new Set(['x']),
    };

    expect(resolvePassband('y', loose)).toEqual({ kind: 'unrecognized', label: 'y' });
  });
});

describe('normalizePassbands', () => {
  const vocabulary = testVocabulary();

  it('merges tables, deduplicates and maps bands onto the vocabulary', () => {
    const first = [observation(1, 10, 'B'), observation(2, 11, ' V '), observation(3, 12, 'B-V (colour)')];
    const second = [
      observation(1, 10, 'R'),
      observation(4, 13, 'unfiltered'),
      observation(5, 14, 'weird'),
      observation(6, 15, 'bessellb'),
    ];

    const { diagnostics, observations } = normalizePassbands([first, second], vocabulary);

    expect(observations.map((row) => [row.time, row.band])).toEqual([
      [1, 'bessellb'],
      [2, 'bessellv'],
      [6, 'bessellb'],
    ]);
    expect(diagnostics).toEqual({
      droppedCompositeRows: 1,
      droppedDuplicateRows: 1,
      droppedExcludedRows: 1,
      droppedUnrecognizedRows: 1,
      excludedLabels: ['unfiltered'],
      labelsBeforeMapping: ['B', 'V', 'unfiltered', 'weird', 'bessellb'],
      labelsWithoutAlias: ['unfiltered', 'weird', 'bessellb'],
      unrecognizedLabels: ['weird'],
    });
  });

  it('drops composite labels before deduplicating', () => {
    const { observations } = normalizePassbands([[observation(1, 10, 'B (x)'), observation(1, 10, 'V')]], vocabulary);

    expect(observations.map((row) => row.band)).toEqual(['bessellv']);
  });

  it('keeps rows that share a time but differ in magnitude', () => {
    const { observations } = normalizePassbands([[observation(1, 10, 'B'), observation(1, 10.5, 'B')]], vocabulary);

    expect(observations).toHaveLength(2);
  });

  it('returns nothing when no label resolves', () => {
    const { diagnostics, observations } = normalizePassbands([[observation(1, 10, 'Kp')]], vocabulary);

    expect(observations).toEqual([]);
    expect(diagnostics.unrecognizedLabels).toEqual(['Kp']);
  });
});
