import { createPassbandVocabulary, loadPassbandVocabulary } from '@lcforge/core';
import { describe, expect, it } from 'vitest';

import { formatResolveBandResult, resolveBandLabels } from '../resolve-band-utils.js';

describe('resolveBandLabels', () => {
  const vocabulary = createPassbandVocabulary({
    aliases: { B: 'bessellb', pg: 'standard::b' },
    excludedLabels: ['unfiltered'],
    passbands: ['bessellb', 'standard::b'],
  })._unsafeUnwrap();

  it('resolves trimmed labels and counts the unrecognized ones', () => {
    const result = resolveBandLabels([' B ', 'standard::b', 'unfiltered', 'K'], vocabulary);

    expect(result).toEqual({
      resolutions: [
        { kind: 'alias', label: 'B', passband: 'bessellb' },
        { kind: 'direct', label: 'standard::b', passband: 'standard::b' },
        { kind: 'excluded', label: 'unfiltered' },
        { kind: 'unrecognized', label: 'K' },
      ],
      unrecognized: 1,
    });
    expect(formatResolveBandResult(result)).toEqual([
      'B → bessellb',
      'standard::b (in vocabulary)',
      'unfiltered (excluded)',
      'K (unrecognized)',
    ]);
  });

  it('maps historical labels with the bundled vocabulary', async () => {
    const bundled = (await loadPassbandVocabulary())._unsafeUnwrap();

    const result = resolveBandLabels(['pg', "'blue'", 'UNKNOWN', 'sdss::g'], bundled);

    expect(result.resolutions).toEqual([
      { kind: 'alias', label: 'pg', passband: 'standard::b' },
      { kind: 'alias', label: "'blue'", passband: 'bessellb' },
      { kind: 'alias', label: 'UNKNOWN', passband: 'standard::u' },
      { kind: 'direct', label: 'sdss::g', passband: 'sdss::g' },
    ]);
    expect(result.unrecognized).toBe(0);
  });

  it('excludes unfiltered and visual labels with the bundled vocabulary', async () => {
    const bundled = (await loadPassbandVocabulary())._unsafeUnwrap();

    const result = resolveBandLabels(['unfiltered', 'Clear', 'vis'], bundled);

    expect(result.resolutions).toEqual([
      { kind: 'excluded', label: 'unfiltered' },
      { kind: 'excluded', label: 'Clear' },
      { kind: 'excluded', label: 'vis' },
    ]);
    expect(result.unrecognized).toBe(0);
  });
});
