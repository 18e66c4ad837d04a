import type { PassbandVocabulary } from '@lcforge/core';
import { resolvePassband, type PassbandResolution } from '@lcforge/ingestion';

import { describeResolution } from '../inspect/inspect-utils.js';

export interface ResolveBandResult {
  resolutions: PassbandResolution[];
  unrecognized: number;
}

/**
 * Labels are trimmed first, the same way the normalizer trims file labels.
 */
export function resolveBandLabels(labels: readonly string[], vocabulary: PassbandVocabulary): ResolveBandResult {
  const resolutions = labels.map((label) => resolvePassband(label.trim(), vocabulary));
  return {
    resolutions,
    unrecognized: resolutions.filter((resolution) => resolution.kind === 'unrecognized').length,
  };
}

export function formatResolveBandResult(result: ResolveBandResult): string[] {
  return result.resolutions.map(describeResolution);
}
