import type { PassbandResolution } from '@lcforge/ingestion';

import type { InspectResult } from './inspect-handler.js';

export function describeResolution(resolution: PassbandResolution): string {
  switch (resolution.kind) {
    case 'direct':
      return `${resolution.label} (in vocabulary)`;
    case 'alias':
      return `${resolution.label} → ${resolution.passband}`;
    case 'excluded':
      return `${resolution.label} (excluded)`;
    case 'unrecognized':
      return `${resolution.label} (unrecognized)`;
  }
}

export function formatInspectResult(result: InspectResult): string[] {
  const { outcome } = result;
  const lines = [`File: ${result.fileName}`];

  for (const attempt of outcome.attempts) {
    lines.push(`  ${attempt.parser}: ${attempt.status}${attempt.reason ? ` (${attempt.reason})` : ''}`);
  }

  if (outcome.status === 'unparsable') {
    lines.push('No parser could read this file');
    return lines;
  }

  lines.push(`Parsed by ${outcome.parser}: ${outcome.table.length} rows`);
  lines.push('Bands:');
  for (const band of result.bands) {
    lines.push(`  ${describeResolution(band)}`);
  }
  return lines;
}
