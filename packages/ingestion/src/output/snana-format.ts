import { MISSING_VALUE_SENTINEL } from '@lcforge/core';

import type { LightCurveRecord } from './light-curve-writer.js';

export const SNANA_VARLIST = ['time', 'band', 'flux', 'fluxerr', 'mag', 'magerr', 'zp', 'zpsys'] as const;

function formatMeasurementError(value: number): string {
  return value === MISSING_VALUE_SENTINEL || !Number.isFinite(value)
    ? String(MISSING_VALUE_SENTINEL)
    : formatFloat(value);
}

/**
 * Shortest round-trip form, with a trailing ".0" on integral values so every column reads as a float.
 */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function snanaFileName(objectId: string): string {
  return `${objectId}.photometry.snana.dat`;
}

/**
 * Render a light curve in the SNANA text format: keyword header, VARLIST, one OBS line per row, END.
 */
export function formatSnanaLightCurve(record: LightCurveRecord): string {
  const { metadata, observations } = record;
  const filters = [...new Set(observations.map((observation) => observation.band))].sort();

  const lines = [
    `SURVEY: ${record.survey}`,
    `SNID: ${record.objectId}`,
    `RA: ${metadata.ra.toFixed(8)}`,
    `DEC: ${metadata.dec.toFixed(8)}`,
    `MWEBV: ${metadata.mwebv.toFixed(4)}`,
    `REDSHIFT_HELIO: ${metadata.redshift.toFixed(6)}`,
    `FILTERS: ${filters.join(' ')}`,
    '',
    `NOBS: ${observations.length}`,
    `NVAR: ${SNANA_VARLIST.length}`,
    `VARLIST: ${SNANA_VARLIST.join(' ')}`,
  ];

  for (const observation of observations) {
    const fields = [
      formatFloat(observation.time),
      observation.band,
      formatFloat(observation.flux),
      formatMeasurementError(observation.fluxError),
      formatFloat(observation.magnitude),
      formatMeasurementError(observation.magnitudeError ?? MISSING_VALUE_SENTINEL),
      formatFloat(observation.zeropoint),
      observation.zeropointSystem,
    ];
    lines.push(`OBS: ${fields.join(' ')}`);
  }

  lines.push('END:');
  return `${lines.join('\n')}\n`;
}
