import { describe, expect, it } from 'vitest';

import type { LightCurveRecord } from '../light-curve-writer.js';
import { formatFloat, formatSnanaLightCurve, snanaFileName } from '../snana-format.js';

const SAMPLE_RECORD: LightCurveRecord = {
  metadata: { dec: 7.7016666667, mwebv: 0.021, ra: 188.5097083333, redshift: 0.0015 },
  objectId: 'SN1994D',
  observations: [
    {
      band: 'bessellv',
      flux: 125.5,
      fluxError: 11.25,
      magnitude: 10,
      magnitudeError: 0.1,
      reference: 'IAUC 5961',
      time: 2449432.5,
      zeropoint: 25,
      zeropointSystem: 'vega',
    },
    {
      band: 'bessellb',
      flux: 100.25,
      fluxError: -999,
      magnitude: 10.25,
      magnitudeError: undefined,
      reference: 'N/A',
      time: 2449433,
      zeropoint: 25,
      zeropointSystem: 'vega',
    },
  ],
  survey: 'VIRGO_PROJECT',
};

describe('formatFloat', () => {
  it('keeps a decimal point on integral values', () => {
    expect(formatFloat(25)).toBe('25.0');
    expect(formatFloat(2449432.5)).toBe('2449432.5');
  });
});

describe('formatSnanaLightCurve', () => {
  it('renders the header, variable list and one OBS line per observation', () => {
    expect(formatSnanaLightCurve(SAMPLE_RECORD)).toBe(
      [
        'SURVEY: VIRGO_PROJECT',
        'SNID: SN1994D',
        'RA: 188.50970833',
        'DEC: 7.70166667',
        'MWEBV: 0.0210',
        'REDSHIFT_HELIO: 0.001500',
        'FILTERS: bessellb bessellv',
        '',
        'NOBS: 2',
        'NVAR: 8',
        'VARLIST: time band flux fluxerr mag magerr zp zpsys',
        'OBS: 2449432.5 bessellv 125.5 11.25 10.0 0.1 25.0 vega',
        'OBS: 2449433.0 bessellb 100.25 -999 10.25 -999 25.0 vega',
        'END:',
        '',
      ].join('\n')
    );
  });

  it('writes a non-finite error as the missing-value sentinel', () => {
    const [observation] = SAMPLE_RECORD.observations;
    if (observation === undefined) throw new Error('sample has no observations');
    const record = { ...SAMPLE_RECORD, observations: [{ ...observation, magnitudeError: Infinity }] };

    expect(formatSnanaLightCurve(record).split('\n')[11]).toBe('OBS: 2449432.5 bessellv 125.5 11.25 10.0 -999 25.0 vega');
  });

  it('produces identical output for identical input', () => {
    expect(formatSnanaLightCurve(SAMPLE_RECORD)).toBe(formatSnanaLightCurve({ ...SAMPLE_RECORD }));
  });
});

describe('snanaFileName', () => {
  it('names files after the object', () => {
    expect(snanaFileName('SN2011fe')).toBe('SN2011fe.photometry.snana.dat');
  });
});
