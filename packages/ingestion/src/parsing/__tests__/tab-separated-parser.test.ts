import { createTextFile } from '@lcforge/core';
import { describe, expect, it } from 'vitest';

import { sanitize } from '../../sanitize/sanitizer.js';
import { splitBandAndError, TabSeparatedParser } from '../tab-separated-parser.js';

const HEADER = ['Julian Date', 'Gregorian Day', 'Magnitude', 'Indmag and Band', 'Reference Text'].join('\t');

function tsv(...rows: string[][]): string {
  return [HEADER, ...rows.map((row) => row.join('\t'))].join('\n') + '\n';
}

describe('splitBandAndError', () => {
  it('splits a label followed by a number', () => {
    expect(splitBandAndError('B 0.05')).toEqual({ band: 'B', magnitudeError: '0.05' });
  });

  it('leaves other values whole', () => {
    expect(splitBandAndError('B')).toEqual({ band: 'B' });
    expect(splitBandAndError('B V')).toEqual({ band: 'B V' });
    expect(splitBandAndError('pg 0.1 x')).toEqual({ band: 'pg 0.1 x' });
  });
});

describe('TabSeparatedParser', () => {
  const parser = new TabSeparatedParser();

  it('matches only headers with every required column', () => {
    expect(parser.matches(createTextFile('a.tsv', tsv()))).toBe(true);
    expect(parser.matches(createTextFile('a.tsv', 'Julian Date\tMagnitude\tIndmag and Band\n'))).toBe(false);
    expect(parser.matches(createTextFile('a.csv', 'Julian Date,Gregorian Day,Magnitude,Indmag and Band\n'))).toBe(false);
  });

  it('splits embedded magnitude errors out of the band column', () => {
    const text = tsv(
      ['2449432.5', '1994-03-20', '12.3', 'B 0.05', 'AAVSO'],
      ['2449433.5', '1994-03-21', '12.6', 'V', 'AAVSO']
    );

    const { aliases, table } = parser.parse(createTextFile('a.tsv', text))._unsafeUnwrap();

    expect(table.columns).toContain('magnitudeError');
    expect(sanitize(table, aliases)).toEqual([
      { time: 2449432.5, magnitude: 12.3, magnitudeError: 0.05, band: 'B', reference: 'AAVSO' },
      { time: 2449433.5, magnitude: 12.6, magnitudeError: undefined, band: 'V', reference: 'AAVSO' },
    ]);
  });

  it('uses an explicit Uncertainty column when present', () => {
    const header = `${HEADER}\tUncertainty`;
    const text = `${header}\n2449432.5\t1994-03-20\t12.3\tB\tAAVSO\t0.07\n`;

    const { aliases, table } = parser.parse(createTextFile('a.tsv', text))._unsafeUnwrap();

    expect(table.columns).not.toContain('magnitudeError');
    expect(sanitize(table, aliases)).toEqual([
      { time: 2449432.5, magnitude: 12.3, magnitudeError: 0.07, band: 'B', reference: 'AAVSO' },
    ]);
  });
});
