import { describe, expect, it } from 'vitest';

import { resolveColumns, sanitize } from '../sanitizer.js';

describe('resolveColumns', () => {
  it('matches aliases case-insensitively', () => {
    expect(resolveColumns(['jd', 'MAG'], { time: ['JD'], magnitude: ['Mag'] })).toEqual({ time: 'jd', magnitude: 'MAG' });
  });

  it('prefers a column already carrying the canonical name', () => {
    expect(resolveColumns(['JD', 'time'], { time: ['JD'] })).toEqual({ time: 'time' });
  });

  it('takes the first alias present', () => {
    expect(resolveColumns(['Filter', 'Band'], { band: ['Band', 'Filter'] })).toEqual({ band: 'Band' });
  });
});

describe('sanitize', () => {
  const aliases = { time: ['JD'], magnitude: ['Mag'], magnitudeError: ['Magerr'], band: ['Band'] };

  it('keeps rows with finite time and magnitude and fills defaults', () => {
    const table = {
      columns: ['JD', 'Mag', 'Magerr', 'Band'],
      rows: [
        { JD: '2450000.5', Mag: '12.3', Magerr: 'null', Band: 'B' },
        { JD: 'x', Mag: '12', Magerr: '0.1', Band: 'V' },
        { JD: '2450001', Mag: 'nan', Magerr: '0.1', Band: 'V' },
        { JD: '2450002', Mag: 'inf', Magerr: '0.1', Band: 'V' },
        { JD: '2450003', Mag: '13', Magerr: '0.2', Band: '' },
      ],
    };

    expect(sanitize(table, aliases)).toEqual([
      { time: 2450000.5, magnitude: 12.3, magnitudeError: undefined, band: 'B', reference: 'N/A' },
      { time: 2450003, magnitude: 13, magnitudeError: 0.2, band: 'UNKNOWN', reference: 'N/A' },
    ]);
  });

  it('treats an infinite or NaN magnitude error as missing', () => {
    const table = {
      columns: ['JD', 'Mag', 'Magerr', 'Band'],
      rows: [
        { JD: '2449432.5', Mag: '12.5', Magerr: 'inf', Band: 'B' },
        { JD: '2449433.5', Mag: '12.6', Magerr: Number.NaN, Band: 'B' },
      ],
    };

    expect(sanitize(table, aliases)?.map((row) => row.magnitudeError)).toEqual([undefined, undefined]);
  });

  it('defaults the band when the table has no band column', () => {
    const result = sanitize({ columns: ['time', 'magnitude'], rows: [{ time: 1, magnitude: 2 }] });

    expect(result).toEqual([{ time: 1, magnitude: 2, magnitudeError: undefined, band: 'UNKNOWN', reference: 'N/A' }]);
  });

  it('stringifies numeric band labels', () => {
    const result = sanitize({ columns: ['time', 'magnitude', 'band'], rows: [{ time: 1, magnitude: 2, band: 4 }] });

    expect(result?.[0]?.band).toBe('4');
  });

  it('returns undefined without a magnitude column', () => {
    expect(sanitize({ columns: ['JD', 'Band'], rows: [{ JD: '1', Band: 'B' }] }, aliases)).toBeUndefined();
  });

  it('returns undefined when no row survives', () => {
    expect(sanitize({ columns: ['JD', 'Mag'], rows: [{ JD: 'n/a', Mag: '12' }] }, aliases)).toBeUndefined();
  });
});
