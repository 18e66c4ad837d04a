import type { ColumnAliasMap, RawFile } from '@lcforge/core';
import { wrapError } from '@lcforge/core';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { isNumericToken } from '../sanitize/coerce.js';

import type { ParsedTable, PhotometryParser } from './parser.js';
import { firstNonEmptyLine } from './text-utils.js';

const REQUIRED_HEADER_TOKENS = ['Julian Date', 'Gregorian Day', 'Magnitude', 'Indmag and Band'] as const;

const BAND_COLUMN = 'Indmag and Band';
const ERROR_COLUMN = 'Uncertainty';
const DERIVED_ERROR_COLUMN = 'magnitudeError';

export const TAB_SEPARATED_ALIASES: ColumnAliasMap = {
  time: ['Julian Date'],
  magnitude: ['Magnitude'],
  magnitudeError: [ERROR_COLUMN],
  band: [BAND_COLUMN],
  reference: ['Reference Text', 'Reference'],
};

const TsvRecordsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Split an "Indmag and Band" value such as `B 0.05` into its band and magnitude error.
 * Values that are not exactly a label followed by a number are left whole.
 */
export function splitBandAndError(value: string): { band: string; magnitudeError?: string | undefined } {
  const tokens = value.trim().split(/\s+/);
  const [band, error] = tokens;
  if (tokens.length === 2 && band !== undefined && error !== undefined && isNumericToken(error)) {
    return { band, magnitudeError: error };
  }
  return { band: value };
}

/**
 * Tab-separated light-curve catalog exports with a fixed column set.
 */
export class TabSeparatedParser implements PhotometryParser {
  readonly name = 'tab-separated';

  matches(file: RawFile): boolean {
    const header = firstNonEmptyLine(file.text);
    if (header === undefined || !header.includes('\t')) {
      return false;
    }
    return REQUIRED_HEADER_TOKENS.every((token) => header.includes(token));
  }

  parse(file: RawFile): Result<ParsedTable, Error> {
    let header: string[] = [];
    let records: unknown;
    try {
      records = parseCsv(file.text, {
        bom: true,
        columns: (names: string[]) => {
          header = names.map((name) => name.trim());
          return header;
        },
        delimiter: '\t',
        quote: false,
        relax_column_count: true,
        skip_empty_lines: true,
      });
    } catch (error) {
      return wrapError(error, `Failed to parse ${file.name} as tab-separated text`);
    }

    const validated = TsvRecordsSchema.safeParse(records);
    if (!validated.success) {
      return err(new Error(`Unexpected record shape in ${file.name}: ${validated.error.message}`));
    }

    // An explicit uncertainty column takes precedence over one embedded in the band cell.
    if (header.includes(ERROR_COLUMN)) {
      return ok({ table: { columns: header, rows: validated.data }, aliases: TAB_SEPARATED_ALIASES });
    }

    const rows = validated.data.map((row) => {
      const cell = row[BAND_COLUMN];
      if (cell === undefined) return row;
      const { band, magnitudeError } = splitBandAndError(cell);
      return { ...row, [BAND_COLUMN]: band, [DERIVED_ERROR_COLUMN]: magnitudeError };
    });

    return ok({
      table: { columns: [...header, DERIVED_ERROR_COLUMN], rows },
      aliases: TAB_SEPARATED_ALIASES,
    });
  }
}
