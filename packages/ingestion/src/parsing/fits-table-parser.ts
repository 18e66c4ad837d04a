import type { ColumnAliasMap, RawFile } from '@lcforge/core';
import { err, ok, type Result } from 'neverthrow';

import { hasFitsSignature, readFitsHdus, readFitsTable } from './fits/fits-reader.js';
import type { ParsedTable, PhotometryParser } from './parser.js';

const BAND_COLUMN = 'band';

export const FITS_TABLE_ALIASES: ColumnAliasMap = {
  time: ['JD'],
  magnitude: ['m'],
  magnitudeError: ['e_m', 'e_mag'],
  reference: ['ref'],
};

/**
 * Light-curve tables stored in the first extension of a FITS file. Rows whose band
 * contains "(" are composite or annotated labels and are left out.
 */
export class FitsTableParser implements PhotometryParser {
  readonly name = 'fits-table';

  matches(file: RawFile): boolean {
    return hasFitsSignature(file.bytes);
  }

  parse(file: RawFile): Result<ParsedTable, Error> {
    return readFitsHdus(file.bytes, { ignoreMissingEnd: true })
      .andThen((hdus) => {
        const extension = hdus[1];
        return extension === undefined ? err(new Error(`${file.name} has no table extension`)) : readFitsTable(extension);
      })
      .andThen((table) => {
        if (!table.columns.includes(BAND_COLUMN)) {
          return err(new Error(`${file.name} has no '${BAND_COLUMN}' column`));
        }
        const rows = table.rows.filter((row) => {
          const band = row[BAND_COLUMN];
          return !(typeof band === 'string' && band.includes('('));
        });
        return ok({ table: { columns: table.columns, rows }, aliases: FITS_TABLE_ALIASES });
      });
  }
}
