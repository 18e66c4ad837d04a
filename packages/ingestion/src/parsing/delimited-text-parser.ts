import type { ColumnAliasMap, RawFile } from '@lcforge/core';
import { wrapError } from '@lcforge/core';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { resolveColumns } from '../sanitize/sanitizer.js';

import type { ParsedTable, PhotometryParser } from './parser.js';
import { firstNonEmptyLine, stripQuotes } from './text-utils.js';

export const DELIMITED_TEXT_ALIASES: ColumnAliasMap = {
  time: ['JD', 'Julian Date', 'time'],
  magnitude: ['Mag', 'Magnitude'],
  magnitudeError: ['Magerr', 'Mag Err', 'e_mag', 'Uncertainty'],
  band: ['Band', 'Filter'],
  reference: ['Ref', 'Reference'],
};

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

function headerCells(line: string): string[] {
  return line.split(',').map((cell) => stripQuotes(cell));
}

/**
 * Comma-separated tables with a header row naming at least a time and a magnitude column.
 */
export class DelimitedTextParser implements PhotometryParser {
  readonly name = 'delimited-text';

  matches(file: RawFile): boolean {
    const header = firstNonEmptyLine(file.text);
    if (header === undefined || !header.includes(',')) {
      return false;
    }
    const columns = resolveColumns(headerCells(header), DELIMITED_TEXT_ALIASES);
    return columns.time !== undefined && columns.magnitude !== undefined;
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
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      return wrapError(error, `Failed to parse ${file.name} as comma-separated text`);
    }

    const validated = CsvRecordsSchema.safeParse(records);
    if (!validated.success) {
      return err(new Error(`Unexpected record shape in ${file.name}: ${validated.error.message}`));
    }

    const bandColumn = resolveColumns(header, DELIMITED_TEXT_ALIASES).band;
    const rows =
      bandColumn === undefined
        ? validated.data
        : validated.data.map((row) => {
            const band = row[bandColumn];
            return band === undefined ? row : { ...row, [bandColumn]: stripQuotes(band) };
          });

    return ok({ table: { columns: header, rows }, aliases: DELIMITED_TEXT_ALIASES });
  }
}
