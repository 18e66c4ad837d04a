import type { RawFile } from '@lcforge/core';
import { err, ok, type Result } from 'neverthrow';

import type { ParsedTable, PhotometryParser } from './parser.js';
import { splitLines } from './text-utils.js';

export const NOTES_AND_LIMITS_COLUMNS = [
  'time',
  'gregorian',
  'magnitude',
  'magnitudeError',
  'band',
  'reference',
  'notes',
] as const;

const FIELD_SEPARATOR = /\s{2,}/;
const MISSING_TOKENS = new Set(['null', 'nul']);

/**
 * Lines that carry an observation: no comments, no upper or lower limits.
 */
function observationLines(text: string): string[] {
  return splitLines(text).filter((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && !trimmed.startsWith('#') && !line.includes('<') && !line.includes('>');
  });
}

function splitFields(line: string): string[] {
  return line.trim().split(FIELD_SEPARATOR);
}

/**
 * Space-aligned tables with a descriptive header line, comment lines and limit rows.
 * Fields are separated by two or more spaces and mapped to seven fixed columns.
 */
export class NotesAndLimitsParser implements PhotometryParser {
  readonly name = 'notes-and-limits';

  matches(file: RawFile): boolean {
    const [header, firstRow] = observationLines(file.text);
    if (header === undefined || firstRow === undefined || header.includes('\t') || header.includes(',')) {
      return false;
    }
    return splitFields(firstRow).length === NOTES_AND_LIMITS_COLUMNS.length;
  }

  parse(file: RawFile): Result<ParsedTable, Error> {
    const [, ...dataLines] = observationLines(file.text);
    const rows: Record<string, string | undefined>[] = [];

    for (const [index, line] of dataLines.entries()) {
      const fields = splitFields(line);
      if (fields.length > NOTES_AND_LIMITS_COLUMNS.length) {
        return err(
          new Error(
            `${file.name}: row ${index + 1} has ${fields.length} fields, expected at most ${NOTES_AND_LIMITS_COLUMNS.length}`
          )
        );
      }

      const row: Record<string, string | undefined> = {};
      for (const [position, column] of NOTES_AND_LIMITS_COLUMNS.entries()) {
        const value = fields[position];
        row[column] = value !== undefined && MISSING_TOKENS.has(value) ? undefined : value;
      }
      rows.push(row);
    }

    return ok({ table: { columns: [...NOTES_AND_LIMITS_COLUMNS], rows }, aliases: {} });
  }
}
