import type { ColumnAliasMap, LooseTable, RawFile } from '@lcforge/core';
import type { Result } from 'neverthrow';

export interface ParsedTable {
  readonly table: LooseTable;
  /** Source column names to rename before sanitization. */
  readonly aliases: ColumnAliasMap;
}

/**
 * One supported source layout. `matches` is a cheap structural check on the
 * file's contents; `parse` may still fail on a file that matched.
 */
export interface PhotometryParser {
  readonly name: string;
  matches(file: RawFile): boolean;
  parse(file: RawFile): Result<ParsedTable, Error>;
}
