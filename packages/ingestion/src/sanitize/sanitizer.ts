import {
  CANONICAL_FIELDS,
  DEFAULT_BAND,
  DEFAULT_REFERENCE,
  type CanonicalField,
  type CanonicalObservation,
  type CanonicalTable,
  type ColumnAliasMap,
  type LooseTable,
} from '@lcforge/core';

import { coerceLabel, coerceNumber } from './coerce.js';

/**
 * Find the source column for each canonical field. The canonical name itself is always a
 * candidate, ahead of the aliases; matching ignores case and surrounding whitespace.
 */
export function resolveColumns(
  columns: readonly string[],
  aliases: ColumnAliasMap
): Partial<Record<CanonicalField, string>> {
  const byKey = new Map<string, string>();
  for (const column of columns) {
    const key = column.trim().toLowerCase();
    if (!byKey.has(key)) byKey.set(key, column);
  }

  const resolved: Partial<Record<CanonicalField, string>> = {};
  for (const field of CANONICAL_FIELDS) {
    for (const candidate of [field, ...(aliases[field] ?? [])]) {
      const column = byKey.get(candidate.trim().toLowerCase());
      if (column !== undefined) {
        resolved[field] = column;
        break;
      }
    }
  }
  return resolved;
}

function finiteOrMissing(value: unknown): number | undefined {
  const number = coerceNumber(value);
  return number !== undefined && Number.isFinite(number) ? number : undefined;
}

/**
 * Turn a parser's loose table into canonical observations.
 *
 * Rows without a finite time and magnitude are dropped; a non-numeric or non-finite magnitude
 * error is missing, never zero. Band and reference fall back to "UNKNOWN" and "N/A". Returns
 * undefined when nothing survives or when the table has no time or magnitude column.
 */
export function sanitize(table: LooseTable, aliases: ColumnAliasMap = {}): CanonicalTable | undefined {
  const columns = resolveColumns(table.columns, aliases);
  const timeColumn = columns.time;
  const magnitudeColumn = columns.magnitude;
  if (timeColumn === undefined || magnitudeColumn === undefined) {
    return undefined;
  }

  const observations: CanonicalObservation[] = [];
  for (const row of table.rows) {
    const time = coerceNumber(row[timeColumn]);
    const magnitude = coerceNumber(row[magnitudeColumn]);
    if (time === undefined || magnitude === undefined || !Number.isFinite(time) || !Number.isFinite(magnitude)) {
      continue;
    }

    observations.push({
      time,
      magnitude,
      magnitudeError: columns.magnitudeError === undefined ? undefined : finiteOrMissing(row[columns.magnitudeError]),
      band: columns.band === undefined ? DEFAULT_BAND : coerceLabel(row[columns.band], DEFAULT_BAND),
      reference: columns.reference === undefined ? DEFAULT_REFERENCE : coerceLabel(row[columns.reference], DEFAULT_REFERENCE),
    });
  }

  return observations.length > 0 ? observations : undefined;
}
