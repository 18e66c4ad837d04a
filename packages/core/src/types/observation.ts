/** Written for a missing magnitude error or flux error. */
export const MISSING_VALUE_SENTINEL = -999;

/** Instrumental zero point carried on every output row (not the one used for conversion). */
export const INSTRUMENTAL_ZEROPOINT = 25.0;

export const DEFAULT_BAND = 'UNKNOWN';
export const DEFAULT_REFERENCE = 'N/A';
export const DEFAULT_MAG_SYSTEM = 'Vega';

/**
 * One source file as read from the archive. Parsers only read it.
 */
export interface RawFile {
  readonly name: string;
  /** Lower-cased extension without the dot; a hint, never used for format detection. */
  readonly extension: string;
  readonly bytes: Uint8Array;
  /** UTF-8 decoding of `bytes` with the byte-order mark removed. */
  readonly text: string;
}

export type CanonicalField = 'time' | 'magnitude' | 'magnitudeError' | 'band' | 'reference';

export const CANONICAL_FIELDS: readonly CanonicalField[] = ['time', 'magnitude', 'magnitudeError', 'band', 'reference'];

/**
 * Source column names, per canonical field, renamed before coercion.
 * Matching is case-insensitive; the first alias present in the table wins.
 */
export type ColumnAliasMap = Partial<Record<CanonicalField, readonly string[]>>;

/**
 * Parser output before sanitization. Any cell may be missing or of the wrong type.
 */
export interface LooseTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, unknown>>[];
}

export interface CanonicalObservation {
  /** Julian date; always finite. */
  readonly time: number;
  /** Always finite. */
  readonly magnitude: number;
  readonly magnitudeError: number | undefined;
  readonly band: string;
  readonly reference: string;
}

export type CanonicalTable = readonly CanonicalObservation[];

export interface FluxObservation extends CanonicalObservation {
  /** Photons/s/cm² through the passband. */
  readonly flux: number;
  readonly fluxError: number;
  readonly zeropoint: number;
  /** Lower-cased magnitude system name used for the conversion. */
  readonly zeropointSystem: string;
}
