import { coerceNumber } from '../../sanitize/coerce.js';

export const FITS_BLOCK_SIZE = 2880;
export const FITS_CARD_SIZE = 80;

export type FitsValue = string | number | boolean;

export interface FitsHeader {
  readonly keywords: ReadonlyMap<string, FitsValue>;
  /** False when the header ran into data or end of file before its END card. */
  readonly hasEnd: boolean;
}

export function alignToBlock(length: number): number {
  return Math.ceil(length / FITS_BLOCK_SIZE) * FITS_BLOCK_SIZE;
}

export function decodeAscii(bytes: Uint8Array, start: number, length: number): string {
  const end = Math.min(start + length, bytes.length);
  return Buffer.from(bytes.buffer, bytes.byteOffset + start, Math.max(0, end - start)).toString('latin1');
}

function isTextBlock(bytes: Uint8Array, start: number): boolean {
  const end = Math.min(start + FITS_BLOCK_SIZE, bytes.length);
  for (let position = start; position < end; position++) {
    const byte = bytes[position];
    if (byte === undefined || byte < 0x20 || byte > 0x7e) return false;
  }
  return true;
}

/**
 * Value field of a keyword card (columns 11-80): quoted strings with doubled quotes,
 * logical T/F, or a number (Fortran `D` exponents accepted). Comments after `/` are dropped.
 */
export function parseCardValue(field: string): FitsValue | undefined {
  const text = field.trimStart();
  if (text.startsWith("'")) {
    let value = '';
    let index = 1;
    while (index < text.length) {
      const char = text.charAt(index);
      if (char === "'") {
        if (text.charAt(index + 1) !== "'") break;
        index++;
      }
      value += char;
      index++;
    }
    return value.trimEnd();
  }

  const slash = text.indexOf('/');
  const token = (slash >= 0 ? text.slice(0, slash) : text).trim();
  if (token === '') return undefined;
  if (token === 'T') return true;
  if (token === 'F') return false;
  return coerceNumber(token.replace(/[dD]/, 'E')) ?? token;
}

/**
 * Read one header starting at `start`. Without an END card the header stops at the first
 * block that is not printable text, or at end of file.
 */
export function readHeader(bytes: Uint8Array, start: number): { dataStart: number; header: FitsHeader } {
  const keywords = new Map<string, FitsValue>();

  for (let block = start; block < bytes.length; block += FITS_BLOCK_SIZE) {
    if (block > start && !isTextBlock(bytes, block)) {
      return { dataStart: block, header: { keywords, hasEnd: false } };
    }

    for (let card = block; card < block + FITS_BLOCK_SIZE && card + FITS_CARD_SIZE <= bytes.length; card += FITS_CARD_SIZE) {
      const text = decodeAscii(bytes, card, FITS_CARD_SIZE);
      const keyword = text.slice(0, 8).trim();
      if (keyword === 'END') {
        return { dataStart: block + FITS_BLOCK_SIZE, header: { keywords, hasEnd: true } };
      }
      if (keyword === '' || text.slice(8, 10) !== '= ' || keywords.has(keyword)) continue;

      const value = parseCardValue(text.slice(10));
      if (value !== undefined) keywords.set(keyword, value);
    }
  }

  return { dataStart: bytes.length, header: { keywords, hasEnd: false } };
}

export function numberKeyword(header: FitsHeader, keyword: string): number | undefined {
  const value = header.keywords.get(keyword);
  return typeof value === 'number' ? value : undefined;
}

export function stringKeyword(header: FitsHeader, keyword: string): string | undefined {
  const value = header.keywords.get(keyword);
  return typeof value === 'string' ? value.trim() : undefined;
}
