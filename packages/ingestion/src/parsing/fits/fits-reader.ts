import type { LooseTable } from '@lcforge/core';
import { err, ok, type Result } from 'neverthrow';

import { coerceNumber } from '../../sanitize/coerce.js';

import {
  alignToBlock,
  decodeAscii,
  numberKeyword,
  readHeader,
  stringKeyword,
  type FitsHeader,
  type FitsValue,
} from './fits-header.js';

export interface FitsHdu {
  readonly header: FitsHeader;
  /** Data unit, shorter than declared when the file is truncated. */
  readonly data: Uint8Array;
}

export interface FitsReadOptions {
  /** Accept a last header without an END card. */
  ignoreMissingEnd?: boolean | undefined;
}

const FITS_SIGNATURE = 'SIMPLE  =';

export function hasFitsSignature(bytes: Uint8Array): boolean {
  return decodeAscii(bytes, 0, FITS_SIGNATURE.length) === FITS_SIGNATURE;
}

const VALID_BITPIX = new Set([8, 16, 32, 64, -32, -64]);

function countKeyword(header: FitsHeader, keyword: string, fallback: number): Result<number, Error> {
  const value = numberKeyword(header, keyword) ?? fallback;
  if (!Number.isSafeInteger(value) || value < 0) {
    return err(new Error(`${keyword} must be a non-negative integer, got ${value}`));
  }
  return ok(value);
}

function declaredDataSize(header: FitsHeader): Result<number, Error> {
  const naxis = countKeyword(header, 'NAXIS', 0);
  if (naxis.isErr()) return err(naxis.error);
  if (naxis.value === 0) return ok(0);

  let elements = 1;
  for (let axis = 1; axis <= naxis.value; axis++) {
    const length = countKeyword(header, `NAXIS${axis}`, 0);
    if (length.isErr()) return err(length.error);
    elements *= length.value;
  }

  const bitpix = numberKeyword(header, 'BITPIX') ?? 8;
  if (!VALID_BITPIX.has(bitpix)) {
    return err(new Error(`Unsupported BITPIX ${bitpix}`));
  }
  const pcount = countKeyword(header, 'PCOUNT', 0);
  if (pcount.isErr()) return err(pcount.error);
  const gcount = countKeyword(header, 'GCOUNT', 1);
  if (gcount.isErr()) return err(gcount.error);

  const size = (Math.abs(bitpix) / 8) * gcount.value * (pcount.value + elements);
  if (!Number.isSafeInteger(size)) {
    return err(new Error(`Declared data size ${size} is out of range`));
  }
  return ok(size);
}

/**
 * Split a FITS file into header-data units.
 */
export function readFitsHdus(bytes: Uint8Array, options: FitsReadOptions = {}): Result<FitsHdu[], Error> {
  if (!hasFitsSignature(bytes)) {
    return err(new Error('Not a FITS file: missing SIMPLE keyword'));
  }

  const hdus: FitsHdu[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    const { dataStart, header } = readHeader(bytes, offset);
    if (hdus.length > 0 && stringKeyword(header, 'XTENSION') === undefined) {
      break;
    }
    if (!header.hasEnd && !options.ignoreMissingEnd) {
      return err(new Error(`Header at byte ${offset} has no END card`));
    }

    const size = declaredDataSize(header);
    if (size.isErr()) {
      return err(new Error(`Header at byte ${offset}: ${size.error.message}`));
    }
    hdus.push({ header, data: bytes.subarray(dataStart, Math.min(dataStart + size.value, bytes.length)) });
    if (!header.hasEnd) break;

    const next = dataStart + alignToBlock(size.value);
    if (next <= offset) {
      return err(new Error(`Header at byte ${offset} does not advance through the file`));
    }
    offset = next;
  }

  return ok(hdus);
}

type BinaryType = 'L' | 'X' | 'B' | 'I' | 'J' | 'K' | 'A' | 'E' | 'D' | 'C' | 'M' | 'P' | 'Q';

const BINARY_TYPE_SIZES = {
  A: 1,
  B: 1,
  C: 8,
  D: 8,
  E: 4,
  I: 2,
  J: 4,
  K: 8,
  L: 1,
  M: 16,
  P: 8,
  Q: 16,
  X: 1,
} as const satisfies Record<BinaryType, number>;

function isBinaryType(value: string): value is BinaryType {
  return Object.hasOwn(BINARY_TYPE_SIZES, value);
}

interface ColumnScaling {
  readonly scale: number;
  readonly zero: number;
}

interface BinaryColumn extends ColumnScaling {
  readonly name: string;
  readonly type: BinaryType;
  readonly repeat: number;
  readonly offset: number;
  readonly nullValue: number | undefined;
}

type AsciiType = 'A' | 'I' | 'F' | 'E' | 'D';

function isAsciiType(value: string): value is AsciiType {
  return value === 'A' || value === 'I' || value === 'F' || value === 'E' || value === 'D';
}

interface AsciiColumn extends ColumnScaling {
  readonly name: string;
  readonly type: AsciiType;
  readonly start: number;
  readonly width: number;
  readonly nullValue: string | undefined;
}

function columnName(header: FitsHeader, index: number): string {
  return stringKeyword(header, `TTYPE${index}`) || `col${index}`;
}

function columnScaling(header: FitsHeader, index: number): ColumnScaling {
  return {
    scale: numberKeyword(header, `TSCAL${index}`) ?? 1,
    zero: numberKeyword(header, `TZERO${index}`) ?? 0,
  };
}

function applyScaling(value: number, column: ColumnScaling): number {
  return column.scale === 1 && column.zero === 0 ? value : value * column.scale + column.zero;
}

function tableShape(header: FitsHeader): Result<{ fields: number; rowCount: number; rowWidth: number }, Error> {
  const rowWidth = numberKeyword(header, 'NAXIS1');
  const rowCount = numberKeyword(header, 'NAXIS2');
  const fields = numberKeyword(header, 'TFIELDS');
  if (rowWidth === undefined || rowCount === undefined || fields === undefined) {
    return err(new Error('Table header is missing NAXIS1, NAXIS2 or TFIELDS'));
  }
  if (![rowWidth, rowCount, fields].every((value) => Number.isSafeInteger(value) && value >= 0)) {
    return err(new Error('NAXIS1, NAXIS2 and TFIELDS must be non-negative integers'));
  }
  return ok({ fields, rowCount, rowWidth });
}

function checkDataLength(data: Uint8Array, rowWidth: number, rowCount: number): Result<void, Error> {
  const expected = rowWidth * rowCount;
  if (data.length < expected) {
    return err(new Error(`Table data is truncated: expected ${expected} bytes, found ${data.length}`));
  }
  return ok(undefined);
}

function binaryColumns(header: FitsHeader, fields: number, rowWidth: number): Result<BinaryColumn[], Error> {
  const columns: BinaryColumn[] = [];
  let offset = 0;
  for (let index = 1; index <= fields; index++) {
    const format = stringKeyword(header, `TFORM${index}`) ?? '';
    const match = /^(\d*)([A-Z])/i.exec(format);
    const code = match?.[2]?.toUpperCase();
    if (match === null || code === undefined || !isBinaryType(code)) {
      return err(new Error(`Unsupported TFORM${index} '${format}'`));
    }

    const repeat = match[1] === undefined || match[1] === '' ? 1 : Number(match[1]);
    columns.push({
      ...columnScaling(header, index),
      name: columnName(header, index),
      nullValue: numberKeyword(header, `TNULL${index}`),
      offset,
      repeat,
      type: code,
    });
    offset += code === 'X' ? Math.ceil(repeat / 8) : repeat * BINARY_TYPE_SIZES[code];
  }

  if (offset > rowWidth) {
    return err(new Error(`Column formats need ${offset} bytes per row but NAXIS1 is ${rowWidth}`));
  }
  return ok(columns);
}

function readBinaryNumber(view: DataView, position: number, column: BinaryColumn): number | undefined {
  let raw: number;
  switch (column.type) {
    case 'B':
      raw = view.getUint8(position);
      break;
    case 'I':
      raw = view.getInt16(position, false);
      break;
    case 'J':
      raw = view.getInt32(position, false);
      break;
    case 'K':
      raw = Number(view.getBigInt64(position, false));
      break;
    case 'E':
      return applyScaling(view.getFloat32(position, false), column);
    case 'D':
      return applyScaling(view.getFloat64(position, false), column);
    default:
      return undefined;
  }
  return raw === column.nullValue ? undefined : applyScaling(raw, column);
}

function readBinaryCell(data: Uint8Array, view: DataView, rowStart: number, column: BinaryColumn): unknown {
  const position = rowStart + column.offset;
  if (column.repeat === 0) return undefined;

  switch (column.type) {
    case 'A':
      return decodeAscii(data, position, column.repeat).split('\0')[0]?.trimEnd();
    case 'L': {
      const flag = data[position];
      return flag === 0x54 ? true : flag === 0x46 ? false : undefined;
    }
    case 'B':
    case 'I':
    case 'J':
    case 'K':
    case 'E':
    case 'D': {
      if (column.repeat === 1) return readBinaryNumber(view, position, column);
      const size = BINARY_TYPE_SIZES[column.type];
      return Array.from({ length: column.repeat }, (_, element) =>
        readBinaryNumber(view, position + element * size, column)
      );
    }
    default:
      // Bit arrays, complex numbers and variable-length arrays are not read.
      return undefined;
  }
}

function readBinaryTable(hdu: FitsHdu): Result<LooseTable, Error> {
  return tableShape(hdu.header).andThen(({ fields, rowCount, rowWidth }) =>
    checkDataLength(hdu.data, rowWidth, rowCount)
      .andThen(() => binaryColumns(hdu.header, fields, rowWidth))
      .map((columns) => {
        const view = new DataView(hdu.data.buffer, hdu.data.byteOffset, hdu.data.byteLength);
        const rows: Record<string, unknown>[] = [];
        for (let row = 0; row < rowCount; row++) {
          const record: Record<string, unknown> = {};
          for (const column of columns) {
            record[column.name] = readBinaryCell(hdu.data, view, row * rowWidth, column);
          }
          rows.push(record);
        }
        return { columns: columns.map((column) => column.name), rows };
      })
  );
}

function asciiColumns(header: FitsHeader, fields: number, rowWidth: number): Result<AsciiColumn[], Error> {
  const columns: AsciiColumn[] = [];
  for (let index = 1; index <= fields; index++) {
    const format = stringKeyword(header, `TFORM${index}`) ?? '';
    const match = /^([AIFED])(\d+)/i.exec(format);
    const start = numberKeyword(header, `TBCOL${index}`);
    const code = match?.[1]?.toUpperCase();
    if (match === null || start === undefined || code === undefined || !isAsciiType(code)) {
      return err(new Error(`Unsupported ASCII column ${index}: TFORM '${format}'`));
    }

    const width = Number(match[2]);
    if (start < 1 || start - 1 + width > rowWidth) {
      return err(new Error(`ASCII column ${index} lies outside the ${rowWidth}-character row`));
    }

    const nullValue: FitsValue | undefined = header.keywords.get(`TNULL${index}`);
    columns.push({
      ...columnScaling(header, index),
      name: columnName(header, index),
      nullValue: nullValue === undefined ? undefined : String(nullValue).trim(),
      start: start - 1,
      type: code,
      width,
    });
  }
  return ok(columns);
}

function readAsciiCell(data: Uint8Array, rowStart: number, column: AsciiColumn): unknown {
  const text = decodeAscii(data, rowStart + column.start, column.width);
  if (column.type === 'A') return text.trimEnd();

  const trimmed = text.trim();
  if (trimmed === '' || trimmed === column.nullValue) return undefined;
  const value = coerceNumber(trimmed.replace(/[dD]/, 'E'));
  return value === undefined ? undefined : applyScaling(value, column);
}

function readAsciiTable(hdu: FitsHdu): Result<LooseTable, Error> {
  return tableShape(hdu.header).andThen(({ fields, rowCount, rowWidth }) =>
    checkDataLength(hdu.data, rowWidth, rowCount)
      .andThen(() => asciiColumns(hdu.header, fields, rowWidth))
      .map((columns) => {
        const rows: Record<string, unknown>[] = [];
        for (let row = 0; row < rowCount; row++) {
          const record: Record<string, unknown> = {};
          for (const column of columns) {
            record[column.name] = readAsciiCell(hdu.data, row * rowWidth, column);
          }
          rows.push(record);
        }
        return { columns: columns.map((column) => column.name), rows };
      })
  );
}

/**
 * Read a BINTABLE or ASCII TABLE extension into a loose table keyed by TTYPE names.
 */
export function readFitsTable(hdu: FitsHdu): Result<LooseTable, Error> {
  const extension = stringKeyword(hdu.header, 'XTENSION');
  switch (extension) {
    case 'BINTABLE':
      return readBinaryTable(hdu);
    case 'TABLE':
      return readAsciiTable(hdu);
    default:
      return err(new Error(`Extension type '${extension ?? 'none'}' is not a table`));
  }
}
