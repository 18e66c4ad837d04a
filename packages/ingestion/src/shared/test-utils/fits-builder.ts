import { Buffer } from 'node:buffer';

const BLOCK = 2880;
const CARD = 80;

export type CardValue = string | number | boolean;
export type Card = readonly [keyword: string, value: CardValue];

function formatCard([keyword, value]: Card): string {
  let field: string;
  if (typeof value === 'string') {
    field = `'${value.replace(/'/g, "''").padEnd(8)}'`.padEnd(20);
  } else if (typeof value === 'boolean') {
    field = (value ? 'T' : 'F').padStart(20);
  } else {
    field = String(value).padStart(20);
  }
  return `${keyword.padEnd(8)}= ${field}`.padEnd(CARD);
}

function padTo(bytes: Buffer, fill: number): Buffer {
  const size = Math.ceil(bytes.length / BLOCK) * BLOCK;
  return Buffer.concat([bytes, Buffer.alloc(size - bytes.length, fill)]);
}

function headerBlock(cards: readonly Card[], withEnd = true): Buffer {
  const text = cards.map(formatCard).join('') + (withEnd ? 'END'.padEnd(CARD) : '');
  return padTo(Buffer.from(text, 'latin1'), 0x20);
}

const PRIMARY: readonly Card[] = [
  ['SIMPLE', true],
  ['BITPIX', 8],
  ['NAXIS', 0],
  ['EXTEND', true],
];

export type BinaryFormat = 'D' | 'E' | 'J' | 'I' | 'L' | `${number}A`;

export interface BinaryColumnSpec {
  name: string;
  format: BinaryFormat;
}

export type CellValue = string | number | boolean | null;

export interface FitsBuildOptions {
  /** Leave the END card out of the extension header. */
  omitEnd?: boolean;
  /** Extra cards appended to the extension header. */
  extraCards?: readonly Card[];
  /** Cards whose values replace the generated ones, keyed by keyword. */
  overrideCards?: readonly Card[];
}

function applyOverrides(cards: readonly Card[], overrides: readonly Card[] = []): Card[] {
  const replacements = new Map(overrides.map((card) => [card[0], card]));
  return cards.map((card) => replacements.get(card[0]) ?? card);
}

function binaryWidth(format: BinaryFormat): number {
  switch (format) {
    case 'D':
      return 8;
    case 'E':
    case 'J':
      return 4;
    case 'I':
      return 2;
    case 'L':
      return 1;
    default:
      return Number(format.slice(0, -1));
  }
}

function writeBinaryCell(view: DataView, row: Buffer, offset: number, format: BinaryFormat, value: CellValue): void {
  switch (format) {
    case 'D':
      view.setFloat64(offset, typeof value === 'number' ? value : Number.NaN, false);
      return;
    case 'E':
      view.setFloat32(offset, typeof value === 'number' ? value : Number.NaN, false);
      return;
    case 'J':
      view.setInt32(offset, typeof value === 'number' ? value : 0, false);
      return;
    case 'I':
      view.setInt16(offset, typeof value === 'number' ? value : 0, false);
      return;
    case 'L':
      view.setUint8(offset, value === true ? 0x54 : value === false ? 0x46 : 0);
      return;
    default:
      row.write(String(value ?? ''), offset, binaryWidth(format), 'latin1');
  }
}

/**
 * A primary HDU without data followed by one BINTABLE extension.
 */
export function buildBinaryTableFits(
  columns: readonly BinaryColumnSpec[],
  rows: readonly (readonly CellValue[])[],
  options: FitsBuildOptions = {}
): Uint8Array {
  const rowWidth = columns.reduce((sum, column) => sum + binaryWidth(column.format), 0);
  const cards: Card[] = [
    ['XTENSION', 'BINTABLE'],
    ['BITPIX', 8],
    ['NAXIS', 2],
    ['NAXIS1', rowWidth],
    ['NAXIS2', rows.length],
    ['PCOUNT', 0],
    ['GCOUNT', 1],
    ['TFIELDS', columns.length],
  ];
  columns.forEach((column, index) => {
    cards.push([`TTYPE${index + 1}`, column.name], [`TFORM${index + 1}`, column.format]);
  });
  cards.push(...(options.extraCards ?? []));

  const data = Buffer.alloc(rowWidth * rows.length);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  rows.forEach((row, rowIndex) => {
    let offset = rowIndex * rowWidth;
    columns.forEach((column, columnIndex) => {
      writeBinaryCell(view, data, offset, column.format, row[columnIndex] ?? null);
      offset += binaryWidth(column.format);
    });
  });

  return Uint8Array.from(
    Buffer.concat([
      headerBlock(PRIMARY),
      headerBlock(applyOverrides(cards, options.overrideCards), !options.omitEnd),
      padTo(data, 0),
    ])
  );
}

export interface AsciiColumnSpec {
  name: string;
  /** Fortran-style format such as `F10.3`, `I6`, `A8`. */
  format: string;
}

/**
 * A primary HDU followed by one ASCII TABLE extension; numbers are right-aligned, text left-aligned.
 */
export function buildAsciiTableFits(
  columns: readonly AsciiColumnSpec[],
  rows: readonly (readonly CellValue[])[],
  options: FitsBuildOptions = {}
): Uint8Array {
  const widths = columns.map((column) => Number(/\d+/.exec(column.format)?.[0] ?? '0'));
  const rowWidth = widths.reduce((sum, width) => sum + width, 0);
  const cards: Card[] = [
    ['XTENSION', 'TABLE'],
    ['BITPIX', 8],
    ['NAXIS', 2],
    ['NAXIS1', rowWidth],
    ['NAXIS2', rows.length],
    ['PCOUNT', 0],
    ['GCOUNT', 1],
    ['TFIELDS', columns.length],
  ];
  let start = 1;
  columns.forEach((column, index) => {
    cards.push(
      [`TTYPE${index + 1}`, column.name],
      [`TBCOL${index + 1}`, start],
      [`TFORM${index + 1}`, column.format]
    );
    start += widths[index] ?? 0;
  });
  cards.push(...(options.extraCards ?? []));

  const text = rows
    .map((row) =>
      columns
        .map((column, index) => {
          const width = widths[index] ?? 0;
          const value = String(row[index] ?? '');
          return column.format.startsWith('A') ? value.padEnd(width) : value.padStart(width);
        })
        .join('')
    )
    .join('');

  return Uint8Array.from(
    Buffer.concat([headerBlock(PRIMARY), headerBlock(cards, !options.omitEnd), padTo(Buffer.from(text, 'latin1'), 0x20)])
  );
}
