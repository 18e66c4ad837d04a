import { describe, expect, it } from 'vitest';

import { alignToBlock, parseCardValue } from '../fits-header.js';

describe('parseCardValue', () => {
  it('reads quoted strings and drops trailing blanks', () => {
    expect(parseCardValue("'BINTABLE'           / binary table")).toBe('BINTABLE');
    expect(parseCardValue("'B       '")).toBe('B');
  });

  it('unescapes doubled quotes', () => {
    expect(parseCardValue("'O''HARA '")).toBe("O'HARA");
  });

  it('reads logicals and numbers, ignoring comments', () => {
    expect(parseCardValue('                   T')).toBe(true);
    expect(parseCardValue('                   F / flag')).toBe(false);
    expect(parseCardValue('                  42 / rows')).toBe(42);
    expect(parseCardValue('             2.5D+01')).toBe(25);
  });

  it('returns undefined for an empty value', () => {
    expect(parseCardValue('          / only a comment')).toBeUndefined();
  });
});

describe('alignToBlock', () => {
  it('rounds up to whole 2880-byte blocks', () => {
    expect(alignToBlock(0)).toBe(0);
    expect(alignToBlock(1)).toBe(2880);
    expect(alignToBlock(2880)).toBe(2880);
    expect(alignToBlock(2881)).toBe(5760);
  });
});
