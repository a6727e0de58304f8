import { describe, it, expect } from 'vitest';
import {
  colIndexToLetter,
  letterToColIndex,
  tryParseCellRef,
  buildCellRef,
  cellKey,
} from '../cell-utils';

describe('colIndexToLetter', () => {
  it('converts single-letter columns', () => {
    expect(colIndexToLetter(1)).toBe('A');
    expect(colIndexToLetter(26)).toBe('Z');
  });

  it('converts double-letter columns', () => {
    expect(colIndexToLetter(27)).toBe('AA');
    expect(colIndexToLetter(28)).toBe('AB');
    expect(colIndexToLetter(52)).toBe('AZ');
    expect(colIndexToLetter(53)).toBe('BA');
    expect(colIndexToLetter(702)).toBe('ZZ');
  });

  it('converts triple-letter columns', () => {
    expect(colIndexToLetter(703)).toBe('AAA');
  });
});

describe('letterToColIndex', () => {
  it('converts single letters', () => {
    expect(letterToColIndex('A')).toBe(1);
    expect(letterToColIndex('Z')).toBe(26);
  });

  it('converts double letters', () => {
    expect(letterToColIndex('AA')).toBe(27);
    expect(letterToColIndex('ZZ')).toBe(702);
  });

  it('inverts colIndexToLetter', () => {
    for (let i = 1; i <= 100; i++) {
      expect(letterToColIndex(colIndexToLetter(i))).toBe(i);
    }
  });
});

describe('tryParseCellRef', () => {
  it('parses simple and absolute refs', () => {
    expect(tryParseCellRef('A1')).toEqual({ col: 1, row: 1 });
    expect(tryParseCellRef('Z100')).toEqual({ col: 26, row: 100 });
    expect(tryParseCellRef('$C$7')).toEqual({ col: 3, row: 7 });
  });

  it('rejects malformed refs', () => {
    expect(tryParseCellRef('')).toBeNull();
    expect(tryParseCellRef('1A')).toBeNull();
    expect(tryParseCellRef('a1')).toBeNull();
    expect(tryParseCellRef('A0')).toBeNull();
  });

  it('returns null instead of throwing', () => {
    expect(tryParseCellRef('total')).toBeNull();
    expect(tryParseCellRef('AA10')).toEqual({ col: 27, row: 10 });
  });
});

describe('buildCellRef', () => {
  it('builds refs from indices', () => {
    expect(buildCellRef(1, 1)).toBe('A1');
    expect(buildCellRef(2, 2)).toBe('B2');
    expect(buildCellRef(27, 1)).toBe('AA1');
  });
});

describe('cellKey', () => {
  it('keys by row then column', () => {
    expect(cellKey(3, 12)).toBe('3:12');
    expect(cellKey(12, 3)).not.toBe(cellKey(3, 12));
  });
});
