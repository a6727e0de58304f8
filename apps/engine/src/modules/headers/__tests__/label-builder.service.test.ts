import { describe, it, expect } from 'vitest';
import type { HeaderInfo } from '@sheet-tables/shared';
import { LabelBuilderService } from '../label-builder.service';
import { gridFromRows } from '../../../__tests__/grid-fixtures';

const labels = new LabelBuilderService();

const frozenGrid = gridFromRows({
  1: ['2023', '2023', '2023'],
  2: ['Jan', 'Feb', 'Mar'],
  3: [10, 20, 30],
  4: [40, 50, 60],
});

const frozenHeaders: HeaderInfo = {
  headerRows: [1, 2],
  headerColumns: [1],
  dataStartRow: 3,
  dataStartCol: 2,
};

describe('LabelBuilderService verbose labels', () => {
  it('puts the most granular header row first', () => {
    expect(labels.columnLabel(frozenGrid, 2, frozenHeaders)).toBe('Feb 2023');
  });

  it('repeats the frozen header path on every data row', () => {
    const frozen = { frozenRows: 2, frozenCols: 0 };
    expect(labels.rowLabel(frozenGrid, 3, frozenHeaders, frozen)).toBe('Jan 2023');
    expect(labels.rowLabel(frozenGrid, 4, frozenHeaders, frozen)).toBe('Jan 2023');
  });

  it('reads the header column on the row itself without frozen rows', () => {
    expect(labels.rowLabel(frozenGrid, 3, frozenHeaders)).toBe('10');
  });

  it('joins several header columns with a pipe', () => {
    const grid = gridFromRows({
      1: ['Region', 'City', 'Sales'],
      2: ['North', 'Oslo', 5],
    });
    const headers: HeaderInfo = { headerRows: [1], headerColumns: [1, 2], dataStartRow: 2, dataStartCol: 3 };
    expect(labels.rowLabel(grid, 2, headers)).toBe('North | Oslo');
  });

  it('renders missing header values as "unlabeled"', () => {
    const grid = gridFromRows({
      1: ['Name', null, 'Score'],
      2: [null, 'x', 3],
    });
    const headers: HeaderInfo = { headerRows: [1], headerColumns: [1], dataStartRow: 2, dataStartCol: 2 };
    expect(labels.columnLabel(grid, 2, headers)).toBe('unlabeled');
    expect(labels.rowLabel(grid, 2, headers)).toBe('unlabeled');
  });
});

describe('LabelBuilderService header paths', () => {
  it('lists column header values top to bottom', () => {
    expect(labels.columnPath(frozenGrid, 3, frozenHeaders)).toEqual(['2023', 'Mar']);
  });

  it('lists row header values left to right, skipping blanks', () => {
    const headers: HeaderInfo = { ...frozenHeaders, headerColumns: [1, 2] };
    expect(labels.rowPath(frozenGrid, 4, headers)).toEqual(['40', '50']);
    expect(labels.rowPath(gridFromRows({ 1: ['', 'x'] }), 1, headers)).toEqual(['x']);
  });
});

describe('LabelBuilderService compact labels', () => {
  it('joins header rows top to bottom with a pipe', () => {
    expect(labels.compactColumnLabel(frozenGrid, 2, frozenHeaders)).toBe('2023 | Feb');
  });

  it('reads header columns on the row itself', () => {
    const headers: HeaderInfo = { ...frozenHeaders, headerColumns: [1, 2] };
    expect(labels.compactRowLabel(frozenGrid, 3, headers)).toBe('10 | 20');
  });

  it('renders missing header values as "unlabeled"', () => {
    const headers: HeaderInfo = { headerRows: [], headerColumns: [], dataStartRow: 1, dataStartCol: 1 };
    expect(labels.compactColumnLabel(frozenGrid, 1, headers)).toBe('unlabeled');
    expect(labels.compactRowLabel(frozenGrid, 1, headers)).toBe('unlabeled');
  });
});
