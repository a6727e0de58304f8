import { describe, it, expect } from 'vitest';
import { BlankRowSeparationStrategy } from '../blank-row-separation.strategy';
import { gridFromRows } from '../../../../__tests__/grid-fixtures';

const strategy = new BlankRowSeparationStrategy();

describe('BlankRowSeparationStrategy', () => {
  it('always splits at four blank rows and trims each block', () => {
    const grid = gridFromRows({
      1: ['Name', 'Score', 'Grade'],
      2: ['Ana', 90, 'A'],
      3: ['Ben', 80, 'B'],
      8: ['City', 'Population'],
      9: ['Oslo', 700],
      10: ['Rome', 2800],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([
      { startRow: 1, endRow: 3, startCol: 1, endCol: 3, detectionMethod: 'blank_row_separation' },
      { startRow: 8, endRow: 10, startCol: 1, endCol: 2, detectionMethod: 'blank_row_separation' },
    ]);
  });

  it('keeps a section header after a small gap in the same table', () => {
    const grid = gridFromRows({
      1: ['Item', 'Q1', 'Q2', 'Q3'],
      2: ['Alpha', 1, 2, 3],
      3: ['Beta', 4, 5, 6],
      5: ['Second half'],
      6: ['Gamma', 7, 8, 9],
      7: ['Delta', 1, 2, 3],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([]);
  });

  it('splits when the block under a section header has date headers', () => {
    const grid = gridFromRows({
      1: ['Item', 'Q1', 'Q2', 'Q3'],
      2: ['Alpha', 1, 2, 3],
      3: ['Beta', 4, 5, 6],
      5: ['Forecast'],
      6: ['Period', '2024-01-31', '2024-02-29', '2024-03-31'],
      7: ['Alpha', 1, 2, 3],
    });
    const regions = strategy.detect(grid, grid.bounds);
    expect(regions.map((r) => [r.startRow, r.endRow, r.startCol, r.endCol])).toEqual([
      [1, 3, 1, 4],
      [5, 7, 1, 4],
    ]);
  });

  it('splits a small gap when the column count changes sharply', () => {
    const grid = gridFromRows({
      1: ['Name', 'Score'],
      2: ['Ana', 90],
      3: ['Ben', 80],
      5: [1, 2, 3, 4, 5, 6],
    });
    const regions = strategy.detect(grid, grid.bounds);
    expect(regions.map((r) => [r.startRow, r.endRow, r.startCol, r.endCol])).toEqual([
      [1, 3, 1, 2],
      [5, 5, 1, 6],
    ]);
  });

  it('needs at least four populated rows', () => {
    const grid = gridFromRows({ 1: ['a', 'b'], 6: ['c', 'd'], 12: ['e', 'f'] });
    expect(strategy.detect(grid, grid.bounds)).toEqual([]);
  });
});
