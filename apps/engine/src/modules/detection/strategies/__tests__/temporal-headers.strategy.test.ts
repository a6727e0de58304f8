import { describe, it, expect } from 'vitest';
import { TemporalHeadersStrategy } from '../temporal-headers.strategy';
import { gridFromRows } from '../../../../__tests__/grid-fixtures';

const strategy = new TemporalHeadersStrategy();

describe('TemporalHeadersStrategy', () => {
  it('ends a dated table at a two-row gap', () => {
    const grid = gridFromRows({
      1: ['Metric', '2024-01-31', '2024-02-29'],
      2: ['Sales', 10, 20],
      3: ['Costs', 5, 6],
      6: ['Other', 1, 2],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([
      { startRow: 1, endRow: 3, startCol: 1, endCol: 3, detectionMethod: 'temporal_headers' },
    ]);
  });

  it('starts a new table at each "Month N" header row', () => {
    const grid = gridFromRows({
      1: ['Metric', 'Month 1', 'Month 2'],
      2: ['Sales', 1, 2],
      3: ['Metric', 'Month 3', 'Month 4'],
      4: ['Sales', 3, 4],
    });
    const regions = strategy.detect(grid, grid.bounds);
    expect(regions.map((r) => [r.startRow, r.endRow])).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('accepts a row where a quarter of the value cells are dates', () => {
    const grid = gridFromRows({
      1: ['Metric', '2024-01-31', 'x', 'y', 'z'],
      2: ['Sales', 1, 2, 3, 4],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([
      { startRow: 1, endRow: 2, startCol: 1, endCol: 5, detectionMethod: 'temporal_headers' },
    ]);
  });

  it('skips a date header with no rows under it', () => {
    const grid = gridFromRows({
      1: ['Metric', '2024-01-31'],
      4: ['x', 'y'],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([]);
  });

  it('only looks at the first five rows for headers', () => {
    const grid = gridFromRows({
      1: ['a', 'b'],
      6: ['Metric', '2024-01-31'],
      7: ['Sales', 1],
    });
    expect(strategy.detect(grid, grid.bounds)).toEqual([]);
  });
});
