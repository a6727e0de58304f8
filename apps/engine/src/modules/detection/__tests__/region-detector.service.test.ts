import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidGridError } from '@sheet-tables/shared';
import { RegionDetectorService } from '../region-detector.service';
import { RegionValidatorService } from '../region-validator.service';
import { detectionOptions, gridFromRows } from '../../../__tests__/grid-fixtures';

describe('RegionDetectorService', () => {
  let detector: RegionDetectorService;

  beforeEach(() => {
    detector = new RegionDetectorService(new RegionValidatorService());
  });

  it('tries the strategies in a fixed order', () => {
    expect(detector.strategyOrder).toEqual([
      'frozen_panes',
      'financial_statement',
      'blank_row_separation',
      'temporal_headers',
      'column_continuity',
      'multirow_headers',
      'gaps',
      'formatting',
      'content_structure',
      'default',
    ]);
  });

  it('lets frozen panes override every other layout signal', () => {
    const grid = gridFromRows({
      1: ['Current Assets'],
      2: ['Period', '2024-01-31', '2024-02-29', '2024-03-31'],
      3: ['Cash', 1, 2, 3],
      4: ['Total Liabilities'],
      9: ['Debt', 4, 5, 6],
      10: ['Loans', 7, 8, 9],
    });
    const regions = detector.detect(
      grid,
      detectionOptions({
        frozen: { frozenRows: 1, frozenCols: 0 },
        tableDetection: { useGaps: true, gapThreshold: 1 },
      }),
    );
    expect(regions).toEqual([
      {
        startRow: 1,
        endRow: 10,
        startCol: 1,
        endCol: 4,
        detectionMethod: 'frozen_panes',
        frozenRows: 1,
        frozenCols: 0,
      },
    ]);
  });

  it('splits two blocks separated by four blank rows', () => {
    const grid = gridFromRows({
      1: ['Name', 'Score', 'Grade'],
      2: ['Ana', 90, 'A'],
      3: ['Ben', 80, 'B'],
      8: ['City', 'Population'],
      9: ['Oslo', 700],
      10: ['Rome', 2800],
    });
    const regions = detector.detect(grid, detectionOptions());
    expect(regions.map((r) => [r.startRow, r.endRow, r.startCol, r.endCol, r.detectionMethod])).toEqual([
      [1, 3, 1, 3, 'blank_row_separation'],
      [8, 10, 1, 2, 'blank_row_separation'],
    ]);
  });

  it('reaches the gaps strategy for small, uniform gaps when enabled', () => {
    const grid = gridFromRows({ 1: ['a', 'b'], 2: ['c', 'd'], 5: ['e', 'f'], 6: ['g', 'h'] });
    const regions = detector.detect(
      grid,
      detectionOptions({ tableDetection: { useGaps: true, gapThreshold: 2 } }),
    );
    expect(regions.map((r) => [r.startRow, r.endRow, r.detectionMethod])).toEqual([
      [1, 2, 'gaps'],
      [5, 6, 'gaps'],
    ]);
  });

  it('falls back to content structure without a layout signal', () => {
    const grid = gridFromRows({ 1: ['a', 'b'], 2: ['c', 'd'], 5: ['e', 'f'], 6: ['g', 'h'] });
    expect(detector.detect(grid, detectionOptions())).toEqual([
      { startRow: 1, endRow: 6, startCol: 1, endCol: 2, detectionMethod: 'content_structure' },
    ]);
  });

  it('keeps a header row over a numeric body as one table', () => {
    const grid = gridFromRows({
      1: ['Product', 'Jan', 'Feb'],
      2: ['Widget A', 100, 120],
      3: ['Widget B', 90, 110],
      4: ['Widget C', 80, 70],
    });
    expect(detector.detect(grid, detectionOptions())).toEqual([
      { startRow: 1, endRow: 4, startCol: 1, endCol: 3, detectionMethod: 'content_structure' },
    ]);
  });

  it('finds a two-row header block over numbers', () => {
    const grid = gridFromRows({
      1: ['Region', 'North', 'South', 'East'],
      2: ['Metric', 'Sales', 'Units', 'Costs'],
      3: ['Week 1', 10, 20, 30],
      4: ['Week 2', 11, 21, 31],
      5: ['Week 3', 12, 22, 32],
    });
    expect(detector.detect(grid, detectionOptions())).toEqual([
      { startRow: 1, endRow: 5, startCol: 1, endCol: 4, detectionMethod: 'multirow_headers' },
    ]);
  });

  it('uses the default region for a small sheet', () => {
    const grid = gridFromRows({
      1: ['Product', 'Jan', 'Feb'],
      2: ['Widget A', 100, 120],
    });
    expect(detector.detect(grid, detectionOptions())).toEqual([
      { startRow: 1, endRow: 2, startCol: 1, endCol: 3, detectionMethod: 'default' },
    ]);
  });

  it('returns no regions for an empty sheet', () => {
    expect(detector.detect(gridFromRows({}), detectionOptions())).toEqual([]);
  });

  it('is deterministic', () => {
    const grid = gridFromRows({
      1: ['Metric', 'Month 1', 'Month 2'],
      2: ['Sales', 1, 2],
      3: ['Metric', 'Month 3', 'Month 4'],
      4: ['Sales', 3, 4],
    });
    const first = detector.detect(grid, detectionOptions());
    expect(detector.detect(grid, detectionOptions())).toEqual(first);
    expect(first.map((r) => r.detectionMethod)).toEqual(['temporal_headers', 'temporal_headers']);
  });

  it('rejects a missing grid', () => {
    expect(() => detector.detect(null, detectionOptions())).toThrow(InvalidGridError);
  });
});
