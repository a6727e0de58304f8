import { describe, it, expect } from 'vitest';
import type { Region } from '@sheet-tables/shared';
import { normalizeCompactRows } from '@sheet-tables/shared';
import { TitleDetectorService, isPlausibleTitle } from '../title-detector.service';
import { gridFromRows } from '../../../__tests__/grid-fixtures';

const detector = new TitleDetectorService();

const grid = gridFromRows({
  1: ['Quarterly Sales Report'],
  2: ['Region', 'Q1', 'Q2'],
  3: ['North', 1, 2],
  4: ['South', 3, 4],
});

function region(startRow: number, endRow: number): Region {
  return { startRow, endRow, startCol: 1, endCol: 3, detectionMethod: 'content_structure' };
}

describe('TitleDetectorService', () => {
  it('moves a caption on the first row out of the region', () => {
    expect(detector.detect(grid, region(1, 4))).toEqual({
      region: region(2, 4),
      title: 'Quarterly Sales Report',
    });
  });

  it('leaves the region alone when the caption sits above it', () => {
    expect(detector.detect(grid, region(2, 4))).toEqual({
      region: region(2, 4),
      title: 'Quarterly Sales Report',
    });
  });

  it('ignores rows with more than one populated cell', () => {
    expect(detector.detect(grid, region(3, 4))).toEqual({ region: region(3, 4) });
  });

  it('keeps the only row of a one-row region', () => {
    expect(detector.detect(grid, region(1, 1))).toEqual({ region: region(1, 1) });
  });

  it('ignores a caption outside the leftmost column', () => {
    const shifted = gridFromRows({ 1: [null, 'Team Overview'], 2: ['a', 'b'], 3: ['c', 'd'] });
    expect(detector.detect(shifted, region(1, 3))).toEqual({ region: region(1, 3) });
  });

  it('ignores runs', () => {
    const { grid: compact } = normalizeCompactRows([
      { r: 1, cells: [[1, 'Team Overview', 's1', 3]] },
      { r: 2, cells: [[1, 'a'], [2, 'b']] },
    ]);
    expect(detector.detect(compact, region(1, 2))).toEqual({ region: region(1, 2) });
  });
});

describe('isPlausibleTitle', () => {
  it('accepts ordinary captions', () => {
    expect(isPlausibleTitle('Quarterly Sales Report')).toBe(true);
    expect(isPlausibleTitle('Marketing Plan')).toBe(true);
  });

  it('rejects short, numeric and punctuation-only text', () => {
    expect(isPlausibleTitle('ab')).toBe(false);
    expect(isPlausibleTitle('12-34')).toBe(false);
    expect(isPlausibleTitle('---')).toBe(false);
    expect(isPlausibleTitle('x'.repeat(101))).toBe(false);
  });

  it('rejects text with a year or month token', () => {
    expect(isPlausibleTitle('Sales 2024')).toBe(false);
    expect(isPlausibleTitle('Summary for Jan')).toBe(false);
    expect(isPlausibleTitle('May results')).toBe(false);
  });
});
