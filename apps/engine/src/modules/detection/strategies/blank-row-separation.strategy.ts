import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { GAP_THRESHOLDS, ROW_PATTERN_THRESHOLDS, populatedColumns, populatedRows } from '@sheet-tables/shared';
import { segmentsFromBoundaries, type DetectionStrategy } from './detection-strategy';
import {
  isPatternChange,
  isTemporalHeaderRow,
  rowContentPattern,
  sectionHeaderText,
} from './row-patterns';

/**
 * Splits the sheet at blank rows. Large gaps always split; small gaps split
 * only when the rows on either side look like different tables.
 */
export class BlankRowSeparationStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'blank_row_separation';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const dataRows = populatedRows(grid, bounds);
    if (dataRows.length < ROW_PATTERN_THRESHOLDS.MIN_BLANK_ROW_DATA_ROWS) return [];

    const first = dataRows[0];
    if (first === undefined) return [];
    const boundaries = [first];

    for (let i = 1; i < dataRows.length; i++) {
      const prevRow = dataRows[i - 1];
      const row = dataRows[i];
      if (prevRow === undefined || row === undefined) continue;

      const gap = row - prevRow - 1;
      if (gap < GAP_THRESHOLDS.SOFT_BOUNDARY_MIN_ROWS) continue;
      if (gap >= GAP_THRESHOLDS.HARD_BOUNDARY_ROWS || this.isTableBoundary(grid, bounds, dataRows, i)) {
        boundaries.push(row);
      }
    }

    if (boundaries.length < 2) return [];

    return segmentsFromBoundaries(dataRows, boundaries).map(({ startRow, endRow }) => {
      const cols = populatedColumns(grid, startRow, endRow, bounds.minCol, bounds.maxCol);
      return {
        startRow,
        endRow,
        startCol: cols[0] ?? bounds.minCol,
        endCol: cols[cols.length - 1] ?? bounds.maxCol,
        detectionMethod: this.method,
      };
    });
  }

  /** Decide whether the small gap before `dataRows[index]` separates two tables */
  private isTableBoundary(
    grid: Grid,
    bounds: GridBounds,
    dataRows: number[],
    index: number,
  ): boolean {
    const prevRow = dataRows[index - 1];
    const nextRow = dataRows[index];
    if (prevRow === undefined || nextRow === undefined) return false;
    const { minCol, maxCol } = bounds;

    if (isTemporalHeaderRow(grid, nextRow, minCol, maxCol)) return true;

    const prevPattern = rowContentPattern(grid, prevRow, minCol, maxCol);

    if (sectionHeaderText(grid, nextRow, bounds) !== null) {
      // Skip stacked section headers to reach the rows they introduce
      let bodyIndex = index;
      while (bodyIndex < dataRows.length) {
        const candidate = dataRows[bodyIndex];
        if (candidate === undefined || sectionHeaderText(grid, candidate, bounds) === null) break;
        bodyIndex++;
      }
      const bodyRow = dataRows[bodyIndex];
      if (bodyRow === undefined) return false;
      if (isTemporalHeaderRow(grid, bodyRow, minCol, maxCol)) return true;

      const bodyPattern = rowContentPattern(grid, bodyRow, minCol, maxCol);
      if (
        Math.abs(bodyPattern.colCount - prevPattern.colCount) <=
        ROW_PATTERN_THRESHOLDS.MAX_COL_COUNT_DELTA
      ) {
        return false;
      }
    }

    return isPatternChange(prevPattern, rowContentPattern(grid, nextRow, minCol, maxCol));
  }
}
