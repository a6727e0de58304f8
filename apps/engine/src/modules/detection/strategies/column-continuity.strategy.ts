import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import {
  CONTINUITY_THRESHOLDS,
  isNumericLike,
  isTextLabel,
  populatedRows,
  rowCellsInRange,
} from '@sheet-tables/shared';
import { segmentsFromBoundaries, type DetectionStrategy } from './detection-strategy';
import { isHeaderLikeRow } from './row-patterns';

interface RowSignature {
  colCount: number;
  numericRatio: number;
  textRatio: number;
  columnSpan: number;
  density: number;
}

/** Splits where the shape of consecutive populated rows changes sharply */
export class ColumnContinuityStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'column_continuity';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const dataRows = populatedRows(grid, bounds);
    if (dataRows.length < CONTINUITY_THRESHOLDS.MIN_DATA_ROWS) return [];

    const first = dataRows[0];
    if (first === undefined) return [];
    const boundaries = [first];

    // Leading header rows belong to the first table and are never compared
    const headerCount = this.leadingHeaderCount(grid, bounds, dataRows);
    const signatures = dataRows.map((row) => this.signature(grid, row, bounds));

    for (let i = headerCount + 1; i < dataRows.length; i++) {
      const prev = signatures[i - 1];
      const next = signatures[i];
      const row = dataRows[i];
      if (prev === undefined || next === undefined || row === undefined) continue;
      if (isSignatureBreak(prev, next)) boundaries.push(row);
    }

    if (boundaries.length < 2) return [];

    return segmentsFromBoundaries(dataRows, boundaries).map(({ startRow, endRow }) => ({
      startRow,
      endRow,
      startCol: bounds.minCol,
      endCol: bounds.maxCol,
      detectionMethod: this.method,
    }));
  }

  /**
   * The first row when it holds no numbers, followed by any header-like rows
   * that also hold no numbers.
   */
  private leadingHeaderCount(grid: Grid, bounds: GridBounds, dataRows: number[]): number {
    let count = 0;
    for (const row of dataRows) {
      const cells = rowCellsInRange(grid, row, bounds.minCol, bounds.maxCol);
      if (cells.some((c) => isNumericLike(c.value))) break;
      if (count > 0 && !isHeaderLikeRow(grid, row, bounds.minCol, bounds.maxCol)) break;
      count++;
    }
    return count;
  }

  private signature(grid: Grid, row: number, bounds: GridBounds): RowSignature {
    const cells = rowCellsInRange(grid, row, bounds.minCol, bounds.maxCol);
    const count = cells.length;
    if (count === 0) {
      return { colCount: 0, numericRatio: 0, textRatio: 0, columnSpan: 0, density: 0 };
    }

    const numeric = cells.filter((c) => isNumericLike(c.value)).length;
    const text = cells.filter((c) => isTextLabel(c.value)).length;
    const firstCol = cells[0]?.col ?? bounds.minCol;
    const lastCol = cells[count - 1]?.col ?? firstCol;

    return {
      colCount: count,
      numericRatio: numeric / count,
      textRatio: text / count,
      columnSpan: lastCol - firstCol + 1,
      density: count / (bounds.maxCol - bounds.minCol + 1),
    };
  }
}

function isSignatureBreak(prev: RowSignature, next: RowSignature): boolean {
  return (
    Math.abs(prev.colCount - next.colCount) > CONTINUITY_THRESHOLDS.MAX_COL_COUNT_DELTA ||
    Math.abs(prev.numericRatio - next.numericRatio) > CONTINUITY_THRESHOLDS.MAX_NUMERIC_RATIO_DELTA ||
    Math.abs(prev.columnSpan - next.columnSpan) > CONTINUITY_THRESHOLDS.MAX_SPAN_DELTA ||
    Math.abs(prev.density - next.density) > CONTINUITY_THRESHOLDS.MAX_DENSITY_DELTA
  );
}
