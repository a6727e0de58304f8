import type { Grid, GridBounds } from '@sheet-tables/shared';
import {
  MULTIROW_THRESHOLDS,
  ROW_PATTERN_THRESHOLDS,
  TEMPORAL_THRESHOLDS,
  isNumericLike,
  isNumericString,
  isTextLabel,
  isTemporalValue,
  rowCellsInRange,
} from '@sheet-tables/shared';

export interface RowContentPattern {
  colCount: number;
  mostlyNumeric: boolean;
  hasTextLabels: boolean;
}

export function rowContentPattern(
  grid: Grid,
  row: number,
  minCol: number,
  maxCol: number,
): RowContentPattern {
  const cells = rowCellsInRange(grid, row, minCol, maxCol);
  const numericCount = cells.filter((c) => isNumericLike(c.value)).length;
  const labelCount = cells.filter((c) => isTextLabel(c.value)).length;

  return {
    colCount: cells.length,
    mostlyNumeric: cells.length > 0 && numericCount > cells.length / 2,
    hasTextLabels: labelCount > ROW_PATTERN_THRESHOLDS.MIN_TEXT_LABELS,
  };
}

/** Whether two rows look like they belong to different tables */
export function isPatternChange(prev: RowContentPattern, next: RowContentPattern): boolean {
  if (Math.abs(prev.colCount - next.colCount) > ROW_PATTERN_THRESHOLDS.MAX_COL_COUNT_DELTA) {
    return true;
  }
  if (prev.mostlyNumeric !== next.mostlyNumeric) return true;
  return next.hasTextLabels && !prev.hasTextLabels;
}

export function isHeaderLikeRow(grid: Grid, row: number, minCol: number, maxCol: number): boolean {
  const pattern = rowContentPattern(grid, row, minCol, maxCol);
  return (
    pattern.hasTextLabels &&
    !pattern.mostlyNumeric &&
    pattern.colCount >= MULTIROW_THRESHOLDS.MIN_HEADER_COLUMNS
  );
}

/**
 * A row of date-like column headers. The label column (the first bounds column)
 * is ignored unless it is the only populated cell.
 */
export function isTemporalHeaderRow(
  grid: Grid,
  row: number,
  minCol: number,
  maxCol: number,
): boolean {
  const cells = rowCellsInRange(grid, row, minCol, maxCol);
  if (cells.length === 0) return false;

  const valueCells = cells.filter((c) => c.col > minCol);
  const candidates = valueCells.length > 0 ? valueCells : cells;
  const temporal = candidates.filter((c) => isTemporalValue(c.value)).length;
  return temporal / candidates.length >= TEMPORAL_THRESHOLDS.MIN_TEMPORAL_RATIO;
}

/** Non-numeric text in a cell */
export function textOf(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '' || isNumericString(trimmed)) return null;
  return trimmed;
}

/** Text of a row whose only populated cell is text in the first column, else null */
export function sectionHeaderText(grid: Grid, row: number, bounds: GridBounds): string | null {
  const cells = rowCellsInRange(grid, row, bounds.minCol, bounds.maxCol);
  const first = cells[0];
  if (cells.length !== 1 || first === undefined || first.col !== bounds.minCol) return null;
  return textOf(first.value);
}

/** First of the ascending `dataRows` at or after `from`, or null */
export function nextPopulatedRow(dataRows: readonly number[], from: number): number | null {
  let lo = 0;
  let hi = dataRows.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    const row = dataRows[mid];
    if (row !== undefined && row < from) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return dataRows[lo] ?? null;
}
