/** Primitive cell value types */
export type CellValue = string | number | boolean | null;

/** A populated cell, 1-based like the sheet it came from (A1 → row 1, col 1) */
export interface Cell {
  row: number;
  col: number;
  value: CellValue;
}

/**
 * Canonical grid cell. A run stands for `length` consecutive columns starting
 * at `col` that share one value; it is only ever present at its start column.
 */
export type GridCell =
  | (Cell & { kind: 'single' })
  | (Cell & { kind: 'run'; length: number });

/** Range reference (e.g., A1:Z100) */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}
