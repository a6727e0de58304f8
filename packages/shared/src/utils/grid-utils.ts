import type { CellRange, CellValue, GridCell } from '../types/cell-types';
import type { FrozenPanes, Grid, GridBounds } from '../types/grid-types';
import type { DenseCellInput, CompactRowInput } from '../schemas/cell-schema';
import { compactCellTupleSchema } from '../schemas/cell-schema';
import type { DimensionsInput, FrozenPanesInput, FrozenTupleInput } from '../schemas/sheet-schema';
import { cellKey, tryParseCellRef } from './cell-utils';
import { isPresentValue, isNumberValue } from './value-utils';
import { InvalidGridError } from './errors';

export interface NormalizeResult {
  grid: Grid;
  /** Cells dropped because their record or tuple was malformed */
  skippedCells: number;
}

/** Accepts both the dense object form and the compact [minRow, minCol, maxRow, maxCol] form */
export function toGridBounds(dimensions: DimensionsInput): GridBounds | undefined {
  if (!dimensions) return undefined;
  if (Array.isArray(dimensions)) {
    const [minRow, minCol, maxRow, maxCol] = dimensions;
    return { minRow, minCol, maxRow, maxCol };
  }
  return {
    minRow: dimensions.min_row,
    maxRow: dimensions.max_row,
    minCol: dimensions.min_col,
    maxCol: dimensions.max_col,
  };
}

/** Object form wins over the compact [rows, cols] tuple */
export function toFrozenPanes(
  frozenPanes?: FrozenPanesInput,
  frozen?: FrozenTupleInput,
): FrozenPanes | undefined {
  if (frozenPanes) {
    return { frozenRows: frozenPanes.frozen_rows, frozenCols: frozenPanes.frozen_cols };
  }
  if (frozen) {
    return { frozenRows: frozen[0], frozenCols: frozen[1] };
  }
  return undefined;
}

export function assertValidBounds(bounds: GridBounds): void {
  if (bounds.minRow > bounds.maxRow || bounds.minCol > bounds.maxCol) {
    throw new InvalidGridError(
      'INVALID_BOUNDS',
      `Invalid grid bounds: rows ${bounds.minRow}..${bounds.maxRow}, cols ${bounds.minCol}..${bounds.maxCol}`,
    );
  }
}

/**
 * Build the canonical grid. Later cells at the same position replace earlier ones.
 * Bounds come from `dimensions` when given, otherwise from the populated cells.
 */
export function buildGrid(
  cells: Iterable<GridCell>,
  dimensions?: GridBounds,
  frozen?: FrozenPanes,
): Grid {
  const byKey = new Map<string, GridCell>();
  for (const cell of cells) {
    byKey.set(cellKey(cell.row, cell.col), cell);
  }

  const rows = new Map<number, GridCell[]>();
  for (const cell of byKey.values()) {
    const list = rows.get(cell.row);
    if (list) {
      list.push(cell);
    } else {
      rows.set(cell.row, [cell]);
    }
  }
  for (const list of rows.values()) {
    list.sort((a, b) => a.col - b.col);
  }

  const bounds = dimensions ?? deriveBounds(byKey.values());
  assertValidBounds(bounds);

  return {
    cells: byKey,
    rows,
    bounds,
    ...(frozen ? { frozen } : {}),
  };
}

function deriveBounds(cells: Iterable<GridCell>): GridBounds {
  let minRow = Infinity;
  let maxRow = -Infinity;
  let minCol = Infinity;
  let maxCol = -Infinity;
  for (const cell of cells) {
    minRow = Math.min(minRow, cell.row);
    maxRow = Math.max(maxRow, cell.row);
    minCol = Math.min(minCol, cell.col);
    maxCol = Math.max(maxCol, cell.col);
  }
  if (minRow === Infinity) {
    return { minRow: 1, maxRow: 1, minCol: 1, maxCol: 1 };
  }
  return { minRow, maxRow, minCol, maxCol };
}

/** Dense format: coordinate-keyed cell records ("B3" → { value }) */
export function normalizeDenseCells(
  cells: Record<string, DenseCellInput>,
  dimensions?: GridBounds,
  frozen?: FrozenPanes,
): NormalizeResult {
  const normalized: GridCell[] = [];
  let skippedCells = 0;

  for (const [coord, record] of Object.entries(cells)) {
    if (!('value' in record)) {
      skippedCells++;
      continue;
    }
    const value = record.value ?? null;
    if (!isPresentValue(value)) continue;

    const parsed = tryParseCellRef(coord);
    const row = record.row ?? parsed?.row;
    const col = record.column ?? record.col ?? parsed?.col;
    if (row === undefined || col === undefined) {
      skippedCells++;
      continue;
    }
    normalized.push({ kind: 'single', row, col, value });
  }

  return { grid: buildGrid(normalized, dimensions, frozen), skippedCells };
}

/**
 * Compact format: row records whose cells are [col, value, ...extra, runLength?].
 * A trailing integer > 1 on a tuple of three or more elements marks a run.
 */
export function normalizeCompactRows(
  rows: CompactRowInput[],
  dimensions?: GridBounds,
  frozen?: FrozenPanes,
): NormalizeResult {
  const normalized: GridCell[] = [];
  let skippedCells = 0;

  for (const rowRecord of rows) {
    for (const tuple of rowRecord.cells) {
      const parsed = compactCellTupleSchema.safeParse(tuple);
      if (!parsed.success) {
        skippedCells++;
        continue;
      }
      const [col, value, ...rest] = parsed.data;
      if (!isPresentValue(value)) continue;

      const runLength = readRunLength(rest);
      normalized.push(
        runLength === null
          ? { kind: 'single', row: rowRecord.r, col, value }
          : { kind: 'run', row: rowRecord.r, col, value, length: runLength },
      );
    }
  }

  return { grid: buildGrid(normalized, dimensions, frozen), skippedCells };
}

function readRunLength(extra: unknown[]): number | null {
  if (extra.length === 0) return null;
  const last = extra[extra.length - 1];
  if (typeof last === 'number' && Number.isInteger(last) && last > 1) {
    return last;
  }
  return null;
}

// ── Grid queries ──

export function getCell(grid: Grid, row: number, col: number): GridCell | undefined {
  return grid.cells.get(cellKey(row, col));
}

export function getValue(grid: Grid, row: number, col: number): CellValue {
  return getCell(grid, row, col)?.value ?? null;
}

/** Cells of a row whose (start) column falls within [minCol, maxCol] */
export function rowCellsInRange(
  grid: Grid,
  row: number,
  minCol: number,
  maxCol: number,
): GridCell[] {
  const cells = grid.rows.get(row);
  if (!cells) return [];
  return cells.filter((c) => c.col >= minCol && c.col <= maxCol);
}

/** Ascending rows within the bounds that hold at least one cell */
export function populatedRows(grid: Grid, bounds: GridBounds): number[] {
  const result: number[] = [];
  for (const [row, cells] of grid.rows) {
    if (row < bounds.minRow || row > bounds.maxRow) continue;
    if (cells.some((c) => c.col >= bounds.minCol && c.col <= bounds.maxCol)) {
      result.push(row);
    }
  }
  return result.sort((a, b) => a - b);
}

/** Ascending columns that hold at least one cell in the row range */
export function populatedColumns(
  grid: Grid,
  minRow: number,
  maxRow: number,
  minCol: number,
  maxCol: number,
): number[] {
  const cols = new Set<number>();
  for (const [row, cells] of grid.rows) {
    if (row < minRow || row > maxRow) continue;
    for (const c of cells) {
      if (c.col >= minCol && c.col <= maxCol) cols.add(c.col);
    }
  }
  return [...cols].sort((a, b) => a - b);
}

/** How many sheet cells a grid cell stands for */
export function cellWeight(cell: GridCell): number {
  return cell.kind === 'run' ? Math.max(cell.length, 0) : 1;
}

/** Total and numeric cell counts inside a range, expanding runs by their length */
export function countCells(grid: Grid, range: CellRange): { total: number; numeric: number } {
  let total = 0;
  let numeric = 0;
  for (let row = range.startRow; row <= range.endRow; row++) {
    for (const cell of rowCellsInRange(grid, row, range.startCol, range.endCol)) {
      const weight = cellWeight(cell);
      total += weight;
      if (isNumberValue(cell.value)) numeric += weight;
    }
  }
  return { total, numeric };
}

export function assertGrid(grid: Grid | null | undefined): asserts grid is Grid {
  if (!grid) {
    throw new InvalidGridError('MISSING_GRID', 'No grid supplied for table detection');
  }
}

/** Zero-width or zero-height ranges are no-ops downstream */
export function isEmptyRange(range: CellRange): boolean {
  return range.startRow > range.endRow || range.startCol > range.endCol;
}

export function isGridEmpty(grid: Grid): boolean {
  return grid.cells.size === 0;
}
