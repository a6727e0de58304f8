import type { GridCell } from './cell-types';

/** Inclusive sheet bounds */
export interface GridBounds {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

/** Frozen pane counts as reported by the spreadsheet UI */
export interface FrozenPanes {
  frozenRows: number;
  frozenCols: number;
}

/** Sparse, read-only cell grid for one sheet */
export interface Grid {
  /** `cellKey(row, col)` → cell; runs are keyed at their start column only */
  readonly cells: ReadonlyMap<string, GridCell>;
  /** row → cells of that row, sorted by column */
  readonly rows: ReadonlyMap<number, readonly GridCell[]>;
  readonly bounds: GridBounds;
  readonly frozen?: FrozenPanes;
}
