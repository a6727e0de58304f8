export {
  colIndexToLetter,
  letterToColIndex,
  tryParseCellRef,
  buildCellRef,
  cellKey,
} from './cell-utils';

export {
  isPresentValue,
  isNumericString,
  isNumericLike,
  isNumberValue,
  isTextLabel,
  isTemporalValue,
  formatLabelValue,
} from './value-utils';

export {
  toGridBounds,
  toFrozenPanes,
  assertValidBounds,
  assertGrid,
  buildGrid,
  normalizeDenseCells,
  normalizeCompactRows,
  getCell,
  getValue,
  rowCellsInRange,
  populatedRows,
  populatedColumns,
  cellWeight,
  countCells,
  isEmptyRange,
  isGridEmpty,
} from './grid-utils';
export type { NormalizeResult } from './grid-utils';

export { resolveDetectionOptions, hasFrozenPanes, NO_FROZEN_PANES } from './options-utils';
export type { DetectionDefaults } from './options-utils';

export { InvalidGridError } from './errors';
export type { GridErrorCode } from './errors';
