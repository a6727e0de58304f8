export {
  cellValueSchema,
  denseCellSchema,
  compactCellTupleSchema,
  compactRowSchema,
} from './cell-schema';
export type {
  CellValueInput,
  DenseCellInput,
  CompactCellTuple,
  CompactRowInput,
} from './cell-schema';

export {
  dimensionsTupleSchema,
  frozenPanesSchema,
  frozenTupleSchema,
  denseSheetSchema,
  compactSheetSchema,
  sheetSchema,
  workbookSchema,
} from './sheet-schema';
export type {
  DimensionsInput,
  FrozenPanesInput,
  FrozenTupleInput,
  DenseSheetInput,
  CompactSheetInput,
  SheetInput,
  WorkbookInput,
} from './sheet-schema';

export {
  tableDetectionOptionsSchema,
  sheetDataHintSchema,
  tableOptionsSchema,
} from './options-schema';
export type {
  TableDetectionOptionsInput,
  SheetDataHintInput,
  TableOptionsInput,
} from './options-schema';
