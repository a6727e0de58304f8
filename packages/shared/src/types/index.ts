export type { CellValue, Cell, GridCell, CellRange } from './cell-types';

export type { GridBounds, FrozenPanes, Grid } from './grid-types';

export type {
  DetectionMethod,
  Region,
  HeaderInfo,
  TableColumn,
  TableRow,
  TableMetadata,
  Table,
  HeaderSummary,
  CellHeaders,
  TableCell,
  CellMap,
  VerboseTable,
  CompactTable,
  SheetTables,
} from './table-types';

export type { DetectionOptions } from './options-types';
