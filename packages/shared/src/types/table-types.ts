import type { Cell, CellRange } from './cell-types';

export type DetectionMethod =
  | 'frozen_panes'
  | 'financial_statement'
  | 'blank_row_separation'
  | 'temporal_headers'
  | 'column_continuity'
  | 'multirow_headers'
  | 'gaps'
  | 'formatting'
  | 'content_structure'
  | 'default';

/** Candidate table boundary produced by the region detector */
export interface Region extends CellRange {
  detectionMethod: DetectionMethod;
  frozenRows?: number;
  frozenCols?: number;
}

export interface HeaderInfo {
  headerRows: number[];
  headerColumns: number[];
  dataStartRow: number;
  dataStartCol: number;
}

export interface TableColumn<TCells> {
  readonly index: number;
  readonly letter: string;
  readonly label: string;
  readonly isHeader: boolean;
  readonly cells: TCells;
}

export interface TableRow<TCells> {
  readonly index: number;
  readonly label: string;
  readonly isHeader: boolean;
  readonly cells: TCells;
}

export interface TableMetadata {
  readonly detectionMethod: DetectionMethod;
  readonly cellCount: number;
  readonly numericCellCount: number;
}

export interface Table<TCells> {
  readonly id: string;
  readonly title?: string;
  readonly region: Readonly<Region>;
  readonly headerInfo: Readonly<HeaderInfo>;
  readonly columns: ReadonlyArray<TableColumn<TCells>>;
  readonly rows: ReadonlyArray<TableRow<TCells>>;
  readonly metadata: TableMetadata;
}

export interface HeaderSummary {
  readonly primaryColumnHeader: string | null;
  readonly primaryRowHeader: string | null;
  readonly columnHeaderLevels: number;
  readonly rowHeaderLevels: number;
}

/** Header hierarchy of a data cell; paths run top-to-bottom and left-to-right */
export interface CellHeaders {
  readonly columnPath: string[];
  readonly rowPath: string[];
  readonly summary: HeaderSummary;
}

/** Only data cells (at or past the data start on both axes) carry headers */
export interface TableCell extends Cell {
  headers?: CellHeaders;
}

/** A1 ref → cell, restricted to the owning table's region */
export type CellMap = Record<string, TableCell>;

export type VerboseTable = Table<CellMap>;
export type CompactTable = Table<number>;

export interface SheetTables<TTable> {
  sheetName: string;
  tables: TTable[];
}
