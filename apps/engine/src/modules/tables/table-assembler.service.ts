import { Injectable } from '@nestjs/common';
import type {
  CellHeaders,
  CellMap,
  FrozenPanes,
  Grid,
  HeaderInfo,
  Region,
  TableCell,
  TableColumn,
  TableRow,
  VerboseTable,
} from '@sheet-tables/shared';
import {
  NO_FROZEN_PANES,
  buildCellRef,
  colIndexToLetter,
  isEmptyRange,
  isNumberValue,
  rowCellsInRange,
} from '@sheet-tables/shared';
import { LabelBuilderService } from '../headers/label-builder.service';

/** Builds verbose tables: labelled columns and rows with their cells keyed by A1 ref */
@Injectable()
export class TableAssemblerService {
  constructor(private readonly labels: LabelBuilderService) {}

  assemble(
    grid: Grid,
    region: Region,
    headers: HeaderInfo,
    index: number,
    frozen: FrozenPanes = NO_FROZEN_PANES,
  ): VerboseTable | null {
    if (isEmptyRange(region)) return null;

    const columnCells = new Map<number, CellMap>();
    const rowCells = new Map<number, CellMap>();
    let cellCount = 0;
    let numericCellCount = 0;
    const columnPaths = new Map<number, string[]>();

    for (let row = region.startRow; row <= region.endRow; row++) {
      const rowPath = this.labels.rowPath(grid, row, headers);
      for (const gridCell of rowCellsInRange(grid, row, region.startCol, region.endCol)) {
        const cell: TableCell = { row: gridCell.row, col: gridCell.col, value: gridCell.value };
        if (row >= headers.dataStartRow && cell.col >= headers.dataStartCol) {
          let columnPath = columnPaths.get(cell.col);
          if (!columnPath) {
            columnPath = this.labels.columnPath(grid, cell.col, headers);
            columnPaths.set(cell.col, columnPath);
          }
          cell.headers = headerContext(columnPath, rowPath);
        }
        const ref = buildCellRef(cell.col, cell.row);
        mapFor(columnCells, cell.col)[ref] = cell;
        mapFor(rowCells, cell.row)[ref] = cell;
        cellCount++;
        if (isNumberValue(cell.value)) numericCellCount++;
      }
    }

    const columns: TableColumn<CellMap>[] = [];
    for (let col = region.startCol; col <= region.endCol; col++) {
      columns.push({
        index: col,
        letter: colIndexToLetter(col),
        label: this.labels.columnLabel(grid, col, headers),
        isHeader: headers.headerColumns.includes(col),
        cells: columnCells.get(col) ?? {},
      });
    }

    const rows: TableRow<CellMap>[] = [];
    for (let row = region.startRow; row <= region.endRow; row++) {
      rows.push({
        index: row,
        label: this.labels.rowLabel(grid, row, headers, frozen),
        isHeader: headers.headerRows.includes(row),
        cells: rowCells.get(row) ?? {},
      });
    }

    return {
      id: `table_${index + 1}`,
      region: { ...region },
      headerInfo: headers,
      columns,
      rows,
      metadata: {
        detectionMethod: region.detectionMethod,
        cellCount,
        numericCellCount,
      },
    };
  }
}

function headerContext(columnPath: string[], rowPath: string[]): CellHeaders {
  return {
    columnPath,
    rowPath,
    summary: {
      primaryColumnHeader: columnPath[0] ?? null,
      primaryRowHeader: rowPath[0] ?? null,
      columnHeaderLevels: columnPath.length,
      rowHeaderLevels: rowPath.length,
    },
  };
}

function mapFor(maps: Map<number, CellMap>, key: number): CellMap {
  let map = maps.get(key);
  if (!map) {
    map = {};
    maps.set(key, map);
  }
  return map;
}
