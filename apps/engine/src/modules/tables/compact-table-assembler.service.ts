import { Injectable } from '@nestjs/common';
import type { CompactTable, Grid, HeaderInfo, Region, TableColumn, TableRow } from '@sheet-tables/shared';
import {
  cellWeight,
  colIndexToLetter,
  countCells,
  isEmptyRange,
  rowCellsInRange,
} from '@sheet-tables/shared';
import { LabelBuilderService } from '../headers/label-builder.service';

/**
 * Builds compact tables: per-column and per-row cell counts instead of cell maps.
 * Runs are counted by their length and never expanded.
 */
@Injectable()
export class CompactTableAssemblerService {
  constructor(private readonly labels: LabelBuilderService) {}

  assemble(
    grid: Grid,
    region: Region,
    headers: HeaderInfo,
    index: number,
    title?: string,
  ): CompactTable | null {
    if (isEmptyRange(region)) return null;

    const columnCounts = new Map<number, number>();
    const rowCounts = new Map<number, number>();

    for (let row = region.startRow; row <= region.endRow; row++) {
      for (const cell of rowCellsInRange(grid, row, region.startCol, region.endCol)) {
        // A run covers the columns after its start, clipped to the region
        const lastCol = Math.min(cell.col + cellWeight(cell) - 1, region.endCol);
        rowCounts.set(row, (rowCounts.get(row) ?? 0) + lastCol - cell.col + 1);
        for (let col = cell.col; col <= lastCol; col++) {
          columnCounts.set(col, (columnCounts.get(col) ?? 0) + 1);
        }
      }
    }

    const columns: TableColumn<number>[] = [];
    for (let col = region.startCol; col <= region.endCol; col++) {
      columns.push({
        index: col,
        letter: colIndexToLetter(col),
        label: this.labels.compactColumnLabel(grid, col, headers),
        isHeader: headers.headerColumns.includes(col),
        cells: columnCounts.get(col) ?? 0,
      });
    }

    const rows: TableRow<number>[] = [];
    for (let row = region.startRow; row <= region.endRow; row++) {
      rows.push({
        index: row,
        label: this.labels.compactRowLabel(grid, row, headers),
        isHeader: headers.headerRows.includes(row),
        cells: rowCounts.get(row) ?? 0,
      });
    }

    const counts = countCells(grid, region);
    return {
      id: `table_${index + 1}`,
      ...(title !== undefined ? { title } : {}),
      region: { ...region },
      headerInfo: headers,
      columns,
      rows,
      metadata: {
        detectionMethod: region.detectionMethod,
        cellCount: counts.total,
        numericCellCount: counts.numeric,
      },
    };
  }
}
