import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { GAP_THRESHOLDS, MULTIROW_THRESHOLDS, populatedRows } from '@sheet-tables/shared';
import type { DetectionStrategy, RowSegment } from './detection-strategy';
import { isHeaderLikeRow, nextPopulatedRow, rowContentPattern } from './row-patterns';

/** Stacked header rows (two or more) near the top, each block followed by its data */
export class MultirowHeadersStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'multirow_headers';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const dataRows = populatedRows(grid, bounds);
    const scanEnd = Math.min(bounds.minRow + MULTIROW_THRESHOLDS.SCAN_ROWS, bounds.maxRow);
    const blocks = this.findHeaderBlocks(grid, bounds, bounds.minRow, scanEnd);

    const regions: Region[] = [];
    let lastEnd = bounds.minRow - 1;
    for (const block of blocks) {
      if (block.startRow <= lastEnd) continue;
      const dataStart = nextPopulatedRow(dataRows, block.endRow + 1);
      if (dataStart === null) continue;

      const endRow = this.findTableEnd(grid, bounds, dataRows, dataStart);
      regions.push({
        startRow: block.startRow,
        endRow,
        startCol: bounds.minCol,
        endCol: bounds.maxCol,
        detectionMethod: this.method,
      });
      lastEnd = endRow;
    }
    return regions;
  }

  private findHeaderBlocks(grid: Grid, bounds: GridBounds, fromRow: number, toRow: number): RowSegment[] {
    const blocks: RowSegment[] = [];
    let blockStart: number | null = null;

    const close = (endRow: number): void => {
      if (blockStart !== null && endRow - blockStart + 1 >= MULTIROW_THRESHOLDS.MIN_BLOCK_ROWS) {
        blocks.push({ startRow: blockStart, endRow });
      }
      blockStart = null;
    };

    for (let row = fromRow; row <= toRow; row++) {
      if (isHeaderLikeRow(grid, row, bounds.minCol, bounds.maxCol)) {
        if (blockStart === null) blockStart = row;
      } else {
        close(row - 1);
      }
    }
    close(toRow);
    return blocks;
  }

  private findTableEnd(grid: Grid, bounds: GridBounds, dataRows: number[], dataStart: number): number {
    const { minCol, maxCol, maxRow } = bounds;
    let lastDataRow = dataStart;
    let row = dataStart + 1;

    while (row <= maxRow) {
      const next = nextPopulatedRow(dataRows, row);
      if (next === null) break;
      if (next - row >= GAP_THRESHOLDS.MULTIROW_TABLE_END_ROWS) break;
      if (isHeaderLikeRow(grid, next, minCol, maxCol) && this.startsHeaderBlock(grid, bounds, next)) {
        break;
      }
      lastDataRow = next;
      row = next + 1;
    }
    return lastDataRow;
  }

  private startsHeaderBlock(grid: Grid, bounds: GridBounds, startRow: number): boolean {
    const endRow = Math.min(startRow + MULTIROW_THRESHOLDS.LOOKAHEAD_ROWS - 1, bounds.maxRow);
    let headerLike = 0;
    for (let row = startRow; row <= endRow; row++) {
      const pattern = rowContentPattern(grid, row, bounds.minCol, bounds.maxCol);
      if (pattern.colCount > 0 && pattern.hasTextLabels && !pattern.mostlyNumeric) headerLike++;
    }
    return headerLike >= MULTIROW_THRESHOLDS.MIN_BLOCK_ROWS;
  }
}
