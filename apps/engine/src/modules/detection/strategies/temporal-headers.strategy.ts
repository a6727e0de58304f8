import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { GAP_THRESHOLDS, TEMPORAL_THRESHOLDS, populatedRows } from '@sheet-tables/shared';
import type { DetectionStrategy } from './detection-strategy';
import { isTemporalHeaderRow, nextPopulatedRow } from './row-patterns';

/**
 * Tables whose header row holds dates or "Month N" periods.
 * Each temporal row near the top starts a table that runs until the next
 * temporal row or a wide blank gap.
 */
export class TemporalHeadersStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'temporal_headers';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const { minRow, maxRow, minCol, maxCol } = bounds;
    const dataRows = populatedRows(grid, bounds);
    const scanEnd = Math.min(minRow + TEMPORAL_THRESHOLDS.SCAN_ROWS - 1, maxRow);

    const headerRows: number[] = [];
    for (let row = minRow; row <= scanEnd; row++) {
      if (isTemporalHeaderRow(grid, row, minCol, maxCol)) headerRows.push(row);
    }

    const regions: Region[] = [];
    for (const headerRow of headerRows) {
      const endRow = this.findTableEnd(grid, bounds, dataRows, headerRow);
      if (endRow <= headerRow) continue;
      regions.push({
        startRow: headerRow,
        endRow,
        startCol: minCol,
        endCol: maxCol,
        detectionMethod: this.method,
      });
    }
    return regions;
  }

  private findTableEnd(grid: Grid, bounds: GridBounds, dataRows: number[], headerRow: number): number {
    let lastDataRow = headerRow;
    let row = headerRow + 1;

    while (row <= bounds.maxRow) {
      const next = nextPopulatedRow(dataRows, row);
      if (next === null) break;
      if (next > row && next - row >= GAP_THRESHOLDS.TEMPORAL_TABLE_END_ROWS) break;
      if (isTemporalHeaderRow(grid, next, bounds.minCol, bounds.maxCol)) break;
      lastDataRow = next;
      row = next + 1;
    }
    return lastDataRow;
  }
}
