import type { DetectionMethod, DetectionOptions, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { populatedRows } from '@sheet-tables/shared';
import type { DetectionStrategy } from './detection-strategy';

/** Opt-in: split wherever the blank-row gap reaches the configured threshold */
export class GapsStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'gaps';

  detect(grid: Grid, bounds: GridBounds, options: DetectionOptions): Region[] {
    const { useGaps, gapThreshold } = options.tableDetection;
    if (!useGaps) return [];

    const dataRows = populatedRows(grid, bounds);
    const first = dataRows[0];
    const last = dataRows[dataRows.length - 1];
    if (dataRows.length < 2 || first === undefined || last === undefined) return [];

    const regions: Region[] = [];
    let currentStart = first;
    for (let i = 1; i < dataRows.length; i++) {
      const prevRow = dataRows[i - 1];
      const row = dataRows[i];
      if (prevRow === undefined || row === undefined) continue;
      if (row - prevRow - 1 >= gapThreshold) {
        regions.push(this.region(currentStart, prevRow, bounds));
        currentStart = row;
      }
    }
    regions.push(this.region(currentStart, last, bounds));
    return regions;
  }

  private region(startRow: number, endRow: number, bounds: GridBounds): Region {
    return {
      startRow,
      endRow,
      startCol: bounds.minCol,
      endCol: bounds.maxCol,
      detectionMethod: this.method,
    };
  }
}
