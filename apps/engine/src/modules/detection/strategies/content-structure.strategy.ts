import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { CONTENT_STRUCTURE_THRESHOLDS, populatedColumns, populatedRows } from '@sheet-tables/shared';
import { boundsRegion, type DetectionStrategy } from './detection-strategy';

/** Any block with a few populated rows and columns reads as one table */
export class ContentStructureStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'content_structure';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const rows = populatedRows(grid, bounds);
    if (rows.length < CONTENT_STRUCTURE_THRESHOLDS.MIN_ROWS) return [];

    const cols = populatedColumns(grid, bounds.minRow, bounds.maxRow, bounds.minCol, bounds.maxCol);
    if (cols.length < CONTENT_STRUCTURE_THRESHOLDS.MIN_COLS) return [];

    return [boundsRegion(bounds, this.method)];
  }
}
