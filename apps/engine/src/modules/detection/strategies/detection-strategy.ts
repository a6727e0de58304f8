import type { DetectionMethod, DetectionOptions, Grid, GridBounds, Region } from '@sheet-tables/shared';

/** One step in the ordered region detection chain */
export interface DetectionStrategy {
  readonly method: DetectionMethod;
  /** Empty result means "not applicable", and the next strategy runs */
  detect(grid: Grid, bounds: GridBounds, options: DetectionOptions): Region[];
}

export interface RowSegment {
  startRow: number;
  endRow: number;
}

export function boundsRegion(bounds: GridBounds, method: DetectionMethod): Region {
  return {
    startRow: bounds.minRow,
    endRow: bounds.maxRow,
    startCol: bounds.minCol,
    endCol: bounds.maxCol,
    detectionMethod: method,
  };
}

/**
 * Split ascending populated rows at the given boundary rows.
 * Each segment runs from its boundary to the last populated row before the next one.
 */
export function segmentsFromBoundaries(dataRows: number[], boundaries: number[]): RowSegment[] {
  const segments: RowSegment[] = [];
  for (let i = 0; i < boundaries.length; i++) {
    const startRow = boundaries[i];
    if (startRow === undefined) continue;
    const nextBoundary = boundaries[i + 1];

    let endRow = startRow;
    for (const row of dataRows) {
      if (row < startRow) continue;
      if (nextBoundary !== undefined && row >= nextBoundary) break;
      endRow = row;
    }
    segments.push({ startRow, endRow });
  }
  return segments;
}
