import type { DetectionMethod, DetectionOptions, Grid, GridBounds, Region } from '@sheet-tables/shared';
import { hasFrozenPanes } from '@sheet-tables/shared';
import { boundsRegion, type DetectionStrategy } from './detection-strategy';

/** Frozen panes mark the whole sheet as a single table with pinned headers */
export class FrozenPanesStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'frozen_panes';

  detect(_grid: Grid, bounds: GridBounds, options: DetectionOptions): Region[] {
    if (!hasFrozenPanes(options.frozen)) return [];
    return [
      {
        ...boundsRegion(bounds, this.method),
        frozenRows: options.frozen.frozenRows,
        frozenCols: options.frozen.frozenCols,
      },
    ];
  }
}
