import { Injectable, Logger } from '@nestjs/common';
import type {
  Grid,
  GridBounds,
  FrozenPanes,
  SheetInput,
  DenseCellInput,
  CompactRowInput,
  NormalizeResult,
} from '@sheet-tables/shared';
import {
  normalizeDenseCells,
  normalizeCompactRows,
  toGridBounds,
  toFrozenPanes,
} from '@sheet-tables/shared';

/**
 * Turns either sheet wire format into the canonical sparse grid.
 * Malformed cells are dropped and reported, never fatal.
 */
@Injectable()
export class GridNormalizerService {
  private readonly logger = new Logger(GridNormalizerService.name);

  fromSheet(sheet: SheetInput): Grid {
    const dimensions = toGridBounds(sheet.dimensions);
    const frozen = toFrozenPanes(sheet.frozen_panes, sheet.frozen);
    const label = sheet.name ?? 'sheet';

    if ('cells' in sheet) {
      return this.report(label, normalizeDenseCells(sheet.cells, dimensions, frozen));
    }
    return this.report(label, normalizeCompactRows(sheet.rows, dimensions, frozen));
  }

  fromDenseCells(
    cells: Record<string, DenseCellInput>,
    dimensions?: GridBounds,
    frozen?: FrozenPanes,
  ): Grid {
    return this.report('dense', normalizeDenseCells(cells, dimensions, frozen));
  }

  fromCompactRows(rows: CompactRowInput[], dimensions?: GridBounds, frozen?: FrozenPanes): Grid {
    return this.report('compact', normalizeCompactRows(rows, dimensions, frozen));
  }

  private report(label: string, result: NormalizeResult): Grid {
    if (result.skippedCells > 0) {
      this.logger.warn(`Skipped ${result.skippedCells} malformed cell(s) in "${label}"`);
    }
    return result.grid;
  }
}
