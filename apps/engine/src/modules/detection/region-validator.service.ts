import { Injectable, Logger } from '@nestjs/common';
import type { GridBounds, Region } from '@sheet-tables/shared';

/** Clips candidate regions to the sheet bounds and drops the empty ones */
@Injectable()
export class RegionValidatorService {
  private readonly logger = new Logger(RegionValidatorService.name);

  validate(regions: Region[], bounds: GridBounds): Region[] {
    const valid: Region[] = [];
    for (const region of regions) {
      const clipped: Region = {
        ...region,
        startRow: Math.max(region.startRow, bounds.minRow),
        endRow: Math.min(region.endRow, bounds.maxRow),
        startCol: Math.max(region.startCol, bounds.minCol),
        endCol: Math.min(region.endCol, bounds.maxCol),
      };
      if (clipped.startRow > clipped.endRow || clipped.startCol > clipped.endCol) {
        this.logger.debug(
          `Dropped empty ${region.detectionMethod} region rows ${region.startRow}..${region.endRow}, ` +
          `cols ${region.startCol}..${region.endCol}`,
        );
        continue;
      }
      valid.push(clipped);
    }
    return valid;
  }
}
