import { Injectable } from '@nestjs/common';
import type { FrozenPanes, HeaderInfo, Region } from '@sheet-tables/shared';
import { NO_FROZEN_PANES } from '@sheet-tables/shared';

/**
 * Picks header rows and columns for a region. Frozen counts win;
 * otherwise the first row and first column are headers when the region
 * extends past them.
 */
@Injectable()
export class HeaderResolverService {
  resolve(region: Region, frozen: FrozenPanes = NO_FROZEN_PANES): HeaderInfo {
    const headerRows = pickHeaders(region.startRow, region.endRow, frozen.frozenRows);
    const headerColumns = pickHeaders(region.startCol, region.endCol, frozen.frozenCols);

    return {
      headerRows,
      headerColumns,
      dataStartRow: region.startRow + headerRows.length,
      dataStartCol: region.startCol + headerColumns.length,
    };
  }
}

function pickHeaders(start: number, end: number, frozenCount: number): number[] {
  if (frozenCount > 0) {
    const last = Math.min(start + frozenCount - 1, end);
    const headers: number[] = [];
    for (let i = start; i <= last; i++) headers.push(i);
    return headers;
  }
  return end > start ? [start] : [];
}
