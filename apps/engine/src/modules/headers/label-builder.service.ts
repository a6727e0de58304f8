import { Injectable } from '@nestjs/common';
import type { CellValue, FrozenPanes, Grid, HeaderInfo } from '@sheet-tables/shared';
import { NO_FROZEN_PANES, UNLABELED, formatLabelValue, getValue } from '@sheet-tables/shared';

const LEVEL_SEPARATOR = ' ';
const HEADER_SEPARATOR = ' | ';

/**
 * Builds column and row labels from resolved headers.
 *
 * Verbose labels put the most granular header first ("Jan 2023");
 * compact labels keep top-to-bottom order joined with " | ".
 */
@Injectable()
export class LabelBuilderService {
  /** Header row values of a column, top to bottom */
  columnPath(grid: Grid, col: number, headers: HeaderInfo): string[] {
    return collect(headers.headerRows.map((row) => getValue(grid, row, col)));
  }

  /** Header column values of a row, left to right */
  rowPath(grid: Grid, row: number, headers: HeaderInfo): string[] {
    return collect(headers.headerColumns.map((col) => getValue(grid, row, col)));
  }

  columnLabel(grid: Grid, col: number, headers: HeaderInfo): string {
    return orUnlabeled(this.columnPath(grid, col, headers).reverse().join(LEVEL_SEPARATOR));
  }

  /**
   * Under a frozen multi-row header block every data row shares the header
   * column's full label path; otherwise the header column is read on `row`.
   */
  rowLabel(
    grid: Grid,
    row: number,
    headers: HeaderInfo,
    frozen: FrozenPanes = NO_FROZEN_PANES,
  ): string {
    const spansHeaderBlock =
      frozen.frozenRows > 0 && headers.headerRows.length > 1 && row >= headers.dataStartRow;

    const parts = headers.headerColumns.map((col) => {
      if (!spansHeaderBlock) return formatLabelValue(getValue(grid, row, col)) ?? '';
      const levels = collect(headers.headerRows.map((headerRow) => getValue(grid, headerRow, col)));
      return levels.reverse().join(LEVEL_SEPARATOR);
    });

    return orUnlabeled(parts.filter((p) => p !== '').join(HEADER_SEPARATOR));
  }

  compactColumnLabel(grid: Grid, col: number, headers: HeaderInfo): string {
    return orUnlabeled(this.columnPath(grid, col, headers).join(HEADER_SEPARATOR));
  }

  compactRowLabel(grid: Grid, row: number, headers: HeaderInfo): string {
    return orUnlabeled(this.rowPath(grid, row, headers).join(HEADER_SEPARATOR));
  }
}

function collect(values: CellValue[]): string[] {
  const parts: string[] = [];
  for (const value of values) {
    const text = formatLabelValue(value);
    if (text !== null) parts.push(text);
  }
  return parts;
}

function orUnlabeled(label: string): string {
  return label === '' ? UNLABELED : label;
}
