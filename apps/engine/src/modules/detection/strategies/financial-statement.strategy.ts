import type { DetectionMethod, Grid, GridBounds, Region } from '@sheet-tables/shared';
import {
  FINANCIAL_TERMS,
  FINANCIAL_THRESHOLDS,
  populatedColumns,
  populatedRows,
  rowCellsInRange,
} from '@sheet-tables/shared';
import type { DetectionStrategy } from './detection-strategy';
import { sectionHeaderText, textOf } from './row-patterns';

/**
 * Balance sheets and income statements: section headers ("Current Assets")
 * interleaved with labelled data rows. The whole populated block is one table.
 */
export class FinancialStatementStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'financial_statement';

  detect(grid: Grid, bounds: GridBounds): Region[] {
    const rows = populatedRows(grid, bounds);
    const sections: string[] = [];
    let dataRows = 0;

    for (const row of rows) {
      const section = sectionHeaderText(grid, row, bounds);
      if (section !== null) {
        sections.push(section);
        continue;
      }
      if (this.isLabelledDataRow(grid, row, bounds)) dataRows++;
    }

    if (
      sections.length < FINANCIAL_THRESHOLDS.MIN_SECTION_HEADERS ||
      dataRows < FINANCIAL_THRESHOLDS.MIN_DATA_ROWS
    ) {
      return [];
    }

    const matched = sections.filter((s) => containsFinancialTerm(s)).length;
    if (matched / sections.length < FINANCIAL_THRESHOLDS.MIN_VOCABULARY_RATIO) return [];

    const firstRow = rows[0];
    const lastRow = rows[rows.length - 1];
    if (firstRow === undefined || lastRow === undefined) return [];

    const cols = populatedColumns(grid, firstRow, lastRow, bounds.minCol, bounds.maxCol);
    return [
      {
        startRow: firstRow,
        endRow: lastRow,
        startCol: cols[0] ?? bounds.minCol,
        endCol: cols[cols.length - 1] ?? bounds.maxCol,
        detectionMethod: this.method,
      },
    ];
  }

  /** Text label in the first column followed by several values */
  private isLabelledDataRow(grid: Grid, row: number, bounds: GridBounds): boolean {
    const cells = rowCellsInRange(grid, row, bounds.minCol, bounds.maxCol);
    const first = cells[0];
    if (first === undefined || first.col !== bounds.minCol || textOf(first.value) === null) {
      return false;
    }
    return cells.length - 1 > FINANCIAL_THRESHOLDS.MIN_DATA_ROW_VALUES;
  }
}

export function containsFinancialTerm(text: string): boolean {
  const lower = text.toLowerCase();
  return FINANCIAL_TERMS.some((term) => lower.includes(term));
}
