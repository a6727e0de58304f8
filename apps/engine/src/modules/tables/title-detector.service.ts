import { Injectable } from '@nestjs/common';
import type { Grid, Region } from '@sheet-tables/shared';
import { MONTH_ABBREVIATIONS, TITLE_THRESHOLDS, rowCellsInRange } from '@sheet-tables/shared';

export interface TitleDetection {
  region: Region;
  title?: string;
}

const LETTER = /\p{L}/u;
const ONLY_DIGITS_OR_PUNCTUATION = /^[\d\s\p{P}\p{S}]+$/u;
const YEAR_TOKEN = /\b(19|20)\d{2}\b/;
const MONTH_TOKEN = new RegExp(`\\b(${MONTH_ABBREVIATIONS.join('|')})\\b`, 'i');

/**
 * Looks for a lone caption just above or on the first row of a region.
 * A caption on the first row is moved out of the data area.
 */
@Injectable()
export class TitleDetectorService {
  detect(grid: Grid, region: Region): TitleDetection {
    for (const row of [region.startRow - 1, region.startRow]) {
      if (row < grid.bounds.minRow) continue;

      const title = this.titleAt(grid, row, region);
      if (title === null) continue;

      if (row < region.startRow) return { region, title };
      // A one-row region keeps its only row as data
      if (region.startRow >= region.endRow) continue;
      return { region: { ...region, startRow: region.startRow + 1 }, title };
    }
    return { region };
  }

  private titleAt(grid: Grid, row: number, region: Region): string | null {
    const cells = rowCellsInRange(grid, row, region.startCol, region.endCol);
    const cell = cells[0];
    if (cells.length !== 1 || cell === undefined) return null;
    if (cell.col !== region.startCol || cell.kind === 'run' || typeof cell.value !== 'string') {
      return null;
    }
    const text = cell.value.trim();
    return isPlausibleTitle(text) ? text : null;
  }
}

export function isPlausibleTitle(text: string): boolean {
  if (text.length < TITLE_THRESHOLDS.MIN_LENGTH || text.length > TITLE_THRESHOLDS.MAX_LENGTH) {
    return false;
  }
  if (!LETTER.test(text) || ONLY_DIGITS_OR_PUNCTUATION.test(text)) return false;
  return !YEAR_TOKEN.test(text) && !MONTH_TOKEN.test(text);
}
