import type { CellValue } from '../types/cell-types';
import { ROW_PATTERN_THRESHOLDS } from '../constants/thresholds';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const ISO_DATE_PATTERN = /\b\d{4}-\d{2}-\d{2}\b/;
const MONTH_N_PATTERN = /\bmonth\s+\d+\b/i;

/**
 * Whether a raw value counts as a populated cell.
 * Null, undefined, and blank strings do not; 0 and false do.
 */
export function isPresentValue(value: unknown): value is Exclude<CellValue, null> {
  if (typeof value === 'string') return value.trim() !== '';
  return typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Check if a string represents a number once common formatting
 * ("1,200", "$35", "12 %") is stripped.
 */
export function isNumericString(value: string): boolean {
  const cleaned = value.replace(/[,$%\s]/g, '');
  return cleaned !== '' && NUMBER_PATTERN.test(cleaned);
}

/** Numbers and numeric-looking strings; booleans are never numeric */
export function isNumericLike(value: CellValue): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') return isNumericString(value);
  return false;
}

/** Strict numeric check used for numeric cell counts */
export function isNumberValue(value: CellValue): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Non-numeric text long enough to read as a column label */
export function isTextLabel(value: CellValue): boolean {
  return (
    typeof value === 'string' &&
    value.length > ROW_PATTERN_THRESHOLDS.MIN_LABEL_LENGTH &&
    !isNumericString(value)
  );
}

/** ISO dates (2025-05-31) and "Month N" column headers */
export function isTemporalValue(value: CellValue): boolean {
  if (value === null) return false;
  const text = String(value);
  return ISO_DATE_PATTERN.test(text) || MONTH_N_PATTERN.test(text);
}

/** Render a value the way it appears in a label */
export function formatLabelValue(value: CellValue): string | null {
  if (!isPresentValue(value)) return null;
  return typeof value === 'string' ? value.trim() : String(value);
}
