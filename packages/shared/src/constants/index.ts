export {
  GAP_THRESHOLDS,
  ROW_PATTERN_THRESHOLDS,
  FINANCIAL_THRESHOLDS,
  TEMPORAL_THRESHOLDS,
  CONTINUITY_THRESHOLDS,
  MULTIROW_THRESHOLDS,
  CONTENT_STRUCTURE_THRESHOLDS,
  TITLE_THRESHOLDS,
  UNLABELED,
} from './thresholds';

export { FINANCIAL_TERMS, MONTH_ABBREVIATIONS } from './vocabulary';
