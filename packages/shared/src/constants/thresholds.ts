/** Blank-row gap sizes (counted in blank rows between two populated rows) */
export const GAP_THRESHOLDS = {
  /** A gap this large always separates two tables */
  HARD_BOUNDARY_ROWS: 4,
  /** Smallest gap the blank-row strategy inspects */
  SOFT_BOUNDARY_MIN_ROWS: 1,
  /** Blank rows that end a temporal table */
  TEMPORAL_TABLE_END_ROWS: 2,
  /** Blank rows that end a multi-row-header table */
  MULTIROW_TABLE_END_ROWS: 3,
  /** Default for the opt-in gaps strategy */
  DEFAULT_GAP_THRESHOLD: 3,
  /** Default for the compact pipeline's splitter */
  DEFAULT_COMPACT_GAP_THRESHOLD: 2,
} as const;

/** Row-pattern comparison used around small blank-row gaps */
export const ROW_PATTERN_THRESHOLDS = {
  MAX_COL_COUNT_DELTA: 2,
  /** Text cells must be longer than this to count as labels */
  MIN_LABEL_LENGTH: 3,
  /** A row "has text labels" with more labels than this */
  MIN_TEXT_LABELS: 2,
  MIN_BLANK_ROW_DATA_ROWS: 4,
} as const;

/** Financial-statement layout detection */
export const FINANCIAL_THRESHOLDS = {
  MIN_SECTION_HEADERS: 2,
  MIN_DATA_ROWS: 3,
  /** Data rows need more than this many populated cells beside the label */
  MIN_DATA_ROW_VALUES: 2,
  MIN_VOCABULARY_RATIO: 0.6,
} as const;

/** Temporal header detection */
export const TEMPORAL_THRESHOLDS = {
  SCAN_ROWS: 5,
  MIN_TEMPORAL_RATIO: 0.25,
} as const;

/** Column-shape continuity */
export const CONTINUITY_THRESHOLDS = {
  MIN_DATA_ROWS: 3,
  MAX_COL_COUNT_DELTA: 5,
  MAX_NUMERIC_RATIO_DELTA: 0.4,
  MAX_SPAN_DELTA: 10,
  MAX_DENSITY_DELTA: 0.3,
} as const;

/** Multi-row header blocks */
export const MULTIROW_THRESHOLDS = {
  /** Header blocks are searched in the first rows only (start + 10) */
  SCAN_ROWS: 10,
  MIN_BLOCK_ROWS: 2,
  MIN_HEADER_COLUMNS: 3,
  /** Rows inspected when deciding whether a new header block starts */
  LOOKAHEAD_ROWS: 3,
} as const;

/** Whole-sheet content structure fallback */
export const CONTENT_STRUCTURE_THRESHOLDS = {
  MIN_ROWS: 3,
  MIN_COLS: 2,
} as const;

/** Compact title detection */
export const TITLE_THRESHOLDS = {
  MIN_LENGTH: 3,
  MAX_LENGTH: 100,
} as const;

/** Label rendered when a header position has no value */
export const UNLABELED = 'unlabeled';
