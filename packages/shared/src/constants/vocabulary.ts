/** Terms that mark a section header as belonging to a financial statement */
export const FINANCIAL_TERMS = [
  'assets',
  'liabilities',
  'equity',
  'revenue',
  'expenses',
  'income',
  'cash',
  'receivable',
  'payable',
  'inventory',
  'property',
  'debt',
  'retained',
  'earnings',
  'capital',
  'current',
  'non-current',
  'total',
] as const;

export const MONTH_ABBREVIATIONS = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
] as const;
