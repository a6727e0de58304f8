/**
 * Convert 1-based column index to Excel letter(s): 1→A, 26→Z, 27→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n > 0) {
    const rem = (n - 1) % 26;
    result = String.fromCharCode(rem + 65) + result;
    n = Math.floor((n - 1) / 26);
  }
  return result;
}

/**
 * Convert Excel column letter(s) to 1-based index: A→1, Z→26, AA→27
 */
export function letterToColIndex(letter: string): number {
  let result = 0;
  for (let i = 0; i < letter.length; i++) {
    result = result * 26 + (letter.charCodeAt(i) - 64);
  }
  return result;
}

/**
 * Parse cell reference like "A1" into { col: 1, row: 1 }; null when malformed
 */
export function tryParseCellRef(ref: string): { col: number; row: number } | null {
  const match = ref.match(/^\$?([A-Z]{1,3})\$?(\d{1,7})$/);
  if (!match?.[1] || !match[2]) return null;
  const row = parseInt(match[2], 10);
  if (row < 1) return null;
  return { col: letterToColIndex(match[1]), row };
}

/**
 * Build cell reference from 1-based col/row: (1, 1) → "A1"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row}`;
}

/** Map key for a grid position */
export function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}
