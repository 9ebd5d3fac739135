import type { CellBounds, ParsedReference } from '../types/cell-types';
import { SHEET_LIMITS } from '../constants/limits';

const COORDINATE = String.raw`\$?([A-Za-z]{1,3})\$?(\d{1,7})`;
const REFERENCE_PATTERN = new RegExp(
  String.raw`^(?:(?:'((?:[^']|'')+)'|([^'!:]+))!)?` + COORDINATE + String.raw`(?::` + COORDINATE + String.raw`)?$`,
);

/**
 * Convert 1-based column number to Excel letter(s): 1→A, 26→Z, 27→AA
 */
export function columnToLetter(column: number): string {
  let result = '';
  let n = column - 1;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Convert Excel column letter(s) to a 1-based column number: A→1, Z→26, AA→27
 */
export function letterToColumn(letter: string): number {
  const upper = letter.toUpperCase();
  let result = 0;
  for (let i = 0; i < upper.length; i++) {
    result = result * 26 + (upper.charCodeAt(i) - 64);
  }
  return result;
}

/**
 * Parse cell reference like "B3" into { row: 3, col: 2 }
 */
export function parseCellRef(ref: string): { row: number; col: number } {
  const match = ref.match(/^\$?([A-Z]{1,3})\$?(\d{1,7})$/);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid cell reference: ${ref}`);
  }
  return {
    row: parseInt(match[2], 10),
    col: letterToColumn(match[1]),
  };
}

/**
 * Build cell reference from 1-based row/column: (3, 2) → "B3", or "$B$3" when absolute
 */
export function buildCellRef(row: number, col: number, absolute = false): string {
  const marker = absolute ? '$' : '';
  return `${marker}${columnToLetter(col)}${marker}${row}`;
}

/**
 * Quote a sheet title for use in a reference when it is not a plain identifier
 */
export function quoteSheetName(title: string): string {
  if (/^[A-Za-z_][A-Za-z0-9_.]*$/.test(title) && !/^[A-Za-z]{1,3}\d+$/.test(title)) {
    return title;
  }
  return `'${title.replace(/'/g, "''")}'`;
}

/**
 * Parse an A1-style cell or range reference, optionally sheet-qualified:
 * `B3`, `$B$5:$F$9`, `Sheet1!A1`, `'Report 1'!B5:F9`.
 * The corners are normalised so that min ≤ max. Returns null when the text
 * is not a coordinate.
 */
export function parseReference(ref: string): ParsedReference | null {
  const match = ref.trim().match(REFERENCE_PATTERN);
  if (!match?.[3] || !match[4]) return null;

  const quoted = match[1];
  const bare = match[2];
  const startCol = letterToColumn(match[3]);
  const startRow = parseInt(match[4], 10);
  const endCol = match[5] ? letterToColumn(match[5]) : startCol;
  const endRow = match[6] ? parseInt(match[6], 10) : startRow;

  const bounds: ParsedReference = {
    minRow: Math.min(startRow, endRow),
    minCol: Math.min(startCol, endCol),
    maxRow: Math.max(startRow, endRow),
    maxCol: Math.max(startCol, endCol),
  };
  if (!isWithinSheetLimits(bounds)) return null;

  if (quoted !== undefined) {
    bounds.sheetName = quoted.replace(/''/g, "'");
  } else if (bare !== undefined) {
    bounds.sheetName = bare.trim();
  }
  return bounds;
}

/**
 * Render bounds as an A1-style reference, e.g. `'Report 1'!$B$5:$F$9`
 */
export function formatReference(
  bounds: CellBounds,
  options: { sheetName?: string; absolute?: boolean } = {},
): string {
  const { sheetName, absolute = false } = options;
  const prefix = sheetName !== undefined ? `${quoteSheetName(sheetName)}!` : '';
  const start = buildCellRef(bounds.minRow, bounds.minCol, absolute);
  if (bounds.minRow === bounds.maxRow && bounds.minCol === bounds.maxCol) {
    return prefix + start;
  }
  return `${prefix}${start}:${buildCellRef(bounds.maxRow, bounds.maxCol, absolute)}`;
}

/**
 * Check that bounds lie inside the Excel grid
 */
export function isWithinSheetLimits(bounds: CellBounds): boolean {
  return (
    bounds.minRow >= 1 &&
    bounds.minCol >= 1 &&
    bounds.maxRow <= SHEET_LIMITS.MAX_ROWS &&
    bounds.maxCol <= SHEET_LIMITS.MAX_COLS
  );
}
