import type { CellValue, SearchBounds } from '@sheetlift/shared';
import type { Comparator } from './comparator';
import type { Range } from './range';

export type CellLocator =
  | { by: 'reference'; reference: string }
  | { by: 'value'; value: Comparator };

/** Locates exactly one cell */
export interface CellMatch {
  readonly kind: 'cell';
  readonly name: string;
  readonly sheet?: Comparator;
  readonly locator: CellLocator;
  readonly rowOffset: number;
  readonly colOffset: number;
  readonly bounds: Readonly<SearchBounds>;
}

export type RangeExtent =
  | { size: 'reference'; reference: string }
  | { size: 'end-cell'; start: CellMatch; end: CellMatch }
  | { size: 'fixed'; start: CellMatch; rows: number; cols: number }
  | { size: 'contiguous'; start: CellMatch };

/** Locates a rectangular block */
export interface RangeMatch {
  readonly kind: 'range';
  readonly name: string;
  readonly sheet?: Comparator;
  readonly extent: RangeExtent;
}

export type Match = CellMatch | RangeMatch;

export interface MatchResult {
  range: Range;
  /** Value captured by the comparator that found the cell, if any */
  captured: CellValue | undefined;
}

export function isCellMatch(value: unknown): value is CellMatch {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'cell';
}
