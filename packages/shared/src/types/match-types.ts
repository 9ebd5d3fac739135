/** Comparator operators */
export const OPERATORS = [
  'equal',
  'not-equal',
  'greater',
  'greater-equal',
  'less',
  'less-equal',
  'empty',
  'not-empty',
  'regex',
] as const;
export type Operator = (typeof OPERATORS)[number];

/** Optional search box for a value scan; open ends default to the sheet extent */
export interface SearchBounds {
  minRow?: number;
  minCol?: number;
  maxRow?: number;
  maxCol?: number;
}

/** One entry in the run history */
export interface ActionRecord {
  name: string;
  success: boolean;
  message: string;
}
