import type { Operator } from '../types/match-types';

/** Operator words accepted in the operator column of a config sheet */
export const OPERATOR_ALIASES: ReadonlyMap<string, Operator> = new Map<string, Operator>([
  ['is', 'equal'],
  ['=', 'equal'],
  ['==', 'equal'],
  ['is not', 'not-equal'],
  ['!=', 'not-equal'],
  ['matches', 'regex'],
  ['regex', 'regex'],
  ['<', 'less'],
  ['<=', 'less-equal'],
  ['>', 'greater'],
  ['>=', 'greater-equal'],
  ['is empty', 'empty'],
  ['empty', 'empty'],
  ['is not empty', 'not-empty'],
  ['not empty', 'not-empty'],
]);

/** Keys that open a block outside any match */
export const GLOBAL_KEYS = {
  DIRECTORY: 'directory',
  FILE: 'file',
} as const;

/** Keys used by any match block */
export const MATCH_KEYS = {
  NAME: 'name',
  SHEET: 'sheet',
  REFERENCE: 'reference',
  TARGET: 'target',
  EXPAND: 'expand',
  ALIGN: 'align',
} as const;

/** Keys specific to cell matches */
export const CELL_MATCH_KEYS = {
  VALUE: 'value',
  MIN_ROW: 'min row',
  MAX_ROW: 'max row',
  MIN_COL: 'min column',
  MAX_COL: 'max column',
  ROW_OFFSET: 'row offset',
  COL_OFFSET: 'column offset',
} as const;

/** Keys specific to range matches */
export const RANGE_MATCH_KEYS = {
  ROWS: 'rows',
  COLS: 'columns',
} as const;

/**
 * Prefixes for nested cell matches. Longest first: `target row value` must
 * not be read as the `target` prefix.
 */
export const CELL_MATCH_PREFIXES = {
  SOURCE_ROW: 'source row',
  SOURCE_COL: 'source column',
  TARGET_ROW: 'target row',
  TARGET_COL: 'target column',
  START: 'start',
  END: 'end',
  TARGET: 'target',
} as const;

export type CellMatchPrefix = (typeof CELL_MATCH_PREFIXES)[keyof typeof CELL_MATCH_PREFIXES];

/** Keys that start a block in the config sheet */
export const BLOCK_START_KEYS = [GLOBAL_KEYS.DIRECTORY, GLOBAL_KEYS.FILE, MATCH_KEYS.NAME] as const;
