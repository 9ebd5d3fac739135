/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
} as const;

/** Defaults for an extraction run */
export const RUN_DEFAULTS = {
  CONFIG_SHEET: 'Config',
  /** Minimum number of columns (key, operator, value) in a config block */
  BLOCK_COLUMNS: 3,
} as const;
