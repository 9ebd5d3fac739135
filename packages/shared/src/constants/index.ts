export { SHEET_LIMITS, RUN_DEFAULTS } from './limits';
export {
  OPERATOR_ALIASES,
  GLOBAL_KEYS,
  MATCH_KEYS,
  CELL_MATCH_KEYS,
  RANGE_MATCH_KEYS,
  CELL_MATCH_PREFIXES,
  BLOCK_START_KEYS,
  type CellMatchPrefix,
} from './config-keys';
