import { describe, it, expect } from 'vitest';
import { OPERATOR_ALIASES, BLOCK_START_KEYS, CELL_MATCH_PREFIXES } from '../config-keys';
import { SHEET_LIMITS, RUN_DEFAULTS } from '../limits';

describe('OPERATOR_ALIASES', () => {
  it('maps equality words', () => {
    expect(OPERATOR_ALIASES.get('is')).toBe('equal');
    expect(OPERATOR_ALIASES.get('==')).toBe('equal');
    expect(OPERATOR_ALIASES.get('is not')).toBe('not-equal');
  });

  it('maps emptiness words', () => {
    expect(OPERATOR_ALIASES.get('empty')).toBe('empty');
    expect(OPERATOR_ALIASES.get('not empty')).toBe('not-empty');
  });

  it('maps regex words', () => {
    expect(OPERATOR_ALIASES.get('matches')).toBe('regex');
    expect(OPERATOR_ALIASES.get('regex')).toBe('regex');
  });

  it('does not treat object members as operator words', () => {
    expect(OPERATOR_ALIASES.get('constructor')).toBeUndefined();
    expect(OPERATOR_ALIASES.get('__proto__')).toBeUndefined();
  });
});

describe('BLOCK_START_KEYS', () => {
  it('opens blocks on directory, file and name', () => {
    expect(BLOCK_START_KEYS).toEqual(['directory', 'file', 'name']);
  });
});

describe('CELL_MATCH_PREFIXES', () => {
  it('lists longer prefixes before the bare target prefix', () => {
    const prefixes = Object.values(CELL_MATCH_PREFIXES);
    expect(prefixes.indexOf('target row')).toBeLessThan(prefixes.indexOf('target'));
    expect(prefixes.indexOf('target column')).toBeLessThan(prefixes.indexOf('target'));
  });
});

describe('limits', () => {
  it('has Excel-compatible sheet limits', () => {
    expect(SHEET_LIMITS.MAX_ROWS).toBe(1_048_576);
    expect(SHEET_LIMITS.MAX_COLS).toBe(16_384);
  });

  it('reads the Config sheet by default', () => {
    expect(RUN_DEFAULTS.CONFIG_SHEET).toBe('Config');
  });
});
