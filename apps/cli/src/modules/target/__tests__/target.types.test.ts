import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../common/errors';
import { createCellMatch, createRangeMatch } from '../../match/match.schema';
import { createTarget } from '../target.types';

const cell = createCellMatch({ name: 'Cell', reference: 'CellRef' });
const table = createRangeMatch({ name: 'Table', reference: 'TableRef' });
const row = createCellMatch({ name: 'Row', reference: 'C2' });
const col = createCellMatch({ name: 'Col', reference: 'C1' });

describe('createTarget', () => {
  it('builds a cell copy between two cell matches', () => {
    const target = createTarget({ source: cell, target: cell });
    expect(target.shape).toBe('cell');
    expect(target.name).toBe('Cell');
  });

  it('builds a whole-table copy between two range matches', () => {
    const target = createTarget({ name: 'Copy', source: table, target: table, expand: true });
    expect(target).toEqual({ shape: 'table', name: 'Copy', source: table, target: table, expand: true });
  });

  it('triangulates a range source onto a cell target', () => {
    const target = createTarget({ source: table, target: cell, sourceRow: row, sourceCol: col });
    expect(target.shape).toBe('cell');
    if (target.shape === 'cell') {
      expect(target.source).toEqual({ kind: 'triangulated', match: table, row, column: col });
      expect(target.target).toEqual({ kind: 'direct', match: cell });
    }
  });

  it('triangulates a range target from a cell source', () => {
    const target = createTarget({ source: cell, target: table, targetRow: row, targetCol: col });
    expect(target.shape).toBe('cell');
  });

  it('builds a vector copy with one locator per side', () => {
    const target = createTarget({ source: table, target: table, sourceCol: col, targetRow: row, align: true });
    expect(target.shape).toBe('vector');
    if (target.shape === 'vector') {
      expect(target.source.axis).toBe('column');
      expect(target.target.axis).toBe('row');
      expect(target.align).toBe(true);
      expect(target.expand).toBe(false);
    }
  });

  it('rejects a range source onto a cell target without both locators', () => {
    expect(() => createTarget({ source: table, target: cell })).toThrow(
      'Target Table resolves a whole-table source to a single-cell target',
    );
    expect(() => createTarget({ source: table, target: cell, sourceRow: row })).toThrow(ConfigurationError);
  });

  it('rejects a cell source onto a range target without both locators', () => {
    expect(() => createTarget({ source: cell, target: table })).toThrow(ConfigurationError);
  });

  it('rejects a vector on only one side', () => {
    expect(() => createTarget({ source: table, target: table, sourceCol: col })).toThrow(
      'Target Table resolves a column-vector source to a whole-table target',
    );
  });

  it('rejects locators on a cell match', () => {
    expect(() => createTarget({ source: cell, target: cell, sourceRow: row, sourceCol: col })).toThrow(
      'Source row/column locators need a range match, not a cell match',
    );
  });

  it('rejects align without vectors', () => {
    expect(() => createTarget({ source: table, target: table, align: true })).toThrow(ConfigurationError);
    expect(() => createTarget({ source: cell, target: cell, expand: true })).toThrow(ConfigurationError);
  });
});
