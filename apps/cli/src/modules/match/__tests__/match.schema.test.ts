import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../common/errors';
import { Comparator } from '../comparator';
import { createCellMatch, createRangeMatch } from '../match.schema';

const report = new Comparator('equal', 'Report 1');

describe('createCellMatch', () => {
  it('builds a reference match with zero offsets', () => {
    const m = createCellMatch({ name: 'Date', reference: " 'Report 1'!B3 " });
    expect(m.kind).toBe('cell');
    expect(m.locator).toEqual({ by: 'reference', reference: "'Report 1'!B3" });
    expect(m.rowOffset).toBe(0);
    expect(m.colOffset).toBe(0);
  });

  it('builds a value match with bounds', () => {
    const value = new Comparator('equal', 'Date');
    const m = createCellMatch({ name: 'Date', sheet: report, value, minRow: 3, maxCol: 4 });
    expect(m.locator).toEqual({ by: 'value', value });
    expect(m.sheet).toBe(report);
    expect(m.bounds).toEqual({ minRow: 3, minCol: undefined, maxRow: undefined, maxCol: 4 });
  });

  it('requires exactly one of reference or value', () => {
    expect(() => createCellMatch({ name: 'None' })).toThrow(ConfigurationError);
    expect(() =>
      createCellMatch({ name: 'Both', reference: 'A1', value: new Comparator('not-empty') }),
    ).toThrow('Exactly one of reference or value must be set');
  });

  it('rejects inverted or non-positive bounds', () => {
    const value = new Comparator('not-empty');
    expect(() => createCellMatch({ name: 'Rows', value, minRow: 5, maxRow: 2 })).toThrow(
      'maxRow: max row must be >= min row',
    );
    expect(() => createCellMatch({ name: 'Zero', value, minCol: 0 })).toThrow(ConfigurationError);
  });

  it('lists every issue on the error', () => {
    try {
      createCellMatch({ name: 'Bad', minRow: 3, maxRow: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues.map((i) => i.path)).toEqual(['reference', 'maxRow']);
      }
    }
  });
});

describe('createRangeMatch', () => {
  const start = createCellMatch({ name: 'Start', value: new Comparator('equal', 'Jan') });
  const end = createCellMatch({ name: 'End', value: new Comparator('equal', 'Apr') });

  it('derives the size from the options', () => {
    expect(createRangeMatch({ name: 'R', reference: 'B5:F9' }).extent.size).toBe('reference');
    expect(createRangeMatch({ name: 'R', startCell: start, endCell: end }).extent.size).toBe('end-cell');
    expect(createRangeMatch({ name: 'R', startCell: start, rows: 2, cols: 3 }).extent.size).toBe('fixed');
    expect(createRangeMatch({ name: 'R', startCell: start }).extent.size).toBe('contiguous');
  });

  it('copies its sheet into nested cells as new values', () => {
    const m = createRangeMatch({ name: 'R', sheet: report, startCell: start, endCell: end });
    if (m.extent.size !== 'end-cell') throw new Error('expected end-cell');
    expect(m.extent.start.sheet).toBe(report);
    expect(m.extent.end.sheet).toBe(report);
    expect(start.sheet).toBeUndefined();
    expect(m.extent.start).not.toBe(start);
  });

  it('keeps a nested cell sheet that is already set', () => {
    const other = new Comparator('equal', 'Report 2');
    const own = createCellMatch({ name: 'Own', sheet: other, value: new Comparator('equal', 'x') });
    const m = createRangeMatch({ name: 'R', sheet: report, startCell: own });
    if (m.extent.size !== 'contiguous') throw new Error('expected contiguous');
    expect(m.extent.start).toBe(own);
  });

  it('rejects conflicting extents', () => {
    expect(() => createRangeMatch({ name: 'R' })).toThrow(ConfigurationError);
    expect(() => createRangeMatch({ name: 'R', reference: 'A1', startCell: start })).toThrow(
      'Exactly one of reference or start cell must be set',
    );
    expect(() => createRangeMatch({ name: 'R', startCell: start, endCell: end, rows: 1, cols: 1 })).toThrow(
      'Give either an end cell or dimensions, not both',
    );
    expect(() => createRangeMatch({ name: 'R', startCell: start, rows: 2 })).toThrow(
      'Rows and columns must be given together',
    );
    expect(() => createRangeMatch({ name: 'R', reference: 'A1', rows: 2, cols: 2 })).toThrow(
      'An end cell or dimensions need a start cell',
    );
    expect(() => createRangeMatch({ name: 'R', startCell: start, rows: 0, cols: 2 })).toThrow(ConfigurationError);
  });
});
