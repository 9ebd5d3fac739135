import { describe, it, expect } from 'vitest';
import { buildSourceWorkbook, SOURCE_TABLE } from '../../../test-utils/fixtures';
import { Workbook } from '../../workbook/workbook.model';
import { CellMatchService } from '../cell-match.service';
import { Comparator } from '../comparator';
import { createCellMatch, createRangeMatch } from '../match.schema';
import { MatchService } from '../match.service';
import { RangeMatchService } from '../range-match.service';

const cellMatch = new CellMatchService();
const service = new RangeMatchService(cellMatch);
const report1 = new Comparator('equal', 'Report 1');
const valueCell = (name: string, value: Comparator) => createCellMatch({ name, value });

describe('RangeMatchService by reference', () => {
  it('resolves a block', () => {
    const m = createRangeMatch({ name: 'T', reference: "'Report 1'!B5:F9" });
    const result = service.match(m, buildSourceWorkbook());
    expect(result?.range.getValues()).toEqual(SOURCE_TABLE);
    expect(result?.captured).toBeUndefined();
  });

  it('accepts a single cell', () => {
    const m = createRangeMatch({ name: 'T', sheet: report1, reference: 'B3' });
    expect(service.match(m, buildSourceWorkbook())?.range.isCell).toBe(true);
  });

  it('resolves names and tables with their alias', () => {
    const workbook = buildSourceWorkbook();
    const named = service.match(createRangeMatch({ name: 'T', reference: 'PROFIT_RANGE' }), workbook);
    expect(named?.range.getValues()).toEqual([[1.5, 6, 11, 4.6]]);
    expect(named?.range.alias?.kind).toBe('defined-name');

    const table = service.match(createRangeMatch({ name: 'T', reference: 'RegionTable' }), workbook);
    expect(table?.range.rows).toBe(3);
    expect(table?.range.alias?.kind).toBe('named-table');
  });

  it('misses unknown references', () => {
    expect(service.match(createRangeMatch({ name: 'T', reference: 'NOPE' }), buildSourceWorkbook())).toBeNull();
  });
});

describe('RangeMatchService by start and end cell', () => {
  it('spans the two cells in either order', () => {
    const m = createRangeMatch({
      name: 'T',
      sheet: report1,
      startCell: valueCell('Start', new Comparator('equal', 'Gamma')),
      endCell: valueCell('End', new Comparator('equal', 'Jan')),
    });
    const result = service.match(m, buildSourceWorkbook());
    expect(result?.range.getReference({ useSheet: false })).toBe('$B$5:$C$9');
    expect(result?.captured).toBe('Gamma');
  });

  it('misses when either end is missing', () => {
    const m = createRangeMatch({
      name: 'T',
      sheet: report1,
      startCell: valueCell('Start', new Comparator('equal', 'Jan')),
      endCell: valueCell('End', new Comparator('equal', 'Dec')),
    });
    expect(service.match(m, buildSourceWorkbook())).toBeNull();
  });

  it('misses when the ends are on different sheets', () => {
    const m = createRangeMatch({
      name: 'T',
      startCell: createCellMatch({ name: 'Start', reference: "'Report 1'!B5" }),
      endCell: createCellMatch({ name: 'End', reference: "'Report 2'!C4" }),
    });
    expect(service.match(m, buildSourceWorkbook())).toBeNull();
  });
});

describe('RangeMatchService by start cell and dimensions', () => {
  it('anchors the block at the start cell', () => {
    const m = createRangeMatch({
      name: 'T',
      sheet: report1,
      startCell: valueCell('Start', new Comparator('equal', 'Beta')),
      rows: 2,
      cols: 3,
    });
    expect(service.match(m, buildSourceWorkbook())?.range.getValues()).toEqual([
      ['Beta', 2, 7],
      ['Delta', 2.5, 8],
    ]);
  });

  it('misses when the start cell is missing', () => {
    const m = createRangeMatch({
      name: 'T',
      sheet: report1,
      startCell: valueCell('Start', new Comparator('equal', 'Omega')),
      rows: 2,
      cols: 2,
    });
    expect(service.match(m, buildSourceWorkbook())).toBeNull();
  });
});

describe('RangeMatchService contiguous', () => {
  it('grows a 5×5 table from a blank corner', () => {
    const m = createRangeMatch({
      name: 'T',
      sheet: report1,
      startCell: createCellMatch({ name: 'Corner', value: new Comparator('equal', 'Jan'), colOffset: -1 }),
    });
    const result = service.match(m, buildSourceWorkbook());
    expect(result?.range.getReference({ useSheet: false })).toBe('$B$5:$F$9');
    expect(result?.range.getValues()).toEqual(SOURCE_TABLE);
    expect(result?.captured).toBe('Jan');
  });

  it('stops at the first blank and reads nothing past it', () => {
    const workbook = new Workbook();
    const sheet = workbook.addSheet('S');
    sheet.setValues(1, 1, [
      [null, 'Jan', 'Feb', '', 'Apr'],
      ['Alpha', 1, 2, 3, 4],
      [null, 5, 6, 7, 8],
      ['Gamma', 9, 10, 11, 12],
    ]);
    const m = createRangeMatch({ name: 'T', startCell: createCellMatch({ name: 'A', reference: 'S!A1' }) });
    expect(service.match(m, workbook)?.range.getReference({ useSheet: false })).toBe('$A$1:$C$2');
  });

  it('keeps growing over zero and false', () => {
    const workbook = new Workbook();
    const sheet = workbook.addSheet('S');
    sheet.setValues(1, 1, [
      ['Key', 0, false],
      [0, 1, 2],
      [false, 3, 4],
    ]);
    const m = createRangeMatch({ name: 'T', startCell: createCellMatch({ name: 'A', reference: 'S!A1' }) });
    expect(service.match(m, workbook)?.range.getReference({ useSheet: false })).toBe('$A$1:$C$3');
  });

  it('yields a single cell when nothing follows the anchor', () => {
    const workbook = buildSourceWorkbook();
    const m = createRangeMatch({ name: 'T', startCell: createCellMatch({ name: 'A', reference: "'Report 1'!A1" }) });
    expect(service.match(m, workbook)?.range.isCell).toBe(true);
  });
});

describe('MatchService', () => {
  it('dispatches on the match kind', () => {
    const matches = new MatchService(cellMatch, service);
    const workbook = buildSourceWorkbook();
    expect(matches.match(createCellMatch({ name: 'C', reference: 'DATE_CELL' }), workbook)?.range.isCell).toBe(true);
    expect(matches.match(createRangeMatch({ name: 'R', reference: 'PROFIT_RANGE' }), workbook)?.range.columns).toBe(4);
  });
});
