import { describe, it, expect } from 'vitest';
import { Workbook } from '../workbook.model';

function grid(): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addSheet('Data');
  sheet.setValues(1, 1, [
    ['a1', 'b1', 'c1'],
    ['a2', 'b2', 'c2'],
    ['a3', 'b3', 'c3'],
  ]);
  return workbook;
}

describe('Workbook', () => {
  it('looks sheets up by title, ignoring case', () => {
    const workbook = grid();
    expect(workbook.getSheet('data')?.title).toBe('Data');
    expect(workbook.getSheet('Other')).toBeUndefined();
  });

  it('rejects duplicate sheet titles', () => {
    const workbook = grid();
    expect(() => workbook.addSheet('DATA')).toThrow('Sheet DATA already exists');
  });

  it('keeps global and local names apart', () => {
    const workbook = grid();
    const sheet = workbook.sheets[0];
    if (!sheet) throw new Error('missing sheet');
    workbook.defineName('Total', 'Data!$C$3');
    workbook.defineName('Total', '$A$1', sheet);

    expect(workbook.getDefinedName('total')?.reference).toBe('Data!$C$3');
    expect(workbook.getDefinedName('TOTAL', sheet)?.reference).toBe('$A$1');
  });

  it('finds tables on a given sheet or any sheet', () => {
    const workbook = grid();
    const other = workbook.addSheet('Other');
    other.addTable('Sales', 'A1:B2');

    expect(workbook.findTable('sales')?.sheet).toBe(other);
    expect(workbook.findTable('Sales', workbook.sheets[0])).toBeUndefined();
    expect(() => other.addTable('SALES', 'C1:D2')).toThrow('Table SALES already exists');
  });
});

describe('Worksheet', () => {
  it('reports the used extent', () => {
    const sheet = grid().sheets[0];
    expect(sheet?.maxRow).toBe(3);
    expect(sheet?.maxColumn).toBe(3);
  });

  it('treats an empty sheet as one cell', () => {
    const sheet = new Workbook().addSheet('Empty');
    expect(sheet.maxRow).toBe(1);
    expect(sheet.maxColumn).toBe(1);
  });

  it('exposes live cell handles', () => {
    const sheet = new Workbook().addSheet('S');
    const cell = sheet.cell(2, 3);
    expect(cell.coordinate).toBe('C2');
    expect(cell.value).toBeNull();
    cell.value = 42;
    expect(sheet.getValue(2, 3)).toBe(42);
  });

  it('rejects coordinates outside the grid', () => {
    const sheet = new Workbook().addSheet('S');
    expect(() => sheet.cell(0, 1)).toThrow(RangeError);
  });

  it('drops the formula when a plain value is written', () => {
    const sheet = new Workbook().addSheet('S');
    sheet.setFormula(1, 1, '=SUM(B1:B2)', 3);
    expect(sheet.getFormula(1, 1)).toBe('SUM(B1:B2)');
    expect(sheet.getValue(1, 1)).toBe(3);

    sheet.setValue(1, 1, 4);
    expect(sheet.getFormula(1, 1)).toBeUndefined();
  });

  it('inserts rows and shifts the rows below', () => {
    const sheet = grid().sheets[0];
    sheet?.insertRows(2, 2);
    expect(sheet?.getValue(1, 1)).toBe('a1');
    expect(sheet?.getValue(2, 1)).toBeNull();
    expect(sheet?.getValue(3, 1)).toBeNull();
    expect(sheet?.getValue(4, 1)).toBe('a2');
    expect(sheet?.getValue(5, 3)).toBe('c3');
  });

  it('deletes rows and shifts the rows below up', () => {
    const sheet = grid().sheets[0];
    sheet?.deleteRows(1, 2);
    expect(sheet?.getValue(1, 2)).toBe('b3');
    expect(sheet?.maxRow).toBe(1);
  });

  it('inserts and deletes columns', () => {
    const sheet = grid().sheets[0];
    sheet?.insertColumns(2, 1);
    expect(sheet?.getValue(1, 2)).toBeNull();
    expect(sheet?.getValue(1, 3)).toBe('b1');
    expect(sheet?.getValue(1, 4)).toBe('c1');

    sheet?.deleteColumns(1, 2);
    expect(sheet?.getValue(1, 1)).toBe('b1');
    expect(sheet?.getValue(3, 2)).toBe('c3');
    expect(sheet?.maxColumn).toBe(2);
  });

  it('keeps a cell format while its value changes', () => {
    const sheet = new Workbook().addSheet('S');
    sheet.setFormat(2, 2, { bold: true, numberFormat: '0.00' });
    expect(sheet.getValue(2, 2)).toBeNull();
    expect(sheet.maxRow).toBe(1);

    sheet.setValue(2, 2, 4);
    sheet.setValue(2, 2, null);
    expect(sheet.getFormat(2, 2)).toEqual({ bold: true, numberFormat: '0.00' });

    sheet.insertRows(1, 1);
    expect(sheet.getFormat(2, 2)).toBeUndefined();
    expect(sheet.getFormat(3, 2)).toEqual({ bold: true, numberFormat: '0.00' });
  });

  it('moves tables, names, merges and widths with inserted rows and columns', () => {
    const workbook = grid();
    const sheet = workbook.sheets[0];
    if (!sheet) throw new Error('missing sheet');
    sheet.addTable('Head', 'A1:C1');
    sheet.addTable('Body', 'A2:C3');
    workbook.addSheet('Other');
    workbook.defineName('Corner', 'Data!$C$3');
    workbook.defineName('Elsewhere', 'Other!$C$3');
    workbook.defineName('Start', '$A$2', sheet);
    sheet.mergeCells({ minRow: 2, minCol: 1, maxRow: 2, maxCol: 2 });
    sheet.setColumnWidth(2, 30);

    sheet.insertRows(2, 1);
    expect(sheet.getTable('Head')?.reference).toBe('A1:C1');
    expect(sheet.getTable('Body')?.reference).toBe('A3:C4');
    expect(workbook.getDefinedName('Corner')?.reference).toBe('Data!$C$4');
    expect(workbook.getDefinedName('Elsewhere')?.reference).toBe('Other!$C$3');
    expect(workbook.getDefinedName('Start', sheet)?.reference).toBe('$A$3');
    expect(sheet.listMerges()).toEqual([{ minRow: 3, minCol: 1, maxRow: 3, maxCol: 2 }]);

    sheet.insertColumns(1, 2);
    expect(sheet.getTable('Body')?.reference).toBe('C3:E4');
    expect(sheet.getColumnWidth(4)).toBe(30);
    expect(sheet.getColumnWidth(2)).toBeUndefined();
  });

  it('drops what lies inside deleted rows and shrinks what overlaps them', () => {
    const workbook = grid();
    const sheet = workbook.sheets[0];
    if (!sheet) throw new Error('missing sheet');
    sheet.addTable('Body', 'A1:C3');
    workbook.defineName('Middle', 'Data!$A$2:$C$2');
    workbook.defineName('Last', 'Data!$B$3');
    sheet.mergeCells({ minRow: 2, minCol: 1, maxRow: 3, maxCol: 1 });

    sheet.deleteRows(2, 1);
    expect(sheet.getTable('Body')?.reference).toBe('A1:C2');
    expect(workbook.getDefinedName('Middle')).toBeUndefined();
    expect(workbook.getDefinedName('Last')?.reference).toBe('Data!$B$2');
    expect(sheet.listMerges()).toEqual([]);
  });

  it('iterates a block row by row', () => {
    const sheet = grid().sheets[0];
    const rows = sheet?.iterRows({ minRow: 2, minCol: 2, maxRow: 3, maxCol: 3 }) ?? [];
    expect(rows.map((line) => line.map((c) => c.value))).toEqual([
      ['b2', 'c2'],
      ['b3', 'c3'],
    ]);
  });
});
