import type { CellValue } from '@sheetlift/shared';
import { Workbook } from '../modules/workbook/workbook.model';

export const REPORT_DATE = new Date(Date.UTC(2021, 4, 1));

export const SOURCE_TABLE: CellValue[][] = [
  [null, 'Jan', 'Feb', 'Mar', 'Apr'],
  ['Alpha', 1.5, 6, 11, 4.6],
  ['Beta', 2, 7, 12, 4.7],
  ['Delta', 2.5, 8, 13, 4.8],
  ['Gamma', 3, 9, 14, 4.9],
];

export const SUMMARY_TABLE: CellValue[][] = [
  [null, 'Alpha', 'Delta', 'Beta'],
  ['Profit', null, null, null],
  ['Loss', null, null, null],
];

/**
 * Source workbook: sheet `Report 1` with a heading row at B3:C3 and a
 * 5×5 table at B5:F9; sheet `Report 2` with a table of its own.
 */
export function buildSourceWorkbook(): Workbook {
  const workbook = new Workbook();
  const report = workbook.addSheet('Report 1');
  report.setValue(3, 2, 'Date');
  report.setValue(3, 3, REPORT_DATE);
  report.setValues(5, 2, SOURCE_TABLE);

  const other = workbook.addSheet('Report 2');
  other.setValues(2, 2, [
    ['Region', 'Total'],
    ['North', 10],
    ['South', 20],
  ]);
  other.addTable('RegionTable', 'B2:C4');

  workbook.defineName('DATE_CELL', "'Report 1'!$C$3");
  workbook.defineName('PROFIT_RANGE', "'Report 1'!$C$6:$F$6");
  return workbook;
}

/**
 * Target workbook: sheet `Summary` with a date slot at C3, a 3×4 table at
 * B7:E9 and an `Area` marker two rows below it at B11.
 */
export function buildTargetWorkbook(): Workbook {
  const workbook = new Workbook();
  const summary = workbook.addSheet('Summary');
  summary.setValue(3, 2, 'Date');
  summary.setValues(7, 2, SUMMARY_TABLE);
  summary.setValue(11, 2, 'Area');
  return workbook;
}
