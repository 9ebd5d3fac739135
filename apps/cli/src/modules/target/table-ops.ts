import type { CellBounds, CellValue } from '@sheetlift/shared';
import { formatReference, isWithinSheetLimits, labelKey } from '@sheetlift/shared';
import { Range } from '../match/range';
import type { SheetCell } from '../workbook/workbook.model';
import type { Axis } from './target.types';

/** Cell at the intersection of `row`'s row and `column`'s column */
export function triangulate(row: SheetCell, column: SheetCell): SheetCell {
  return row.sheet.cell(row.row, column.column);
}

export function copyValue(source: SheetCell, target: SheetCell): void {
  target.value = source.value;
}

/** The row or column of `range` that passes through `cell` */
export function vectorAt(range: Range, axis: Axis, cell: SheetCell): SheetCell[] {
  if (axis === 'row') {
    return [...(range.cells.find((line) => line[0]?.row === cell.row) ?? [])];
  }
  return range.cells.flatMap((line) => line.filter((c) => c.column === cell.column));
}

/** First row of the range for a row vector, first column for a column vector */
export function labelVector(range: Range, axis: Axis): SheetCell[] {
  const first = range.firstCell;
  return first ? vectorAt(range, axis, first) : [];
}

/**
 * Map each source label to the source value at the same position. Labels
 * are compared with {@link labelKey}; blank labels are skipped and the
 * first occurrence of a label wins.
 */
export function buildLabelLookup(labels: CellValue[], values: CellValue[]): Map<string, CellValue> {
  const lookup = new Map<string, CellValue>();
  labels.forEach((label, idx) => {
    const key = labelKey(label);
    const value = values[idx];
    if (key !== null && value !== undefined && !lookup.has(key)) {
      lookup.set(key, value);
    }
  });
  return lookup;
}

/**
 * Resize a non-empty range to `rows` × `cols` in place on its sheet:
 * rows/columns are inserted after the last row/column or deleted from the
 * end, shifting everything that follows on the sheet. A defined-name or
 * table alias is pointed at the new block.
 *
 * Returns the new Range; `range` and any other Range on the sheet are
 * stale afterwards. Returns null, without touching the sheet, when the
 * block would not fit.
 */
export function resizeRange(range: Range, rows: number, cols: number): Range | null {
  const sheet = range.sheet;
  const bounds = range.bounds;
  if (!sheet || !bounds || rows < 1 || cols < 1) return null;

  const next: CellBounds = {
    minRow: bounds.minRow,
    minCol: bounds.minCol,
    maxRow: bounds.minRow + rows - 1,
    maxCol: bounds.minCol + cols - 1,
  };
  if (!isWithinSheetLimits(next)) return null;

  if (rows > range.rows) {
    sheet.insertRows(bounds.maxRow + 1, rows - range.rows);
  } else if (rows < range.rows) {
    sheet.deleteRows(bounds.minRow + rows, range.rows - rows);
  }
  if (cols > range.columns) {
    sheet.insertColumns(bounds.maxCol + 1, cols - range.columns);
  } else if (cols < range.columns) {
    sheet.deleteColumns(bounds.minCol + cols, range.columns - cols);
  }

  const alias = range.alias;
  if (alias?.kind === 'defined-name') {
    alias.definedName.reference = formatReference(next, { sheetName: sheet.title, absolute: true });
  } else if (alias?.kind === 'named-table') {
    alias.table.reference = formatReference(next);
  }

  return Range.fromBounds(sheet, next, alias);
}
