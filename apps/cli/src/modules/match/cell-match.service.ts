import { Injectable, Logger } from '@nestjs/common';
import type { CellBounds } from '@sheetlift/shared';
import { SHEET_LIMITS } from '@sheetlift/shared';
import type { SheetCell, Workbook, Worksheet } from '../workbook/workbook.model';
import type { Comparator } from './comparator';
import { Range } from './range';
import { resolveReference, selectSheet } from './reference-resolver';
import type { CellMatch, MatchResult } from './match.types';

/** Sheet and search box supplied by an enclosing range */
export interface MatchScope {
  sheet: Worksheet;
  bounds?: CellBounds;
}

@Injectable()
export class CellMatchService {
  private readonly logger = new Logger(CellMatchService.name);

  /**
   * Resolve a cell match. Returns null on a miss; never throws.
   */
  match(m: CellMatch, workbook: Workbook, scope?: MatchScope): MatchResult | null {
    const sheet = scope?.sheet ?? selectSheet(workbook, m.sheet);

    let found: { cell: SheetCell; captured: MatchResult['captured'] } | null;
    if (m.locator.by === 'reference') {
      const range = resolveReference(workbook, m.locator.reference, sheet);
      found = range?.cell ? { cell: range.cell, captured: undefined } : null;
    } else {
      found = sheet ? this.findByValue(m, m.locator.value, sheet, scope?.bounds) : null;
    }

    if (!found) {
      this.logger.debug(`Cell match ${m.name} found nothing`);
      return null;
    }

    const cell = this.applyOffset(found.cell, m.rowOffset, m.colOffset);
    if (!cell) {
      this.logger.debug(`Cell match ${m.name} offset falls outside the sheet`);
      return null;
    }
    return { range: Range.fromCell(cell), captured: found.captured };
  }

  /** Row-major scan of the search box; first hit wins */
  private findByValue(
    m: CellMatch,
    value: Comparator,
    sheet: Worksheet,
    scopeBounds?: CellBounds,
  ): { cell: SheetCell; captured: MatchResult['captured'] } | null {
    // Open ends default to the enclosing box, else to the used extent
    const box = scopeBounds ?? { minRow: 1, minCol: 1, maxRow: SHEET_LIMITS.MAX_ROWS, maxCol: SHEET_LIMITS.MAX_COLS };
    const minRow = Math.max(m.bounds.minRow ?? 1, box.minRow);
    const minCol = Math.max(m.bounds.minCol ?? 1, box.minCol);
    const maxRow = Math.min(m.bounds.maxRow ?? scopeBounds?.maxRow ?? sheet.maxRow, box.maxRow);
    const maxCol = Math.min(m.bounds.maxCol ?? scopeBounds?.maxCol ?? sheet.maxColumn, box.maxCol);

    for (let row = minRow; row <= maxRow; row++) {
      for (let col = minCol; col <= maxCol; col++) {
        const captured = value.match(sheet.getValue(row, col));
        if (captured !== undefined) {
          return { cell: sheet.cell(row, col), captured };
        }
      }
    }
    return null;
  }

  private applyOffset(cell: SheetCell, rowOffset: number, colOffset: number): SheetCell | null {
    if (rowOffset === 0 && colOffset === 0) return cell;
    const row = cell.row + rowOffset;
    const col = cell.column + colOffset;
    if (row < 1 || col < 1 || row > SHEET_LIMITS.MAX_ROWS || col > SHEET_LIMITS.MAX_COLS) {
      return null;
    }
    return cell.sheet.cell(row, col);
  }
}
