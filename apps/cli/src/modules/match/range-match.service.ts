import { Injectable, Logger } from '@nestjs/common';
import { isBlank, isWithinSheetLimits, SHEET_LIMITS } from '@sheetlift/shared';
import type { Workbook } from '../workbook/workbook.model';
import { CellMatchService } from './cell-match.service';
import { Range } from './range';
import { resolveReference, selectSheet } from './reference-resolver';
import type { MatchResult, RangeExtent, RangeMatch } from './match.types';

@Injectable()
export class RangeMatchService {
  private readonly logger = new Logger(RangeMatchService.name);

  constructor(private readonly cellMatch: CellMatchService) {}

  match(m: RangeMatch, workbook: Workbook): MatchResult | null {
    const result = this.resolve(m.extent, m, workbook);
    if (!result) {
      this.logger.debug(`Range match ${m.name} (${m.extent.size}) found nothing`);
    }
    return result;
  }

  private resolve(extent: RangeExtent, m: RangeMatch, workbook: Workbook): MatchResult | null {
    if (extent.size === 'reference') {
      const range = resolveReference(workbook, extent.reference, selectSheet(workbook, m.sheet));
      return range && !range.isEmpty ? { range, captured: undefined } : null;
    }

    const start = this.cellMatch.match(extent.start, workbook);
    const anchor = start?.range.cell;
    if (!start || !anchor) return null;
    const sheet = anchor.sheet;

    switch (extent.size) {
      case 'end-cell': {
        const end = this.cellMatch.match(extent.end, workbook)?.range.cell;
        if (!end || end.sheet !== sheet) return null;
        const range = Range.fromBounds(sheet, {
          minRow: Math.min(anchor.row, end.row),
          minCol: Math.min(anchor.column, end.column),
          maxRow: Math.max(anchor.row, end.row),
          maxCol: Math.max(anchor.column, end.column),
        });
        return { range, captured: start.captured };
      }
      case 'fixed': {
        const bounds = {
          minRow: anchor.row,
          minCol: anchor.column,
          maxRow: anchor.row + extent.rows - 1,
          maxCol: anchor.column + extent.cols - 1,
        };
        if (!isWithinSheetLimits(bounds)) return null;
        return { range: Range.fromBounds(sheet, bounds), captured: start.captured };
      }
      case 'contiguous': {
        // The anchor may be a blank table corner; only the cells after it gate growth
        let cols = 1;
        while (anchor.column + cols <= SHEET_LIMITS.MAX_COLS && !isBlank(sheet.getValue(anchor.row, anchor.column + cols))) {
          cols++;
        }
        let rows = 1;
        while (anchor.row + rows <= SHEET_LIMITS.MAX_ROWS && !isBlank(sheet.getValue(anchor.row + rows, anchor.column))) {
          rows++;
        }
        const range = Range.fromBounds(sheet, {
          minRow: anchor.row,
          minCol: anchor.column,
          maxRow: anchor.row + rows - 1,
          maxCol: anchor.column + cols - 1,
        });
        return { range, captured: start.captured };
      }
    }
  }
}
