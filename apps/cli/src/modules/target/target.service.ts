import { Injectable, Logger } from '@nestjs/common';
import { labelKey } from '@sheetlift/shared';
import { CellMatchService } from '../match/cell-match.service';
import { RangeMatchService } from '../match/range-match.service';
import type { CellMatch, MatchResult } from '../match/match.types';
import type { Range } from '../match/range';
import type { SheetCell, Workbook } from '../workbook/workbook.model';
import {
  buildLabelLookup,
  copyValue,
  labelVector,
  resizeRange,
  triangulate,
  vectorAt,
} from './table-ops';
import type { CellEndpoint, Target, VectorEndpoint } from './target.types';

interface ResolvedCell {
  cell: SheetCell;
  result: MatchResult;
}

interface ResolvedVector {
  range: Range;
  located: SheetCell;
  result: MatchResult;
}

/**
 * Moves data from a source workbook into a target workbook.
 *
 * Every match and locator is resolved before the target is written, so a
 * miss returns null and leaves the target workbook as it was.
 */
@Injectable()
export class TargetService {
  private readonly logger = new Logger(TargetService.name);

  constructor(
    private readonly cellMatch: CellMatchService,
    private readonly rangeMatch: RangeMatchService,
  ) {}

  /** Run a target; returns the source match result, or null on a miss */
  extract(target: Target, source: Workbook, destination: Workbook): MatchResult | null {
    switch (target.shape) {
      case 'cell':
        return this.extractCell(target, source, destination);
      case 'table':
        return this.extractTable(target, source, destination);
      case 'vector':
        return this.extractVector(target, source, destination);
    }
  }

  private extractCell(
    target: Extract<Target, { shape: 'cell' }>,
    source: Workbook,
    destination: Workbook,
  ): MatchResult | null {
    const from = this.resolveCell(target.source, source);
    const to = from && this.resolveCell(target.target, destination);
    if (!from || !to) return this.miss(target.name);

    copyValue(from.cell, to.cell);
    this.logger.debug(`${target.name}: copied ${from.cell.coordinate} to ${to.cell.coordinate}`);
    return from.result;
  }

  private extractTable(
    target: Extract<Target, { shape: 'table' }>,
    source: Workbook,
    destination: Workbook,
  ): MatchResult | null {
    const from = this.rangeMatch.match(target.source, source);
    const to = from && this.rangeMatch.match(target.target, destination);
    if (!from || !to) return this.miss(target.name);

    // Snapshot first: resizing may shift the source when both live on one sheet
    const values = from.range.getValues();
    let range = to.range;
    if (target.expand && (range.rows !== from.range.rows || range.columns !== from.range.columns)) {
      const resized = resizeRange(range, from.range.rows, from.range.columns);
      if (!resized) return this.miss(target.name);
      this.logger.debug(`${target.name}: resized target to ${resized.rows}x${resized.columns}`);
      range = resized;
    }

    const rows = Math.min(values.length, range.rows);
    const cols = Math.min(from.range.columns, range.columns);
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        const cell = range.cells[r]?.[c];
        const value = values[r]?.[c];
        if (cell && value !== undefined) cell.value = value;
      }
    }
    return from;
  }

  private extractVector(
    target: Extract<Target, { shape: 'vector' }>,
    source: Workbook,
    destination: Workbook,
  ): MatchResult | null {
    const from = this.resolveVector(target.source, source);
    const to = from && this.resolveVector(target.target, destination);
    if (!from || !to) return this.miss(target.name);

    const sourceValues = vectorAt(from.range, target.source.axis, from.located).map((c) => c.value);

    if (target.align) {
      const sourceLabels = labelVector(from.range, target.source.axis).map((c) => c.value);
      const lookup = buildLabelLookup(sourceLabels, sourceValues);
      const targetCells = vectorAt(to.range, target.target.axis, to.located);
      const targetKeys = labelVector(to.range, target.target.axis).map((c) => labelKey(c.value));

      targetCells.forEach((cell, idx) => {
        const key = targetKeys[idx];
        const value = key ? lookup.get(key) : undefined;
        if (value !== undefined) cell.value = value;
      });
      return from.result;
    }

    let range = to.range;
    let located = to.located;
    const axis = target.target.axis;
    const length = axis === 'row' ? range.columns : range.rows;
    if (target.expand && length !== sourceValues.length) {
      // The located row/column keeps its offset: resizing only touches the far end
      const rowOffset = located.row - (range.firstCell?.row ?? located.row);
      const colOffset = located.column - (range.firstCell?.column ?? located.column);
      const resized =
        axis === 'row'
          ? resizeRange(range, range.rows, sourceValues.length)
          : resizeRange(range, sourceValues.length, range.columns);
      const origin = resized?.firstCell;
      if (!resized || !origin) return this.miss(target.name);
      range = resized;
      located = origin.sheet.cell(origin.row + rowOffset, origin.column + colOffset);
      this.logger.debug(`${target.name}: resized target to ${range.rows}x${range.columns}`);
    }

    const targetCells = vectorAt(range, axis, located);
    const count = Math.min(sourceValues.length, targetCells.length);
    for (let i = 0; i < count; i++) {
      const cell = targetCells[i];
      const value = sourceValues[i];
      if (cell && value !== undefined) cell.value = value;
    }
    return from.result;
  }

  private resolveCell(endpoint: CellEndpoint, workbook: Workbook): ResolvedCell | null {
    if (endpoint.kind === 'direct') {
      const result = this.cellMatch.match(endpoint.match, workbook);
      const cell = result?.range.cell;
      return result && cell ? { cell, result } : null;
    }

    const result = this.rangeMatch.match(endpoint.match, workbook);
    if (!result) return null;
    const row = this.locate(endpoint.row, result.range);
    const column = row && this.locate(endpoint.column, result.range);
    if (!row || !column) return null;
    return { cell: triangulate(row, column), result };
  }

  private resolveVector(endpoint: VectorEndpoint, workbook: Workbook): ResolvedVector | null {
    const result = this.rangeMatch.match(endpoint.match, workbook);
    if (!result) return null;
    const located = this.locate(endpoint.locator, result.range);
    return located ? { range: result.range, located, result } : null;
  }

  /** Find a locator inside a resolved range; hits outside the range are rejected */
  private locate(locator: CellMatch, range: Range): SheetCell | null {
    const sheet = range.sheet;
    const bounds = range.bounds;
    if (!sheet || !bounds) return null;

    const cell = this.cellMatch.match(locator, sheet.workbook, { sheet, bounds })?.range.cell;
    if (!cell || !range.contains(cell)) {
      this.logger.debug(`Locator ${locator.name} not found inside ${range.getReference() ?? 'range'}`);
      return null;
    }
    return cell;
  }

  private miss(name: string): null {
    this.logger.debug(`${name}: nothing transferred`);
    return null;
  }
}
