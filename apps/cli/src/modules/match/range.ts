import type { CellBounds, CellValue } from '@sheetlift/shared';
import { formatReference } from '@sheetlift/shared';
import type { DefinedName, NamedTable, SheetCell, Workbook, Worksheet } from '../workbook/workbook.model';

/** Identity a range was resolved through, repaired when the range is resized */
export type RangeAlias =
  | { kind: 'defined-name'; definedName: DefinedName }
  | { kind: 'named-table'; table: NamedTable };

export interface ReferenceOptions {
  absolute?: boolean;
  useSheet?: boolean;
  useAlias?: boolean;
}

/**
 * Rectangular block of cell handles on one sheet.
 *
 * Ranges are values: resizing produces a new Range, and a Range taken
 * before any row or column insert/delete on its sheet is stale.
 */
export class Range {
  readonly rows: number;
  readonly columns: number;

  private constructor(
    readonly cells: readonly (readonly SheetCell[])[],
    readonly alias?: RangeAlias,
  ) {
    this.rows = cells.length;
    this.columns = this.rows > 0 ? cells[0]?.length ?? 0 : 0;
  }

  static empty(): Range {
    return new Range([]);
  }

  static fromCell(cell: SheetCell): Range {
    return new Range([[cell]]);
  }

  static fromBounds(sheet: Worksheet, bounds: CellBounds, alias?: RangeAlias): Range {
    return new Range(sheet.iterRows(bounds), alias);
  }

  get isEmpty(): boolean {
    return this.rows === 0 || this.columns === 0;
  }

  get isCell(): boolean {
    return this.rows === 1 && this.columns === 1;
  }

  get isRange(): boolean {
    return !this.isEmpty && !this.isCell;
  }

  /** The only cell of a 1×1 range */
  get cell(): SheetCell | undefined {
    return this.isCell ? this.firstCell : undefined;
  }

  get firstCell(): SheetCell | undefined {
    return this.cells[0]?.[0];
  }

  get lastCell(): SheetCell | undefined {
    return this.cells[this.rows - 1]?.[this.columns - 1];
  }

  get sheet(): Worksheet | undefined {
    return this.firstCell?.sheet;
  }

  get workbook(): Workbook | undefined {
    return this.sheet?.workbook;
  }

  get bounds(): CellBounds | undefined {
    const first = this.firstCell;
    const last = this.lastCell;
    if (this.isEmpty || !first || !last) return undefined;
    return { minRow: first.row, minCol: first.column, maxRow: last.row, maxCol: last.column };
  }

  /** Snapshot of the current values, row by row */
  getValues(): CellValue[][] {
    return this.cells.map((row) => row.map((cell) => cell.value));
  }

  /**
   * Render as the alias name when there is one and `useAlias` is set, else
   * as an A1 reference such as `'Report 1'!$B$5:$F$9`.
   */
  getReference(options: ReferenceOptions = {}): string | undefined {
    const { absolute = true, useSheet = true, useAlias = true } = options;
    const bounds = this.bounds;
    const sheet = this.sheet;
    if (!bounds || !sheet) return undefined;

    if (useAlias && this.alias) {
      return this.alias.kind === 'defined-name' ? this.alias.definedName.name : this.alias.table.name;
    }
    return formatReference(bounds, { sheetName: useSheet ? sheet.title : undefined, absolute });
  }

  contains(cell: SheetCell): boolean {
    const bounds = this.bounds;
    return (
      bounds !== undefined &&
      cell.sheet === this.sheet &&
      cell.row >= bounds.minRow &&
      cell.row <= bounds.maxRow &&
      cell.column >= bounds.minCol &&
      cell.column <= bounds.maxCol
    );
  }
}
