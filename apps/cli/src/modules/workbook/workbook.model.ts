import type { CellBounds, CellFormat, CellValue } from '@sheetlift/shared';
import {
  buildCellRef,
  formatReference,
  isWithinSheetLimits,
  parseCellRef,
  parseReference,
  SHEET_LIMITS,
} from '@sheetlift/shared';

/**
 * Live handle on one cell. Reading `value` always goes to the sheet, so a
 * handle taken before a row/column shift points at whatever moved into its
 * coordinate.
 */
export class SheetCell {
  constructor(
    readonly sheet: Worksheet,
    readonly row: number,
    readonly column: number,
  ) {}

  get coordinate(): string {
    return buildCellRef(this.row, this.column);
  }

  get value(): CellValue {
    return this.sheet.getValue(this.row, this.column);
  }

  set value(value: CellValue) {
    this.sheet.setValue(this.row, this.column, value);
  }
}

/** A name bound to a reference string, global or local to one sheet */
export class DefinedName {
  constructor(
    readonly name: string,
    public reference: string,
    readonly localSheet?: Worksheet,
  ) {}
}

/** A worksheet table; `reference` carries no sheet name */
export class NamedTable {
  constructor(
    readonly name: string,
    public reference: string,
    readonly sheet: Worksheet,
  ) {}
}

interface StoredCell {
  value: CellValue;
  /** Formula text without the leading `=`; `value` holds its cached result */
  formula?: string;
  format?: CellFormat;
}

/** Where a span `[min, max]` of rows or columns ends up; null once it is deleted */
type MoveSpan = (min: number, max: number) => { min: number; max: number } | null;

function insertSpan(start: number, count: number): MoveSpan {
  return (min, max) => {
    if (max < start) return { min, max };
    if (min >= start) return { min: min + count, max: max + count };
    return { min, max: max + count };
  };
}

function deleteSpan(start: number, count: number): MoveSpan {
  const end = start + count - 1;
  return (min, max) => {
    const nextMin = min < start ? min : min > end ? min - count : start;
    const nextMax = max < start ? max : max > end ? max - count : start - 1;
    return nextMax < nextMin ? null : { min: nextMin, max: nextMax };
  };
}

function sameBounds(a: CellBounds, b: CellBounds): boolean {
  return a.minRow === b.minRow && a.minCol === b.minCol && a.maxRow === b.maxRow && a.maxCol === b.maxCol;
}

export class Worksheet {
  private cells = new Map<string, StoredCell>();
  private columnWidths = new Map<number, number>();
  private merges: CellBounds[] = [];
  private readonly localNames = new Map<string, DefinedName>();
  private readonly tables = new Map<string, NamedTable>();

  constructor(
    readonly workbook: Workbook,
    public title: string,
  ) {}

  cell(row: number, column: number): SheetCell {
    if (row < 1 || column < 1 || row > SHEET_LIMITS.MAX_ROWS || column > SHEET_LIMITS.MAX_COLS) {
      throw new RangeError(`Cell (${row}, ${column}) is outside the sheet`);
    }
    return new SheetCell(this, row, column);
  }

  getValue(row: number, column: number): CellValue {
    return this.cells.get(buildCellRef(row, column))?.value ?? null;
  }

  /** Store a plain value, dropping any formula the cell held but keeping its format */
  setValue(row: number, column: number, value: CellValue): void {
    const ref = buildCellRef(row, column);
    const format = this.cells.get(ref)?.format;
    if (format) {
      this.cells.set(ref, { value, format });
    } else if (value === null) {
      this.cells.delete(ref);
    } else {
      this.cells.set(ref, { value });
    }
  }

  getFormula(row: number, column: number): string | undefined {
    return this.cells.get(buildCellRef(row, column))?.formula;
  }

  /** Store a formula with its cached result. Formulas are kept, never evaluated. */
  setFormula(row: number, column: number, formula: string, result: CellValue): void {
    const ref = buildCellRef(row, column);
    this.cells.set(ref, {
      value: result,
      formula: formula.replace(/^=/, ''),
      format: this.cells.get(ref)?.format,
    });
  }

  getFormat(row: number, column: number): CellFormat | undefined {
    return this.cells.get(buildCellRef(row, column))?.format;
  }

  setFormat(row: number, column: number, format: CellFormat): void {
    const ref = buildCellRef(row, column);
    this.cells.set(ref, { ...(this.cells.get(ref) ?? { value: null }), format });
  }

  getColumnWidth(column: number): number | undefined {
    return this.columnWidths.get(column);
  }

  setColumnWidth(column: number, width: number): void {
    this.columnWidths.set(column, width);
  }

  /** Column widths as `[column, width]` pairs */
  listColumnWidths(): Array<[number, number]> {
    return [...this.columnWidths.entries()];
  }

  mergeCells(bounds: CellBounds): void {
    this.merges.push({ ...bounds });
  }

  listMerges(): CellBounds[] {
    return this.merges.map((m) => ({ ...m }));
  }

  /** Write a block of values row-major starting at (row, column) */
  setValues(row: number, column: number, values: CellValue[][]): void {
    values.forEach((line, r) => {
      line.forEach((value, c) => this.setValue(row + r, column + c, value));
    });
  }

  /** Last row holding a value; 1 for an empty sheet. Formatted blanks do not count. */
  get maxRow(): number {
    let max = 1;
    for (const [ref, stored] of this.cells) {
      if (stored.value !== null) max = Math.max(max, parseCellRef(ref).row);
    }
    return max;
  }

  /** Last column holding a value; 1 for an empty sheet */
  get maxColumn(): number {
    let max = 1;
    for (const [ref, stored] of this.cells) {
      if (stored.value !== null) max = Math.max(max, parseCellRef(ref).col);
    }
    return max;
  }

  /** Stored cells, formatted blanks included, in no particular order */
  entries(): Array<{ row: number; column: number; value: CellValue; formula?: string; format?: CellFormat }> {
    return [...this.cells.entries()].map(([ref, stored]) => {
      const { row, col } = parseCellRef(ref);
      return { row, column: col, ...stored };
    });
  }

  /** Cell handles for an inclusive block, row by row */
  iterRows(bounds: CellBounds): SheetCell[][] {
    const rows: SheetCell[][] = [];
    for (let r = bounds.minRow; r <= bounds.maxRow; r++) {
      const line: SheetCell[] = [];
      for (let c = bounds.minCol; c <= bounds.maxCol; c++) {
        line.push(this.cell(r, c));
      }
      rows.push(line);
    }
    return rows;
  }

  /**
   * Insert `count` blank rows before `startRow`, shifting later rows down.
   * Tables, defined names and merges on this sheet move with their cells;
   * one that spans `startRow` grows.
   */
  insertRows(startRow: number, count: number): void {
    this.shift('row', insertSpan(startRow, count));
  }

  /**
   * Delete `count` rows from `startRow`, shifting later rows up. A table,
   * name or merge inside the deleted rows is removed; one that overlaps
   * them shrinks.
   */
  deleteRows(startRow: number, count: number): void {
    this.shift('row', deleteSpan(startRow, count));
  }

  insertColumns(startCol: number, count: number): void {
    this.shift('col', insertSpan(startCol, count));
  }

  deleteColumns(startCol: number, count: number): void {
    this.shift('col', deleteSpan(startCol, count));
  }

  addTable(name: string, reference: string): NamedTable {
    const key = name.toLowerCase();
    if (this.workbook.findTable(name)) {
      throw new Error(`Table ${name} already exists`);
    }
    const table = new NamedTable(name, reference, this);
    this.tables.set(key, table);
    return table;
  }

  getTable(name: string): NamedTable | undefined {
    return this.tables.get(name.toLowerCase());
  }

  listTables(): NamedTable[] {
    return [...this.tables.values()];
  }

  defineLocalName(name: string, reference: string): DefinedName {
    const definedName = new DefinedName(name, reference, this);
    this.localNames.set(name.toLowerCase(), definedName);
    return definedName;
  }

  getLocalName(name: string): DefinedName | undefined {
    return this.localNames.get(name.toLowerCase());
  }

  listLocalNames(): DefinedName[] {
    return [...this.localNames.values()];
  }

  removeLocalName(name: string): void {
    this.localNames.delete(name.toLowerCase());
  }

  private shift(axis: 'row' | 'col', span: MoveSpan): void {
    const move = (bounds: CellBounds): CellBounds | null => {
      const next = axis === 'row' ? span(bounds.minRow, bounds.maxRow) : span(bounds.minCol, bounds.maxCol);
      if (!next) return null;
      const moved =
        axis === 'row'
          ? { ...bounds, minRow: next.min, maxRow: next.max }
          : { ...bounds, minCol: next.min, maxCol: next.max };
      return isWithinSheetLimits(moved) ? moved : null;
    };

    const cells = new Map<string, StoredCell>();
    for (const [ref, stored] of this.cells) {
      const { row, col } = parseCellRef(ref);
      const target = move({ minRow: row, minCol: col, maxRow: row, maxCol: col });
      if (target) cells.set(buildCellRef(target.minRow, target.minCol), stored);
    }
    this.cells = cells;

    if (axis === 'col') {
      const widths = new Map<number, number>();
      for (const [column, width] of this.columnWidths) {
        const next = span(column, column);
        if (next) widths.set(next.min, width);
      }
      this.columnWidths = widths;
    }

    // A merge that collapses to one cell is no merge at all
    this.merges = this.merges
      .map(move)
      .filter((m): m is CellBounds => m !== null && !(m.minRow === m.maxRow && m.minCol === m.maxCol));

    for (const [key, table] of this.tables) {
      const bounds = parseReference(table.reference);
      if (!bounds) continue;
      const next = move(bounds);
      if (!next) {
        this.tables.delete(key);
      } else if (!sameBounds(bounds, next)) {
        table.reference = formatReference(next);
      }
    }

    for (const definedName of this.workbook.listAllDefinedNames()) {
      const bounds = parseReference(definedName.reference);
      if (!bounds) continue;
      const sheetName = bounds.sheetName ?? definedName.localSheet?.title;
      if (sheetName?.toLowerCase() !== this.title.toLowerCase()) continue;

      const next = move(bounds);
      if (!next) {
        this.workbook.removeName(definedName);
      } else if (!sameBounds(bounds, next)) {
        definedName.reference = formatReference(next, { sheetName: bounds.sheetName, absolute: true });
      }
    }
  }
}

/**
 * In-memory spreadsheet document: ordered sheets, defined names and tables.
 * Names and table lookups are case-insensitive.
 */
export class Workbook {
  readonly sheets: Worksheet[] = [];
  private readonly globalNames = new Map<string, DefinedName>();

  addSheet(title: string): Worksheet {
    if (this.getSheet(title)) {
      throw new Error(`Sheet ${title} already exists`);
    }
    const sheet = new Worksheet(this, title);
    this.sheets.push(sheet);
    return sheet;
  }

  getSheet(title: string): Worksheet | undefined {
    const lower = title.toLowerCase();
    return this.sheets.find((s) => s.title.toLowerCase() === lower);
  }

  /** Define a name globally, or local to `scope` */
  defineName(name: string, reference: string, scope?: Worksheet): DefinedName {
    if (scope) return scope.defineLocalName(name, reference);
    const definedName = new DefinedName(name, reference);
    this.globalNames.set(name.toLowerCase(), definedName);
    return definedName;
  }

  getDefinedName(name: string, scope?: Worksheet): DefinedName | undefined {
    if (scope) return scope.getLocalName(name);
    return this.globalNames.get(name.toLowerCase());
  }

  listDefinedNames(): DefinedName[] {
    return [...this.globalNames.values()];
  }

  /** Global names followed by every sheet's local names */
  listAllDefinedNames(): DefinedName[] {
    return [...this.listDefinedNames(), ...this.sheets.flatMap((s) => s.listLocalNames())];
  }

  removeName(definedName: DefinedName): void {
    if (definedName.localSheet) {
      definedName.localSheet.removeLocalName(definedName.name);
    } else {
      this.globalNames.delete(definedName.name.toLowerCase());
    }
  }

  /** Find a table on `sheet`, or on any sheet when none is given */
  findTable(name: string, sheet?: Worksheet): NamedTable | undefined {
    if (sheet) return sheet.getTable(name);
    for (const s of this.sheets) {
      const table = s.getTable(name);
      if (table) return table;
    }
    return undefined;
  }
}
