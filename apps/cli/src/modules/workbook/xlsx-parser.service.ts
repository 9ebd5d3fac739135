import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import { z } from 'zod';
import type { CellFormat, CellValue } from '@sheetlift/shared';
import { calendarDate, dateFormatParts, parseReference, timeOfDay } from '@sheetlift/shared';
import { Workbook, type Worksheet } from './workbook.model';

const definedNamesSchema = z.array(
  z.object({
    name: z.string(),
    ranges: z.array(z.string()),
  }),
);

const worksheetModelSchema = z.object({
  merges: z.array(z.string()).optional(),
  tables: z
    .array(
      z.object({
        name: z.string(),
        ref: z.string().optional(),
        tableRef: z.string().optional(),
      }),
    )
    .optional(),
});

type FormulaResult = NonNullable<ExcelJS.CellFormulaValue['result']>;

@Injectable()
export class XlsxParserService {
  private readonly logger = new Logger(XlsxParserService.name);

  /** Read an .xlsx file from disk into the document model */
  async parseFile(filename: string): Promise<Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filename);
    const result = this.toModel(workbook);
    this.logger.log(`Parsed ${filename}: ${result.sheets.length} sheets`);
    return result;
  }

  async parseBuffer(buffer: Buffer): Promise<Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
    return this.toModel(workbook);
  }

  private toModel(source: ExcelJS.Workbook): Workbook {
    const workbook = new Workbook();
    let usedCells = 0;

    for (const ws of source.worksheets) {
      const sheet = workbook.addSheet(ws.name);

      // Blank cells are visited for their formats
      ws.eachRow({ includeEmpty: true }, (row, rowNumber) => {
        row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
          if (this.readCell(sheet, rowNumber, colNumber, cell)) usedCells++;
        });
      });

      ws.columns?.forEach((column, idx) => {
        if (column.width !== undefined) sheet.setColumnWidth(idx + 1, column.width);
      });
      this.readModel(sheet, ws);
    }

    this.readDefinedNames(workbook, source);
    this.logger.debug(`Read ${usedCells} cells across ${workbook.sheets.length} sheets`);
    return workbook;
  }

  private readCell(sheet: Worksheet, row: number, column: number, cell: ExcelJS.Cell): boolean {
    // The other cells of a merge echo the value of its top-left cell
    if (cell.isMerged && cell.master.address !== cell.address) return false;

    const format = this.readFormat(cell);
    if (format) sheet.setFormat(row, column, format);

    const raw = cell.value;
    if (raw === null || raw === undefined) return false;

    if (typeof raw === 'object' && !(raw instanceof Date) && ('formula' in raw || 'sharedFormula' in raw)) {
      const result = raw.result === undefined ? null : this.fromResult(raw.result, cell.numFmt);
      sheet.setFormula(row, column, cell.formula, result);
      return true;
    }

    sheet.setValue(row, column, this.extractValue(raw, cell.numFmt));
    return true;
  }

  private readFormat(cell: ExcelJS.Cell): CellFormat | undefined {
    const format: CellFormat = {};
    const font = cell.font;
    if (font?.bold) format.bold = true;
    if (font?.italic) format.italic = true;
    if (font?.name) format.fontName = font.name;
    if (font?.size) format.fontSize = font.size;
    if (font?.color?.argb) format.fontColor = font.color.argb;

    const fill = cell.fill;
    if (fill?.type === 'pattern' && fill.fgColor?.argb) format.bgColor = fill.fgColor.argb;

    const horizontal = cell.alignment?.horizontal;
    if (horizontal === 'left' || horizontal === 'center' || horizontal === 'right') {
      format.alignment = horizontal;
    }
    if (cell.numFmt) format.numberFormat = cell.numFmt;

    return Object.keys(format).length > 0 ? format : undefined;
  }

  private extractValue(raw: ExcelJS.CellValue, numFmt: string | undefined): CellValue {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'string') return raw;
    if (raw instanceof Date) return this.fromDate(raw, numFmt);
    if ('richText' in raw) return raw.richText.map((r) => r.text).join('');
    if ('hyperlink' in raw) return raw.text;
    if ('error' in raw) return raw.error;
    return null;
  }

  private fromResult(result: FormulaResult, numFmt: string | undefined): CellValue {
    if (result instanceof Date) return this.fromDate(result, numFmt);
    if (typeof result === 'object') return result.error;
    return result;
  }

  /**
   * exceljs hands back every date-formatted cell as a UTC Date. The number
   * format tells a calendar date or a time of day from a full date-time.
   */
  private fromDate(date: Date, numFmt: string | undefined): CellValue {
    const { hasDate, hasTime } = dateFormatParts(numFmt);

    if (hasTime && !hasDate) {
      return timeOfDay(date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds());
    }
    const midnight =
      date.getUTCHours() === 0 && date.getUTCMinutes() === 0 && date.getUTCSeconds() === 0;
    if (hasDate && !hasTime && midnight) {
      return calendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
    }
    return date;
  }

  /** Merges and tables come from the worksheet model */
  private readModel(sheet: Worksheet, ws: ExcelJS.Worksheet): void {
    const model: unknown = ws.model;
    const parsed = worksheetModelSchema.safeParse(model);
    if (!parsed.success) return;

    for (const merge of parsed.data.merges ?? []) {
      const bounds = parseReference(merge);
      if (bounds) sheet.mergeCells(bounds);
    }

    for (const table of parsed.data.tables ?? []) {
      const reference = table.tableRef ?? table.ref;
      if (!reference || !parseReference(reference)) {
        this.logger.debug(`Skipping table ${table.name} without a usable reference`);
        continue;
      }
      sheet.addTable(table.name, reference);
    }
  }

  private readDefinedNames(workbook: Workbook, source: ExcelJS.Workbook): void {
    const model: unknown = source.definedNames.model;
    const parsed = definedNamesSchema.safeParse(model);
    if (!parsed.success) return;

    for (const definedName of parsed.data) {
      const [reference, ...rest] = definedName.ranges;
      if (reference === undefined || rest.length > 0) {
        this.logger.debug(`Skipping defined name ${definedName.name} with ${definedName.ranges.length} ranges`);
        continue;
      }
      workbook.defineName(definedName.name, reference);
    }
  }
}
