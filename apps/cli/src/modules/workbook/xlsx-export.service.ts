import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import type { CellFormat, CellValue } from '@sheetlift/shared';
import {
  calendarDateToInstant,
  dateFormatParts,
  formatReference,
  formatValue,
  parseReference,
  timeOfDayToSeconds,
  valueKind,
} from '@sheetlift/shared';
import type { NamedTable, Workbook, Worksheet } from './workbook.model';

const DATE_FORMAT = 'yyyy-mm-dd';
const TIME_FORMAT = 'hh:mm:ss';
const DATE_TIME_FORMAT = 'yyyy-mm-dd hh:mm:ss';

type ExportValue = { value: Exclude<ExcelJS.CellValue, undefined>; numFmt?: string };

@Injectable()
export class XlsxExportService {
  private readonly logger = new Logger(XlsxExportService.name);

  /** Export the model to an XLSX buffer (no disk writes) */
  async exportToBuffer(workbook: Workbook): Promise<Buffer> {
    const buffer = await this.build(workbook).xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  async exportToFile(workbook: Workbook, filename: string): Promise<void> {
    await this.build(workbook).xlsx.writeFile(filename);
    this.logger.log(`XLSX written to ${filename} (${workbook.sheets.length} sheets)`);
  }

  private build(workbook: Workbook): ExcelJS.Workbook {
    const output = new ExcelJS.Workbook();

    for (const sheet of workbook.sheets) {
      const ws = output.addWorksheet(sheet.title);

      for (const [column, width] of sheet.listColumnWidths()) {
        ws.getColumn(column).width = width;
      }

      for (const entry of sheet.entries()) {
        const wsCell = ws.getCell(entry.row, entry.column);
        const { value, numFmt } = this.toExport(entry.value);
        if (entry.formula !== undefined) {
          wsCell.value = this.toFormula(entry.formula, value);
        } else {
          wsCell.value = value;
        }
        if (entry.format) this.applyFormat(wsCell, entry.format);
        // A date keeps the template's format only when that format reads back as the same kind
        if (numFmt && !this.showsKind(entry.format?.numberFormat, entry.value)) wsCell.numFmt = numFmt;
      }

      for (const merge of sheet.listMerges()) {
        ws.mergeCells(merge.minRow, merge.minCol, merge.maxRow, merge.maxCol);
      }

      for (const table of sheet.listTables()) {
        this.writeTable(ws, sheet, table);
      }
    }

    for (const definedName of workbook.listDefinedNames()) {
      output.definedNames.add(definedName.reference, definedName.name);
    }

    return output;
  }

  private applyFormat(wsCell: ExcelJS.Cell, format: CellFormat): void {
    const { bold, italic, fontName, fontSize, fontColor, bgColor, alignment, numberFormat } = format;

    if (bold || italic || fontName || fontSize || fontColor) {
      wsCell.font = {
        bold,
        italic,
        name: fontName,
        size: fontSize,
        color: fontColor ? { argb: fontColor } : undefined,
      };
    }
    if (bgColor) {
      wsCell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: bgColor } };
    }
    if (alignment) {
      wsCell.alignment = { horizontal: alignment };
    }
    if (numberFormat) {
      wsCell.numFmt = numberFormat;
    }
  }

  private showsKind(numFmt: string | undefined, value: CellValue): boolean {
    const { hasDate, hasTime } = dateFormatParts(numFmt);
    switch (valueKind(value)) {
      case 'date':
        return hasDate && !hasTime;
      case 'time':
        return hasTime && !hasDate;
      case 'datetime':
        return hasDate && hasTime;
      default:
        return true;
    }
  }

  private toExport(value: CellValue): ExportValue {
    if (value instanceof Date) return { value, numFmt: DATE_TIME_FORMAT };
    if (value === null || typeof value !== 'object') return { value };
    if (value.kind === 'date') {
      return { value: new Date(calendarDateToInstant(value)), numFmt: DATE_FORMAT };
    }
    return { value: timeOfDayToSeconds(value) / 86_400, numFmt: TIME_FORMAT };
  }

  private toFormula(formula: string, result: ExportValue['value']): ExcelJS.CellFormulaValue {
    const cached =
      typeof result === 'number' || typeof result === 'string' ||
      typeof result === 'boolean' || result instanceof Date
        ? result
        : undefined;
    return { formula, result: cached, date1904: false };
  }

  /**
   * exceljs rewrites the header row and body of a table it adds, so the
   * values are passed back in as the table's own rows.
   */
  private writeTable(ws: ExcelJS.Worksheet, sheet: Worksheet, table: NamedTable): void {
    const bounds = parseReference(table.reference);
    if (!bounds) {
      this.logger.warn(`Table ${table.name} has an invalid reference ${table.reference}`);
      return;
    }

    const header = sheet.iterRows({ ...bounds, maxRow: bounds.minRow })[0] ?? [];
    const seen = new Set<string>();
    const columns = header.map((cell, idx) => {
      let name = cell.value === null ? `Column${idx + 1}` : formatValue(cell.value);
      while (seen.has(name.toLowerCase())) name = `${name}_`;
      seen.add(name.toLowerCase());
      return { name };
    });
    const rows = sheet
      .iterRows({ ...bounds, minRow: bounds.minRow + 1 })
      .map((line) => line.map((cell) => this.toExport(cell.value).value));

    ws.addTable({
      name: table.name,
      ref: formatReference({ ...bounds, maxRow: bounds.minRow, maxCol: bounds.minCol }),
      headerRow: true,
      columns,
      rows,
    });
  }
}
