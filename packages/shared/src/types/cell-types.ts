/** A calendar day without a time component */
export interface CalendarDate {
  readonly kind: 'date';
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

/** A time of day without a date component */
export interface TimeOfDay {
  readonly kind: 'time';
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Primitive cell value types.
 * A JS `Date` is a date-time instant (UTC); calendar dates and times of day
 * have their own variants.
 */
export type CellValue = string | number | boolean | Date | CalendarDate | TimeOfDay | null;

/** Cell value variant classification */
export type ValueKind = 'null' | 'text' | 'number' | 'boolean' | 'date' | 'time' | 'datetime';

export type HorizontalAlignment = 'left' | 'center' | 'right';

/** Cell formatting kept from a loaded file so a written workbook looks the same */
export interface CellFormat {
  bold?: boolean;
  italic?: boolean;
  fontName?: string;
  fontSize?: number;
  /** ARGB hex, e.g. `FF1F4E79` */
  fontColor?: string;
  bgColor?: string;
  numberFormat?: string;
  alignment?: HorizontalAlignment;
}

/** Inclusive, 1-based rectangle of cells */
export interface CellBounds {
  minRow: number;
  minCol: number;
  maxRow: number;
  maxCol: number;
}

/** Parsed A1-style reference, optionally qualified with a sheet title */
export interface ParsedReference extends CellBounds {
  sheetName?: string;
}
