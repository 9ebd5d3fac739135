import type { CalendarDate, CellValue, TimeOfDay, ValueKind } from '../types/cell-types';

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  return { kind: 'date', year, month, day };
}

export function timeOfDay(hour: number, minute = 0, second = 0): TimeOfDay {
  return { kind: 'time', hour, minute, second };
}

export function isCalendarDate(value: CellValue): value is CalendarDate {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && value.kind === 'date';
}

export function isTimeOfDay(value: CellValue): value is TimeOfDay {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && value.kind === 'time';
}

/**
 * Classify a cell value into its variant
 */
export function valueKind(value: CellValue): ValueKind {
  if (value === null) return 'null';
  if (typeof value === 'string') return 'text';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'datetime';
  return value.kind;
}

/**
 * Which parts of a date an Excel number format displays. Quoted literals
 * and bracketed sections (colours, locales, elapsed time) are ignored.
 */
export function dateFormatParts(numFmt: string | undefined): { hasDate: boolean; hasTime: boolean } {
  const format = (numFmt ?? '').toLowerCase().replace(/"[^"]*"|\[[^\]]*\]/g, '');
  return { hasDate: /[dy]/.test(format), hasTime: /[hs]/.test(format) };
}

/**
 * Blank cells stop contiguous growth: null or zero-length text only
 */
export function isBlank(value: CellValue): boolean {
  return value === null || value === '';
}

/** UTC midnight of a calendar date, in epoch milliseconds */
export function calendarDateToInstant(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}

export function timeOfDayToSeconds(time: TimeOfDay): number {
  return time.hour * 3600 + time.minute * 60 + time.second;
}

/**
 * Normalised key for label alignment: text is trimmed and case-folded,
 * other variants compare exactly. Returns null for blank labels.
 */
export function labelKey(value: CellValue): string | null {
  if (isBlank(value)) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : `text:${trimmed.toLowerCase()}`;
  }
  return `${valueKind(value)}:${formatValue(value)}`;
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/**
 * Human-readable rendering used in logs and history messages
 */
export function formatValue(value: CellValue): string {
  if (value === null) return '(empty)';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (value.kind === 'date') return `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}`;
  return `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
}
