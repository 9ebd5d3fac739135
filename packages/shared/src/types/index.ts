export type {
  CalendarDate,
  TimeOfDay,
  CellValue,
  ValueKind,
  HorizontalAlignment,
  CellFormat,
  CellBounds,
  ParsedReference,
} from './cell-types';

export type {
  Operator,
  SearchBounds,
  ActionRecord,
} from './match-types';
export { OPERATORS } from './match-types';
