export {
  columnToLetter,
  letterToColumn,
  parseCellRef,
  buildCellRef,
  quoteSheetName,
  parseReference,
  formatReference,
  isWithinSheetLimits,
} from './cell-utils';

export {
  calendarDate,
  timeOfDay,
  isCalendarDate,
  isTimeOfDay,
  valueKind,
  dateFormatParts,
  isBlank,
  calendarDateToInstant,
  timeOfDayToSeconds,
  labelKey,
  formatValue,
} from './value-utils';
