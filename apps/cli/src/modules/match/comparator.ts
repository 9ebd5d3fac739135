import type { CellValue, Operator } from '@sheetlift/shared';
import {
  calendarDateToInstant,
  formatValue,
  isBlank,
  isCalendarDate,
  isTimeOfDay,
  timeOfDayToSeconds,
  valueKind,
} from '@sheetlift/shared';
import { ConfigurationError } from '../../common/errors';

/**
 * Order two values of compatible variants. Returns undefined when the pair
 * cannot be compared; a calendar date against a date-time is taken at UTC
 * midnight.
 */
export function compareValues(left: CellValue, right: CellValue): number | undefined {
  if (left === null || right === null) return undefined;

  if (typeof left === 'number' && typeof right === 'number') return Math.sign(left - right);
  if (typeof left === 'boolean' && typeof right === 'boolean') return Number(left) - Number(right);
  if (typeof left === 'string' && typeof right === 'string') {
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }

  const leftInstant = toInstant(left);
  const rightInstant = toInstant(right);
  if (leftInstant !== undefined && rightInstant !== undefined) {
    return Math.sign(leftInstant - rightInstant);
  }

  if (isTimeOfDay(left) && isTimeOfDay(right)) {
    return Math.sign(timeOfDayToSeconds(left) - timeOfDayToSeconds(right));
  }
  return undefined;
}

function toInstant(value: CellValue): number | undefined {
  if (value instanceof Date) return value.getTime();
  if (isCalendarDate(value)) return calendarDateToInstant(value);
  return undefined;
}

/** Count the capture groups of a pattern by matching it against nothing */
function countGroups(pattern: string): number {
  const empty = new RegExp(`(?:${pattern})|`).exec('');
  return empty ? empty.length - 1 : 0;
}

/**
 * One predicate over a cell value. `match` returns the captured value when
 * the predicate holds and undefined otherwise; it never throws.
 */
export class Comparator {
  private readonly pattern?: RegExp;
  private readonly groups: number = 0;

  constructor(
    readonly operator: Operator,
    readonly operand: CellValue = null,
  ) {
    if (operator === 'regex') {
      if (typeof operand !== 'string') {
        throw new ConfigurationError(
          `Regex comparator needs a text operand, got ${valueKind(operand)}`,
        );
      }
      try {
        this.pattern = new RegExp(operand, 'i');
        this.groups = countGroups(operand);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Invalid pattern ${operand}: ${message}`);
      }
    }
  }

  match(candidate: CellValue): CellValue | undefined {
    switch (this.operator) {
      case 'empty':
        return isBlank(candidate) ? '' : undefined;
      case 'not-empty':
        return isBlank(candidate) ? undefined : candidate;
      case 'regex':
        return this.matchPattern(candidate);
      case 'equal':
        if (candidate === null || this.operand === null) {
          return candidate === this.operand ? candidate : undefined;
        }
        return compareValues(candidate, this.operand) === 0 ? candidate : undefined;
      case 'not-equal': {
        const order = compareValues(candidate, this.operand);
        return order !== undefined && order !== 0 ? candidate : undefined;
      }
      default:
        return this.matchOrder(candidate);
    }
  }

  toString(): string {
    return this.operand === null ? this.operator : `${this.operator} ${formatValue(this.operand)}`;
  }

  private matchPattern(candidate: CellValue): CellValue | undefined {
    if (typeof candidate !== 'string' || !this.pattern) return undefined;
    const found = this.pattern.exec(candidate);
    if (!found) return undefined;
    return this.groups > 0 ? found[1] ?? '' : candidate;
  }

  private matchOrder(candidate: CellValue): CellValue | undefined {
    const order = compareValues(candidate, this.operand);
    if (order === undefined) return undefined;

    switch (this.operator) {
      case 'greater':
        return order > 0 ? candidate : undefined;
      case 'greater-equal':
        return order >= 0 ? candidate : undefined;
      case 'less':
        return order < 0 ? candidate : undefined;
      case 'less-equal':
        return order <= 0 ? candidate : undefined;
      default:
        return undefined;
    }
  }
}
