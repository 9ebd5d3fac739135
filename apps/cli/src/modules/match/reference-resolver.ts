import { parseReference } from '@sheetlift/shared';
import type { DefinedName, NamedTable, Workbook, Worksheet } from '../workbook/workbook.model';
import type { Comparator } from './comparator';
import { Range } from './range';

/** First sheet whose title satisfies the comparator */
export function selectSheet(workbook: Workbook, comparator?: Comparator): Worksheet | undefined {
  if (!comparator) return undefined;
  return workbook.sheets.find((sheet) => comparator.match(sheet.title) !== undefined);
}

/**
 * Resolve a reference string to a range. Lookup order: a name local to
 * `sheet`, a global name, a table (on `sheet`, or any sheet without one),
 * then a literal coordinate. An unqualified coordinate needs `sheet`.
 */
export function resolveReference(
  workbook: Workbook,
  reference: string,
  sheet?: Worksheet,
): Range | null {
  const name = reference.trim();

  const local = sheet?.getLocalName(name);
  if (local) return fromDefinedName(workbook, local);

  const global = workbook.getDefinedName(name);
  if (global) return fromDefinedName(workbook, global);

  const table = workbook.findTable(name, sheet);
  if (table) return fromTable(table);

  const parsed = parseReference(name);
  if (!parsed) return null;
  const target = parsed.sheetName !== undefined ? workbook.getSheet(parsed.sheetName) : sheet;
  return target ? Range.fromBounds(target, parsed) : null;
}

function fromDefinedName(workbook: Workbook, definedName: DefinedName): Range | null {
  const parsed = parseReference(definedName.reference);
  if (!parsed) return null;
  const sheet =
    parsed.sheetName !== undefined ? workbook.getSheet(parsed.sheetName) : definedName.localSheet;
  return sheet ? Range.fromBounds(sheet, parsed, { kind: 'defined-name', definedName }) : null;
}

function fromTable(table: NamedTable): Range | null {
  const parsed = parseReference(table.reference);
  if (!parsed) return null;
  return Range.fromBounds(table.sheet, parsed, { kind: 'named-table', table });
}
