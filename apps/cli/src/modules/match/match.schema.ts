import { z } from 'zod';
import { searchBoundsSchema } from '@sheetlift/shared';
import { ConfigurationError } from '../../common/errors';
import { Comparator } from './comparator';
import { isCellMatch, type CellMatch, type RangeExtent, type RangeMatch } from './match.types';

const comparatorSchema = z.instanceof(Comparator);
const cellMatchSchema = z.custom<CellMatch>(isCellMatch, { message: 'Expected a cell match' });
const positive = z.number().int().min(1);

export const cellMatchOptionsSchema = z
  .object({
    name: z.string(),
    sheet: comparatorSchema.optional(),
    reference: z.string().trim().min(1).optional(),
    value: comparatorSchema.optional(),
    rowOffset: z.number().int().default(0),
    colOffset: z.number().int().default(0),
    minRow: positive.optional(),
    minCol: positive.optional(),
    maxRow: positive.optional(),
    maxCol: positive.optional(),
  })
  .superRefine((m, ctx) => {
    if ((m.reference === undefined) === (m.value === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reference'],
        message: 'Exactly one of reference or value must be set',
      });
    }
    const bounds = searchBoundsSchema.safeParse({
      minRow: m.minRow,
      minCol: m.minCol,
      maxRow: m.maxRow,
      maxCol: m.maxCol,
    });
    if (!bounds.success) {
      for (const issue of bounds.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
    }
  });

export const rangeMatchOptionsSchema = z
  .object({
    name: z.string(),
    sheet: comparatorSchema.optional(),
    reference: z.string().trim().min(1).optional(),
    startCell: cellMatchSchema.optional(),
    endCell: cellMatchSchema.optional(),
    rows: positive.optional(),
    cols: positive.optional(),
  })
  .superRefine((m, ctx) => {
    if ((m.reference === undefined) === (m.startCell === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reference'],
        message: 'Exactly one of reference or start cell must be set',
      });
    }
    if ((m.rows === undefined) !== (m.cols === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [m.rows === undefined ? 'rows' : 'cols'],
        message: 'Rows and columns must be given together',
      });
    }
    if (m.endCell !== undefined && m.rows !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endCell'],
        message: 'Give either an end cell or dimensions, not both',
      });
    }
    if (m.startCell === undefined && (m.endCell !== undefined || m.rows !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['startCell'],
        message: 'An end cell or dimensions need a start cell',
      });
    }
  });

export type CellMatchOptions = z.input<typeof cellMatchOptionsSchema>;
export type RangeMatchOptions = z.input<typeof rangeMatchOptionsSchema>;

/** Validate options and build a cell match; throws ConfigurationError */
export function createCellMatch(options: CellMatchOptions): CellMatch {
  const parsed = cellMatchOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(`cell match ${options.name}`, parsed.error);
  }
  const m = parsed.data;
  const locator = m.value
    ? { by: 'value' as const, value: m.value }
    : { by: 'reference' as const, reference: m.reference ?? '' };

  return {
    kind: 'cell',
    name: m.name,
    sheet: m.sheet,
    locator,
    rowOffset: m.rowOffset,
    colOffset: m.colOffset,
    bounds: { minRow: m.minRow, minCol: m.minCol, maxRow: m.maxRow, maxCol: m.maxCol },
  };
}

/**
 * Validate options and build a range match. The range's sheet comparator is
 * copied into start and end cells that have none, as new values.
 */
export function createRangeMatch(options: RangeMatchOptions): RangeMatch {
  const parsed = rangeMatchOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(`range match ${options.name}`, parsed.error);
  }
  const m = parsed.data;
  const inherit = (cell: CellMatch): CellMatch =>
    m.sheet && !cell.sheet ? { ...cell, sheet: m.sheet } : cell;

  let extent: RangeExtent;
  if (!m.startCell) {
    extent = { size: 'reference', reference: m.reference ?? '' };
  } else if (m.endCell) {
    extent = { size: 'end-cell', start: inherit(m.startCell), end: inherit(m.endCell) };
  } else if (m.rows !== undefined && m.cols !== undefined) {
    extent = { size: 'fixed', start: inherit(m.startCell), rows: m.rows, cols: m.cols };
  } else {
    extent = { size: 'contiguous', start: inherit(m.startCell) };
  }

  return { kind: 'range', name: m.name, sheet: m.sheet, extent };
}
