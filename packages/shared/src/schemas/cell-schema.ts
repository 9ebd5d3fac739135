import { z } from 'zod';

const coordinate = z.number().int().min(1);

export const searchBoundsSchema = z.object({
  minRow: coordinate.optional(),
  minCol: coordinate.optional(),
  maxRow: coordinate.optional(),
  maxCol: coordinate.optional(),
}).refine(
  (b) => b.minRow === undefined || b.maxRow === undefined || b.maxRow >= b.minRow,
  { message: 'max row must be >= min row', path: ['maxRow'] },
).refine(
  (b) => b.minCol === undefined || b.maxCol === undefined || b.maxCol >= b.minCol,
  { message: 'max column must be >= min column', path: ['maxCol'] },
);
