import { z } from 'zod';

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Dense format: one record per coordinate ("B3" → { value, row, column }) */
export const denseCellSchema = z.object({
  value: cellValueSchema.optional(),
  row: z.number().int().min(1).optional(),
  column: z.number().int().min(1).optional(),
  col: z.number().int().min(1).optional(),
}).passthrough();

/**
 * A compact cell tuple: [col, value, ...extra, runLength?].
 * Validated per tuple so one malformed cell never rejects the sheet.
 */
export const compactCellTupleSchema = z.tuple([
  z.number().int().min(1),
  cellValueSchema,
]).rest(z.unknown());

export const compactRowSchema = z.object({
  r: z.number().int().min(1),
  cells: z.array(z.unknown()).default([]),
}).passthrough();

export type CellValueInput = z.infer<typeof cellValueSchema>;
export type DenseCellInput = z.infer<typeof denseCellSchema>;
export type CompactCellTuple = z.infer<typeof compactCellTupleSchema>;
export type CompactRowInput = z.infer<typeof compactRowSchema>;
