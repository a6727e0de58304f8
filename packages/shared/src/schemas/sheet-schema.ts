import { z } from 'zod';
import { denseCellSchema, compactRowSchema } from './cell-schema';

const index = z.number().int().min(1);

/** Dense sheets report dimensions as an object */
const dimensionsObjectSchema = z.object({
  min_row: index,
  max_row: index,
  min_col: index,
  max_col: index,
});

/** Compact sheets report dimensions as [min_row, min_col, max_row, max_col] */
export const dimensionsTupleSchema = z.tuple([index, index, index, index]);

export const frozenPanesSchema = z.object({
  frozen_rows: z.number().int().min(0).default(0),
  frozen_cols: z.number().int().min(0).default(0),
  top_left_cell: z.string().optional(),
});

/** Compact frozen hint: [rows, cols] */
export const frozenTupleSchema = z.tuple([
  z.number().int().min(0),
  z.number().int().min(0),
]);

const sheetBaseSchema = z.object({
  name: z.string().optional(),
  dimensions: z.union([dimensionsObjectSchema, dimensionsTupleSchema]).optional(),
  frozen_panes: frozenPanesSchema.optional(),
  frozen: frozenTupleSchema.optional(),
});

export const denseSheetSchema = sheetBaseSchema.extend({
  cells: z.record(z.string(), denseCellSchema),
});

export const compactSheetSchema = sheetBaseSchema.extend({
  rows: z.array(compactRowSchema),
});

export const sheetSchema = z.union([denseSheetSchema, compactSheetSchema]);

export const workbookSchema = z.object({
  workbook: z.object({
    sheets: z.array(sheetSchema),
  }),
});

export type DimensionsInput = z.infer<typeof sheetBaseSchema>['dimensions'];
export type FrozenPanesInput = z.infer<typeof frozenPanesSchema>;
export type FrozenTupleInput = z.infer<typeof frozenTupleSchema>;
export type DenseSheetInput = z.infer<typeof denseSheetSchema>;
export type CompactSheetInput = z.infer<typeof compactSheetSchema>;
export type SheetInput = z.infer<typeof sheetSchema>;
export type WorkbookInput = z.infer<typeof workbookSchema>;
