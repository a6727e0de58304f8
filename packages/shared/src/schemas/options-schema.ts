import { z } from 'zod';
import { frozenPanesSchema, frozenTupleSchema } from './sheet-schema';

export const tableDetectionOptionsSchema = z.object({
  use_gaps: z.boolean().optional(),
  gap_threshold: z.number().int().min(1).optional(),
});

/** Only the frozen hint is read from the pass-through sheet data */
export const sheetDataHintSchema = z.object({
  frozen_panes: frozenPanesSchema.optional(),
  frozen: frozenTupleSchema.optional(),
}).passthrough();

export const tableOptionsSchema = z.object({
  table_detection: tableDetectionOptionsSchema.optional(),
  sheet_data: sheetDataHintSchema.optional(),
});

export type TableDetectionOptionsInput = z.infer<typeof tableDetectionOptionsSchema>;
export type SheetDataHintInput = z.infer<typeof sheetDataHintSchema>;
export type TableOptionsInput = z.infer<typeof tableOptionsSchema>;
