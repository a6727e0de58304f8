import { z } from 'zod';
import { GAP_THRESHOLDS } from '@sheet-tables/shared';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1'),
]);

const envSchema = z.object({
  TABLE_DETECTION_USE_GAPS: booleanFlag.default(false),
  TABLE_GAP_THRESHOLD: z.coerce.number().int().min(1).default(GAP_THRESHOLDS.DEFAULT_GAP_THRESHOLD),
  COMPACT_GAP_THRESHOLD: z.coerce
    .number()
    .int()
    .min(1)
    .default(GAP_THRESHOLDS.DEFAULT_COMPACT_GAP_THRESHOLD),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/** The detection defaults, read from raw or already validated values */
export const detectionEnvSchema = envSchema.pick({
  TABLE_DETECTION_USE_GAPS: true,
  TABLE_GAP_THRESHOLD: true,
  COMPACT_GAP_THRESHOLD: true,
});

export function validateEnv(env: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
