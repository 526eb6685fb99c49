/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';
import { isQuotaKey, type QuotaKey } from '../shared/types.js';

/** Insight keys that can be suppressed through settings.hiddenInsights. */
export const INSIGHT_KEYS = ['forecast', 'variance', 'trend', 'weekly_pace'] as const;

/** Schema for a quota key in provider/quota form. */
export const QuotaKeySchema = z.custom<QuotaKey>(
  (value) => typeof value === 'string' && isQuotaKey(value),
  { message: 'Quota key must have the form "<provider>/<quota>"' },
);

/** Schema for a single tracked quota and how its raw fields are read. */
export const QuotaDefinitionSchema = z.object({
  key: QuotaKeySchema,
  kind: z.enum(['usage', 'remaining', 'percent']),
  valueField: z.string().min(1, { message: 'Quota valueField must not be empty' }),
  limitField: z.string().min(1).optional(),
  resetField: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
});

/** Schema for service settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3917),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dbPath: z.string().default('./data/quotawatch.db'),
  rateWindowMinutes: z.number().int().min(1).default(30),
  minRateSpanMinutes: z.number().int().min(1).default(5),
  lookbackDays: z.number().int().min(1).max(365).default(30),
  hiddenInsights: z.array(z.enum(INSIGHT_KEYS)).default([]),
});

/** Top-level config schema with cross-field validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema.prefault({}),
    quotas: z
      .array(QuotaDefinitionSchema)
      .min(1, { message: 'At least one quota is required' }),
  })
  .refine(
    (config) => new Set(config.quotas.map((q) => q.key)).size === config.quotas.length,
    { message: 'Quota keys must be unique' },
  )
  .refine(
    (config) => config.settings.minRateSpanMinutes <= config.settings.rateWindowMinutes,
    { message: 'settings.minRateSpanMinutes must not exceed settings.rateWindowMinutes' },
  );
