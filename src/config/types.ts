/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import { ConfigSchema, QuotaDefinitionSchema, SettingsSchema, INSIGHT_KEYS } from './schema.js';

/** Fully validated service configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** A single tracked quota definition. */
export type QuotaDefinition = z.infer<typeof QuotaDefinitionSchema>;

/** Service-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;

/** Key of an insight that settings may hide. */
export type InsightKey = (typeof INSIGHT_KEYS)[number];

// Re-export schemas for convenience
export { ConfigSchema, QuotaDefinitionSchema, SettingsSchema } from './schema.js';
