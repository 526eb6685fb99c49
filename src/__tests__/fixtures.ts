/**
 * Shared builders for tests: an in-memory database and quota definitions.
 */

import type Database from 'better-sqlite3';
import { initializeDatabase, IN_MEMORY_DB } from '../persistence/db.js';
import { migrateSchema } from '../persistence/schema.js';
import type { QuotaDefinition } from '../config/types.js';

export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;

/** Arbitrary fixed epoch used as "t0" across tests. */
export const T0 = 1_700_000_000_000;

/** Fresh migrated in-memory database. */
export function createTestDb(): Database.Database {
  const db = initializeDatabase(IN_MEMORY_DB);
  migrateSchema(db);
  return db;
}

/** Usage-kind quota reading `used`, `limit` and `resetsAt`. */
export function usageQuota(overrides: Partial<QuotaDefinition> = {}): QuotaDefinition {
  return {
    key: 'test/requests',
    kind: 'usage',
    valueField: 'used',
    limitField: 'limit',
    resetField: 'resetsAt',
    ...overrides,
  };
}
