/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const userVersion: unknown = db.pragma('user_version', { simple: true });
  const currentVersion = typeof userVersion === 'number' ? userVersion : 0;
  logger.info({ currentVersion }, 'Database schema version check');

  const migrations = [
    // Migration 1: cycle records, one open cycle per quota key
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS quota_cycles (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          quota_key TEXT NOT NULL,
          cycle_start INTEGER NOT NULL,
          cycle_end INTEGER,
          peak REAL NOT NULL DEFAULT 0,
          total_delta REAL NOT NULL DEFAULT 0,
          start_consumed REAL NOT NULL DEFAULT 0,
          last_sample_at INTEGER NOT NULL,
          resets_at INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_cycles_key_start ON quota_cycles(quota_key, cycle_start DESC);

        -- Enforces the single-active-cycle invariant at the storage level
        CREATE UNIQUE INDEX IF NOT EXISTS idx_cycles_key_active
          ON quota_cycles(quota_key) WHERE cycle_end IS NULL;
      `);
    },
    // Migration 2: accepted samples, used for current values and window rebuilds
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS quota_samples (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          quota_key TEXT NOT NULL,
          captured_at INTEGER NOT NULL,
          consumed REAL NOT NULL,
          quota_limit REAL,
          resets_at INTEGER,
          raw_fields TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_samples_key_time ON quota_samples(quota_key, captured_at DESC);
      `);
    },
  ];

  for (let i = currentVersion; i < migrations.length; i++) {
    const targetVersion = i + 1;
    const migrate = migrations[i];
    if (migrate === undefined) {
      break;
    }
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    db.transaction(migrate)();
    db.pragma(`user_version = ${targetVersion}`);
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}
