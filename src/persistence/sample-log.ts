/**
 * Sample log: append-only record of accepted samples.
 * Feeds current values to forecasts and rebuilds rate windows after a restart.
 */

import type Database from 'better-sqlite3';
import { runStoreOperation } from './cycle-store.js';
import { StoreError } from '../shared/errors.js';
import { isQuotaKey, type NormalizedConsumption, type QuotaKey } from '../shared/types.js';
import type { SampleStore, StoredSample } from '../tracking/types.js';

/** Raw quota_samples row as selected. */
interface SampleRow {
  quotaKey: string;
  timestamp: number;
  consumed: number;
  limit: number | null;
  resetsAt: number | null;
}

const SAMPLE_COLUMNS = `
  quota_key as quotaKey,
  captured_at as timestamp,
  consumed,
  quota_limit as "limit",
  resets_at as resetsAt
`;

function toStoredSample(row: SampleRow): StoredSample {
  if (!isQuotaKey(row.quotaKey)) {
    throw new StoreError('readSample', new Error(`Malformed quota key "${row.quotaKey}"`));
  }
  return { ...row, quotaKey: row.quotaKey };
}

/** Sample store backed by the quota_samples table. */
export class SqliteSampleLog implements SampleStore {
  private readonly insertStmt: Database.Statement<[string, number, number, number | null, number | null, string]>;
  private readonly latestStmt: Database.Statement<[string], SampleRow>;
  private readonly seriesStmt: Database.Statement<[string, number], SampleRow>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<[string, number, number, number | null, number | null, string]>(`
      INSERT INTO quota_samples (
        quota_key,
        captured_at,
        consumed,
        quota_limit,
        resets_at,
        raw_fields
      )
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.latestStmt = db.prepare<[string], SampleRow>(`
      SELECT ${SAMPLE_COLUMNS}
      FROM quota_samples
      WHERE quota_key = ?
      ORDER BY captured_at DESC, id DESC
      LIMIT 1
    `);

    this.seriesStmt = db.prepare<[string, number], SampleRow>(`
      SELECT ${SAMPLE_COLUMNS}
      FROM quota_samples
      WHERE quota_key = ? AND captured_at >= ?
      ORDER BY captured_at ASC, id ASC
    `);
  }

  append(
    quotaKey: QuotaKey,
    timestamp: number,
    consumption: NormalizedConsumption,
    rawFields: Record<string, unknown>,
  ): void {
    runStoreOperation('appendSample', () => {
      this.insertStmt.run(
        quotaKey,
        timestamp,
        consumption.consumed,
        consumption.limit,
        consumption.resetsAt,
        JSON.stringify(rawFields),
      );
    });
  }

  latest(quotaKey: QuotaKey): StoredSample | null {
    return runStoreOperation('latestSample', () => {
      const row = this.latestStmt.get(quotaKey);
      return row === undefined ? null : toStoredSample(row);
    });
  }

  seriesSince(quotaKey: QuotaKey, since: number): StoredSample[] {
    return runStoreOperation('sampleSeries', () =>
      this.seriesStmt.all(quotaKey, since).map(toStoredSample),
    );
  }
}
