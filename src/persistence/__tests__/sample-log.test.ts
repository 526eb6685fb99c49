import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteSampleLog } from '../sample-log.js';
import { createTestDb, MINUTE, T0 } from '../../__tests__/fixtures.js';

const KEY = 'test/requests';

describe('SqliteSampleLog', () => {
  let db: Database.Database;
  let log: SqliteSampleLog;

  beforeEach(() => {
    db = createTestDb();
    log = new SqliteSampleLog(db);
  });

  it('returns null before any sample', () => {
    expect(log.latest(KEY)).toBeNull();
  });

  it('returns the most recent sample', () => {
    log.append(KEY, T0, { consumed: 10, limit: 100, resetsAt: null }, { used: 10 });
    log.append(KEY, T0 + MINUTE, { consumed: 15, limit: null, resetsAt: T0 + 60 * MINUTE }, { used: 15 });

    expect(log.latest(KEY)).toEqual({
      quotaKey: KEY,
      timestamp: T0 + MINUTE,
      consumed: 15,
      limit: null,
      resetsAt: T0 + 60 * MINUTE,
    });
  });

  it('returns a series oldest first from an instant', () => {
    for (let i = 0; i < 4; i++) {
      log.append(KEY, T0 + i * MINUTE, { consumed: i * 10, limit: 100, resetsAt: null }, {});
    }
    log.append('test/other', T0 + 2 * MINUTE, { consumed: 999, limit: 100, resetsAt: null }, {});

    expect(log.seriesSince(KEY, T0 + 2 * MINUTE).map((s) => s.consumed)).toEqual([20, 30]);
  });

  it('keeps the raw fields as JSON', () => {
    log.append(KEY, T0, { consumed: 1, limit: null, resetsAt: null }, { used: 1, plan: 'pro' });

    const row = db
      .prepare<[], { raw_fields: string }>('SELECT raw_fields FROM quota_samples')
      .get();
    expect(row?.raw_fields).toBe('{"used":1,"plan":"pro"}');
  });
});
