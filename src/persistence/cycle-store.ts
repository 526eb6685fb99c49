/**
 * SQLite implementation of the cycle store contract.
 * Uses prepared statements; every driver failure is surfaced as a StoreError.
 */

import type Database from 'better-sqlite3';
import { StoreError } from '../shared/errors.js';
import { isQuotaKey, type QuotaKey } from '../shared/types.js';
import type { Cycle, CycleStore, CycleUpdate, NewCycle } from '../cycles/types.js';

/** Raw quota_cycles row as selected. */
interface CycleRow {
  id: number;
  quotaKey: string;
  start: number;
  end: number | null;
  peak: number;
  totalDelta: number;
  startConsumed: number;
  lastSampleAt: number;
  resetsAt: number | null;
}

const CYCLE_COLUMNS = `
  id,
  quota_key as quotaKey,
  cycle_start as start,
  cycle_end as end,
  peak,
  total_delta as totalDelta,
  start_consumed as startConsumed,
  last_sample_at as lastSampleAt,
  resets_at as resetsAt
`;

/**
 * Run a store operation, wrapping driver errors.
 * StoreErrors raised by nested operations pass through unchanged.
 */
export function runStoreOperation<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StoreError) {
      throw err;
    }
    throw new StoreError(operation, err);
  }
}

function toCycle(row: CycleRow): Cycle {
  if (!isQuotaKey(row.quotaKey)) {
    throw new StoreError('readCycle', new Error(`Malformed quota key "${row.quotaKey}" in cycle ${row.id}`));
  }
  return { ...row, quotaKey: row.quotaKey };
}

/** Cycle store backed by the quota_cycles table. */
export class SqliteCycleStore implements CycleStore {
  private readonly getActiveStmt: Database.Statement<[string], CycleRow>;
  private readonly insertStmt: Database.Statement<[string, number, number, number, number, number | null]>;
  private readonly updateStmt: Database.Statement<[number, number, number, number | null, number]>;
  private readonly closeStmt: Database.Statement<[number, number]>;
  private readonly listSinceStmt: Database.Statement<[string, number], CycleRow>;
  private readonly historyStmt: Database.Statement<[string, number], CycleRow>;

  constructor(private readonly db: Database.Database) {
    this.getActiveStmt = db.prepare<[string], CycleRow>(`
      SELECT ${CYCLE_COLUMNS}
      FROM quota_cycles
      WHERE quota_key = ? AND cycle_end IS NULL
    `);

    this.insertStmt = db.prepare<[string, number, number, number, number, number | null]>(`
      INSERT INTO quota_cycles (
        quota_key,
        cycle_start,
        peak,
        start_consumed,
        last_sample_at,
        resets_at
      )
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.updateStmt = db.prepare<[number, number, number, number | null, number]>(`
      UPDATE quota_cycles
      SET peak = ?, total_delta = ?, last_sample_at = ?, resets_at = ?
      WHERE id = ? AND cycle_end IS NULL
    `);

    this.closeStmt = db.prepare<[number, number]>(`
      UPDATE quota_cycles
      SET cycle_end = ?
      WHERE id = ? AND cycle_end IS NULL
    `);

    this.listSinceStmt = db.prepare<[string, number], CycleRow>(`
      SELECT ${CYCLE_COLUMNS}
      FROM quota_cycles
      WHERE quota_key = ? AND cycle_start >= ?
      ORDER BY cycle_start DESC, id DESC
    `);

    this.historyStmt = db.prepare<[string, number], CycleRow>(`
      SELECT ${CYCLE_COLUMNS}
      FROM quota_cycles
      WHERE quota_key = ? AND cycle_end IS NOT NULL
      ORDER BY cycle_start DESC, id DESC
      LIMIT ?
    `);
  }

  getActiveCycle(quotaKey: QuotaKey): Cycle | null {
    return runStoreOperation('getActiveCycle', () => {
      const row = this.getActiveStmt.get(quotaKey);
      return row === undefined ? null : toCycle(row);
    });
  }

  createCycle(cycle: NewCycle): Cycle {
    return runStoreOperation('createCycle', () => {
      const result = this.insertStmt.run(
        cycle.quotaKey,
        cycle.start,
        cycle.initialPeak,
        cycle.initialPeak,
        cycle.start,
        cycle.resetsAt,
      );

      return {
        id: Number(result.lastInsertRowid),
        quotaKey: cycle.quotaKey,
        start: cycle.start,
        end: null,
        peak: cycle.initialPeak,
        totalDelta: 0,
        startConsumed: cycle.initialPeak,
        lastSampleAt: cycle.start,
        resetsAt: cycle.resetsAt,
      };
    });
  }

  updateCycle(cycleId: number, update: CycleUpdate): void {
    runStoreOperation('updateCycle', () => {
      const result = this.updateStmt.run(
        update.peak,
        update.totalDelta,
        update.lastSampleAt,
        update.resetsAt,
        cycleId,
      );
      if (result.changes === 0) {
        throw new Error(`No active cycle with id ${cycleId}`);
      }
    });
  }

  closeCycle(cycleId: number, end: number): void {
    runStoreOperation('closeCycle', () => {
      const result = this.closeStmt.run(end, cycleId);
      if (result.changes === 0) {
        throw new Error(`No active cycle with id ${cycleId}`);
      }
    });
  }

  listCyclesSince(quotaKey: QuotaKey, since: number): Cycle[] {
    return runStoreOperation('listCyclesSince', () =>
      this.listSinceStmt.all(quotaKey, since).map(toCycle),
    );
  }

  listCycleHistory(quotaKey: QuotaKey, limit: number): Cycle[] {
    return runStoreOperation('listCycleHistory', () =>
      this.historyStmt.all(quotaKey, limit).map(toCycle),
    );
  }

  transaction<T>(fn: () => T): T {
    return runStoreOperation('transaction', () => this.db.transaction(fn)());
  }
}
