import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { QuotaCycleService, type QuotaCycleServiceOptions } from '../service.js';
import { SqliteCycleStore } from '../../persistence/cycle-store.js';
import { SqliteSampleLog } from '../../persistence/sample-log.js';
import { buildQuotaRegistry } from '../../quotas/registry.js';
import { StoreError, UnknownQuotaError } from '../../shared/errors.js';
import { createTestDb, usageQuota, HOUR, MINUTE, T0 } from '../../__tests__/fixtures.js';
import type { QuotaSample } from '../../shared/types.js';
import type { ResetEvent, SampleStore } from '../types.js';

const KEY = 'test/requests';
const RESETS_AT = T0 + 4.5 * HOUR;

function sample(at: number, used: number): QuotaSample {
  return { quotaKey: KEY, timestamp: at, rawFields: { used, limit: 1000, resetsAt: RESETS_AT } };
}

describe('QuotaCycleService', () => {
  let db: Database.Database;
  let now: number;
  let resets: ResetEvent[];

  function createService(overrides: Partial<QuotaCycleServiceOptions> = {}) {
    return new QuotaCycleService({
      registry: buildQuotaRegistry([usageQuota({ displayName: 'Test requests' })]),
      cycles: new SqliteCycleStore(db),
      samples: new SqliteSampleLog(db),
      now: () => now,
      onReset: (event) => resets.push(event),
      ...overrides,
    });
  }

  beforeEach(() => {
    db = createTestDb();
    now = T0;
    resets = [];
  });

  describe('ingest', () => {
    it('accepts the first sample and opens a cycle', () => {
      const service = createService();
      const result = service.ingest(sample(T0, 100));

      expect(result).toMatchObject({
        status: 'accepted',
        quotaKey: KEY,
        transition: 'created',
        cycle: { start: T0, peak: 100 },
        closedCycle: null,
      });
    });

    it('reports a reset and notifies the listener', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      const result = service.ingest(sample(T0 + 60 * MINUTE, 10));

      expect(result).toMatchObject({
        status: 'accepted',
        transition: 'reset',
        cycle: { start: T0 + 60 * MINUTE, peak: 10 },
        closedCycle: { start: T0, end: T0 + 30 * MINUTE, peak: 250, totalDelta: 150 },
      });
      expect(resets).toHaveLength(1);
      expect(resets[0]?.closed.peak).toBe(250);
      expect(service.stats(KEY).windowPoints).toBe(1);
    });

    it('ignores and counts out-of-order samples', () => {
      const service = createService();
      service.ingest(sample(T0 + 10 * MINUTE, 100));

      expect(service.ingest(sample(T0, 5))).toEqual({
        status: 'ignored',
        quotaKey: KEY,
        reason: 'out_of_order',
        lastSampleAt: T0 + 10 * MINUTE,
      });
      expect(service.stats(KEY).outOfOrderSamples).toBe(1);
      expect(service.projection(KEY).current).toBe(100);
    });

    it('rejects malformed samples without touching state', () => {
      const service = createService();
      const result = service.ingest({ quotaKey: KEY, timestamp: T0, rawFields: { limit: 1000 } });

      expect(result).toEqual({
        status: 'rejected',
        quotaKey: KEY,
        reason: 'Sample for test/requests rejected: field "used" is missing',
      });
      expect(service.stats(KEY)).toMatchObject({ rejectedSamples: 1, activeCycle: null });
      expect(service.projection(KEY).current).toBeNull();
    });

    it('throws for unregistered quota keys', () => {
      const service = createService();
      expect(() => service.ingest({ quotaKey: 'acme/tokens', timestamp: T0, rawFields: { used: 1 } })).toThrow(
        UnknownQuotaError,
      );
    });

    it('commits nothing when the sample log fails', () => {
      const failingLog: SampleStore = {
        append: vi.fn(() => {
          throw new StoreError('appendSample', new Error('disk full'));
        }),
        latest: () => null,
        seriesSince: () => [],
      };
      const cycles = new SqliteCycleStore(db);
      const service = createService({ cycles, samples: failingLog });

      expect(() => service.ingest(sample(T0, 100))).toThrow(StoreError);
      expect(cycles.getActiveCycle(KEY)).toBeNull();
    });
  });

  describe('rate', () => {
    it('uses the short window when it spans enough time', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      now = T0 + 30 * MINUTE;

      expect(service.rate(KEY)).toEqual({ quotaKey: KEY, rate: 300, source: 'window' });
    });

    it('falls back to the cycle-averaged rate after a reset', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      service.ingest(sample(T0 + 60 * MINUTE, 10));
      now = T0 + 60 * MINUTE;

      expect(service.rate(KEY)).toEqual({ quotaKey: KEY, rate: 150, source: 'cycle_average' });
    });

    it('is null while data is still being collected', () => {
      const service = createService();
      service.ingest(sample(T0, 100));

      expect(service.rate(KEY)).toEqual({ quotaKey: KEY, rate: null, source: null });
    });
  });

  describe('projection', () => {
    it('escalates severity when the quota runs out before it resets', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      now = T0 + 30 * MINUTE;

      expect(service.projection(KEY)).toEqual({
        quotaKey: KEY,
        displayName: 'Test requests',
        kind: 'usage',
        current: 250,
        limit: 1000,
        percent: 25,
        severity: { level: 'warning', severity: 'info' },
        rate: 300,
        rateSource: 'window',
        resetsAt: RESETS_AT,
        hoursUntilReset: 4,
        projected: 1000,
        projectedPercent: 100,
        exhaustionHours: 2.5,
        exhaustsAt: T0 + 3 * HOUR,
        exhaustsFirst: true,
        cycleStart: T0,
        updatedAt: T0 + 30 * MINUTE,
      });
    });

    it('projects exhaustion from a ten-minute window', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 10 * MINUTE, 150));
      now = T0 + 10 * MINUTE;

      const forecast = service.projection(KEY);
      expect(forecast.rateSource).toBe('window');
      expect(forecast.rate).toBeCloseTo(300, 6);
      expect(forecast.exhaustionHours).toBeCloseTo(2.8333, 4);
      expect(forecast.exhaustsFirst).toBe(true);
    });

    it('returns nulls for a quota without samples', () => {
      const forecast = createService().projection(KEY);

      expect(forecast).toMatchObject({
        current: null,
        percent: null,
        severity: null,
        rate: null,
        exhaustsFirst: false,
        cycleStart: null,
      });
    });
  });

  describe('billingSummary', () => {
    it('rolls up cycles into billing periods', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      service.ingest(sample(T0 + 60 * MINUTE, 10));
      now = T0 + 60 * MINUTE;

      expect(service.billingSummary(KEY)).toEqual({
        quotaKey: KEY,
        lookbackDays: 30,
        cycleCount: 2,
        periods: [
          { start: T0, maxPeak: 250, cycleCount: 1 },
          { start: T0 + 60 * MINUTE, maxPeak: 10, cycleCount: 1 },
        ],
        count: 2,
        sum: 260,
        average: 130,
        max: 250,
        last7Days: 260,
      });
    });
  });

  describe('insights', () => {
    it('leads with the forecast insight', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      now = T0 + 30 * MINUTE;

      const [first] = service.insights(KEY);
      expect(first).toMatchObject({ key: 'forecast', title: 'Exhausts Before Reset', metric: '2h 30m' });
    });

    it('drops hidden insights', () => {
      const service = createService({ hiddenInsights: ['forecast', 'weekly_pace'] });
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 30 * MINUTE, 250));
      now = T0 + 30 * MINUTE;

      expect(service.insights(KEY).map((i) => i.key)).toEqual(['getting_started']);
    });
  });

  describe('history', () => {
    it('lists completed cycles newest first', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 10 * MINUTE, 10));
      service.ingest(sample(T0 + 20 * MINUTE, 500));
      service.ingest(sample(T0 + 30 * MINUTE, 1));

      expect(service.history(KEY, 10).map((c) => c.peak)).toEqual([500, 100]);
    });
  });

  describe('summary', () => {
    it('totals cycle deltas across completed and active cycles', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 10 * MINUTE, 160));
      service.ingest(sample(T0 + 20 * MINUTE, 10));
      service.ingest(sample(T0 + 30 * MINUTE, 90));
      service.ingest(sample(T0 + 40 * MINUTE, 5));
      service.ingest(sample(T0 + 50 * MINUTE, 25));

      expect(service.summary(KEY)).toMatchObject({
        quotaKey: KEY,
        completedCycles: 2,
        avgPerCycle: 70,
        peakCycle: 80,
        totalTracked: 160,
        trackingSince: T0,
        activeCycle: { start: T0 + 40 * MINUTE, totalDelta: 20 },
      });
    });

    it('reports zeros before any cycle completes', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 10 * MINUTE, 130));

      expect(service.summary(KEY)).toMatchObject({
        completedCycles: 0,
        avgPerCycle: 0,
        peakCycle: 0,
        totalTracked: 30,
        trackingSince: null,
      });
    });
  });

  describe('series', () => {
    it('defaults to the last day of samples', () => {
      const service = createService();
      service.ingest(sample(T0, 100));
      service.ingest(sample(T0 + 2 * HOUR, 150));
      service.ingest(sample(T0 + 25 * HOUR, 200));
      now = T0 + 25 * HOUR;

      expect(service.series(KEY)).toEqual({
        quotaKey: KEY,
        since: T0 + HOUR,
        total: 2,
        points: [
          { quotaKey: KEY, timestamp: T0 + 2 * HOUR, consumed: 150, limit: 1000, resetsAt: RESETS_AT, percent: 15 },
          { quotaKey: KEY, timestamp: T0 + 25 * HOUR, consumed: 200, limit: 1000, resetsAt: RESETS_AT, percent: 20 },
        ],
      });
    });

    it('thins long ranges and keeps the newest sample', () => {
      const service = createService();
      for (let i = 0; i < 1200; i++) {
        service.ingest({ quotaKey: KEY, timestamp: T0 + i * MINUTE, rawFields: { used: i, limit: 5000 } });
      }

      const series = service.series(KEY, T0);
      expect(series.total).toBe(1200);
      expect(series.points).toHaveLength(401);
      expect(series.points[1]?.timestamp).toBe(T0 + 3 * MINUTE);
      expect(series.points[400]?.timestamp).toBe(T0 + 1199 * MINUTE);
    });
  });

  describe('restart', () => {
    it('rebuilds the rate window from the sample log', () => {
      const first = createService();
      first.ingest(sample(T0, 100));
      first.ingest(sample(T0 + 30 * MINUTE, 250));
      now = T0 + 30 * MINUTE;

      const restarted = createService();
      expect(restarted.stats(KEY).windowPoints).toBe(2);
      expect(restarted.rate(KEY)).toEqual({ quotaKey: KEY, rate: 300, source: 'window' });
    });
  });

  describe('listForecasts', () => {
    it('returns one forecast per registered quota', () => {
      const service = createService({
        registry: buildQuotaRegistry([usageQuota(), usageQuota({ key: 'acme/weekly', kind: 'percent', valueField: 'pct' })]),
      });
      expect(service.listForecasts().map((f) => f.quotaKey)).toEqual([KEY, 'acme/weekly']);
    });
  });
});
