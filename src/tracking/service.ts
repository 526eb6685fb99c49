/**
 * Quota cycle tracking service.
 *
 * Owns one isolated state entry per quota key (definition, rate window,
 * diagnostic counters) and coordinates normalization, cycle detection and
 * the read-side analytics. Ingestion is synchronous: with a synchronous
 * store, the read-decide-write sequence for a key cannot interleave with
 * another ingestion in this process.
 */

import { logger } from '../shared/logger.js';
import { SampleNormalizationError } from '../shared/errors.js';
import { normalizeSample, usagePercent } from '../quotas/normalizer.js';
import { CycleDetector } from '../cycles/detector.js';
import { BillingPeriodSummary } from '../analytics/billing-periods.js';
import {
  TrackerWindow,
  cycleAveragedRate,
  windowRate,
  DEFAULT_MIN_SPAN_MS,
  DEFAULT_WINDOW_MS,
} from '../analytics/rate.js';
import { project } from '../analytics/projection.js';
import { classifySeverity, escalateSeverity } from '../insights/classifier.js';
import { buildInsights, type Insight } from '../insights/insights.js';
import type { QuotaRegistry } from '../quotas/registry.js';
import type { CycleStore, Cycle } from '../cycles/types.js';
import type { InsightKey, QuotaDefinition } from '../config/types.js';
import type { NormalizedConsumption, QuotaKey, QuotaSample } from '../shared/types.js';
import type {
  BillingReport,
  IngestResult,
  QuotaForecast,
  QuotaStats,
  RateEstimate,
  ResetEvent,
  SampleSeries,
  SampleStore,
  StoredSample,
  UsageSummary,
} from './types.js';

const MS_PER_DAY = 86_400_000;
const DEFAULT_LOOKBACK_MS = 30 * MS_PER_DAY;
const WEEK_MS = 7 * MS_PER_DAY;
const DEFAULT_SERIES_SPAN_MS = MS_PER_DAY;
const MAX_SERIES_POINTS = 500;

/** Isolated run-time state for one quota key. */
interface QuotaState {
  definition: QuotaDefinition;
  window: TrackerWindow;
  outOfOrderSamples: number;
  rejectedSamples: number;
}

export interface QuotaCycleServiceOptions {
  registry: QuotaRegistry;
  cycles: CycleStore;
  samples: SampleStore;
  /** Span of the short rate window. */
  windowMs?: number;
  /** Minimum span for any rate estimate. */
  minRateSpanMs?: number;
  /** How far back billing rollups and the cycle-averaged rate look. */
  lookbackMs?: number;
  hiddenInsights?: readonly InsightKey[];
  /** Clock, injectable for tests. */
  now?: () => number;
  /** Called after a reset has been committed. */
  onReset?: (event: ResetEvent) => void;
}

/** Coordinates ingestion and analytics for every registered quota key. */
export class QuotaCycleService {
  private readonly states = new Map<QuotaKey, QuotaState>();
  private readonly detector: CycleDetector;
  private readonly registry: QuotaRegistry;
  private readonly cycles: CycleStore;
  private readonly samples: SampleStore;
  private readonly windowMs: number;
  private readonly minRateSpanMs: number;
  private readonly lookbackMs: number;
  private readonly hiddenInsights: ReadonlySet<InsightKey>;
  private readonly now: () => number;
  private readonly onReset: ((event: ResetEvent) => void) | undefined;

  constructor(options: QuotaCycleServiceOptions) {
    this.registry = options.registry;
    this.cycles = options.cycles;
    this.samples = options.samples;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.minRateSpanMs = options.minRateSpanMs ?? DEFAULT_MIN_SPAN_MS;
    this.lookbackMs = options.lookbackMs ?? DEFAULT_LOOKBACK_MS;
    this.hiddenInsights = new Set(options.hiddenInsights ?? []);
    this.now = options.now ?? Date.now;
    this.onReset = options.onReset;
    this.detector = new CycleDetector(this.cycles);
  }

  /**
   * Fold one sample into its quota's cycle state.
   * Malformed samples are rejected without touching state; out-of-order
   * samples are ignored and counted. Store failures propagate.
   *
   * @throws UnknownQuotaError if the sample's quota key is not registered.
   * @throws StoreError if the store fails; nothing is committed.
   */
  ingest(sample: QuotaSample): IngestResult {
    const state = this.stateFor(sample.quotaKey);
    const { quotaKey } = sample;

    const normalized = this.normalize(sample, state);
    if (!normalized.ok) {
      return { status: 'rejected', quotaKey, reason: normalized.reason };
    }
    const consumption = normalized.value;

    const transition = this.cycles.transaction(() => {
      const result = this.detector.ingest(quotaKey, sample.timestamp, consumption);
      if (result.status !== 'out_of_order') {
        this.samples.append(quotaKey, sample.timestamp, consumption, sample.rawFields);
      }
      return result;
    });

    switch (transition.status) {
      case 'out_of_order':
        state.outOfOrderSamples++;
        logger.debug(
          {
            quotaKey,
            timestamp: sample.timestamp,
            lastSampleAt: transition.cycle.lastSampleAt,
            outOfOrderSamples: state.outOfOrderSamples,
          },
          `Ignored out-of-order sample for ${quotaKey}`,
        );
        return {
          status: 'ignored',
          quotaKey,
          reason: 'out_of_order',
          lastSampleAt: transition.cycle.lastSampleAt,
        };

      case 'reset':
        state.window.clear();
        state.window.push(sample.timestamp, consumption.consumed);
        this.onReset?.({ quotaKey, closed: transition.closed, opened: transition.cycle });
        return {
          status: 'accepted',
          quotaKey,
          transition: 'reset',
          cycle: transition.cycle,
          closedCycle: transition.closed,
        };

      case 'created':
      case 'updated':
        state.window.push(sample.timestamp, consumption.consumed);
        return {
          status: 'accepted',
          quotaKey,
          transition: transition.status,
          cycle: transition.cycle,
          closedCycle: null,
        };
    }
  }

  /**
   * Current consumption rate per hour.
   * Prefers the short window; falls back to the cycle-averaged rate.
   */
  rate(quotaKey: QuotaKey): RateEstimate {
    const state = this.stateFor(quotaKey);
    const now = this.now();

    const recent = windowRate(state.window.pointsSince(now - this.windowMs), this.minRateSpanMs);
    if (recent !== null) {
      return { quotaKey, rate: recent, source: 'window' };
    }

    const cycles = this.cycles.listCyclesSince(quotaKey, now - this.lookbackMs);
    const averaged = cycleAveragedRate(cycles, now, this.minRateSpanMs);
    if (averaged !== null) {
      return { quotaKey, rate: averaged, source: 'cycle_average' };
    }

    return { quotaKey, rate: null, source: null };
  }

  /** Current usage, severity and forward projection for one quota. */
  projection(quotaKey: QuotaKey): QuotaForecast {
    const { definition } = this.stateFor(quotaKey);
    const now = this.now();
    const latest = this.samples.latest(quotaKey);
    const active = this.cycles.getActiveCycle(quotaKey);
    const { rate, source } = this.rate(quotaKey);

    const base = {
      quotaKey,
      displayName: definition.displayName ?? quotaKey,
      kind: definition.kind,
      rate,
      rateSource: source,
      cycleStart: active?.start ?? null,
    };

    if (latest === null) {
      return {
        ...base,
        current: null,
        limit: null,
        percent: null,
        severity: null,
        resetsAt: active?.resetsAt ?? null,
        hoursUntilReset: null,
        projected: null,
        projectedPercent: null,
        exhaustionHours: null,
        exhaustsAt: null,
        exhaustsFirst: false,
        updatedAt: null,
      };
    }

    const resetsAt = latest.resetsAt ?? active?.resetsAt ?? null;
    const projection = project({
      current: latest.consumed,
      limit: latest.limit,
      rate,
      resetsAt,
      now,
    });

    const percent = usagePercent(latest);
    let severity = percent === null ? null : classifySeverity(percent);
    if (severity !== null && projection.exhaustsFirst) {
      severity = escalateSeverity(severity);
    }

    return {
      ...base,
      current: latest.consumed,
      limit: latest.limit,
      percent,
      severity,
      resetsAt,
      ...projection,
      projectedPercent:
        projection.projected === null
          ? null
          : usagePercent({ consumed: projection.projected, limit: latest.limit }),
      updatedAt: latest.timestamp,
    };
  }

  /** Billing-period rollups over the lookback window. */
  billingSummary(quotaKey: QuotaKey): BillingReport {
    this.stateFor(quotaKey);
    const now = this.now();
    const cycles = this.cycles.listCyclesSince(quotaKey, now - this.lookbackMs);
    const summary = BillingPeriodSummary.fromCycles(cycles);

    return {
      quotaKey,
      lookbackDays: Math.round(this.lookbackMs / MS_PER_DAY),
      cycleCount: cycles.length,
      periods: [...summary.periods],
      count: summary.count,
      sum: summary.sum,
      average: summary.average,
      max: summary.max,
      last7Days: summary.sumSince(now - WEEK_MS),
    };
  }

  /** Severity, trend and variance insights for one quota. */
  insights(quotaKey: QuotaKey): Insight[] {
    return buildInsights({
      forecast: this.projection(quotaKey),
      billing: this.billingSummary(quotaKey),
      hidden: this.hiddenInsights,
    });
  }

  /** Completed cycles, newest first. */
  history(quotaKey: QuotaKey, limit: number): Cycle[] {
    this.stateFor(quotaKey);
    return this.cycles.listCycleHistory(quotaKey, limit);
  }

  /** Lifetime totals from every stored cycle of one quota. */
  summary(quotaKey: QuotaKey): UsageSummary {
    this.stateFor(quotaKey);
    const cycles = this.cycles.listCyclesSince(quotaKey, 0);
    const completed = cycles.filter((cycle) => cycle.end !== null);
    const active = cycles.find((cycle) => cycle.end === null) ?? null;

    let total = 0;
    let peak = 0;
    let since: number | null = null;
    for (const cycle of completed) {
      total += cycle.totalDelta;
      peak = Math.max(peak, cycle.totalDelta);
      since = since === null ? cycle.start : Math.min(since, cycle.start);
    }

    return {
      quotaKey,
      completedCycles: completed.length,
      avgPerCycle: completed.length > 0 ? total / completed.length : 0,
      peakCycle: peak,
      totalTracked: total + (active?.totalDelta ?? 0),
      trackingSince: since,
      activeCycle: active,
    };
  }

  /**
   * Accepted samples from `since` on, oldest first.
   * Long ranges are thinned to an even stride; the newest sample is always kept.
   */
  series(quotaKey: QuotaKey, since?: number): SampleSeries {
    this.stateFor(quotaKey);
    const from = since ?? this.now() - DEFAULT_SERIES_SPAN_MS;
    const samples = this.samples.seriesSince(quotaKey, from);

    return {
      quotaKey,
      since: from,
      total: samples.length,
      points: thin(samples, MAX_SERIES_POINTS).map((point) => ({
        ...point,
        percent: usagePercent(point),
      })),
    };
  }

  /** Diagnostic counters for one quota. */
  stats(quotaKey: QuotaKey): QuotaStats {
    const state = this.stateFor(quotaKey);
    return {
      quotaKey,
      windowPoints: state.window.size,
      outOfOrderSamples: state.outOfOrderSamples,
      rejectedSamples: state.rejectedSamples,
      activeCycle: this.cycles.getActiveCycle(quotaKey),
    };
  }

  /** Forecasts for every registered quota, in config order. */
  listForecasts(): QuotaForecast[] {
    return this.registry.getAll().map((definition) => this.projection(definition.key));
  }

  /**
   * Normalize a sample, counting and logging it when malformed.
   * Errors other than normalization failures propagate.
   */
  private normalize(
    sample: QuotaSample,
    state: QuotaState,
  ): { ok: true; value: NormalizedConsumption } | { ok: false; reason: string } {
    try {
      return { ok: true, value: normalizeSample(sample, state.definition) };
    } catch (err) {
      if (!(err instanceof SampleNormalizationError)) {
        throw err;
      }
      state.rejectedSamples++;
      logger.warn(
        { quotaKey: sample.quotaKey, timestamp: sample.timestamp, field: err.field, rejected: state.rejectedSamples },
        err.message,
      );
      return { ok: false, reason: err.message };
    }
  }

  /**
   * Get or lazily create the state entry for a quota key.
   * A new entry's window is rebuilt from the sample log, limited to the active cycle.
   * @throws UnknownQuotaError if the key is not registered.
   */
  private stateFor(quotaKey: QuotaKey): QuotaState {
    const existing = this.states.get(quotaKey);
    if (existing !== undefined) {
      return existing;
    }

    const definition = this.registry.get(quotaKey);
    const window = new TrackerWindow(this.windowMs);

    const active = this.cycles.getActiveCycle(quotaKey);
    if (active !== null) {
      const since = Math.max(active.start, this.now() - this.windowMs);
      for (const point of this.samples.seriesSince(quotaKey, since)) {
        window.push(point.timestamp, point.consumed);
      }
    }

    const state: QuotaState = { definition, window, outOfOrderSamples: 0, rejectedSamples: 0 };
    this.states.set(quotaKey, state);
    return state;
  }
}

function thin(samples: StoredSample[], max: number): StoredSample[] {
  if (samples.length <= max) {
    return samples;
  }
  const step = Math.ceil(samples.length / max);
  const kept = samples.filter((_, index) => index % step === 0);
  const last = samples[samples.length - 1];
  if (last !== undefined && kept[kept.length - 1] !== last) {
    kept.push(last);
  }
  return kept;
}
