/**
 * Value types produced by the tracking service for the presentation layer.
 * Every structure here is plain data with no behaviour.
 */

import type { Cycle } from '../cycles/types.js';
import type { BillingPeriod } from '../analytics/billing-periods.js';
import type { SeverityClassification } from '../insights/classifier.js';
import type { CounterKind, NormalizedConsumption, QuotaKey } from '../shared/types.js';

/** An accepted sample as kept in the sample log. */
export interface StoredSample {
  quotaKey: QuotaKey;
  timestamp: number;
  consumed: number;
  limit: number | null;
  resetsAt: number | null;
}

/** Append-only log of accepted samples. */
export interface SampleStore {
  append(
    quotaKey: QuotaKey,
    timestamp: number,
    consumption: NormalizedConsumption,
    rawFields: Record<string, unknown>,
  ): void;
  latest(quotaKey: QuotaKey): StoredSample | null;
  /** Samples at or after `since`, oldest first. */
  seriesSince(quotaKey: QuotaKey, since: number): StoredSample[];
}

/** Outcome of ingesting one sample. */
export type IngestResult =
  | {
      status: 'accepted';
      quotaKey: QuotaKey;
      transition: 'created' | 'updated' | 'reset';
      cycle: Cycle;
      closedCycle: Cycle | null;
    }
  | { status: 'ignored'; quotaKey: QuotaKey; reason: 'out_of_order'; lastSampleAt: number }
  | { status: 'rejected'; quotaKey: QuotaKey; reason: string };

/** Published after a reset closes a cycle. */
export interface ResetEvent {
  quotaKey: QuotaKey;
  closed: Cycle;
  opened: Cycle;
}

/** Where a consumption rate came from. */
export type RateSource = 'window' | 'cycle_average';

/** Consumption per hour, or null while data is still being collected. */
export interface RateEstimate {
  quotaKey: QuotaKey;
  rate: number | null;
  source: RateSource | null;
}

/** Current state of a quota and where it is heading. */
export interface QuotaForecast {
  quotaKey: QuotaKey;
  displayName: string;
  kind: CounterKind;
  current: number | null;
  limit: number | null;
  percent: number | null;
  severity: SeverityClassification | null;
  rate: number | null;
  rateSource: RateSource | null;
  resetsAt: number | null;
  hoursUntilReset: number | null;
  projected: number | null;
  projectedPercent: number | null;
  exhaustionHours: number | null;
  exhaustsAt: number | null;
  exhaustsFirst: boolean;
  cycleStart: number | null;
  updatedAt: number | null;
}

/** Billing-period rollups over the lookback window. */
export interface BillingReport {
  quotaKey: QuotaKey;
  lookbackDays: number;
  cycleCount: number;
  periods: BillingPeriod[];
  count: number;
  sum: number;
  average: number;
  max: number;
  last7Days: number;
}

/** Diagnostic counters for one quota key. */
export interface QuotaStats {
  quotaKey: QuotaKey;
  windowPoints: number;
  outOfOrderSamples: number;
  rejectedSamples: number;
  activeCycle: Cycle | null;
}

/** Lifetime usage figures for one quota key, from cycle deltas. */
export interface UsageSummary {
  quotaKey: QuotaKey;
  completedCycles: number;
  /** Average `totalDelta` of completed cycles; 0 without any. */
  avgPerCycle: number;
  /** Largest `totalDelta` of a completed cycle; 0 without any. */
  peakCycle: number;
  /** Completed cycles' deltas plus the active cycle's. */
  totalTracked: number;
  /** Start of the oldest completed cycle, or null without any. */
  trackingSince: number | null;
  activeCycle: Cycle | null;
}

/** Accepted samples over a time range, thinned for charting. */
export interface SampleSeries {
  quotaKey: QuotaKey;
  since: number;
  /** Samples in the range before thinning. */
  total: number;
  points: Array<StoredSample & { percent: number | null }>;
}
