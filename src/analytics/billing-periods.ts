/**
 * Billing-period grouping.
 *
 * Providers' reset timestamps jitter, so the detector can split one real
 * accounting period into several short cycles around its boundary. A true
 * boundary is where a cycle's peak falls under half of the running period's
 * peak; everything else is merged into the running period.
 */

import type { Cycle } from '../cycles/types.js';

/** Fraction of the running period's peak under which a cycle starts a new period. */
export const PERIOD_DROP_RATIO = 0.5;

/** A true provider accounting period reconstructed from adjacent cycles. */
export interface BillingPeriod {
  start: number;
  /** Highest peak among the period's cycles. */
  maxPeak: number;
  cycleCount: number;
}

/**
 * Group cycles into billing periods.
 *
 * @param cycles - Cycles for one quota key, newest first as storage returns them.
 * @returns Periods oldest first.
 */
export function groupBillingPeriods(cycles: readonly Pick<Cycle, 'start' | 'peak'>[]): BillingPeriod[] {
  const periods: BillingPeriod[] = [];
  let current: BillingPeriod | null = null;

  for (let i = cycles.length - 1; i >= 0; i--) {
    const cycle = cycles[i];
    if (cycle === undefined) continue;

    if (current === null) {
      current = { start: cycle.start, maxPeak: cycle.peak, cycleCount: 1 };
    } else if (cycle.peak < current.maxPeak * PERIOD_DROP_RATIO) {
      periods.push(current);
      current = { start: cycle.start, maxPeak: cycle.peak, cycleCount: 1 };
    } else {
      current.maxPeak = Math.max(current.maxPeak, cycle.peak);
      current.cycleCount++;
    }
  }

  if (current !== null) {
    periods.push(current);
  }

  return periods;
}

function sumPeaks(periods: readonly BillingPeriod[]): number {
  return periods.reduce((total, p) => total + p.maxPeak, 0);
}

function averagePeak(periods: readonly BillingPeriod[]): number {
  return periods.length === 0 ? 0 : sumPeaks(periods) / periods.length;
}

/** Averages of the recent and the older half of the billing periods. */
export interface TrendHalves {
  recentAverage: number;
  olderAverage: number;
}

/** Rollups over a grouped list of billing periods. */
export class BillingPeriodSummary {
  /** Periods oldest first. */
  readonly periods: readonly BillingPeriod[];

  constructor(periods: readonly BillingPeriod[]) {
    this.periods = periods;
  }

  /** Group newest-first cycles and summarize the result. */
  static fromCycles(cycles: readonly Pick<Cycle, 'start' | 'peak'>[]): BillingPeriodSummary {
    return new BillingPeriodSummary(groupBillingPeriods(cycles));
  }

  get count(): number {
    return this.periods.length;
  }

  get sum(): number {
    return sumPeaks(this.periods);
  }

  get average(): number {
    return averagePeak(this.periods);
  }

  get max(): number {
    return this.periods.reduce((peak, p) => Math.max(peak, p.maxPeak), 0);
  }

  /** Sum of peaks over periods starting at or after `instant`. */
  sumSince(instant: number): number {
    return sumPeaks(this.periods.filter((p) => p.start >= instant));
  }

  /**
   * Split periods into the newest floor(n/2) and the rest.
   * Returns null with fewer than two periods.
   */
  trendHalves(): TrendHalves | null {
    if (this.periods.length < 2) {
      return null;
    }
    const newestFirst = [...this.periods].reverse();
    const mid = Math.floor(newestFirst.length / 2);
    return {
      recentAverage: averagePeak(newestFirst.slice(0, mid)),
      olderAverage: averagePeak(newestFirst.slice(mid)),
    };
  }
}
