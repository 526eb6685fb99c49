/**
 * Cycle detection for quotas that never announce their resets.
 *
 * Providers only expose the current counter. A reset is inferred when the
 * counter falls under half of the peak observed in the open cycle; the
 * closed cycle ends at the previous sample, the new one starts at the
 * sample that revealed the drop.
 */

import { logger } from '../shared/logger.js';
import type { NormalizedConsumption, QuotaKey } from '../shared/types.js';
import type { Cycle, CycleStore, CycleTransition, CycleUpdate } from './types.js';

/** Fraction of the running peak under which a sample means the quota reset. */
export const DROP_RATIO = 0.5;

/** Peaks at or below this are treated as noise and never trigger a reset. */
export const MIN_SIGNAL = 5;

/** True when `consumed` after a cycle that peaked at `peak` means the quota reset. */
export function isResetDrop(peak: number, consumed: number): boolean {
  return peak > MIN_SIGNAL && consumed < peak * DROP_RATIO;
}

/**
 * Folds normalized samples into per-quota-key cycle records.
 * Every read-decide-write sequence runs inside one store transaction, so
 * a quota key never has two open cycles.
 */
export class CycleDetector {
  constructor(private readonly store: CycleStore) {}

  /**
   * Apply one sample to the cycle state of `quotaKey`.
   * Samples at or before the active cycle's last sample are ignored.
   */
  ingest(quotaKey: QuotaKey, timestamp: number, consumption: NormalizedConsumption): CycleTransition {
    return this.store.transaction(() => {
      const active = this.store.getActiveCycle(quotaKey);

      if (active === null) {
        const cycle = this.open(quotaKey, timestamp, consumption);
        logger.info(
          { quotaKey, start: timestamp, initialPeak: consumption.consumed },
          `Created new cycle for ${quotaKey}`,
        );
        return { status: 'created', cycle };
      }

      if (timestamp <= active.lastSampleAt) {
        return { status: 'out_of_order', cycle: active };
      }

      if (isResetDrop(active.peak, consumption.consumed)) {
        this.store.closeCycle(active.id, active.lastSampleAt);
        const closed: Cycle = { ...active, end: active.lastSampleAt };
        const cycle = this.open(quotaKey, timestamp, consumption);

        logger.info(
          {
            quotaKey,
            peak: active.peak,
            consumed: consumption.consumed,
            cycleEnd: closed.end,
            totalDelta: closed.totalDelta,
          },
          `Detected quota reset for ${quotaKey}`,
        );
        return { status: 'reset', cycle, closed };
      }

      const peak = Math.max(active.peak, consumption.consumed);
      const update: CycleUpdate = {
        peak,
        totalDelta: peak - active.startConsumed,
        lastSampleAt: timestamp,
        resetsAt: consumption.resetsAt ?? active.resetsAt,
      };
      this.store.updateCycle(active.id, update);

      return { status: 'updated', cycle: { ...active, ...update } };
    });
  }

  private open(quotaKey: QuotaKey, timestamp: number, consumption: NormalizedConsumption): Cycle {
    return this.store.createCycle({
      quotaKey,
      start: timestamp,
      initialPeak: consumption.consumed,
      resetsAt: consumption.resetsAt,
    });
  }
}
