/**
 * Cycle types and the store contract the detector writes through.
 * A cycle is one detected accounting period for a quota key.
 */

import type { QuotaKey } from '../shared/types.js';

/** One accounting period for one quota key. */
export interface Cycle {
  id: number;
  quotaKey: QuotaKey;
  /** Timestamp of the first sample in the period. */
  start: number;
  /** Timestamp of the last sample before the detected reset, or null while active. */
  end: number | null;
  /** Highest consumed value observed. Never decreases while the cycle is open. */
  peak: number;
  /** Consumption accrued across the period: peak - startConsumed. */
  totalDelta: number;
  /** Consumed value of the sample that opened the cycle. */
  startConsumed: number;
  /** Timestamp of the latest sample folded into this cycle. */
  lastSampleAt: number;
  /** Provider-reported reset time. Advisory only: it jitters between polls. */
  resetsAt: number | null;
}

/** Fields for opening a new cycle. */
export interface NewCycle {
  quotaKey: QuotaKey;
  start: number;
  initialPeak: number;
  resetsAt: number | null;
}

/** Run-time bookkeeping written on every continuation sample. */
export interface CycleUpdate {
  peak: number;
  totalDelta: number;
  lastSampleAt: number;
  resetsAt: number | null;
}

/**
 * Ordered store of cycle records.
 * Implementations are synchronous and fail fast by throwing StoreError.
 */
export interface CycleStore {
  getActiveCycle(quotaKey: QuotaKey): Cycle | null;
  createCycle(cycle: NewCycle): Cycle;
  updateCycle(cycleId: number, update: CycleUpdate): void;
  closeCycle(cycleId: number, end: number): void;
  /** Completed and active cycles starting at or after `since`, newest first. */
  listCyclesSince(quotaKey: QuotaKey, since: number): Cycle[];
  /** Completed cycles only, newest first. */
  listCycleHistory(quotaKey: QuotaKey, limit: number): Cycle[];
  /** Run `fn` atomically; any throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T;
}

/** Result of folding one sample into the cycle state of its quota key. */
export type CycleTransition =
  | { status: 'created'; cycle: Cycle }
  | { status: 'updated'; cycle: Cycle }
  | { status: 'reset'; cycle: Cycle; closed: Cycle }
  | { status: 'out_of_order'; cycle: Cycle };
