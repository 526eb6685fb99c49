/**
 * Consumption rate estimation.
 * A short window of recent samples gives a responsive rate; completed
 * cycle history gives a slower average when the window is too thin.
 */

import type { Cycle } from '../cycles/types.js';

export const MS_PER_HOUR = 3_600_000;

/** Default span of the rate window. */
export const DEFAULT_WINDOW_MS = 30 * 60_000;

/** Shortest span a rate is computed over; shorter spans amplify noise. */
export const DEFAULT_MIN_SPAN_MS = 5 * 60_000;

/** One (timestamp, consumed) observation in a rate window. */
export interface WindowPoint {
  timestamp: number;
  consumed: number;
}

/**
 * Bounded buffer of recent samples for one quota key.
 * Not authoritative: cleared on cycle close and rebuilt from the sample log on restart.
 */
export class TrackerWindow {
  private points: WindowPoint[] = [];

  constructor(private readonly windowMs: number = DEFAULT_WINDOW_MS) {}

  /** Append a point; points not newer than the last one are dropped. */
  push(timestamp: number, consumed: number): void {
    const newest = this.newest;
    if (newest !== undefined && timestamp <= newest.timestamp) {
      return;
    }
    this.points.push({ timestamp, consumed });

    const cutoff = timestamp - this.windowMs;
    const firstKept = this.points.findIndex((p) => p.timestamp >= cutoff);
    if (firstKept > 0) {
      this.points = this.points.slice(firstKept);
    }
  }

  clear(): void {
    this.points = [];
  }

  /** Points no older than `since`, oldest first. */
  pointsSince(since: number): WindowPoint[] {
    return this.points.filter((p) => p.timestamp >= since);
  }

  get oldest(): WindowPoint | undefined {
    return this.points[0];
  }

  get newest(): WindowPoint | undefined {
    return this.points[this.points.length - 1];
  }

  get size(): number {
    return this.points.length;
  }
}

/**
 * Rate per hour between the oldest and newest point.
 * Null with fewer than two points or a span under `minSpanMs`.
 * A flat or falling window is idle: rate 0.
 */
export function windowRate(
  points: readonly WindowPoint[],
  minSpanMs: number = DEFAULT_MIN_SPAN_MS,
): number | null {
  const oldest = points[0];
  const newest = points[points.length - 1];
  if (oldest === undefined || newest === undefined || points.length < 2) {
    return null;
  }

  const elapsedMs = newest.timestamp - oldest.timestamp;
  if (elapsedMs < minSpanMs || elapsedMs <= 0) {
    return null;
  }

  const delta = newest.consumed - oldest.consumed;
  return delta > 0 ? delta / (elapsedMs / MS_PER_HOUR) : 0;
}

/**
 * Average rate since tracking began: total tracked consumption over
 * every cycle divided by the hours since the oldest cycle started.
 */
export function cycleAveragedRate(
  cycles: readonly Pick<Cycle, 'start' | 'totalDelta'>[],
  now: number,
  minSpanMs: number = DEFAULT_MIN_SPAN_MS,
): number | null {
  if (cycles.length === 0) {
    return null;
  }

  const trackingSince = Math.min(...cycles.map((c) => c.start));
  const elapsedMs = now - trackingSince;
  if (elapsedMs < minSpanMs || elapsedMs <= 0) {
    return null;
  }

  const totalTracked = cycles.reduce((total, c) => total + Math.max(0, c.totalDelta), 0);
  return totalTracked / (elapsedMs / MS_PER_HOUR);
}
