/**
 * Forward projection of a consumption rate: usage at the next reset and
 * time until the limit is hit.
 */

import { MS_PER_HOUR } from './rate.js';

export interface ProjectionInput {
  current: number;
  limit: number | null;
  /** Consumption per hour, or null when unknown. */
  rate: number | null;
  resetsAt: number | null;
  now: number;
}

export interface Projection {
  hoursUntilReset: number | null;
  /** Expected consumption at reset time. */
  projected: number | null;
  exhaustionHours: number | null;
  exhaustsAt: number | null;
  /** True when the limit is reached before the quota resets. */
  exhaustsFirst: boolean;
}

/** Project current consumption forward. Unknown inputs yield null fields, never NaN. */
export function project(input: ProjectionInput): Projection {
  const { current, rate, resetsAt, now } = input;
  const limit = input.limit !== null && input.limit > 0 ? input.limit : null;

  const hoursUntilReset =
    resetsAt !== null && Number.isFinite(resetsAt) && resetsAt > now
      ? (resetsAt - now) / MS_PER_HOUR
      : null;

  let projected: number | null = null;
  if (rate !== null && hoursUntilReset !== null) {
    projected = current + rate * hoursUntilReset;
    if (limit !== null) {
      projected = Math.min(Math.max(projected, 0), limit);
    }
  }

  let exhaustionHours: number | null = null;
  if (rate !== null && rate > 0 && limit !== null) {
    exhaustionHours = Math.max(0, limit - current) / rate;
  }

  const exhaustsAt = exhaustionHours === null ? null : now + exhaustionHours * MS_PER_HOUR;
  const exhaustsFirst =
    exhaustionHours !== null && hoursUntilReset !== null && exhaustionHours < hoursUntilReset;

  return { hoursUntilReset, projected, exhaustionHours, exhaustsAt, exhaustsFirst };
}
