/**
 * Shared value types used across the engine and its HTTP surface.
 * All timestamps are Unix epoch milliseconds.
 */

/** Identifier combining a provider and a quota dimension, e.g. "synthetic/subscription". */
export type QuotaKey = `${string}/${string}`;

/** How a provider reports consumption for a quota. */
export type CounterKind = 'usage' | 'remaining' | 'percent';

/** One polled observation as delivered by the poller. */
export interface QuotaSample {
  quotaKey: QuotaKey;
  /** When the provider was polled (ms). */
  timestamp: number;
  /** Provider-specific fields, interpreted by the quota's counter kind. */
  rawFields: Record<string, unknown>;
  /** Explicit limit, overriding any limit field in rawFields. */
  limit?: number;
  /** Provider-reported reset time (ms), overriding any reset field in rawFields. */
  resetsAt?: number;
}

/** A sample reduced to a single comparable scalar. Never persisted. */
export interface NormalizedConsumption {
  /** Increasing-while-the-cycle-is-open usage value. */
  consumed: number;
  /** Limit for the quota, or null when unknown. */
  limit: number | null;
  /** Provider-reported reset time, or null when not reported. */
  resetsAt: number | null;
}

/** Four-step severity scale shared by every classification. */
export type Severity = 'positive' | 'info' | 'warning' | 'negative';

/** JSON error body returned by the HTTP layer. */
export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}

/** Build a quota key from its two parts. */
export function formatQuotaKey(provider: string, quota: string): QuotaKey {
  return `${provider}/${quota}`;
}

/** Check that a string has the provider/quota shape. */
export function isQuotaKey(value: string): value is QuotaKey {
  const separator = value.indexOf('/');
  return separator > 0 && separator < value.length - 1;
}
