/**
 * Sample normalization: turns provider-specific snapshot fields into a
 * single comparable "consumed" scalar.
 *
 * Each counter kind is a strategy in a closed table; providers never
 * branch on their own semantics anywhere else.
 */

import { SampleNormalizationError } from '../shared/errors.js';
import type { CounterKind, NormalizedConsumption, QuotaSample } from '../shared/types.js';
import type { QuotaDefinition } from '../config/types.js';

/** Implicit limit for utilization-percentage quotas. */
export const PERCENT_LIMIT = 100;

interface StrategyInput {
  sample: QuotaSample;
  definition: QuotaDefinition;
  value: number;
  limit: number | null;
}

/** Maps a raw counter value to consumption for one counter kind. */
type NormalizationStrategy = (input: StrategyInput) => { consumed: number; limit: number | null };

const strategies: Record<CounterKind, NormalizationStrategy> = {
  usage: ({ value, limit }) => ({ consumed: value, limit }),

  remaining: ({ sample, definition, value, limit }) => {
    if (limit === null) {
      throw new SampleNormalizationError(
        sample.quotaKey,
        definition.limitField ?? 'limit',
        'must be a positive number for a remaining-budget counter',
      );
    }
    return { consumed: limit - value, limit };
  },

  percent: ({ value }) => ({ consumed: value, limit: PERCENT_LIMIT }),
};

/**
 * Read a numeric field. Numeric strings are accepted because several
 * providers serialize counters as strings.
 */
function readNumber(fields: Record<string, unknown>, field: string): number | undefined {
  const raw = fields[field];
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    return Number(raw);
  }
  return undefined;
}

/** A limit that is missing, non-finite, zero or negative is unknown. */
function toKnownLimit(limit: number | undefined): number | null {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return null;
  }
  return limit;
}

/** Reset times may arrive as epoch ms or as ISO strings. */
function readResetTime(sample: QuotaSample, definition: QuotaDefinition): number | null {
  if (sample.resetsAt !== undefined) {
    return Number.isFinite(sample.resetsAt) ? sample.resetsAt : null;
  }
  if (definition.resetField === undefined) {
    return null;
  }
  const raw = sample.rawFields[definition.resetField];
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return raw;
  }
  if (typeof raw === 'string') {
    const parsed = Date.parse(raw);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Normalize a raw sample using its quota's declared counter kind.
 *
 * @throws SampleNormalizationError when the value field is missing or not a finite number,
 *   or when a remaining-budget counter has no usable limit.
 */
export function normalizeSample(
  sample: QuotaSample,
  definition: QuotaDefinition,
): NormalizedConsumption {
  if (!Number.isFinite(sample.timestamp)) {
    throw new SampleNormalizationError(sample.quotaKey, 'timestamp', 'must be a finite number');
  }

  const value = readNumber(sample.rawFields, definition.valueField);
  if (value === undefined) {
    throw new SampleNormalizationError(sample.quotaKey, definition.valueField, 'is missing');
  }
  if (!Number.isFinite(value)) {
    throw new SampleNormalizationError(sample.quotaKey, definition.valueField, 'is not a finite number');
  }

  const rawLimit =
    sample.limit ??
    (definition.limitField !== undefined
      ? readNumber(sample.rawFields, definition.limitField)
      : undefined);

  const { consumed, limit } = strategies[definition.kind]({
    sample,
    definition,
    value,
    limit: toKnownLimit(rawLimit),
  });

  return { consumed, limit, resetsAt: readResetTime(sample, definition) };
}

/**
 * Percentage of the limit consumed, or null when the limit is unknown.
 * Percent-kind quotas report their value directly.
 */
export function usagePercent(consumption: Pick<NormalizedConsumption, 'consumed' | 'limit'>): number | null {
  if (consumption.limit === null || consumption.limit <= 0) {
    return null;
  }
  return (consumption.consumed / consumption.limit) * 100;
}
