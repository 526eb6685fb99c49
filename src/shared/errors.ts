/**
 * Custom error classes for quotawatch.
 * Errors that reach the HTTP layer are mapped to JSON error bodies
 * by the global error handler.
 */

import type { ErrorResponse, QuotaKey } from './types.js';

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The backing store failed while reading or writing cycle state.
 * The current ingestion or query is aborted; callers may retry.
 */
export class StoreError extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation "${operation}" failed: ${detail}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }

  toErrorResponse(): ErrorResponse {
    return {
      error: {
        message: 'Cycle store unavailable, retry the sample later.',
        type: 'store_unavailable',
        code: this.operation,
      },
    };
  }
}

/** A raw sample could not be turned into a consumption value. */
export class SampleNormalizationError extends Error {
  public readonly quotaKey: QuotaKey;
  public readonly field: string;

  constructor(quotaKey: QuotaKey, field: string, reason: string) {
    super(`Sample for ${quotaKey} rejected: field "${field}" ${reason}`);
    this.name = 'SampleNormalizationError';
    this.quotaKey = quotaKey;
    this.field = field;
  }

  toErrorResponse(): ErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'invalid_sample',
        code: 'sample_rejected',
      },
    };
  }
}

/** A sample or query named a quota key that is not declared in config. */
export class UnknownQuotaError extends Error {
  public readonly quotaKey: string;

  constructor(quotaKey: string) {
    super(`Quota "${quotaKey}" is not registered`);
    this.name = 'UnknownQuotaError';
    this.quotaKey = quotaKey;
  }

  toErrorResponse(): ErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'not_found',
        code: 'unknown_quota',
      },
    };
  }
}
