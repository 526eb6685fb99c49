/**
 * Global error handler returning JSON error bodies.
 * Catches all errors from route handlers and converts them to the
 * `{ error: { message, type, code } }` response shape.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../shared/logger.js';
import {
  ConfigError,
  SampleNormalizationError,
  StoreError,
  UnknownQuotaError,
} from '../../shared/errors.js';

/**
 * Hono error handler that converts all error types to JSON error responses.
 *
 * Error mapping:
 * - UnknownQuotaError -> 404
 * - SampleNormalizationError -> 422
 * - StoreError -> 503 (the poller retries the sample)
 * - HTTPException -> its own status
 * - ConfigError -> 500 (no internal details exposed)
 * - Unknown -> 500 (generic server error)
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof UnknownQuotaError) {
    logger.debug({ quotaKey: err.quotaKey }, err.message);
    return c.json(err.toErrorResponse(), 404);
  }

  if (err instanceof SampleNormalizationError) {
    logger.warn({ quotaKey: err.quotaKey, field: err.field }, err.message);
    return c.json(err.toErrorResponse(), 422);
  }

  if (err instanceof StoreError) {
    logger.error({ err, operation: err.operation }, 'Cycle store failure');
    return c.json(err.toErrorResponse(), 503);
  }

  if (err instanceof HTTPException) {
    return c.json(
      {
        error: {
          message: err.message,
          type: 'invalid_request_error',
          code: null,
        },
      },
      err.status,
    );
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(
      {
        error: {
          message: 'Internal configuration error',
          type: 'server_error',
          code: 'config_error',
        },
      },
      500,
    );
  }

  // Unknown error -- log full details but return generic message
  logger.error({ err }, 'Unhandled error');
  return c.json(
    {
      error: {
        message: 'Internal server error',
        type: 'server_error',
        code: null,
      },
    },
    500,
  );
};
