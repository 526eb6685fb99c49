/**
 * POST /v1/samples handler.
 * Receives raw quota samples from the poller and folds them into cycle state.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { QuotaKeySchema } from '../../config/schema.js';
import type { QuotaCycleService } from '../../tracking/service.js';

/** Request body accepted by POST /v1/samples. */
export const SampleBodySchema = z.object({
  quotaKey: QuotaKeySchema,
  /** Epoch milliseconds; defaults to the time the sample is received. */
  timestamp: z.number().optional(),
  fields: z.record(z.string(), z.unknown()),
  limit: z.number().optional(),
  resetsAt: z.number().optional(),
});

export type SampleBody = z.infer<typeof SampleBodySchema>;

/**
 * Create sample ingestion routes.
 * @param service - Tracking service that owns cycle state.
 * @param now - Clock used for samples without a timestamp.
 * @returns Hono sub-app with POST / route.
 */
export function createSampleRoutes(service: QuotaCycleService, now: () => number = Date.now) {
  const app = new Hono();

  app.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        {
          error: {
            message: 'Request body must be valid JSON',
            type: 'invalid_request_error',
            code: 'invalid_json',
          },
        },
        400,
      );
    }

    const parsed = SampleBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: {
            message: z.prettifyError(parsed.error),
            type: 'invalid_request_error',
            code: 'invalid_body',
          },
        },
        400,
      );
    }

    const { quotaKey, timestamp, fields, limit, resetsAt } = parsed.data;
    const result = service.ingest({
      quotaKey,
      timestamp: timestamp ?? now(),
      rawFields: fields,
      ...(limit !== undefined && { limit }),
      ...(resetsAt !== undefined && { resetsAt }),
    });

    return c.json(result, result.status === 'accepted' ? 202 : 200);
  });

  return app;
}
