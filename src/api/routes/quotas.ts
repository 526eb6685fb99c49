/**
 * Quota read routes: forecasts, billing rollups, insights, cycle history,
 * usage summaries, sample series and diagnostic counters.
 */

import { Hono } from 'hono';
import { formatQuotaKey } from '../../shared/types.js';
import type { QuotaCycleService } from '../../tracking/service.js';

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 500;

/**
 * Create quota routes with injected service.
 * @param service - Tracking service that owns cycle state.
 * @returns Hono sub-app with quota endpoints.
 */
export function createQuotaRoutes(service: QuotaCycleService) {
  const app = new Hono();

  // GET / - Forecast for every registered quota
  app.get('/', (c) => {
    return c.json({ quotas: service.listForecasts() });
  });

  // GET /:provider/:quota/forecast - Current usage and projection
  app.get('/:provider/:quota/forecast', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    return c.json(service.projection(quotaKey));
  });

  // GET /:provider/:quota/billing - Billing-period rollups
  app.get('/:provider/:quota/billing', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    return c.json(service.billingSummary(quotaKey));
  });

  // GET /:provider/:quota/insights - Classified insights
  app.get('/:provider/:quota/insights', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    return c.json({ quotaKey, insights: service.insights(quotaKey) });
  });

  // GET /:provider/:quota/summary - Lifetime totals across cycles
  app.get('/:provider/:quota/summary', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    return c.json(service.summary(quotaKey));
  });

  // GET /:provider/:quota/samples?since=MS - Accepted samples for charting
  app.get('/:provider/:quota/samples', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    const sinceParam = c.req.query('since');
    const since = sinceParam === undefined ? undefined : Number(sinceParam);

    if (since !== undefined && (sinceParam === '' || !Number.isInteger(since) || since < 0)) {
      return c.json(
        {
          error: {
            message: 'since must be a non-negative epoch timestamp in milliseconds',
            type: 'invalid_request_error',
            code: 'invalid_since',
          },
        },
        400,
      );
    }

    return c.json(service.series(quotaKey, since));
  });

  // GET /:provider/:quota/stats - Diagnostic counters
  app.get('/:provider/:quota/stats', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    return c.json(service.stats(quotaKey));
  });

  // GET /:provider/:quota/cycles?limit=N - Completed cycles, newest first
  app.get('/:provider/:quota/cycles', (c) => {
    const quotaKey = formatQuotaKey(c.req.param('provider'), c.req.param('quota'));
    const limitParam = c.req.query('limit');
    const limit = limitParam === undefined ? DEFAULT_HISTORY_LIMIT : Number(limitParam);

    if (!Number.isInteger(limit) || limit < 1) {
      return c.json(
        {
          error: {
            message: 'limit must be a positive integer',
            type: 'invalid_request_error',
            code: 'invalid_limit',
          },
        },
        400,
      );
    }

    return c.json({
      quotaKey,
      cycles: service.history(quotaKey, Math.min(limit, MAX_HISTORY_LIMIT)),
    });
  });

  return app;
}
