/**
 * Hono application assembly.
 * Mounts health, sample and quota routes behind the global error handler.
 */

import { Hono } from 'hono';
import { errorHandler } from './api/middleware/error-handler.js';
import { createHealthRoutes } from './api/routes/health.js';
import { createSampleRoutes } from './api/routes/samples.js';
import { createQuotaRoutes } from './api/routes/quotas.js';
import type { QuotaRegistry } from './quotas/registry.js';
import type { QuotaCycleService } from './tracking/service.js';

export interface AppDeps {
  registry: QuotaRegistry;
  service: QuotaCycleService;
  /** Clock for samples posted without a timestamp. */
  now?: () => number;
}

/** Build the HTTP application. */
export function createApp({ registry, service, now }: AppDeps) {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(registry));

  const v1 = new Hono();
  v1.route('/samples', createSampleRoutes(service, now));
  v1.route('/quotas', createQuotaRoutes(service));
  app.route('/v1', v1);

  return app;
}
