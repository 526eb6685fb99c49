/**
 * GET /health handler.
 * Returns service status information.
 */

import { Hono } from 'hono';
import type { QuotaRegistry } from '../../quotas/registry.js';

export const SERVICE_VERSION = '0.1.0';

/**
 * Create health routes with injected dependencies.
 * @param registry - Registry of tracked quotas.
 * @returns Hono app with GET / route for health checks.
 */
export function createHealthRoutes(registry: QuotaRegistry) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: SERVICE_VERSION,
      uptime: process.uptime(),
      quotas: registry.size,
    });
  });

  return app;
}
