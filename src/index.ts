/**
 * quotawatch application entry point.
 * Bootstraps configuration, the quota registry and cycle store,
 * creates the Hono application with routes, and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { buildQuotaRegistry } from './quotas/registry.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { SqliteCycleStore } from './persistence/cycle-store.js';
import { SqliteSampleLog } from './persistence/sample-log.js';
import { QuotaCycleService } from './tracking/service.js';
import { createApp } from './app.js';
import { SERVICE_VERSION } from './api/routes/health.js';

// --- Bootstrap ---

logger.info(`quotawatch v${SERVICE_VERSION} starting...`);

const configPath = resolveConfigPath();
const config = loadConfig(configPath);

// Update logger level from config
logger.level = config.settings.logLevel;

const registry = buildQuotaRegistry(config.quotas);

// --- Initialize cycle database ---
const db = initializeDatabase(config.settings.dbPath);
migrateSchema(db);

const service = new QuotaCycleService({
  registry,
  cycles: new SqliteCycleStore(db),
  samples: new SqliteSampleLog(db),
  windowMs: config.settings.rateWindowMinutes * 60_000,
  minRateSpanMs: config.settings.minRateSpanMinutes * 60_000,
  lookbackMs: config.settings.lookbackDays * 86_400_000,
  hiddenInsights: config.settings.hiddenInsights,
  onReset: ({ quotaKey, closed }) => {
    logger.info(
      { quotaKey, cycleId: closed.id, peak: closed.peak, totalDelta: closed.totalDelta },
      `Quota ${quotaKey} reset after peaking at ${closed.peak}`,
    );
  },
});

const app = createApp({ registry, service });

// --- Start server ---

const envPort = process.env['PORT'];
const port = envPort ? Number(envPort) : config.settings.port;

const server = serve(
  {
    fetch: app.fetch,
    port,
  },
  (info) => {
    logger.info({ port: info.port }, `quotawatch listening on port ${info.port}`);
    logger.info(
      {
        quotas: registry.size,
        dbPath: config.settings.dbPath,
      },
      'Ready',
    );
  },
);

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  db.close();
  logger.info('Database closed');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
