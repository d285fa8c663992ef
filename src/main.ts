/**
 * Process entry point.
 *
 * Loads configuration, applies pending migrations, connects to Redis,
 * starts the alert engine and serves the HTTP API. `--migrate-only` stops
 * after the migrations.
 *
 * @module main
 */

import type { Server } from 'node:http';

import { createApp } from './app.js';
import { loadAlertingConfig } from './config/alertingConfig.js';
import { createAlertEngine } from './engine.js';
import { createLogger, toError } from './logging/logger.js';
import { fromIoredis } from './notifications/cache.js';
import { createPgAlertRepository } from './repositories/alertRepository.js';
import { createPgSubjectSource } from './repositories/subjectSource.js';
import { closePool } from './utils/db.js';
import { runMigrations } from './utils/migrationRunner.js';
import { createRedisClient } from './utils/redis.js';

async function main(): Promise<void> {
  const config = loadAlertingConfig();
  const logger = createLogger({ level: config.logLevel });

  await runMigrations({ logger: logger.child({ component: 'migrations' }) });
  if (process.argv.includes('--migrate-only')) {
    logger.info('Migrations complete');
    await closePool();
    return;
  }

  const redis = createRedisClient();
  redis.on('error', (error: Error) => {
    logger.warn('Redis connection error', { reason: error.message });
  });
  redis.connect().catch((error: unknown) => {
    logger.warn('Redis unavailable at startup, serving from the database', {
      reason: toError(error).message,
    });
  });

  const engine = createAlertEngine({
    config,
    store: createPgAlertRepository(),
    source: createPgSubjectSource(),
    cache: fromIoredis(redis),
    logger,
  });
  const report = await engine.start();
  logger.info('Alert engine started', { cacheSynced: report.ok, entries: report.entries });

  const app = createApp({ service: engine.service, logger: logger.child({ component: 'http' }) });
  const server: Server = app.listen(config.port, () => {
    logger.info('HTTP server listening', { port: config.port });
  });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    engine.stop();
    server.close(() => {
      void Promise.allSettled([redis.quit(), closePool()]).then(() => {
        logger.info('Shutdown complete');
      });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  createLogger().fatal('Startup failed', toError(error));
  process.exit(1);
});
