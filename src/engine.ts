/**
 * Composition root for the alert engine.
 *
 * Builds the lifecycle manager, the event bus with its subscribers, the
 * cache-backed delivery path, the scanner, the scheduler and the service
 * facade from a store, a subject source and a cache connection. Nothing
 * here holds module-level state.
 *
 * @module engine
 */

import type { AlertingConfig } from './config/alertingConfig.js';
import type { Logger } from './logging/logger.js';
import { createLogger, toError } from './logging/logger.js';
import type { AlertStore } from './alerting/alertStore.js';
import type { AlertService } from './alerting/alertService.js';
import { createAlertService } from './alerting/alertService.js';
import type { LifecycleManager } from './alerting/lifecycleManager.js';
import { createLifecycleManager } from './alerting/lifecycleManager.js';
import type { CacheConnection } from './notifications/cache.js';
import { createSafeCache } from './notifications/cache.js';
import type { DeliveryPath, SyncReport } from './notifications/delivery.js';
import { createDeliveryPath } from './notifications/delivery.js';
import type { AlertEventBus } from './notifications/eventBus.js';
import { createAlertEventBus } from './notifications/eventBus.js';
import {
  createAuditSubscriber,
  createCacheSubscriber,
  createConsoleSubscriber,
} from './notifications/subscribers.js';
import type { SubjectSource } from './repositories/subjectSource.js';
import type { Scanner } from './scanning/scanner.js';
import { createScanner } from './scanning/scanner.js';
import type { ScheduledJob, Scheduler } from './scanning/scheduler.js';
import { createScheduler } from './scanning/scheduler.js';

export interface AlertEngineOptions {
  config: AlertingConfig;
  store: AlertStore;
  source: SubjectSource;
  cache: CacheConnection;
  logger?: Logger;
  now?: () => Date;
  /** Sink for the console subscriber. */
  consoleWrite?: (line: string) => void;
}

export interface AlertEngine {
  service: AlertService;
  bus: AlertEventBus;
  lifecycle: LifecycleManager;
  delivery: DeliveryPath;
  scanner: Scanner;
  scheduler: Scheduler;
  /** Rebuild the role queues, resync on every reconnect, and start the scheduler. */
  start(): Promise<SyncReport>;
  stop(): void;
}

export function createAlertEngine(options: AlertEngineOptions): AlertEngine {
  const { config, store, source } = options;
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const now = options.now ?? (() => new Date());
  const child = (component: string) => logger.child({ component });

  const bus = createAlertEventBus({ logger: child('bus') });
  const lifecycle = createLifecycleManager({
    store,
    bus,
    logger: child('lifecycle'),
    now,
    anticipationDays: config.expirationDays,
  });
  const cache = createSafeCache({
    connection: options.cache,
    timeoutMs: config.cacheTimeoutMs,
    logger: child('cache'),
  });
  const delivery = createDeliveryPath({
    cache,
    store,
    logger: child('delivery'),
    ttlSeconds: config.cacheTtlSeconds,
    queueLimit: config.queueLimit,
  });

  bus.attach(createCacheSubscriber(delivery));
  bus.attach(createAuditSubscriber(child('audit')));
  if (config.consoleLog) bus.attach(createConsoleSubscriber(options.consoleWrite));

  const scanner = createScanner({
    source,
    store,
    lifecycle,
    logger: child('scanner'),
    now,
    anticipationDays: config.expirationDays,
  });

  const jobs: ScheduledJob[] = [
    {
      name: 'stock',
      trigger: { type: 'interval', minutes: config.stockIntervalMinutes },
      run: () => scanner.scanStock(),
    },
    {
      name: 'expiry',
      trigger: { type: 'daily', hour: config.expirationHour },
      run: () => scanner.scanExpiry(config.expirationDays),
    },
    {
      name: 'order_delay',
      trigger: { type: 'hourly_window', startHour: config.orderWindowStart, endHour: config.orderWindowEnd },
      run: () => scanner.scanOrderDelays(),
    },
  ];
  const scheduler = createScheduler({
    jobs,
    runOnStart: config.scanOnStart,
    logger: child('scheduler'),
    now,
  });

  const service = createAlertService({
    store,
    lifecycle,
    delivery,
    scanner,
    scheduler,
    settings: {
      stockIntervalMinutes: config.stockIntervalMinutes,
      expirationHour: config.expirationHour,
      expirationDays: config.expirationDays,
      orderWindowStart: config.orderWindowStart,
      orderWindowEnd: config.orderWindowEnd,
    },
    queueLimit: config.queueLimit,
    now,
  });

  async function resync(): Promise<SyncReport> {
    try {
      return await delivery.syncFromStore();
    } catch (error) {
      logger.error('Notification resync failed', toError(error));
      return { ok: false, entries: 0 };
    }
  }

  let started = false;

  return {
    service,
    bus,
    lifecycle,
    delivery,
    scanner,
    scheduler,

    async start() {
      if (!started) {
        started = true;
        cache.onReady(() => {
          logger.info('Cache connection ready, resyncing notification queues');
          void resync();
        });
      }
      const report = await resync();
      scheduler.start();
      return report;
    },

    stop() {
      scheduler.stop();
    },
  };
}
