/**
 * Pharmacy Alert Engine entry point.
 *
 * Re-exports the engine factory, the alerting and logging modules, the
 * notification and scanning building blocks, and the PostgreSQL adapters.
 *
 * @module pharmacy-alert-engine
 */

export type {
  Alert,
  AlertFamily,
  AlertKind,
  AlertSeverity,
  AlertSnapshot,
  AlertState,
  AlertStats,
  AlertTransition,
  ErrorResponse,
  DataResponse,
  MedicationSubject,
  MonitoredSubject,
  NotificationEnvelope,
  NotificationRole,
  PurchaseOrderSubject,
} from './types/index.js';
export { ALERT_ERROR_CODES, AlertEngineError, NOTIFICATION_ROLES } from './types/index.js';

export * from './alerting/index.js';
export * from './logging/index.js';

export { createAlertEngine, type AlertEngine, type AlertEngineOptions } from './engine.js';
export { createApp, createAlertRouter, type AppDependencies } from './app.js';
export { loadAlertingConfig, type AlertingConfig } from './config/alertingConfig.js';

export { createAlertEventBus, type AlertEvent, type AlertEventBus, type AlertSubscriber } from './notifications/eventBus.js';
export { createSafeCache, fromIoredis, type CacheConnection, type SafeCache } from './notifications/cache.js';
export { createDeliveryPath, kindsForRole, rolesFor, type DeliveryPath } from './notifications/delivery.js';
export { createAuditSubscriber, createCacheSubscriber, createConsoleSubscriber } from './notifications/subscribers.js';

export { createScanner, type ScanStats, type Scanner } from './scanning/scanner.js';
export { createScheduler, type Scheduler, type SchedulerStatus } from './scanning/scheduler.js';
export { describeTrigger, nextRunAt, type ScanTrigger } from './scanning/triggers.js';

export { createPgAlertRepository } from './repositories/alertRepository.js';
export { createPgSubjectSource, type SubjectSource } from './repositories/subjectSource.js';
export { runMigrations } from './utils/migrationRunner.js';
