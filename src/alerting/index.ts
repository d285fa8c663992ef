/**
 * Alerting Module
 *
 * Threshold classification, alert drafts, the alert store contract with
 * its in-memory implementation, the lifecycle manager and the service
 * facade.
 */

export {
  classify,
  classifyExpiry,
  classifyOrderDelay,
  classifyStock,
  compareSeverity,
  daysOrderIsLate,
  daysUntilExpiry,
  familiesFor,
  familyOf,
  DEFAULT_ANTICIPATION_DAYS,
  FAMILY_KINDS,
  IMMINENT_EXPIRY_DAYS,
  type AlertCondition,
  type ClassifyOptions,
} from './classifier.js';

export { buildAlertDraft, displayOf, renderMessage, type AlertDraft } from './builders.js';

export {
  emptyStats,
  isOpen,
  lockKeyOf,
  subjectKeyOf,
  type ActiveAlertQuery,
  type AlertEscalation,
  type AlertEventRecord,
  type AlertStore,
  type AlertStoreTransaction,
  type HistoryQuery,
  type NewAlert,
  type StatsQuery,
} from './alertStore.js';

export { createInMemoryAlertStore, type InMemoryAlertStore } from './inMemoryAlertStore.js';

export {
  createLifecycleManager,
  type EvaluateOptions,
  type EvaluationTransition,
  type FamilyOutcome,
  type LifecycleManager,
  type LifecycleManagerOptions,
} from './lifecycleManager.js';

export {
  createAlertService,
  DEFAULT_HISTORY_LIMIT,
  MAX_HISTORY_LIMIT,
  type ActiveAlertFilter,
  type AlertService,
  type AlertServiceOptions,
  type HistoryRequest,
  type MonitorSettings,
  type MonitorStatus,
} from './alertService.js';
