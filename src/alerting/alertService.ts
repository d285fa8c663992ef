/**
 * Alert Service
 *
 * The surface offered to the UI layer and to the inventory and purchasing
 * collaborators. Validates caller input, then delegates to the store, the
 * lifecycle manager, the delivery path and the scanner.
 *
 * @module alerting/alertService
 */

import type {
  Alert,
  AlertStats,
  NotificationEnvelope,
  NotificationRole,
} from '../types/index.js';
import { ALERT_ERROR_CODES, AlertEngineError } from '../types/index.js';
import type { AlertStore } from './alertStore.js';
import type { FamilyOutcome, LifecycleManager } from './lifecycleManager.js';
import type { DeliveryPath } from '../notifications/delivery.js';
import { DEFAULT_QUEUE_LIMIT, kindsForRole } from '../notifications/delivery.js';
import type { ScanStats, Scanner } from '../scanning/scanner.js';
import type { Scheduler, SchedulerStatus } from '../scanning/scheduler.js';
import type { FieldProblems } from '../utils/validators/alertInputValidator.js';
import {
  MAX_ACTOR_LENGTH,
  MAX_NOTES_LENGTH,
  addProblem,
  normalizeActor,
  parseBoundedInt,
  parseKind,
  parseRole,
  parseSeverity,
  rejectInput,
} from '../utils/validators/alertInputValidator.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_HISTORY_LIMIT = 100;
export const MAX_HISTORY_LIMIT = 500;
export const DEFAULT_NOTIFICATION_COUNT = 20;
export const MAX_SCAN_DAYS = 365;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ActiveAlertFilter {
  kind?: string;
  severity?: string;
}

export interface HistoryRequest {
  subjectId?: string;
  limit?: number;
}

/** Schedule settings reported by the monitor status view. */
export interface MonitorSettings {
  stockIntervalMinutes: number;
  expirationHour: number;
  expirationDays: number;
  orderWindowStart: number;
  orderWindowEnd: number;
}

export interface MonitorStatus extends SchedulerStatus {
  settings: MonitorSettings;
}

export interface AlertService {
  getActiveAlerts(filter?: ActiveAlertFilter): Promise<Alert[]>;
  getHistory(request?: HistoryRequest): Promise<Alert[]>;
  getAlert(alertId: string): Promise<Alert>;
  resolve(alertId: string, actor: string | undefined): Promise<boolean>;
  markPendingRestock(alertId: string, actor: string | undefined, notes?: string | null): Promise<boolean>;
  getStats(role?: string): Promise<AlertStats>;
  getNotifications(role: string, count?: number): Promise<NotificationEnvelope[]>;
  clearNotifications(role: string): Promise<boolean>;
  scanStock(): Promise<ScanStats>;
  scanExpiry(anticipationDays?: number): Promise<ScanStats>;
  scanOrderDelays(): Promise<ScanStats>;
  recheckMedication(medicationId: string): Promise<FamilyOutcome[]>;
  recheckOrder(orderId: string): Promise<FamilyOutcome[]>;
  getMonitorStatus(): MonitorStatus;
}

export interface AlertServiceOptions {
  store: AlertStore;
  lifecycle: LifecycleManager;
  delivery: DeliveryPath;
  scanner: Scanner;
  scheduler: Scheduler;
  settings: MonitorSettings;
  queueLimit?: number;
  now?: () => Date;
}

function notFound(what: string, id: string): AlertEngineError {
  return new AlertEngineError(ALERT_ERROR_CODES.NOT_FOUND, `${what} ${id} not found`);
}

// ─── Factory ─────────────────────────────────────────────────────────────────

const ROLE_PROBLEM = 'must be one of admin, purchasing, pharmacist';

export function createAlertService(options: AlertServiceOptions): AlertService {
  const { store, lifecycle, delivery, scanner, scheduler, settings } = options;
  const queueLimit = options.queueLimit ?? DEFAULT_QUEUE_LIMIT;
  const now = options.now ?? (() => new Date());

  function requireRole(value: string): NotificationRole {
    const role = parseRole(value);
    if (!role) rejectInput({ role: [ROLE_PROBLEM] });
    return role;
  }

  function requireActor(value: string | undefined): string {
    const actor = normalizeActor(value);
    if (!actor) rejectInput({ actor: [`is required (at most ${MAX_ACTOR_LENGTH} characters)`] });
    return actor;
  }

  return {
    async getActiveAlerts(filter = {}) {
      const problems: FieldProblems = {};
      const kind = filter.kind === undefined ? undefined : parseKind(filter.kind);
      const severity = filter.severity === undefined ? undefined : parseSeverity(filter.severity);
      if (kind === null) addProblem(problems, 'kind', 'is not a known alert kind');
      if (severity === null) addProblem(problems, 'severity', 'must be one of low, medium, high, critical');
      if (kind === null || severity === null) rejectInput(problems);
      return store.findActive({ kind, severity });
    },

    async getHistory(request = {}) {
      const limit = parseBoundedInt(request.limit, {
        min: 1,
        max: MAX_HISTORY_LIMIT,
        fallback: DEFAULT_HISTORY_LIMIT,
      });
      if (limit === null) rejectInput({ limit: [`must be an integer between 1 and ${MAX_HISTORY_LIMIT}`] });
      return store.findHistory({ subjectId: request.subjectId, limit });
    },

    async getAlert(alertId) {
      const alert = await store.findById(alertId);
      if (!alert) throw notFound('Alert', alertId);
      return alert;
    },

    async resolve(alertId, actor) {
      return lifecycle.resolve(alertId, requireActor(actor));
    },

    async markPendingRestock(alertId, actor, notes = null) {
      const who = requireActor(actor);
      const trimmed = notes?.trim() || null;
      if (trimmed && trimmed.length > MAX_NOTES_LENGTH) {
        rejectInput({ notes: [`must be at most ${MAX_NOTES_LENGTH} characters`] });
      }
      return lifecycle.markPendingRestock(alertId, who, trimmed);
    },

    async getStats(role) {
      const kinds = role === undefined ? undefined : kindsForRole(requireRole(role));
      return store.getStats({ kinds, since: new Date(now().getTime() - DAY_MS) });
    },

    async getNotifications(role, count) {
      const problems: FieldProblems = {};
      const parsed = parseRole(role);
      const limit = parseBoundedInt(count, { min: 1, max: queueLimit, fallback: DEFAULT_NOTIFICATION_COUNT });
      if (!parsed) addProblem(problems, 'role', ROLE_PROBLEM);
      if (limit === null) addProblem(problems, 'count', `must be an integer between 1 and ${queueLimit}`);
      if (!parsed || limit === null) rejectInput(problems);
      return delivery.getNotifications(parsed, limit);
    },

    async clearNotifications(role) {
      return delivery.clearNotifications(requireRole(role));
    },

    scanStock: () => scanner.scanStock(),

    async scanExpiry(anticipationDays) {
      const days = parseBoundedInt(anticipationDays, {
        min: 1,
        max: MAX_SCAN_DAYS,
        fallback: settings.expirationDays,
      });
      if (days === null) rejectInput({ days: [`must be an integer between 1 and ${MAX_SCAN_DAYS}`] });
      return scanner.scanExpiry(days);
    },

    scanOrderDelays: () => scanner.scanOrderDelays(),

    async recheckMedication(medicationId) {
      const outcomes = await scanner.recheckMedication(medicationId);
      if (!outcomes) throw notFound('Medication', medicationId);
      return outcomes;
    },

    async recheckOrder(orderId) {
      const outcomes = await scanner.recheckOrder(orderId);
      if (!outcomes) throw notFound('Purchase order', orderId);
      return outcomes;
    },

    getMonitorStatus() {
      return { ...scheduler.getStatus(), settings: { ...settings } };
    },
  };
}
