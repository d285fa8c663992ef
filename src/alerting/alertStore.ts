/**
 * Alert Store contract.
 *
 * The store is the single source of truth for alert records. The lifecycle
 * manager only mutates alerts through `withSubjectLock`, which runs the
 * classify-then-mutate sequence for one (subject, family) pair as a single
 * serialized transaction. Two implementations exist: PostgreSQL
 * (`repositories/alertRepository`) and in-memory (`alerting/inMemoryAlertStore`).
 *
 * @module alerting/alertStore
 */

import type {
  Alert,
  AlertFamily,
  AlertKind,
  AlertSeverity,
  AlertSnapshot,
  AlertStats,
  AlertTransition,
} from '../types/index.js';

// ─── Write Shapes ────────────────────────────────────────────────────────────

export interface NewAlert {
  medicationId: string | null;
  orderId: string | null;
  kind: AlertKind;
  family: AlertFamily;
  severity: AlertSeverity;
  message: string;
  snapshot: AlertSnapshot;
  createdAt: Date;
}

export interface AlertEscalation {
  kind: AlertKind;
  severity: AlertSeverity;
  message: string;
  snapshot: AlertSnapshot;
  updatedAt: Date;
}

/** Audit trail row written in the same transaction as the change it describes. */
export interface AlertEventRecord {
  alertId: string;
  transition: AlertTransition;
  actor: string;
  kind: AlertKind;
  severity: AlertSeverity;
  occurredAt: Date;
  details?: Record<string, unknown>;
}

// ─── Read Shapes ─────────────────────────────────────────────────────────────

export interface ActiveAlertQuery {
  kind?: AlertKind;
  severity?: AlertSeverity;
  /** Restrict to any of these kinds (combined with `kind` when both are set). */
  kinds?: readonly AlertKind[];
  /** 'severity' (default): most severe first, then newest. 'recent': newest first. */
  orderBy?: 'severity' | 'recent';
  limit?: number;
}

export interface HistoryQuery {
  /** Medication or purchase-order id. */
  subjectId?: string;
  limit: number;
}

export interface StatsQuery {
  kinds?: readonly AlertKind[];
  /** Lower bound for the created/resolved counters. */
  since: Date;
}

// ─── Contracts ───────────────────────────────────────────────────────────────

/** Operations available while holding the (subject, family) lock. */
export interface AlertStoreTransaction {
  /** The open (active or pending_restock) alert for the pair, if any. */
  findOpen(subjectKey: string, family: AlertFamily): Promise<Alert | null>;
  insert(alert: NewAlert): Promise<Alert>;
  escalate(alertId: string, change: AlertEscalation): Promise<Alert>;
  resolve(alertId: string, actor: string, at: Date): Promise<Alert>;
  recordEvent(event: AlertEventRecord): Promise<void>;
}

export interface AlertStore {
  /**
   * Run `work` with exclusive access to one (subject, family) pair.
   * Everything `work` writes commits together or not at all.
   */
  withSubjectLock<T>(
    subjectKey: string,
    family: AlertFamily,
    work: (tx: AlertStoreTransaction) => Promise<T>,
  ): Promise<T>;
  findById(alertId: string): Promise<Alert | null>;
  findByIds(alertIds: readonly string[]): Promise<Alert[]>;
  findActive(query?: ActiveAlertQuery): Promise<Alert[]>;
  /** Subject keys holding an open alert of the family. */
  findOpenSubjectKeys(family: AlertFamily): Promise<string[]>;
  findHistory(query: HistoryQuery): Promise<Alert[]>;
  /** Resolve unless already resolved; null when missing or already resolved. */
  resolveById(alertId: string, actor: string, at: Date): Promise<Alert | null>;
  /** Move an active alert to pending_restock; null when missing or not active. */
  markPendingRestock(
    alertId: string,
    actor: string,
    notes: string | null,
    at: Date,
  ): Promise<Alert | null>;
  getStats(query: StatsQuery): Promise<AlertStats>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Deduplication key of an alert: its medication, or its order for delay alerts. */
export function subjectKeyOf(alert: Pick<Alert, 'medicationId' | 'orderId'>): string {
  return alert.medicationId ?? alert.orderId ?? '';
}

/** Lock name for a (subject, family) pair. */
export function lockKeyOf(subjectKey: string, family: AlertFamily): string {
  return `${family}:${subjectKey}`;
}

export function isOpen(alert: Pick<Alert, 'state'>): boolean {
  return alert.state !== 'resolved';
}

export function emptyStats(): AlertStats {
  return {
    totalActive: 0,
    byKind: {},
    bySeverity: { low: 0, medium: 0, high: 0, critical: 0 },
    byState: { active: 0, pending_restock: 0, resolved: 0 },
    createdLast24h: 0,
    resolvedLast24h: 0,
  };
}
