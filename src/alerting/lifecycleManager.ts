/**
 * Alert Lifecycle Manager
 *
 * Drives the alert state machine for one subject at a time:
 *
 * - no condition + open alert      → resolve as 'system'
 * - condition + no open alert      → create
 * - condition + open alert differs → escalate in place
 *
 * Each (subject, family) pair is evaluated inside the store's subject lock,
 * so a scan and an on-demand re-check of the same subject never both create
 * an alert. Events are published only after the store has committed.
 *
 * @module alerting/lifecycleManager
 */

import type {
  Alert,
  AlertFamily,
  AlertTransition,
  MonitoredSubject,
} from '../types/index.js';
import { SYSTEM_ACTOR } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger, toError } from '../logging/logger.js';
import type { AlertEventBus } from '../notifications/eventBus.js';
import type { AlertStore, AlertStoreTransaction } from './alertStore.js';
import type { AlertCondition } from './classifier.js';
import { DEFAULT_ANTICIPATION_DAYS, classify, familiesFor } from './classifier.js';
import type { AlertDraft } from './builders.js';
import { buildAlertDraft, displayOf } from './builders.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type EvaluationTransition = 'none' | 'created' | 'escalated' | 'resolved' | 'failed';

export interface FamilyOutcome {
  family: AlertFamily;
  transition: EvaluationTransition;
  /** The alert after the transition; null for 'failed' and when nothing is open. */
  alert: Alert | null;
  error?: string;
}

export interface EvaluateOptions {
  /** Restrict evaluation to these families (default: every family of the subject kind). */
  families?: readonly AlertFamily[];
  /** Overrides the manager's expiry anticipation window for this call. */
  anticipationDays?: number;
}

export interface LifecycleManager {
  evaluate(subject: MonitoredSubject, options?: EvaluateOptions): Promise<FamilyOutcome[]>;
  /** Resolve the open alert of a subject that no longer exists upstream. */
  retire(subjectKey: string, family: AlertFamily): Promise<FamilyOutcome>;
  /** Resolve an open alert. False when it is unknown or already resolved. */
  resolve(alertId: string, actor: string): Promise<boolean>;
  /** Move an active alert to pending_restock. False when it is unknown or not active. */
  markPendingRestock(alertId: string, actor: string, notes?: string | null): Promise<boolean>;
}

export interface LifecycleManagerOptions {
  store: AlertStore;
  bus: AlertEventBus;
  logger?: Logger;
  now?: () => Date;
  anticipationDays?: number;
}

interface CommittedChange {
  transition: Exclude<EvaluationTransition, 'failed'>;
  alert: Alert | null;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createLifecycleManager(options: LifecycleManagerOptions): LifecycleManager {
  const { store, bus } = options;
  const logger = options.logger ?? createLogger().child({ component: 'lifecycle' });
  const now = options.now ?? (() => new Date());
  const anticipationDays = options.anticipationDays ?? DEFAULT_ANTICIPATION_DAYS;

  async function publish(transition: AlertTransition, alert: Alert, actor: string, at: Date) {
    await bus.notify({
      transition,
      alert,
      display: displayOf(alert.snapshot),
      actor,
      timestamp: at,
    });
  }

  async function applyCondition(
    tx: AlertStoreTransaction,
    subjectKey: string,
    family: AlertFamily,
    condition: AlertCondition | null,
    draft: AlertDraft | null,
    at: Date,
  ): Promise<CommittedChange> {
    const open = await tx.findOpen(subjectKey, family);

    if (!condition || !draft) {
      if (!open) return { transition: 'none', alert: null };
      const resolved = await tx.resolve(open.id, SYSTEM_ACTOR, at);
      await tx.recordEvent({
        alertId: resolved.id,
        transition: 'resolved',
        actor: SYSTEM_ACTOR,
        kind: resolved.kind,
        severity: resolved.severity,
        occurredAt: at,
      });
      return { transition: 'resolved', alert: resolved };
    }

    if (!open) {
      const created = await tx.insert({
        ...draft,
        kind: condition.kind,
        family,
        severity: condition.severity,
        createdAt: at,
      });
      await tx.recordEvent({
        alertId: created.id,
        transition: 'created',
        actor: SYSTEM_ACTOR,
        kind: created.kind,
        severity: created.severity,
        occurredAt: at,
      });
      return { transition: 'created', alert: created };
    }

    if (open.kind === condition.kind && open.severity === condition.severity) {
      return { transition: 'none', alert: open };
    }

    const escalated = await tx.escalate(open.id, {
      kind: condition.kind,
      severity: condition.severity,
      message: draft.message,
      snapshot: draft.snapshot,
      updatedAt: at,
    });
    await tx.recordEvent({
      alertId: escalated.id,
      transition: 'escalated',
      actor: SYSTEM_ACTOR,
      kind: escalated.kind,
      severity: escalated.severity,
      occurredAt: at,
      details: { previousKind: open.kind, previousSeverity: open.severity },
    });
    return { transition: 'escalated', alert: escalated };
  }

  /** Run one locked change for a pair, then publish it once committed. */
  async function commit(
    subjectKey: string,
    family: AlertFamily,
    at: Date,
    apply: (tx: AlertStoreTransaction) => Promise<CommittedChange>,
  ): Promise<FamilyOutcome> {
    let change: CommittedChange;
    try {
      change = await store.withSubjectLock(subjectKey, family, apply);
    } catch (error) {
      const err = toError(error);
      logger.error('Alert evaluation failed', err, { subjectId: subjectKey, family });
      return { family, transition: 'failed', alert: null, error: err.message };
    }

    if (change.alert && change.transition !== 'none') {
      logger.info(`Alert ${change.transition}`, {
        alertId: change.alert.id,
        subjectId: subjectKey,
        kind: change.alert.kind,
        severity: change.alert.severity,
      });
      await publish(change.transition, change.alert, SYSTEM_ACTOR, at);
    }
    return { family, transition: change.transition, alert: change.alert };
  }

  async function evaluateFamily(
    subject: MonitoredSubject,
    family: AlertFamily,
    windowDays: number,
  ): Promise<FamilyOutcome> {
    const at = now();
    const condition = classify(subject, family, { today: at, anticipationDays: windowDays });
    const draft = condition ? buildAlertDraft(subject, family, condition, at) : null;

    return commit(subject.id, family, at, (tx) =>
      applyCondition(tx, subject.id, family, condition, draft, at),
    );
  }

  return {
    async evaluate(subject, evaluateOptions = {}) {
      const applicable = familiesFor(subject);
      const families = evaluateOptions.families
        ? applicable.filter((family) => evaluateOptions.families?.includes(family))
        : applicable;

      const windowDays = evaluateOptions.anticipationDays ?? anticipationDays;
      const outcomes: FamilyOutcome[] = [];
      for (const family of families) {
        outcomes.push(await evaluateFamily(subject, family, windowDays));
      }
      return outcomes;
    },

    async retire(subjectKey, family) {
      const at = now();
      return commit(subjectKey, family, at, (tx) =>
        applyCondition(tx, subjectKey, family, null, null, at),
      );
    },

    async resolve(alertId, actor) {
      const at = now();
      const resolved = await store.resolveById(alertId, actor, at);
      if (!resolved) return false;
      logger.info('Alert resolved manually', { alertId, actor });
      await publish('resolved', resolved, actor, at);
      return true;
    },

    async markPendingRestock(alertId, actor, notes = null) {
      const at = now();
      const updated = await store.markPendingRestock(alertId, actor, notes, at);
      if (!updated) return false;
      logger.info('Alert marked pending restock', { alertId, actor });
      await publish('pending_restock', updated, actor, at);
      return true;
    },
  };
}
