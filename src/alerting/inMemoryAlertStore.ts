/**
 * In-memory Alert Store.
 *
 * Used by tests and by the engine when no database is configured. Locks are
 * a keyed promise chain; each `withSubjectLock` call stages its writes and
 * applies them only when the work resolves, so a throwing transaction leaves
 * nothing behind.
 *
 * @module alerting/inMemoryAlertStore
 */

import { v4 as uuidv4 } from 'uuid';

import type { Alert, AlertFamily, AlertStats } from '../types/index.js';
import type {
  ActiveAlertQuery,
  AlertEventRecord,
  AlertStore,
  AlertStoreTransaction,
  HistoryQuery,
  StatsQuery,
} from './alertStore.js';
import { emptyStats, isOpen, lockKeyOf, subjectKeyOf } from './alertStore.js';
import { compareSeverity } from './classifier.js';

export interface InMemoryAlertStore extends AlertStore {
  /** Audit events in write order. */
  readonly events: readonly AlertEventRecord[];
  /** Every alert ever stored, oldest first. */
  all(): Alert[];
}

function copy(alert: Alert): Alert {
  return structuredClone(alert);
}

function newestFirst(a: Alert, b: Alert): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

function severityThenNewest(a: Alert, b: Alert): number {
  return compareSeverity(b.severity, a.severity) || newestFirst(a, b);
}

export function createInMemoryAlertStore(
  options: { generateId?: () => string } = {},
): InMemoryAlertStore {
  const generateId = options.generateId ?? uuidv4;
  const alerts = new Map<string, Alert>();
  const events: AlertEventRecord[] = [];
  const locks = new Map<string, Promise<void>>();

  async function acquire(key: string): Promise<() => void> {
    const previous = locks.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    locks.set(key, tail);
    await previous;
    return () => {
      release();
      if (locks.get(key) === tail) locks.delete(key);
    };
  }

  /** Apply an operator change while holding the alert's (subject, family) lock. */
  async function withAlertLock(
    alertId: string,
    apply: (alert: Alert) => Alert | null,
  ): Promise<Alert | null> {
    const found = alerts.get(alertId);
    if (!found) return null;
    const release = await acquire(lockKeyOf(subjectKeyOf(found), found.family));
    try {
      const current = alerts.get(alertId);
      return current ? apply(current) : null;
    } finally {
      release();
    }
  }

  function commitResolution(alert: Alert, actor: string, at: Date): Alert {
    return { ...alert, state: 'resolved', resolvedAt: at, resolvedBy: actor, updatedAt: at };
  }

  return {
    events,

    all(): Alert[] {
      return [...alerts.values()].map(copy);
    },

    async withSubjectLock<T>(
      subjectKey: string,
      family: AlertFamily,
      work: (tx: AlertStoreTransaction) => Promise<T>,
    ): Promise<T> {
      const release = await acquire(lockKeyOf(subjectKey, family));
      const staged = new Map<string, Alert>();
      const stagedEvents: AlertEventRecord[] = [];

      const read = (id: string): Alert | undefined => staged.get(id) ?? alerts.get(id);
      const mustRead = (id: string): Alert => {
        const alert = read(id);
        if (!alert) throw new Error(`Alert ${id} does not exist`);
        return alert;
      };

      const tx: AlertStoreTransaction = {
        async findOpen(key, fam) {
          const merged = new Map([...alerts, ...staged]);
          for (const alert of merged.values()) {
            if (alert.family === fam && subjectKeyOf(alert) === key && isOpen(alert)) {
              return copy(alert);
            }
          }
          return null;
        },
        async insert(draft) {
          const alert: Alert = {
            id: generateId(),
            ...draft,
            state: 'active',
            notes: null,
            updatedAt: draft.createdAt,
            resolvedAt: null,
            resolvedBy: null,
          };
          staged.set(alert.id, alert);
          return copy(alert);
        },
        async escalate(alertId, change) {
          const updated: Alert = { ...mustRead(alertId), ...change };
          staged.set(alertId, updated);
          return copy(updated);
        },
        async resolve(alertId, actor, at) {
          const updated = commitResolution(mustRead(alertId), actor, at);
          staged.set(alertId, updated);
          return copy(updated);
        },
        async recordEvent(event) {
          stagedEvents.push(event);
        },
      };

      try {
        const result = await work(tx);
        for (const [id, alert] of staged) alerts.set(id, alert);
        events.push(...stagedEvents);
        return result;
      } finally {
        release();
      }
    },

    async findById(alertId) {
      const alert = alerts.get(alertId);
      return alert ? copy(alert) : null;
    },

    async findByIds(alertIds) {
      return alertIds.flatMap((id) => {
        const alert = alerts.get(id);
        return alert ? [copy(alert)] : [];
      });
    },

    async findActive(query: ActiveAlertQuery = {}) {
      const matches = [...alerts.values()].filter(
        (alert) =>
          alert.state === 'active' &&
          (!query.kind || alert.kind === query.kind) &&
          (!query.severity || alert.severity === query.severity) &&
          (!query.kinds || query.kinds.includes(alert.kind)),
      );
      matches.sort(query.orderBy === 'recent' ? newestFirst : severityThenNewest);
      const limited = query.limit === undefined ? matches : matches.slice(0, query.limit);
      return limited.map(copy);
    },

    async findOpenSubjectKeys(family) {
      const keys = new Set<string>();
      for (const alert of alerts.values()) {
        if (alert.family === family && isOpen(alert)) keys.add(subjectKeyOf(alert));
      }
      return [...keys];
    },

    async findHistory(query: HistoryQuery) {
      return [...alerts.values()]
        .filter((alert) => !query.subjectId || subjectKeyOf(alert) === query.subjectId)
        .sort(newestFirst)
        .slice(0, query.limit)
        .map(copy);
    },

    async resolveById(alertId, actor, at) {
      return withAlertLock(alertId, (alert) => {
        if (alert.state === 'resolved') return null;
        const updated = commitResolution(alert, actor, at);
        alerts.set(alertId, updated);
        events.push({
          alertId,
          transition: 'resolved',
          actor,
          kind: updated.kind,
          severity: updated.severity,
          occurredAt: at,
        });
        return copy(updated);
      });
    },

    async markPendingRestock(alertId, actor, notes, at) {
      return withAlertLock(alertId, (alert) => {
        if (alert.state !== 'active') return null;
        const updated: Alert = { ...alert, state: 'pending_restock', notes, updatedAt: at };
        alerts.set(alertId, updated);
        events.push({
          alertId,
          transition: 'pending_restock',
          actor,
          kind: updated.kind,
          severity: updated.severity,
          occurredAt: at,
          ...(notes ? { details: { notes } } : {}),
        });
        return copy(updated);
      });
    },

    async getStats(query: StatsQuery): Promise<AlertStats> {
      const scoped = [...alerts.values()].filter(
        (alert) => !query.kinds || query.kinds.includes(alert.kind),
      );
      const stats = emptyStats();
      for (const alert of scoped) {
        stats.byState[alert.state] += 1;
        if (alert.createdAt >= query.since) stats.createdLast24h += 1;
        if (alert.resolvedAt && alert.resolvedAt >= query.since) stats.resolvedLast24h += 1;
        if (alert.state !== 'active') continue;
        stats.totalActive += 1;
        stats.byKind[alert.kind] = (stats.byKind[alert.kind] ?? 0) + 1;
        stats.bySeverity[alert.severity] += 1;
      }
      return stats;
    },
  };
}
