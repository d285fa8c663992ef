/**
 * Cache-Backed Delivery Path
 *
 * Keeps one Redis list of notification envelopes per role
 * (`notifications:{role}`) plus a per-alert mirror (`alert:{id}`). The cache
 * is a convenience: reads revalidate every cached entry against the alert
 * store, and when Redis is unreachable or holds nothing valid the role's
 * notifications are rebuilt from the store and pushed back. A write that
 * fails marks the cache stale; the next read or delivery that finds Redis
 * ready rebuilds every queue first.
 *
 * @module notifications/delivery
 */

import type {
  Alert,
  AlertFamily,
  AlertKind,
  AlertTransition,
  NotificationEnvelope,
  NotificationRole,
} from '../types/index.js';
import { ALERT_KINDS, NOTIFICATION_ROLES } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { AlertStore } from '../alerting/alertStore.js';
import { displayOf } from '../alerting/builders.js';
import { familyOf } from '../alerting/classifier.js';
import type { AlertEvent } from './eventBus.js';
import type { SafeCache } from './cache.js';

// ─── Routing ─────────────────────────────────────────────────────────────────

export const ROLE_TARGETS: Record<AlertFamily, readonly NotificationRole[]> = {
  stock: ['purchasing', 'admin'],
  expiry: ['pharmacist', 'admin'],
  order_delay: ['purchasing', 'admin'],
};

export const DEFAULT_QUEUE_LIMIT = 100;
export const DEFAULT_ALERT_TTL_SECONDS = 3600;

export function rolesFor(family: AlertFamily): readonly NotificationRole[] {
  return ROLE_TARGETS[family];
}

/** Kinds a role receives: the inverse of `ROLE_TARGETS`. */
export function kindsForRole(role: NotificationRole): AlertKind[] {
  return ALERT_KINDS.filter((kind) => ROLE_TARGETS[familyOf(kind)].includes(role));
}

export function queueKey(role: NotificationRole): string {
  return `notifications:${role}`;
}

export function alertKey(alertId: string): string {
  return `alert:${alertId}`;
}

// ─── Envelopes ───────────────────────────────────────────────────────────────

export function toEnvelope(
  alert: Alert,
  transition: AlertTransition,
  timestamp: Date,
): NotificationEnvelope {
  return {
    alertId: alert.id,
    transition,
    kind: alert.kind,
    family: alert.family,
    severity: alert.severity,
    message: alert.message,
    subjectId: alert.medicationId,
    orderId: alert.orderId,
    display: displayOf(alert.snapshot),
    timestamp: timestamp.toISOString(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a cached envelope; null for anything that is not one. */
export function parseEnvelope(raw: string): NotificationEnvelope | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const record = parsed;
  const display = record['display'];
  const alertId = record['alertId'];
  const message = record['message'];
  const timestamp = record['timestamp'];
  if (!isRecord(display)) return null;
  if (typeof alertId !== 'string' || typeof message !== 'string' || typeof timestamp !== 'string') {
    return null;
  }
  const kind = record['kind'];
  const knownKind = ALERT_KINDS.find((k) => k === kind);
  if (!knownKind) return null;

  const nullableString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
  const transition = record['transition'];
  const severity = record['severity'];

  return {
    alertId,
    transition:
      transition === 'escalated' || transition === 'resolved' || transition === 'pending_restock'
        ? transition
        : 'created',
    kind: knownKind,
    family: familyOf(knownKind),
    severity:
      severity === 'low' || severity === 'medium' || severity === 'high' || severity === 'critical'
        ? severity
        : 'medium',
    message,
    subjectId: nullableString(record['subjectId']),
    orderId: nullableString(record['orderId']),
    display: {
      name: nullableString(display['name']) ?? '',
      manufacturer: nullableString(display['manufacturer']),
      presentation: nullableString(display['presentation']),
      lot: nullableString(display['lot']),
    },
    timestamp,
  };
}

// ─── Delivery Path ───────────────────────────────────────────────────────────

export interface SyncReport {
  /** False when the cache could not be rebuilt. */
  ok: boolean;
  entries: number;
}

export interface DeliveryPath {
  /** Mirror one alert transition into the cache. */
  deliver(event: AlertEvent): Promise<void>;
  /** Newest-first active notifications for a role. */
  getNotifications(role: NotificationRole, count: number): Promise<NotificationEnvelope[]>;
  clearNotifications(role: NotificationRole): Promise<boolean>;
  getCachedAlert(alertId: string): Promise<NotificationEnvelope | null>;
  /** Rebuild every role queue from the store's active alerts. */
  syncFromStore(): Promise<SyncReport>;
}

export interface DeliveryPathOptions {
  cache: SafeCache;
  store: AlertStore;
  logger?: Logger;
  ttlSeconds?: number;
  queueLimit?: number;
}

export function createDeliveryPath(options: DeliveryPathOptions): DeliveryPath {
  const { cache, store } = options;
  const logger = options.logger ?? createLogger().child({ component: 'delivery' });
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_ALERT_TTL_SECONDS;
  const queueLimit = options.queueLimit ?? DEFAULT_QUEUE_LIMIT;

  let stale = false;
  let pendingSync: Promise<SyncReport> | null = null;

  async function removeFromQueue(role: NotificationRole, alertId: string): Promise<boolean> {
    const key = queueKey(role);
    const entries = await cache.call('lrange', (c) => c.lrange(key, 0, -1));
    if (!entries.ok) return false;
    for (const raw of entries.value) {
      if (parseEnvelope(raw)?.alertId === alertId) {
        const removed = await cache.call('lrem', (c) => c.lrem(key, 0, raw));
        if (!removed.ok) return false;
      }
    }
    return true;
  }

  async function pushToQueue(role: NotificationRole, envelope: NotificationEnvelope): Promise<boolean> {
    const key = queueKey(role);
    const pushed = await cache.call('rpush', (c) => c.rpush(key, JSON.stringify(envelope)));
    if (!pushed.ok) return false;
    const trimmed = await cache.call('ltrim', (c) => c.ltrim(key, -queueLimit, -1));
    const expiring = await cache.call('expire', (c) => c.expire(key, ttlSeconds));
    return trimmed.ok && expiring.ok;
  }

  async function mirrorAlert(envelope: NotificationEnvelope): Promise<boolean> {
    const result = await cache.call('setex', (c) =>
      c.setex(alertKey(envelope.alertId), ttlSeconds, JSON.stringify(envelope)),
    );
    return result.ok;
  }

  function markStale(operation: string): void {
    if (!stale) logger.warn('Cache write failed, queues will be rebuilt', { operation });
    stale = true;
  }

  /** Replace a role's queue with `envelopes` (given newest first). */
  async function rebuildQueue(
    role: NotificationRole,
    envelopes: readonly NotificationEnvelope[],
  ): Promise<boolean> {
    const cleared = await cache.call('del', (c) => c.del(queueKey(role)));
    if (!cleared.ok) return false;
    for (const envelope of [...envelopes].reverse()) {
      if (!(await pushToQueue(role, envelope))) return false;
    }
    return true;
  }

  async function readFromStore(role: NotificationRole, count: number): Promise<Alert[]> {
    return store.findActive({ kinds: kindsForRole(role), orderBy: 'recent', limit: count });
  }

  function storeEnvelope(alert: Alert): NotificationEnvelope {
    return toEnvelope(alert, alert.updatedAt > alert.createdAt ? 'escalated' : 'created', alert.updatedAt);
  }

  async function readFromCache(
    role: NotificationRole,
    count: number,
  ): Promise<NotificationEnvelope[] | null> {
    const key = queueKey(role);
    const cached = await cache.call('lrange', (c) => c.lrange(key, -count, -1));
    if (!cached.ok) return null;

    const seen = new Set<string>();
    const envelopes: NotificationEnvelope[] = [];
    for (const raw of [...cached.value].reverse()) {
      const envelope = parseEnvelope(raw);
      if (!envelope || seen.has(envelope.alertId)) continue;
      seen.add(envelope.alertId);
      envelopes.push(envelope);
    }
    if (envelopes.length === 0) return [];

    const permitted = kindsForRole(role);
    const current = await store.findByIds(envelopes.map((e) => e.alertId));
    const live = new Set(
      current.filter((a) => a.state === 'active' && permitted.includes(a.kind)).map((a) => a.id),
    );
    const survivors = envelopes.filter((e) => live.has(e.alertId));
    if (survivors.length < envelopes.length) {
      logger.debug('Dropped stale cached notifications', {
        role,
        dropped: envelopes.length - survivors.length,
      });
    }
    return survivors;
  }

  async function syncFromStore(): Promise<SyncReport> {
    let ok = true;
    let entries = 0;
    for (const role of NOTIFICATION_ROLES) {
      const envelopes = (await readFromStore(role, queueLimit)).map(storeEnvelope);
      ok = (await rebuildQueue(role, envelopes)) && ok;
      entries += envelopes.length;
    }
    const active = await store.findActive({ orderBy: 'recent', limit: queueLimit });
    for (const alert of active) {
      ok = (await mirrorAlert(storeEnvelope(alert))) && ok;
    }
    stale = !ok;
    logger.info('Notification queues rebuilt from store', { ok, entries });
    return { ok, entries };
  }

  /** Concurrent callers share one rebuild. */
  function sync(): Promise<SyncReport> {
    pendingSync ??= syncFromStore().finally(() => {
      pendingSync = null;
    });
    return pendingSync;
  }

  async function resyncIfStale(): Promise<void> {
    if (stale && cache.isReady()) await sync();
  }

  async function applyTransition(event: AlertEvent): Promise<boolean> {
    const { alert, transition, timestamp } = event;
    const roles = rolesFor(alert.family);
    let ok = true;

    if ((transition === 'created' || transition === 'escalated') && alert.state === 'active') {
      const envelope = toEnvelope(alert, transition, timestamp);
      for (const role of roles) {
        ok = (await removeFromQueue(role, alert.id)) && ok;
        ok = (await pushToQueue(role, envelope)) && ok;
      }
      return (await mirrorAlert(envelope)) && ok;
    }

    const dropped = await cache.call('del', (c) => c.del(alertKey(alert.id)));
    ok = dropped.ok;
    for (const role of roles) {
      ok = (await removeFromQueue(role, alert.id)) && ok;
    }
    return ok;
  }

  return {
    async deliver(event) {
      await resyncIfStale();
      if (!(await applyTransition(event))) markStale('deliver');
    },

    async getNotifications(role, count) {
      await resyncIfStale();
      const cached = await readFromCache(role, count);
      if (cached && cached.length > 0) return cached;

      const envelopes = (await readFromStore(role, queueLimit)).map(storeEnvelope);
      logger.info('Serving notifications from store', {
        role,
        reason: cached ? 'cache empty' : 'cache unavailable',
        count: Math.min(envelopes.length, count),
      });
      if (envelopes.length > 0 && cache.isReady() && !(await rebuildQueue(role, envelopes))) {
        markStale('rebuild');
      }
      return envelopes.slice(0, count);
    },

    async clearNotifications(role) {
      const result = await cache.call('del', (c) => c.del(queueKey(role)));
      return result.ok;
    },

    async getCachedAlert(alertId) {
      const result = await cache.call('get', (c) => c.get(alertKey(alertId)));
      return result.ok && result.value !== null ? parseEnvelope(result.value) : null;
    },

    syncFromStore: sync,
  };
}

