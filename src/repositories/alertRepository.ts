/**
 * Alert repository: the PostgreSQL implementation of the AlertStore.
 *
 * Evaluations for one (subject, family) pair are serialized with a
 * transaction-scoped advisory lock on the pair's lock key, and the partial
 * unique index `alerts_one_open_per_subject` backs the one-open-alert rule.
 * Every change writes its `alert_events` row in the same transaction.
 *
 * Handles snake_case ↔ camelCase mapping between the schema and the
 * Alert type.
 *
 * @module repositories/alertRepository
 */

import type pg from 'pg';
import { validate as isUuid } from 'uuid';

import type {
  Alert,
  AlertFamily,
  AlertKind,
  AlertSeverity,
  AlertSnapshot,
  AlertState,
  AlertStats,
} from '../types/index.js';
import { ALERT_ERROR_CODES, AlertEngineError } from '../types/index.js';
import type {
  ActiveAlertQuery,
  AlertEventRecord,
  AlertStore,
  AlertStoreTransaction,
  HistoryQuery,
  StatsQuery,
} from '../alerting/alertStore.js';
import { emptyStats, lockKeyOf } from '../alerting/alertStore.js';
import { query, withTransaction } from '../utils/db.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the alerts table. */
interface AlertRow {
  id: string;
  medication_id: string | null;
  order_id: string | null;
  kind: AlertKind;
  family: AlertFamily;
  severity: AlertSeverity;
  state: AlertState;
  message: string;
  snapshot: AlertSnapshot;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
  resolved_at: Date | null;
  resolved_by: string | null;
}

interface StatsGroupRow {
  state: AlertState;
  kind: AlertKind;
  severity: AlertSeverity;
  count: number;
}

interface StatsWindowRow {
  created: number;
  resolved: number;
}

function mapRowToAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    medicationId: row.medication_id,
    orderId: row.order_id,
    kind: row.kind,
    family: row.family,
    severity: row.severity,
    state: row.state,
    message: row.message,
    snapshot: row.snapshot,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    resolvedAt: row.resolved_at,
    resolvedBy: row.resolved_by,
  };
}

function firstAlert(result: pg.QueryResult<AlertRow>): Alert | null {
  const row = result.rows[0];
  return row ? mapRowToAlert(row) : null;
}

function mustReturn(result: pg.QueryResult<AlertRow>, alertId: string): Alert {
  const alert = firstAlert(result);
  if (!alert) {
    throw new AlertEngineError(ALERT_ERROR_CODES.NOT_FOUND, `Alert ${alertId} does not exist`);
  }
  return alert;
}

// ─── SQL ─────────────────────────────────────────────────────────────────────

const ALERT_COLUMNS = `id, medication_id, order_id, kind, family, severity, state, message,
       snapshot, notes, created_at, updated_at, resolved_at, resolved_by`;

const SEVERITY_RANK = `CASE severity
         WHEN 'critical' THEN 4
         WHEN 'high' THEN 3
         WHEN 'medium' THEN 2
         ELSE 1
       END`;

const LOCK_SQL = 'SELECT pg_advisory_xact_lock(hashtext($1))';

const INSERT_EVENT_SQL = `INSERT INTO alert_events (alert_id, transition, actor, kind, severity, details, occurred_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7)`;

async function lockPair(client: pg.PoolClient, subjectKey: string, family: AlertFamily): Promise<void> {
  await client.query(LOCK_SQL, [lockKeyOf(subjectKey, family)]);
}

async function insertEvent(client: pg.PoolClient, event: AlertEventRecord): Promise<void> {
  await client.query(INSERT_EVENT_SQL, [
    event.alertId,
    event.transition,
    event.actor,
    event.kind,
    event.severity,
    JSON.stringify(event.details ?? {}),
    event.occurredAt,
  ]);
}

/** Transaction operations bound to one client. */
function bindTransaction(client: pg.PoolClient): AlertStoreTransaction {
  return {
    async findOpen(subjectKey, family) {
      const result = await client.query<AlertRow>(
        `SELECT ${ALERT_COLUMNS}
         FROM alerts
         WHERE subject_key = $1 AND family = $2 AND state <> 'resolved'
         ORDER BY created_at DESC
         LIMIT 1
         FOR UPDATE`,
        [subjectKey, family],
      );
      return firstAlert(result);
    },

    async insert(alert) {
      const result = await client.query<AlertRow>(
        `INSERT INTO alerts
           (medication_id, order_id, subject_key, kind, family, severity, state, message, snapshot,
            created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, 'active', $7, $8, $9, $9)
         RETURNING ${ALERT_COLUMNS}`,
        [
          alert.medicationId,
          alert.orderId,
          alert.medicationId ?? alert.orderId,
          alert.kind,
          alert.family,
          alert.severity,
          alert.message,
          JSON.stringify(alert.snapshot),
          alert.createdAt,
        ],
      );
      const created = firstAlert(result);
      if (!created) throw new Error('Alert insert returned no row');
      return created;
    },

    async escalate(alertId, change) {
      const result = await client.query<AlertRow>(
        `UPDATE alerts
         SET kind = $2, severity = $3, message = $4, snapshot = $5, updated_at = $6
         WHERE id = $1
         RETURNING ${ALERT_COLUMNS}`,
        [alertId, change.kind, change.severity, change.message, JSON.stringify(change.snapshot), change.updatedAt],
      );
      return mustReturn(result, alertId);
    },

    async resolve(alertId, actor, at) {
      const result = await client.query<AlertRow>(
        `UPDATE alerts
         SET state = 'resolved', resolved_at = $2, resolved_by = $3, updated_at = $2
         WHERE id = $1
         RETURNING ${ALERT_COLUMNS}`,
        [alertId, at, actor],
      );
      return mustReturn(result, alertId);
    },

    recordEvent: (event) => insertEvent(client, event),
  };
}

/**
 * Lock the pair an existing alert belongs to, then apply `update`.
 * Resolves to null when the alert does not exist or `update` matches no row.
 */
async function updateUnderLock(
  alertId: string,
  update: (client: pg.PoolClient) => Promise<Alert | null>,
): Promise<Alert | null> {
  if (!isUuid(alertId)) return null;
  return withTransaction(async (client) => {
    const found = await client.query<{ subject_key: string; family: AlertFamily }>(
      'SELECT subject_key, family FROM alerts WHERE id = $1',
      [alertId],
    );
    const target = found.rows[0];
    if (!target) return null;
    await lockPair(client, target.subject_key, target.family);
    return update(client);
  });
}

// ─── Repository Functions ────────────────────────────────────────────────────

export async function findById(alertId: string): Promise<Alert | null> {
  if (!isUuid(alertId)) return null;
  const result = await query<AlertRow>(`SELECT ${ALERT_COLUMNS} FROM alerts WHERE id = $1`, [alertId]);
  return firstAlert(result);
}

export async function findByIds(alertIds: readonly string[]): Promise<Alert[]> {
  const ids = alertIds.filter((id) => isUuid(id));
  if (ids.length === 0) return [];
  const result = await query<AlertRow>(
    `SELECT ${ALERT_COLUMNS} FROM alerts WHERE id = ANY($1::uuid[])`,
    [ids],
  );
  return result.rows.map(mapRowToAlert);
}

/** Alerts in the 'active' state, most severe first unless `orderBy` is 'recent'. */
export async function findActive(options: ActiveAlertQuery = {}): Promise<Alert[]> {
  const conditions = ["state = 'active'"];
  const params: unknown[] = [];

  if (options.kind) {
    params.push(options.kind);
    conditions.push(`kind = $${params.length}`);
  }
  if (options.severity) {
    params.push(options.severity);
    conditions.push(`severity = $${params.length}`);
  }
  if (options.kinds) {
    params.push([...options.kinds]);
    conditions.push(`kind = ANY($${params.length}::text[])`);
  }

  const order = options.orderBy === 'recent' ? 'created_at DESC' : `${SEVERITY_RANK} DESC, created_at DESC`;
  let limit = '';
  if (options.limit !== undefined) {
    params.push(options.limit);
    limit = `LIMIT $${params.length}`;
  }

  const result = await query<AlertRow>(
    `SELECT ${ALERT_COLUMNS}
     FROM alerts
     WHERE ${conditions.join(' AND ')}
     ORDER BY ${order}
     ${limit}`,
    params,
  );
  return result.rows.map(mapRowToAlert);
}

export async function findOpenSubjectKeys(family: AlertFamily): Promise<string[]> {
  const result = await query<{ subject_key: string }>(
    `SELECT DISTINCT subject_key FROM alerts WHERE family = $1 AND state <> 'resolved'`,
    [family],
  );
  return result.rows.map((row) => row.subject_key);
}

/** Alerts in any state, newest first, optionally for one medication or order. */
export async function findHistory(options: HistoryQuery): Promise<Alert[]> {
  const result = options.subjectId
    ? await query<AlertRow>(
        `SELECT ${ALERT_COLUMNS} FROM alerts
         WHERE subject_key = $1
         ORDER BY created_at DESC
         LIMIT $2`,
        [options.subjectId, options.limit],
      )
    : await query<AlertRow>(
        `SELECT ${ALERT_COLUMNS} FROM alerts
         ORDER BY created_at DESC
         LIMIT $1`,
        [options.limit],
      );
  return result.rows.map(mapRowToAlert);
}

export async function resolveById(alertId: string, actor: string, at: Date): Promise<Alert | null> {
  return updateUnderLock(alertId, async (client) => {
    const result = await client.query<AlertRow>(
      `UPDATE alerts
       SET state = 'resolved', resolved_at = $2, resolved_by = $3, updated_at = $2
       WHERE id = $1 AND state <> 'resolved'
       RETURNING ${ALERT_COLUMNS}`,
      [alertId, at, actor],
    );
    const alert = firstAlert(result);
    if (!alert) return null;
    await insertEvent(client, {
      alertId,
      transition: 'resolved',
      actor,
      kind: alert.kind,
      severity: alert.severity,
      occurredAt: at,
    });
    return alert;
  });
}

export async function markPendingRestock(
  alertId: string,
  actor: string,
  notes: string | null,
  at: Date,
): Promise<Alert | null> {
  return updateUnderLock(alertId, async (client) => {
    const result = await client.query<AlertRow>(
      `UPDATE alerts
       SET state = 'pending_restock', notes = $2, updated_at = $3
       WHERE id = $1 AND state = 'active'
       RETURNING ${ALERT_COLUMNS}`,
      [alertId, notes, at],
    );
    const alert = firstAlert(result);
    if (!alert) return null;
    await insertEvent(client, {
      alertId,
      transition: 'pending_restock',
      actor,
      kind: alert.kind,
      severity: alert.severity,
      occurredAt: at,
      ...(notes ? { details: { notes } } : {}),
    });
    return alert;
  });
}

export async function getStats(options: StatsQuery): Promise<AlertStats> {
  const kinds = options.kinds ? [...options.kinds] : null;
  const groups = await query<StatsGroupRow>(
    `SELECT state, kind, severity, COUNT(*)::int AS count
     FROM alerts
     WHERE ($1::text[] IS NULL OR kind = ANY($1::text[]))
     GROUP BY state, kind, severity`,
    [kinds],
  );
  const windowed = await query<StatsWindowRow>(
    `SELECT COUNT(*) FILTER (WHERE created_at >= $2)::int AS created,
            COUNT(*) FILTER (WHERE resolved_at >= $2)::int AS resolved
     FROM alerts
     WHERE ($1::text[] IS NULL OR kind = ANY($1::text[]))`,
    [kinds, options.since],
  );

  const stats = emptyStats();
  for (const row of groups.rows) {
    stats.byState[row.state] += row.count;
    if (row.state !== 'active') continue;
    stats.totalActive += row.count;
    stats.byKind[row.kind] = (stats.byKind[row.kind] ?? 0) + row.count;
    stats.bySeverity[row.severity] += row.count;
  }
  stats.createdLast24h = windowed.rows[0]?.created ?? 0;
  stats.resolvedLast24h = windowed.rows[0]?.resolved ?? 0;
  return stats;
}

/** The PostgreSQL-backed alert store. */
export function createPgAlertRepository(): AlertStore {
  return {
    withSubjectLock<T>(
      subjectKey: string,
      family: AlertFamily,
      work: (tx: AlertStoreTransaction) => Promise<T>,
    ): Promise<T> {
      return withTransaction(async (client) => {
        await lockPair(client, subjectKey, family);
        return work(bindTransaction(client));
      });
    },
    findById,
    findByIds,
    findActive,
    findOpenSubjectKeys,
    findHistory,
    resolveById,
    markPendingRestock,
    getStats,
  };
}
