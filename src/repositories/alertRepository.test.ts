/**
 * Unit tests for the alert repository.
 *
 * All database calls are mocked via vi.mock so these tests run
 * without a live PostgreSQL connection.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';

// ─── Mock the db module ──────────────────────────────────────────────────────

const mockQuery = vi.fn();
const mockClientQuery = vi.fn();

vi.mock('../utils/db.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
  withTransaction: (work: (client: unknown) => Promise<unknown>) => work({ query: mockClientQuery }),
}));

// Import after mock is set up
const { createPgAlertRepository } = await import('./alertRepository.js');

// ─── Helpers ─────────────────────────────────────────────────────────────────

const ALERT_ID = 'a1b2c3d4-0000-4000-8000-000000000001';
const CREATED = new Date('2025-03-10T09:00:00.000Z');
const LATER = new Date('2025-03-10T11:30:00.000Z');

function fakeAlertRow(overrides: Record<string, unknown> = {}) {
  return {
    id: ALERT_ID,
    medication_id: 'med-1',
    order_id: null,
    kind: 'stock_critical',
    family: 'stock',
    severity: 'high',
    state: 'active',
    message: 'Critical stock: Amoxicillin 500mg has 4 units (minimum: 5)',
    snapshot: { family: 'stock', stock: 4, minimumStock: 5 },
    notes: null,
    created_at: CREATED,
    updated_at: CREATED,
    resolved_at: null,
    resolved_by: null,
    ...overrides,
  };
}

function pgResult(rows: Record<string, unknown>[]): QueryResult {
  return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
}

function sqlOf(mock: typeof mockQuery, call: number): string {
  return (mock.mock.calls[call] as [string])[0];
}

function paramsOf(mock: typeof mockQuery, call: number): unknown[] {
  return (mock.mock.calls[call] as [string, unknown[]])[1];
}

beforeEach(() => {
  mockQuery.mockReset();
  mockClientQuery.mockReset();
});

describe('alertRepository', () => {
  const repo = createPgAlertRepository();

  describe('withSubjectLock', () => {
    it('should take the advisory lock for the pair before running the work', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([]));

      const open = await repo.withSubjectLock('med-1', 'stock', (tx) => tx.findOpen('med-1', 'stock'));

      expect(open).toBeNull();
      expect(sqlOf(mockClientQuery, 0)).toBe('SELECT pg_advisory_xact_lock(hashtext($1))');
      expect(paramsOf(mockClientQuery, 0)).toEqual(['stock:med-1']);
      expect(sqlOf(mockClientQuery, 1)).toContain("state <> 'resolved'");
      expect(sqlOf(mockClientQuery, 1)).toContain('FOR UPDATE');
      expect(paramsOf(mockClientQuery, 1)).toEqual(['med-1', 'stock']);
    });

    it('should insert with the subject key and a JSON snapshot', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([fakeAlertRow()]));

      const created = await repo.withSubjectLock('med-1', 'stock', (tx) =>
        tx.insert({
          medicationId: 'med-1',
          orderId: null,
          kind: 'stock_critical',
          family: 'stock',
          severity: 'high',
          message: 'Critical stock: Amoxicillin 500mg has 4 units (minimum: 5)',
          snapshot: {
            family: 'stock',
            stock: 4,
            minimumStock: 5,
            medicationName: 'Amoxicillin 500mg',
            manufacturer: null,
            presentation: null,
            lot: null,
          },
          createdAt: CREATED,
        }),
      );

      expect(created).toMatchObject({ id: ALERT_ID, medicationId: 'med-1', state: 'active', createdAt: CREATED });
      const params = paramsOf(mockClientQuery, 1);
      expect(params.slice(0, 6)).toEqual(['med-1', null, 'med-1', 'stock_critical', 'stock', 'high']);
      expect(JSON.parse(params[7] as string)).toMatchObject({ family: 'stock', stock: 4 });
    });

    it('should use the order id as subject key for delay alerts', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(
          pgResult([fakeAlertRow({ medication_id: null, order_id: 'order-1', kind: 'order_delayed', family: 'order_delay' })]),
        );

      await repo.withSubjectLock('order-1', 'order_delay', (tx) =>
        tx.insert({
          medicationId: null,
          orderId: 'order-1',
          kind: 'order_delayed',
          family: 'order_delay',
          severity: 'medium',
          message: 'Order PO-0042 delayed 1 day. Supplier: North Supply',
          snapshot: {
            family: 'order_delay',
            orderId: 'order-1',
            orderNumber: 'PO-0042',
            supplierName: 'North Supply',
            expectedDeliveryDate: '2025-03-09',
            daysDelayed: 1,
            estimatedTotal: null,
          },
          createdAt: CREATED,
        }),
      );

      expect(paramsOf(mockClientQuery, 1)[2]).toBe('order-1');
    });

    it('should reject an escalation of a missing row', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([]));

      await expect(
        repo.withSubjectLock('med-1', 'stock', (tx) =>
          tx.escalate(ALERT_ID, {
            kind: 'stock_exhausted',
            severity: 'critical',
            message: 'Stock exhausted: Amoxicillin 500mg',
            snapshot: {
              family: 'stock',
              stock: 0,
              minimumStock: 5,
              medicationName: 'Amoxicillin 500mg',
              manufacturer: null,
              presentation: null,
              lot: null,
            },
            updatedAt: LATER,
          }),
        ),
      ).rejects.toMatchObject({ code: 'ALERT_NOT_FOUND' });
    });
  });

  describe('findById', () => {
    it('should map the row to an alert', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeAlertRow()]));

      const alert = await repo.findById(ALERT_ID);

      expect(alert).toMatchObject({
        id: ALERT_ID,
        medicationId: 'med-1',
        orderId: null,
        kind: 'stock_critical',
        resolvedAt: null,
      });
    });

    it('should not query for an id that is not a UUID', async () => {
      expect(await repo.findById('not-a-uuid')).toBeNull();
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it('should skip malformed ids in a batch lookup', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeAlertRow()]));

      await repo.findByIds([ALERT_ID, 'nope']);

      expect(paramsOf(mockQuery, 0)).toEqual([[ALERT_ID]]);
    });
  });

  describe('findActive', () => {
    it('should filter by kind and order by severity rank', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeAlertRow()]));

      await repo.findActive({ kind: 'stock_critical', limit: 10 });

      const sql = sqlOf(mockQuery, 0);
      expect(sql).toContain("WHERE state = 'active' AND kind = $1");
      expect(sql).toContain("WHEN 'critical' THEN 4");
      expect(sql).toContain('LIMIT $2');
      expect(paramsOf(mockQuery, 0)).toEqual(['stock_critical', 10]);
    });

    it('should order newest first for role queues', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      await repo.findActive({ kinds: ['expired', 'expiry_soon'], orderBy: 'recent' });

      const sql = sqlOf(mockQuery, 0);
      expect(sql).toContain('kind = ANY($1::text[])');
      expect(sql).toContain('ORDER BY created_at DESC');
      expect(sql).not.toContain('CASE severity');
      expect(paramsOf(mockQuery, 0)).toEqual([['expired', 'expiry_soon']]);
    });
  });

  describe('findHistory', () => {
    it('should scope history to a subject when given', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      await repo.findHistory({ subjectId: 'med-1', limit: 50 });

      expect(sqlOf(mockQuery, 0)).toContain('WHERE subject_key = $1');
      expect(paramsOf(mockQuery, 0)).toEqual(['med-1', 50]);
    });
  });

  describe('resolveById', () => {
    it('should lock the pair, resolve, and write the event', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([{ subject_key: 'med-1', family: 'stock' }]))
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(
          pgResult([fakeAlertRow({ state: 'resolved', resolved_at: LATER, resolved_by: 'pharmacist-7' })]),
        )
        .mockResolvedValueOnce(pgResult([]));

      const alert = await repo.resolveById(ALERT_ID, 'pharmacist-7', LATER);

      expect(alert).toMatchObject({ state: 'resolved', resolvedBy: 'pharmacist-7', resolvedAt: LATER });
      expect(paramsOf(mockClientQuery, 1)).toEqual(['stock:med-1']);
      expect(sqlOf(mockClientQuery, 2)).toContain("WHERE id = $1 AND state <> 'resolved'");
      expect(paramsOf(mockClientQuery, 3)).toEqual([
        ALERT_ID,
        'resolved',
        'pharmacist-7',
        'stock_critical',
        'high',
        '{}',
        LATER,
      ]);
    });

    it('should return null without an event when already resolved', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([{ subject_key: 'med-1', family: 'stock' }]))
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([]));

      expect(await repo.resolveById(ALERT_ID, 'pharmacist-8', LATER)).toBeNull();
      expect(mockClientQuery).toHaveBeenCalledTimes(3);
    });

    it('should return null for an unknown alert', async () => {
      mockClientQuery.mockResolvedValueOnce(pgResult([]));

      expect(await repo.resolveById(ALERT_ID, 'pharmacist-7', LATER)).toBeNull();
      expect(mockClientQuery).toHaveBeenCalledTimes(1);
    });
  });

  describe('markPendingRestock', () => {
    it('should only move active alerts and keep the notes on the event', async () => {
      mockClientQuery
        .mockResolvedValueOnce(pgResult([{ subject_key: 'med-1', family: 'stock' }]))
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([fakeAlertRow({ state: 'pending_restock', notes: 'PO-0042 sent' })]))
        .mockResolvedValueOnce(pgResult([]));

      const alert = await repo.markPendingRestock(ALERT_ID, 'buyer-2', 'PO-0042 sent', LATER);

      expect(alert).toMatchObject({ state: 'pending_restock', notes: 'PO-0042 sent' });
      expect(sqlOf(mockClientQuery, 2)).toContain("WHERE id = $1 AND state = 'active'");
      expect(paramsOf(mockClientQuery, 3)[5]).toBe('{"notes":"PO-0042 sent"}');
    });
  });

  describe('getStats', () => {
    it('should fold grouped counts into the stats shape', async () => {
      mockQuery
        .mockResolvedValueOnce(
          pgResult([
            { state: 'active', kind: 'stock_critical', severity: 'high', count: 2 },
            { state: 'active', kind: 'expired', severity: 'critical', count: 1 },
            { state: 'pending_restock', kind: 'stock_low', severity: 'medium', count: 1 },
            { state: 'resolved', kind: 'stock_critical', severity: 'high', count: 4 },
          ]),
        )
        .mockResolvedValueOnce(pgResult([{ created: 3, resolved: 2 }]));

      const stats = await repo.getStats({ since: CREATED });

      expect(stats).toEqual({
        totalActive: 3,
        byKind: { stock_critical: 2, expired: 1 },
        bySeverity: { low: 0, medium: 0, high: 2, critical: 1 },
        byState: { active: 3, pending_restock: 1, resolved: 4 },
        createdLast24h: 3,
        resolvedLast24h: 2,
      });
      expect(paramsOf(mockQuery, 0)).toEqual([null]);
      expect(paramsOf(mockQuery, 1)).toEqual([null, CREATED]);
    });
  });

  describe('findOpenSubjectKeys', () => {
    it('should return distinct keys of open alerts', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([{ subject_key: 'med-1' }, { subject_key: 'med-4' }]));

      expect(await repo.findOpenSubjectKeys('expiry')).toEqual(['med-1', 'med-4']);
      expect(paramsOf(mockQuery, 0)).toEqual(['expiry']);
    });
  });
});
