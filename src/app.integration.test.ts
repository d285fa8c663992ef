/**
 * Integration tests for full alert flows through the Express app.
 *
 * Drives the complete HTTP request/response cycle against a real engine
 * wired to the in-memory alert store, an in-memory subject source and the
 * in-process Redis fake.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';

import { loadAlertingConfig } from './config/alertingConfig.js';
import { createSilentLogger } from './logging/logger.js';
import { createInMemoryAlertStore } from './alerting/inMemoryAlertStore.js';
import type { FakeRedis } from './test/fakeRedis.js';
import { createFakeRedis } from './test/fakeRedis.js';
import { TODAY, isoDay, makeMedication, makeOrder, sequentialIds } from './test/fixtures.js';
import type { InMemorySubjectSource } from './test/inMemorySubjectSource.js';
import { createInMemorySubjectSource } from './test/inMemorySubjectSource.js';
import { createAlertEngine } from './engine.js';
import { createApp } from './app.js';

describe('alert API', () => {
  let source: InMemorySubjectSource;
  let redis: FakeRedis;
  let app: Express;

  beforeEach(() => {
    source = createInMemorySubjectSource();
    redis = createFakeRedis();
    const logger = createSilentLogger();
    const engine = createAlertEngine({
      config: loadAlertingConfig({ ALERT_SCAN_ON_START: 'false' }),
      store: createInMemoryAlertStore({ generateId: sequentialIds() }),
      source,
      cache: redis,
      logger,
      now: () => TODAY,
    });
    app = createApp({ service: engine.service, logger });
  });

  async function scanStock() {
    return request(app).post('/api/alerts/scan/stock');
  }

  it('should create alerts from a stock scan and list them', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    source.put(makeMedication({ id: 'med-2', stock: 50 }));

    const scan = await scanStock();
    const active = await request(app).get('/api/alerts/active');

    expect(scan.body.data).toEqual({ scanned: 2, created: 1, escalated: 0, resolved: 0, unchanged: 1, failed: 0 });
    expect(active.status).toBe(200);
    expect(active.body.data).toHaveLength(1);
    expect(active.body.data[0]).toMatchObject({
      id: 'alert-1',
      medicationId: 'med-1',
      kind: 'stock_exhausted',
      severity: 'critical',
      state: 'active',
      createdAt: '2025-03-10T09:00:00.000Z',
    });
  });

  it('should deliver notifications to the stock roles only', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    await scanStock();

    const purchasing = await request(app).get('/api/alerts/notifications/purchasing');
    const pharmacist = await request(app).get('/api/alerts/notifications/pharmacist');

    expect(purchasing.body.data.map((n: { alertId: string }) => n.alertId)).toEqual(['alert-1']);
    expect(pharmacist.body.data).toEqual([]);
  });

  it('should resolve an alert once and drop it from the queues', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    await scanStock();

    const first = await request(app).post('/api/alerts/alert-1/resolve').set('x-actor-id', 'pharm-1');
    const second = await request(app).post('/api/alerts/alert-1/resolve').set('x-actor-id', 'pharm-1');

    expect(first.body.data.resolved).toBe(true);
    expect(first.body.data.alert).toMatchObject({ state: 'resolved', resolvedBy: 'pharm-1' });
    expect(second.status).toBe(200);
    expect(second.body.data.resolved).toBe(false);
    expect(redis.lists.has('notifications:purchasing')).toBe(false);
  });

  it('should require an actor to resolve', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    await scanStock();

    const res = await request(app).post('/api/alerts/alert-1/resolve');

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ actor: ['is required (at most 128 characters)'] });
  });

  it('should answer 404 when resolving an unknown alert', async () => {
    const res = await request(app).post('/api/alerts/alert-404/resolve').set('x-actor-id', 'pharm-1');

    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('Alert alert-404 not found');
  });

  it('should hold an alert in pending_restock with notes', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 3 }));
    await scanStock();

    const res = await request(app)
      .post('/api/alerts/alert-1/pending-restock')
      .set('x-actor-id', 'buyer-2')
      .send({ notes: 'PO-0099 raised' });
    const active = await request(app).get('/api/alerts/active');

    expect(res.body.data.updated).toBe(true);
    expect(res.body.data.alert).toMatchObject({ state: 'pending_restock', notes: 'PO-0099 raised' });
    expect(active.body.data).toEqual([]);
  });

  it('should recheck a single medication on demand', async () => {
    source.put(makeMedication({ id: 'med-7', expiryDate: isoDay('2025-03-14') }));

    const res = await request(app).post('/api/alerts/check/medications/med-7');

    expect(res.status).toBe(200);
    expect(res.body.data).toContainEqual(
      expect.objectContaining({ family: 'expiry', transition: 'created' }),
    );
  });

  it('should scan overdue purchase orders', async () => {
    source.put(makeOrder({ id: 'order-1', expectedDeliveryDate: isoDay('2025-03-01') }));

    const res = await request(app).post('/api/alerts/scan/orders');
    const history = await request(app).get('/api/alerts/history?subjectId=order-1');

    expect(res.body.data.created).toBe(1);
    expect(history.body.data[0]).toMatchObject({ kind: 'order_delayed', severity: 'critical' });
  });

  it('should answer 404 when rechecking an unknown order', async () => {
    const res = await request(app).post('/api/alerts/check/orders/order-9');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('ALERT_NOT_FOUND');
  });

  it('should report stats scoped by role', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    await scanStock();

    const admin = await request(app).get('/api/alerts/stats?role=admin');
    const pharmacist = await request(app).get('/api/alerts/stats?role=pharmacist');

    expect(admin.body.data.totalActive).toBe(1);
    expect(admin.body.data.createdLast24h).toBe(1);
    expect(pharmacist.body.data.totalActive).toBe(0);
  });

  it('should report the monitor status', async () => {
    const res = await request(app).get('/api/alerts/monitor/status');

    expect(res.body.data.running).toBe(false);
    expect(res.body.data.jobs.map((j: { name: string }) => j.name)).toEqual(['stock', 'expiry', 'order_delay']);
    expect(res.body.data.settings).toEqual({
      stockIntervalMinutes: 15,
      expirationHour: 8,
      expirationDays: 30,
      orderWindowStart: 8,
      orderWindowEnd: 19,
    });
  });

  it('should clear a role queue', async () => {
    source.put(makeMedication({ id: 'med-1', stock: 0 }));
    await scanStock();

    const res = await request(app).delete('/api/alerts/notifications/admin');

    expect(res.body.data).toEqual({ role: 'admin', cleared: true });
    expect(redis.lists.has('notifications:admin')).toBe(false);
  });
});
