/**
 * Subject and alert builders shared by the test suites.
 *
 * @module test/fixtures
 */

import type {
  Alert,
  MedicationSubject,
  PurchaseOrderSubject,
} from '../types/index.js';
import type { LogEntry, Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { parseIsoDate } from '../utils/dates.js';

/** Reference instant used by most suites: 2025-03-10 09:00 UTC. */
export const TODAY = new Date('2025-03-10T09:00:00.000Z');

export function isoDay(value: string): Date {
  const date = parseIsoDate(value);
  if (!date) throw new Error(`Invalid fixture date: ${value}`);
  return date;
}

export function makeMedication(overrides: Partial<MedicationSubject> = {}): MedicationSubject {
  return {
    kind: 'medication',
    id: 'med-1',
    name: 'Amoxicillin 500mg',
    manufacturer: 'Acme Pharma',
    presentation: 'Capsules x 21',
    lot: 'L-2024-07',
    stock: 50,
    minimumStock: 5,
    expiryDate: isoDay('2026-01-01'),
    status: 'active',
    isDeleted: false,
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<PurchaseOrderSubject> = {}): PurchaseOrderSubject {
  return {
    kind: 'purchase_order',
    id: 'order-1',
    orderNumber: 'PO-0042',
    supplierName: 'North Supply',
    expectedDeliveryDate: isoDay('2025-03-12'),
    status: 'sent',
    estimatedTotal: 1250.5,
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  const createdAt = overrides.createdAt ?? TODAY;
  return {
    id: 'alert-1',
    medicationId: 'med-1',
    orderId: null,
    kind: 'stock_low',
    family: 'stock',
    severity: 'medium',
    state: 'active',
    message: 'Minimum stock reached: Amoxicillin 500mg has 5 units (minimum: 5)',
    snapshot: {
      family: 'stock',
      stock: 5,
      minimumStock: 5,
      medicationName: 'Amoxicillin 500mg',
      manufacturer: 'Acme Pharma',
      presentation: 'Capsules x 21',
      lot: 'L-2024-07',
    },
    notes: null,
    createdAt,
    updatedAt: createdAt,
    resolvedAt: null,
    resolvedBy: null,
    ...overrides,
  };
}

/** Logger that keeps every entry in memory. */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level: 'debug',
    output: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}

/** Deterministic id generator: alert-1, alert-2, ... */
export function sequentialIds(prefix = 'alert'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
