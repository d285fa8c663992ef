/**
 * Alert Builders
 *
 * One pure builder per alert family turns a subject and its classified
 * condition into the family-specific snapshot and the human-readable
 * message stored on the alert. New families are added as table entries.
 *
 * @module alerting/builders
 */

import type {
  AlertFamily,
  AlertKind,
  AlertSnapshot,
  MonitoredSubject,
  SubjectDisplay,
} from '../types/index.js';
import type { AlertCondition } from './classifier.js';
import { daysOrderIsLate, daysUntilExpiry } from './classifier.js';
import { toIsoDate } from '../utils/dates.js';

// ─── Types ───────────────────────────────────────────────────────────────────

/** Everything needed to create or escalate an alert, minus lifecycle fields. */
export interface AlertDraft {
  medicationId: string | null;
  orderId: string | null;
  message: string;
  snapshot: AlertSnapshot;
}

export type FamilyBuilder = (
  subject: MonitoredSubject,
  condition: AlertCondition,
  today: Date,
) => AlertDraft | null;

// ─── Message Rendering ───────────────────────────────────────────────────────

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

function withLot(name: string, lot: string | null): string {
  return lot ? `${name} (lot ${lot})` : name;
}

/**
 * Render the message for a kind from its snapshot. Escalations call this
 * with the new kind and snapshot, so messages never drift from the data.
 */
export function renderMessage(kind: AlertKind, snapshot: AlertSnapshot): string {
  switch (snapshot.family) {
    case 'stock': {
      const { medicationName, presentation, stock, minimumStock } = snapshot;
      if (kind === 'stock_exhausted') {
        return presentation
          ? `Stock exhausted: ${medicationName} (${presentation})`
          : `Stock exhausted: ${medicationName}`;
      }
      const label = kind === 'stock_critical' ? 'Critical stock' : 'Minimum stock reached';
      return `${label}: ${medicationName} has ${plural(stock, 'unit')} (minimum: ${minimumStock})`;
    }
    case 'expiry': {
      const subject = withLot(snapshot.medicationName, snapshot.lot);
      if (kind === 'expired') {
        return `EXPIRED: ${subject} expired ${plural(Math.abs(snapshot.daysRemaining), 'day')} ago`;
      }
      const label = kind === 'expiry_imminent' ? 'Imminent expiry' : 'Upcoming expiry';
      return `${label}: ${subject} expires in ${plural(snapshot.daysRemaining, 'day')}`;
    }
    case 'order_delay':
      return (
        `Order ${snapshot.orderNumber} delayed ${plural(snapshot.daysDelayed, 'day')}. ` +
        `Supplier: ${snapshot.supplierName ?? 'unknown'}`
      );
  }
}

/** Subject display fields carried by notifications. */
export function displayOf(snapshot: AlertSnapshot): SubjectDisplay {
  if (snapshot.family === 'order_delay') {
    return {
      name: `Order ${snapshot.orderNumber}`,
      manufacturer: snapshot.supplierName,
      presentation: null,
      lot: null,
    };
  }
  return {
    name: snapshot.medicationName,
    manufacturer: snapshot.manufacturer,
    presentation: snapshot.presentation,
    lot: snapshot.lot,
  };
}

// ─── Family Builders ─────────────────────────────────────────────────────────

const buildStock: FamilyBuilder = (subject, condition) => {
  if (subject.kind !== 'medication') return null;
  if (subject.stock === null || subject.minimumStock === null) return null;

  const snapshot: AlertSnapshot = {
    family: 'stock',
    stock: subject.stock,
    minimumStock: subject.minimumStock,
    medicationName: subject.name,
    manufacturer: subject.manufacturer,
    presentation: subject.presentation,
    lot: subject.lot,
  };
  return {
    medicationId: subject.id,
    orderId: null,
    message: renderMessage(condition.kind, snapshot),
    snapshot,
  };
};

const buildExpiry: FamilyBuilder = (subject, condition, today) => {
  if (subject.kind !== 'medication' || !subject.expiryDate) return null;
  const daysRemaining = daysUntilExpiry(subject, today);
  if (daysRemaining === null) return null;

  const snapshot: AlertSnapshot = {
    family: 'expiry',
    expiryDate: toIsoDate(subject.expiryDate),
    daysRemaining,
    medicationName: subject.name,
    manufacturer: subject.manufacturer,
    presentation: subject.presentation,
    lot: subject.lot,
  };
  return {
    medicationId: subject.id,
    orderId: null,
    message: renderMessage(condition.kind, snapshot),
    snapshot,
  };
};

const buildOrderDelay: FamilyBuilder = (subject, condition, today) => {
  if (subject.kind !== 'purchase_order' || !subject.expectedDeliveryDate) return null;
  const daysDelayed = daysOrderIsLate(subject, today);
  if (daysDelayed === null) return null;

  const snapshot: AlertSnapshot = {
    family: 'order_delay',
    orderId: subject.id,
    orderNumber: subject.orderNumber,
    supplierName: subject.supplierName,
    expectedDeliveryDate: toIsoDate(subject.expectedDeliveryDate),
    daysDelayed,
    estimatedTotal: subject.estimatedTotal,
  };
  return {
    medicationId: null,
    orderId: subject.id,
    message: renderMessage(condition.kind, snapshot),
    snapshot,
  };
};

export const ALERT_BUILDERS: Record<AlertFamily, FamilyBuilder> = {
  stock: buildStock,
  expiry: buildExpiry,
  order_delay: buildOrderDelay,
};

export function buildAlertDraft(
  subject: MonitoredSubject,
  family: AlertFamily,
  condition: AlertCondition,
  today: Date,
): AlertDraft | null {
  return ALERT_BUILDERS[family](subject, condition, today);
}
