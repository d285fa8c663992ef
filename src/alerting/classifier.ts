/**
 * Threshold Classifier
 *
 * Maps a monitored subject's current numeric and temporal state to an
 * alert condition (kind + severity) per alert family. Every function here
 * is pure: the same input always yields the same condition, and malformed
 * input (missing threshold, invalid date, non-finite stock) yields `null`
 * rather than throwing.
 *
 * Stock rule: any stock under the minimum is critical. The half-of-minimum
 * variant is not used.
 *
 * @module alerting/classifier
 */

import type {
  AlertFamily,
  AlertKind,
  AlertSeverity,
  MedicationSubject,
  MonitoredSubject,
  PurchaseOrderSubject,
} from '../types/index.js';
import { ALERT_SEVERITIES } from '../types/index.js';
import { daysBetween } from '../utils/dates.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface AlertCondition {
  kind: AlertKind;
  severity: AlertSeverity;
}

export interface ClassifyOptions {
  /** Reference day for expiry and delivery arithmetic. */
  today: Date;
  /** Days ahead of expiry that raise an expiry_soon alert. Defaults to 30. */
  anticipationDays?: number;
}

// ─── Family Tables ───────────────────────────────────────────────────────────

export const DEFAULT_ANTICIPATION_DAYS = 30;

/** Days remaining at or below which expiry becomes imminent. */
export const IMMINENT_EXPIRY_DAYS = 7;

export const FAMILY_KINDS: Record<AlertFamily, readonly AlertKind[]> = {
  stock: ['stock_low', 'stock_critical', 'stock_exhausted'],
  expiry: ['expiry_soon', 'expiry_imminent', 'expired'],
  order_delay: ['order_delayed'],
};

const KIND_FAMILY: Record<AlertKind, AlertFamily> = {
  stock_low: 'stock',
  stock_critical: 'stock',
  stock_exhausted: 'stock',
  expiry_soon: 'expiry',
  expiry_imminent: 'expiry',
  expired: 'expiry',
  order_delayed: 'order_delay',
};

export function familyOf(kind: AlertKind): AlertFamily {
  return KIND_FAMILY[kind];
}

/** Families that apply to a subject kind. */
export function familiesFor(subject: MonitoredSubject): AlertFamily[] {
  return subject.kind === 'medication' ? ['stock', 'expiry'] : ['order_delay'];
}

/** Negative when `a` is less severe than `b`. */
export function compareSeverity(a: AlertSeverity, b: AlertSeverity): number {
  return ALERT_SEVERITIES.indexOf(a) - ALERT_SEVERITIES.indexOf(b);
}

// ─── Family Rules ────────────────────────────────────────────────────────────

export function classifyStock(
  stock: number | null,
  minimumStock: number | null,
): AlertCondition | null {
  if (stock === null || minimumStock === null) return null;
  if (!Number.isFinite(stock) || !Number.isFinite(minimumStock)) return null;
  if (stock < 0 || minimumStock < 0) return null;

  if (stock === 0) return { kind: 'stock_exhausted', severity: 'critical' };
  if (stock < minimumStock) return { kind: 'stock_critical', severity: 'high' };
  if (stock === minimumStock) return { kind: 'stock_low', severity: 'medium' };
  return null;
}

export function classifyExpiry(
  daysRemaining: number | null,
  anticipationDays: number = DEFAULT_ANTICIPATION_DAYS,
): AlertCondition | null {
  if (daysRemaining === null || !Number.isFinite(daysRemaining)) return null;

  if (daysRemaining < 0) return { kind: 'expired', severity: 'critical' };
  if (daysRemaining <= IMMINENT_EXPIRY_DAYS) return { kind: 'expiry_imminent', severity: 'high' };
  if (daysRemaining <= anticipationDays) return { kind: 'expiry_soon', severity: 'medium' };
  return null;
}

export function classifyOrderDelay(daysLate: number | null): AlertCondition | null {
  if (daysLate === null || !Number.isFinite(daysLate) || daysLate <= 0) return null;

  if (daysLate >= 7) return { kind: 'order_delayed', severity: 'critical' };
  if (daysLate >= 3) return { kind: 'order_delayed', severity: 'high' };
  return { kind: 'order_delayed', severity: 'medium' };
}

// ─── Subject-level Helpers ───────────────────────────────────────────────────

function isMonitored(med: MedicationSubject): boolean {
  return !med.isDeleted && med.status === 'active';
}

/** Whole days until the medication expires, or null without a valid expiry date. */
export function daysUntilExpiry(med: MedicationSubject, today: Date): number | null {
  return med.expiryDate ? daysBetween(today, med.expiryDate) : null;
}

/** Whole days an open order is past its expected delivery date, or null when not overdue. */
export function daysOrderIsLate(order: PurchaseOrderSubject, today: Date): number | null {
  if (order.status !== 'sent' && order.status !== 'delayed') return null;
  if (!order.expectedDeliveryDate) return null;
  const late = daysBetween(order.expectedDeliveryDate, today);
  return late !== null && late > 0 ? late : null;
}

/**
 * Classify one family of a subject. Families that do not apply to the
 * subject kind, and inactive or deleted medications, yield `null`.
 */
export function classify(
  subject: MonitoredSubject,
  family: AlertFamily,
  options: ClassifyOptions,
): AlertCondition | null {
  if (subject.kind === 'medication') {
    if (!isMonitored(subject)) return null;
    if (family === 'stock') return classifyStock(subject.stock, subject.minimumStock);
    if (family === 'expiry') {
      return classifyExpiry(daysUntilExpiry(subject, options.today), options.anticipationDays);
    }
    return null;
  }

  if (family !== 'order_delay') return null;
  return classifyOrderDelay(daysOrderIsLate(subject, options.today));
}
