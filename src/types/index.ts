/**
 * Shared type definitions for the pharmacy alert engine.
 *
 * Contains the monitored-subject views supplied by the inventory and
 * purchasing collaborators, the persisted Alert record, the ephemeral
 * notification envelope, and the error codes used across modules.
 *
 * @module types
 */

// ─── Enumerations ────────────────────────────────────────────────────────────

export const ALERT_KINDS = [
  'stock_low',
  'stock_critical',
  'stock_exhausted',
  'expiry_soon',
  'expiry_imminent',
  'expired',
  'order_delayed',
] as const;

export type AlertKind = (typeof ALERT_KINDS)[number];

export const ALERT_FAMILIES = ['stock', 'expiry', 'order_delay'] as const;

/** A group of kinds that describe the same underlying condition. */
export type AlertFamily = (typeof ALERT_FAMILIES)[number];

/** Ordered from least to most severe. */
export const ALERT_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const ALERT_STATES = ['active', 'pending_restock', 'resolved'] as const;

export type AlertState = (typeof ALERT_STATES)[number];

export const NOTIFICATION_ROLES = ['admin', 'purchasing', 'pharmacist'] as const;

export type NotificationRole = (typeof NOTIFICATION_ROLES)[number];

/** Actor recorded on automatic resolutions. */
export const SYSTEM_ACTOR = 'system';

// ─── Monitored Subjects ──────────────────────────────────────────────────────

export type MedicationStatus = 'active' | 'inactive';

export interface MedicationSubject {
  kind: 'medication';
  id: string;
  name: string;
  manufacturer: string | null;
  presentation: string | null;
  lot: string | null;
  stock: number | null;
  minimumStock: number | null;
  expiryDate: Date | null;
  status: MedicationStatus;
  isDeleted: boolean;
}

export type PurchaseOrderStatus = 'draft' | 'sent' | 'delayed' | 'received' | 'cancelled';

export interface PurchaseOrderSubject {
  kind: 'purchase_order';
  id: string;
  orderNumber: string;
  supplierName: string | null;
  expectedDeliveryDate: Date | null;
  status: PurchaseOrderStatus;
  estimatedTotal: number | null;
}

/** Read-only view of an entity whose state can raise alerts. */
export type MonitoredSubject = MedicationSubject | PurchaseOrderSubject;

// ─── Alert Snapshots ─────────────────────────────────────────────────────────

export interface StockSnapshot {
  family: 'stock';
  stock: number;
  minimumStock: number;
  medicationName: string;
  manufacturer: string | null;
  presentation: string | null;
  lot: string | null;
}

export interface ExpirySnapshot {
  family: 'expiry';
  /** ISO date (YYYY-MM-DD). */
  expiryDate: string;
  daysRemaining: number;
  medicationName: string;
  manufacturer: string | null;
  presentation: string | null;
  lot: string | null;
}

export interface OrderDelaySnapshot {
  family: 'order_delay';
  orderId: string;
  orderNumber: string;
  supplierName: string | null;
  /** ISO date (YYYY-MM-DD). */
  expectedDeliveryDate: string;
  daysDelayed: number;
  estimatedTotal: number | null;
}

export type AlertSnapshot = StockSnapshot | ExpirySnapshot | OrderDelaySnapshot;

// ─── Alert Record ────────────────────────────────────────────────────────────

export interface Alert {
  id: string;
  /** Medication reference; null only for order-delay alerts. */
  medicationId: string | null;
  /** Purchase-order reference; set only for order-delay alerts. */
  orderId: string | null;
  kind: AlertKind;
  family: AlertFamily;
  severity: AlertSeverity;
  state: AlertState;
  message: string;
  snapshot: AlertSnapshot;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
  resolvedBy: string | null;
}

// ─── Notifications ───────────────────────────────────────────────────────────

export type AlertTransition = 'created' | 'escalated' | 'resolved' | 'pending_restock';

/** Subject fields shown next to a notification. */
export interface SubjectDisplay {
  name: string;
  manufacturer: string | null;
  presentation: string | null;
  lot: string | null;
}

/** Cache-only, denormalized projection of an alert for one role's queue. */
export interface NotificationEnvelope {
  alertId: string;
  transition: AlertTransition;
  kind: AlertKind;
  family: AlertFamily;
  severity: AlertSeverity;
  message: string;
  subjectId: string | null;
  orderId: string | null;
  display: SubjectDisplay;
  /** ISO timestamp of the transition. */
  timestamp: string;
}

// ─── Statistics ──────────────────────────────────────────────────────────────

export interface AlertStats {
  totalActive: number;
  byKind: Partial<Record<AlertKind, number>>;
  bySeverity: Record<AlertSeverity, number>;
  byState: Record<AlertState, number>;
  createdLast24h: number;
  resolvedLast24h: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const ALERT_ERROR_CODES = {
  NOT_FOUND: 'ALERT_NOT_FOUND',
  INVALID_INPUT: 'ALERT_INVALID_INPUT',
  INTERNAL_ERROR: 'ALERT_INTERNAL_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type AlertErrorCode = (typeof ALERT_ERROR_CODES)[keyof typeof ALERT_ERROR_CODES];

/** Error raised for domain and configuration failures. */
export class AlertEngineError extends Error {
  readonly code: AlertErrorCode;
  /** Per-field problems for invalid input. */
  readonly fields?: Record<string, string[]>;

  constructor(code: AlertErrorCode, message: string, fields?: Record<string, string[]>) {
    super(message);
    this.name = 'AlertEngineError';
    this.code = code;
    if (fields) this.fields = fields;
  }
}

// ─── API Response Types ──────────────────────────────────────────────────────

export interface DataResponse<T> {
  success: true;
  data: T;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId: string;
}
