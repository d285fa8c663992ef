/**
 * Subject source: read-only access to the inventory and purchasing tables.
 *
 * The alert engine never writes these tables; they belong to the inventory
 * (`medications`) and purchasing (`purchase_orders`, `suppliers`) back
 * office. Dates are selected as YYYY-MM-DD text so the calendar day does
 * not shift with the session timezone.
 *
 * @module repositories/subjectSource
 */

import type {
  MedicationStatus,
  MedicationSubject,
  PurchaseOrderStatus,
  PurchaseOrderSubject,
} from '../types/index.js';
import { query } from '../utils/db.js';
import { addDays, parseIsoDate, toIsoDate } from '../utils/dates.js';

// ─── Contract ────────────────────────────────────────────────────────────────

export interface SubjectSource {
  /** Any medication row, including inactive and deleted ones. */
  getMedication(id: string): Promise<MedicationSubject | null>;
  getPurchaseOrder(id: string): Promise<PurchaseOrderSubject | null>;
  /** Active, non-deleted medications that have a minimum stock. */
  listStockMonitored(): Promise<MedicationSubject[]>;
  /** Active, non-deleted medications expiring on or before `today + days` (expired included). */
  listExpiringWithin(days: number, today: Date): Promise<MedicationSubject[]>;
  /** Sent or delayed orders whose expected delivery date is before `today`. */
  listOverdueOrders(today: Date): Promise<PurchaseOrderSubject[]>;
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface MedicationRow {
  id: string;
  name: string;
  manufacturer: string | null;
  presentation: string | null;
  lot: string | null;
  stock: number | null;
  minimum_stock: number | null;
  expiry_date: string | null;
  status: string;
  is_deleted: boolean;
}

interface PurchaseOrderRow {
  id: string;
  order_number: string;
  supplier_name: string | null;
  expected_delivery_date: string | null;
  status: string;
  estimated_total: string | null;
}

const ORDER_STATUSES: readonly PurchaseOrderStatus[] = ['draft', 'sent', 'delayed', 'received', 'cancelled'];

function toMedicationStatus(value: string): MedicationStatus {
  return value === 'active' ? 'active' : 'inactive';
}

/** Unknown statuses map to 'draft', which never raises delay alerts. */
function toOrderStatus(value: string): PurchaseOrderStatus {
  return ORDER_STATUSES.find((status) => status === value) ?? 'draft';
}

function toNumberOrNull(value: string | number | null): number | null {
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function mapRowToMedication(row: MedicationRow): MedicationSubject {
  return {
    kind: 'medication',
    id: row.id,
    name: row.name,
    manufacturer: row.manufacturer,
    presentation: row.presentation,
    lot: row.lot,
    stock: toNumberOrNull(row.stock),
    minimumStock: toNumberOrNull(row.minimum_stock),
    expiryDate: parseIsoDate(row.expiry_date),
    status: toMedicationStatus(row.status),
    isDeleted: row.is_deleted,
  };
}

function mapRowToOrder(row: PurchaseOrderRow): PurchaseOrderSubject {
  return {
    kind: 'purchase_order',
    id: row.id,
    orderNumber: row.order_number,
    supplierName: row.supplier_name,
    expectedDeliveryDate: parseIsoDate(row.expected_delivery_date),
    status: toOrderStatus(row.status),
    estimatedTotal: toNumberOrNull(row.estimated_total),
  };
}

// ─── Queries ─────────────────────────────────────────────────────────────────

const MEDICATION_COLUMNS = `id, name, manufacturer, presentation, lot, stock, minimum_stock,
       to_char(expiry_date, 'YYYY-MM-DD') AS expiry_date, status, is_deleted`;

const ORDER_COLUMNS = `po.id, po.order_number, s.name AS supplier_name,
       to_char(po.expected_delivery_date, 'YYYY-MM-DD') AS expected_delivery_date,
       po.status, po.estimated_total::text AS estimated_total`;

export async function findMedication(id: string): Promise<MedicationSubject | null> {
  const result = await query<MedicationRow>(
    `SELECT ${MEDICATION_COLUMNS}
     FROM medications
     WHERE id = $1`,
    [id],
  );
  const row = result.rows[0];
  return row ? mapRowToMedication(row) : null;
}

export async function findPurchaseOrder(id: string): Promise<PurchaseOrderSubject | null> {
  const result = await query<PurchaseOrderRow>(
    `SELECT ${ORDER_COLUMNS}
     FROM purchase_orders po
     LEFT JOIN suppliers s ON s.id = po.supplier_id
     WHERE po.id = $1`,
    [id],
  );
  const row = result.rows[0];
  return row ? mapRowToOrder(row) : null;
}

export async function listStockMonitored(): Promise<MedicationSubject[]> {
  const result = await query<MedicationRow>(
    `SELECT ${MEDICATION_COLUMNS}
     FROM medications
     WHERE is_deleted = FALSE
       AND status = 'active'
       AND minimum_stock IS NOT NULL
     ORDER BY id`,
  );
  return result.rows.map(mapRowToMedication);
}

export async function listExpiringWithin(days: number, today: Date): Promise<MedicationSubject[]> {
  const result = await query<MedicationRow>(
    `SELECT ${MEDICATION_COLUMNS}
     FROM medications
     WHERE is_deleted = FALSE
       AND status = 'active'
       AND expiry_date IS NOT NULL
       AND expiry_date <= $1::date
     ORDER BY expiry_date, id`,
    [toIsoDate(addDays(today, days))],
  );
  return result.rows.map(mapRowToMedication);
}

export async function listOverdueOrders(today: Date): Promise<PurchaseOrderSubject[]> {
  const result = await query<PurchaseOrderRow>(
    `SELECT ${ORDER_COLUMNS}
     FROM purchase_orders po
     LEFT JOIN suppliers s ON s.id = po.supplier_id
     WHERE po.status IN ('sent', 'delayed')
       AND po.expected_delivery_date IS NOT NULL
       AND po.expected_delivery_date < $1::date
     ORDER BY po.expected_delivery_date, po.id`,
    [toIsoDate(today)],
  );
  return result.rows.map(mapRowToOrder);
}

/** The PostgreSQL-backed subject source. */
export function createPgSubjectSource(): SubjectSource {
  return {
    getMedication: findMedication,
    getPurchaseOrder: findPurchaseOrder,
    listStockMonitored,
    listExpiringWithin,
    listOverdueOrders,
  };
}
