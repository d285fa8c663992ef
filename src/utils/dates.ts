/**
 * Calendar-day helpers.
 *
 * All day arithmetic happens on UTC calendar days so a classification never
 * depends on the host timezone.
 *
 * @module utils/dates
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/** Midnight UTC of the calendar day containing `date`, in epoch ms; NaN for invalid dates. */
export function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Returns null when either date is invalid.
 */
export function daysBetween(from: Date, to: Date): number | null {
  const start = utcDay(from);
  const end = utcDay(to);
  if (Number.isNaN(start) || Number.isNaN(end)) return null;
  return Math.round((end - start) / DAY_MS);
}

/** Format a date as YYYY-MM-DD (UTC). */
export function toIsoDate(date: Date): string {
  return new Date(utcDay(date)).toISOString().slice(0, 10);
}

/** Parse YYYY-MM-DD as midnight UTC; null for anything else. */
export function parseIsoDate(value: string | null | undefined): Date | null {
  if (!value || !/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = new Date(`${value}T00:00:00.000Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Add whole days to a date. */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
