/**
 * Scan triggers and next-run arithmetic. All hours are UTC.
 *
 * @module scanning/triggers
 */

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export type ScanTrigger =
  | { type: 'interval'; minutes: number }
  | { type: 'daily'; hour: number }
  | { type: 'hourly_window'; startHour: number; endHour: number };

/**
 * Check if `currentHour` falls within [startHour, endHour).
 * Handles wrap-around past midnight (e.g. startHour=22, endHour=6).
 */
export function isInTimeWindow(currentHour: number, startHour: number, endHour: number): boolean {
  if (startHour === endHour) return false; // zero-width window matches nothing
  if (startHour < endHour) {
    return currentHour >= startHour && currentHour < endHour;
  }
  // Wraps past midnight
  return currentHour >= startHour || currentHour < endHour;
}

function nextTopOfHour(now: Date): Date {
  return new Date(Math.floor(now.getTime() / HOUR_MS) * HOUR_MS + HOUR_MS);
}

/**
 * The first instant strictly after `now` at which the trigger fires, or
 * null when it never fires (an empty hourly window).
 */
export function nextRunAt(trigger: ScanTrigger, now: Date): Date | null {
  switch (trigger.type) {
    case 'interval':
      return new Date(now.getTime() + trigger.minutes * MINUTE_MS);

    case 'daily': {
      const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), trigger.hour);
      return new Date(today > now.getTime() ? today : today + 24 * HOUR_MS);
    }

    case 'hourly_window': {
      let candidate = nextTopOfHour(now);
      for (let i = 0; i < 24; i++) {
        if (isInTimeWindow(candidate.getUTCHours(), trigger.startHour, trigger.endHour)) {
          return candidate;
        }
        candidate = new Date(candidate.getTime() + HOUR_MS);
      }
      return null;
    }
  }
}

export function describeTrigger(trigger: ScanTrigger): string {
  switch (trigger.type) {
    case 'interval':
      return `every ${trigger.minutes} min`;
    case 'daily':
      return `daily at ${String(trigger.hour).padStart(2, '0')}:00 UTC`;
    case 'hourly_window':
      return `hourly from ${trigger.startHour}:00 to ${trigger.endHour}:00 UTC`;
  }
}
