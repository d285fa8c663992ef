/**
 * Alert Subscribers
 *
 * The listeners attached to the event bus by the engine:
 *
 * - cache: mirrors transitions into the role queues
 * - audit: one structured log entry per transition
 * - console: a human-readable line for operators tailing the process
 *
 * @module notifications/subscribers
 */

import type { Logger } from '../logging/logger.js';
import type { DeliveryPath } from './delivery.js';
import type { AlertEvent, AlertSubscriber } from './eventBus.js';

export function createCacheSubscriber(delivery: DeliveryPath): AlertSubscriber {
  return {
    name: 'cache',
    onAlertEvent: (event) => delivery.deliver(event),
  };
}

export function createAuditSubscriber(logger: Logger): AlertSubscriber {
  return {
    name: 'audit',
    onAlertEvent(event) {
      const { alert } = event;
      logger.info('Alert transition', {
        transition: event.transition,
        alertId: alert.id,
        kind: alert.kind,
        severity: alert.severity,
        state: alert.state,
        medicationId: alert.medicationId,
        orderId: alert.orderId,
        actor: event.actor,
        at: event.timestamp.toISOString(),
      });
    },
  };
}

/** One-line summary, e.g. "[ALERT] CREATED high stock_critical: Critical stock: ...". */
export function formatConsoleLine(event: AlertEvent): string {
  const { alert } = event;
  const by = event.actor === 'system' ? '' : ` (by ${event.actor})`;
  return `[ALERT] ${event.transition.toUpperCase()} ${alert.severity} ${alert.kind}: ${alert.message}${by}`;
}

export function createConsoleSubscriber(
  write: (line: string) => void = (line) => console.log(line),
): AlertSubscriber {
  return {
    name: 'console',
    onAlertEvent(event) {
      write(formatConsoleLine(event));
    },
  };
}
