/**
 * Alert Event Bus
 *
 * Publish/subscribe fan-out for alert transitions. Subscribers run one
 * after another in registration order; a subscriber that throws or rejects
 * is logged and skipped, and the remaining subscribers still receive the
 * event.
 *
 * @module notifications/eventBus
 */

import type { Alert, AlertTransition, SubjectDisplay } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger, toError } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface AlertEvent {
  transition: AlertTransition;
  alert: Alert;
  display: SubjectDisplay;
  /** Who caused the transition ('system' for scans). */
  actor: string;
  timestamp: Date;
}

export interface AlertSubscriber {
  /** Used in logs when the subscriber fails. */
  readonly name: string;
  onAlertEvent(event: AlertEvent): void | Promise<void>;
}

export interface NotifyReport {
  delivered: number;
  failed: string[];
}

export interface AlertEventBus {
  /** Register a subscriber. Attaching the same subscriber twice is a no-op. */
  attach(subscriber: AlertSubscriber): void;
  /** Remove a subscriber. Detaching an unknown subscriber is a no-op. */
  detach(subscriber: AlertSubscriber): void;
  notify(event: AlertEvent): Promise<NotifyReport>;
  subscribers(): readonly AlertSubscriber[];
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createAlertEventBus(options: { logger?: Logger } = {}): AlertEventBus {
  const logger = options.logger ?? createLogger().child({ component: 'event-bus' });
  const registered: AlertSubscriber[] = [];

  return {
    attach(subscriber) {
      if (!registered.includes(subscriber)) registered.push(subscriber);
    },

    detach(subscriber) {
      const index = registered.indexOf(subscriber);
      if (index !== -1) registered.splice(index, 1);
    },

    async notify(event) {
      const report: NotifyReport = { delivered: 0, failed: [] };
      // Snapshot so a subscriber detaching itself does not skip its neighbour.
      for (const subscriber of [...registered]) {
        try {
          await subscriber.onAlertEvent(event);
          report.delivered += 1;
        } catch (error) {
          report.failed.push(subscriber.name);
          logger.error('Alert subscriber failed', toError(error), {
            subscriber: subscriber.name,
            alertId: event.alert.id,
            transition: event.transition,
          });
        }
      }
      return report;
    },

    subscribers() {
      return [...registered];
    },
  };
}
