/**
 * Scan jobs.
 *
 * Each scan lists the subjects that may hold a condition, adds the subjects
 * that still hold an open alert of the family (so alerts converge when a
 * subject leaves the listing), and evaluates them one by one. A failing
 * subject is counted and logged; it never aborts the rest of the run.
 *
 * @module scanning/scanner
 */

import type { AlertFamily, MonitoredSubject } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger, toError } from '../logging/logger.js';
import type { AlertStore } from '../alerting/alertStore.js';
import { DEFAULT_ANTICIPATION_DAYS } from '../alerting/classifier.js';
import type { FamilyOutcome, LifecycleManager } from '../alerting/lifecycleManager.js';
import type { SubjectSource } from '../repositories/subjectSource.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ScanStats {
  scanned: number;
  created: number;
  escalated: number;
  resolved: number;
  unchanged: number;
  failed: number;
}

export interface Scanner {
  scanStock(): Promise<ScanStats>;
  scanExpiry(anticipationDays?: number): Promise<ScanStats>;
  scanOrderDelays(): Promise<ScanStats>;
  /** Evaluate every family of one medication; null when it does not exist. */
  recheckMedication(id: string): Promise<FamilyOutcome[] | null>;
  /** Evaluate one purchase order; null when it does not exist. */
  recheckOrder(id: string): Promise<FamilyOutcome[] | null>;
}

export interface ScannerOptions {
  source: SubjectSource;
  store: AlertStore;
  lifecycle: LifecycleManager;
  logger?: Logger;
  now?: () => Date;
  anticipationDays?: number;
}

export function emptyScanStats(): ScanStats {
  return { scanned: 0, created: 0, escalated: 0, resolved: 0, unchanged: 0, failed: 0 };
}

function tally(stats: ScanStats, outcome: FamilyOutcome): void {
  switch (outcome.transition) {
    case 'none':
      stats.unchanged += 1;
      break;
    case 'created':
    case 'escalated':
    case 'resolved':
    case 'failed':
      stats[outcome.transition] += 1;
      break;
  }
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createScanner(options: ScannerOptions): Scanner {
  const { source, store, lifecycle } = options;
  const logger = options.logger ?? createLogger().child({ component: 'scanner' });
  const now = options.now ?? (() => new Date());
  const defaultWindow = options.anticipationDays ?? DEFAULT_ANTICIPATION_DAYS;

  /**
   * Evaluate `listed` plus every subject with an open alert of `family`.
   * `load` fetches a subject that is not in the listing.
   */
  async function run<S extends MonitoredSubject>(
    job: string,
    family: AlertFamily,
    listed: readonly S[],
    load: (id: string) => Promise<S | null>,
    anticipationDays?: number,
  ): Promise<ScanStats> {
    const stats = emptyScanStats();
    const startedAt = Date.now();
    const seen = new Set(listed.map((subject) => subject.id));
    const extra = (await store.findOpenSubjectKeys(family)).filter((key) => !seen.has(key));

    const evaluate = async (subject: S) => {
      const outcomes = await lifecycle.evaluate(subject, { families: [family], anticipationDays });
      for (const outcome of outcomes) tally(stats, outcome);
    };

    for (const subject of listed) {
      stats.scanned += 1;
      await evaluate(subject);
    }

    for (const key of extra) {
      stats.scanned += 1;
      try {
        const subject = await load(key);
        if (subject) {
          await evaluate(subject);
        } else {
          logger.warn('Subject with open alert no longer exists', { job, subjectId: key });
          tally(stats, await lifecycle.retire(key, family));
        }
      } catch (error) {
        stats.failed += 1;
        logger.error('Scan item failed', toError(error), { job, subjectId: key });
      }
    }

    logger.info('Scan finished', { job, ...stats, durationMs: Date.now() - startedAt });
    return stats;
  }

  return {
    async scanStock() {
      const listed = await source.listStockMonitored();
      return run('stock', 'stock', listed, (id) => source.getMedication(id));
    },

    async scanExpiry(anticipationDays = defaultWindow) {
      const listed = await source.listExpiringWithin(anticipationDays, now());
      return run('expiry', 'expiry', listed, (id) => source.getMedication(id), anticipationDays);
    },

    async scanOrderDelays() {
      const listed = await source.listOverdueOrders(now());
      return run('order_delay', 'order_delay', listed, (id) => source.getPurchaseOrder(id));
    },

    async recheckMedication(id) {
      const medication = await source.getMedication(id);
      return medication ? lifecycle.evaluate(medication) : null;
    },

    async recheckOrder(id) {
      const order = await source.getPurchaseOrder(id);
      return order ? lifecycle.evaluate(order) : null;
    },
  };
}
