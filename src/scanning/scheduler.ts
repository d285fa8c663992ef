/**
 * Scan Scheduler
 *
 * Runs each scan job on its trigger using chained, unref'd timeouts, so a
 * pending scan never keeps the process alive. A job that is still running
 * when its next tick arrives is skipped for that tick. Job errors are
 * logged and recorded on the job status; the next tick retries.
 *
 * @module scanning/scheduler
 */

import type { Logger } from '../logging/logger.js';
import { createLogger, toError } from '../logging/logger.js';
import type { ScanStats } from './scanner.js';
import type { ScanTrigger } from './triggers.js';
import { describeTrigger, isInTimeWindow, nextRunAt } from './triggers.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ScheduledJob {
  name: string;
  trigger: ScanTrigger;
  run: () => Promise<ScanStats>;
}

export interface JobStatus {
  name: string;
  trigger: ScanTrigger;
  schedule: string;
  nextRunAt: string | null;
  lastRunAt: string | null;
  lastStats: ScanStats | null;
  lastError: string | null;
  running: boolean;
}

export interface SchedulerStatus {
  running: boolean;
  jobs: JobStatus[];
}

export interface Scheduler {
  start(): void;
  stop(): void;
  /** Run one job outside its schedule. False when unknown or already running. */
  runNow(name: string): Promise<boolean>;
  getStatus(): SchedulerStatus;
}

export interface SchedulerOptions {
  jobs: readonly ScheduledJob[];
  /**
   * Run every job once as soon as the scheduler starts. Window jobs only run
   * when the start falls inside their hours.
   */
  runOnStart?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface JobState {
  job: ScheduledJob;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
  lastStats: ScanStats | null;
  lastError: string | null;
  running: boolean;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createScheduler(options: SchedulerOptions): Scheduler {
  const logger = options.logger ?? createLogger().child({ component: 'scheduler' });
  const now = options.now ?? (() => new Date());
  const states = options.jobs.map(
    (job): JobState => ({
      job,
      timer: null,
      nextRunAt: null,
      lastRunAt: null,
      lastStats: null,
      lastError: null,
      running: false,
    }),
  );
  let started = false;

  async function execute(state: JobState): Promise<boolean> {
    if (state.running) {
      logger.warn('Scan skipped, previous run still in progress', { job: state.job.name });
      return false;
    }
    state.running = true;
    state.lastRunAt = now();
    try {
      state.lastStats = await state.job.run();
      state.lastError = null;
    } catch (error) {
      const err = toError(error);
      state.lastError = err.message;
      logger.error('Scheduled scan failed', err, { job: state.job.name });
    } finally {
      state.running = false;
    }
    return true;
  }

  function dueOnStart(trigger: ScanTrigger, at: Date): boolean {
    if (trigger.type !== 'hourly_window') return true;
    return isInTimeWindow(at.getUTCHours(), trigger.startHour, trigger.endHour);
  }

  function schedule(state: JobState): void {
    if (!started) return;
    const current = now();
    const next = nextRunAt(state.job.trigger, current);
    state.nextRunAt = next;
    if (!next) {
      logger.warn('Scan job has no upcoming run', { job: state.job.name });
      return;
    }

    state.timer = setTimeout(() => {
      state.timer = null;
      void execute(state).then(() => schedule(state));
    }, Math.max(0, next.getTime() - current.getTime()));
    state.timer.unref();
  }

  return {
    start() {
      if (started) return;
      started = true;
      const startedAt = now();
      for (const state of states) {
        schedule(state);
        if (options.runOnStart && dueOnStart(state.job.trigger, startedAt)) void execute(state);
      }
      logger.info('Scan scheduler started', {
        jobs: states.map((s) => `${s.job.name} (${describeTrigger(s.job.trigger)})`),
      });
    },

    stop() {
      if (!started) return;
      started = false;
      for (const state of states) {
        if (state.timer) clearTimeout(state.timer);
        state.timer = null;
        state.nextRunAt = null;
      }
      logger.info('Scan scheduler stopped');
    },

    async runNow(name) {
      const state = states.find((s) => s.job.name === name);
      return state ? execute(state) : false;
    },

    getStatus() {
      return {
        running: started,
        jobs: states.map((s) => ({
          name: s.job.name,
          trigger: s.job.trigger,
          schedule: describeTrigger(s.job.trigger),
          nextRunAt: s.nextRunAt?.toISOString() ?? null,
          lastRunAt: s.lastRunAt?.toISOString() ?? null,
          lastStats: s.lastStats,
          lastError: s.lastError,
          running: s.running,
        })),
      };
    },
  };
}
