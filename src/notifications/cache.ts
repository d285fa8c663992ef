/**
 * Best-effort cache access.
 *
 * Every Redis command issued by the delivery path goes through
 * `SafeCache.call`, which refuses to send anything while the connection is
 * not ready, bounds each command with a timeout, and turns every failure
 * into a `{ ok: false }` result that the caller can branch on. Nothing here
 * throws.
 *
 * @module notifications/cache
 */

import type { Redis } from 'ioredis';

import type { Logger } from '../logging/logger.js';
import { createLogger, toError } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type CacheResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/** The subset of Redis commands the delivery path uses. */
export interface CacheConnection {
  readonly status: string;
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  rpush(key: string, value: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  lrem(key: string, count: number, value: string): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  expire(key: string, seconds: number): Promise<number>;
  /** Register a listener for the connection becoming ready (again). */
  onReady(listener: () => void): void;
}

export interface SafeCache {
  /** True when the connection reports 'ready'. */
  isReady(): boolean;
  call<T>(operation: string, command: (connection: CacheConnection) => Promise<T>): Promise<CacheResult<T>>;
  onReady(listener: () => void): void;
}

export interface SafeCacheOptions {
  connection: CacheConnection;
  /** Per-command timeout in milliseconds. Defaults to 250. */
  timeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_CACHE_TIMEOUT_MS = 250;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`Cache command timed out after ${ms}ms`)), ms);
    promise.then(
      (val) => {
        clearTimeout(timer);
        resolve(val);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/** Adapt an ioredis client to the narrow connection interface. */
export function fromIoredis(redis: Redis): CacheConnection {
  return {
    get status() {
      return redis.status;
    },
    get: (key) => redis.get(key),
    setex: (key, seconds, value) => redis.set(key, value, 'EX', seconds),
    del: (key) => redis.del(key),
    rpush: (key, value) => redis.rpush(key, value),
    lrange: (key, start, stop) => redis.lrange(key, start, stop),
    lrem: (key, count, value) => redis.lrem(key, count, value),
    ltrim: (key, start, stop) => redis.ltrim(key, start, stop),
    expire: (key, seconds) => redis.expire(key, seconds),
    onReady: (listener) => {
      redis.on('ready', listener);
    },
  };
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createSafeCache(options: SafeCacheOptions): SafeCache {
  const { connection } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_CACHE_TIMEOUT_MS;
  const logger = options.logger ?? createLogger().child({ component: 'cache' });

  return {
    isReady() {
      return connection.status === 'ready';
    },

    async call<T>(
      operation: string,
      command: (conn: CacheConnection) => Promise<T>,
    ): Promise<CacheResult<T>> {
      if (connection.status !== 'ready') {
        const reason = `connection ${connection.status}`;
        logger.debug('Cache unavailable, skipping command', { operation, reason });
        return { ok: false, reason };
      }
      try {
        const value = await withTimeout(command(connection), timeoutMs);
        return { ok: true, value };
      } catch (error) {
        const err = toError(error);
        logger.warn('Cache command failed', { operation, reason: err.message });
        return { ok: false, reason: err.message };
      }
    },

    onReady(listener) {
      connection.onReady(listener);
    },
  };
}
