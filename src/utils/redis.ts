/**
 * Redis client factory.
 *
 * Clients do not queue commands while disconnected and retry each request
 * once.
 *
 * @module utils/redis
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';

export interface RedisConfig {
  host: string;
  port: number;
  db: number;
  password?: string;
}

/**
 * Build Redis configuration from environment variables with sensible defaults.
 */
export function getRedisConfig(): RedisConfig {
  const password = process.env['REDIS_PASSWORD'];
  return {
    host: process.env['REDIS_HOST'] ?? 'localhost',
    port: parseInt(process.env['REDIS_PORT'] ?? '6379', 10),
    db: parseInt(process.env['REDIS_DB'] ?? '0', 10),
    ...(password ? { password } : {}),
  };
}

export function toRedisOptions(config: RedisConfig): RedisOptions {
  return {
    host: config.host,
    port: config.port,
    db: config.db,
    password: config.password,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 500, 10000),
  };
}

/** Create a client; call `connect()` to open the connection. */
export function createRedisClient(config?: Partial<RedisConfig>): Redis {
  return new Redis(toRedisOptions({ ...getRedisConfig(), ...config }));
}
