/**
 * Unit tests for the Redis configuration helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { getRedisConfig, toRedisOptions } from './redis.js';

describe('redis', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getRedisConfig', () => {
    it('should return defaults when no env vars are set', () => {
      delete process.env['REDIS_HOST'];
      delete process.env['REDIS_PORT'];
      delete process.env['REDIS_DB'];
      delete process.env['REDIS_PASSWORD'];

      expect(getRedisConfig()).toEqual({ host: 'localhost', port: 6379, db: 0 });
    });

    it('should read values from environment variables', () => {
      process.env['REDIS_HOST'] = 'cache.pharmacy.local';
      process.env['REDIS_PORT'] = '6380';
      process.env['REDIS_DB'] = '2';
      process.env['REDIS_PASSWORD'] = 'test-secret';

      expect(getRedisConfig()).toEqual({
        host: 'cache.pharmacy.local',
        port: 6380,
        db: 2,
        password: 'test-secret',
      });
    });
  });

  describe('toRedisOptions', () => {
    it('should fail fast instead of queueing commands', () => {
      const options = toRedisOptions({ host: 'localhost', port: 6379, db: 0 });

      expect(options).toMatchObject({
        lazyConnect: true,
        enableOfflineQueue: false,
        maxRetriesPerRequest: 1,
      });
    });

    it('should back off reconnects up to ten seconds', () => {
      const { retryStrategy } = toRedisOptions({ host: 'localhost', port: 6379, db: 0 });

      expect(retryStrategy!(1)).toBe(500);
      expect(retryStrategy!(100)).toBe(10000);
    });
  });
});
