/**
 * Alerting configuration, read from environment variables.
 *
 * Every value has a default. A value that is present but malformed fails
 * the whole load with CONFIG_INVALID, naming each offending variable.
 *
 * @module config/alertingConfig
 */

import { ALERT_ERROR_CODES, AlertEngineError } from '../types/index.js';
import type { LogLevel } from '../logging/logger.js';
import { parseLogLevel } from '../logging/logger.js';

export interface AlertingConfig {
  stockIntervalMinutes: number;
  /** UTC hour of the daily expiry scan. */
  expirationHour: number;
  expirationDays: number;
  /** UTC hours bounding the order-delay scans: [start, end). */
  orderWindowStart: number;
  orderWindowEnd: number;
  cacheTtlSeconds: number;
  queueLimit: number;
  cacheTimeoutMs: number;
  consoleLog: boolean;
  scanOnStart: boolean;
  port: number;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

interface IntRule {
  key: string;
  fallback: number;
  min: number;
  max: number;
}

function readInt(env: Env, rule: IntRule, problems: string[]): number {
  const raw = env[rule.key];
  if (raw === undefined || raw.trim() === '') return rule.fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < rule.min || value > rule.max) {
    problems.push(`${rule.key} must be an integer between ${rule.min} and ${rule.max} (got "${raw}")`);
    return rule.fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean, problems: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  problems.push(`${key} must be true or false (got "${env[key]}")`);
  return fallback;
}

export function loadAlertingConfig(env: Env = process.env): AlertingConfig {
  const problems: string[] = [];

  const config: AlertingConfig = {
    stockIntervalMinutes: readInt(env, { key: 'ALERT_STOCK_INTERVAL_MINUTES', fallback: 15, min: 1, max: 1440 }, problems),
    expirationHour: readInt(env, { key: 'ALERT_EXPIRATION_HOUR', fallback: 8, min: 0, max: 23 }, problems),
    expirationDays: readInt(env, { key: 'ALERT_EXPIRATION_DAYS', fallback: 30, min: 1, max: 365 }, problems),
    orderWindowStart: readInt(env, { key: 'ALERT_ORDER_WINDOW_START', fallback: 8, min: 0, max: 23 }, problems),
    orderWindowEnd: readInt(env, { key: 'ALERT_ORDER_WINDOW_END', fallback: 19, min: 0, max: 23 }, problems),
    cacheTtlSeconds: readInt(env, { key: 'ALERT_CACHE_TTL_SECONDS', fallback: 3600, min: 1, max: 604800 }, problems),
    queueLimit: readInt(env, { key: 'ALERT_QUEUE_LIMIT', fallback: 100, min: 1, max: 10000 }, problems),
    cacheTimeoutMs: readInt(env, { key: 'ALERT_CACHE_TIMEOUT_MS', fallback: 250, min: 1, max: 60000 }, problems),
    consoleLog: readBool(env, 'ALERT_CONSOLE_LOG', false, problems),
    scanOnStart: readBool(env, 'ALERT_SCAN_ON_START', true, problems),
    port: readInt(env, { key: 'PORT', fallback: 3000, min: 1, max: 65535 }, problems),
    logLevel: parseLogLevel(env['LOG_LEVEL']),
  };

  if (config.orderWindowStart === config.orderWindowEnd) {
    problems.push('ALERT_ORDER_WINDOW_START and ALERT_ORDER_WINDOW_END must differ');
  }

  if (problems.length > 0) {
    throw new AlertEngineError(ALERT_ERROR_CODES.CONFIG_INVALID, `Invalid configuration: ${problems.join('; ')}`);
  }
  return config;
}
