/**
 * Migration runner for the numbered SQL files in `src/migrations`.
 *
 * Applied filenames are tracked in `schema_migrations`. Each pending file
 * runs in its own transaction together with its tracking row; the first
 * failure stops the run.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';

import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { getPool, withTransaction } from './db.js';

/** Migrations directory beside the compiled or source tree. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'migrations',
);

const TRACKING_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    filename VARCHAR(255) UNIQUE NOT NULL,
    applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
  );
`;

export interface MigrationOptions {
  migrationsDir?: string;
  pool?: pg.Pool;
  logger?: Logger;
}

/** `.sql` files in the directory, sorted by name; empty when it does not exist. */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Apply every pending migration in order.
 *
 * @returns Filenames applied in this run.
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const migrationsDir = options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const pool = options.pool ?? getPool();
  const logger = options.logger ?? createLogger().child({ component: 'migrations' });

  await pool.query(TRACKING_TABLE_SQL);
  const existing = await pool.query<{ filename: string }>('SELECT filename FROM schema_migrations');
  const alreadyApplied = new Set(existing.rows.map((row) => row.filename));

  const applied: string[] = [];
  for (const file of getMigrationFiles(migrationsDir)) {
    if (alreadyApplied.has(file)) continue;

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    try {
      await withTransaction(async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
      }, pool);
    } catch (err) {
      throw new Error(`Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    applied.push(file);
    logger.info('Migration applied', { file });
  }

  return applied;
}
