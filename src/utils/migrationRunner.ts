/**
 * Migration runner for numbered SQL migration files.
 *
 * Applies the `.sql` files of the migrations directory in lexicographic
 * order, each in its own transaction, and records applied filenames in a
 * `schema_migrations` table so a file is never applied twice.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';
import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';
import { getPool } from './db.js';

/** Default migrations directory: `migrations/` beside `utils/`. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'migrations',
);

export interface MigrationOptions {
  migrationsDir?: string;
  pool?: pg.Pool;
  logger?: Logger;
}

async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(client: pg.PoolClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY filename',
  );
  return new Set(result.rows.map((row) => row.filename));
}

/**
 * Sorted `.sql` filenames in the directory; empty when it does not exist.
 */
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
 * Run all pending migrations in order. A failing migration is rolled back
 * and stops the run.
 *
 * @returns filenames applied in this run.
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const migrationsDir = options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const logger = options.logger ?? createSilentLogger();
  const pool = options.pool ?? getPool();
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await ensureMigrationsTable(client);
    const alreadyApplied = await getAppliedMigrations(client);

    for (const file of getMigrationFiles(migrationsDir)) {
      if (alreadyApplied.has(file)) continue;

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        applied.push(file);
        logger.info('Applied migration', { file });
      } catch (err) {
        await client.query('ROLLBACK');
        throw new Error(
          `Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  } finally {
    client.release();
  }

  return applied;
}
