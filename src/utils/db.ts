/**
 * Ledger connection pool.
 *
 * Turns the database section of the service configuration into `pg` pool
 * options. Connections carry the service name as `application_name`, and
 * every statement is bounded by `statement_timeout`, including the wait on
 * the ledger's advisory lock.
 *
 * @module utils/db
 */

import pg from 'pg';
import type { DatabaseConfig } from '../config/index.js';
import { loadDatabaseConfig } from '../config/index.js';
import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';

const { Pool } = pg;

export const APPLICATION_NAME = 'supplytrace';

export function toPoolConfig(config: DatabaseConfig): pg.PoolConfig {
  const connection: pg.PoolConfig = config.url
    ? { connectionString: config.url }
    : {
        host: config.host,
        port: config.port,
        database: config.name,
        user: config.user,
        password: config.password,
      };
  return {
    ...connection,
    max: config.poolSize,
    application_name: APPLICATION_NAME,
    statement_timeout: config.statementTimeoutMs,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  };
}

/**
 * Open a pool for the ledger store. Errors raised by idle clients are
 * logged; the pool drops the failed client and keeps serving.
 */
export function createLedgerPool(
  config: DatabaseConfig,
  logger: Logger = createSilentLogger(),
): pg.Pool {
  const pool = new Pool(toPoolConfig(config));
  pool.on('error', (err) => {
    logger.error('Idle ledger connection failed', err);
  });
  return pool;
}

let shared: pg.Pool | null = null;

/** Process-wide pool built from the environment on first use. */
export function getPool(): pg.Pool {
  if (!shared) {
    shared = createLedgerPool(loadDatabaseConfig());
  }
  return shared;
}
