/**
 * Service entry point.
 *
 * Loads configuration, prepares the selected store (running migrations for
 * PostgreSQL), bootstraps the deployer's ADMIN role, and serves the HTTP
 * API until SIGINT or SIGTERM.
 *
 * @module server
 */

import type { Server } from 'node:http';
import { Redis } from 'ioredis';

import { createApp } from './app.js';
import type { AppConfig } from './config/index.js';
import { loadConfig } from './config/index.js';
import type { Logger } from './logging/index.js';
import { createLogger } from './logging/index.js';
import type { LedgerStore } from './store/index.js';
import { InMemoryLedgerStore, PgLedgerStore } from './store/index.js';
import { createSupplyTrace } from './supplyTrace.js';
import { createLedgerPool } from './utils/db.js';
import { runMigrations } from './utils/migrationRunner.js';

async function openStore(config: AppConfig, logger: Logger): Promise<LedgerStore> {
  if (config.store === 'memory') {
    return new InMemoryLedgerStore();
  }
  const pool = createLedgerPool(config.database, logger.child({ operation: 'pg-pool' }));
  await runMigrations({ pool, migrationsDir: config.migrationsDir, logger });
  return new PgLedgerStore(pool);
}

export async function startServer(config: AppConfig = loadConfig()): Promise<Server> {
  const logger = createLogger({ level: config.logLevel });
  const store = await openStore(config, logger);
  const trace = createSupplyTrace({ store, logger });

  const deployer = await trace.roles.bootstrap(config.adminIdentity);
  if (deployer !== config.adminIdentity) {
    logger.warn('Store already bootstrapped by a different admin', {
      deployer,
      configured: config.adminIdentity,
    });
  }

  const redis = config.redisUrl ? new Redis(config.redisUrl) : undefined;
  const app = createApp({
    ledger: trace.ledger,
    roles: trace.roles,
    journal: trace.journal,
    logger,
    redis,
    rateLimit: config.rateLimit,
  });

  const server = app.listen(config.port, () => {
    logger.info('Ledger service listening', { port: config.port, store: config.store });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      Promise.all([trace.context.settled(), redis?.quit()])
        .then(() => store.close())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.fatal('Shutdown failed', err instanceof Error ? err : new Error(String(err)));
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
