/**
 * Service configuration loaded from environment variables.
 *
 * Every setting has a default except the deployer identity. Invalid values
 * are collected and reported together in a single {@link ConfigError}.
 *
 * @module config
 */

import type { LogLevel } from '../logging/index.js';
import { isLogLevel } from '../logging/index.js';

export type StoreBackend = 'memory' | 'postgres';

export interface RateLimitConfig {
  maxRequests: number;
  windowSeconds: number;
}

/** PostgreSQL settings; used only when `store` is `postgres`. */
export interface DatabaseConfig {
  /** Takes precedence over host, port, name, user and password. */
  url?: string;
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  poolSize: number;
  /** Upper bound for one statement, advisory lock waits included. */
  statementTimeoutMs: number;
  ssl: boolean;
}

export interface AppConfig {
  port: number;
  /** Identity seeded with ADMIN when the store is first bootstrapped. */
  adminIdentity: string;
  store: StoreBackend;
  logLevel: LogLevel;
  /** When unset, rate limiting is disabled. */
  redisUrl?: string;
  rateLimit: RateLimitConfig;
  migrationsDir?: string;
  database: DatabaseConfig;
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, problems: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    problems.push(`${key} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readDatabase(env: Env, problems: string[]): DatabaseConfig {
  const database: DatabaseConfig = {
    host: env['DB_HOST']?.trim() || 'localhost',
    port: readInteger(env, 'DB_PORT', 5432, problems),
    name: env['DB_NAME']?.trim() || 'supplytrace',
    user: env['DB_USER']?.trim() || 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    poolSize: readInteger(env, 'DB_POOL_SIZE', 10, problems),
    statementTimeoutMs: readInteger(env, 'DB_STATEMENT_TIMEOUT_MS', 15_000, problems),
    ssl: env['DB_SSL'] === 'true',
  };
  const url = env['DATABASE_URL']?.trim();
  if (url) database.url = url;
  return database;
}

/** Database section alone, for tools that open the ledger store directly. */
export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const problems: string[] = [];
  const database = readDatabase(env, problems);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return database;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const adminIdentity = env['LEDGER_ADMIN']?.trim() ?? '';
  if (adminIdentity === '') {
    problems.push('LEDGER_ADMIN is required');
  }

  const storeRaw = env['LEDGER_STORE'] ?? 'memory';
  let store: StoreBackend = 'memory';
  if (storeRaw === 'memory' || storeRaw === 'postgres') {
    store = storeRaw;
  } else {
    problems.push(`LEDGER_STORE must be "memory" or "postgres" (got "${storeRaw}")`);
  }

  const levelRaw = env['LOG_LEVEL'] ?? 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(levelRaw)) {
    logLevel = levelRaw;
  } else {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error, fatal (got "${levelRaw}")`);
  }

  const config: AppConfig = {
    port: readInteger(env, 'PORT', 3000, problems),
    adminIdentity,
    store,
    logLevel,
    rateLimit: {
      maxRequests: readInteger(env, 'RATE_LIMIT_MAX', 60, problems),
      windowSeconds: readInteger(env, 'RATE_LIMIT_WINDOW_SECONDS', 60, problems),
    },
    database: readDatabase(env, problems),
  };

  const redisUrl = env['REDIS_URL']?.trim();
  if (redisUrl) config.redisUrl = redisUrl;
  const migrationsDir = env['MIGRATIONS_DIR']?.trim();
  if (migrationsDir) config.migrationsDir = migrationsDir;

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}
