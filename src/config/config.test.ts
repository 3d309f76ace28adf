import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, loadDatabaseConfig } from './config.js';

const BASE = { LEDGER_ADMIN: '0xadmin' };

const DEFAULT_DATABASE = {
  host: 'localhost',
  port: 5432,
  name: 'supplytrace',
  user: 'postgres',
  password: '',
  poolSize: 10,
  statementTimeoutMs: 15_000,
  ssl: false,
};

describe('loadConfig', () => {
  it('should apply defaults when only the admin is set', () => {
    expect(loadConfig(BASE)).toEqual({
      port: 3000,
      adminIdentity: '0xadmin',
      store: 'memory',
      logLevel: 'info',
      rateLimit: { maxRequests: 60, windowSeconds: 60 },
      database: DEFAULT_DATABASE,
    });
  });

  it('should read every supported variable', () => {
    const config = loadConfig({
      LEDGER_ADMIN: '  0xadmin  ',
      LEDGER_STORE: 'postgres',
      LOG_LEVEL: 'debug',
      PORT: '8080',
      RATE_LIMIT_MAX: '10',
      RATE_LIMIT_WINDOW_SECONDS: '30',
      REDIS_URL: 'redis://localhost:6379',
      MIGRATIONS_DIR: '/srv/migrations',
      DATABASE_URL: 'postgres://ledger:test-secret@db:5432/ledger',
      DB_POOL_SIZE: '4',
      DB_STATEMENT_TIMEOUT_MS: '2000',
      DB_SSL: 'true',
    });

    expect(config).toEqual({
      port: 8080,
      adminIdentity: '0xadmin',
      store: 'postgres',
      logLevel: 'debug',
      redisUrl: 'redis://localhost:6379',
      rateLimit: { maxRequests: 10, windowSeconds: 30 },
      migrationsDir: '/srv/migrations',
      database: {
        ...DEFAULT_DATABASE,
        url: 'postgres://ledger:test-secret@db:5432/ledger',
        poolSize: 4,
        statementTimeoutMs: 2000,
        ssl: true,
      },
    });
  });

  it('should treat blank optional values as unset', () => {
    const config = loadConfig({ ...BASE, PORT: ' ', REDIS_URL: '' });
    expect(config.port).toBe(3000);
    expect(config).not.toHaveProperty('redisUrl');
  });

  it('should require the admin identity', () => {
    expect(() => loadConfig({ LEDGER_ADMIN: '   ' })).toThrow(
      'Invalid configuration: LEDGER_ADMIN is required',
    );
  });

  it('should report every problem at once', () => {
    let caught: unknown;
    try {
      loadConfig({ LEDGER_STORE: 'sqlite', LOG_LEVEL: 'loud', PORT: '-1', RATE_LIMIT_MAX: '2.5' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      problems: [
        'LEDGER_ADMIN is required',
        'LEDGER_STORE must be "memory" or "postgres" (got "sqlite")',
        'LOG_LEVEL must be one of debug, info, warn, error, fatal (got "loud")',
        'PORT must be a positive integer (got "-1")',
        'RATE_LIMIT_MAX must be a positive integer (got "2.5")',
      ],
    });
  });

  describe('loadDatabaseConfig', () => {
    it('should read the database section without requiring the admin', () => {
      expect(loadDatabaseConfig({ DB_HOST: 'db', DB_NAME: 'ledger' })).toEqual({
        ...DEFAULT_DATABASE,
        host: 'db',
        name: 'ledger',
      });
    });

    it('should reject a non-numeric pool size', () => {
      expect(() => loadDatabaseConfig({ DB_POOL_SIZE: 'many' })).toThrow(
        'Invalid configuration: DB_POOL_SIZE must be a positive integer (got "many")',
      );
    });
  });
});
