/**
 * PostgreSQL implementation of {@link LedgerStore}.
 *
 * Each transaction runs on a dedicated pooled client between BEGIN and
 * COMMIT, and first takes a transaction-scoped advisory lock so that every
 * mutation across all processes sharing the database is applied in a single
 * total order. Handles snake_case ↔ camelCase mapping between the schema in
 * `migrations/` and the domain types.
 *
 * @module store/pgLedgerStore
 */

import type pg from 'pg';
import { getPool } from '../utils/db.js';
import type { Identity, InspectionEntry, ProductRecord, Role } from '../types/index.js';
import { ALL_ROLES, isRole } from '../types/index.js';
import type { LedgerReader, LedgerStore, LedgerTransaction } from './types.js';

/** Key passed to pg_advisory_xact_lock; shared by every ledger writer. */
export const LEDGER_LOCK_KEY = 727_001;

const PRODUCT_COUNTER_KEY = 'product_counter';
const DEPLOYER_KEY = 'deployer';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface ProductRow {
  /** BIGINT; node-postgres returns int8 as a string. */
  id: string | number;
  name: string;
  origin_location: string;
  batch_number: string;
  manufacturer: string;
  created_at: Date;
  expiration_date: Date;
  completed: boolean;
}

interface InspectionRow {
  inspector: string;
  checked_at: Date;
  checkpoint_name: string;
  passed: boolean;
  notes: string;
}

interface MetaRow {
  value: string;
}

function mapRowToRecord(row: ProductRow): ProductRecord {
  return {
    id: Number(row.id),
    name: row.name,
    originLocation: row.origin_location,
    batchNumber: row.batch_number,
    manufacturer: row.manufacturer,
    createdAt: row.created_at,
    expirationDate: row.expiration_date,
    completed: row.completed,
  };
}

function mapRowToEntry(row: InspectionRow): InspectionEntry {
  return {
    inspector: row.inspector,
    timestamp: row.checked_at,
    checkpointName: row.checkpoint_name,
    passed: row.passed,
    notes: row.notes,
  };
}

// ─── Query Plumbing ──────────────────────────────────────────────────────────

type QueryFn = <R extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<pg.QueryResult<R>>;

class PgReader implements LedgerReader {
  constructor(protected readonly run: QueryFn) {}

  async getRecord(id: number): Promise<ProductRecord | null> {
    const result = await this.run<ProductRow>(
      `SELECT id, name, origin_location, batch_number, manufacturer, created_at, expiration_date, completed
       FROM products
       WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapRowToRecord(row) : null;
  }

  async getChecks(id: number): Promise<InspectionEntry[]> {
    const result = await this.run<InspectionRow>(
      `SELECT inspector, checked_at, checkpoint_name, passed, notes
       FROM inspections
       WHERE product_id = $1
       ORDER BY seq ASC`,
      [id],
    );
    return result.rows.map(mapRowToEntry);
  }

  async hasRole(identity: Identity, role: Role): Promise<boolean> {
    const result = await this.run(
      'SELECT 1 FROM role_assignments WHERE identity = $1 AND role = $2',
      [identity, role],
    );
    return result.rows.length > 0;
  }

  async listRoles(identity: Identity): Promise<Role[]> {
    const result = await this.run<{ role: string }>(
      'SELECT role FROM role_assignments WHERE identity = $1',
      [identity],
    );
    const held = new Set(result.rows.map((row) => row.role).filter(isRole));
    return ALL_ROLES.filter((role) => held.has(role));
  }

  async getProductCount(): Promise<number> {
    const value = await this.readMeta(PRODUCT_COUNTER_KEY);
    return value === null ? 0 : parseInt(value, 10);
  }

  async getDeployer(): Promise<Identity | null> {
    return this.readMeta(DEPLOYER_KEY);
  }

  private async readMeta(key: string): Promise<string | null> {
    const result = await this.run<MetaRow>('SELECT value FROM ledger_meta WHERE key = $1', [key]);
    return result.rows[0]?.value ?? null;
  }
}

class PgTransaction extends PgReader implements LedgerTransaction {
  async nextProductId(): Promise<number> {
    const result = await this.run<MetaRow>(
      `INSERT INTO ledger_meta (key, value) VALUES ($1, '1')
       ON CONFLICT (key) DO UPDATE SET value = (ledger_meta.value::bigint + 1)::text
       RETURNING value`,
      [PRODUCT_COUNTER_KEY],
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Product counter update returned no row');
    }
    return parseInt(row.value, 10);
  }

  async putRecord(record: ProductRecord): Promise<void> {
    await this.run(
      `INSERT INTO products (id, name, origin_location, batch_number, manufacturer, created_at, expiration_date, completed)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET
         name = EXCLUDED.name,
         origin_location = EXCLUDED.origin_location,
         batch_number = EXCLUDED.batch_number,
         manufacturer = EXCLUDED.manufacturer,
         created_at = EXCLUDED.created_at,
         expiration_date = EXCLUDED.expiration_date,
         completed = EXCLUDED.completed`,
      [
        record.id,
        record.name,
        record.originLocation,
        record.batchNumber,
        record.manufacturer,
        record.createdAt.toISOString(),
        record.expirationDate.toISOString(),
        record.completed,
      ],
    );
  }

  async appendCheck(id: number, entry: InspectionEntry): Promise<void> {
    await this.run(
      `INSERT INTO inspections (product_id, seq, inspector, checked_at, checkpoint_name, passed, notes)
       VALUES ($1, (SELECT COALESCE(MAX(seq), 0) + 1 FROM inspections WHERE product_id = $1), $2, $3, $4, $5, $6)`,
      [
        id,
        entry.inspector,
        entry.timestamp.toISOString(),
        entry.checkpointName,
        entry.passed,
        entry.notes,
      ],
    );
  }

  async setRole(identity: Identity, role: Role, granted: boolean): Promise<void> {
    if (granted) {
      await this.run(
        `INSERT INTO role_assignments (identity, role) VALUES ($1, $2)
         ON CONFLICT (identity, role) DO NOTHING`,
        [identity, role],
      );
    } else {
      await this.run('DELETE FROM role_assignments WHERE identity = $1 AND role = $2', [
        identity,
        role,
      ]);
    }
  }

  async setDeployer(identity: Identity): Promise<void> {
    await this.run(
      `INSERT INTO ledger_meta (key, value) VALUES ($1, $2)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
      [DEPLOYER_KEY, identity],
    );
  }
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class PgLedgerStore extends PgReader implements LedgerStore {
  constructor(private readonly pool: pg.Pool = getPool()) {
    super((text, params) => pool.query(text, params));
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [LEDGER_LOCK_KEY]);
      try {
        const result = await work(new PgTransaction((text, params) => client.query(text, params)));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
