/**
 * Ledger Store Module
 *
 * Abstract key-value persistence for records, inspection logs and role
 * assignments, with in-memory and PostgreSQL implementations.
 *
 * @module store
 */

export type { LedgerReader, LedgerTransaction, LedgerStore } from './types.js';
export { InMemoryLedgerStore } from './inMemoryLedgerStore.js';
export { PgLedgerStore, LEDGER_LOCK_KEY } from './pgLedgerStore.js';
