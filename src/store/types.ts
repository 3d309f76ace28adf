/**
 * Type definitions for the ledger store abstraction.
 *
 * The store persists three mappings (product id → record, product id →
 * inspection sequence, identity × role → granted) plus the id counter and
 * the deployer marker. Durability is the store's concern; ordering of
 * mutations is guaranteed by the caller through {@link LedgerStore.transaction}.
 */

import type { Identity, InspectionEntry, ProductRecord, Role } from '../types/index.js';

/** Read surface shared by the store and its transactions. */
export interface LedgerReader {
  /** Stored record, or null when the id was never written. */
  getRecord(id: number): Promise<ProductRecord | null>;
  getChecks(id: number): Promise<InspectionEntry[]>;
  hasRole(identity: Identity, role: Role): Promise<boolean>;
  listRoles(identity: Identity): Promise<Role[]>;
  /** Last product id issued, 0 before the first registration. */
  getProductCount(): Promise<number>;
  /** Identity seeded with ADMIN when the store was first bootstrapped. */
  getDeployer(): Promise<Identity | null>;
}

/** Write surface available inside a transaction. */
export interface LedgerTransaction extends LedgerReader {
  /** Increment the id counter and return the new value. */
  nextProductId(): Promise<number>;
  putRecord(record: ProductRecord): Promise<void>;
  appendCheck(id: number, entry: InspectionEntry): Promise<void>;
  setRole(identity: Identity, role: Role, granted: boolean): Promise<void>;
  setDeployer(identity: Identity): Promise<void>;
}

export interface LedgerStore extends LedgerReader {
  /**
   * Run `work` as one atomic unit. Writes become visible only if `work`
   * resolves; a rejection discards them and is rethrown.
   */
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
