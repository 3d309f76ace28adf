/**
 * In-memory implementation of {@link LedgerStore}.
 *
 * Writes made inside a transaction are staged and applied to the committed
 * maps only when the transaction's work resolves, so a failed operation
 * never leaves partial state. Records and entries are copied on the way in
 * and out; callers never hold a reference into the store.
 *
 * @module store/inMemoryLedgerStore
 */

import type { Identity, InspectionEntry, ProductRecord, Role } from '../types/index.js';
import { ALL_ROLES } from '../types/index.js';
import type { LedgerStore, LedgerTransaction } from './types.js';

function copyRecord(record: ProductRecord): ProductRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    expirationDate: new Date(record.expirationDate.getTime()),
  };
}

function copyEntry(entry: InspectionEntry): InspectionEntry {
  return { ...entry, timestamp: new Date(entry.timestamp.getTime()) };
}

function roleKey(identity: Identity, role: Role): string {
  return `${role}:${identity}`;
}

interface CommittedState {
  /** productId → ProductRecord */
  records: Map<number, ProductRecord>;
  /** productId → inspection entries in append order */
  checks: Map<number, InspectionEntry[]>;
  /** identity → roles held */
  roles: Map<Identity, Set<Role>>;
  counter: number;
  deployer: Identity | null;
}

class StagedTransaction implements LedgerTransaction {
  private readonly records = new Map<number, ProductRecord>();
  private readonly appended = new Map<number, InspectionEntry[]>();
  private readonly roleChanges = new Map<string, { identity: Identity; role: Role; granted: boolean }>();
  private counter: number;
  private deployer: Identity | null;

  constructor(private readonly state: CommittedState) {
    this.counter = state.counter;
    this.deployer = state.deployer;
  }

  async getRecord(id: number): Promise<ProductRecord | null> {
    const record = this.records.get(id) ?? this.state.records.get(id);
    return record ? copyRecord(record) : null;
  }

  async getChecks(id: number): Promise<InspectionEntry[]> {
    const committed = this.state.checks.get(id) ?? [];
    const staged = this.appended.get(id) ?? [];
    return [...committed, ...staged].map(copyEntry);
  }

  async hasRole(identity: Identity, role: Role): Promise<boolean> {
    const change = this.roleChanges.get(roleKey(identity, role));
    if (change) return change.granted;
    return this.state.roles.get(identity)?.has(role) ?? false;
  }

  async listRoles(identity: Identity): Promise<Role[]> {
    const held: Role[] = [];
    for (const role of ALL_ROLES) {
      if (await this.hasRole(identity, role)) held.push(role);
    }
    return held;
  }

  async getProductCount(): Promise<number> {
    return this.counter;
  }

  async getDeployer(): Promise<Identity | null> {
    return this.deployer;
  }

  async nextProductId(): Promise<number> {
    this.counter += 1;
    return this.counter;
  }

  async putRecord(record: ProductRecord): Promise<void> {
    this.records.set(record.id, copyRecord(record));
  }

  async appendCheck(id: number, entry: InspectionEntry): Promise<void> {
    let list = this.appended.get(id);
    if (!list) {
      list = [];
      this.appended.set(id, list);
    }
    list.push(copyEntry(entry));
  }

  async setRole(identity: Identity, role: Role, granted: boolean): Promise<void> {
    this.roleChanges.set(roleKey(identity, role), { identity, role, granted });
  }

  async setDeployer(identity: Identity): Promise<void> {
    this.deployer = identity;
  }

  /** Apply every staged write to the committed state. */
  commit(): void {
    for (const [id, record] of this.records) {
      this.state.records.set(id, record);
    }
    for (const [id, entries] of this.appended) {
      const list = this.state.checks.get(id);
      if (list) {
        list.push(...entries);
      } else {
        this.state.checks.set(id, [...entries]);
      }
    }
    for (const { identity, role, granted } of this.roleChanges.values()) {
      let set = this.state.roles.get(identity);
      if (granted) {
        if (!set) {
          set = new Set();
          this.state.roles.set(identity, set);
        }
        set.add(role);
      } else if (set) {
        set.delete(role);
        if (set.size === 0) this.state.roles.delete(identity);
      }
    }
    this.state.counter = this.counter;
    this.state.deployer = this.deployer;
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly state: CommittedState = {
    records: new Map(),
    checks: new Map(),
    roles: new Map(),
    counter: 0,
    deployer: null,
  };

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const tx = new StagedTransaction(this.state);
    const result = await work(tx);
    tx.commit();
    return result;
  }

  async getRecord(id: number): Promise<ProductRecord | null> {
    const record = this.state.records.get(id);
    return record ? copyRecord(record) : null;
  }

  async getChecks(id: number): Promise<InspectionEntry[]> {
    return (this.state.checks.get(id) ?? []).map(copyEntry);
  }

  async hasRole(identity: Identity, role: Role): Promise<boolean> {
    return this.state.roles.get(identity)?.has(role) ?? false;
  }

  async listRoles(identity: Identity): Promise<Role[]> {
    const set = this.state.roles.get(identity);
    return set ? ALL_ROLES.filter((role) => set.has(role)) : [];
  }

  async getProductCount(): Promise<number> {
    return this.state.counter;
  }

  async getDeployer(): Promise<Identity | null> {
    return this.state.deployer;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
