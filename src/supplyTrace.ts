/**
 * Composition root for the ledger engine.
 *
 * Wires one store, one serializer and one event journal into the role
 * registry, the access guard and the record ledger. Every component gets
 * its collaborators by reference; nothing is held in module state.
 *
 * @module supplyTrace
 */

import { AccessGuard } from './access/index.js';
import { LedgerContext } from './context/ledgerContext.js';
import { EventJournal } from './journal/index.js';
import { RecordLedger } from './ledger/index.js';
import type { Logger } from './logging/index.js';
import { createSilentLogger } from './logging/index.js';
import { RoleRegistry } from './roles/index.js';
import type { LedgerStore } from './store/index.js';
import { InMemoryLedgerStore } from './store/index.js';

export interface SupplyTraceOptions {
  store?: LedgerStore;
  logger?: Logger;
  /** Ledger clock. Defaults to the system clock. */
  now?: () => Date;
  journal?: EventJournal;
}

export interface SupplyTrace {
  context: LedgerContext;
  roles: RoleRegistry;
  guard: AccessGuard;
  ledger: RecordLedger;
  journal: EventJournal;
  store: LedgerStore;
}

export function createSupplyTrace(options: SupplyTraceOptions = {}): SupplyTrace {
  const logger = options.logger ?? createSilentLogger();
  const store = options.store ?? new InMemoryLedgerStore();
  const journal =
    options.journal ?? new EventJournal({ logger: logger.child({ operation: 'journal' }) });

  const context = new LedgerContext({
    store,
    events: journal,
    logger,
    now: options.now,
  });
  const roles = new RoleRegistry(context);
  const guard = new AccessGuard(roles);
  const ledger = new RecordLedger(context, guard);

  return { context, roles, guard, ledger, journal, store };
}
