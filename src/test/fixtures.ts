/**
 * Shared fixtures for ledger tests: well-known identities, a fixed clock,
 * and a bootstrapped in-memory ledger with the standard supply-chain cast.
 *
 * @module test/fixtures
 */

import type { LogEntry, Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import type { SupplyTrace } from '../supplyTrace.js';
import { createSupplyTrace } from '../supplyTrace.js';
import type { ProductDetails } from '../types/index.js';
import { Role } from '../types/index.js';

export const ADMIN = '0xadmin00000000000000000000000000000000001';
export const MAKER = '0xmaker00000000000000000000000000000000002';
export const OTHER_MAKER = '0xmaker00000000000000000000000000000000003';
export const SHIPPER = '0xshipper000000000000000000000000000000004';
export const SHOP = '0xshop000000000000000000000000000000000005';
export const STRANGER = '0xstranger00000000000000000000000000000006';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export const WIDGET: ProductDetails = {
  name: 'Widget',
  originLocation: 'Lagos',
  batchNumber: 'B-001',
  expirationDate: new Date('2027-01-01T00:00:00.000Z'),
};

export interface CapturingLogger {
  logger: Logger;
  entries: LogEntry[];
}

export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level: 'debug',
    output: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}

/** In-memory ledger bootstrapped by ADMIN, without any other grants. */
export async function createBootstrappedLedger(logger?: Logger): Promise<SupplyTrace> {
  const trace = createSupplyTrace({ now: () => FIXED_NOW, logger });
  await trace.roles.bootstrap(ADMIN);
  return trace;
}

/**
 * Bootstrapped ledger where MAKER and OTHER_MAKER are manufacturers,
 * SHIPPER a distributor and SHOP a retailer.
 */
export async function createSupplyChain(logger?: Logger): Promise<SupplyTrace> {
  const trace = await createBootstrappedLedger(logger);
  await trace.roles.grant(ADMIN, Role.MANUFACTURER, MAKER);
  await trace.roles.grant(ADMIN, Role.MANUFACTURER, OTHER_MAKER);
  await trace.roles.grant(ADMIN, Role.DISTRIBUTOR, SHIPPER);
  await trace.roles.grant(ADMIN, Role.RETAILER, SHOP);
  return trace;
}
