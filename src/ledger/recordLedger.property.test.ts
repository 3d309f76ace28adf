/**
 * Property-based tests for the RecordLedger.
 *
 * Id issuance, append-only inspection logs, the one-way completed flag
 * and failure atomicity, over generated product data and operation
 * sequences.
 *
 * @module ledger/recordLedger.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { isLedgerError } from '../errors/ledgerErrors.js';
import { inspectionArb, productDetailsArb } from '../test/arbitraries.js';
import {
  FIXED_NOW,
  MAKER,
  OTHER_MAKER,
  SHIPPER,
  SHOP,
  STRANGER,
  createSupplyChain,
} from '../test/fixtures.js';

const CALLERS = [MAKER, OTHER_MAKER, SHIPPER, SHOP, STRANGER];

type Op =
  | { kind: 'register'; caller: string }
  | { kind: 'check'; caller: string; id: number }
  | { kind: 'complete'; caller: string; id: number }
  | { kind: 'update'; caller: string; id: number };

const callerArb = fc.constantFrom(...CALLERS);
const idArb = fc.integer({ min: 1, max: 4 });

const opArb: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant('register' as const), caller: callerArb }),
  fc.record({ kind: fc.constant('check' as const), caller: callerArb, id: idArb }),
  fc.record({ kind: fc.constant('complete' as const), caller: callerArb, id: idArb }),
  fc.record({ kind: fc.constant('update' as const), caller: callerArb, id: idArb }),
);

describe('RecordLedger – property tests', () => {
  it('stores registered details verbatim under sequential ids', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(productDetailsArb, { minLength: 1, maxLength: 8 }), async (all) => {
        const trace = await createSupplyChain();

        for (const [i, details] of all.entries()) {
          expect(await trace.ledger.register(MAKER, details)).toBe(i + 1);
        }
        for (const [i, details] of all.entries()) {
          expect(await trace.ledger.getRecord(i + 1)).toEqual({
            id: i + 1,
            ...details,
            manufacturer: MAKER,
            createdAt: FIXED_NOW,
            completed: false,
          });
        }
        expect(await trace.ledger.getProductCount()).toBe(all.length);
      }),
      { numRuns: 50 },
    );
  });

  it('appends checks in order and never rewrites earlier entries', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(inspectionArb, { maxLength: 10 }), async (inputs) => {
        const trace = await createSupplyChain();
        const id = await trace.ledger.register(MAKER, {
          name: 'Widget',
          originLocation: 'Lagos',
          batchNumber: 'B-001',
          expirationDate: FIXED_NOW,
        });

        for (const [i, input] of inputs.entries()) {
          const before = await trace.ledger.getChecks(id);
          await trace.ledger.performCheck(SHIPPER, id, input);
          const after = await trace.ledger.getChecks(id);

          expect(after).toHaveLength(i + 1);
          expect(after.slice(0, i)).toEqual(before);
          expect(after[i]).toEqual({ inspector: SHIPPER, timestamp: FIXED_NOW, ...input });
        }
      }),
      { numRuns: 50 },
    );
  });

  it('keeps every invariant under arbitrary operation sequences', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(opArb, { maxLength: 25 }), inspectionArb, async (ops, input) => {
        const trace = await createSupplyChain();
        const details = {
          name: 'Widget',
          originLocation: 'Lagos',
          batchNumber: 'B-001',
          expirationDate: FIXED_NOW,
        };
        let registered = 0;

        for (const op of ops) {
          const ids = [1, 2, 3, 4];
          const recordsBefore = await Promise.all(ids.map((i) => trace.ledger.getRecord(i)));
          const checksBefore = await Promise.all(ids.map((i) => trace.ledger.getChecks(i)));
          const journalBefore = trace.journal.size;

          let failed = false;
          try {
            switch (op.kind) {
              case 'register':
                await trace.ledger.register(op.caller, details);
                registered += 1;
                break;
              case 'check':
                await trace.ledger.performCheck(op.caller, op.id, input);
                break;
              case 'complete':
                await trace.ledger.complete(op.caller, op.id);
                break;
              case 'update':
                await trace.ledger.update(op.caller, op.id, details);
                break;
            }
          } catch (err) {
            expect(isLedgerError(err)).toBe(true);
            failed = true;
          }

          const recordsAfter = await Promise.all(ids.map((i) => trace.ledger.getRecord(i)));
          const checksAfter = await Promise.all(ids.map((i) => trace.ledger.getChecks(i)));

          if (failed) {
            expect(recordsAfter).toEqual(recordsBefore);
            expect(checksAfter).toEqual(checksBefore);
            expect(trace.journal.size).toBe(journalBefore);
          } else {
            expect(trace.journal.size).toBe(journalBefore + 1);
          }

          for (const [i, before] of recordsBefore.entries()) {
            const after = recordsAfter[i];
            // completed never reverts, except when register replaces a phantom record
            if (before.completed && op.kind !== 'register') {
              expect(after?.completed).toBe(true);
            }
            // checks only grow, and only by appending
            const prior = checksBefore[i] ?? [];
            expect(checksAfter[i]?.slice(0, prior.length)).toEqual(prior);
          }
        }

        expect(await trace.ledger.getProductCount()).toBe(registered);
      }),
      { numRuns: 40 },
    );
  });
});
