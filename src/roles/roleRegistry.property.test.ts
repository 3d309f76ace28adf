/**
 * Property-based tests for the RoleRegistry.
 *
 * Default deny, admin-only administration, and grant/revoke idempotence.
 *
 * @module roles/roleRegistry.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { UnauthorizedError } from '../errors/ledgerErrors.js';
import { identityArb, roleArb } from '../test/arbitraries.js';
import { ADMIN, createBootstrappedLedger } from '../test/fixtures.js';
import { ALL_ROLES, Role } from '../types/index.js';

describe('RoleRegistry – property tests', () => {
  it('holds no role for any identity that was never granted one', async () => {
    await fc.assert(
      fc.asyncProperty(identityArb, roleArb, async (identity, role) => {
        fc.pre(identity !== ADMIN);
        const trace = await createBootstrappedLedger();
        expect(await trace.roles.has(identity, role)).toBe(false);
      }),
      { numRuns: 50 },
    );
  });

  it('rejects grants and revokes from non-admins without changing state', async () => {
    await fc.assert(
      fc.asyncProperty(identityArb, identityArb, roleArb, async (caller, target, role) => {
        fc.pre(caller !== ADMIN);
        const trace = await createBootstrappedLedger();

        await expect(trace.roles.grant(caller, role, target)).rejects.toBeInstanceOf(
          UnauthorizedError,
        );
        await expect(trace.roles.revoke(caller, role, ADMIN)).rejects.toBeInstanceOf(
          UnauthorizedError,
        );

        expect(await trace.roles.rolesOf(ADMIN)).toEqual([Role.ADMIN]);
        expect(await trace.roles.has(target, role)).toBe(target === ADMIN && role === Role.ADMIN);
        expect(trace.journal.size).toBe(1);
      }),
      { numRuns: 50 },
    );
  });

  it('ends in the state of the last admin action, publishing only on change', async () => {
    const actionArb = fc.record({ grant: fc.boolean(), role: roleArb });

    await fc.assert(
      fc.asyncProperty(identityArb, fc.array(actionArb, { maxLength: 20 }), async (target, actions) => {
        fc.pre(target !== ADMIN);
        const trace = await createBootstrappedLedger();
        const expected = new Set<Role>();
        let changes = 0;

        for (const { grant, role } of actions) {
          if (grant) {
            await trace.roles.grant(ADMIN, role, target);
            if (!expected.has(role)) changes += 1;
            expected.add(role);
          } else {
            await trace.roles.revoke(ADMIN, role, target);
            if (expected.has(role)) changes += 1;
            expected.delete(role);
          }
        }

        expect(await trace.roles.rolesOf(target)).toEqual(
          ALL_ROLES.filter((role) => expected.has(role)),
        );
        expect(trace.journal.size).toBe(1 + changes);
      }),
      { numRuns: 50 },
    );
  });
});
