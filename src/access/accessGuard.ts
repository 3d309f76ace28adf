/**
 * Access Guard
 *
 * Stateless policy evaluator invoked at the top of every mutating ledger
 * operation. Composes role lookups from the {@link RoleRegistry} with
 * ownership checks against a record's stored manufacturer. It never
 * mutates state; a failed check throws and nothing else happens.
 *
 * @module access
 */

import { NotOwnerError, UnauthorizedError } from '../errors/ledgerErrors.js';
import type { RoleRegistry } from '../roles/index.js';
import type { LedgerReader } from '../store/types.js';
import type { Identity, Role } from '../types/index.js';

export class AccessGuard {
  constructor(private readonly roles: RoleRegistry) {}

  /**
   * @throws UnauthorizedError unless the caller holds at least one of `roles`.
   */
  async requireAnyOf(caller: Identity, roles: readonly Role[], reader?: LedgerReader): Promise<void> {
    for (const role of roles) {
      if (await this.roles.has(caller, role, reader)) return;
    }
    throw new UnauthorizedError(caller, roles);
  }

  /**
   * @throws NotOwnerError unless the caller is the record's manufacturer.
   */
  requireOwner(caller: Identity, owner: Identity, productId: number): void {
    if (caller !== owner) {
      throw new NotOwnerError(caller, productId);
    }
  }
}
