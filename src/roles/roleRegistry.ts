/**
 * Role Registry
 *
 * Single source of truth for which identities hold which roles. Default
 * deny: an identity holds a role only after a successful grant. ADMIN is
 * self-administering; any ADMIN holder may grant or revoke every role,
 * ADMIN included.
 *
 * @module roles
 */

import type { LedgerContext } from '../context/ledgerContext.js';
import { UnauthorizedError } from '../errors/ledgerErrors.js';
import type { LedgerReader } from '../store/types.js';
import type { Identity } from '../types/index.js';
import { Role } from '../types/index.js';

export class RoleRegistry {
  constructor(private readonly context: LedgerContext) {}

  /**
   * Seed the ADMIN role to the initializing identity the first time the
   * store is used. On an already initialised store nothing changes.
   * @returns the identity the store was originally bootstrapped with.
   */
  bootstrap(admin: Identity): Promise<Identity> {
    return this.context.mutate(async (tx, emit) => {
      const deployer = await tx.getDeployer();
      if (deployer !== null) return deployer;

      await tx.setDeployer(admin);
      await tx.setRole(admin, Role.ADMIN, true);
      emit({ type: 'RoleGranted', role: Role.ADMIN, account: admin, sender: admin });
      this.context.logger.info('Role registry bootstrapped', { admin });
      return admin;
    });
  }

  /**
   * Pure lookup. Pass a transaction as `reader` to see its staged writes.
   */
  has(identity: Identity, role: Role, reader: LedgerReader = this.context.store): Promise<boolean> {
    return reader.hasRole(identity, role);
  }

  /** All roles held by `identity`, in the fixed role order. */
  rolesOf(identity: Identity): Promise<Role[]> {
    return this.context.store.listRoles(identity);
  }

  /**
   * Grant `role` to `target`. Re-granting is a silent no-op.
   * @throws UnauthorizedError when the caller does not hold ADMIN.
   */
  grant(caller: Identity, role: Role, target: Identity): Promise<void> {
    return this.context.mutate(async (tx, emit) => {
      await this.requireAdmin(caller, tx, 'grant');
      if (await tx.hasRole(target, role)) return;

      await tx.setRole(target, role, true);
      emit({ type: 'RoleGranted', role, account: target, sender: caller });
      this.context.logger.info('Role granted', { role, account: target, sender: caller });
    });
  }

  /**
   * Revoke `role` from `target`. Revoking an absent role is a silent no-op.
   * @throws UnauthorizedError when the caller does not hold ADMIN.
   */
  revoke(caller: Identity, role: Role, target: Identity): Promise<void> {
    return this.context.mutate(async (tx, emit) => {
      await this.requireAdmin(caller, tx, 'revoke');
      if (!(await tx.hasRole(target, role))) return;

      await tx.setRole(target, role, false);
      emit({ type: 'RoleRevoked', role, account: target, sender: caller });
      this.context.logger.info('Role revoked', { role, account: target, sender: caller });
    });
  }

  /** Drop one of the caller's own roles. Never fails. */
  renounce(caller: Identity, role: Role): Promise<void> {
    return this.context.mutate(async (tx, emit) => {
      if (!(await tx.hasRole(caller, role))) return;

      await tx.setRole(caller, role, false);
      emit({ type: 'RoleRevoked', role, account: caller, sender: caller });
      this.context.logger.info('Role renounced', { role, account: caller });
    });
  }

  private async requireAdmin(caller: Identity, reader: LedgerReader, operation: string): Promise<void> {
    if (await this.has(caller, Role.ADMIN, reader)) return;

    const err = new UnauthorizedError(caller, [Role.ADMIN]);
    this.context.logger.warn('Role change rejected', { caller, operation, code: err.code });
    throw err;
  }
}
