/**
 * Typed failures raised by the role registry, the access guard and the
 * record ledger. Every failure is synchronous with respect to the call that
 * raised it and leaves no partial state behind.
 *
 * @module errors/ledgerErrors
 */

import { LEDGER_ERROR_CODES } from '../types/index.js';
import type { Identity, LedgerErrorCode, Role } from '../types/index.js';

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/** Caller holds none of the roles the operation requires. */
export class UnauthorizedError extends LedgerError {
  constructor(
    public readonly caller: Identity,
    public readonly requiredRoles: readonly Role[],
  ) {
    super(
      LEDGER_ERROR_CODES.UNAUTHORIZED,
      `${caller} lacks required role (one of: ${requiredRoles.join(', ')})`,
    );
    this.name = 'UnauthorizedError';
  }
}

/** Caller is not the manufacturer that registered the product. */
export class NotOwnerError extends LedgerError {
  constructor(
    public readonly caller: Identity,
    public readonly productId: number,
  ) {
    super(LEDGER_ERROR_CODES.NOT_OWNER, `${caller} is not the manufacturer of product ${productId}`);
    this.name = 'NotOwnerError';
  }
}

/** The product journey is finished; the record is frozen. */
export class AlreadyCompletedError extends LedgerError {
  constructor(public readonly productId: number) {
    super(LEDGER_ERROR_CODES.ALREADY_COMPLETED, `Product ${productId} journey already completed`);
    this.name = 'AlreadyCompletedError';
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
