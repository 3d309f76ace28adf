/**
 * Record Ledger
 *
 * Product lifecycle and the append-only inspection log. Per product id:
 *
 *   UNREGISTERED -[register]-> ACTIVE -[complete]-> COMPLETED
 *
 * performCheck and update loop on ACTIVE and fail on COMPLETED. Every
 * mutation evaluates its guards inside the serialized transaction before
 * writing anything, and publishes exactly one event once committed.
 *
 * Neither performCheck nor complete verifies that the id was registered;
 * they act on the zero-valued record an unknown id reads as. Completing an
 * unknown id stores that zero record, marked completed, under the id; a
 * later register of the same id replaces it with a fresh active record.
 *
 * @module ledger
 */

import type { AccessGuard } from '../access/index.js';
import type { Emit, LedgerContext } from '../context/ledgerContext.js';
import { AlreadyCompletedError, NotOwnerError, isLedgerError } from '../errors/ledgerErrors.js';
import type { LedgerReader, LedgerTransaction } from '../store/types.js';
import type {
  Identity,
  InspectionEntry,
  InspectionInput,
  ProductDetails,
  ProductRecord,
} from '../types/index.js';
import { INSPECTOR_ROLES, Role, ZERO_IDENTITY, zeroRecord } from '../types/index.js';

export class RecordLedger {
  constructor(
    private readonly context: LedgerContext,
    private readonly guard: AccessGuard,
  ) {}

  /**
   * Register a new product owned by the caller.
   * @returns the new product id; the Nth successful registration yields N.
   * @throws UnauthorizedError unless the caller is a MANUFACTURER.
   */
  register(caller: Identity, details: ProductDetails): Promise<number> {
    return this.guarded('register', caller, async (tx, emit) => {
      await this.guard.requireAnyOf(caller, [Role.MANUFACTURER], tx);

      const id = await tx.nextProductId();
      await tx.putRecord({
        id,
        name: details.name,
        originLocation: details.originLocation,
        batchNumber: details.batchNumber,
        manufacturer: caller,
        createdAt: this.context.now(),
        expirationDate: details.expirationDate,
        completed: false,
      });
      emit({ type: 'ProductRegistered', productId: id, name: details.name, manufacturer: caller });
      return id;
    });
  }

  /**
   * Append an inspection entry for `id`.
   * @throws UnauthorizedError unless the caller is a MANUFACTURER, DISTRIBUTOR or RETAILER.
   * @throws AlreadyCompletedError once the product journey is completed.
   */
  performCheck(caller: Identity, id: number, input: InspectionInput): Promise<void> {
    return this.guarded('performCheck', caller, async (tx, emit) => {
      await this.guard.requireAnyOf(caller, INSPECTOR_ROLES, tx);
      const record = await this.read(tx, id);
      if (record.completed) throw new AlreadyCompletedError(id);

      await tx.appendCheck(id, {
        inspector: caller,
        timestamp: this.context.now(),
        checkpointName: input.checkpointName,
        passed: input.passed,
        notes: input.notes,
      });
      emit({
        type: 'QualityCheckPerformed',
        productId: id,
        checkpointName: input.checkpointName,
        passed: input.passed,
      });
    }, { productId: id });
  }

  /**
   * Finish the product journey. One-way; the record is frozen afterwards.
   * @throws UnauthorizedError unless the caller is a RETAILER.
   * @throws AlreadyCompletedError when already completed.
   */
  complete(caller: Identity, id: number): Promise<void> {
    return this.guarded('complete', caller, async (tx, emit) => {
      await this.guard.requireAnyOf(caller, [Role.RETAILER], tx);
      const record = await this.read(tx, id);
      if (record.completed) throw new AlreadyCompletedError(id);

      await tx.putRecord({ ...record, id, completed: true });
      emit({ type: 'ProductCompleted', productId: id });
    }, { productId: id });
  }

  /**
   * Overwrite name, origin, batch and expiration. id, manufacturer and
   * createdAt never change.
   * @throws UnauthorizedError unless the caller is a MANUFACTURER.
   * @throws NotOwnerError unless the caller registered the product; always for an unregistered id.
   * @throws AlreadyCompletedError once the product journey is completed.
   */
  update(caller: Identity, id: number, details: ProductDetails): Promise<void> {
    return this.guarded('update', caller, async (tx, emit) => {
      await this.guard.requireAnyOf(caller, [Role.MANUFACTURER], tx);
      const record = await tx.getRecord(id);
      // An unregistered id, or one only completed before registration, has no owner.
      if (record === null || record.manufacturer === ZERO_IDENTITY) {
        throw new NotOwnerError(caller, id);
      }
      this.guard.requireOwner(caller, record.manufacturer, id);
      if (record.completed) throw new AlreadyCompletedError(id);

      await tx.putRecord({
        ...record,
        id,
        name: details.name,
        originLocation: details.originLocation,
        batchNumber: details.batchNumber,
        expirationDate: details.expirationDate,
      });
      emit({ type: 'ProductUpdated', productId: id });
    }, { productId: id });
  }

  /** Stored record, or the zero-valued record for an unknown id. */
  getRecord(id: number): Promise<ProductRecord> {
    return this.read(this.context.store, id);
  }

  /** Inspection entries in append order; empty when none were recorded. */
  getChecks(id: number): Promise<InspectionEntry[]> {
    return this.context.store.getChecks(id);
  }

  /** Number of products registered so far. */
  getProductCount(): Promise<number> {
    return this.context.store.getProductCount();
  }

  private async read(reader: LedgerReader, id: number): Promise<ProductRecord> {
    return (await reader.getRecord(id)) ?? zeroRecord();
  }

  /**
   * Run a mutation through the shared context, logging the outcome.
   * Ledger failures are logged at warn and rethrown unchanged.
   */
  private async guarded<T>(
    operation: string,
    caller: Identity,
    work: (tx: LedgerTransaction, emit: Emit) => Promise<T>,
    metadata: Record<string, unknown> = {},
  ): Promise<T> {
    const log = this.context.logger.child({ caller, operation });
    try {
      const result = await this.context.mutate(work);
      log.info('Ledger mutation committed', result === undefined ? metadata : { ...metadata, result });
      return result;
    } catch (err) {
      if (isLedgerError(err)) {
        log.warn('Ledger mutation rejected', { ...metadata, code: err.code });
      }
      throw err;
    }
  }
}
