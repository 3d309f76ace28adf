/**
 * SupplyTrace – Unified SDK Entry Point
 *
 * Re-exports the ledger engine (roles, access guard, record ledger), the
 * stores, the event journal and the HTTP app factory.
 *
 * @module supplytrace
 */

// ─── Core Types ───
export {
  Role,
  ALL_ROLES,
  INSPECTOR_ROLES,
  ZERO_IDENTITY,
  LEDGER_ERROR_CODES,
  isRole,
  zeroRecord,
} from './types/index.js';
export type {
  Identity,
  ProductRecord,
  InspectionEntry,
  ProductDetails,
  InspectionInput,
  LedgerEvent,
  LedgerEventType,
  EventSink,
  ErrorResponse,
  GenericResponse,
  LedgerErrorCode,
} from './types/index.js';

// ─── Errors ───
export {
  LedgerError,
  UnauthorizedError,
  NotOwnerError,
  AlreadyCompletedError,
  isLedgerError,
} from './errors/ledgerErrors.js';

// ─── Engine ───
export * from './roles/index.js';
export * from './access/index.js';
export * from './ledger/index.js';
export * from './journal/index.js';
export * from './store/index.js';
export { LedgerContext } from './context/ledgerContext.js';
export type { LedgerContextOptions, Emit } from './context/ledgerContext.js';
export { Serializer } from './utils/serializer.js';
export { createSupplyTrace } from './supplyTrace.js';
export type { SupplyTrace, SupplyTraceOptions } from './supplyTrace.js';

// ─── Ambient ───
export * from './logging/index.js';
export * from './config/index.js';
export { createApp } from './app.js';
export type { AppDependencies } from './app.js';
export { runMigrations } from './utils/migrationRunner.js';
