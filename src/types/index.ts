/**
 * Core type definitions for the supply-chain ledger.
 * Shared by the role registry, the record ledger, the stores and the HTTP layer.
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export enum Role {
  ADMIN = 'ADMIN',
  MANUFACTURER = 'MANUFACTURER',
  DISTRIBUTOR = 'DISTRIBUTOR',
  RETAILER = 'RETAILER',
}

/** Fixed role order used whenever roles are listed. */
export const ALL_ROLES: readonly Role[] = [
  Role.ADMIN,
  Role.MANUFACTURER,
  Role.DISTRIBUTOR,
  Role.RETAILER,
];

/** Roles allowed to append inspection entries. */
export const INSPECTOR_ROLES: readonly Role[] = [
  Role.MANUFACTURER,
  Role.DISTRIBUTOR,
  Role.RETAILER,
];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ALL_ROLES.some((role) => role === value);
}

// ─── Data Models ─────────────────────────────────────────────────────────────

/** Opaque principal reference (account address or equivalent). */
export type Identity = string;

/** Owner of a zero-valued record. */
export const ZERO_IDENTITY: Identity = '0x0000000000000000000000000000000000000000';

export interface ProductRecord {
  id: number;
  name: string;
  originLocation: string;
  batchNumber: string;
  manufacturer: Identity;
  createdAt: Date;
  expirationDate: Date;
  completed: boolean;
}

export interface InspectionEntry {
  inspector: Identity;
  timestamp: Date;
  checkpointName: string;
  passed: boolean;
  notes: string;
}

/** Caller-supplied fields of a product, used by register and update. */
export interface ProductDetails {
  name: string;
  originLocation: string;
  batchNumber: string;
  expirationDate: Date;
}

export interface InspectionInput {
  checkpointName: string;
  passed: boolean;
  notes: string;
}

/**
 * The record returned for an id that was never written: every field at its
 * default value.
 */
export function zeroRecord(): ProductRecord {
  return {
    id: 0,
    name: '',
    originLocation: '',
    batchNumber: '',
    manufacturer: ZERO_IDENTITY,
    createdAt: new Date(0),
    expirationDate: new Date(0),
    completed: false,
  };
}

// ─── Domain Events ───────────────────────────────────────────────────────────

export interface ProductRegisteredEvent {
  type: 'ProductRegistered';
  productId: number;
  name: string;
  manufacturer: Identity;
}

export interface QualityCheckPerformedEvent {
  type: 'QualityCheckPerformed';
  productId: number;
  checkpointName: string;
  passed: boolean;
}

export interface ProductCompletedEvent {
  type: 'ProductCompleted';
  productId: number;
}

export interface ProductUpdatedEvent {
  type: 'ProductUpdated';
  productId: number;
}

export interface RoleGrantedEvent {
  type: 'RoleGranted';
  role: Role;
  account: Identity;
  sender: Identity;
}

export interface RoleRevokedEvent {
  type: 'RoleRevoked';
  role: Role;
  account: Identity;
  sender: Identity;
}

export type LedgerEvent =
  | ProductRegisteredEvent
  | QualityCheckPerformedEvent
  | ProductCompletedEvent
  | ProductUpdatedEvent
  | RoleGrantedEvent
  | RoleRevokedEvent;

export type LedgerEventType = LedgerEvent['type'];

/** Anything that accepts committed events, in commit order. */
export interface EventSink {
  publish(event: LedgerEvent): void;
}

// ─── API Response Types ──────────────────────────────────────────────────────

export interface GenericResponse {
  success: boolean;
  message: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId: string;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: Date;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const LEDGER_ERROR_CODES = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_OWNER: 'NOT_OWNER',
  ALREADY_COMPLETED: 'ALREADY_COMPLETED',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CALLER_REQUIRED: 'CALLER_REQUIRED',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[keyof typeof LEDGER_ERROR_CODES];
