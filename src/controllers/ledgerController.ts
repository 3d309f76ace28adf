/**
 * Ledger controller for the product and role API operations.
 *
 * Validates request payloads, delegates to the record ledger and role
 * registry, and turns ledger failures into structured error responses.
 * Errors that are not ledger failures propagate to the app's error handler.
 * All collaborators arrive through the dependency objects, so tests can
 * build them around an in-memory store.
 *
 * @module controllers/ledgerController
 */

import { isLedgerError } from '../errors/ledgerErrors.js';
import type {
  ChainIntegrityResult,
  EventJournal,
  JournalEntry,
  JournalFilter,
} from '../journal/index.js';
import type { RecordLedger } from '../ledger/index.js';
import type { Logger } from '../logging/index.js';
import type { RoleRegistry } from '../roles/index.js';
import type {
  ErrorResponse,
  GenericResponse,
  Identity,
  InspectionEntry,
  InspectionInput,
  LedgerEventType,
  ProductDetails,
  ProductRecord,
  Role,
} from '../types/index.js';
import { isRole } from '../types/index.js';
import {
  formatDataResponse,
  formatErrorResponse,
  formatGenericResponse,
  formatValidationError,
  generateRequestId,
} from '../utils/responses.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

export interface LedgerControllerDependencies {
  ledger: RecordLedger;
  roles: RoleRegistry;
  journal: EventJournal;
  logger: Logger;
}

// ─── Response Types ──────────────────────────────────────────────────────────

export interface ProductIdResponse {
  success: true;
  productId: number;
}

export interface ProductResponse {
  success: true;
  product: ProductRecord;
}

export interface ChecksResponse {
  success: true;
  productId: number;
  checks: InspectionEntry[];
}

export interface CountResponse {
  success: true;
  count: number;
}

export interface RolesResponse {
  success: true;
  identity: Identity;
  roles: Role[];
}

export interface EventsResponse {
  success: true;
  events: JournalEntry[];
}

export interface IntegrityResponse {
  success: true;
  integrity: ChainIntegrityResult;
}

// ─── Request Validation ──────────────────────────────────────────────────────

type FieldErrors = Record<string, string[]>;

type Parsed<T> = { ok: true; value: T } | { ok: false; fields: FieldErrors };

const EVENT_TYPES: readonly LedgerEventType[] = [
  'ProductRegistered',
  'QualityCheckPerformed',
  'ProductCompleted',
  'ProductUpdated',
  'RoleGranted',
  'RoleRevoked',
];

function isEventType(value: unknown): value is LedgerEventType {
  return typeof value === 'string' && EVENT_TYPES.some((type) => type === value);
}

function asObject(body: unknown): Record<string, unknown> {
  return typeof body === 'object' && body !== null ? { ...body } : {};
}

function addError(fields: FieldErrors, field: string, message: string): void {
  (fields[field] ??= []).push(message);
}

function readText(source: Record<string, unknown>, field: string, fields: FieldErrors): string {
  const value = source[field];
  if (typeof value !== 'string') {
    addError(fields, field, `${field} must be a string`);
    return '';
  }
  return value;
}

/** Accepts an ISO-8601 string or epoch milliseconds. */
function readDate(source: Record<string, unknown>, field: string, fields: FieldErrors): Date {
  const value = source[field];
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  addError(fields, field, `${field} must be an ISO-8601 date or epoch milliseconds`);
  return new Date(0);
}

export function parseProductDetails(body: unknown): Parsed<ProductDetails> {
  const source = asObject(body);
  const fields: FieldErrors = {};
  const value: ProductDetails = {
    name: readText(source, 'name', fields),
    originLocation: readText(source, 'originLocation', fields),
    batchNumber: readText(source, 'batchNumber', fields),
    expirationDate: readDate(source, 'expirationDate', fields),
  };
  return Object.keys(fields).length > 0 ? { ok: false, fields } : { ok: true, value };
}

export function parseInspection(body: unknown): Parsed<InspectionInput> {
  const source = asObject(body);
  const fields: FieldErrors = {};
  const checkpointName = readText(source, 'checkpointName', fields);
  const passed = source['passed'];
  if (typeof passed !== 'boolean') {
    addError(fields, 'passed', 'passed must be a boolean');
  }
  const notes = source['notes'] === undefined ? '' : readText(source, 'notes', fields);
  if (Object.keys(fields).length > 0) return { ok: false, fields };
  return { ok: true, value: { checkpointName, passed: passed === true, notes } };
}

function parseRole(source: Record<string, unknown>, fields: FieldErrors): Role | null {
  const role = source['role'];
  if (isRole(role)) return role;
  addError(fields, 'role', 'role must be one of ADMIN, MANUFACTURER, DISTRIBUTOR, RETAILER');
  return null;
}

export function parseRoleChange(body: unknown): Parsed<{ role: Role; account: Identity }> {
  const source = asObject(body);
  const fields: FieldErrors = {};
  const role = parseRole(source, fields);
  const account = readText(source, 'account', fields);
  if (account === '' && !fields['account']) {
    addError(fields, 'account', 'account must not be empty');
  }
  if (role === null || Object.keys(fields).length > 0) return { ok: false, fields };
  return { ok: true, value: { role, account } };
}

/** Product ids, limits and offsets are non-negative integers; id 0 reads as the zero record. */
export function parseNonNegativeInt(raw: string): number | null {
  if (!/^\d{1,15}$/.test(raw)) return null;
  return Number(raw);
}

function invalidProductId(requestId: string): ErrorResponse {
  return formatValidationError({ id: ['id must be a non-negative integer'] }, requestId);
}

// ─── Error Mapping ───────────────────────────────────────────────────────────

/**
 * Run a ledger call, mapping ledger failures to an ErrorResponse carrying
 * the failure's code. Anything else is rethrown.
 */
async function handleLedgerCall<T>(
  requestId: string,
  deps: LedgerControllerDependencies,
  work: () => Promise<T>,
): Promise<T | ErrorResponse> {
  try {
    return await work();
  } catch (err) {
    if (isLedgerError(err)) {
      return formatErrorResponse(err.code, err.message, requestId);
    }
    deps.logger.error(
      'Ledger call failed',
      err instanceof Error ? err : new Error(String(err)),
      { requestId },
    );
    throw err;
  }
}

// ─── Product Operations ──────────────────────────────────────────────────────

export async function registerProduct(
  caller: Identity,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<ProductIdResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const parsed = parseProductDetails(body);
  if (!parsed.ok) return formatValidationError(parsed.fields, requestId);

  return handleLedgerCall(requestId, deps, async () => {
    const productId = await deps.ledger.register(caller, parsed.value);
    return formatDataResponse({ productId });
  });
}

export async function updateProduct(
  caller: Identity,
  idParam: string,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const id = parseNonNegativeInt(idParam);
  if (id === null) return invalidProductId(requestId);
  const parsed = parseProductDetails(body);
  if (!parsed.ok) return formatValidationError(parsed.fields, requestId);

  return handleLedgerCall(requestId, deps, async () => {
    await deps.ledger.update(caller, id, parsed.value);
    return formatGenericResponse(`Product ${id} updated`);
  });
}

export async function performCheck(
  caller: Identity,
  idParam: string,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const id = parseNonNegativeInt(idParam);
  if (id === null) return invalidProductId(requestId);
  const parsed = parseInspection(body);
  if (!parsed.ok) return formatValidationError(parsed.fields, requestId);

  return handleLedgerCall(requestId, deps, async () => {
    await deps.ledger.performCheck(caller, id, parsed.value);
    return formatGenericResponse(`Check ${parsed.value.checkpointName} recorded for product ${id}`);
  });
}

export async function completeProduct(
  caller: Identity,
  idParam: string,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const id = parseNonNegativeInt(idParam);
  if (id === null) return invalidProductId(requestId);

  return handleLedgerCall(requestId, deps, async () => {
    await deps.ledger.complete(caller, id);
    return formatGenericResponse(`Product ${id} journey completed`);
  });
}

export async function getProduct(
  idParam: string,
  deps: LedgerControllerDependencies,
): Promise<ProductResponse | ErrorResponse> {
  const id = parseNonNegativeInt(idParam);
  if (id === null) return invalidProductId(generateRequestId());
  const product = await deps.ledger.getRecord(id);
  return formatDataResponse({ product });
}

export async function getProductChecks(
  idParam: string,
  deps: LedgerControllerDependencies,
): Promise<ChecksResponse | ErrorResponse> {
  const id = parseNonNegativeInt(idParam);
  if (id === null) return invalidProductId(generateRequestId());
  const checks = await deps.ledger.getChecks(id);
  return formatDataResponse({ productId: id, checks });
}

export async function getProductCount(deps: LedgerControllerDependencies): Promise<CountResponse> {
  const count = await deps.ledger.getProductCount();
  return formatDataResponse({ count });
}

// ─── Role Operations ─────────────────────────────────────────────────────────

export async function grantRole(
  caller: Identity,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const parsed = parseRoleChange(body);
  if (!parsed.ok) return formatValidationError(parsed.fields, requestId);
  const { role, account } = parsed.value;

  return handleLedgerCall(requestId, deps, async () => {
    await deps.roles.grant(caller, role, account);
    return formatGenericResponse(`${role} granted to ${account}`);
  });
}

export async function revokeRole(
  caller: Identity,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const parsed = parseRoleChange(body);
  if (!parsed.ok) return formatValidationError(parsed.fields, requestId);
  const { role, account } = parsed.value;

  return handleLedgerCall(requestId, deps, async () => {
    await deps.roles.revoke(caller, role, account);
    return formatGenericResponse(`${role} revoked from ${account}`);
  });
}

export async function renounceRole(
  caller: Identity,
  body: unknown,
  deps: LedgerControllerDependencies,
): Promise<GenericResponse | ErrorResponse> {
  const requestId = generateRequestId();
  const fields: FieldErrors = {};
  const role = parseRole(asObject(body), fields);
  if (role === null) return formatValidationError(fields, requestId);

  return handleLedgerCall(requestId, deps, async () => {
    await deps.roles.renounce(caller, role);
    return formatGenericResponse(`${role} renounced by ${caller}`);
  });
}

export async function getRoles(
  identity: Identity,
  deps: LedgerControllerDependencies,
): Promise<RolesResponse> {
  const roles = await deps.roles.rolesOf(identity);
  return formatDataResponse({ identity, roles });
}

// ─── Event Journal ───────────────────────────────────────────────────────────

export function queryEvents(
  query: Record<string, unknown>,
  deps: LedgerControllerDependencies,
): EventsResponse | ErrorResponse {
  const fields: FieldErrors = {};
  const filter: JournalFilter = {};

  const type = query['type'];
  if (type !== undefined) {
    if (isEventType(type)) filter.type = type;
    else addError(fields, 'type', `type must be one of ${EVENT_TYPES.join(', ')}`);
  }
  for (const key of ['productId', 'limit', 'offset'] as const) {
    const raw = query[key];
    if (raw === undefined) continue;
    const value = typeof raw === 'string' ? parseNonNegativeInt(raw) : null;
    if (value === null) addError(fields, key, `${key} must be a non-negative integer`);
    else filter[key] = value;
  }
  const identity = query['identity'];
  if (typeof identity === 'string' && identity !== '') filter.identity = identity;

  if (Object.keys(fields).length > 0) return formatValidationError(fields);
  return formatDataResponse({ events: deps.journal.query(filter) });
}

export function verifyEvents(deps: LedgerControllerDependencies): IntegrityResponse {
  return formatDataResponse({ integrity: deps.journal.verifyChainIntegrity() });
}
