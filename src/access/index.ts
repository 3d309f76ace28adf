/**
 * Access Control Module
 *
 * Role and ownership checks guarding every mutating ledger operation.
 *
 * @module access
 */

export { AccessGuard } from './accessGuard.js';
