/**
 * Role Registry Module
 *
 * Administrator-managed role assignments backing every access decision.
 *
 * @module roles
 */

export { RoleRegistry } from './roleRegistry.js';
