/**
 * Record Ledger Module
 *
 * Product records, their lifecycle, and the per-product inspection log.
 *
 * @module ledger
 */

export { RecordLedger } from './recordLedger.js';
