/**
 * Event Journal Module
 *
 * Append-only, hash-chained record of committed ledger events with
 * filtering and subscription.
 *
 * @module journal
 */

export type { JournalEntry, JournalFilter, ChainIntegrityResult, JournalListener } from './types.js';
export { EventJournal } from './eventJournal.js';
export type { EventJournalOptions } from './eventJournal.js';
