/**
 * Type definitions for the Event Journal module.
 */

import type { Identity, LedgerEvent, LedgerEventType } from '../types/index.js';

export interface JournalEntry {
  /** 1-based position in the journal. */
  sequence: number;
  timestamp: Date;
  event: LedgerEvent;
  checksum: string;
  previousChecksum: string;
}

export interface JournalFilter {
  type?: LedgerEventType;
  productId?: number;
  /** Matches the manufacturer of ProductRegistered and the account or sender of role events. */
  identity?: Identity;
  limit?: number;
  offset?: number;
}

export interface ChainIntegrityResult {
  valid: boolean;
  totalEntries: number;
  firstInvalidIndex: number | null;
  details: string;
}

export type JournalListener = (entry: JournalEntry) => void;
