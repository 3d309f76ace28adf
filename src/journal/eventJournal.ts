/**
 * Event Journal for committed ledger events.
 *
 * Append-only, tamper-evident record of every domain event the ledger
 * publishes. Each entry's SHA-256 checksum covers its own content and the
 * previous entry's checksum, forming a hash chain that makes any later edit
 * detectable. Subscribers are notified synchronously in append order.
 *
 * @module journal
 */

import { createHash } from 'node:crypto';
import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { EventSink, LedgerEvent } from '../types/index.js';
import type { ChainIntegrityResult, JournalEntry, JournalFilter, JournalListener } from './types.js';

export interface EventJournalOptions {
  logger?: Logger;
  /** Clock used to timestamp entries. Defaults to the system clock. */
  now?: () => Date;
}

export class EventJournal implements EventSink {
  private readonly entries: JournalEntry[] = [];
  private readonly listeners = new Set<JournalListener>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: EventJournalOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  publish(event: LedgerEvent): void {
    this.append(event);
  }

  /**
   * Append an event and notify subscribers. A listener that throws is
   * logged and skipped; the entry stays appended.
   */
  append(event: LedgerEvent): JournalEntry {
    const last = this.entries[this.entries.length - 1];
    const entry: JournalEntry = {
      sequence: this.entries.length + 1,
      timestamp: this.now(),
      event: { ...event },
      checksum: '',
      previousChecksum: last ? last.checksum : '',
    };
    entry.checksum = this.computeChecksum(entry);
    this.entries.push(entry);

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err) {
        this.logger.error(
          'Journal listener failed',
          err instanceof Error ? err : new Error(String(err)),
          { sequence: entry.sequence, eventType: event.type },
        );
      }
    }
    return entry;
  }

  /** Register a listener; returns a function that removes it. */
  subscribe(listener: JournalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Query journal entries with optional filtering, in append order.
   */
  query(filter: JournalFilter = {}): JournalEntry[] {
    const matches = this.entries.filter((entry) => {
      const event = entry.event;
      if (filter.type && event.type !== filter.type) return false;
      if (filter.productId !== undefined) {
        if (!('productId' in event) || event.productId !== filter.productId) return false;
      }
      if (filter.identity !== undefined && !involves(event, filter.identity)) return false;
      return true;
    });

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? matches.length;
    return matches.slice(offset, offset + limit);
  }

  /**
   * Verify the whole chain: every checksum recomputes and every
   * previousChecksum points at its predecessor.
   */
  verifyChainIntegrity(): ChainIntegrityResult {
    if (this.entries.length === 0) {
      return {
        valid: true,
        totalEntries: 0,
        firstInvalidIndex: null,
        details: 'No entries to verify',
      };
    }

    let previous = '';
    for (const [i, entry] of this.entries.entries()) {
      if (entry.previousChecksum !== previous) {
        return {
          valid: false,
          totalEntries: this.entries.length,
          firstInvalidIndex: i,
          details: `Chain broken at index ${i}: previousChecksum mismatch`,
        };
      }
      if (entry.checksum !== this.computeChecksum(entry)) {
        return {
          valid: false,
          totalEntries: this.entries.length,
          firstInvalidIndex: i,
          details: `Entry at index ${i} has been tampered with: checksum mismatch`,
        };
      }
      previous = entry.checksum;
    }

    return {
      valid: true,
      totalEntries: this.entries.length,
      firstInvalidIndex: null,
      details: `All ${this.entries.length} entries verified`,
    };
  }

  /**
   * SHA-256 over the entry's content and its link to the previous entry.
   */
  private computeChecksum(entry: JournalEntry): string {
    const payload = JSON.stringify({
      sequence: entry.sequence,
      timestamp: entry.timestamp.toISOString(),
      event: entry.event,
      previousChecksum: entry.previousChecksum,
    });
    return createHash('sha256').update(payload).digest('hex');
  }
}

function involves(event: LedgerEvent, identity: string): boolean {
  switch (event.type) {
    case 'ProductRegistered':
      return event.manufacturer === identity;
    case 'RoleGranted':
    case 'RoleRevoked':
      return event.account === identity || event.sender === identity;
    default:
      return false;
  }
}
