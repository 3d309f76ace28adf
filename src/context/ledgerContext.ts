/**
 * Process-owned context shared by the role registry and the record ledger.
 *
 * Bundles the store, the single serialization point, the event sink and the
 * clock. Both components receive the same instance, so grants, revocations
 * and product mutations all commit through one ordered queue.
 *
 * @module context/ledgerContext
 */

import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { LedgerStore, LedgerTransaction } from '../store/types.js';
import type { EventSink, LedgerEvent } from '../types/index.js';
import { Serializer } from '../utils/serializer.js';

export interface LedgerContextOptions {
  store: LedgerStore;
  events: EventSink;
  logger?: Logger;
  /** Ledger clock; assigns createdAt and inspection timestamps. */
  now?: () => Date;
  serializer?: Serializer;
}

export type Emit = (event: LedgerEvent) => void;

export class LedgerContext {
  readonly store: LedgerStore;
  readonly logger: Logger;
  readonly now: () => Date;
  private readonly events: EventSink;
  private readonly serializer: Serializer;

  constructor(options: LedgerContextOptions) {
    this.store = options.store;
    this.events = options.events;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.serializer = options.serializer ?? new Serializer();
  }

  /**
   * Apply `work` atomically, after every previously submitted mutation.
   * Events emitted by `work` are published only once the transaction has
   * committed, and in emission order; a rejected `work` publishes nothing.
   */
  mutate<T>(work: (tx: LedgerTransaction, emit: Emit) => Promise<T>): Promise<T> {
    return this.serializer.run(async () => {
      const emitted: LedgerEvent[] = [];
      const result = await this.store.transaction((tx) =>
        work(tx, (event) => {
          emitted.push(event);
        }),
      );
      for (const event of emitted) {
        this.events.publish(event);
      }
      return result;
    });
  }

  /** Resolves once every mutation submitted so far has settled. */
  settled(): Promise<void> {
    return this.serializer.drain();
  }
}
