import {
  alreadyNegotiated,
  quoteExpired,
  quoteNotFound,
} from '../errors.js';
import { createLogger, type EngineLogger } from '../logger.js';
import type { NegotiationRecord, Quote, QuoteStatus } from '../types.js';
import { KeyedMutex } from './keyed-mutex.js';
import { transition, type QuoteEvent } from './state-machine.js';

/** Open-store size above which expired quotes are swept on insert. */
export const QUOTE_CLEANUP_THRESHOLD = 1000;

export type LiveStatus = Extract<QuoteStatus, 'OPEN' | 'NEGOTIATED'>;

export interface LiveQuote {
  quote: Quote;
  status: LiveStatus;
}

/** Handle passed to `withQuote` callbacks; `consume` removes the quote while the lock is held. */
export interface QuoteHandle extends LiveQuote {
  consume(): void;
}

interface NegotiatedEntry {
  quote: Quote;
  original_price: number;
  negotiated_at: number;
}

export interface LifecycleOptions {
  cleanupThreshold?: number;
  logger?: EngineLogger;
}

/**
 * Owns the open and negotiated quote stores and every per-quote transition.
 *
 * Each operation on a quote id runs under that id's lock. Expiry is checked
 * lazily on access; an expired quote is evicted and reported as QUOTE_EXPIRED.
 */
export class QuoteLifecycleManager {
  private readonly openQuotes = new Map<string, Quote>();
  private readonly negotiatedQuotes = new Map<string, NegotiatedEntry>();
  private readonly negotiations = new Map<string, NegotiationRecord>();
  private readonly inFlight = new Set<string>();
  private readonly mutex = new KeyedMutex();
  private readonly cleanupThreshold: number;
  private readonly logger: EngineLogger;

  constructor(options: LifecycleOptions = {}) {
    this.cleanupThreshold = options.cleanupThreshold ?? QUOTE_CLEANUP_THRESHOLD;
    this.logger = options.logger ?? createLogger('quote-lifecycle');
  }

  /** Register a freshly issued quote as OPEN. */
  open(quote: Quote, now: number): void {
    this.openQuotes.set(quote.quote_id, quote);
    if (this.openQuotes.size + this.negotiatedQuotes.size > this.cleanupThreshold) {
      this.sweepExpired(now);
    }
  }

  lookup(quoteId: string, now: number): Promise<LiveQuote> {
    return this.mutex.runExclusive<LiveQuote>(quoteId, () => this.find(quoteId, now));
  }

  /**
   * Reserve an OPEN quote for its one negotiation. Fails if the quote is
   * missing, expired, already negotiated, or has a negotiation in flight.
   */
  beginNegotiation(quoteId: string, now: number): Promise<Quote> {
    return this.mutex.runExclusive<Quote>(quoteId, () => {
      const { quote, status } = this.find(quoteId, now);
      if (status !== 'OPEN' || this.negotiations.has(quoteId) || this.inFlight.has(quoteId)) {
        throw alreadyNegotiated(quoteId);
      }
      this.inFlight.add(quoteId);
      return quote;
    });
  }

  /**
   * Write the negotiation outcome. State is re-validated first because the
   * decision was made without holding the lock: the quote may have been
   * purchased or have expired in the meantime.
   */
  commitNegotiation(record: NegotiationRecord, successor: Quote | null, now: number): Promise<QuoteStatus> {
    const quoteId = record.quote_id;
    return this.mutex.runExclusive<QuoteStatus>(quoteId, () => {
      this.inFlight.delete(quoteId);
      const { quote, status } = this.find(quoteId, now);
      if (status !== 'OPEN' || this.negotiations.has(quoteId)) {
        throw alreadyNegotiated(quoteId);
      }

      const event: QuoteEvent = successor ? 'negotiation_accepted' : 'negotiation_rejected';
      const next = this.advance(quoteId, status, event);
      this.negotiations.set(quoteId, record);

      if (successor) {
        this.openQuotes.delete(quoteId);
        this.negotiatedQuotes.set(quoteId, {
          quote: successor,
          original_price: quote.price_per_unit,
          negotiated_at: record.decided_at,
        });
      }
      return next;
    });
  }

  /** Release a reservation taken by `beginNegotiation` without recording an outcome. */
  abandonNegotiation(quoteId: string): void {
    this.inFlight.delete(quoteId);
  }

  /** Run `fn` with the live quote while holding its lock. */
  withQuote<T>(quoteId: string, now: number, fn: (handle: QuoteHandle) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive<T>(quoteId, () => {
      const live = this.find(quoteId, now);
      return fn({
        ...live,
        consume: () => this.evict(quoteId, live.status, 'purchased'),
      });
    });
  }

  /** Remove a quote after purchase. Returns false if it was not live. */
  consume(quoteId: string): Promise<boolean> {
    return this.mutex.runExclusive<boolean>(quoteId, () => {
      const status = this.statusOf(quoteId);
      if (!status) return false;
      this.evict(quoteId, status, 'purchased');
      return true;
    });
  }

  statusOf(quoteId: string): LiveStatus | null {
    if (this.negotiatedQuotes.has(quoteId)) return 'NEGOTIATED';
    if (this.openQuotes.has(quoteId)) return 'OPEN';
    return null;
  }

  getNegotiation(quoteId: string): NegotiationRecord | undefined {
    return this.negotiations.get(quoteId);
  }

  /** Evict every expired quote whose lock is free. Returns the number evicted. */
  sweepExpired(now: number): number {
    let evicted = 0;
    const candidates: [string, LiveStatus, Quote][] = [
      ...[...this.openQuotes].map(([id, quote]): [string, LiveStatus, Quote] => [id, 'OPEN', quote]),
      ...[...this.negotiatedQuotes].map(([id, entry]): [string, LiveStatus, Quote] => [id, 'NEGOTIATED', entry.quote]),
    ];
    for (const [quoteId, status, quote] of candidates) {
      if (now > quote.price_valid_until && !this.mutex.isLocked(quoteId)) {
        this.evict(quoteId, status, 'expired');
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.info({ evicted, now }, 'swept expired quotes');
    }
    return evicted;
  }

  get size(): { open: number; negotiated: number } {
    return { open: this.openQuotes.size, negotiated: this.negotiatedQuotes.size };
  }

  /** Caller must hold the quote's lock. */
  private find(quoteId: string, now: number): LiveQuote {
    const negotiated = this.negotiatedQuotes.get(quoteId);
    const live: LiveQuote | null = negotiated
      ? { quote: negotiated.quote, status: 'NEGOTIATED' }
      : this.liveOpen(quoteId);

    if (!live) {
      throw quoteNotFound(quoteId);
    }
    if (now > live.quote.price_valid_until) {
      this.evict(quoteId, live.status, 'expired');
      throw quoteExpired(quoteId, live.quote.price_valid_until);
    }
    return live;
  }

  private liveOpen(quoteId: string): LiveQuote | null {
    const quote = this.openQuotes.get(quoteId);
    return quote ? { quote, status: 'OPEN' } : null;
  }

  private evict(quoteId: string, status: LiveStatus, event: 'purchased' | 'expired'): void {
    const next = this.advance(quoteId, status, event);
    this.openQuotes.delete(quoteId);
    this.negotiatedQuotes.delete(quoteId);
    this.negotiations.delete(quoteId);
    this.inFlight.delete(quoteId);
    this.logger.debug({ quote_id: quoteId, from: status, to: next }, 'quote removed');
  }

  private advance(quoteId: string, status: QuoteStatus, event: QuoteEvent): QuoteStatus {
    const next = transition(status, event);
    if (!next) {
      throw new Error(`Illegal quote transition for ${quoteId}: ${status} + ${event}`);
    }
    return next;
  }
}
