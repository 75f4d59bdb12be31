import { parseOrderBook, parseQuote } from '../domain/spread/quote.js';
import { describeError } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { AccountState, OrderBook, Quote, Venue } from '../types.js';

export interface PriceFeedPort {
  /** Latest quote or undefined; never blocks. Absence means infinitely stale. */
  latestQuote(venue: Venue): Quote | undefined;
  latestBook(venue: Venue): OrderBook | undefined;
}

export interface AccountFeedPort {
  latestAccountState(venue: Venue): AccountState | undefined;
}

export type PublishResult = 'accepted' | 'superseded' | 'rejected';

/**
 * Latest-value cells written by feed tasks and read by the decision loop.
 * A publish replaces the previous value whole; older timestamps are dropped.
 */
export class QuoteBoard implements PriceFeedPort {
  private readonly quotes = new Map<Venue, Quote>();
  private readonly books = new Map<Venue, OrderBook>();
  private rejected = 0;

  publishQuote(input: unknown): PublishResult {
    let quote: Quote;
    try {
      quote = parseQuote(input);
    } catch (error) {
      this.rejected += 1;
      eventBus.emit('quote.rejected', { input, error: describeError(error) });
      return 'rejected';
    }

    const previous = this.quotes.get(quote.venue);
    if (previous && previous.receivedAt > quote.receivedAt) return 'superseded';

    this.quotes.set(quote.venue, quote);
    return 'accepted';
  }

  publishBook(input: unknown): PublishResult {
    let book: OrderBook;
    try {
      book = parseOrderBook(input);
    } catch (error) {
      this.rejected += 1;
      eventBus.emit('quote.rejected', { input, error: describeError(error) });
      return 'rejected';
    }

    const previous = this.books.get(book.venue);
    if (previous && previous.receivedAt > book.receivedAt) return 'superseded';

    this.books.set(book.venue, Object.freeze(structuredClone(book)));
    return 'accepted';
  }

  latestQuote(venue: Venue): Quote | undefined {
    return this.quotes.get(venue);
  }

  latestBook(venue: Venue): OrderBook | undefined {
    return this.books.get(venue);
  }

  rejectedCount(): number {
    return this.rejected;
  }

  clear(venue?: Venue): void {
    if (venue) {
      this.quotes.delete(venue);
      this.books.delete(venue);
      return;
    }
    this.quotes.clear();
    this.books.clear();
  }
}

export class AccountBoard implements AccountFeedPort {
  private readonly accounts = new Map<Venue, AccountState>();

  publish(state: AccountState): void {
    const previous = this.accounts.get(state.venue);
    if (previous && previous.receivedAt > state.receivedAt) return;
    this.accounts.set(state.venue, Object.freeze({ ...state }));
  }

  latestAccountState(venue: Venue): AccountState | undefined {
    return this.accounts.get(venue);
  }
}
