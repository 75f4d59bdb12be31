import { z } from 'zod';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { OrderBook, Quote } from '../../types.js';

export class InvalidQuoteError extends DomainError {
  constructor(quote: unknown, reason = 'bid and ask must be positive with bid <= ask') {
    super(ErrorCode.InvalidQuote, 400, `Invalid quote: ${reason}.`, { quote });
  }
}

const venueSchema = z.enum(['V1', 'V2']);

export const quoteSchema = z.object({
  venue: venueSchema,
  bid: z.number().finite().positive(),
  ask: z.number().finite().positive(),
  receivedAt: z.number().int().nonnegative(),
}).refine((q) => q.bid <= q.ask, { message: 'bid must not exceed ask' });

const levelSchema = z.tuple([z.number().finite().positive(), z.number().finite().nonnegative()]);

export const orderBookSchema = z.object({
  venue: venueSchema,
  bids: z.array(levelSchema),
  asks: z.array(levelSchema),
  receivedAt: z.number().int().nonnegative(),
});

export function parseQuote(input: unknown): Quote {
  const parsed = quoteSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidQuoteError(input, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return Object.freeze({ ...parsed.data });
}

export function parseOrderBook(input: unknown): OrderBook {
  const parsed = orderBookSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidQuoteError(input, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

export const quoteAgeMs = (quote: Quote | undefined, nowMs: number): number =>
  (quote ? Math.max(0, nowMs - quote.receivedAt) : Number.POSITIVE_INFINITY);
