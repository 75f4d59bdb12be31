import { InvalidQuoteError } from './quote.js';
import { Direction, DirectionalSpread, OrderSide, Quote, SpreadPair, Venue } from '../../types.js';

export interface LegPlan {
  venue: Venue;
  side: OrderSide;
  /** Top-of-book price the leg crosses. */
  price: number;
}

/** Buy/sell venues when opening a position in `direction`. */
export const entryLegs = (direction: Direction): { buy: Venue; sell: Venue } =>
  (direction === 'V1_TO_V2' ? { buy: 'V1', sell: 'V2' } : { buy: 'V2', sell: 'V1' });

/** Closing inverts both legs. */
export const exitLegs = (direction: Direction): { buy: Venue; sell: Venue } => {
  const entry = entryLegs(direction);
  return { buy: entry.sell, sell: entry.buy };
};

const quoteFor = (venue: Venue, v1: Quote, v2: Quote): Quote => (venue === 'V1' ? v1 : v2);

/**
 * Legs for a paired order, priced from the side of the book each leg crosses:
 * buys lift the ask, sells hit the bid.
 */
export const planLegs = (
  direction: Direction,
  purpose: 'ENTRY' | 'EXIT',
  v1: Quote,
  v2: Quote,
): [LegPlan, LegPlan] => {
  const { buy, sell } = purpose === 'ENTRY' ? entryLegs(direction) : exitLegs(direction);
  return [
    { venue: buy, side: 'buy', price: quoteFor(buy, v1, v2).ask },
    { venue: sell, side: 'sell', price: quoteFor(sell, v1, v2).bid },
  ];
};

const crossing = (buyAsk: number, sellBid: number): number => (sellBid - buyAsk) / buyAsk;

const assertUsable = (quote: Quote): void => {
  if (!(quote.bid > 0) || !(quote.ask > 0) || quote.bid > quote.ask) {
    throw new InvalidQuoteError(quote);
  }
};

export function grossEntrySpread(direction: Direction, v1: Quote, v2: Quote, offset = 0): number {
  assertUsable(v1);
  assertUsable(v2);
  const { buy, sell } = entryLegs(direction);
  return crossing(quoteFor(buy, v1, v2).ask, quoteFor(sell, v1, v2).bid) - offset;
}

export function grossExitSpread(direction: Direction, v1: Quote, v2: Quote): number {
  assertUsable(v1);
  assertUsable(v2);
  const { buy, sell } = exitLegs(direction);
  return crossing(quoteFor(buy, v1, v2).ask, quoteFor(sell, v1, v2).bid);
}

export function computeSpreads(
  v1: Quote,
  v2: Quote,
  offsets: Record<Direction, number> = { V1_TO_V2: 0, V2_TO_V1: 0 },
): SpreadPair {
  const build = (direction: Direction): DirectionalSpread => ({
    direction,
    grossEntrySpread: grossEntrySpread(direction, v1, v2, offsets[direction]),
    grossExitSpread: grossExitSpread(direction, v1, v2),
  });

  return {
    V1_TO_V2: build('V1_TO_V2'),
    V2_TO_V1: build('V2_TO_V1'),
  };
}

/** Ties go to V1_TO_V2. */
export const bestEntry = (spreads: SpreadPair): DirectionalSpread =>
  (spreads.V2_TO_V1.grossEntrySpread > spreads.V1_TO_V2.grossEntrySpread ? spreads.V2_TO_V1 : spreads.V1_TO_V2);

export const toPercent = (fraction: number, digits = 4): number => Number((fraction * 100).toFixed(digits));
