import { BookLevel, OrderBook, OrderSide } from '../../types.js';

/**
 * Volume-weighted price for taking `contracts` off `levels`. Levels are walked
 * best-first; volume beyond the visible book is priced at the last level.
 */
export function averageFillPrice(levels: BookLevel[], contracts: number, side: OrderSide): number {
  if (levels.length === 0 || contracts <= 0) return 0;

  const sorted = [...levels].sort((a, b) => (side === 'buy' ? a[0] - b[0] : b[0] - a[0]));

  let remaining = contracts;
  let cost = 0;
  for (const [price, size] of sorted) {
    if (remaining <= 0) break;
    const take = Math.min(size, remaining);
    cost += price * take;
    remaining -= take;
  }

  if (remaining > 0) {
    cost += sorted[sorted.length - 1][0] * remaining;
  }

  return cost / contracts;
}

/**
 * Expected slippage as a non-negative fraction of the best price.
 * Returns `fallback` when the book has no depth on the side being taken.
 */
export function estimateSlippage(
  book: OrderBook | undefined,
  side: OrderSide,
  contracts: number,
  fallback: number,
): number {
  const levels = side === 'buy' ? book?.asks : book?.bids;
  if (!levels || levels.length === 0) return fallback;

  const best = side === 'buy'
    ? Math.min(...levels.map(([price]) => price))
    : Math.max(...levels.map(([price]) => price));
  const avg = averageFillPrice(levels, contracts, side);
  if (!(avg > 0) || !(best > 0)) return fallback;

  const slippage = side === 'buy' ? avg / best - 1 : 1 - avg / best;
  return Math.max(0, slippage);
}
