import { describe, expect, it } from 'vitest';
import { averageFillPrice, estimateSlippage } from '../src/domain/spread/orderBook.js';
import { OrderBook } from '../src/types.js';

const book: OrderBook = {
  venue: 'V1',
  bids: [[99.8, 2], [99.9, 1]],
  asks: [[100.2, 2], [100, 1]],
  receivedAt: 1,
};

describe('order book slippage', () => {
  it('walks levels best-first for a volume-weighted price', () => {
    expect(averageFillPrice(book.asks, 1, 'buy')).toBe(100);
    expect(averageFillPrice(book.asks, 2, 'buy')).toBeCloseTo(100.1, 10);
    expect(averageFillPrice(book.bids, 2, 'sell')).toBeCloseTo(99.85, 10);
  });

  it('prices volume beyond the book at the last level', () => {
    expect(averageFillPrice(book.asks, 4, 'buy')).toBeCloseTo((100 + 100.2 * 3) / 4, 10);
  });

  it('reports slippage against the best price, never negative', () => {
    expect(estimateSlippage(book, 'buy', 1, 0.01)).toBe(0);
    expect(estimateSlippage(book, 'buy', 2, 0.01)).toBeCloseTo(100.1 / 100 - 1, 10);
    expect(estimateSlippage(book, 'sell', 2, 0.01)).toBeCloseTo(1 - 99.85 / 99.9, 10);
  });

  it('falls back when there is no depth to walk', () => {
    expect(estimateSlippage(undefined, 'buy', 1, 0.0001)).toBe(0.0001);
    expect(estimateSlippage({ ...book, asks: [] }, 'buy', 1, 0.0002)).toBe(0.0002);
  });
});
