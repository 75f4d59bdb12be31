import { describe, expect, it } from 'vitest';
import { FeeEngine } from '../src/domain/fee/feeEngine.js';
import { LegFill, PairFill } from '../src/types.js';

const feeEngine = new FeeEngine({ feeRates: { V1: 0.00006, V2: 0.00005 } });

const leg = (venue: LegFill['venue'], side: LegFill['side'], price: number, fee: number): LegFill => ({
  venue,
  side,
  contracts: 1,
  price,
  fee,
  orderRef: `${venue}-${side}-${price}`,
  filledAt: '2026-01-05T12:00:00.000Z',
});

const pair = (id: string, buy: LegFill, sell: LegFill): PairFill => ({
  id,
  contracts: 1,
  legs: [buy, sell],
  recordedAt: '2026-01-05T12:00:00.000Z',
});

describe('FeeEngine', () => {
  it('computes per-venue taker fees', () => {
    expect(feeEngine.calculateLegFee('V1', 1000)).toBe(0.06);
    expect(feeEngine.calculateLegFee('V2', 1000)).toBe(0.05);
  });

  it('throws for negative notional', () => {
    expect(() => feeEngine.calculateLegFee('V1', -1)).toThrow();
  });

  it('nets four legs of fees out of the realized round trip', () => {
    const pnl = feeEngine.computeRealizedPnl({
      entryFills: [pair('entry', leg('V1', 'buy', 100, 0.006), leg('V2', 'sell', 101, 0.00505))],
      exitFills: [pair('exit', leg('V2', 'buy', 100.5, 0.005025), leg('V1', 'sell', 100.4, 0.006024))],
    });

    expect(pnl.gross).toBe(0.9);
    expect(pnl.feeBreakdown).toEqual({ entry: 0.01105, exit: 0.011049 });
    expect(pnl.fees).toBe(0.022099);
    expect(pnl.net).toBe(0.877901);
    expect(pnl.returnPct).toBe(0.877901);
  });

  it('reports the spread a paired fill actually captured', () => {
    const fill = pair('entry', leg('V1', 'buy', 100, 0), leg('V2', 'sell', 100.5, 0));
    expect(feeEngine.realizedSpread(fill)).toBeCloseTo(0.005, 12);
    expect(feeEngine.notional(fill)).toBe(200.5);
  });
});
