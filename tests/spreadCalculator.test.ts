import { describe, expect, it } from 'vitest';
import { parseQuote } from '../src/domain/spread/quote.js';
import {
  bestEntry,
  computeSpreads,
  entryLegs,
  exitLegs,
  grossEntrySpread,
  grossExitSpread,
  planLegs,
  toPercent,
} from '../src/domain/spread/spreadCalculator.js';
import { quote } from './helpers.js';

const v1 = quote('V1', 99.9, 99.95, 1_000);
const v2 = quote('V2', 100.5, 100.55, 1_000);

describe('spread calculator', () => {
  it('prices V1→V2 entry as buy V1 at ask, sell V2 at bid', () => {
    const spread = grossEntrySpread('V1_TO_V2', v1, v2);
    expect(spread).toBeCloseTo((100.5 - 99.95) / 99.95, 12);
    expect(toPercent(spread)).toBe(0.5503);
  });

  it('prices the reverse direction from the opposite sides', () => {
    expect(grossEntrySpread('V2_TO_V1', v1, v2)).toBeCloseTo((99.9 - 100.55) / 100.55, 12);
  });

  it('prices exits off the closing crossing', () => {
    expect(grossExitSpread('V1_TO_V2', v1, v2)).toBeCloseTo((99.9 - 100.55) / 100.55, 12);
    expect(grossExitSpread('V2_TO_V1', v1, v2)).toBeCloseTo((100.5 - 99.95) / 99.95, 12);
  });

  it('subtracts the per-direction offset from entry spreads only', () => {
    const spreads = computeSpreads(v1, v2, { V1_TO_V2: 0.001, V2_TO_V1: 0 });
    expect(spreads.V1_TO_V2.grossEntrySpread).toBeCloseTo((100.5 - 99.95) / 99.95 - 0.001, 12);
    expect(spreads.V1_TO_V2.grossExitSpread).toBeCloseTo((99.9 - 100.55) / 100.55, 12);
  });

  it('is a pure function of the two quotes', () => {
    const frozenV1 = parseQuote(v1);
    const frozenV2 = parseQuote(v2);
    const first = computeSpreads(frozenV1, frozenV2);
    const second = computeSpreads(frozenV1, frozenV2);

    expect(second).toEqual(first);
    expect(Object.isFrozen(frozenV1)).toBe(true);
    expect(frozenV1).toEqual(v1);
  });

  it('picks the direction with the higher entry spread', () => {
    expect(bestEntry(computeSpreads(v1, v2)).direction).toBe('V1_TO_V2');

    const flipped = computeSpreads(quote('V1', 100.5, 100.55, 1), quote('V2', 99.9, 99.95, 1));
    expect(bestEntry(flipped).direction).toBe('V2_TO_V1');
  });

  it('plans legs that invert between entry and exit', () => {
    expect(entryLegs('V1_TO_V2')).toEqual({ buy: 'V1', sell: 'V2' });
    expect(exitLegs('V1_TO_V2')).toEqual({ buy: 'V2', sell: 'V1' });

    expect(planLegs('V1_TO_V2', 'ENTRY', v1, v2)).toEqual([
      { venue: 'V1', side: 'buy', price: 99.95 },
      { venue: 'V2', side: 'sell', price: 100.5 },
    ]);
    expect(planLegs('V1_TO_V2', 'EXIT', v1, v2)).toEqual([
      { venue: 'V2', side: 'buy', price: 100.55 },
      { venue: 'V1', side: 'sell', price: 99.9 },
    ]);
  });

  it('refuses crossed or non-positive quotes', () => {
    expect(() => grossEntrySpread('V1_TO_V2', quote('V1', 100, 99, 1), v2)).toThrow(/Invalid quote/);
    expect(() => grossExitSpread('V1_TO_V2', v1, quote('V2', 0, 100, 1))).toThrow(/Invalid quote/);
    expect(() => parseQuote({ venue: 'V1', bid: -1, ask: 100, receivedAt: 1 })).toThrow(/Invalid quote/);
  });
});
