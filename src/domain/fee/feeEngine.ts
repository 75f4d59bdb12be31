import { AppConfig } from '../../config.js';
import { LegFill, PairFill, Position, Venue } from '../../types.js';

export interface TradePnl {
  gross: number;
  fees: number;
  net: number;
  returnPct: number;
  feeBreakdown: {
    entry: number;
    exit: number;
  };
}

const round = (v: number): number => Number(v.toFixed(8));

const legCashFlow = (leg: LegFill): number => (leg.side === 'sell' ? 1 : -1) * leg.price * leg.contracts;

const sumFlows = (fills: PairFill[]): number =>
  fills.reduce((sum, fill) => sum + fill.legs.reduce((acc, leg) => acc + legCashFlow(leg), 0), 0);

const sumFees = (fills: PairFill[]): number =>
  fills.reduce((sum, fill) => sum + fill.legs.reduce((acc, leg) => acc + leg.fee, 0), 0);

export class FeeEngine {
  constructor(private readonly config: Pick<AppConfig['trading'], 'feeRates'>) {}

  feeRate(venue: Venue): number {
    return this.config.feeRates[venue];
  }

  calculateLegFee(venue: Venue, notional: number): number {
    if (notional < 0) throw new Error('Notional cannot be negative');
    return round(notional * this.feeRate(venue));
  }

  /**
   * Realized PnL over every recorded leg. Fees only enter here; spreads used
   * for decisions stay gross.
   */
  computeRealizedPnl(position: Pick<Position, 'entryFills' | 'exitFills'>): TradePnl {
    const gross = sumFlows(position.entryFills) + sumFlows(position.exitFills);
    const entryFees = sumFees(position.entryFills);
    const exitFees = sumFees(position.exitFills);
    const fees = entryFees + exitFees;
    const net = gross - fees;

    const entryCost = position.entryFills.reduce(
      (sum, fill) => sum + fill.legs.filter((leg) => leg.side === 'buy').reduce((acc, leg) => acc + leg.price * leg.contracts, 0),
      0,
    );

    return {
      gross: round(gross),
      fees: round(fees),
      net: round(net),
      returnPct: entryCost > 0 ? round((net / entryCost) * 100) : 0,
      feeBreakdown: {
        entry: round(entryFees),
        exit: round(exitFees),
      },
    };
  }

  /** Spread actually captured by a paired fill: sell over buy, minus one. */
  realizedSpread(fill: PairFill): number {
    const buy = fill.legs.find((leg) => leg.side === 'buy');
    const sell = fill.legs.find((leg) => leg.side === 'sell');
    if (!buy || !sell || buy.price <= 0) return 0;
    return sell.price / buy.price - 1;
  }

  notional(fill: PairFill): number {
    return round(fill.legs.reduce((sum, leg) => sum + leg.price * leg.contracts, 0));
  }
}
