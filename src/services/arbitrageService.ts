import { PositionLedger, remainingContracts } from '../domain/ledger/positionLedger.js';
import { RiskManager } from '../domain/risk/riskManager.js';
import { quoteAgeMs } from '../domain/spread/quote.js';
import { bestEntry, computeSpreads, toPercent } from '../domain/spread/spreadCalculator.js';
import { SpreadHistory, SpreadPoint, SpreadStatistics } from '../domain/spread/spreadHistory.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import {
  DecisionEvent,
  Direction,
  ExecutionMode,
  Position,
  PositionState,
  Quote,
  RiskState,
  SessionMetrics,
  SpreadPair,
  ThresholdConfig,
  ThresholdUpdate,
  Venue,
} from '../types.js';
import { Clock, elapsedMs, isoAt, systemClock } from '../utils/time.js';
import { ConfigManager } from './configManager.js';
import { DecisionEngine, EntryCandidate, HaltState } from './decisionEngine.js';
import { DecisionJournal, DecisionQueryOpts } from './decisionJournal.js';
import { PriceFeedPort } from './marketFeeds.js';

export interface ArbitrageServiceDeps {
  store: StateStore;
  ledger: PositionLedger;
  risk: RiskManager;
  engine: DecisionEngine;
  configManager: ConfigManager;
  journal: DecisionJournal;
  history: SpreadHistory;
  prices: PriceFeedPort;
  logger: EventLogger;
  clock?: Clock;
}

export type PositionIssue = 'too_old' | 'should_close' | 'pending_unwind' | 'close_requested';

export interface PositionView extends Position {
  ageMs: number;
  remainingContracts: number;
  currentExitSpread: number | null;
  issues: PositionIssue[];
}

export interface SpreadView {
  at: string;
  quotes: Partial<Record<Venue, Quote>>;
  ageMs: Record<Venue, number | null>;
  stale: Record<Venue, boolean>;
  spreads: SpreadPair | null;
  percent: Record<Direction, { entry: number; exit: number }> | null;
  bestDirection: Direction | null;
  candidate: EntryCandidate | null;
}

export interface StatusView {
  name: string;
  at: string;
  mode: ExecutionMode;
  configVersion: number;
  tradingEnabled: boolean;
  halted: HaltState | null;
  positions: Record<PositionState, number>;
  metrics: SessionMetrics;
  session: {
    trades: number;
    realizedPnl: number;
    fees: number;
    volume: number;
    winRate: number;
  };
}

const finiteOrNull = (value: number): number | null => (Number.isFinite(value) ? value : null);

/**
 * Read-only snapshots and the operator command surface. Every value handed out
 * is a copy; nothing here exposes live engine state.
 */
export class ArbitrageService {
  private readonly clock: Clock;

  constructor(private readonly deps: ArbitrageServiceDeps, private readonly name = 'spread-arbitrage-engine') {
    this.clock = deps.clock ?? systemClock;
  }

  getStatus(): StatusView {
    const { store, configManager, engine } = this.deps;
    const state = store.snapshot();
    const positions = Object.values(state.positions);

    const byState: Record<PositionState, number> = { OPENING: 0, OPEN: 0, CLOSING: 0, CLOSED: 0, FAILED_OPEN: 0 };
    for (const position of positions) byState[position.state] += 1;

    const metrics = engine.sessionMetrics();
    const trades = metrics.settledTrades;

    return {
      name: this.name,
      at: isoAt(this.clock()),
      mode: configManager.currentMode(),
      configVersion: configManager.currentConfig().version,
      tradingEnabled: state.risk.tradingEnabled,
      halted: engine.halted,
      positions: byState,
      metrics,
      session: {
        trades,
        realizedPnl: metrics.totalRealizedPnl,
        fees: metrics.totalFees,
        volume: metrics.totalVolume,
        winRate: trades > 0 ? Number((metrics.winningTrades / trades).toFixed(4)) : 0,
      },
    };
  }

  getMetrics(): SessionMetrics {
    return this.deps.engine.sessionMetrics();
  }

  getSpreads(): SpreadView {
    const { prices, configManager, engine } = this.deps;
    const now = this.clock();
    const config = configManager.currentConfig();
    const v1 = prices.latestQuote('V1');
    const v2 = prices.latestQuote('V2');
    const ageV1 = quoteAgeMs(v1, now);
    const ageV2 = quoteAgeMs(v2, now);

    const spreads = v1 && v2 ? computeSpreads(v1, v2, config.spreadOffsets) : null;
    const percent = spreads
      ? {
        V1_TO_V2: {
          entry: toPercent(spreads.V1_TO_V2.grossEntrySpread),
          exit: toPercent(spreads.V1_TO_V2.grossExitSpread),
        },
        V2_TO_V1: {
          entry: toPercent(spreads.V2_TO_V1.grossEntrySpread),
          exit: toPercent(spreads.V2_TO_V1.grossExitSpread),
        },
      }
      : null;

    return {
      at: isoAt(now),
      quotes: { ...(v1 ? { V1: { ...v1 } } : {}), ...(v2 ? { V2: { ...v2 } } : {}) },
      ageMs: { V1: finiteOrNull(ageV1), V2: finiteOrNull(ageV2) },
      stale: { V1: ageV1 > config.quoteFreshnessMs, V2: ageV2 > config.quoteFreshnessMs },
      spreads,
      percent,
      bestDirection: spreads ? bestEntry(spreads).direction : null,
      candidate: engine.pendingCandidate() ?? null,
    };
  }

  getSpreadHistory(limit = 100): { points: SpreadPoint[]; statistics: SpreadStatistics } {
    return {
      points: this.deps.history.recent(limit),
      statistics: this.deps.history.statistics(),
    };
  }

  listPositions(filter: { state?: PositionState } = {}): PositionView[] {
    const now = this.clock();
    const config = this.deps.configManager.currentConfig();
    const spreads = this.currentSpreads(config);

    return this.deps.ledger.list()
      .filter((position) => !filter.state || position.state === filter.state)
      .map((position) => this.toView(position, now, config, spreads));
  }

  getPosition(positionId: string): PositionView | undefined {
    const position = this.deps.ledger.get(positionId);
    if (!position) return undefined;
    const config = this.deps.configManager.currentConfig();
    return this.toView(position, this.clock(), config, this.currentSpreads(config));
  }

  getRisk(): RiskState & { dailyLossLimit: number; remainingLossBudget: number } {
    const risk = this.deps.risk.snapshot();
    const limit = this.deps.configManager.currentConfig().dailyLossLimit;
    return {
      ...risk,
      dailyLossLimit: limit,
      remainingLossBudget: Number(Math.max(0, limit - risk.dailyLoss).toFixed(8)),
    };
  }

  listDecisions(opts: DecisionQueryOpts = {}): DecisionEvent[] {
    return this.deps.journal.list(opts);
  }

  currentConfig(): ThresholdConfig {
    return { ...this.deps.configManager.currentConfig() };
  }

  async pauseTrading(reason = 'operator_pause'): Promise<RiskState> {
    const risk = await this.deps.risk.pause(reason);
    await this.deps.journal.record({ kind: 'risk_disabled', reason, details: { source: 'operator' } });
    return risk;
  }

  /** Re-arms the risk gate and clears an invariant halt. */
  async resumeTrading(): Promise<RiskState> {
    await this.deps.engine.clearHalt();
    const risk = await this.deps.risk.resume();
    await this.deps.logger.log('info', 'operator.trading_resumed', { dailyLoss: risk.dailyLoss });
    return risk;
  }

  async closePosition(positionId: string, reason = 'operator_close'): Promise<Position> {
    const position = await this.deps.ledger.requestClose(positionId, reason);
    await this.deps.logger.log('info', 'operator.close_requested', { positionId, state: position.state });
    return position;
  }

  async updateThresholds(update: ThresholdUpdate): Promise<ThresholdConfig> {
    return this.deps.configManager.updateThresholds(update);
  }

  async setMode(mode: ExecutionMode): Promise<ExecutionMode> {
    return this.deps.configManager.setMode(mode);
  }

  private currentSpreads(config: ThresholdConfig): SpreadPair | null {
    const v1 = this.deps.prices.latestQuote('V1');
    const v2 = this.deps.prices.latestQuote('V2');
    return v1 && v2 ? computeSpreads(v1, v2, config.spreadOffsets) : null;
  }

  private toView(position: Position, now: number, config: ThresholdConfig, spreads: SpreadPair | null): PositionView {
    const ageMs = Math.max(0, elapsedMs(position.openedAt, now));
    const remaining = remainingContracts(position);
    const exitSpread = spreads ? spreads[position.direction].grossExitSpread : null;
    const live = position.state === 'OPEN' || position.state === 'CLOSING';

    const issues: PositionIssue[] = [];
    if (live && ageMs > config.maxPositionAgeMs) issues.push('too_old');
    if (position.state === 'OPEN' && exitSpread !== null && exitSpread >= position.exitSpreadTarget) {
      issues.push('should_close');
    }
    if (position.state === 'FAILED_OPEN' && remaining > 0) issues.push('pending_unwind');
    if (position.closeRequested && position.state !== 'CLOSED') issues.push('close_requested');

    return {
      ...position,
      ageMs,
      remainingContracts: remaining,
      currentExitSpread: exitSpread,
      issues,
    };
  }
}
