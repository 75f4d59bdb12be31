import { eventBus } from '../../infra/eventBus.js';
import { EventLogger } from '../../infra/logger.js';
import { StateStore } from '../../infra/storage/stateStore.js';
import { AccountState, Direction, RiskState, ThresholdConfig, VENUES, Venue } from '../../types.js';
import { Clock, dayKey, isoAt, nextUtcMidnight, systemClock } from '../../utils/time.js';

export type RiskRejection =
  | 'max_concurrent_positions'
  | 'max_position_contracts'
  | 'insufficient_margin';

export interface RiskDecision {
  approved: boolean;
  reason?: RiskRejection;
  details?: Record<string, unknown>;
}

export interface CapacityInput {
  config: ThresholdConfig;
  direction: Direction;
  /** Active positions plus failed opens still holding contracts. */
  activePositions: number;
  directionContracts: number;
  increment: number;
}

const clamp = (v: number): number => Number(v.toFixed(8));

/**
 * Daily realized-loss gate. Unrealized exposure is bounded separately by the
 * contract ceiling. A disabled gate blocks entries only; exits never consult it.
 */
export class RiskManager {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly thresholds: () => Pick<ThresholdConfig, 'dailyLossLimit'>,
    private readonly clock: Clock = systemClock,
  ) {}

  snapshot(): RiskState {
    return this.store.read((state) => state.risk);
  }

  checkTradingAllowed(): boolean {
    return this.store.read((state) => state.risk.tradingEnabled);
  }

  /** Concurrency and per-direction contract ceiling. */
  checkPositionCapacity(input: CapacityInput): RiskDecision {
    const { config } = input;

    if (input.activePositions >= config.maxConcurrentPositions) {
      return {
        approved: false,
        reason: 'max_concurrent_positions',
        details: { activePositions: input.activePositions, max: config.maxConcurrentPositions },
      };
    }

    const projected = clamp(input.directionContracts + input.increment);
    if (projected > config.maxPositionContracts) {
      return {
        approved: false,
        reason: 'max_position_contracts',
        details: { direction: input.direction, projected, max: config.maxPositionContracts },
      };
    }

    return { approved: true };
  }

  /** Venues without a known account state are not gated. */
  checkMargin(
    requiredMargin: Partial<Record<Venue, number>>,
    accounts: Partial<Record<Venue, AccountState>>,
  ): RiskDecision {
    for (const venue of VENUES) {
      const required = requiredMargin[venue];
      const account = accounts[venue];
      if (account && required !== undefined && account.availableMargin < required) {
        return {
          approved: false,
          reason: 'insufficient_margin',
          details: { venue, required: clamp(required), available: account.availableMargin },
        };
      }
    }

    return { approved: true };
  }

  /** Rolls the loss counter when wall-clock crosses the UTC day boundary. */
  async dailyResetIfNeeded(nowMs: number = this.clock()): Promise<boolean> {
    if (nowMs < new Date(this.snapshot().dayBoundaryAt).getTime()) return false;

    const reset = await this.store.transaction((state) => this.rollDay(state.risk, nowMs));
    if (reset) {
      await this.logger.log('info', 'risk.daily_reset', { dayKey: dayKey(nowMs) });
    }
    return reset;
  }

  async onTradeClosed(realizedPnl: number, nowMs: number = this.clock()): Promise<RiskState> {
    const limit = this.thresholds().dailyLossLimit;

    const { risk, tripped } = await this.store.transaction((state) => {
      const r = state.risk;
      this.rollDay(r, nowMs);

      r.tradesToday += 1;
      r.realizedPnlToday = clamp(r.realizedPnlToday + realizedPnl);

      if (realizedPnl < 0) {
        r.dailyLoss = clamp(r.dailyLoss - realizedPnl);
        r.consecutiveLosses += 1;
      } else {
        r.consecutiveLosses = 0;
      }

      let justTripped = false;
      if (r.tradingEnabled && r.dailyLoss >= limit) {
        r.tradingEnabled = false;
        r.disabledReason = 'daily_loss_limit';
        r.disabledAt = isoAt(nowMs);
        justTripped = true;
      }

      return { risk: structuredClone(r), tripped: justTripped };
    });

    if (tripped) {
      eventBus.emit('risk.disabled', { reason: 'daily_loss_limit', dailyLoss: risk.dailyLoss, limit });
      await this.logger.log('error', 'risk.daily_loss_limit_reached', { dailyLoss: risk.dailyLoss, limit });
    }

    return risk;
  }

  async pause(reason = 'operator_pause'): Promise<RiskState> {
    const risk = await this.store.transaction((state) => {
      if (state.risk.tradingEnabled) {
        state.risk.tradingEnabled = false;
        state.risk.disabledReason = reason;
        state.risk.disabledAt = isoAt(this.clock());
      }
      return structuredClone(state.risk);
    });

    eventBus.emit('risk.disabled', { reason });
    await this.logger.log('warn', 'risk.trading_paused', { reason });
    return risk;
  }

  /** Operator re-arm. Also clears a fatal halt. */
  async resume(): Promise<RiskState> {
    const risk = await this.store.transaction((state) => {
      state.risk.tradingEnabled = true;
      state.risk.disabledReason = null;
      state.risk.disabledAt = null;
      state.risk.fatal = false;
      return structuredClone(state.risk);
    });

    eventBus.emit('risk.rearmed', { dailyLoss: risk.dailyLoss });
    await this.logger.log('info', 'risk.trading_resumed', { dailyLoss: risk.dailyLoss });
    return risk;
  }

  async haltForInvariant(reason: string): Promise<RiskState> {
    const risk = await this.store.transaction((state) => {
      state.risk.tradingEnabled = false;
      state.risk.fatal = true;
      state.risk.disabledReason = reason;
      state.risk.disabledAt = isoAt(this.clock());
      return structuredClone(state.risk);
    });

    eventBus.emit('risk.disabled', { reason, fatal: true });
    await this.logger.log('error', 'risk.invariant_halt', { reason });
    return risk;
  }

  private rollDay(risk: RiskState, nowMs: number): boolean {
    if (nowMs < new Date(risk.dayBoundaryAt).getTime()) return false;

    risk.dailyLoss = 0;
    risk.realizedPnlToday = 0;
    risk.tradesToday = 0;
    risk.consecutiveLosses = 0;
    risk.dayKey = dayKey(nowMs);
    risk.dayBoundaryAt = isoAt(nextUtcMidnight(nowMs));
    return true;
  }
}
