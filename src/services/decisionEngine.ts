import { FeeEngine } from '../domain/fee/feeEngine.js';
import { PositionLedger, remainingContracts } from '../domain/ledger/positionLedger.js';
import { RiskManager } from '../domain/risk/riskManager.js';
import { estimateSlippage } from '../domain/spread/orderBook.js';
import { quoteAgeMs } from '../domain/spread/quote.js';
import { bestEntry, computeSpreads, planLegs } from '../domain/spread/spreadCalculator.js';
import { SpreadHistory } from '../domain/spread/spreadHistory.js';
import {
  DomainError,
  ErrorCode,
  InvariantViolationError,
  PartialFillTimeoutError,
  PortUnavailableError,
  RiskLimitBreachedError,
  SlippageExceededError,
  StaleDataError,
  describeError,
  errorCodeOf,
} from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import {
  AccountState,
  DecisionEvent,
  Direction,
  EntryOutcome,
  OrderPurpose,
  Position,
  Quote,
  SessionMetrics,
  SpreadPair,
  ThresholdConfig,
  TickReport,
  VENUES,
  Venue,
} from '../types.js';
import { Clock, isoAt, systemClock } from '../utils/time.js';
import { ConfigManager } from './configManager.js';
import { DecisionInput, DecisionJournal } from './decisionJournal.js';
import { ExecutionCoordinator } from './execution/executionCoordinator.js';
import { AccountFeedPort, PriceFeedPort } from './marketFeeds.js';

export interface DecisionEngineDeps {
  configManager: ConfigManager;
  prices: PriceFeedPort;
  accounts: AccountFeedPort;
  ledger: PositionLedger;
  risk: RiskManager;
  coordinator: ExecutionCoordinator;
  feeEngine: FeeEngine;
  journal: DecisionJournal;
  history: SpreadHistory;
  store: StateStore;
  logger: EventLogger;
  clock?: Clock;
  persistence?: Partial<PersistenceOptions>;
}

export interface PersistenceOptions {
  /** Minimum spacing between writes of the tick counters to the state file. */
  metricsIntervalMs: number;
  retainClosedPositions: number;
}

export interface EntryCandidate {
  direction: Direction;
  spread: number;
  detectedAt: number;
}

export interface HaltState {
  reason: string;
  at: string;
}

/** Everything one tick reads, taken once so the whole tick sees the same values. */
interface TickSnapshot {
  now: number;
  config: ThresholdConfig;
  quotes?: Record<Venue, Quote>;
  spreads: SpreadPair | null;
  ages: Record<Venue, number>;
  stale: Record<Venue, boolean>;
}

interface Block {
  reason: string;
  details?: Record<string, unknown>;
}

interface TickScratch {
  events: DecisionEvent[];
  exitsCommitted: string[];
  entriesCommitted: number;
}

/** Tick counters not yet written to the state file. */
interface PendingMetrics {
  ticks: number;
  entriesCommitted: number;
  exitsCommitted: number;
  lastTickAt?: string;
}

const EPSILON = 1e-9;

const DEFAULT_PERSISTENCE: PersistenceOptions = {
  metricsIntervalMs: 5_000,
  retainClosedPositions: 500,
};

const emptyPending = (): PendingMetrics => ({ ticks: 0, entriesCommitted: 0, exitsCommitted: 0 });

const blockFrom = (error: DomainError): Block => ({
  reason: error.code,
  details: { ...error.details, message: error.message },
});

/**
 * Tick-driven entry and exit decisions. A tick reads the latest quotes and
 * one config snapshot, decides, and launches order operations without
 * waiting for them; `settle()` waits for whatever is still in flight.
 */
export class DecisionEngine {
  private candidate?: EntryCandidate;
  private lastEntryAt?: number;
  private halt: HaltState | null = null;
  private readonly operations = new Set<Promise<void>>();
  private lastEntryBlock?: string;
  private readonly exitBlocks = new Map<string, string>();
  private readonly topUpBlocks = new Map<string, string>();
  private pending: PendingMetrics = emptyPending();
  private lastMetricsWriteAt?: number;
  private readonly persistence: PersistenceOptions;
  private readonly clock: Clock;

  constructor(private readonly deps: DecisionEngineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.persistence = { ...DEFAULT_PERSISTENCE, ...deps.persistence };
  }

  get halted(): HaltState | null {
    return this.halt ? { ...this.halt } : null;
  }

  pendingCandidate(): EntryCandidate | undefined {
    return this.candidate ? { ...this.candidate } : undefined;
  }

  inFlightOperations(): number {
    return this.operations.size;
  }

  async tick(now: number = this.clock()): Promise<TickReport> {
    const { configManager, risk, coordinator, history } = this.deps;
    const scratch: TickScratch = { events: [], exitsCommitted: [], entriesCommitted: 0 };
    const config = configManager.currentConfig();

    if (this.halt) {
      return this.report(now, config, null, { V1: true, V2: true }, {
        status: 'blocked',
        reason: `halted: ${this.halt.reason}`,
      }, scratch);
    }

    let snapshot: TickSnapshot | undefined;
    let entry: EntryOutcome = { status: 'no_opportunity', reason: 'not_evaluated' };
    try {
      await risk.dailyResetIfNeeded(now);
      await coordinator.sweep();

      snapshot = this.readSnapshot(now, config);
      if (snapshot.spreads) {
        history.record(now, snapshot.spreads, { V1: !snapshot.stale.V1, V2: !snapshot.stale.V2 });
      }

      await this.reviewOpening(snapshot, scratch);
      entry = await this.evaluateEntry(snapshot, scratch);
      await this.evaluateExits(snapshot, scratch);
      await this.unwindFailedOpens(snapshot, scratch);
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        await this.haltTrading(error, scratch);
      } else {
        await this.deps.logger.log('error', 'decision.tick_error', { error: describeError(error) });
        throw error;
      }
    } finally {
      await this.recordTickMetrics(now, scratch);
    }

    return this.report(
      now,
      config,
      snapshot?.spreads ?? null,
      snapshot?.stale ?? { V1: true, V2: true },
      entry,
      scratch,
    );
  }

  /** Waits until every launched order operation has finished. */
  async settle(): Promise<void> {
    while (this.operations.size > 0) {
      await Promise.all([...this.operations]);
    }
  }

  /** Persisted session metrics with the counters not yet written folded in. */
  sessionMetrics(): SessionMetrics {
    const stored = this.deps.store.read((state) => state.metrics);
    return {
      ...stored,
      ticks: stored.ticks + this.pending.ticks,
      entriesCommitted: stored.entriesCommitted + this.pending.entriesCommitted,
      exitsCommitted: stored.exitsCommitted + this.pending.exitsCommitted,
      lastTickAt: this.pending.lastTickAt ?? stored.lastTickAt,
      blockedByReason: this.deps.journal.reasonCounts(),
    };
  }

  /** Writes buffered tick counters to the state file. Called on shutdown. */
  async flushMetrics(now: number = this.clock()): Promise<void> {
    const pending = this.pending;
    this.pending = emptyPending();
    this.lastMetricsWriteAt = now;
    const counts = this.deps.journal.reasonCounts();

    await this.deps.store.transaction((state) => {
      state.metrics.ticks += pending.ticks;
      state.metrics.entriesCommitted += pending.entriesCommitted;
      state.metrics.exitsCommitted += pending.exitsCommitted;
      if (pending.lastTickAt) state.metrics.lastTickAt = pending.lastTickAt;
      state.metrics.blockedByReason = counts;
      return undefined;
    });
  }

  /** Operator acknowledgement of a fatal halt. Risk re-arm is separate. */
  async clearHalt(): Promise<boolean> {
    if (!this.halt) return false;
    const previous = this.halt;
    this.halt = null;
    await this.deps.logger.log('warn', 'decision.halt_cleared', { reason: previous.reason });
    return true;
  }

  private readSnapshot(now: number, config: ThresholdConfig): TickSnapshot {
    const v1 = this.deps.prices.latestQuote('V1');
    const v2 = this.deps.prices.latestQuote('V2');
    const ages = { V1: quoteAgeMs(v1, now), V2: quoteAgeMs(v2, now) };
    const stale = { V1: ages.V1 > config.quoteFreshnessMs, V2: ages.V2 > config.quoteFreshnessMs };

    if (!v1 || !v2) {
      return { now, config, spreads: null, ages, stale };
    }

    return {
      now,
      config,
      quotes: { V1: v1, V2: v2 },
      spreads: computeSpreads(v1, v2, config.spreadOffsets),
      ages,
      stale,
    };
  }

  private async evaluateEntry(snapshot: TickSnapshot, scratch: TickScratch): Promise<EntryOutcome> {
    const { config, spreads, now } = snapshot;

    if (!spreads || !snapshot.quotes) {
      await this.discardCandidate('quote_missing', scratch);
      return this.blockEntry({ reason: 'quote_missing', details: { ages: snapshot.ages } }, scratch);
    }

    // A held candidate is judged on its own direction, not on whichever is best now.
    const direction = this.candidate?.direction ?? bestEntry(spreads).direction;
    const spread = spreads[direction].grossEntrySpread;

    if (!(spread > config.minSpreadEnter)) {
      await this.discardCandidate('spread_below_threshold', scratch, { spread });
      this.lastEntryBlock = undefined;
      return { status: 'no_opportunity', reason: 'spread_below_threshold', direction, spread };
    }

    const gate = this.entryGate(snapshot, direction);
    if (gate) {
      await this.discardCandidate(gate.reason, scratch, gate.details);
      return this.blockEntry({ ...gate, direction, details: { ...gate.details, spread } }, scratch);
    }

    if (!this.candidate) {
      this.candidate = { direction, spread, detectedAt: now };
      this.lastEntryBlock = undefined;
      await this.note({ kind: 'entry_candidate', reason: 'spread_above_threshold', direction, details: { spread } }, scratch);
      return { status: 'candidate', reason: 'confirmation_hold', direction, spread };
    }

    if (now - this.candidate.detectedAt < config.confirmationDelayMs) {
      return { status: 'waiting', reason: 'confirmation_hold', direction, spread };
    }

    const maxAge = Math.max(snapshot.ages.V1, snapshot.ages.V2);
    if (maxAge > config.confirmationStalenessMs) {
      await this.discardCandidate('confirmation_stale', scratch, { maxAgeMs: maxAge });
      return { status: 'discarded', reason: 'confirmation_stale', direction, spread };
    }

    const execution = this.executionGate(snapshot, direction, config.minOrderContracts);
    if (execution) {
      await this.discardCandidate(execution.reason, scratch, execution.details);
      return this.blockEntry({ ...execution, direction }, scratch);
    }

    this.candidate = undefined;
    this.lastEntryBlock = undefined;
    await this.commitEntry(snapshot, direction, spread, scratch);
    return { status: 'committed', reason: 'confirmed', direction, spread };
  }

  /** Gates that hold whether or not a candidate already exists. */
  private entryGate(snapshot: TickSnapshot, direction: Direction): Block | undefined {
    const { config, now } = snapshot;
    const { ledger, risk, coordinator, configManager } = this.deps;

    if (snapshot.stale.V1 || snapshot.stale.V2) {
      return blockFrom(new StaleDataError('Quote older than the freshness window.', {
        ages: snapshot.ages,
        freshnessMs: config.quoteFreshnessMs,
      }));
    }

    if (!risk.checkTradingAllowed()) {
      return blockFrom(new RiskLimitBreachedError('Trading is disabled.', {
        check: 'trading_disabled',
        disabledReason: risk.snapshot().disabledReason,
      }));
    }

    const capacity = risk.checkPositionCapacity({
      config,
      direction,
      activePositions: ledger.exposedCount(),
      directionContracts: ledger.directionContracts(direction),
      increment: config.minOrderContracts,
    });
    if (!capacity.approved) {
      return blockFrom(new RiskLimitBreachedError(`Entry exceeds ${capacity.reason ?? 'capacity'}.`, {
        check: capacity.reason,
        ...capacity.details,
      }));
    }

    if (this.lastEntryAt !== undefined && now - this.lastEntryAt < config.minOrderIntervalMs) {
      return { reason: 'rate_limited', details: { sinceLastEntryMs: now - this.lastEntryAt } };
    }

    if (!coordinator.hasPort(configManager.currentMode())) {
      return blockFrom(new PortUnavailableError('No execution port for the current mode.', {
        mode: configManager.currentMode(),
      }));
    }

    return undefined;
  }

  /** Depth and margin checks for `contracts`, run right before an entry order. */
  private executionGate(snapshot: TickSnapshot, direction: Direction, contracts: number): Block | undefined {
    const { config, quotes } = snapshot;
    if (!quotes) return { reason: 'quote_missing' };

    const legs = planLegs(direction, 'ENTRY', quotes.V1, quotes.V2);
    for (const leg of legs) {
      const slippage = estimateSlippage(
        this.deps.prices.latestBook(leg.venue),
        leg.side,
        contracts,
        config.fallbackSlippage,
      );
      if (slippage > config.maxSlippage) {
        return blockFrom(new SlippageExceededError(`Estimated slippage on ${leg.venue} exceeds the limit.`, {
          venue: leg.venue,
          side: leg.side,
          slippage,
          maxSlippage: config.maxSlippage,
        }));
      }
    }

    const requiredMargin: Partial<Record<Venue, number>> = {};
    for (const leg of legs) {
      requiredMargin[leg.venue] = leg.price * contracts;
    }
    const margin = this.deps.risk.checkMargin(requiredMargin, this.accountStates());
    if (!margin.approved) {
      return { reason: margin.reason ?? 'insufficient_margin', details: margin.details };
    }

    return undefined;
  }

  private async commitEntry(snapshot: TickSnapshot, direction: Direction, spread: number, scratch: TickScratch): Promise<void> {
    const { config, now, quotes } = snapshot;
    if (!quotes) return;
    const { ledger, configManager } = this.deps;

    this.lastEntryAt = now;
    const position = await ledger.openDraft({
      direction,
      mode: configManager.currentMode(),
      targetContracts: config.minOrderContracts,
      exitSpreadTarget: config.minSpreadExit,
      triggerSpread: spread,
    });

    scratch.entriesCommitted += 1;
    await this.note({
      kind: 'entry_committed',
      reason: 'confirmed',
      positionId: position.id,
      direction,
      details: { spread, contracts: config.minOrderContracts, mode: position.mode },
    }, scratch);

    this.launchOrder(position, 'ENTRY', config.minOrderContracts, quotes, config);
  }

  /** Tops up or fails positions still in OPENING. */
  private async reviewOpening(snapshot: TickSnapshot, scratch: TickScratch): Promise<void> {
    const { ledger, coordinator, risk } = this.deps;
    const { config, now, quotes } = snapshot;

    for (const position of ledger.listActive()) {
      if (position.state !== 'OPENING' || coordinator.isBusy(position.id)) continue;

      if (position.closeRequested || ledger.ageOf(position.id, now) > config.entryFillTimeoutMs) {
        const reason = position.closeRequested ? 'operator_close' : 'entry_fill_timeout';
        await this.failOpen(position, reason, scratch);
        continue;
      }

      const missing = Number((position.targetContracts - position.filledContracts).toFixed(8));
      if (missing <= EPSILON || !quotes || snapshot.stale.V1 || snapshot.stale.V2) continue;
      if (!risk.checkTradingAllowed() || this.rateLimited(position, now, config)) continue;

      const gate = this.executionGate(snapshot, position.direction, missing);
      if (gate) {
        await this.blockTopUp(position, gate, scratch);
        continue;
      }

      this.topUpBlocks.delete(position.id);
      this.launchOrder(position, 'ENTRY', missing, quotes, config);
    }
  }

  private async evaluateExits(snapshot: TickSnapshot, scratch: TickScratch): Promise<void> {
    const { ledger, coordinator } = this.deps;
    const { config, now, quotes } = snapshot;

    for (const position of ledger.listActive()) {
      if (position.state === 'OPENING' || coordinator.isBusy(position.id)) continue;

      let current = position;
      if (position.state === 'OPEN') {
        const trigger = this.exitTrigger(position, snapshot);
        if (!trigger.reason) {
          if (trigger.blocked) await this.blockExit(position, trigger.blocked, scratch);
          continue;
        }
        current = await ledger.markClosing(position.id, trigger.reason);
        scratch.exitsCommitted.push(position.id);
        await this.note({
          kind: 'exit_committed',
          reason: trigger.reason,
          positionId: position.id,
          direction: position.direction,
          details: trigger.details,
        }, scratch);
      }

      if (!quotes) {
        await this.blockExit(current, 'quote_missing', scratch);
        continue;
      }
      if (this.rateLimited(current, now, config)) continue;

      const contracts = this.exitSize(current, config);
      if (contracts <= EPSILON) continue;

      this.exitBlocks.delete(current.id);
      this.launchOrder(current, 'EXIT', contracts, quotes, config);
    }
  }

  private exitTrigger(
    position: Position,
    snapshot: TickSnapshot,
  ): { reason?: string; blocked?: string; details?: Record<string, unknown> } {
    const { config, now, spreads } = snapshot;

    if (position.closeRequested) return { reason: 'operator_close' };
    if (!this.deps.risk.checkTradingAllowed()) {
      return { reason: 'risk_forced', details: { disabledReason: this.deps.risk.snapshot().disabledReason } };
    }

    const age = this.deps.ledger.ageOf(position.id, now);
    if (age > config.maxPositionAgeMs) return { reason: 'max_age', details: { ageMs: age } };

    if (!spreads) return { blocked: 'quote_missing' };
    const exitSpread = spreads[position.direction].grossExitSpread;
    if (exitSpread < position.exitSpreadTarget) return {};

    // Spread-based exits are priced off both feeds.
    if (snapshot.stale.V1 || snapshot.stale.V2) return { blocked: ErrorCode.StaleData };
    return { reason: 'exit_spread', details: { exitSpread, target: position.exitSpreadTarget } };
  }

  private async unwindFailedOpens(snapshot: TickSnapshot, scratch: TickScratch): Promise<void> {
    const { ledger, coordinator } = this.deps;
    const { config, now, quotes } = snapshot;

    for (const position of ledger.listPendingUnwind()) {
      if (coordinator.isBusy(position.id) || this.rateLimited(position, now, config)) continue;
      if (!quotes) {
        await this.blockExit(position, 'quote_missing', scratch);
        continue;
      }
      this.exitBlocks.delete(position.id);
      this.launchOrder(position, 'EXIT', remainingContracts(position), quotes, config);
    }
  }

  private exitSize(position: Position, config: ThresholdConfig): number {
    let contracts = Math.min(config.minOrderContracts, remainingContracts(position));
    const exposure = this.liveExposure(position);
    if (exposure !== undefined) contracts = Math.min(contracts, exposure);
    return Number(contracts.toFixed(8));
  }

  /** Smallest absolute exposure reported across venues, for REAL positions only. */
  private liveExposure(position: Position): number | undefined {
    if (position.mode !== 'REAL') return undefined;
    let smallest = Number.POSITIVE_INFINITY;
    for (const venue of VENUES) {
      const account = this.deps.accounts.latestAccountState(venue);
      if (!account) return undefined;
      smallest = Math.min(smallest, Math.abs(account.openPositionSize));
    }
    return smallest > EPSILON ? smallest : undefined;
  }

  private rateLimited(position: Position, now: number, config: ThresholdConfig): boolean {
    if (!position.lastOrderAt) return false;
    return now - new Date(position.lastOrderAt).getTime() < config.minOrderIntervalMs;
  }

  private accountStates(): Partial<Record<Venue, AccountState>> {
    const accounts: Partial<Record<Venue, AccountState>> = {};
    for (const venue of VENUES) {
      const state = this.deps.accounts.latestAccountState(venue);
      if (state) accounts[venue] = state;
    }
    return accounts;
  }

  private launchOrder(
    position: Position,
    purpose: OrderPurpose,
    contracts: number,
    quotes: Record<Venue, Quote>,
    config: ThresholdConfig,
  ): void {
    const operation: Promise<void> = this.runOrder(position, purpose, contracts, quotes, config)
      .catch((error: unknown) => this.onOrderError(position, purpose, error))
      .catch((error: unknown) => {
        console.error(JSON.stringify({ event: 'decision.order_error_unhandled', error: describeError(error) }));
      })
      .finally(() => {
        this.operations.delete(operation);
      });
    this.operations.add(operation);
  }

  private async runOrder(
    position: Position,
    purpose: OrderPurpose,
    contracts: number,
    quotes: Record<Venue, Quote>,
    config: ThresholdConfig,
  ): Promise<void> {
    const { fill, position: after } = await this.deps.coordinator.submit({
      positionId: position.id,
      purpose,
      contracts,
      quotes,
      config,
    });

    await this.note({
      kind: 'order_filled',
      reason: purpose === 'ENTRY' ? 'entry_fill' : 'exit_fill',
      positionId: position.id,
      direction: position.direction,
      details: {
        contracts: fill.contracts,
        realizedSpread: this.deps.feeEngine.realizedSpread(fill),
        state: after.state,
      },
    });

    const flat = remainingContracts(after) <= EPSILON;
    if (after.state === 'CLOSED' || (after.state === 'FAILED_OPEN' && flat)) {
      await this.finalize(after);
    }
  }

  private async finalize(position: Position): Promise<void> {
    const { feeEngine, ledger, risk } = this.deps;
    const pnl = feeEngine.computeRealizedPnl(position);
    await ledger.settle(position.id, pnl.net, pnl.fees);
    this.exitBlocks.delete(position.id);
    this.topUpBlocks.delete(position.id);

    const wasEnabled = risk.checkTradingAllowed();
    const riskState = await risk.onTradeClosed(pnl.net, this.clock());

    await this.note({
      kind: 'position_closed',
      reason: position.state === 'CLOSED' ? position.closeReason ?? 'closed' : position.failureReason ?? 'unwound',
      positionId: position.id,
      direction: position.direction,
      details: { gross: pnl.gross, fees: pnl.fees, net: pnl.net, returnPct: pnl.returnPct },
    });

    if (wasEnabled && !riskState.tradingEnabled) {
      await this.note({
        kind: 'risk_disabled',
        reason: riskState.disabledReason ?? 'daily_loss_limit',
        details: { dailyLoss: riskState.dailyLoss },
      });
    }

    await ledger.archiveSettled(this.persistence.retainClosedPositions);
  }

  private async onOrderError(position: Position, purpose: OrderPurpose, error: unknown): Promise<void> {
    if (error instanceof InvariantViolationError) {
      await this.haltTrading(error);
      return;
    }

    await this.note({
      kind: 'order_failed',
      reason: errorCodeOf(error),
      positionId: position.id,
      direction: position.direction,
      details: { purpose, error: describeError(error) },
    });

    // A timeout keeps the position as is; a hard failure with nothing filled ends the entry.
    if (purpose !== 'ENTRY' || error instanceof PartialFillTimeoutError) return;
    const current = this.deps.ledger.get(position.id);
    if (current?.state === 'OPENING' && current.filledContracts <= EPSILON) {
      await this.failOpen(current, errorCodeOf(error));
    }
  }

  private async failOpen(position: Position, reason: string, scratch?: TickScratch): Promise<void> {
    const failed = await this.deps.ledger.markFailedOpen(position.id, reason);
    await this.note({
      kind: 'position_failed',
      reason,
      positionId: position.id,
      direction: position.direction,
      details: { filledContracts: failed.filledContracts, unwindContracts: remainingContracts(failed) },
    }, scratch);
  }

  private async haltTrading(error: InvariantViolationError, scratch?: TickScratch): Promise<void> {
    if (this.halt) return;
    this.halt = { reason: error.message, at: isoAt(this.clock()) };
    this.candidate = undefined;

    await this.deps.risk.haltForInvariant(error.message);
    eventBus.emit('engine.halted', { reason: error.message, details: error.details });
    await this.note({ kind: 'trading_halted', reason: ErrorCode.InvariantViolation, details: { message: error.message, ...error.details } }, scratch);
  }

  private async discardCandidate(reason: string, scratch: TickScratch, details?: Record<string, unknown>): Promise<void> {
    if (!this.candidate) return;
    const { direction, spread } = this.candidate;
    this.candidate = undefined;
    await this.note({ kind: 'entry_discarded', reason, direction, details: { candidateSpread: spread, ...details } }, scratch);
  }

  /** Journals a blocked entry once per distinct reason, not on every tick. */
  private async blockEntry(block: Block & { direction?: Direction }, scratch: TickScratch): Promise<EntryOutcome> {
    const key = `${block.reason}:${block.direction ?? ''}`;
    if (this.lastEntryBlock !== key) {
      this.lastEntryBlock = key;
      await this.note({ kind: 'entry_blocked', ...block }, scratch);
    }
    const spread = block.details?.spread;
    return {
      status: 'blocked',
      reason: block.reason,
      ...(block.direction ? { direction: block.direction } : {}),
      ...(typeof spread === 'number' ? { spread } : {}),
    };
  }

  /** Journals a blocked top-up once per position and reason. */
  private async blockTopUp(position: Position, block: Block, scratch: TickScratch): Promise<void> {
    if (this.topUpBlocks.get(position.id) === block.reason) return;
    this.topUpBlocks.set(position.id, block.reason);
    await this.note({
      kind: 'entry_blocked',
      reason: block.reason,
      positionId: position.id,
      direction: position.direction,
      details: { ...block.details, purpose: 'top_up' },
    }, scratch);
  }

  private async blockExit(position: Position, reason: string, scratch: TickScratch): Promise<void> {
    if (this.exitBlocks.get(position.id) === reason) return;
    this.exitBlocks.set(position.id, reason);
    await this.note({ kind: 'exit_blocked', reason, positionId: position.id, direction: position.direction }, scratch);
  }

  private async note(input: DecisionInput, scratch?: TickScratch): Promise<void> {
    const event = await this.deps.journal.record(input);
    scratch?.events.push(event);
  }

  private async recordTickMetrics(now: number, scratch: TickScratch): Promise<void> {
    this.pending.ticks += 1;
    this.pending.lastTickAt = isoAt(now);
    this.pending.entriesCommitted += scratch.entriesCommitted;
    this.pending.exitsCommitted += scratch.exitsCommitted.length;

    if (this.lastMetricsWriteAt === undefined) this.lastMetricsWriteAt = now;
    if (now - this.lastMetricsWriteAt >= this.persistence.metricsIntervalMs) {
      await this.flushMetrics(now);
    }
  }

  private report(
    now: number,
    config: ThresholdConfig,
    spreads: SpreadPair | null,
    stale: Record<Venue, boolean>,
    entry: EntryOutcome,
    scratch: TickScratch,
  ): TickReport {
    return {
      at: isoAt(now),
      configVersion: config.version,
      spreads,
      stale,
      entry,
      exitsCommitted: scratch.exitsCommitted,
      events: scratch.events,
    };
  }
}
