import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { FeeEngine } from '../src/domain/fee/feeEngine.js';
import { PositionLedger } from '../src/domain/ledger/positionLedger.js';
import { RiskManager } from '../src/domain/risk/riskManager.js';
import { SpreadHistory } from '../src/domain/spread/spreadHistory.js';
import { EventLogger } from '../src/infra/logger.js';
import { createDefaultRiskState } from '../src/infra/storage/defaultState.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { ConfigManager } from '../src/services/configManager.js';
import { DecisionEngine, PersistenceOptions } from '../src/services/decisionEngine.js';
import { DecisionJournal } from '../src/services/decisionJournal.js';
import { ExecutionCoordinator } from '../src/services/execution/executionCoordinator.js';
import { ExecutionPort, OrderRequest, OrderResult } from '../src/services/execution/executionPort.js';
import { AccountBoard, QuoteBoard } from '../src/services/marketFeeds.js';
import { ExecutionMode, Quote, ThresholdConfig, Venue } from '../src/types.js';
import { Clock, isoAt } from '../src/utils/time.js';

/** Noon UTC, well clear of the day boundary. */
export const T0 = Date.UTC(2026, 0, 5, 12);

export async function createTempDir(prefix = 'spread-arb-tests-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export const testThresholds: Omit<ThresholdConfig, 'version'> = {
  minSpreadEnter: 0.003,
  minSpreadExit: -0.0002,
  maxPositionContracts: 0.02,
  minOrderContracts: 0.01,
  maxSlippage: 0.0005,
  maxConcurrentPositions: 2,
  maxPositionAgeMs: 3_600_000,
  minOrderIntervalMs: 0,
  dailyLossLimit: 100,
  quoteFreshnessMs: 5_000,
  confirmationDelayMs: 500,
  confirmationStalenessMs: 1_000,
  fillTimeoutMs: 1_000,
  entryFillTimeoutMs: 30_000,
  minFillRatio: 1,
  fallbackSlippage: 0.0001,
  spreadOffsets: { V1_TO_V2: 0, V2_TO_V1: 0 },
};

export function buildTestConfig(tmpDir: string, thresholds: Partial<Omit<ThresholdConfig, 'version'>> = {}): AppConfig {
  return {
    ...baseConfig,
    paths: {
      ...baseConfig.paths,
      dataDir: tmpDir,
      stateFile: path.join(tmpDir, 'state.json'),
      logFile: path.join(tmpDir, 'events.ndjson'),
    },
    logging: {
      level: 'debug',
      echo: false,
    },
    trading: {
      ...baseConfig.trading,
      defaultMode: 'SIMULATED',
      liveEnabled: false,
      feeRates: { V1: 0.00006, V2: 0.00005 },
      paperSlippage: 0,
      paperLatencyMs: 0,
    },
    loop: {
      intervalMs: 60_000,
      spreadHistorySize: 100,
      decisionJournalSize: 200,
      metricsPersistIntervalMs: 0,
      retainClosedPositions: 50,
    },
    thresholds: { ...testThresholds, ...thresholds },
  };
}

export class ManualClock {
  constructor(public now: number = T0) {}

  readonly read: Clock = () => this.now;

  advance(ms: number): number {
    this.now += ms;
    return this.now;
  }
}

export const quote = (venue: Venue, bid: number, ask: number, receivedAt: number): Quote => ({
  venue,
  bid,
  ask,
  receivedAt,
});

export type OrderHandler = (request: OrderRequest) => Promise<OrderResult> | OrderResult;

export const filled = (request: OrderRequest, overrides: Partial<OrderResult> = {}): OrderResult => ({
  orderRef: `ref_${request.clientOrderId}`,
  clientOrderId: request.clientOrderId,
  venue: request.venue,
  side: request.side,
  status: 'filled',
  filledContracts: request.contracts,
  avgPrice: request.priceHint,
  fee: 0,
  filledAt: isoAt(T0),
  ...overrides,
});

/**
 * In-process execution port. Every request is recorded before its venue
 * handler runs; without a handler the order fills in full at the hinted price.
 */
export class FakeExecutionPort implements ExecutionPort {
  readonly orders: OrderRequest[] = [];
  readonly cancels: Array<{ venue: Venue; clientOrderId: string }> = [];
  readonly handlers: Partial<Record<Venue, OrderHandler>> = {};

  constructor(readonly mode: ExecutionMode = 'SIMULATED') {}

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    this.orders.push({ ...request });
    const handler = this.handlers[request.venue];
    return handler ? handler(request) : filled(request);
  }

  async cancel(venue: Venue, clientOrderId: string): Promise<boolean> {
    this.cancels.push({ venue, clientOrderId });
    return false;
  }
}

export interface Harness {
  clock: ManualClock;
  store: StateStore;
  logger: EventLogger;
  ledger: PositionLedger;
  risk: RiskManager;
  configManager: ConfigManager;
  quotes: QuoteBoard;
  accounts: AccountBoard;
  journal: DecisionJournal;
  history: SpreadHistory;
  feeEngine: FeeEngine;
  coordinator: ExecutionCoordinator;
  engine: DecisionEngine;
  simPort: FakeExecutionPort;
  realPort: FakeExecutionPort;
}

export interface HarnessOptions {
  thresholds?: Partial<Omit<ThresholdConfig, 'version'>>;
  liveEnabled?: boolean;
  withRealPort?: boolean;
  persistence?: Partial<PersistenceOptions>;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const tmpDir = await createTempDir();
  const config = buildTestConfig(tmpDir, options.thresholds);
  const clock = new ManualClock();

  const store = new StateStore(config.paths.stateFile);
  await store.init();
  await store.transaction((state) => {
    state.risk = createDefaultRiskState(clock.now);
    return undefined;
  });

  const logger = new EventLogger(config.paths.logFile, { echo: false, minLevel: 'debug' });
  await logger.init();

  const feeEngine = new FeeEngine(config.trading);
  const configManager = new ConfigManager(config.thresholds, {
    defaultMode: 'SIMULATED',
    liveEnabled: options.liveEnabled ?? false,
  }, logger);
  const ledger = new PositionLedger(store, logger, clock.read);
  const risk = new RiskManager(store, logger, () => configManager.currentConfig(), clock.read);
  const quotes = new QuoteBoard();
  const accounts = new AccountBoard();
  const journal = new DecisionJournal(logger, 200, clock.read);
  const history = new SpreadHistory(100);

  const simPort = new FakeExecutionPort('SIMULATED');
  const realPort = new FakeExecutionPort('REAL');
  const ports: ExecutionPort[] = options.withRealPort ? [simPort, realPort] : [simPort];
  const coordinator = new ExecutionCoordinator(ledger, store, logger, ports, {
    unwindAttempts: 2,
    unwindBaseDelayMs: 1,
  }, clock.read);

  const engine = new DecisionEngine({
    configManager,
    prices: quotes,
    accounts,
    ledger,
    risk,
    coordinator,
    feeEngine,
    journal,
    history,
    store,
    logger,
    clock: clock.read,
    persistence: {
      metricsIntervalMs: config.loop.metricsPersistIntervalMs,
      retainClosedPositions: config.loop.retainClosedPositions,
      ...options.persistence,
    },
  });

  return {
    clock,
    store,
    logger,
    ledger,
    risk,
    configManager,
    quotes,
    accounts,
    journal,
    history,
    feeEngine,
    coordinator,
    engine,
    simPort,
    realPort,
  };
}

/** Publishes the wide two-venue book used across engine tests (V1→V2 entry ≈ 0.55%). */
export function publishWideSpread(harness: Pick<Harness, 'quotes'>, receivedAt: number): void {
  harness.quotes.publishQuote(quote('V1', 99.9, 99.95, receivedAt));
  harness.quotes.publishQuote(quote('V2', 100.5, 100.55, receivedAt));
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
