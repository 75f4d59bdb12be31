import Fastify from 'fastify';
import { registerRoutes } from './api/routes.js';
import { AppConfig } from './config.js';
import { FeeEngine } from './domain/fee/feeEngine.js';
import { PositionLedger } from './domain/ledger/positionLedger.js';
import { RiskManager } from './domain/risk/riskManager.js';
import { SpreadHistory } from './domain/spread/spreadHistory.js';
import { DomainError, ErrorCode, toErrorEnvelope } from './errors/taxonomy.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { ArbitrageService } from './services/arbitrageService.js';
import { ConfigManager } from './services/configManager.js';
import { DecisionEngine } from './services/decisionEngine.js';
import { DecisionJournal } from './services/decisionJournal.js';
import { DecisionLoop } from './services/decisionLoop.js';
import { ExecutionCoordinator } from './services/execution/executionCoordinator.js';
import { ExecutionPort } from './services/execution/executionPort.js';
import { ExchangeClient, LiveExecutionPort } from './services/execution/liveExecutionPort.js';
import { PaperExecutionPort } from './services/execution/paperExecutionPort.js';
import { AccountBoard, QuoteBoard } from './services/marketFeeds.js';
import { Venue } from './types.js';
import { Clock, systemClock } from './utils/time.js';

export interface BuildOptions {
  /** Venue connectors for REAL mode. Without both, only SIMULATED is available. */
  exchangeClients?: Partial<Record<Venue, ExchangeClient>>;
  /** Replaces the built-in ports, mainly for tests. */
  executionPorts?: ExecutionPort[];
  clock?: Clock;
}

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  loop: DecisionLoop;
  engine: DecisionEngine;
  service: ArbitrageService;
  quotes: QuoteBoard;
  accounts: AccountBoard;
  coordinator: ExecutionCoordinator;
  stateStore: StateStore;
  logger: EventLogger;
}

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });
  const clock = options.clock ?? systemClock;

  const stateStore = new StateStore(config.paths.stateFile);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile, {
    echo: config.logging.echo,
    minLevel: config.logging.level,
  });
  await logger.init();

  const feeEngine = new FeeEngine(config.trading);
  const configManager = new ConfigManager(config.thresholds, config.trading, logger);
  const ledger = new PositionLedger(stateStore, logger, clock);
  const risk = new RiskManager(stateStore, logger, () => configManager.currentConfig(), clock);
  const quotes = new QuoteBoard();
  const accounts = new AccountBoard();
  const history = new SpreadHistory(config.loop.spreadHistorySize);
  const journal = new DecisionJournal(
    logger,
    config.loop.decisionJournalSize,
    clock,
    stateStore.snapshot().metrics.blockedByReason,
  );

  const ports: ExecutionPort[] = options.executionPorts ?? [
    new PaperExecutionPort(feeEngine, {
      slippage: config.trading.paperSlippage,
      latencyMs: config.trading.paperLatencyMs,
    }, clock),
  ];
  if (!options.executionPorts && options.exchangeClients) {
    const live = new LiveExecutionPort(options.exchangeClients, feeEngine, config.trading, clock);
    if (live.isReadyForLive()) ports.push(live);
  }

  const coordinator = new ExecutionCoordinator(ledger, stateStore, logger, ports, {}, clock);
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
    store: stateStore,
    logger,
    clock,
    persistence: {
      metricsIntervalMs: config.loop.metricsPersistIntervalMs,
      retainClosedPositions: config.loop.retainClosedPositions,
    },
  });
  const loop = new DecisionLoop(engine, logger, config.loop.intervalMs);
  const service = new ArbitrageService({
    store: stateStore,
    ledger,
    risk,
    engine,
    configManager,
    journal,
    history,
    prices: quotes,
    logger,
    clock,
  }, config.app.name);

  app.setErrorHandler(async (error, _request, reply) => {
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    }
    await logger.log('error', 'http.unhandled_error', { error: error.message });
    return reply.code(500).send(toErrorEnvelope(ErrorCode.InternalError, 'Internal error.'));
  });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    store: stateStore,
    service,
    quotes,
    accounts,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      loopRunning: loop.isRunning(),
      inFlightOrders: coordinator.inFlightCount(),
      processPid: process.pid,
    }),
  });

  return {
    app,
    loop,
    engine,
    service,
    quotes,
    accounts,
    coordinator,
    stateStore,
    logger,
  };
}
