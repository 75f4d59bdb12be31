import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';
import { ExecutionMode, ThresholdConfig, Venue } from './types.js';

const fraction = z.number().min(-1).max(1);
const positiveMs = z.number().int().positive();

export const thresholdFieldsSchema = z.object({
  minSpreadEnter: fraction,
  minSpreadExit: fraction,
  maxPositionContracts: z.number().positive(),
  minOrderContracts: z.number().positive(),
  maxSlippage: z.number().min(0).max(0.1),
  maxConcurrentPositions: z.number().int().min(1).max(100),
  maxPositionAgeMs: positiveMs,
  minOrderIntervalMs: z.number().int().nonnegative(),
  dailyLossLimit: z.number().positive(),
  quoteFreshnessMs: positiveMs,
  confirmationDelayMs: z.number().int().nonnegative(),
  confirmationStalenessMs: positiveMs,
  fillTimeoutMs: positiveMs,
  entryFillTimeoutMs: positiveMs,
  minFillRatio: z.number().gt(0).max(1),
  fallbackSlippage: z.number().min(0).max(0.1),
  spreadOffsets: z.object({
    V1_TO_V2: fraction,
    V2_TO_V1: fraction,
  }),
});

export const validateThresholds = (candidate: Omit<ThresholdConfig, 'version'>): Omit<ThresholdConfig, 'version'> => {
  const parsed = thresholdFieldsSchema.parse(candidate);
  if (parsed.minOrderContracts > parsed.maxPositionContracts) {
    throw new z.ZodError([{
      code: z.ZodIssueCode.custom,
      path: ['minOrderContracts'],
      message: 'minOrderContracts must not exceed maxPositionContracts',
    }]);
  }
  return parsed;
};

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  APP_NAME: z.string().default('spread-arbitrage-engine'),
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().default(path.resolve(process.cwd(), 'data')),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_ECHO: bool.default('true'),

  TRADING_MODE: z.enum(['simulated', 'real']).default('simulated'),
  LIVE_TRADING_ENABLED: bool.default('false'),
  SYMBOL_V1: z.string().default('NVDAUSDT'),
  SYMBOL_V2: z.string().default('NVDA'),
  FEE_RATE_V1: z.coerce.number().min(0).default(0.00006),
  FEE_RATE_V2: z.coerce.number().min(0).default(0.00005),
  PAPER_SLIPPAGE: z.coerce.number().min(0).default(0.0001),
  PAPER_LATENCY_MS: z.coerce.number().int().nonnegative().default(50),

  LOOP_INTERVAL_MS: z.coerce.number().int().positive().default(100),
  SPREAD_HISTORY_SIZE: z.coerce.number().int().positive().default(1000),
  DECISION_JOURNAL_SIZE: z.coerce.number().int().positive().default(500),
  METRICS_PERSIST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
  RETAIN_CLOSED_POSITIONS: z.coerce.number().int().nonnegative().default(500),

  MIN_SPREAD_ENTER: z.coerce.number().default(0.001),
  MIN_SPREAD_EXIT: z.coerce.number().default(-0.0002),
  MAX_POSITION_CONTRACTS: z.coerce.number().default(0.02),
  MIN_ORDER_CONTRACTS: z.coerce.number().default(0.01),
  MAX_SLIPPAGE: z.coerce.number().default(0.0005),
  MAX_CONCURRENT_POSITIONS: z.coerce.number().int().default(2),
  MAX_POSITION_AGE_MS: z.coerce.number().int().default(3_600_000),
  MIN_ORDER_INTERVAL_MS: z.coerce.number().int().default(3_000),
  DAILY_LOSS_LIMIT: z.coerce.number().default(100),
  QUOTE_FRESHNESS_MS: z.coerce.number().int().default(5_000),
  CONFIRMATION_DELAY_MS: z.coerce.number().int().default(500),
  CONFIRMATION_STALENESS_MS: z.coerce.number().int().default(1_000),
  FILL_TIMEOUT_MS: z.coerce.number().int().default(10_000),
  ENTRY_FILL_TIMEOUT_MS: z.coerce.number().int().default(30_000),
  MIN_FILL_RATIO: z.coerce.number().default(1),
  FALLBACK_SLIPPAGE: z.coerce.number().default(0.0001),
  SPREAD_OFFSET_V1_TO_V2: z.coerce.number().default(0),
  SPREAD_OFFSET_V2_TO_V1: z.coerce.number().default(0),
});

export interface AppConfig {
  app: {
    name: string;
    env: string;
    port: number;
  };
  paths: {
    dataDir: string;
    stateFile: string;
    logFile: string;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    echo: boolean;
  };
  trading: {
    defaultMode: ExecutionMode;
    liveEnabled: boolean;
    symbols: Record<Venue, string>;
    feeRates: Record<Venue, number>;
    paperSlippage: number;
    paperLatencyMs: number;
  };
  loop: {
    intervalMs: number;
    spreadHistorySize: number;
    decisionJournalSize: number;
    /** Tick counters are held in memory and written to the state file at this cadence. */
    metricsPersistIntervalMs: number;
    /** Settled positions kept in the state file; older ones move to the event log. */
    retainClosedPositions: number;
  };
  thresholds: Omit<ThresholdConfig, 'version'>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);

  return {
    app: {
      name: e.APP_NAME,
      env: e.NODE_ENV,
      port: e.PORT,
    },
    paths: {
      dataDir: e.DATA_DIR,
      stateFile: path.join(e.DATA_DIR, 'state.json'),
      logFile: path.join(e.DATA_DIR, 'events.ndjson'),
    },
    logging: {
      level: e.LOG_LEVEL,
      echo: e.LOG_ECHO,
    },
    trading: {
      defaultMode: e.TRADING_MODE === 'real' ? 'REAL' : 'SIMULATED',
      liveEnabled: e.LIVE_TRADING_ENABLED,
      symbols: { V1: e.SYMBOL_V1, V2: e.SYMBOL_V2 },
      feeRates: { V1: e.FEE_RATE_V1, V2: e.FEE_RATE_V2 },
      paperSlippage: e.PAPER_SLIPPAGE,
      paperLatencyMs: e.PAPER_LATENCY_MS,
    },
    loop: {
      intervalMs: e.LOOP_INTERVAL_MS,
      spreadHistorySize: e.SPREAD_HISTORY_SIZE,
      decisionJournalSize: e.DECISION_JOURNAL_SIZE,
      metricsPersistIntervalMs: e.METRICS_PERSIST_INTERVAL_MS,
      retainClosedPositions: e.RETAIN_CLOSED_POSITIONS,
    },
    thresholds: validateThresholds({
      minSpreadEnter: e.MIN_SPREAD_ENTER,
      minSpreadExit: e.MIN_SPREAD_EXIT,
      maxPositionContracts: e.MAX_POSITION_CONTRACTS,
      minOrderContracts: e.MIN_ORDER_CONTRACTS,
      maxSlippage: e.MAX_SLIPPAGE,
      maxConcurrentPositions: e.MAX_CONCURRENT_POSITIONS,
      maxPositionAgeMs: e.MAX_POSITION_AGE_MS,
      minOrderIntervalMs: e.MIN_ORDER_INTERVAL_MS,
      dailyLossLimit: e.DAILY_LOSS_LIMIT,
      quoteFreshnessMs: e.QUOTE_FRESHNESS_MS,
      confirmationDelayMs: e.CONFIRMATION_DELAY_MS,
      confirmationStalenessMs: e.CONFIRMATION_STALENESS_MS,
      fillTimeoutMs: e.FILL_TIMEOUT_MS,
      entryFillTimeoutMs: e.ENTRY_FILL_TIMEOUT_MS,
      minFillRatio: e.MIN_FILL_RATIO,
      fallbackSlippage: e.FALLBACK_SLIPPAGE,
      spreadOffsets: {
        V1_TO_V2: e.SPREAD_OFFSET_V1_TO_V2,
        V2_TO_V1: e.SPREAD_OFFSET_V2_TO_V1,
      },
    }),
  };
}

export const config = loadConfig();
