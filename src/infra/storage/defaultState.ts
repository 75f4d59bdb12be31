import { AppState, RiskState, SessionMetrics } from '../../types.js';
import { dayKey, isoAt, isoNow, nextUtcMidnight } from '../../utils/time.js';

export const createDefaultRiskState = (nowMs: number = Date.now()): RiskState => ({
  dailyLoss: 0,
  dayKey: dayKey(nowMs),
  dayBoundaryAt: isoAt(nextUtcMidnight(nowMs)),
  tradingEnabled: true,
  disabledReason: null,
  disabledAt: null,
  fatal: false,
  realizedPnlToday: 0,
  tradesToday: 0,
  consecutiveLosses: 0,
});

export const createDefaultMetrics = (): SessionMetrics => ({
  startedAt: isoNow(),
  ticks: 0,
  entriesCommitted: 0,
  exitsCommitted: 0,
  positionsClosed: 0,
  positionsFailed: 0,
  orderFailures: 0,
  unwindOrders: 0,
  totalRealizedPnl: 0,
  totalFees: 0,
  totalVolume: 0,
  settledTrades: 0,
  winningTrades: 0,
  positionsArchived: 0,
  blockedByReason: {},
});

export const createDefaultState = (nowMs: number = Date.now()): AppState => ({
  positions: {},
  nextPositionSeq: 1,
  risk: createDefaultRiskState(nowMs),
  metrics: createDefaultMetrics(),
});
