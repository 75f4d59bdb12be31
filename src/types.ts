export type Venue = 'V1' | 'V2';
export type Direction = 'V1_TO_V2' | 'V2_TO_V1';
export type ExecutionMode = 'SIMULATED' | 'REAL';
export type OrderSide = 'buy' | 'sell';
export type OrderPurpose = 'ENTRY' | 'EXIT';
export type PositionState = 'OPENING' | 'OPEN' | 'CLOSING' | 'CLOSED' | 'FAILED_OPEN';

export const VENUES: readonly Venue[] = ['V1', 'V2'];

export interface Quote {
  venue: Venue;
  bid: number;
  ask: number;
  receivedAt: number;
}

export type BookLevel = [price: number, size: number];

export interface OrderBook {
  venue: Venue;
  bids: BookLevel[];
  asks: BookLevel[];
  receivedAt: number;
}

export interface AccountState {
  venue: Venue;
  equity: number;
  availableMargin: number;
  openPositionSize: number;
  receivedAt: number;
}

export interface DirectionalSpread {
  direction: Direction;
  grossEntrySpread: number;
  grossExitSpread: number;
}

export type SpreadPair = Record<Direction, DirectionalSpread>;

export interface ThresholdConfig {
  version: number;
  minSpreadEnter: number;
  minSpreadExit: number;
  maxPositionContracts: number;
  minOrderContracts: number;
  maxSlippage: number;
  maxConcurrentPositions: number;
  maxPositionAgeMs: number;
  minOrderIntervalMs: number;
  dailyLossLimit: number;
  quoteFreshnessMs: number;
  confirmationDelayMs: number;
  confirmationStalenessMs: number;
  fillTimeoutMs: number;
  entryFillTimeoutMs: number;
  minFillRatio: number;
  fallbackSlippage: number;
  spreadOffsets: Record<Direction, number>;
}

export type ThresholdUpdate = Partial<Omit<ThresholdConfig, 'version' | 'spreadOffsets'>> & {
  spreadOffsets?: Partial<Record<Direction, number>>;
};

export interface LegFill {
  venue: Venue;
  side: OrderSide;
  contracts: number;
  price: number;
  fee: number;
  orderRef: string;
  filledAt: string;
}

export interface PairFill {
  id: string;
  contracts: number;
  legs: [LegFill, LegFill];
  recordedAt: string;
}

export interface Position {
  id: string;
  seq: number;
  direction: Direction;
  mode: ExecutionMode;
  state: PositionState;
  targetContracts: number;
  filledContracts: number;
  exitedContracts: number;
  entryFills: PairFill[];
  exitFills: PairFill[];
  openedAt: string;
  updatedAt: string;
  exitSpreadTarget: number;
  triggerSpread: number;
  lastOrderAt?: string;
  closeRequested: boolean;
  closeReason?: string;
  closedAt?: string;
  failureReason?: string;
  realizedPnl?: number;
}

export interface RiskState {
  dailyLoss: number;
  dayKey: string;
  dayBoundaryAt: string;
  tradingEnabled: boolean;
  disabledReason: string | null;
  disabledAt: string | null;
  fatal: boolean;
  realizedPnlToday: number;
  tradesToday: number;
  consecutiveLosses: number;
}

export interface SessionMetrics {
  startedAt: string;
  ticks: number;
  lastTickAt?: string;
  entriesCommitted: number;
  exitsCommitted: number;
  positionsClosed: number;
  positionsFailed: number;
  orderFailures: number;
  unwindOrders: number;
  totalRealizedPnl: number;
  totalFees: number;
  totalVolume: number;
  settledTrades: number;
  winningTrades: number;
  positionsArchived: number;
  blockedByReason: Record<string, number>;
}

export interface AppState {
  positions: Record<string, Position>;
  nextPositionSeq: number;
  risk: RiskState;
  metrics: SessionMetrics;
}

export type DecisionKind =
  | 'entry_candidate'
  | 'entry_discarded'
  | 'entry_blocked'
  | 'entry_committed'
  | 'exit_committed'
  | 'exit_blocked'
  | 'order_filled'
  | 'order_failed'
  | 'position_failed'
  | 'position_closed'
  | 'risk_disabled'
  | 'trading_halted';

export interface DecisionEvent {
  id: string;
  at: string;
  kind: DecisionKind;
  reason: string;
  positionId?: string;
  direction?: Direction;
  details?: Record<string, unknown>;
}

export type EntryOutcomeStatus = 'no_opportunity' | 'blocked' | 'candidate' | 'waiting' | 'committed' | 'discarded';

export interface EntryOutcome {
  status: EntryOutcomeStatus;
  reason: string;
  direction?: Direction;
  spread?: number;
}

export interface TickReport {
  at: string;
  configVersion: number;
  spreads: SpreadPair | null;
  stale: Record<Venue, boolean>;
  entry: EntryOutcome;
  exitsCommitted: string[];
  events: DecisionEvent[];
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  loopRunning: boolean;
  inFlightOrders: number;
  processPid: number;
}
