import { v4 as uuid } from 'uuid';
import { PositionLedger } from '../../domain/ledger/positionLedger.js';
import { planLegs } from '../../domain/spread/spreadCalculator.js';
import {
  DomainError,
  ErrorCode,
  LegMismatchError,
  OrderRejectedError,
  PartialFillTimeoutError,
  PortUnavailableError,
  describeError,
} from '../../errors/taxonomy.js';
import { EventLogger } from '../../infra/logger.js';
import { StateStore } from '../../infra/storage/stateStore.js';
import {
  ExecutionMode,
  LegFill,
  OrderPurpose,
  OrderSide,
  PairFill,
  Position,
  Quote,
  ThresholdConfig,
  Venue,
} from '../../types.js';
import { retryWithBackoff, withTimeout } from '../../utils/retry.js';
import { Clock, isoAt, systemClock } from '../../utils/time.js';
import { ExecutionPort, OrderRequest, OrderResult, oppositeSide } from './executionPort.js';

export interface SubmitRequest {
  positionId: string;
  purpose: OrderPurpose;
  contracts: number;
  quotes: Record<Venue, Quote>;
  config: Pick<ThresholdConfig, 'fillTimeoutMs' | 'minFillRatio'>;
}

export interface SubmitResult {
  fill: PairFill;
  position: Position;
  /** Contracts flattened on the larger leg when the legs filled unevenly. */
  unwoundExcess: number;
}

export interface CoordinatorOptions {
  unwindAttempts: number;
  unwindBaseDelayMs: number;
}

interface LegAttempt {
  request: OrderRequest;
  result?: OrderResult;
  error?: unknown;
  timedOut: boolean;
}

interface PendingCancel {
  mode: ExecutionMode;
  positionId: string;
  venue: Venue;
  clientOrderId: string;
}

/** A fill that nothing paired against; it is flattened on the next sweep. */
interface OrphanFill {
  mode: ExecutionMode;
  positionId: string;
  venue: Venue;
  side: OrderSide;
  contracts: number;
  price: number;
  reduceOnly: boolean;
}

export interface SweepReport {
  cancelled: number;
  flattened: number;
  pending: number;
  orphans: number;
}

const EPSILON = 1e-9;
const round = (v: number): number => Number(v.toFixed(8));

const DEFAULT_OPTIONS: CoordinatorOptions = {
  unwindAttempts: 3,
  unwindBaseDelayMs: 200,
};

/**
 * Sends both legs of a paired order through the port matching the position's
 * own mode and reconciles the result into the ledger. At most one operation
 * per position is in flight.
 */
export class ExecutionCoordinator {
  private readonly ports = new Map<ExecutionMode, ExecutionPort>();
  private readonly inFlight = new Set<string>();
  private pendingCancels: PendingCancel[] = [];
  private orphans: OrphanFill[] = [];
  private readonly options: CoordinatorOptions;

  constructor(
    private readonly ledger: PositionLedger,
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    ports: ExecutionPort[],
    options: Partial<CoordinatorOptions> = {},
    private readonly clock: Clock = systemClock,
  ) {
    for (const port of ports) this.registerPort(port);
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  registerPort(port: ExecutionPort): void {
    this.ports.set(port.mode, port);
  }

  hasPort(mode: ExecutionMode): boolean {
    return this.ports.has(mode);
  }

  isBusy(positionId: string): boolean {
    return this.inFlight.has(positionId);
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  async submit(request: SubmitRequest): Promise<SubmitResult> {
    const position = this.ledger.get(request.positionId);
    if (!position) {
      throw new DomainError(ErrorCode.PositionNotFound, 404, `Position '${request.positionId}' not found.`);
    }
    if (this.inFlight.has(position.id)) {
      throw new DomainError(ErrorCode.PositionBusy, 409, `Position '${position.id}' has an order in flight.`);
    }

    const port = this.portFor(position.mode);

    this.inFlight.add(position.id);
    try {
      await this.ledger.touchOrder(position.id, this.clock());
      return await this.execute(port, position, request);
    } catch (error) {
      await this.store.transaction((state) => {
        state.metrics.orderFailures += 1;
        return undefined;
      });
      await this.logger.log('warn', 'execution.submit_failed', {
        positionId: position.id,
        purpose: request.purpose,
        contracts: request.contracts,
        error: describeError(error),
      });
      throw error;
    } finally {
      this.inFlight.delete(position.id);
    }
  }

  /**
   * Cancels orders abandoned by a fill timeout and flattens fills that arrived
   * after their pair was given up. Runs at the start of every tick.
   */
  async sweep(): Promise<SweepReport> {
    let cancelled = 0;
    const cancels = this.pendingCancels;
    this.pendingCancels = [];
    for (const pending of cancels) {
      const port = this.ports.get(pending.mode);
      if (!port) {
        this.pendingCancels.push(pending);
        continue;
      }
      try {
        if (await port.cancel(pending.venue, pending.clientOrderId)) cancelled += 1;
      } catch (error) {
        await this.logger.log('warn', 'execution.cancel_failed', {
          positionId: pending.positionId,
          venue: pending.venue,
          clientOrderId: pending.clientOrderId,
          error: describeError(error),
        });
        this.pendingCancels.push(pending);
      }
    }

    let flattened = 0;
    const orphans = this.orphans;
    this.orphans = [];
    for (const orphan of orphans) {
      const port = this.ports.get(orphan.mode);
      if (!port) {
        this.orphans.push(orphan);
        continue;
      }
      try {
        await this.flatten(port, orphan);
        flattened += 1;
      } catch (error) {
        await this.logger.log('error', 'execution.orphan_flatten_failed', {
          positionId: orphan.positionId,
          venue: orphan.venue,
          contracts: orphan.contracts,
          error: describeError(error),
        });
        this.orphans.push(orphan);
      }
    }

    return { cancelled, flattened, pending: this.pendingCancels.length, orphans: this.orphans.length };
  }

  pendingWork(): { cancels: number; orphans: number } {
    return { cancels: this.pendingCancels.length, orphans: this.orphans.length };
  }

  private portFor(mode: ExecutionMode): ExecutionPort {
    const port = this.ports.get(mode);
    if (!port) {
      throw new PortUnavailableError(`No execution port registered for ${mode} mode.`, { mode });
    }
    return port;
  }

  private async execute(port: ExecutionPort, position: Position, request: SubmitRequest): Promise<SubmitResult> {
    const legs = planLegs(position.direction, request.purpose, request.quotes.V1, request.quotes.V2);
    const reduceOnly = request.purpose === 'EXIT';

    const attempts: LegAttempt[] = legs.map((leg) => ({
      request: {
        clientOrderId: uuid(),
        venue: leg.venue,
        side: leg.side,
        contracts: request.contracts,
        priceHint: leg.price,
        reduceOnly,
      },
      timedOut: false,
    }));

    await Promise.all(attempts.map((attempt) => this.runLeg(port, position, attempt, request.config.fillTimeoutMs)));

    const filled = attempts.map((attempt) => attempt.result?.filledContracts ?? 0);
    const paired = round(Math.min(...filled));

    // Anything above the paired size is naked exposure on one venue.
    let unwoundExcess = 0;
    for (const [index, attempt] of attempts.entries()) {
      const excess = round(filled[index] - paired);
      if (excess <= EPSILON || !attempt.result) continue;
      await this.unwindLeg(port, position, attempt.result, excess, request.purpose === 'ENTRY');
      unwoundExcess = round(unwoundExcess + excess);
    }

    if (paired <= EPSILON) {
      throw this.pairFailure(position, request, attempts, unwoundExcess);
    }

    const [buy, sell] = attempts.map((attempt) => this.toLegFill(attempt, paired));
    if (!buy || !sell) {
      throw new LegMismatchError('Paired fill is missing a leg result.', { positionId: position.id });
    }

    const fill: PairFill = {
      id: uuid(),
      contracts: paired,
      legs: [buy, sell],
      recordedAt: isoAt(this.clock()),
    };

    const outcome = request.purpose === 'ENTRY'
      ? await this.ledger.recordEntryFill(position.id, fill, request.config.minFillRatio)
      : await this.ledger.recordExitFill(position.id, fill);

    await this.logger.log('info', 'execution.pair_filled', {
      positionId: position.id,
      purpose: request.purpose,
      mode: position.mode,
      contracts: paired,
      buy: { venue: buy.venue, price: buy.price },
      sell: { venue: sell.venue, price: sell.price },
      unwoundExcess,
    });

    return { fill, position: outcome.position, unwoundExcess };
  }

  private async runLeg(port: ExecutionPort, position: Position, attempt: LegAttempt, timeoutMs: number): Promise<void> {
    const placing = port.placeOrder(attempt.request);
    try {
      const result = await withTimeout(placing, timeoutMs, () => new PartialFillTimeoutError(
        `No fill confirmation from ${attempt.request.venue} within ${timeoutMs}ms.`,
        { positionId: position.id, clientOrderId: attempt.request.clientOrderId },
      ));
      if (result.status === 'rejected' || !(result.filledContracts > 0)) {
        attempt.error = new OrderRejectedError(`Order on ${result.venue} did not fill.`, {
          clientOrderId: attempt.request.clientOrderId,
          orderRef: result.orderRef,
        });
        return;
      }
      attempt.result = result;
    } catch (error) {
      attempt.error = error;
      if (error instanceof PartialFillTimeoutError) {
        attempt.timedOut = true;
        this.abandon(port, position, attempt.request, placing);
      }
    }
  }

  /** Remembers a timed-out order for cancellation and catches a late fill. */
  private abandon(port: ExecutionPort, position: Position, request: OrderRequest, placing: Promise<OrderResult>): void {
    this.pendingCancels.push({
      mode: port.mode,
      positionId: position.id,
      venue: request.venue,
      clientOrderId: request.clientOrderId,
    });

    void placing.then(
      async (late) => {
        if (!(late.filledContracts > 0)) return;
        this.orphans.push({
          mode: port.mode,
          positionId: position.id,
          venue: late.venue,
          side: late.side,
          contracts: late.filledContracts,
          price: late.avgPrice,
          reduceOnly: !request.reduceOnly,
        });
        await this.logger.log('warn', 'execution.late_fill', {
          positionId: position.id,
          venue: late.venue,
          contracts: late.filledContracts,
        });
      },
      (error: unknown) => this.logger.log('warn', 'execution.late_order_failed', {
        positionId: position.id,
        clientOrderId: request.clientOrderId,
        error: describeError(error),
      }),
    );
  }

  private async unwindLeg(
    port: ExecutionPort,
    position: Position,
    result: OrderResult,
    contracts: number,
    reduceOnly: boolean,
  ): Promise<void> {
    const orphan: OrphanFill = {
      mode: port.mode,
      positionId: position.id,
      venue: result.venue,
      side: result.side,
      contracts,
      price: result.avgPrice,
      reduceOnly,
    };

    try {
      await this.flatten(port, orphan);
    } catch (error) {
      this.orphans.push(orphan);
      await this.logger.log('error', 'execution.unwind_failed', {
        positionId: position.id,
        venue: result.venue,
        contracts,
        error: describeError(error),
      });
    }
  }

  /** Opposite-side market order for `orphan.contracts`, retried with backoff. */
  private async flatten(port: ExecutionPort, orphan: OrphanFill): Promise<OrderResult> {
    const side = oppositeSide(orphan.side);
    const result = await retryWithBackoff(
      () => port.placeOrder({
        clientOrderId: uuid(),
        venue: orphan.venue,
        side,
        contracts: orphan.contracts,
        priceHint: orphan.price,
        reduceOnly: orphan.reduceOnly,
      }),
      {
        maxAttempts: this.options.unwindAttempts,
        baseDelayMs: this.options.unwindBaseDelayMs,
        shouldRetry: (error) => !(error instanceof PortUnavailableError),
        onRetry: ({ attempt, nextDelayMs, error }) => this.logger.log('warn', 'execution.unwind_retry', {
          positionId: orphan.positionId,
          venue: orphan.venue,
          attempt,
          nextDelayMs,
          error: describeError(error),
        }),
      },
    );

    await this.store.transaction((state) => {
      state.metrics.unwindOrders += 1;
      return undefined;
    });
    await this.logger.log('warn', 'execution.leg_unwound', {
      positionId: orphan.positionId,
      venue: orphan.venue,
      side,
      contracts: orphan.contracts,
      avgPrice: result.avgPrice,
    });
    return result;
  }

  private pairFailure(position: Position, request: SubmitRequest, attempts: LegAttempt[], unwound: number): Error {
    const details = {
      positionId: position.id,
      purpose: request.purpose,
      legs: attempts.map((attempt) => ({
        venue: attempt.request.venue,
        side: attempt.request.side,
        filled: attempt.result?.filledContracts ?? 0,
        error: attempt.error === undefined ? undefined : describeError(attempt.error),
      })),
      unwound,
    };

    if (attempts.some((attempt) => attempt.timedOut)) {
      return new PartialFillTimeoutError('Paired order timed out before both legs filled.', details);
    }
    if (attempts.some((attempt) => attempt.result)) {
      return new LegMismatchError('One leg filled while the other failed; filled leg unwound.', details);
    }

    const first = attempts.find((attempt) => attempt.error !== undefined)?.error;
    return first instanceof Error ? first : new OrderRejectedError('Paired order failed on both legs.', details);
  }

  private toLegFill(attempt: LegAttempt, contracts: number): LegFill | undefined {
    const result = attempt.result;
    if (!result) return undefined;
    const share = result.filledContracts > 0 ? contracts / result.filledContracts : 0;
    return {
      venue: result.venue,
      side: result.side,
      contracts,
      price: result.avgPrice,
      fee: round(result.fee * share),
      orderRef: result.orderRef,
      filledAt: result.filledAt,
    };
  }
}
