import { z } from 'zod';
import { AppConfig } from '../../config.js';
import { FeeEngine } from '../../domain/fee/feeEngine.js';
import { OrderRejectedError, PortUnavailableError, describeError } from '../../errors/taxonomy.js';
import { OrderSide, Venue } from '../../types.js';
import { Clock, isoAt, systemClock } from '../../utils/time.js';
import { ExecutionPort, OrderRequest, OrderResult } from './executionPort.js';

export interface ExchangeOrderParams {
  symbol: string;
  clientOrderId: string;
  side: OrderSide;
  contracts: number;
  reduceOnly: boolean;
}

/**
 * Venue connector. Signing, transport and symbol conventions live behind it;
 * the engine only sees market orders and cancels.
 */
export interface ExchangeClient {
  placeMarketOrder(params: ExchangeOrderParams): Promise<unknown>;
  cancelOrder(symbol: string, clientOrderId: string): Promise<boolean>;
}

const exchangeFillSchema = z.object({
  orderId: z.string().min(1),
  status: z.enum(['filled', 'partial', 'rejected']),
  filledContracts: z.number().nonnegative(),
  avgPrice: z.number().nonnegative(),
  fee: z.number().nonnegative().optional(),
  filledAt: z.number().int().nonnegative().optional(),
});

export class LiveExecutionPort implements ExecutionPort {
  readonly mode = 'REAL' as const;

  constructor(
    private readonly clients: Partial<Record<Venue, ExchangeClient>>,
    private readonly feeEngine: FeeEngine,
    private readonly trading: Pick<AppConfig['trading'], 'liveEnabled' | 'symbols'>,
    private readonly clock: Clock = systemClock,
  ) {}

  isReadyForLive(): boolean {
    return this.trading.liveEnabled && Boolean(this.clients.V1 && this.clients.V2);
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    const client = this.requireClient(request.venue);
    const raw = await client.placeMarketOrder({
      symbol: this.trading.symbols[request.venue],
      clientOrderId: request.clientOrderId,
      side: request.side,
      contracts: request.contracts,
      reduceOnly: request.reduceOnly,
    });

    const parsed = exchangeFillSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OrderRejectedError(`Malformed order response from ${request.venue}.`, {
        clientOrderId: request.clientOrderId,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const fill = parsed.data;
    if (fill.status === 'rejected' || fill.filledContracts <= 0) {
      throw new OrderRejectedError(`Order rejected by ${request.venue}.`, {
        clientOrderId: request.clientOrderId,
        orderRef: fill.orderId,
      });
    }

    return {
      orderRef: fill.orderId,
      clientOrderId: request.clientOrderId,
      venue: request.venue,
      side: request.side,
      status: fill.status,
      filledContracts: fill.filledContracts,
      avgPrice: fill.avgPrice,
      fee: fill.fee ?? this.feeEngine.calculateLegFee(request.venue, fill.avgPrice * fill.filledContracts),
      filledAt: isoAt(fill.filledAt ?? this.clock()),
    };
  }

  async cancel(venue: Venue, clientOrderId: string): Promise<boolean> {
    const client = this.requireClient(venue);
    try {
      return await client.cancelOrder(this.trading.symbols[venue], clientOrderId);
    } catch (error) {
      throw new PortUnavailableError(`Cancel failed on ${venue}: ${describeError(error)}`, { clientOrderId });
    }
  }

  private requireClient(venue: Venue): ExchangeClient {
    if (!this.trading.liveEnabled) {
      throw new PortUnavailableError('Live trading is disabled by configuration.', { venue });
    }
    const client = this.clients[venue];
    if (!client) {
      throw new PortUnavailableError(`No exchange client configured for ${venue}.`, { venue });
    }
    return client;
  }
}
