import { v4 as uuid } from 'uuid';
import { FeeEngine } from '../../domain/fee/feeEngine.js';
import { OrderRejectedError } from '../../errors/taxonomy.js';
import { Venue } from '../../types.js';
import { sleep } from '../../utils/retry.js';
import { Clock, isoAt, systemClock } from '../../utils/time.js';
import { ExecutionPort, OrderRequest, OrderResult } from './executionPort.js';

export interface PaperExecutionOptions {
  /** Fractional price penalty applied against the taker on every fill. */
  slippage: number;
  latencyMs: number;
}

/**
 * Fills every market order in full at the hinted price worsened by a fixed
 * slippage. Fees use the same per-venue taker rates as live accounting.
 */
export class PaperExecutionPort implements ExecutionPort {
  readonly mode = 'SIMULATED' as const;
  private readonly placed: OrderRequest[] = [];

  constructor(
    private readonly feeEngine: FeeEngine,
    private readonly options: PaperExecutionOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    if (!(request.contracts > 0) || !(request.priceHint > 0)) {
      throw new OrderRejectedError('Paper order needs positive contracts and price.', {
        venue: request.venue,
        clientOrderId: request.clientOrderId,
      });
    }

    this.placed.push({ ...request });
    if (this.options.latencyMs > 0) {
      await sleep(this.options.latencyMs);
    }

    const adjust = request.side === 'buy' ? 1 + this.options.slippage : 1 - this.options.slippage;
    const avgPrice = Number((request.priceHint * adjust).toFixed(8));

    return {
      orderRef: `paper_${uuid()}`,
      clientOrderId: request.clientOrderId,
      venue: request.venue,
      side: request.side,
      status: 'filled',
      filledContracts: request.contracts,
      avgPrice,
      fee: this.feeEngine.calculateLegFee(request.venue, avgPrice * request.contracts),
      filledAt: isoAt(this.clock()),
    };
  }

  async cancel(_venue: Venue, _clientOrderId: string): Promise<boolean> {
    return false;
  }

  /** Orders accepted so far, oldest first. */
  history(): OrderRequest[] {
    return this.placed.map((request) => ({ ...request }));
  }
}
