import { ExecutionMode, OrderSide, Venue } from '../../types.js';

export interface OrderRequest {
  clientOrderId: string;
  venue: Venue;
  side: OrderSide;
  contracts: number;
  /** Top-of-book price when the order was planned. Market orders may fill elsewhere. */
  priceHint: number;
  reduceOnly: boolean;
}

export type OrderStatus = 'filled' | 'partial' | 'rejected';

export interface OrderResult {
  orderRef: string;
  clientOrderId: string;
  venue: Venue;
  side: OrderSide;
  status: OrderStatus;
  filledContracts: number;
  avgPrice: number;
  fee: number;
  filledAt: string;
}

/**
 * One venue-agnostic order capability per mode. SIMULATED and REAL
 * implementations are interchangeable behind this signature.
 */
export interface ExecutionPort {
  readonly mode: ExecutionMode;
  placeOrder(request: OrderRequest): Promise<OrderResult>;
  /** Resolves false when there is nothing left to cancel. */
  cancel(venue: Venue, clientOrderId: string): Promise<boolean>;
}

export const oppositeSide = (side: OrderSide): OrderSide => (side === 'buy' ? 'sell' : 'buy');
