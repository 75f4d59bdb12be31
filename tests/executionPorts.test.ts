import { describe, expect, it } from 'vitest';
import { FeeEngine } from '../src/domain/fee/feeEngine.js';
import { OrderRejectedError, PortUnavailableError } from '../src/errors/taxonomy.js';
import { ExchangeClient, ExchangeOrderParams, LiveExecutionPort } from '../src/services/execution/liveExecutionPort.js';
import { OrderRequest } from '../src/services/execution/executionPort.js';
import { PaperExecutionPort } from '../src/services/execution/paperExecutionPort.js';
import { T0 } from './helpers.js';

const feeEngine = new FeeEngine({ feeRates: { V1: 0.00006, V2: 0.00005 } });

const order = (overrides: Partial<OrderRequest> = {}): OrderRequest => ({
  clientOrderId: 'cid-1',
  venue: 'V1',
  side: 'buy',
  contracts: 0.01,
  priceHint: 100,
  reduceOnly: false,
  ...overrides,
});

class StubClient implements ExchangeClient {
  readonly placed: ExchangeOrderParams[] = [];

  constructor(private readonly response: unknown, private readonly cancelError?: Error) {}

  async placeMarketOrder(params: ExchangeOrderParams): Promise<unknown> {
    this.placed.push(params);
    return this.response;
  }

  async cancelOrder(): Promise<boolean> {
    if (this.cancelError) throw this.cancelError;
    return true;
  }
}

const symbols = { V1: 'TEST-V1', V2: 'TEST-V2' };

describe('PaperExecutionPort', () => {
  it('fills in full with slippage against the taker and venue fees', async () => {
    const port = new PaperExecutionPort(feeEngine, { slippage: 0.001, latencyMs: 0 }, () => T0);

    const buy = await port.placeOrder(order());
    expect(buy).toMatchObject({ status: 'filled', filledContracts: 0.01, avgPrice: 100.1, fee: 0.00006006 });
    expect(buy.orderRef.startsWith('paper_')).toBe(true);
    expect(buy.filledAt).toBe(new Date(T0).toISOString());

    const sell = await port.placeOrder(order({ venue: 'V2', side: 'sell', clientOrderId: 'cid-2' }));
    expect(sell).toMatchObject({ avgPrice: 99.9, fee: 0.00004995 });

    expect(port.history().map((r) => r.clientOrderId)).toEqual(['cid-1', 'cid-2']);
    expect(await port.cancel('V1', 'cid-1')).toBe(false);
  });

  it('rejects orders without size or price', async () => {
    const port = new PaperExecutionPort(feeEngine, { slippage: 0, latencyMs: 0 });
    await expect(port.placeOrder(order({ contracts: 0 }))).rejects.toBeInstanceOf(OrderRejectedError);
    await expect(port.placeOrder(order({ priceHint: -1 }))).rejects.toBeInstanceOf(OrderRejectedError);
    expect(port.history()).toEqual([]);
  });
});

describe('LiveExecutionPort', () => {
  it('maps a venue fill onto an order result', async () => {
    const client = new StubClient({ orderId: 'ex-42', status: 'partial', filledContracts: 0.005, avgPrice: 100.2 });
    const port = new LiveExecutionPort({ V1: client, V2: client }, feeEngine, { liveEnabled: true, symbols }, () => T0);

    const result = await port.placeOrder(order({ reduceOnly: true }));

    expect(client.placed).toEqual([
      { symbol: 'TEST-V1', clientOrderId: 'cid-1', side: 'buy', contracts: 0.01, reduceOnly: true },
    ]);
    expect(result).toEqual({
      orderRef: 'ex-42',
      clientOrderId: 'cid-1',
      venue: 'V1',
      side: 'buy',
      status: 'partial',
      filledContracts: 0.005,
      avgPrice: 100.2,
      fee: 0.00003006,
      filledAt: new Date(T0).toISOString(),
    });
  });

  it('treats malformed and rejected responses as rejections', async () => {
    const malformed = new LiveExecutionPort(
      { V1: new StubClient({ status: 'filled' }) },
      feeEngine,
      { liveEnabled: true, symbols },
    );
    await expect(malformed.placeOrder(order())).rejects.toBeInstanceOf(OrderRejectedError);

    const rejected = new LiveExecutionPort(
      { V1: new StubClient({ orderId: 'ex-1', status: 'rejected', filledContracts: 0, avgPrice: 0 }) },
      feeEngine,
      { liveEnabled: true, symbols },
    );
    await expect(rejected.placeOrder(order())).rejects.toBeInstanceOf(OrderRejectedError);
  });

  it('stays unavailable until enabled with both venues connected', async () => {
    const client = new StubClient({ orderId: 'ex-1', status: 'filled', filledContracts: 0.01, avgPrice: 100 });

    const disabled = new LiveExecutionPort({ V1: client, V2: client }, feeEngine, { liveEnabled: false, symbols });
    expect(disabled.isReadyForLive()).toBe(false);
    await expect(disabled.placeOrder(order())).rejects.toBeInstanceOf(PortUnavailableError);

    const oneVenue = new LiveExecutionPort({ V1: client }, feeEngine, { liveEnabled: true, symbols });
    expect(oneVenue.isReadyForLive()).toBe(false);
    await expect(oneVenue.placeOrder(order({ venue: 'V2' }))).rejects.toBeInstanceOf(PortUnavailableError);
  });

  it('surfaces a failed cancel as port unavailable', async () => {
    const client = new StubClient({}, new Error('socket closed'));
    const port = new LiveExecutionPort({ V1: client, V2: client }, feeEngine, { liveEnabled: true, symbols });

    await expect(port.cancel('V2', 'cid-9')).rejects.toBeInstanceOf(PortUnavailableError);
  });
});
