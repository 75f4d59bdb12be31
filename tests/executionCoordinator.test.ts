import { describe, expect, it } from 'vitest';
import {
  ErrorCode,
  LegMismatchError,
  OrderRejectedError,
  PartialFillTimeoutError,
  PortUnavailableError,
} from '../src/errors/taxonomy.js';
import { SubmitRequest } from '../src/services/execution/executionCoordinator.js';
import { T0, createHarness, filled, quote, sleep } from './helpers.js';

const entryQuotes = {
  V1: quote('V1', 99.9, 99.95, T0),
  V2: quote('V2', 100.5, 100.55, T0),
};

const exitQuotes = {
  V1: quote('V1', 100, 100.05, T0),
  V2: quote('V2', 99.98, 100, T0),
};

const draft = {
  direction: 'V1_TO_V2' as const,
  mode: 'SIMULATED' as const,
  targetContracts: 0.01,
  exitSpreadTarget: -0.0002,
  triggerSpread: 0.0055,
};

const entryRequest = (positionId: string, overrides: Partial<SubmitRequest> = {}): SubmitRequest => ({
  positionId,
  purpose: 'ENTRY',
  contracts: 0.01,
  quotes: entryQuotes,
  config: { fillTimeoutMs: 1_000, minFillRatio: 1 },
  ...overrides,
});

describe('ExecutionCoordinator', () => {
  it('sends both entry legs at the crossed prices and opens the position', async () => {
    const { ledger, coordinator, simPort } = await createHarness();
    const { id } = await ledger.openDraft(draft);

    const result = await coordinator.submit(entryRequest(id));

    expect(simPort.orders.map(({ venue, side, contracts, priceHint, reduceOnly }) => ({
      venue, side, contracts, priceHint, reduceOnly,
    }))).toEqual([
      { venue: 'V1', side: 'buy', contracts: 0.01, priceHint: 99.95, reduceOnly: false },
      { venue: 'V2', side: 'sell', contracts: 0.01, priceHint: 100.5, reduceOnly: false },
    ]);
    expect(result.fill.contracts).toBe(0.01);
    expect(result.unwoundExcess).toBe(0);
    expect(result.position.state).toBe('OPEN');
    expect(coordinator.isBusy(id)).toBe(false);
  });

  it('closes a closing position with reduce-only exit legs', async () => {
    const { ledger, coordinator, simPort } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    await coordinator.submit(entryRequest(id));
    await ledger.markClosing(id, 'exit_spread');

    const result = await coordinator.submit(entryRequest(id, { purpose: 'EXIT', quotes: exitQuotes }));

    expect(simPort.orders.slice(2).map(({ venue, side, priceHint, reduceOnly }) => ({ venue, side, priceHint, reduceOnly })))
      .toEqual([
        { venue: 'V2', side: 'buy', priceHint: 100, reduceOnly: true },
        { venue: 'V1', side: 'sell', priceHint: 100, reduceOnly: true },
      ]);
    expect(result.position.state).toBe('CLOSED');
  });

  it('records only the paired size and flattens the excess of an uneven fill', async () => {
    const { ledger, coordinator, simPort, store } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    simPort.handlers.V1 = (request) => filled(request, { fee: 0.01 });
    simPort.handlers.V2 = (request) => filled(request, { filledContracts: 0.006 });

    const result = await coordinator.submit(entryRequest(id));

    expect(result.fill.contracts).toBe(0.006);
    expect(result.fill.legs[0].fee).toBe(0.006);
    expect(result.unwoundExcess).toBe(0.004);
    expect(result.position.filledContracts).toBe(0.006);
    expect(result.position.state).toBe('OPENING');

    expect(simPort.orders).toHaveLength(3);
    expect(simPort.orders[2]).toMatchObject({ venue: 'V1', side: 'sell', contracts: 0.004, priceHint: 99.95, reduceOnly: true });
    expect(store.snapshot().metrics.unwindOrders).toBe(1);
  });

  it('unwinds the filled leg when the other leg fails', async () => {
    const { ledger, coordinator, simPort, store } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    simPort.handlers.V2 = () => {
      throw new Error('venue down');
    };

    await expect(coordinator.submit(entryRequest(id))).rejects.toBeInstanceOf(LegMismatchError);

    expect(simPort.orders).toHaveLength(3);
    expect(simPort.orders[2]).toMatchObject({ venue: 'V1', side: 'sell', contracts: 0.01, reduceOnly: true });
    expect(ledger.get(id)?.filledContracts).toBe(0);

    const metrics = store.snapshot().metrics;
    expect(metrics.orderFailures).toBe(1);
    expect(metrics.unwindOrders).toBe(1);
  });

  it('does not retry an unwind on a port that is unavailable', async () => {
    const { ledger, coordinator, simPort, store } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    simPort.handlers.V1 = (request) => {
      if (request.side === 'sell') throw new PortUnavailableError('Live trading is disabled by configuration.');
      return filled(request);
    };
    simPort.handlers.V2 = () => {
      throw new Error('venue down');
    };

    await expect(coordinator.submit(entryRequest(id))).rejects.toBeInstanceOf(LegMismatchError);

    expect(simPort.orders).toHaveLength(3);
    expect(coordinator.pendingWork()).toEqual({ cancels: 0, orphans: 1 });
    expect(store.snapshot().metrics.unwindOrders).toBe(0);
  });

    it('reports a rejection when neither leg fills', async () => {
    const { ledger, coordinator, simPort } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    simPort.handlers.V1 = (request) => filled(request, { status: 'rejected', filledContracts: 0 });
    simPort.handlers.V2 = (request) => filled(request, { status: 'rejected', filledContracts: 0 });

    await expect(coordinator.submit(entryRequest(id))).rejects.toBeInstanceOf(OrderRejectedError);
    expect(simPort.orders).toHaveLength(2);
  });

  it('allows one operation per position at a time', async () => {
    const { ledger, coordinator } = await createHarness();
    const { id } = await ledger.openDraft(draft);

    const first = coordinator.submit(entryRequest(id));
    expect(coordinator.isBusy(id)).toBe(true);
    await expect(coordinator.submit(entryRequest(id))).rejects.toMatchObject({ code: ErrorCode.PositionBusy });
    await first;
    expect(coordinator.inFlightCount()).toBe(0);
  });

  it('refuses unknown positions and modes without a port', async () => {
    const { ledger, coordinator } = await createHarness();
    await expect(coordinator.submit(entryRequest('pos_999999'))).rejects.toMatchObject({
      code: ErrorCode.PositionNotFound,
    });

    const { id } = await ledger.openDraft({ ...draft, mode: 'REAL' });
    await expect(coordinator.submit(entryRequest(id))).rejects.toBeInstanceOf(PortUnavailableError);
  });

  it('cancels a timed-out leg and flattens its late fill on the next sweep', async () => {
    const { ledger, coordinator, simPort } = await createHarness();
    const { id } = await ledger.openDraft(draft);
    simPort.handlers.V2 = async (request) => {
      await sleep(80);
      return filled(request);
    };

    await expect(coordinator.submit(entryRequest(id, { config: { fillTimeoutMs: 20, minFillRatio: 1 } })))
      .rejects.toBeInstanceOf(PartialFillTimeoutError);
    expect(simPort.orders[2]).toMatchObject({ venue: 'V1', side: 'sell', contracts: 0.01 });

    await sleep(150);
    expect(coordinator.pendingWork()).toEqual({ cancels: 1, orphans: 1 });

    const report = await coordinator.sweep();
    expect(report).toEqual({ cancelled: 0, flattened: 1, pending: 0, orphans: 0 });
    expect(simPort.cancels).toEqual([{ venue: 'V2', clientOrderId: simPort.orders[1].clientOrderId }]);
    expect(simPort.orders[3]).toMatchObject({ venue: 'V2', side: 'buy', contracts: 0.01, priceHint: 100.5, reduceOnly: true });
  });
});
