import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppConfig, thresholdFieldsSchema } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { ArbitrageService } from '../services/arbitrageService.js';
import { AccountBoard, QuoteBoard } from '../services/marketFeeds.js';
import { RuntimeMetrics } from '../types.js';

interface RouteDeps {
  config: AppConfig;
  store: StateStore;
  service: ArbitrageService;
  quotes: QuoteBoard;
  accounts: AccountBoard;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const thresholdUpdateSchema = thresholdFieldsSchema
  .omit({ spreadOffsets: true })
  .partial()
  .extend({ spreadOffsets: thresholdFieldsSchema.shape.spreadOffsets.partial().optional() })
  .strict()
  .refine((payload) => Object.keys(payload).length > 0, { message: 'at least one threshold required' });

const modeSchema = z.object({
  mode: z.enum(['SIMULATED', 'REAL']),
});

const pauseSchema = z.object({
  reason: z.string().min(1).max(200).optional(),
}).optional();

const closeSchema = z.object({
  reason: z.string().min(1).max(200).optional(),
}).optional();

const positionParamsSchema = z.object({
  positionId: z.string().min(1),
});

const positionsQuerySchema = z.object({
  state: z.enum(['OPENING', 'OPEN', 'CLOSING', 'CLOSED', 'FAILED_OPEN']).optional(),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const decisionsQuerySchema = limitQuerySchema.extend({
  kind: z.enum([
    'entry_candidate',
    'entry_discarded',
    'entry_blocked',
    'entry_committed',
    'exit_committed',
    'exit_blocked',
    'order_filled',
    'order_failed',
    'position_failed',
    'position_closed',
    'risk_disabled',
    'trading_halted',
  ]).optional(),
  positionId: z.string().optional(),
});

const accountSchema = z.object({
  venue: z.enum(['V1', 'V2']),
  equity: z.number().finite(),
  availableMargin: z.number().finite(),
  openPositionSize: z.number().finite(),
  receivedAt: z.number().int().nonnegative(),
});

const invalidPayload = (reply: FastifyReply, details: unknown) =>
  reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid payload.', { issues: details }));

const sendDomainError = (reply: FastifyReply, error: unknown) => {
  if (error instanceof DomainError) {
    return reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
  }
  throw error;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    mode: deps.service.getStatus().mode,
  }));

  app.get('/health', async () => {
    const runtime = deps.getRuntimeMetrics();
    const state = deps.store.snapshot();
    const metrics = deps.service.getMetrics();

    return {
      status: 'ok',
      env: deps.config.app.env,
      uptimeSeconds: runtime.uptimeSeconds,
      loopRunning: runtime.loopRunning,
      inFlightOrders: runtime.inFlightOrders,
      processPid: runtime.processPid,
      liveModeEnabled: deps.config.trading.liveEnabled,
      stateSummary: {
        positions: Object.keys(state.positions).length,
        ticks: metrics.ticks,
        lastTickAt: metrics.lastTickAt ?? null,
      },
    };
  });

  app.get('/status', async () => ({
    ...deps.service.getStatus(),
    runtime: deps.getRuntimeMetrics(),
  }));

  app.get('/spreads', async () => deps.service.getSpreads());

  app.get('/spreads/history', async (request, reply) => {
    const parse = limitQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());
    return deps.service.getSpreadHistory(parse.data.limit ?? 100);
  });

  app.get('/positions', async (request, reply) => {
    const parse = positionsQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());
    return { positions: deps.service.listPositions(parse.data) };
  });

  app.get('/positions/:positionId', async (request, reply) => {
    const parse = positionParamsSchema.safeParse(request.params);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());

    const position = deps.service.getPosition(parse.data.positionId);
    if (!position) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.PositionNotFound, `Position '${parse.data.positionId}' not found.`));
    }
    return position;
  });

  app.get('/risk', async () => deps.service.getRisk());

  app.get('/decisions', async (request, reply) => {
    const parse = decisionsQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());
    return { decisions: deps.service.listDecisions(parse.data) };
  });

  app.get('/config', async () => ({
    mode: deps.service.getStatus().mode,
    thresholds: deps.service.currentConfig(),
  }));

  app.post('/trading/pause', async (request, reply) => {
    const parse = pauseSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());
    const risk = await deps.service.pauseTrading(parse.data?.reason);
    return { ok: true, risk };
  });

  app.post('/trading/resume', async () => {
    const risk = await deps.service.resumeTrading();
    return { ok: true, risk };
  });

  app.post('/positions/:positionId/close', async (request, reply) => {
    const params = positionParamsSchema.safeParse(request.params);
    const body = closeSchema.safeParse(request.body);
    if (!params.success) return invalidPayload(reply, params.error.flatten());
    if (!body.success) return invalidPayload(reply, body.error.flatten());

    try {
      const position = await deps.service.closePosition(params.data.positionId, body.data?.reason);
      return reply.code(202).send({ message: 'close_requested', position });
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.patch('/config/thresholds', async (request, reply) => {
    const parse = thresholdUpdateSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());

    try {
      const thresholds = await deps.service.updateThresholds(parse.data);
      return { ok: true, thresholds };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.put('/config/mode', async (request, reply) => {
    const parse = modeSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());

    try {
      const mode = await deps.service.setMode(parse.data.mode);
      return { ok: true, mode };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  // Feed adapters that cannot run in-process push their latest values here.
  app.post('/market/quotes', async (request, reply) => {
    const result = deps.quotes.publishQuote(request.body);
    if (result === 'rejected') {
      return reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidQuote, 'Quote rejected.'));
    }
    return reply.code(202).send({ ok: true, result });
  });

  app.post('/market/accounts', async (request, reply) => {
    const parse = accountSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error.flatten());
    deps.accounts.publish(parse.data);
    return reply.code(202).send({ ok: true });
  });
}
