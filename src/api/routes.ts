import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import type { AccountRegistry } from '../domain/accounts/accountRegistry.js';
import type { CooldownTracker } from '../domain/cooldown/cooldownTracker.js';
import type { RiskManager } from '../domain/risk/riskManager.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { EventLogger } from '../infra/logger.js';
import type { InMemoryMarketFeed } from '../infra/markets/marketFeed.js';
import type { HedgeEngine } from '../services/hedgeEngine.js';
import type { PositionCoordinator } from '../services/positionCoordinator.js';

interface RouteDeps {
  config: AppConfig;
  engine: HedgeEngine;
  coordinator: PositionCoordinator;
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  feed: InMemoryMarketFeed;
  logger: EventLogger;
  now: () => number;
}

const hedgeStateSchema = z.enum(['pending', 'opening', 'open', 'closing', 'closed', 'failed']);

const hedgeListQuerySchema = z.object({
  state: hedgeStateSchema.optional(),
});

const riskEventsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
});

const closeHedgeSchema = z.object({
  reason: z.string().min(1).max(120).optional(),
}).default({});

const emergencyStopSchema = z.object({
  reason: z.string().min(1).max(120).default('manual'),
}).default({});

const engineStopSchema = z.object({
  closePositions: z.boolean().default(false),
}).default({});

const marketSnapshotSchema = z.object({
  market: z.string().min(2).max(40),
  isOpen: z.boolean().default(true),
  price: z.number().positive(),
  volatility: z.number().nonnegative(),
  liquidity: z.number().nonnegative(),
  spread: z.number().nonnegative(),
});

const invalidPayload = (details: unknown) => ({ error: ErrorCode.InvalidPayload, details });

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.setErrorHandler(async (error, request, reply) => {
    if (!(error instanceof DomainError) && error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: ErrorCode.InvalidPayload, message: error.message });
    }

    const envelope = toErrorEnvelope(error);
    if (!(error instanceof DomainError)) {
      await deps.logger.log('error', 'api.unhandled_error', {
        method: request.method,
        url: request.url,
        error: envelope.body.message,
      });
    }
    return reply.code(envelope.statusCode).send(envelope.body);
  });

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    running: deps.engine.isRunning(),
  }));

  app.get('/status', async () => deps.engine.status());

  app.get('/hedges', async (request, reply) => {
    const parse = hedgeListQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    return { hedges: deps.engine.hedges(parse.data.state) };
  });

  app.get<{ Params: { hedgeId: string } }>('/hedges/:hedgeId', async (request, reply) => {
    const hedge = deps.coordinator.hedge(request.params.hedgeId);
    if (!hedge) return reply.code(404).send({ error: ErrorCode.HedgeNotFound });
    return hedge;
  });

  app.post<{ Params: { hedgeId: string } }>('/hedges/:hedgeId/close', async (request, reply) => {
    const parse = closeHedgeSchema.safeParse(request.body);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    const hedge = await deps.coordinator.closeHedge(request.params.hedgeId, parse.data.reason ?? 'manual');
    return reply.code(202).send({ hedge });
  });

  app.get('/accounts', async () => ({ accounts: deps.engine.accounts() }));

  app.post<{ Params: { accountId: string } }>('/accounts/:accountId/lock', async (request, reply) => {
    const { accountId } = request.params;
    if (!deps.registry.get(accountId)) return reply.code(404).send({ error: ErrorCode.AccountNotFound });

    const locked = deps.registry.lock(accountId, 'manual');
    if (locked) {
      await deps.logger.log('warn', 'account.locked', { accountId, reason: 'manual' });
    }

    return { accountId, locked, lockReason: deps.registry.get(accountId)?.lockReason };
  });

  app.post<{ Params: { accountId: string } }>('/accounts/:accountId/unlock', async (request, reply) => {
    const { accountId } = request.params;
    const account = deps.registry.get(accountId);
    if (!account) return reply.code(404).send({ error: ErrorCode.AccountNotFound });

    const previousReason = account.lockReason;
    const unlocked = deps.registry.unlock(accountId);
    if (unlocked) {
      await deps.logger.log('info', 'account.unlocked', { accountId, previousReason });
    }

    return { accountId, unlocked, previousReason };
  });

  app.get('/risk/events', async (request, reply) => {
    const parse = riskEventsQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    return { events: deps.risk.events(parse.data.limit) };
  });

  app.post('/risk/emergency-stop', async (request, reply) => {
    const parse = emergencyStopSchema.safeParse(request.body);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    const events = deps.risk.triggerEmergencyStop(parse.data.reason, deps.now());
    for (const event of events) {
      await deps.logger.log('error', 'risk.event', { ...event });
    }

    return { active: true, triggered: events.length > 0 };
  });

  app.post('/risk/emergency-stop/reset', async () => {
    const reset = deps.risk.resetEmergencyStop();
    if (reset) {
      await deps.logger.log('warn', 'risk.emergency_stop.reset', {});
    }
    return { active: false, reset };
  });

  app.post<{ Params: { pairId: string } }>('/risk/pairs/:pairId/resume', async (request, reply) => {
    const { pairId } = request.params;
    if (!deps.coordinator.pairs().some((pair) => pair.id === pairId)) {
      return reply.code(404).send({ error: ErrorCode.PairNotFound });
    }

    const resumed = deps.risk.resumePair(pairId, deps.now());
    if (resumed) {
      await deps.logger.log('warn', 'risk.pair.resumed', { pairId });
    }
    return { pairId, resumed, halted: deps.risk.isPairHalted(pairId) };
  });

  app.get('/cooldowns', async () => ({ cooldowns: deps.cooldowns.list(deps.now()) }));

  app.post('/engine/start', async () => {
    await deps.engine.start();
    return { running: deps.engine.isRunning() };
  });

  app.post('/engine/stop', async (request, reply) => {
    const parse = engineStopSchema.safeParse(request.body);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    const result = await deps.engine.stop({ closePositions: parse.data.closePositions });
    return { running: deps.engine.isRunning(), ...result };
  });

  app.post('/market/snapshots', async (request, reply) => {
    const parse = marketSnapshotSchema.safeParse(request.body);
    if (!parse.success) {
      return reply.code(400).send(invalidPayload(parse.error.flatten()));
    }

    const { market, ...quote } = parse.data;
    deps.feed.update(market, quote, deps.now());

    return { ok: true, snapshot: await deps.feed.getSnapshot(market) };
  });
}
