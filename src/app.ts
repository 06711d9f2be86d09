import Fastify, { type FastifyInstance } from 'fastify';
import { registerRoutes } from './api/routes.js';
import type { AppConfig } from './config.js';
import { AccountRegistry } from './domain/accounts/accountRegistry.js';
import { CooldownTracker } from './domain/cooldown/cooldownTracker.js';
import { type EngineConfig, loadEngineConfig } from './domain/engineConfig.js';
import { RiskManager } from './domain/risk/riskManager.js';
import { EventLogger } from './infra/logger.js';
import { InMemoryMarketFeed } from './infra/markets/marketFeed.js';
import type { OrderExecutor } from './infra/orders/orderExecutor.js';
import { PaperOrderExecutor } from './infra/orders/paperExecutor.js';
import { EngineWorker } from './services/engineWorker.js';
import { HedgeEngine } from './services/hedgeEngine.js';
import { PositionCoordinator } from './services/positionCoordinator.js';
import { type Clock, systemClock } from './utils/time.js';

/** Swappable collaborators; tests pass fakes and a manual clock. */
export interface AppOverrides {
  engineConfig?: EngineConfig;
  executor?: OrderExecutor;
  feed?: InMemoryMarketFeed;
  clock?: Clock;
}

export interface AppContext {
  app: FastifyInstance;
  engine: HedgeEngine;
  worker: EngineWorker;
  coordinator: PositionCoordinator;
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  feed: InMemoryMarketFeed;
  executor: OrderExecutor;
  logger: EventLogger;
  engineConfig: EngineConfig;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  const logger = new EventLogger(config.paths.logFile, {
    minLevel: config.logging.level,
    mirrorToConsole: config.logging.mirrorToConsole,
  });
  await logger.init();

  const engineConfig = overrides.engineConfig ?? await loadEngineConfig(config.paths.engineConfigFile);
  const clock = overrides.clock ?? systemClock;
  const feed = overrides.feed ?? new InMemoryMarketFeed(clock);
  const executor = overrides.executor
    ?? new PaperOrderExecutor(feed, logger, { fillDelayMs: config.paper.fillDelayMs });

  const registry = new AccountRegistry(engineConfig.accounts, clock);
  const cooldowns = new CooldownTracker();
  const risk = new RiskManager(registry, cooldowns, engineConfig.tradingPairs, engineConfig.risk, clock);

  const coordinator = new PositionCoordinator({
    pairs: engineConfig.tradingPairs,
    registry,
    risk,
    cooldowns,
    market: feed,
    executor,
    logger,
    tradingEngine: engineConfig.tradingEngine,
    clock,
  });

  const engine = new HedgeEngine({ coordinator, registry, risk, cooldowns, logger, clock });
  const worker = new EngineWorker(engine, logger, engineConfig.monitoringIntervalMs);
  engine.startListening();
  app.addHook('onClose', async () => {
    engine.stopListening();
  });

  await registerRoutes(app, {
    config,
    engine,
    coordinator,
    registry,
    risk,
    cooldowns,
    feed,
    logger,
    now: clock,
  });

  await logger.log('info', 'engine.configured', {
    accounts: registry.list().map((account) => account.id),
    pairs: engineConfig.tradingPairs.filter((pair) => pair.isEnabled).map((pair) => pair.id),
    monitoringIntervalMs: engineConfig.monitoringIntervalMs,
  });

  return {
    app,
    engine,
    worker,
    coordinator,
    registry,
    risk,
    cooldowns,
    feed,
    executor,
    logger,
    engineConfig,
  };
}
