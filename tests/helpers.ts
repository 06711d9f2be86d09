import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { type AppConfig, loadConfig } from '../src/config.js';
import { AccountRegistry } from '../src/domain/accounts/accountRegistry.js';
import { CooldownTracker } from '../src/domain/cooldown/cooldownTracker.js';
import { type EngineConfig, type EngineConfigInput, parseEngineConfig } from '../src/domain/engineConfig.js';
import { RiskManager } from '../src/domain/risk/riskManager.js';
import { EventLogger } from '../src/infra/logger.js';
import { InMemoryMarketFeed, type MarketQuote } from '../src/infra/markets/marketFeed.js';
import type { FillListener, OrderExecutor, PlaceOrderRequest } from '../src/infra/orders/orderExecutor.js';
import { PositionCoordinator } from '../src/services/positionCoordinator.js';

export type AccountInput = EngineConfigInput['accounts'][number];
export type PairInput = EngineConfigInput['tradingPairs'][number];

export const T0 = Date.parse('2026-03-02T12:00:00.000Z');

export async function createTempDir(prefix = 'hedge-tests-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function buildTestConfig(tmpDir: string): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    DATA_DIR: tmpDir,
    LOG_FILE: path.join(tmpDir, 'events.ndjson'),
    LOG_LEVEL: 'debug',
    ENGINE_CONFIG_FILE: path.join(tmpDir, 'engine.json'),
    PAPER_FILL_DELAY_MS: '0',
  });
}

export async function createTestLogger(tmpDir: string): Promise<EventLogger> {
  const logger = new EventLogger(path.join(tmpDir, 'events.ndjson'), { minLevel: 'debug', mirrorToConsole: false });
  await logger.init();
  return logger;
}

export class ManualClock {
  constructor(private current: number = T0) {}

  readonly now = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export const healthyQuote = (overrides: Partial<MarketQuote> = {}): MarketQuote => ({
  isOpen: true,
  price: 100,
  volatility: 0.05,
  liquidity: 50_000,
  spread: 0.001,
  ...overrides,
});

export const accountInput = (id: string, overrides: Partial<AccountInput> = {}): AccountInput => ({
  id,
  address: `addr-${id}`,
  balance: 500_000,
  riskLimits: { maxDailyLoss: 2_000, minBalance: 1_000 },
  ...overrides,
});

export const pairInput = (overrides: Partial<PairInput> = {}): PairInput => ({
  id: 'btc',
  name: 'BTC hedge',
  market: 'BTC-USD',
  baseAmount: 100_000,
  maxPositions: 1,
  cooldownMinutes: 10,
  accountAddresses: ['addr-a', 'addr-b'],
  riskLimits: { maxDailyLoss: 1_500, maxPositionSize: 150_000 },
  exit: { targetMoveBps: 0, maxHoldMinutes: 0, closeOnPairHalt: false },
  ...overrides,
});

export function buildEngineConfig(overrides: Partial<EngineConfigInput> = {}): EngineConfig {
  return parseEngineConfig({
    accounts: [accountInput('a'), accountInput('b'), accountInput('c')],
    tradingPairs: [pairInput()],
    tradingEngine: {
      orderTimeoutMs: 30_000,
      maxPriceAgeMs: 15_000,
      unwind: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    },
    ...overrides,
  });
}

export interface PlacedOrder extends PlaceOrderRequest {
  orderRef: string;
}

interface PlacementFailure {
  match: (request: PlaceOrderRequest) => boolean;
  error: Error;
  remaining: number;
}

/** In-process exchange: records orders and lets the test drive fills and rejections. */
export class FakeOrderExecutor implements OrderExecutor {
  readonly placed: PlacedOrder[] = [];
  readonly cancelled: string[] = [];
  placementAttempts = 0;
  onPlace?: (order: PlacedOrder) => Promise<void>;

  private listener?: FillListener;
  private sequence = 0;
  private readonly failures: PlacementFailure[] = [];
  private cancelFailure?: { error: Error; remaining: number };

  failPlacements(match: (request: PlaceOrderRequest) => boolean, error: Error, times = Number.POSITIVE_INFINITY): void {
    this.failures.push({ match, error, remaining: times });
  }

  failCancels(error: Error, times = Number.POSITIVE_INFINITY): void {
    this.cancelFailure = { error, remaining: times };
  }

  setListener(listener: FillListener): void {
    this.listener = listener;
  }

  async placeOrder(request: PlaceOrderRequest): Promise<string> {
    this.placementAttempts += 1;
    const failure = this.failures.find((candidate) => candidate.remaining > 0 && candidate.match(request));
    if (failure) {
      failure.remaining -= 1;
      throw failure.error;
    }

    this.sequence += 1;
    const order: PlacedOrder = { ...request, orderRef: `ord-${this.sequence}` };
    this.placed.push(order);
    if (this.onPlace) await this.onPlace(order);
    return order.orderRef;
  }

  async cancelOrder(orderRef: string): Promise<void> {
    if (this.cancelFailure && this.cancelFailure.remaining > 0) {
      this.cancelFailure.remaining -= 1;
      throw this.cancelFailure.error;
    }
    this.cancelled.push(orderRef);
  }

  async close(): Promise<void> {
    this.listener = undefined;
  }

  order(orderRef: string): PlacedOrder {
    const order = this.placed.find((candidate) => candidate.orderRef === orderRef);
    if (!order) throw new Error(`unknown order ${orderRef}`);
    return order;
  }

  async fill(orderRef: string, price: number, size?: number): Promise<void> {
    await this.requireListener().onFill(orderRef, size ?? this.order(orderRef).size, price);
  }

  async reject(orderRef: string, reason: string): Promise<void> {
    await this.requireListener().onReject(orderRef, reason);
  }

  private requireListener(): FillListener {
    if (!this.listener) throw new Error('no fill listener registered');
    return this.listener;
  }
}

export interface Harness {
  clock: ManualClock;
  feed: InMemoryMarketFeed;
  executor: FakeOrderExecutor;
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  coordinator: PositionCoordinator;
  logger: EventLogger;
  engineConfig: EngineConfig;
}

export async function buildHarness(engineConfig: EngineConfig = buildEngineConfig()): Promise<Harness> {
  const tmpDir = await createTempDir();
  const logger = await createTestLogger(tmpDir);
  const clock = new ManualClock();
  const feed = new InMemoryMarketFeed(clock.now);
  const executor = new FakeOrderExecutor();
  const registry = new AccountRegistry(engineConfig.accounts, clock.now);
  const cooldowns = new CooldownTracker();
  const risk = new RiskManager(registry, cooldowns, engineConfig.tradingPairs, engineConfig.risk, clock.now);
  const coordinator = new PositionCoordinator({
    pairs: engineConfig.tradingPairs,
    registry,
    risk,
    cooldowns,
    market: feed,
    executor,
    logger,
    tradingEngine: engineConfig.tradingEngine,
    clock: clock.now,
  });

  for (const pair of engineConfig.tradingPairs) {
    feed.update(pair.market, healthyQuote(), clock.now());
  }

  return { clock, feed, executor, registry, risk, cooldowns, coordinator, logger, engineConfig };
}
