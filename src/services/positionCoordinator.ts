import { v4 as uuid } from 'uuid';
import type { AccountRegistry } from '../domain/accounts/accountRegistry.js';
import type { CooldownTracker } from '../domain/cooldown/cooldownTracker.js';
import type { TradingEngineConfig } from '../domain/engineConfig.js';
import { type AdmissionCheckName, type AdmissionDecision, AdmissionGate } from '../domain/gate/admissionGate.js';
import { evaluateClose } from '../domain/hedge/closePolicy.js';
import { HedgeBook, type OrderCallback, type OrderLink, TERMINAL_STATES } from '../domain/hedge/hedgeBook.js';
import type { RiskManager } from '../domain/risk/riskManager.js';
import {
  DomainError,
  ErrorCode,
  OrderRejectedError,
  OrderTimeoutError,
  ReservationError,
  UnwindFailedError,
  describeError,
  toErrorEnvelope,
} from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { KeyedLock } from '../infra/lock/keyedLock.js';
import type { EventLogger } from '../infra/logger.js';
import type { MarketSnapshotProvider } from '../infra/markets/marketFeed.js';
import type { FillListener, OrderExecutor, PlaceOrderRequest } from '../infra/orders/orderExecutor.js';
import type {
  CloseIntent,
  EngineMetrics,
  Hedge,
  HedgeState,
  Leg,
  LegSide,
  MarketSnapshot,
  OrderSide,
  RiskEvent,
  TradingPair,
} from '../types.js';
import { backoffDelayMs, retryWithBackoff, sleep } from '../utils/retry.js';
import { type Clock, minutesToMs, systemClock } from '../utils/time.js';

export interface CoordinatorDeps {
  pairs: TradingPair[];
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  market: MarketSnapshotProvider;
  executor: OrderExecutor;
  logger: EventLogger;
  tradingEngine: TradingEngineConfig;
  clock?: Clock;
}

export type PairOutcome =
  | { pairId: string; status: 'admitted'; hedgeId: string }
  | { pairId: string; status: 'denied'; check: AdmissionCheckName; reason: string }
  | { pairId: string; status: 'reservation_failed'; reason: string }
  | { pairId: string; status: 'error'; error: string };

const round = (v: number): number => Number(v.toFixed(8));

/** Adds one fill to a running size and volume-weighted price. */
const accumulate = <T extends { filledSize: number; avgPrice?: number }>(target: T, size: number, price: number): void => {
  if (size <= 0) return;
  const total = target.filledSize + size;
  target.avgPrice = round(((target.avgPrice ?? 0) * target.filledSize + price * size) / total);
  target.filledSize = round(total);
};

const entrySide = (side: LegSide): OrderSide => (side === 'long' ? 'buy' : 'sell');
const exitSide = (side: LegSide): OrderSide => (side === 'long' ? 'sell' : 'buy');

/** Realised PnL of one leg whose size is a quote-currency notional. */
export const legPnl = (side: LegSide, size: number, entryPrice: number, exitPrice: number): number => {
  const longPnl = size * (exitPrice - entryPrice) / entryPrice;
  return round(side === 'long' ? longPnl : -longPnl);
};

/**
 * Drives every hedge from admission to a terminal state.
 *
 * Hedge and account mutations are synchronous and happen before any await; every
 * continuation re-reads hedge state, so callbacks that race each other (or arrive
 * twice) converge on the same result. Entry failures and closes share one unwind path.
 */
export class PositionCoordinator implements FillListener {
  readonly book = new HedgeBook();
  readonly gate: AdmissionGate;

  private readonly clock: Clock;
  private readonly pairLocks = new KeyedLock();
  private readonly pairsById: Map<string, TradingPair>;
  private readonly lastSides = new Map<string, Map<string, LegSide>>();
  private readonly cancelling = new Set<string>();
  private readonly unwindsInFlight = new Set<string>();
  private readonly metrics: EngineMetrics = {
    ticks: 0,
    admissions: 0,
    denialsByCheck: {},
    hedgesOpened: 0,
    hedgesClosed: 0,
    hedgesFailed: 0,
    unwindFailures: 0,
  };

  constructor(private readonly deps: CoordinatorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.pairsById = new Map(deps.pairs.map((pair) => [pair.id, pair]));
    this.gate = new AdmissionGate({
      registry: deps.registry,
      risk: deps.risk,
      cooldowns: deps.cooldowns,
      market: deps.market,
      book: this.book,
      tradingEngine: deps.tradingEngine,
    });
    deps.executor.setListener(this);
  }

  pairs(): TradingPair[] {
    return [...this.pairsById.values()];
  }

  /**
   * One monitoring pass: risk safety net, order timeouts, close policy, then admission
   * for every enabled pair (pairs run concurrently).
   */
  async tick(options: { admit: boolean }): Promise<PairOutcome[]> {
    const now = this.clock();
    this.metrics.ticks += 1;
    this.metrics.lastTickAt = now;

    await this.logRiskEvents(this.deps.risk.evaluate(now));
    await this.sweepTimeouts(now);
    await this.applyClosePolicy(now);

    if (!options.admit) return [];

    const enabled = this.pairs().filter((pair) => pair.isEnabled);
    return Promise.all(enabled.map((pair) => this.evaluatePair(pair)));
  }

  /** Gate decision only; never reserves or places anything. */
  async checkAdmission(pairId: string, now: number = this.clock()): Promise<AdmissionDecision> {
    return this.gate.evaluate(this.requirePair(pairId), now);
  }

  async evaluatePair(pair: TradingPair): Promise<PairOutcome> {
    return this.pairLocks.run(pair.id, async () => {
      try {
        return await this.admit(pair);
      } catch (error) {
        await this.deps.logger.log('error', 'pair.evaluate.error', { pairId: pair.id, error: describeError(error) });
        return { pairId: pair.id, status: 'error', error: describeError(error) };
      }
    });
  }

  async onFill(orderRef: string, filledSize: number, avgPrice: number): Promise<void> {
    await this.route(orderRef, { type: 'fill', filledSize, avgPrice });
  }

  async onReject(orderRef: string, reason: string): Promise<void> {
    await this.route(orderRef, { type: 'reject', reason });
  }

  async closeHedge(hedgeId: string, reason = 'manual'): Promise<Hedge> {
    const hedge = this.book.get(hedgeId);
    if (!hedge) {
      throw new DomainError(ErrorCode.HedgeNotFound, 404, `Hedge ${hedgeId} not found.`);
    }
    if (hedge.state !== 'open' && hedge.state !== 'opening') {
      throw new DomainError(ErrorCode.InvalidHedgeState, 409, `Hedge ${hedgeId} is ${hedge.state}; only open or opening hedges can be closed.`);
    }

    await this.beginUnwind(hedge, 'close', reason);
    return structuredClone(hedge);
  }

  /** Drives every open and opening hedge through the unwind path. Returns how many started. */
  async unwindAll(reason: string): Promise<number> {
    const targets = this.book.all().filter((hedge) => hedge.state === 'open' || hedge.state === 'opening');
    await Promise.all(targets.map((hedge) => this.beginUnwind(hedge, 'close', reason)));
    return targets.length;
  }

  hedges(state?: HedgeState): Hedge[] {
    const all = this.book.all();
    return structuredClone(state ? all.filter((hedge) => hedge.state === state) : all);
  }

  hedge(hedgeId: string): Hedge | undefined {
    const hedge = this.book.get(hedgeId);
    return hedge ? structuredClone(hedge) : undefined;
  }

  metricsSnapshot(): EngineMetrics {
    return structuredClone(this.metrics);
  }

  private async admit(pair: TradingPair): Promise<PairOutcome> {
    const decision = await this.gate.evaluate(pair, this.clock());
    if (!decision.admitted) {
      return this.deny(pair, decision.check, decision.reason, decision.details);
    }

    // Halts and cooldowns may have changed while the market snapshot was awaited.
    const now = this.clock();
    const risk = this.deps.risk.checkAdmission(pair, decision.accountIds);
    if (!risk.allowed) return this.deny(pair, 'risk_clear', risk.reason);
    if (this.deps.cooldowns.isActive(pair.id, now)) return this.deny(pair, 'cooldown_clear', 'cooldown_active');

    const hedgeId = uuid();
    try {
      this.deps.registry.reserveGroup(decision.accountIds, pair.baseAmount, hedgeId);
    } catch (error) {
      if (!(error instanceof ReservationError)) throw error;
      await this.deps.logger.log('debug', 'admission.reservation_failed', {
        pairId: pair.id,
        accountId: error.accountId,
        reason: error.message,
      });
      return { pairId: pair.id, status: 'reservation_failed', reason: error.message };
    }

    const hedge = this.createHedge(hedgeId, pair, decision.accountIds, now);
    this.transition(hedge, 'opening');
    this.metrics.admissions += 1;
    eventBus.emit('admission.admitted', { pairId: pair.id, hedgeId, accountIds: decision.accountIds });

    await this.deps.logger.log('info', 'hedge.opening', {
      hedgeId,
      pairId: pair.id,
      market: pair.market,
      price: decision.snapshot.price,
      legs: hedge.legs.map((leg) => ({ accountId: leg.accountId, side: leg.side, size: leg.size })),
    });

    await Promise.all(hedge.legs.map((_, legIndex) => this.placeEntry(hedge, legIndex)));
    await this.reconcile(hedge);

    return { pairId: pair.id, status: 'admitted', hedgeId };
  }

  private async deny(
    pair: TradingPair,
    check: AdmissionCheckName,
    reason: string,
    details?: Record<string, unknown>,
  ): Promise<PairOutcome> {
    this.metrics.denialsByCheck[check] = (this.metrics.denialsByCheck[check] ?? 0) + 1;
    await this.deps.logger.log('debug', 'admission.denied', { pairId: pair.id, check, reason, ...details });
    return { pairId: pair.id, status: 'denied', check, reason };
  }

  private createHedge(hedgeId: string, pair: TradingPair, accountIds: string[], now: number): Hedge {
    const sides = this.assignSides(pair.id, accountIds);
    const hedge: Hedge = {
      id: hedgeId,
      pairId: pair.id,
      market: pair.market,
      state: 'pending',
      createdAt: now,
      legs: accountIds.map((accountId, index) => ({
        accountId,
        side: sides[index] ?? 'long',
        size: pair.baseAmount,
        fillState: 'pending',
        filledSize: 0,
      })),
    };

    this.book.add(hedge);
    eventBus.emit('hedge.state', { hedgeId, pairId: pair.id, from: null, to: 'pending' });
    return hedge;
  }

  /**
   * Alternating long/short in selection order. With rotation on, the pattern flips when
   * the first account was long on this pair last time.
   */
  private assignSides(pairId: string, accountIds: string[]): LegSide[] {
    let sides: LegSide[] = accountIds.map((_, index) => (index % 2 === 0 ? 'long' : 'short'));

    const history = this.lastSides.get(pairId) ?? new Map<string, LegSide>();
    const first = accountIds[0];
    if (this.deps.tradingEngine.rotateSides && first !== undefined && history.get(first) === 'long') {
      sides = sides.map((side) => (side === 'long' ? 'short' : 'long'));
    }

    accountIds.forEach((accountId, index) => {
      const side = sides[index];
      if (side) history.set(accountId, side);
    });
    this.lastSides.set(pairId, history);
    return sides;
  }

  private async placeEntry(hedge: Hedge, legIndex: number): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const account = this.deps.registry.get(leg.accountId);
    leg.placedAt = this.clock();

    let orderRef: string;
    try {
      if (!account) throw new OrderRejectedError('unknown_account', { accountId: leg.accountId });
      orderRef = await this.placeWithDeadline({
        accountId: account.id,
        address: account.address,
        market: hedge.market,
        side: entrySide(leg.side),
        size: leg.size,
        reduceOnly: false,
      });
    } catch (error) {
      if (leg.fillState !== 'pending') return;
      leg.fillState = 'rejected';
      leg.reason = describeError(error);
      await this.deps.logger.log('warn', 'leg.rejected', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        stage: 'placement',
        ...toErrorEnvelope(error).body,
      });
      return;
    }

    if (leg.fillState !== 'pending') {
      // The sweep gave up on this placement while it was still outstanding.
      await this.cancelStray(orderRef, leg.accountId, hedge.pairId);
      return;
    }

    leg.orderRef = orderRef;
    this.deps.registry.orderPlaced(leg.accountId);
    const early = this.book.linkOrder(orderRef, { hedgeId: hedge.id, legIndex, kind: 'entry' });

    await this.deps.logger.log('debug', 'leg.placed', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      orderRef,
      side: leg.side,
      size: leg.size,
    });

    for (const callback of early) {
      await this.apply({ hedgeId: hedge.id, legIndex, kind: 'entry' }, orderRef, callback);
    }
    if (early.length === 0 && hedge.state === 'closing') {
      // The hedge started unwinding while this order was being placed.
      await this.cancelEntry(hedge, legIndex, 'unwind');
      await this.settleIfFlat(hedge);
    }
  }

  private async route(orderRef: string, callback: OrderCallback): Promise<void> {
    const link = this.book.resolve(orderRef);
    if (!link) {
      this.book.bufferOrphan(orderRef, callback);
      await this.deps.logger.log('debug', 'order.callback.buffered', { orderRef, type: callback.type });
      return;
    }
    await this.apply(link, orderRef, callback);
  }

  private async apply(link: OrderLink, orderRef: string, callback: OrderCallback): Promise<void> {
    const hedge = this.book.get(link.hedgeId);
    const leg = hedge?.legs[link.legIndex];
    if (!hedge || !leg) return;

    if (link.kind === 'entry') {
      await this.applyEntry(hedge, leg, orderRef, callback);
    } else {
      await this.applyUnwind(hedge, link.legIndex, orderRef, callback);
    }

    await this.reconcile(hedge);
  }

  private async applyEntry(hedge: Hedge, leg: Leg, orderRef: string, callback: OrderCallback): Promise<void> {
    if (leg.fillState === 'filled') return;

    if (callback.type === 'reject') {
      if (leg.fillState !== 'pending') return;
      leg.fillState = 'rejected';
      leg.reason = callback.reason;
      this.deps.registry.orderSettled(leg.accountId);
      await this.deps.logger.log('warn', 'leg.rejected', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        orderRef,
        ...toErrorEnvelope(new OrderRejectedError(callback.reason)).body,
      });
      return;
    }

    const wasPending = leg.fillState === 'pending';
    // Once the hedge settled, or this leg's unwind was sized, extra fills are untracked exposure.
    const tracked = !TERMINAL_STATES.has(hedge.state) && leg.unwind === undefined;
    accumulate(leg, callback.filledSize, callback.avgPrice);

    if (!tracked) {
      this.deps.registry.lock(leg.accountId, 'unwind_failed', true);
      await this.logRiskEvents([this.deps.risk.raise({
        level: 'account',
        reason: 'late_fill_after_settlement',
        action: 'halt-account',
        accountId: leg.accountId,
        pairId: hedge.pairId,
      })]);
      await this.deps.logger.log('error', 'leg.late_fill', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        orderRef,
        filledSize: callback.filledSize,
      });
      return;
    }

    const complete = wasPending && this.isComplete(leg.filledSize, leg.size);
    if (complete) {
      leg.fillState = 'filled';
      this.deps.registry.orderSettled(leg.accountId);
    }

    await this.deps.logger.log('info', complete || !wasPending ? 'leg.filled' : 'leg.partial_fill', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      orderRef,
      size: callback.filledSize,
      filledSize: leg.filledSize,
      legSize: leg.size,
      avgPrice: leg.avgPrice,
      late: !wasPending,
    });
  }

  private isComplete(filledSize: number, size: number): boolean {
    return filledSize >= size * (1 - this.deps.tradingEngine.fillTolerance);
  }

  private async applyUnwind(hedge: Hedge, legIndex: number, orderRef: string, callback: OrderCallback): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const unwind = leg.unwind;
    if (!unwind || unwind.orderRef !== orderRef || unwind.state !== 'pending') return;

    if (callback.type === 'fill') {
      accumulate(unwind, callback.filledSize, callback.avgPrice);
      const complete = this.isComplete(unwind.filledSize, leg.filledSize);
      if (complete) {
        unwind.state = 'filled';
        this.deps.registry.orderSettled(leg.accountId);
      }
      await this.deps.logger.log('info', complete ? 'unwind.filled' : 'unwind.partial_fill', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        orderRef,
        filledSize: unwind.filledSize,
        legSize: leg.filledSize,
        avgPrice: unwind.avgPrice,
      });
      return;
    }

    this.deps.registry.orderSettled(leg.accountId);
    unwind.state = 'placing';
    unwind.reason = callback.reason;
    await this.deps.logger.log('warn', 'unwind.rejected', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      orderRef,
      attempts: unwind.attempts,
      reason: callback.reason,
    });
    await this.placeUnwind(hedge, legIndex);
  }

  private async reconcile(hedge: Hedge): Promise<void> {
    if (hedge.state === 'opening') {
      if (hedge.legs.every((leg) => leg.fillState === 'filled')) {
        await this.markOpen(hedge);
        return;
      }

      const failed = hedge.legs.find((leg) =>
        leg.fillState === 'rejected' || leg.fillState === 'cancelled' || (leg.fillState === 'pending' && leg.expired));
      if (failed) {
        await this.beginUnwind(hedge, 'failure', failed.reason ?? `leg_${failed.fillState}`);
      }
      return;
    }

    if (hedge.state === 'closing') {
      await this.driveUnwind(hedge);
    }
  }

  private async markOpen(hedge: Hedge): Promise<void> {
    const now = this.clock();
    const prices = hedge.legs.map((leg) => leg.avgPrice ?? 0);
    hedge.entryPrice = round(prices.reduce((sum, price) => sum + price, 0) / prices.length);
    hedge.openedAt = now;
    this.transition(hedge, 'open');
    this.metrics.hedgesOpened += 1;

    await this.deps.logger.log('info', 'hedge.opened', {
      hedgeId: hedge.id,
      pairId: hedge.pairId,
      entryPrice: hedge.entryPrice,
    });
  }

  private async beginUnwind(hedge: Hedge, intent: CloseIntent, reason: string): Promise<void> {
    if (hedge.state !== 'opening' && hedge.state !== 'open') return;

    hedge.closeIntent = intent;
    if (intent === 'failure') {
      hedge.failureReason = reason;
    } else {
      hedge.closeReason = reason;
    }
    this.transition(hedge, 'closing', reason);

    await this.deps.logger.log(intent === 'failure' ? 'warn' : 'info', 'hedge.unwinding', {
      hedgeId: hedge.id,
      pairId: hedge.pairId,
      intent,
      reason,
    });

    await this.driveUnwind(hedge);
  }

  private async driveUnwind(hedge: Hedge): Promise<void> {
    if (hedge.state !== 'closing') return;

    await Promise.all(hedge.legs.map(async (leg, legIndex) => {
      if (leg.fillState === 'pending' && leg.orderRef) {
        await this.cancelEntry(hedge, legIndex, 'unwind');
      }
      // Partially filled legs that were cancelled or rejected still carry exposure.
      if (leg.fillState !== 'pending' && leg.filledSize > 0 && !leg.unwind) {
        await this.placeUnwind(hedge, legIndex);
      }
    }));

    await this.settleIfFlat(hedge);
  }

  /**
   * A failed cancel leaves the leg pending and is retried on the next reconciliation.
   * After `unwind.maxAttempts` failures the order is written off and the account locked.
   */
  private async cancelEntry(hedge: Hedge, legIndex: number, reason: string): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const orderRef = leg.orderRef;
    if (leg.fillState !== 'pending' || !orderRef || this.cancelling.has(orderRef)) return;

    this.cancelling.add(orderRef);
    try {
      await this.deps.executor.cancelOrder(orderRef);
    } catch (error) {
      leg.cancelAttempts = (leg.cancelAttempts ?? 0) + 1;
      await this.deps.logger.log('warn', 'leg.cancel_failed', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        orderRef,
        attempt: leg.cancelAttempts,
        error: describeError(error),
      });
      if (leg.fillState === 'pending' && leg.cancelAttempts >= this.deps.tradingEngine.unwind.maxAttempts) {
        await this.abandonEntry(hedge, leg, orderRef);
      }
      return;
    } finally {
      this.cancelling.delete(orderRef);
    }

    if (leg.fillState !== 'pending') return;
    leg.fillState = 'cancelled';
    leg.reason = reason;
    this.deps.registry.orderSettled(leg.accountId);

    await this.deps.logger.log('info', 'leg.cancelled', { hedgeId: hedge.id, accountId: leg.accountId, orderRef, reason });
  }

  /** The order may still be live at the venue; any later fill takes the late-fill path. */
  private async abandonEntry(hedge: Hedge, leg: Leg, orderRef: string): Promise<void> {
    leg.fillState = 'cancelled';
    leg.reason = 'cancel_failed';
    this.deps.registry.orderSettled(leg.accountId);
    this.deps.registry.lock(leg.accountId, 'unwind_failed', true);

    await this.logRiskEvents([this.deps.risk.raise({
      level: 'account',
      reason: 'cancel_failed',
      action: 'halt-account',
      accountId: leg.accountId,
      pairId: hedge.pairId,
      value: leg.cancelAttempts,
      limit: this.deps.tradingEngine.unwind.maxAttempts,
    })]);
    await this.deps.logger.log('error', 'leg.cancel_abandoned', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      orderRef,
      filledSize: leg.filledSize,
    });
  }

  private async placeUnwind(hedge: Hedge, legIndex: number): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const key = `${hedge.id}:${legIndex}`;
    if (this.unwindsInFlight.has(key)) return;

    const unwind = leg.unwind ?? { state: 'placing', attempts: 0, filledSize: 0 };
    leg.unwind = unwind;
    if (unwind.state === 'pending' || unwind.state === 'filled' || unwind.state === 'failed') return;

    const opts = this.deps.tradingEngine.unwind;
    const remaining = opts.maxAttempts - unwind.attempts;
    if (remaining <= 0) {
      await this.failUnwind(hedge, legIndex, unwind.reason ?? 'attempts_exhausted');
      return;
    }

    const account = this.deps.registry.get(leg.accountId);
    this.unwindsInFlight.add(key);
    unwind.state = 'placing';

    const size = round(leg.filledSize - unwind.filledSize);
    let orderRef: string;
    try {
      if (unwind.attempts > 0) {
        await sleep(backoffDelayMs(unwind.attempts, opts));
      }
      orderRef = await retryWithBackoff(async () => {
        unwind.attempts += 1;
        if (!account) throw new OrderRejectedError('unknown_account', { accountId: leg.accountId });
        return this.placeWithDeadline({
          accountId: account.id,
          address: account.address,
          market: hedge.market,
          side: exitSide(leg.side),
          size,
          reduceOnly: true,
        });
      }, {
        maxAttempts: remaining,
        baseDelayMs: opts.baseDelayMs,
        maxDelayMs: opts.maxDelayMs,
        shouldRetry: (error) => !(error instanceof OrderRejectedError && error.reason === 'unknown_account'),
        onRetry: async ({ attempt, nextDelayMs, error }) => {
          await this.deps.logger.log('warn', 'unwind.retry', {
            hedgeId: hedge.id,
            accountId: leg.accountId,
            attempt,
            nextDelayMs,
            error: describeError(error),
          });
        },
      });
    } catch (error) {
      this.unwindsInFlight.delete(key);
      unwind.reason = describeError(error);
      await this.failUnwind(hedge, legIndex, unwind.reason);
      return;
    }

    this.unwindsInFlight.delete(key);
    unwind.orderRef = orderRef;
    unwind.state = 'pending';
    unwind.placedAt = this.clock();
    this.deps.registry.orderPlaced(leg.accountId);
    const early = this.book.linkOrder(orderRef, { hedgeId: hedge.id, legIndex, kind: 'unwind' });

    await this.deps.logger.log('info', 'unwind.placed', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      orderRef,
      side: exitSide(leg.side),
      size,
      attempt: unwind.attempts,
    });

    for (const callback of early) {
      await this.apply({ hedgeId: hedge.id, legIndex, kind: 'unwind' }, orderRef, callback);
    }
  }

  /**
   * Caps one placement call at `orderTimeoutMs`. An order the venue accepts after the
   * cap is cancelled as soon as its reference arrives.
   */
  private async placeWithDeadline(request: PlaceOrderRequest): Promise<string> {
    const timeoutMs = this.deps.tradingEngine.orderTimeoutMs;
    const placing = this.deps.executor.placeOrder(request);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new OrderTimeoutError(`placement for ${request.accountId}`, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([placing, deadline]);
    } catch (error) {
      if (error instanceof OrderTimeoutError) {
        void placing.then(
          (orderRef) => this.cancelStray(orderRef, request.accountId),
          (lateError: unknown) => this.deps.logger.log('debug', 'order.placement.abandoned', {
            accountId: request.accountId,
            error: describeError(lateError),
          }),
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Cancels an order no leg owns. If that fails, or it already filled, the account is locked. */
  private async cancelStray(orderRef: string, accountId: string, pairId?: string): Promise<void> {
    let failure: string | undefined;
    try {
      await this.deps.executor.cancelOrder(orderRef);
    } catch (error) {
      failure = describeError(error);
    }

    const filled = this.book.takeOrphans(orderRef).some((callback) => callback.type === 'fill');
    if (failure === undefined && !filled) {
      await this.deps.logger.log('warn', 'order.stray_cancelled', { orderRef, accountId });
      return;
    }

    this.deps.registry.lock(accountId, 'unwind_failed', true);
    await this.logRiskEvents([this.deps.risk.raise({
      level: 'account',
      reason: filled ? 'stray_order_filled' : 'stray_order_cancel_failed',
      action: 'halt-account',
      accountId,
      pairId,
    })]);
    await this.deps.logger.log('error', 'order.stray', { orderRef, accountId, filled, error: failure });
  }

  private async failUnwind(hedge: Hedge, legIndex: number, reason: string): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const unwind = leg.unwind ?? { state: 'failed', attempts: 0, filledSize: 0 };
    leg.unwind = unwind;
    if (unwind.state === 'failed') return;
    unwind.state = 'failed';

    const error = new UnwindFailedError(hedge.id, leg.accountId, unwind.attempts, reason);
    this.deps.registry.lock(leg.accountId, 'unwind_failed', true);
    this.metrics.unwindFailures += 1;

    await this.logRiskEvents([this.deps.risk.raise({
      level: 'account',
      reason: 'unwind_failed',
      action: 'halt-account',
      accountId: leg.accountId,
      pairId: hedge.pairId,
      value: unwind.attempts,
      limit: this.deps.tradingEngine.unwind.maxAttempts,
    })]);
    await this.deps.logger.log('error', 'unwind.failed', {
      hedgeId: hedge.id,
      pairId: hedge.pairId,
      accountId: leg.accountId,
      ...toErrorEnvelope(error).body,
    });

    await this.settleIfFlat(hedge);
  }

  private async settleIfFlat(hedge: Hedge): Promise<void> {
    if (hedge.state !== 'closing') return;

    const settled = hedge.legs.every((leg) => {
      if (leg.fillState === 'pending') return false;
      if (leg.filledSize <= 0) return true;
      return leg.unwind?.state === 'filled' || leg.unwind?.state === 'failed';
    });
    if (!settled) return;

    await this.finalize(hedge);
  }

  private async finalize(hedge: Hedge): Promise<void> {
    const now = this.clock();
    const pair = this.requirePair(hedge.pairId);
    const stuck = hedge.legs.filter((leg) => leg.unwind?.state === 'failed');
    const terminal: HedgeState = stuck.length > 0 || hedge.closeIntent === 'failure' ? 'failed' : 'closed';
    if (stuck.length > 0 && !hedge.failureReason) hedge.failureReason = 'unwind_failed';

    let total = 0;
    for (const leg of hedge.legs) {
      const exitPrice = leg.unwind?.state === 'filled' ? leg.unwind.avgPrice : undefined;
      if (leg.filledSize <= 0 || leg.avgPrice === undefined || exitPrice === undefined) continue;
      const pnl = legPnl(leg.side, leg.filledSize, leg.avgPrice, exitPrice);
      this.deps.registry.recordFill(leg.accountId, pnl);
      total += pnl;
    }
    for (const leg of hedge.legs) {
      this.deps.registry.release(leg.accountId, hedge.id);
      if (pair.accountCooldownMinutes > 0) {
        this.deps.registry.startCooldown(leg.accountId, minutesToMs(pair.accountCooldownMinutes), now);
      }
    }

    hedge.realizedPnl = round(total);
    hedge.closedAt = now;
    this.transition(hedge, terminal, terminal === 'failed' ? hedge.failureReason : hedge.closeReason);
    if (terminal === 'failed') {
      this.metrics.hedgesFailed += 1;
    } else {
      this.metrics.hedgesClosed += 1;
    }

    this.deps.risk.recordPairLoss(pair.id, hedge.realizedPnl, now);
    const window = this.deps.cooldowns.open(
      pair.id,
      minutesToMs(pair.cooldownMinutes),
      terminal === 'failed' ? 'hedge_failed' : 'hedge_closed',
      now,
    );

    await this.deps.logger.log(terminal === 'failed' ? 'warn' : 'info', terminal === 'failed' ? 'hedge.failed' : 'hedge.closed', {
      hedgeId: hedge.id,
      pairId: hedge.pairId,
      reason: terminal === 'failed' ? hedge.failureReason : hedge.closeReason,
      realizedPnl: hedge.realizedPnl,
      cooldownUntil: window.expiresAt,
      stuckAccounts: stuck.map((leg) => leg.accountId),
    });

    await this.logRiskEvents(this.deps.risk.evaluate(now));
  }

  private async sweepTimeouts(now: number): Promise<void> {
    const timeoutMs = this.deps.tradingEngine.orderTimeoutMs;

    for (const hedge of this.book.live()) {
      for (const [legIndex, leg] of hedge.legs.entries()) {
        if (leg.fillState === 'pending' && !leg.expired && leg.placedAt !== undefined
          && now - leg.placedAt >= timeoutMs) {
          await this.expireEntry(hedge, legIndex, now - leg.placedAt);
        }

        const unwind = leg.unwind;
        if (unwind?.state === 'pending' && unwind.orderRef && unwind.placedAt !== undefined
          && now - unwind.placedAt >= timeoutMs) {
          await this.expireUnwind(hedge, legIndex, unwind.orderRef, now - unwind.placedAt);
        }
      }

      await this.reconcile(hedge);
    }
  }

  /**
   * The leg counts as failed from here on, whether or not the cancel goes through, so the
   * rest of the hedge starts unwinding on this tick.
   */
  private async expireEntry(hedge: Hedge, legIndex: number, pendingMs: number): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    leg.expired = true;
    leg.reason = 'timeout';

    const error = new OrderTimeoutError(leg.orderRef ?? `placement for ${leg.accountId}`, pendingMs);
    await this.deps.logger.log('warn', 'leg.timeout', {
      hedgeId: hedge.id,
      accountId: leg.accountId,
      ...toErrorEnvelope(error).body,
    });

    if (!leg.orderRef) {
      // Placement still outstanding; a reference that arrives later is cancelled.
      leg.fillState = 'rejected';
      return;
    }
    await this.cancelEntry(hedge, legIndex, 'timeout');
  }

  /** A cancel that keeps failing spends the unwind's attempt budget. */
  private async expireUnwind(hedge: Hedge, legIndex: number, orderRef: string, pendingMs: number): Promise<void> {
    const leg = this.requireLeg(hedge, legIndex);
    const error = new OrderTimeoutError(orderRef, pendingMs);

    try {
      await this.deps.executor.cancelOrder(orderRef);
    } catch (cancelError) {
      const unwind = leg.unwind;
      if (!unwind || unwind.state !== 'pending' || unwind.orderRef !== orderRef) return;
      unwind.cancelAttempts = (unwind.cancelAttempts ?? 0) + 1;
      await this.deps.logger.log('warn', 'unwind.cancel_failed', {
        hedgeId: hedge.id,
        accountId: leg.accountId,
        orderRef,
        attempt: unwind.cancelAttempts,
        error: describeError(cancelError),
      });
      if (unwind.cancelAttempts >= this.deps.tradingEngine.unwind.maxAttempts) {
        this.deps.registry.orderSettled(leg.accountId);
        await this.failUnwind(hedge, legIndex, 'cancel_failed');
      }
      return;
    }

    await this.applyUnwind(hedge, legIndex, orderRef, { type: 'reject', reason: error.message });
  }

  private async applyClosePolicy(now: number): Promise<void> {
    const open = this.book.all().filter((hedge) => hedge.state === 'open');
    const snapshots = new Map<string, MarketSnapshot | undefined>();

    for (const hedge of open) {
      const pair = this.requirePair(hedge.pairId);
      if (!snapshots.has(hedge.market)) {
        snapshots.set(hedge.market, await this.fetchSnapshot(hedge.market));
      }

      const reason = evaluateClose({
        hedge,
        pair,
        snapshot: snapshots.get(hedge.market),
        now,
        pairHalted: this.deps.risk.isPairHalted(pair.id),
        maxPriceAgeMs: this.deps.tradingEngine.maxPriceAgeMs,
      });
      if (reason) {
        await this.beginUnwind(hedge, 'close', reason);
      }
    }
  }

  private async fetchSnapshot(market: string): Promise<MarketSnapshot | undefined> {
    try {
      return await this.deps.market.getSnapshot(market);
    } catch (error) {
      await this.deps.logger.log('warn', 'market.snapshot.error', { market, error: describeError(error) });
      return undefined;
    }
  }

  private async logRiskEvents(events: RiskEvent[]): Promise<void> {
    for (const event of events) {
      await this.deps.logger.log(event.action === 'warn' ? 'warn' : 'error', 'risk.event', { ...event });
    }
  }

  private transition(hedge: Hedge, to: HedgeState, reason?: string): void {
    const from = hedge.state;
    hedge.state = to;
    eventBus.emit('hedge.state', { hedgeId: hedge.id, pairId: hedge.pairId, from, to, reason });
  }

  private requirePair(pairId: string): TradingPair {
    const pair = this.pairsById.get(pairId);
    if (!pair) throw new DomainError(ErrorCode.PairNotFound, 404, `Trading pair ${pairId} not found.`);
    return pair;
  }

  private requireLeg(hedge: Hedge, legIndex: number): Leg {
    const leg = hedge.legs[legIndex];
    if (!leg) throw new DomainError(ErrorCode.Internal, 500, `Hedge ${hedge.id} has no leg ${legIndex}.`);
    return leg;
  }
}
