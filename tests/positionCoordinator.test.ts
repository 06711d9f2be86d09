import { afterEach, describe, expect, it, vi } from 'vitest';
import { DomainError, ErrorCode, NetworkError } from '../src/errors/taxonomy.js';
import { eventBus } from '../src/infra/eventBus.js';
import { legPnl } from '../src/services/positionCoordinator.js';
import type { HedgeState } from '../src/types.js';
import { sleep } from '../src/utils/retry.js';
import {
  accountInput,
  buildEngineConfig,
  buildHarness,
  healthyQuote,
  pairInput,
  type Harness,
} from './helpers.js';

const admitOne = async (h: Harness): Promise<string> => {
  const [outcome] = await h.coordinator.tick({ admit: true });
  if (outcome?.status !== 'admitted') throw new Error(`expected admission, got ${JSON.stringify(outcome)}`);
  return outcome.hedgeId;
};

const openOne = async (h: Harness): Promise<string> => {
  const hedgeId = await admitOne(h);
  await h.executor.fill('ord-1', 100);
  await h.executor.fill('ord-2', 100);
  return hedgeId;
};

describe('PositionCoordinator', () => {
  afterEach(() => {
    eventBus.clear();
  });

  it('opens one hedge with two opposite legs and then denies on position capacity', async () => {
    const h = await buildHarness();

    const hedgeId = await admitOne(h);
    const opening = h.coordinator.hedge(hedgeId);
    expect(opening?.state).toBe('opening');
    expect(opening?.legs.map((leg) => [leg.accountId, leg.side, leg.size])).toEqual([
      ['a', 'long', 100_000],
      ['b', 'short', 100_000],
    ]);
    expect(h.executor.placed.map((order) => [order.accountId, order.side, order.size, order.reduceOnly])).toEqual([
      ['a', 'buy', 100_000, false],
      ['b', 'sell', 100_000, false],
    ]);
    expect(h.registry.get('a')?.reservedBy).toBe(hedgeId);
    expect(h.registry.get('b')?.reservedBalance).toBe(100_000);

    await h.executor.fill('ord-1', 100);
    await h.executor.fill('ord-2', 100.2);
    const open = h.coordinator.hedge(hedgeId);
    expect(open?.state).toBe('open');
    expect(open?.entryPrice).toBe(100.1);

    const [next] = await h.coordinator.tick({ admit: true });
    expect(next).toEqual({ pairId: 'btc', status: 'denied', check: 'position_capacity', reason: 'max_positions_reached' });
    expect(h.executor.placed).toHaveLength(2);
  });

  it('does not admit a second hedge while the first is still opening', async () => {
    const h = await buildHarness(buildEngineConfig({
      tradingPairs: [pairInput({ maxPositions: 3, accountAddresses: ['addr-a', 'addr-b', 'addr-c'] })],
    }));

    await admitOne(h);
    const [second] = await h.coordinator.tick({ admit: true });

    expect(second).toEqual({ pairId: 'btc', status: 'denied', check: 'no_opening_hedge', reason: 'hedge_opening' });
    expect(h.coordinator.hedges()).toHaveLength(1);
  });

  it('gives the same decision when admission is checked twice without a state change', async () => {
    const h = await buildHarness();

    const first = await h.coordinator.checkAdmission('btc');
    const second = await h.coordinator.checkAdmission('btc');
    expect(first).toEqual(second);
    expect(first.admitted).toBe(true);
    expect(h.executor.placed).toHaveLength(0);
    expect(h.registry.get('a')?.reservedBy).toBeUndefined();
  });

  it('unwinds the filled leg when the other leg is rejected and ends failed with a cooldown', async () => {
    const h = await buildHarness();
    const transitions: Array<HedgeState | null> = [];
    eventBus.on('hedge.state', (event) => {
      transitions.push(event.to);
    });

    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);
    await h.executor.reject('ord-2', 'insufficient margin');

    const closing = h.coordinator.hedge(hedgeId);
    expect(closing?.state).toBe('closing');
    expect(closing?.closeIntent).toBe('failure');
    expect(h.executor.placed[2]).toEqual({
      accountId: 'a',
      address: 'addr-a',
      market: 'BTC-USD',
      side: 'sell',
      size: 100_000,
      reduceOnly: true,
      orderRef: 'ord-3',
    });

    const [blocked] = await h.coordinator.tick({ admit: true });
    expect(blocked).toMatchObject({ status: 'denied', check: 'no_pending_orders', reason: 'pending_orders' });

    await h.executor.fill('ord-3', 99);

    const failed = h.coordinator.hedge(hedgeId);
    expect(failed?.state).toBe('failed');
    expect(failed?.failureReason).toBe('insufficient margin');
    expect(failed?.realizedPnl).toBe(-1_000);
    expect(transitions).toEqual(['pending', 'opening', 'closing', 'failed']);

    expect(h.cooldowns.get('btc')).toEqual({
      pairId: 'btc',
      openedAt: h.clock.now(),
      expiresAt: h.clock.now() + 600_000,
      reason: 'hedge_failed',
    });

    const a = h.registry.get('a');
    expect(a?.reservedBy).toBeUndefined();
    expect(a?.availableBalance).toBe(499_000);
    expect(a?.dailyLoss).toBe(1_000);
    expect(a?.activeOrders).toBe(0);
    expect(h.registry.get('b')?.availableBalance).toBe(500_000);
    expect(h.risk.pairLoss('btc')).toBe(1_000);
  });

  it('admits again exactly when the cooldown expires', async () => {
    const h = await buildHarness();
    await admitOne(h);
    await h.executor.fill('ord-1', 100);
    await h.executor.reject('ord-2', 'insufficient margin');
    await h.executor.fill('ord-3', 100);

    h.clock.advance(600_000 - 1);
    h.feed.update('BTC-USD', healthyQuote(), h.clock.now());
    const early = await h.coordinator.checkAdmission('btc');
    expect(early).toMatchObject({ admitted: false, check: 'cooldown_clear', reason: 'cooldown_active' });

    h.clock.advance(1);
    const onTime = await h.coordinator.checkAdmission('btc');
    expect(onTime.admitted).toBe(true);
  });

  it('locks an account whose realised loss crosses its daily limit', async () => {
    const h = await buildHarness(buildEngineConfig({
      accounts: [accountInput('a', { riskLimits: { maxDailyLoss: 500, minBalance: 1_000 } }), accountInput('b'), accountInput('c')],
      tradingPairs: [pairInput({ cooldownMinutes: 0 })],
    }));

    await admitOne(h);
    await h.executor.fill('ord-1', 100);
    await h.executor.reject('ord-2', 'insufficient margin');
    await h.executor.fill('ord-3', 99);

    expect(h.registry.get('a')?.lockReason).toBe('daily_loss');
    expect(h.risk.events()).toEqual([
      expect.objectContaining({ level: 'account', reason: 'account_daily_loss', action: 'halt-account', accountId: 'a', value: 1_000, limit: 500 }),
    ]);

    const decision = await h.coordinator.checkAdmission('btc');
    expect(decision).toMatchObject({ admitted: false, check: 'accounts_unlocked', reason: 'account_locked' });
  });

  it('never reserves one account for two pairs evaluated concurrently', async () => {
    const h = await buildHarness(buildEngineConfig({
      tradingPairs: [
        pairInput(),
        pairInput({ id: 'eth', name: 'ETH hedge', market: 'ETH-USD', accountAddresses: ['addr-b', 'addr-c'] }),
      ],
    }));

    const outcomes = await h.coordinator.tick({ admit: true });
    const admitted = outcomes.filter((outcome) => outcome.status === 'admitted');

    expect(outcomes).toHaveLength(2);
    expect(admitted).toHaveLength(1);
    expect(h.coordinator.hedges()).toHaveLength(1);
    expect(h.executor.placed).toHaveLength(2);

    const reservedBy = new Set(h.registry.list().map((account) => account.reservedBy).filter(Boolean));
    expect(reservedBy.size).toBe(1);
    expect(h.registry.get('b')?.reservedBy).toBeDefined();
  });

  it('denies every pair during an emergency stop even with accounts unlocked', async () => {
    const h = await buildHarness();
    h.risk.triggerEmergencyStop('manual');

    const locked = await h.coordinator.checkAdmission('btc');
    expect(locked.admitted).toBe(false);

    for (const account of h.registry.list()) {
      h.registry.unlock(account.id);
    }
    const unlocked = await h.coordinator.checkAdmission('btc');
    expect(unlocked).toMatchObject({ admitted: false, check: 'risk_clear', reason: 'emergency_stop' });

    const outcomes = await h.coordinator.tick({ admit: true });
    expect(outcomes[0]?.status).toBe('denied');
    expect(h.executor.placed).toHaveLength(0);
  });

  it('locks the account and fails the hedge when unwind retries are exhausted', async () => {
    const h = await buildHarness();
    h.executor.failPlacements((request) => request.reduceOnly, new NetworkError('exchange unreachable'));

    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);
    await h.executor.reject('ord-2', 'insufficient margin');

    const hedge = h.coordinator.hedge(hedgeId);
    expect(hedge?.state).toBe('failed');
    expect(hedge?.legs[0]?.unwind).toMatchObject({ state: 'failed', attempts: 3, reason: 'exchange unreachable' });
    expect(h.executor.placementAttempts).toBe(5);

    const account = h.registry.get('a');
    expect(account?.locked).toBe(true);
    expect(account?.lockReason).toBe('unwind_failed');
    expect(account?.reservedBy).toBeUndefined();

    expect(h.risk.events()).toEqual([
      expect.objectContaining({ reason: 'unwind_failed', action: 'halt-account', accountId: 'a', value: 3, limit: 3 }),
    ]);
    expect(h.coordinator.metricsSnapshot().unwindFailures).toBe(1);
  });

  it('re-places an unwind order that the exchange rejected', async () => {
    const h = await buildHarness();
    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);
    await h.executor.reject('ord-2', 'insufficient margin');

    await h.executor.reject('ord-3', 'reduce-only rejected');
    expect(h.executor.placed.map((order) => order.orderRef)).toEqual(['ord-1', 'ord-2', 'ord-3', 'ord-4']);
    expect(h.coordinator.hedge(hedgeId)?.legs[0]?.unwind).toMatchObject({ state: 'pending', attempts: 2, orderRef: 'ord-4' });

    await h.executor.fill('ord-4', 100);
    expect(h.coordinator.hedge(hedgeId)?.state).toBe('failed');
    expect(h.registry.get('a')?.locked).toBe(false);
  });

  it('treats a leg that stays pending past the order timeout as rejected', async () => {
    const h = await buildHarness();
    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);

    h.clock.advance(29_999);
    await h.coordinator.tick({ admit: false });
    expect(h.coordinator.hedge(hedgeId)?.state).toBe('opening');

    h.clock.advance(1);
    await h.coordinator.tick({ admit: false });

    const hedge = h.coordinator.hedge(hedgeId);
    expect(h.executor.cancelled).toEqual(['ord-2']);
    expect(hedge?.legs[1]).toMatchObject({ fillState: 'cancelled', reason: 'timeout' });
    expect(hedge?.state).toBe('closing');
    expect(hedge?.failureReason).toBe('timeout');
    expect(h.executor.placed[2]).toMatchObject({ accountId: 'a', side: 'sell', reduceOnly: true });
  });

  it('unwinds the rest of the hedge on timeout even when the cancel keeps failing', async () => {
    const h = await buildHarness();
    const log = vi.spyOn(h.logger, 'log');
    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);
    h.executor.failCancels(new Error('exchange busy'));

    h.clock.advance(30_000);
    await h.coordinator.tick({ admit: false });

    const closing = h.coordinator.hedge(hedgeId);
    expect(closing?.state).toBe('closing');
    expect(closing?.failureReason).toBe('timeout');
    expect(closing?.legs[1]).toMatchObject({ fillState: 'pending', cancelAttempts: 2 });
    expect(h.executor.placed[2]).toMatchObject({ orderRef: 'ord-3', accountId: 'a', side: 'sell', reduceOnly: true });
    expect(log).toHaveBeenCalledWith('warn', 'leg.cancel_failed', expect.objectContaining({ orderRef: 'ord-2', attempt: 1 }));

    await h.executor.fill('ord-3', 100);

    const failed = h.coordinator.hedge(hedgeId);
    expect(failed?.state).toBe('failed');
    expect(failed?.legs[1]).toMatchObject({ fillState: 'cancelled', reason: 'cancel_failed' });
    expect(h.executor.cancelled).toEqual([]);
    expect(h.registry.get('b')?.lockReason).toBe('unwind_failed');
    expect(h.registry.get('b')?.activeOrders).toBe(0);
    expect(h.risk.events()).toEqual([
      expect.objectContaining({ reason: 'cancel_failed', action: 'halt-account', accountId: 'b', value: 3, limit: 3 }),
    ]);
  });

  it('sends a fill on an abandoned entry order through the unwind path while the hedge is closing', async () => {
    const h = await buildHarness();
    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100);
    h.executor.failCancels(new Error('exchange busy'));

    h.clock.advance(30_000);
    await h.coordinator.tick({ admit: false });
    h.clock.advance(30_000);
    await h.coordinator.tick({ admit: false });
    expect(h.coordinator.hedge(hedgeId)?.legs[1]).toMatchObject({ fillState: 'cancelled', reason: 'cancel_failed' });

    await h.executor.fill('ord-2', 100);
    expect(h.executor.placed[3]).toMatchObject({ orderRef: 'ord-4', accountId: 'b', side: 'buy', size: 100_000, reduceOnly: true });
  });

  it('gives up on a placement that never answers and cancels the order once it arrives', async () => {
    const h = await buildHarness(buildEngineConfig({
      tradingEngine: { orderTimeoutMs: 50, maxPriceAgeMs: 15_000, unwind: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 } },
    }));
    let release = (): void => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    h.executor.onPlace = async (order) => {
      if (order.accountId === 'b' && !order.reduceOnly) await held;
    };

    const hedgeId = await admitOne(h);
    const hedge = h.coordinator.hedge(hedgeId);
    expect(hedge?.state).toBe('failed');
    expect(hedge?.legs.map((leg) => leg.fillState)).toEqual(['cancelled', 'rejected']);
    expect(hedge?.legs[1]?.reason).toBe('Order placement for b still pending after 50ms');
    expect(h.executor.cancelled).toEqual(['ord-1']);

    release();
    await sleep(10);
    expect(h.executor.cancelled).toEqual(['ord-1', 'ord-2']);
    expect(h.registry.get('b')?.locked).toBe(false);
    expect(h.registry.get('b')?.activeOrders).toBe(0);
  });

  it('keeps a partially filled leg pending until the fills add up to its size', async () => {
    const h = await buildHarness();
    const hedgeId = await admitOne(h);

    await h.executor.fill('ord-1', 100, 10);
    await h.executor.fill('ord-2', 100);
    const opening = h.coordinator.hedge(hedgeId);
    expect(opening?.state).toBe('opening');
    expect(opening?.legs[0]).toMatchObject({ fillState: 'pending', filledSize: 10 });
    expect(h.registry.get('a')?.activeOrders).toBe(1);

    await h.executor.fill('ord-1', 100, 99_990);
    const open = h.coordinator.hedge(hedgeId);
    expect(open?.state).toBe('open');
    expect(open?.legs[0]).toMatchObject({ fillState: 'filled', filledSize: 100_000, avgPrice: 100 });
  });

  it('unwinds the filled part of a leg that is still short at the order timeout', async () => {
    const h = await buildHarness();
    const hedgeId = await admitOne(h);
    await h.executor.fill('ord-1', 100, 40_000);
    await h.executor.fill('ord-2', 100);

    h.clock.advance(30_000);
    await h.coordinator.tick({ admit: false });

    const closing = h.coordinator.hedge(hedgeId);
    expect(closing?.state).toBe('closing');
    expect(closing?.legs[0]).toMatchObject({ fillState: 'cancelled', filledSize: 40_000, reason: 'timeout' });
    expect(h.executor.cancelled).toEqual(['ord-1']);
    expect(h.executor.placed.slice(2).map((order) => [order.orderRef, order.accountId, order.side, order.size, order.reduceOnly])).toEqual([
      ['ord-3', 'a', 'sell', 40_000, true],
      ['ord-4', 'b', 'buy', 100_000, true],
    ]);

    await h.executor.fill('ord-3', 100);
    await h.executor.fill('ord-4', 100);
    const failed = h.coordinator.hedge(hedgeId);
    expect(failed?.state).toBe('failed');
    expect(failed?.realizedPnl).toBe(0);
  });

  it('re-places the unfilled remainder of an unwind order that timed out', async () => {
    const h = await buildHarness();
    const hedgeId = await openOne(h);
    await h.coordinator.closeHedge(hedgeId);
    await h.executor.fill('ord-3', 101, 60_000);
    await h.executor.fill('ord-4', 101);

    h.clock.advance(30_000);
    await h.coordinator.tick({ admit: false });

    expect(h.executor.cancelled).toEqual(['ord-3']);
    expect(h.executor.placed[4]).toMatchObject({ orderRef: 'ord-5', accountId: 'a', side: 'sell', size: 40_000, reduceOnly: true });
    expect(h.coordinator.hedge(hedgeId)?.legs[0]?.unwind).toMatchObject({ state: 'pending', attempts: 2, filledSize: 60_000 });

    await h.executor.fill('ord-5', 99);
    const closed = h.coordinator.hedge(hedgeId);
    expect(closed?.state).toBe('closed');
    expect(closed?.legs[0]?.unwind?.avgPrice).toBe(100.2);
    expect(closed?.realizedPnl).toBe(-800);
  });

  it('fails the unwind once cancelling a stale unwind order keeps failing', async () => {
    const h = await buildHarness();
    const log = vi.spyOn(h.logger, 'log');
    const hedgeId = await openOne(h);
    await h.coordinator.closeHedge(hedgeId);
    await h.executor.fill('ord-4', 100);
    h.executor.failCancels(new Error('exchange busy'));

    for (let round = 0; round < 3; round += 1) {
      h.clock.advance(30_000);
      await h.coordinator.tick({ admit: false });
    }

    const hedge = h.coordinator.hedge(hedgeId);
    expect(hedge?.state).toBe('failed');
    expect(hedge?.failureReason).toBe('unwind_failed');
    expect(hedge?.legs[0]?.unwind).toMatchObject({ state: 'failed', cancelAttempts: 3 });
    expect(log).toHaveBeenCalledWith('warn', 'unwind.cancel_failed', expect.objectContaining({ orderRef: 'ord-3', attempt: 3 }));
    expect(h.registry.get('a')?.lockReason).toBe('unwind_failed');
    expect(h.registry.get('a')?.activeOrders).toBe(0);
    expect(h.risk.events()).toEqual([
      expect.objectContaining({ reason: 'unwind_failed', action: 'halt-account', accountId: 'a' }),
    ]);
  });

  it('locks the account when an entry order fills after its hedge settled', async () => {
    const h = await buildHarness();
    h.executor.failPlacements((request) => request.accountId === 'b' && !request.reduceOnly, new NetworkError('exchange unreachable'), 1);
    const hedgeId = await admitOne(h);
    expect(h.coordinator.hedge(hedgeId)?.state).toBe('failed');

    await h.executor.fill('ord-1', 100);

    expect(h.coordinator.hedge(hedgeId)?.legs[0]).toMatchObject({ fillState: 'cancelled', filledSize: 100_000 });
    expect(h.registry.get('a')?.lockReason).toBe('unwind_failed');
    expect(h.risk.events()).toEqual([
      expect.objectContaining({ reason: 'late_fill_after_settlement', action: 'halt-account', accountId: 'a' }),
    ]);
  });

  it('keeps the accounts of a finished hedge out of the next one for the account cooldown', async () => {
    const h = await buildHarness(buildEngineConfig({
      tradingPairs: [pairInput({ cooldownMinutes: 0, accountCooldownMinutes: 5 })],
    }));
    const hedgeId = await openOne(h);
    await h.coordinator.closeHedge(hedgeId);
    await h.executor.fill('ord-3', 100);
    await h.executor.fill('ord-4', 100);

    expect(h.registry.get('a')?.cooldownUntil).toBe(h.clock.now() + 300_000);
    const cooling = await h.coordinator.checkAdmission('btc');
    expect(cooling).toMatchObject({ admitted: false, check: 'accounts_available', reason: 'insufficient_accounts' });

    h.clock.advance(300_000);
    h.feed.update('BTC-USD', healthyQuote(), h.clock.now());
    expect((await h.coordinator.checkAdmission('btc')).admitted).toBe(true);
  });

  it('replays a fill that arrived before the order reference was known', async () => {
    const h = await buildHarness();
    h.executor.onPlace = async (order) => {
      if (order.accountId === 'b') await h.executor.fill(order.orderRef, 100);
    };

    const hedgeId = await admitOne(h);
    expect(h.coordinator.hedge(hedgeId)?.legs[1]?.fillState).toBe('filled');
    expect(h.coordinator.book.orphanCount()).toBe(0);

    await h.executor.fill('ord-1', 100);
    expect(h.coordinator.hedge(hedgeId)?.state).toBe('open');
  });

  it('ignores a duplicate fill callback', async () => {
    const h = await buildHarness();
    const hedgeId = await openOne(h);

    await h.executor.fill('ord-2', 250);
    expect(h.coordinator.hedge(hedgeId)?.legs[1]?.avgPrice).toBe(100);
    expect(h.registry.get('b')?.activeOrders).toBe(0);
  });

  it('unwinds a leg whose placement throws and never opens', async () => {
    const h = await buildHarness();
    h.executor.failPlacements((request) => request.accountId === 'b' && !request.reduceOnly, new NetworkError('timeout talking to exchange'), 1);

    const hedgeId = await admitOne(h);
    const hedge = h.coordinator.hedge(hedgeId);

    expect(h.executor.cancelled).toEqual(['ord-1']);
    expect(hedge?.state).toBe('failed');
    expect(hedge?.failureReason).toBe('timeout talking to exchange');
    expect(hedge?.legs.map((leg) => leg.fillState)).toEqual(['cancelled', 'rejected']);
    expect(h.registry.get('a')?.reservedBy).toBeUndefined();
    expect(h.cooldowns.isActive('btc', h.clock.now())).toBe(true);
  });

  it('closes an open hedge on request and books the leg PnL', async () => {
    const h = await buildHarness();
    const hedgeId = await openOne(h);

    const closing = await h.coordinator.closeHedge(hedgeId);
    expect(closing.state).toBe('closing');
    expect(h.executor.placed.slice(2).map((order) => [order.orderRef, order.accountId, order.side, order.reduceOnly])).toEqual([
      ['ord-3', 'a', 'sell', true],
      ['ord-4', 'b', 'buy', true],
    ]);

    await h.executor.fill('ord-3', 101);
    await h.executor.fill('ord-4', 101);

    const closed = h.coordinator.hedge(hedgeId);
    expect(closed?.state).toBe('closed');
    expect(closed?.closeReason).toBe('manual');
    expect(closed?.realizedPnl).toBe(0);
    expect(h.registry.get('a')?.realizedPnl).toBe(1_000);
    expect(h.registry.get('b')?.dailyLoss).toBe(1_000);
    expect(h.registry.get('b')?.dailyTrades).toBe(1);

    await expect(h.coordinator.closeHedge(hedgeId)).rejects.toMatchObject({
      code: ErrorCode.InvalidHedgeState,
      statusCode: 409,
    });
    await expect(h.coordinator.closeHedge('missing')).rejects.toBeInstanceOf(DomainError);
  });

  it('rotates sides for the next hedge on the same accounts', async () => {
    const h = await buildHarness(buildEngineConfig({ tradingPairs: [pairInput({ cooldownMinutes: 0 })] }));
    const first = await openOne(h);
    await h.coordinator.closeHedge(first);
    await h.executor.fill('ord-3', 100);
    await h.executor.fill('ord-4', 100);

    const second = await admitOne(h);
    expect(h.coordinator.hedge(second)?.legs.map((leg) => [leg.accountId, leg.side])).toEqual([
      ['a', 'short'],
      ['b', 'long'],
    ]);
  });

  it('closes an open hedge when the price target is reached', async () => {
    const h = await buildHarness(buildEngineConfig({
      tradingPairs: [pairInput({ exit: { targetMoveBps: 100, maxHoldMinutes: 0, closeOnPairHalt: false } })],
    }));
    const hedgeId = await openOne(h);

    h.feed.update('BTC-USD', healthyQuote({ price: 100.5 }), h.clock.now());
    await h.coordinator.tick({ admit: false });
    expect(h.coordinator.hedge(hedgeId)?.state).toBe('open');

    h.feed.update('BTC-USD', healthyQuote({ price: 101.5 }), h.clock.now());
    await h.coordinator.tick({ admit: false });
    const hedge = h.coordinator.hedge(hedgeId);
    expect(hedge?.state).toBe('closing');
    expect(hedge?.closeReason).toBe('target_hit');
  });

  it('drives every live hedge through the unwind path on unwindAll', async () => {
    const h = await buildHarness();
    const hedgeId = await openOne(h);

    await expect(h.coordinator.unwindAll('operator_stop')).resolves.toBe(1);
    expect(h.coordinator.hedge(hedgeId)?.closeReason).toBe('operator_stop');
    expect(h.executor.placed).toHaveLength(4);
  });
});

describe('legPnl', () => {
  it('is positive for a long leg when the price rises and mirrored for a short leg', () => {
    expect(legPnl('long', 100_000, 100, 101)).toBe(1_000);
    expect(legPnl('short', 100_000, 100, 101)).toBe(-1_000);
    expect(legPnl('short', 50_000, 200, 190)).toBe(2_500);
  });
});
