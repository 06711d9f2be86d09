import { describeError } from '../../errors/taxonomy.js';
import type { MarketSnapshotProvider } from '../../infra/markets/marketFeed.js';
import type { Account, Hedge, MarketSnapshot, TradingPair } from '../../types.js';
import type { AccountRegistry } from '../accounts/accountRegistry.js';
import type { CooldownTracker } from '../cooldown/cooldownTracker.js';
import type { TradingEngineConfig } from '../engineConfig.js';
import type { HedgeBook } from '../hedge/hedgeBook.js';
import type { RiskManager } from '../risk/riskManager.js';

export type AdmissionCheckName =
  | 'no_opening_hedge'
  | 'no_pending_orders'
  | 'accounts_unlocked'
  | 'position_capacity'
  | 'accounts_available'
  | 'risk_clear'
  | 'cooldown_clear'
  | 'market_conditions';

export type CheckResult =
  | { pass: true }
  | { pass: false; reason: string; details?: Record<string, unknown> };

export interface GateContext {
  pair: TradingPair;
  now: number;
  eligible: Readonly<Account>[];
  hedges: Hedge[];
  selection: Readonly<Account>[];
  snapshot?: MarketSnapshot;
}

export interface AdmissionCheck {
  name: AdmissionCheckName;
  evaluate(ctx: GateContext): CheckResult | Promise<CheckResult>;
}

export type AdmissionDecision =
  | { admitted: true; pairId: string; accountIds: string[]; snapshot: MarketSnapshot }
  | { admitted: false; pairId: string; check: AdmissionCheckName; reason: string; details?: Record<string, unknown> };

export interface AdmissionGateDeps {
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  market: MarketSnapshotProvider;
  book: HedgeBook;
  tradingEngine: TradingEngineConfig;
}

const PASS: CheckResult = { pass: true };
const fail = (reason: string, details?: Record<string, unknown>): CheckResult => ({ pass: false, reason, details });

const hasPendingOrder = (hedge: Hedge, accountIds: ReadonlySet<string>): boolean =>
  hedge.legs.some((leg) =>
    accountIds.has(leg.accountId)
    && (leg.fillState === 'pending' || leg.unwind?.state === 'placing' || leg.unwind?.state === 'pending'));

/**
 * The eight admission conditions, cheapest first. Evaluation stops at the first failing
 * check. Nothing here mutates engine state, so the same inputs give the same decision.
 */
export class AdmissionGate {
  readonly checks: readonly AdmissionCheck[];

  constructor(private readonly deps: AdmissionGateDeps) {
    this.checks = [
      { name: 'no_opening_hedge', evaluate: (ctx) => this.noOpeningHedge(ctx) },
      { name: 'no_pending_orders', evaluate: (ctx) => this.noPendingOrders(ctx) },
      { name: 'accounts_unlocked', evaluate: (ctx) => this.accountsUnlocked(ctx) },
      { name: 'position_capacity', evaluate: (ctx) => this.positionCapacity(ctx) },
      { name: 'accounts_available', evaluate: (ctx) => this.accountsAvailable(ctx) },
      { name: 'risk_clear', evaluate: (ctx) => this.riskClear(ctx) },
      { name: 'cooldown_clear', evaluate: (ctx) => this.cooldownClear(ctx) },
      { name: 'market_conditions', evaluate: (ctx) => this.marketConditions(ctx) },
    ];
  }

  async evaluate(pair: TradingPair, now: number): Promise<AdmissionDecision> {
    const ctx: GateContext = {
      pair,
      now,
      eligible: pair.accountAddresses
        .map((address) => this.deps.registry.getByAddress(address))
        .filter((account): account is Readonly<Account> => account !== undefined),
      hedges: this.deps.book.forPair(pair.id),
      selection: [],
    };

    for (const check of this.checks) {
      const result = await check.evaluate(ctx);
      if (!result.pass) {
        return { admitted: false, pairId: pair.id, check: check.name, reason: result.reason, details: result.details };
      }
    }

    if (!ctx.snapshot) {
      return { admitted: false, pairId: pair.id, check: 'market_conditions', reason: 'market_data_unavailable' };
    }

    return {
      admitted: true,
      pairId: pair.id,
      accountIds: ctx.selection.map((account) => account.id),
      snapshot: ctx.snapshot,
    };
  }

  private noOpeningHedge(ctx: GateContext): CheckResult {
    const opening = ctx.hedges.filter((hedge) => hedge.state === 'opening' || hedge.state === 'pending');
    return opening.length === 0 ? PASS : fail('hedge_opening', { hedgeIds: opening.map((h) => h.id) });
  }

  private noPendingOrders(ctx: GateContext): CheckResult {
    const ids = new Set(ctx.eligible.map((account) => account.id));
    const blocking = ctx.hedges.filter((hedge) => hasPendingOrder(hedge, ids));
    return blocking.length === 0 ? PASS : fail('pending_orders', { hedgeIds: blocking.map((h) => h.id) });
  }

  private accountsUnlocked(ctx: GateContext): CheckResult {
    const locked = ctx.eligible.filter((account) => account.locked);
    if (locked.length === 0) return PASS;
    return fail('account_locked', {
      accounts: locked.map((account) => ({ id: account.id, lockReason: account.lockReason })),
    });
  }

  private positionCapacity(ctx: GateContext): CheckResult {
    const live = ctx.hedges.filter((hedge) => hedge.state === 'open' || hedge.state === 'opening').length;
    return live < ctx.pair.maxPositions
      ? PASS
      : fail('max_positions_reached', { live, maxPositions: ctx.pair.maxPositions });
  }

  /** Fewest trades today first; equal counts keep the configured order (stable sort). */
  private accountsAvailable(ctx: GateContext): CheckResult {
    const candidates = ctx.eligible
      .filter((account) => this.deps.registry.isAvailable(account, ctx.pair.baseAmount))
      .sort((a, b) => a.dailyTrades - b.dailyTrades);

    if (candidates.length < ctx.pair.accountsPerHedge) {
      return fail('insufficient_accounts', {
        available: candidates.length,
        required: ctx.pair.accountsPerHedge,
      });
    }

    ctx.selection = candidates.slice(0, ctx.pair.accountsPerHedge);
    return PASS;
  }

  private riskClear(ctx: GateContext): CheckResult {
    const verdict = this.deps.risk.checkAdmission(ctx.pair, ctx.selection.map((account) => account.id));
    return verdict.allowed ? PASS : fail(verdict.reason);
  }

  private cooldownClear(ctx: GateContext): CheckResult {
    if (!this.deps.cooldowns.isActive(ctx.pair.id, ctx.now)) return PASS;
    return fail('cooldown_active', { remainingMs: this.deps.cooldowns.remainingMs(ctx.pair.id, ctx.now) });
  }

  private async marketConditions(ctx: GateContext): Promise<CheckResult> {
    let snapshot: MarketSnapshot | undefined;
    try {
      snapshot = await this.deps.market.getSnapshot(ctx.pair.market);
    } catch (error) {
      return fail('market_data_error', { error: describeError(error) });
    }

    if (!snapshot) return fail('market_data_unavailable');

    const conditions = ctx.pair.priceConditions;
    if (!snapshot.isOpen) return fail('market_closed');
    if (!(snapshot.price > 0)) return fail('invalid_price', { price: snapshot.price });
    if (snapshot.priceAgeMs > this.deps.tradingEngine.maxPriceAgeMs) {
      return fail('price_stale', { priceAgeMs: snapshot.priceAgeMs, maxPriceAgeMs: this.deps.tradingEngine.maxPriceAgeMs });
    }
    if (snapshot.volatility < conditions.minVolatility || snapshot.volatility > conditions.maxVolatility) {
      return fail('volatility_out_of_bounds', {
        volatility: snapshot.volatility,
        min: conditions.minVolatility,
        max: conditions.maxVolatility,
      });
    }
    if (snapshot.liquidity < conditions.minLiquidity) {
      return fail('insufficient_liquidity', { liquidity: snapshot.liquidity, min: conditions.minLiquidity });
    }
    if (snapshot.spread > conditions.maxSpread) {
      return fail('spread_too_wide', { spread: snapshot.spread, max: conditions.maxSpread });
    }

    ctx.snapshot = snapshot;
    return PASS;
  }
}
