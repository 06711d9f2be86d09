import { DomainError, ErrorCode, ReservationError } from '../../errors/taxonomy.js';
import type { Account, LockReason } from '../../types.js';
import { type Clock, dayKey, systemClock } from '../../utils/time.js';
import type { AccountConfig } from '../engineConfig.js';

const round = (v: number): number => Number(v.toFixed(8));

export const totalBalance = (account: Readonly<Account>): number =>
  round(account.availableBalance + account.reservedBalance);

export interface AccountSummary {
  id: string;
  address: string;
  availableBalance: number;
  reservedBalance: number;
  totalBalance: number;
  reservedBy?: string;
  locked: boolean;
  lockReason?: LockReason;
  activeOrders: number;
  dailyLoss: number;
  dailyTrades: number;
  realizedPnl: number;
  cooldownUntil?: number;
}

/**
 * Owns every account record. All mutations are synchronous, so each operation is a
 * critical section with respect to concurrently evaluated pairs.
 *
 * Daily loss and trade counters roll over lazily: the first access on a new UTC day
 * resets them (and lifts a lock that was caused by the daily loss limit).
 */
export class AccountRegistry {
  private readonly accounts = new Map<string, Account>();

  constructor(configs: AccountConfig[], private readonly clock: Clock = systemClock) {
    const today = dayKey(this.clock());
    for (const config of configs) {
      if (!config.isActive) continue;
      this.accounts.set(config.id, {
        id: config.id,
        address: config.address,
        availableBalance: config.balance,
        reservedBalance: 0,
        locked: false,
        activeOrders: 0,
        dailyLoss: 0,
        dailyTrades: 0,
        realizedPnl: 0,
        lastResetDay: today,
        limits: {
          maxDailyLoss: config.riskLimits.maxDailyLoss,
          minBalance: config.riskLimits.minBalance,
          maxDailyTrades: config.maxDailyTrades,
        },
      });
    }
  }

  get(accountId: string): Readonly<Account> | undefined {
    const account = this.accounts.get(accountId);
    if (!account) return undefined;
    this.rollDay(account);
    return account;
  }

  getByAddress(address: string): Readonly<Account> | undefined {
    const wanted = address.toLowerCase();
    for (const account of this.accounts.values()) {
      if (account.address.toLowerCase() === wanted) {
        this.rollDay(account);
        return account;
      }
    }
    return undefined;
  }

  list(): Readonly<Account>[] {
    return [...this.accounts.values()].map((account) => {
      this.rollDay(account);
      return account;
    });
  }

  summaries(): AccountSummary[] {
    return this.list().map((account) => ({
      id: account.id,
      address: account.address,
      availableBalance: account.availableBalance,
      reservedBalance: account.reservedBalance,
      totalBalance: totalBalance(account),
      reservedBy: account.reservedBy,
      locked: account.locked,
      lockReason: account.lockReason,
      activeOrders: account.activeOrders,
      dailyLoss: account.dailyLoss,
      dailyTrades: account.dailyTrades,
      realizedPnl: account.realizedPnl,
      cooldownUntil: this.isCoolingDown(account) ? account.cooldownUntil : undefined,
    }));
  }

  isAvailable(account: Readonly<Account>, amount: number): boolean {
    return this.unavailableReason(account, amount) === undefined;
  }

  reserveForHedge(accountId: string, amount: number, hedgeId: string): void {
    const account = this.require(accountId);
    const reason = this.unavailableReason(account, amount);
    if (reason) throw new ReservationError(accountId, reason);
    this.applyReservation(account, amount, hedgeId);
  }

  /** All-or-nothing: either every account is reserved for the hedge or none is. */
  reserveGroup(accountIds: string[], amount: number, hedgeId: string): void {
    if (new Set(accountIds).size !== accountIds.length) {
      throw new ReservationError(accountIds.join(','), 'duplicate_account');
    }

    const accounts = accountIds.map((id) => this.require(id));
    for (const account of accounts) {
      const reason = this.unavailableReason(account, amount);
      if (reason) throw new ReservationError(account.id, reason);
    }

    for (const account of accounts) {
      this.applyReservation(account, amount, hedgeId);
    }
  }

  release(accountId: string, hedgeId: string): boolean {
    const account = this.require(accountId);
    if (account.reservedBy !== hedgeId) return false;

    account.availableBalance = round(account.availableBalance + account.reservedBalance);
    account.reservedBalance = 0;
    account.reservedBy = undefined;
    return true;
  }

  recordFill(accountId: string, pnl: number): Readonly<Account> {
    const account = this.require(accountId);
    account.availableBalance = round(account.availableBalance + pnl);
    account.realizedPnl = round(account.realizedPnl + pnl);
    account.dailyTrades += 1;
    if (pnl < 0) {
      account.dailyLoss = round(account.dailyLoss - pnl);
    }
    return account;
  }

  /**
   * Returns false when the account was already locked. The first lock reason is kept
   * unless `override` is set.
   */
  lock(accountId: string, reason: LockReason, override = false): boolean {
    const account = this.require(accountId);
    if (account.locked && !override) return false;
    account.locked = true;
    account.lockReason = reason;
    return true;
  }

  unlock(accountId: string): boolean {
    const account = this.require(accountId);
    if (!account.locked) return false;
    account.locked = false;
    account.lockReason = undefined;
    return true;
  }

  /** Keeps the account out of new hedges for `durationMs`; never shortens a running cooldown. */
  startCooldown(accountId: string, durationMs: number, now: number = this.clock()): void {
    const account = this.require(accountId);
    const until = now + Math.max(0, durationMs);
    if (account.cooldownUntil === undefined || until > account.cooldownUntil) {
      account.cooldownUntil = until;
    }
  }

  isCoolingDown(account: Readonly<Account>, now: number = this.clock()): boolean {
    return account.cooldownUntil !== undefined && now < account.cooldownUntil;
  }

  orderPlaced(accountId: string): void {
    this.require(accountId).activeOrders += 1;
  }

  orderSettled(accountId: string): void {
    const account = this.require(accountId);
    account.activeOrders = Math.max(0, account.activeOrders - 1);
  }

  private unavailableReason(account: Readonly<Account>, amount: number): string | undefined {
    if (account.locked) return 'locked';
    if (account.reservedBy) return 'reserved';
    if (account.availableBalance < amount) return 'insufficient_balance';
    if (account.dailyTrades >= account.limits.maxDailyTrades) return 'daily_trade_limit';
    if (this.isCoolingDown(account)) return 'cooling_down';
    return undefined;
  }

  private applyReservation(account: Account, amount: number, hedgeId: string): void {
    account.availableBalance = round(account.availableBalance - amount);
    account.reservedBalance = round(account.reservedBalance + amount);
    account.reservedBy = hedgeId;
  }

  private require(accountId: string): Account {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new DomainError(ErrorCode.AccountNotFound, 404, `Account ${accountId} not found.`);
    }
    this.rollDay(account);
    return account;
  }

  private rollDay(account: Account): void {
    const today = dayKey(this.clock());
    if (account.lastResetDay === today) return;

    account.dailyLoss = 0;
    account.dailyTrades = 0;
    account.lastResetDay = today;
    if (account.lockReason === 'daily_loss') {
      account.locked = false;
      account.lockReason = undefined;
    }
  }
}
