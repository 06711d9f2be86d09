import { v4 as uuid } from 'uuid';
import { eventBus } from '../../infra/eventBus.js';
import type { RiskAction, RiskEvent, RiskLevel, TradingPair } from '../../types.js';
import { type Clock, dayKey, minutesToMs, systemClock } from '../../utils/time.js';
import { type AccountRegistry, totalBalance } from '../accounts/accountRegistry.js';
import type { CooldownTracker } from '../cooldown/cooldownTracker.js';
import type { RiskConfig } from '../engineConfig.js';

export type RiskCheck = { allowed: true } | { allowed: false; reason: string };

export interface RiskEventInput {
  level: RiskLevel;
  reason: string;
  action: RiskAction;
  pairId?: string;
  accountId?: string;
  value?: number;
  limit?: number;
}

interface Halt {
  reason: string;
  since: number;
}

export interface RiskSummary {
  emergencyStop: (Halt & { active: true }) | { active: false };
  admissionsHalted: (Halt & { active: true }) | { active: false };
  haltedPairs: Array<Halt & { pairId: string }>;
  totalDailyLoss: number;
  pairDailyLoss: Record<string, number>;
  eventsLastHour: number;
}

const round = (v: number): number => Number(v.toFixed(8));

/**
 * Three independent tiers (global, pair, account). Breaches are recorded as frozen
 * RiskEvents and turned into halts; nothing here throws on a breach and nothing here
 * closes positions. Every halting event, and every lifted halt, starts a cooldown on
 * the pairs it touches.
 */
export class RiskManager {
  private readonly log: RiskEvent[] = [];
  private readonly haltedPairs = new Map<string, Halt>();
  private readonly pairDailyLoss = new Map<string, number>();
  private readonly warned = new Set<string>();
  private emergency?: Halt;
  private admissionHalt?: Halt;
  private day: string;

  constructor(
    private readonly registry: AccountRegistry,
    private readonly cooldowns: CooldownTracker,
    private readonly pairs: TradingPair[],
    private readonly config: RiskConfig,
    private readonly clock: Clock = systemClock,
  ) {
    this.day = dayKey(this.clock());
  }

  /** Runs every tier and applies halts. Returns only the events raised by this pass. */
  evaluate(now: number = this.clock()): RiskEvent[] {
    this.rollDay(now);
    const raised: RiskEvent[] = [];

    for (const account of this.registry.list()) {
      if (account.locked) continue;

      if (account.dailyLoss >= account.limits.maxDailyLoss) {
        this.registry.lock(account.id, 'daily_loss');
        raised.push(this.raise({
          level: 'account',
          reason: 'account_daily_loss',
          action: 'halt-account',
          accountId: account.id,
          value: account.dailyLoss,
          limit: account.limits.maxDailyLoss,
        }, now));
        continue;
      }

      const balance = totalBalance(account);
      if (balance < account.limits.minBalance) {
        this.registry.lock(account.id, 'min_balance');
        raised.push(this.raise({
          level: 'account',
          reason: 'account_min_balance',
          action: 'halt-account',
          accountId: account.id,
          value: balance,
          limit: account.limits.minBalance,
        }, now));
        continue;
      }

      this.warnOnce(raised, `account:${account.id}`, account.dailyLoss, account.limits.maxDailyLoss, {
        level: 'account',
        reason: 'account_daily_loss_warning',
        accountId: account.id,
      }, now);
    }

    for (const pair of this.pairs) {
      const loss = this.pairDailyLoss.get(pair.id) ?? 0;
      if (this.haltedPairs.has(pair.id)) continue;

      if (loss >= pair.riskLimits.maxDailyLoss) {
        this.haltedPairs.set(pair.id, { reason: 'pair_daily_loss', since: now });
        raised.push(this.raise({
          level: 'pair',
          reason: 'pair_daily_loss',
          action: 'halt-pair',
          pairId: pair.id,
          value: loss,
          limit: pair.riskLimits.maxDailyLoss,
        }, now));
        continue;
      }

      this.warnOnce(raised, `pair:${pair.id}`, loss, pair.riskLimits.maxDailyLoss, {
        level: 'pair',
        reason: 'pair_daily_loss_warning',
        pairId: pair.id,
      }, now);
    }

    if (!this.emergency) {
      const total = this.totalDailyLoss();
      if (total >= this.config.globalMaxDailyLoss) {
        raised.push(...this.triggerEmergencyStop('global_daily_loss', now, total));
      } else {
        this.warnOnce(raised, 'global', total, this.config.globalMaxDailyLoss, {
          level: 'global',
          reason: 'global_daily_loss_warning',
        }, now);
      }
    }

    return raised;
  }

  checkAdmission(pair: TradingPair, accountIds: string[]): RiskCheck {
    if (this.emergency) return { allowed: false, reason: 'emergency_stop' };
    if (this.admissionHalt) return { allowed: false, reason: 'admissions_halted' };
    if (this.haltedPairs.has(pair.id)) return { allowed: false, reason: 'pair_halted' };
    if (pair.baseAmount > pair.riskLimits.maxPositionSize) return { allowed: false, reason: 'position_size_limit' };

    for (const accountId of accountIds) {
      const account = this.registry.get(accountId);
      if (!account || account.locked) return { allowed: false, reason: 'account_halted' };
    }

    return { allowed: true };
  }

  recordPairLoss(pairId: string, pnl: number, now: number = this.clock()): void {
    this.rollDay(now);
    if (pnl >= 0) return;
    this.pairDailyLoss.set(pairId, round((this.pairDailyLoss.get(pairId) ?? 0) - pnl));
  }

  raise(input: RiskEventInput, now: number = this.clock()): RiskEvent {
    const event: RiskEvent = Object.freeze({
      id: uuid(),
      timestamp: now,
      ...input,
    });

    this.log.push(event);
    if (this.log.length > this.config.maxEvents) {
      this.log.splice(0, this.log.length - this.config.maxEvents);
    }

    this.coolDown(this.affectedPairs(event), `risk_${event.reason}`, now);
    eventBus.emit('risk.event', event);
    return event;
  }

  /** Locks every account and blocks every pair. No-op when already active. */
  triggerEmergencyStop(reason: string, now: number = this.clock(), value?: number): RiskEvent[] {
    if (this.emergency) return [];
    this.emergency = { reason, since: now };

    for (const account of this.registry.list()) {
      this.registry.lock(account.id, 'emergency_stop');
    }

    return [this.raise({
      level: 'global',
      reason,
      action: 'emergency-stop-all',
      value,
      limit: value === undefined ? undefined : this.config.globalMaxDailyLoss,
    }, now)];
  }

  /** Lifts the emergency stop and the locks it placed; other locks stay. */
  resetEmergencyStop(now: number = this.clock()): boolean {
    if (!this.emergency) return false;
    this.emergency = undefined;

    for (const account of this.registry.list()) {
      if (account.lockReason === 'emergency_stop') {
        this.registry.unlock(account.id);
      }
    }
    this.coolDown(this.pairs.map((pair) => pair.id), 'emergency_stop_reset', now);
    return true;
  }

  haltAdmissions(reason: string, now: number = this.clock()): void {
    this.admissionHalt = { reason, since: now };
  }

  resumeAdmissions(): void {
    this.admissionHalt = undefined;
  }

  resumePair(pairId: string, now: number = this.clock()): boolean {
    if (!this.haltedPairs.delete(pairId)) return false;
    this.coolDown([pairId], 'pair_resumed', now);
    return true;
  }

  isEmergencyStopped(): boolean {
    return this.emergency !== undefined;
  }

  isAdmissionHalted(): boolean {
    return this.admissionHalt !== undefined;
  }

  isPairHalted(pairId: string): boolean {
    return this.haltedPairs.has(pairId);
  }

  pairLoss(pairId: string): number {
    return this.pairDailyLoss.get(pairId) ?? 0;
  }

  totalDailyLoss(): number {
    return round(this.registry.list().reduce((sum, account) => sum + account.dailyLoss, 0));
  }

  events(limit?: number): RiskEvent[] {
    return limit === undefined ? [...this.log] : this.log.slice(-limit);
  }

  summary(now: number = this.clock()): RiskSummary {
    return {
      emergencyStop: this.emergency ? { active: true, ...this.emergency } : { active: false },
      admissionsHalted: this.admissionHalt ? { active: true, ...this.admissionHalt } : { active: false },
      haltedPairs: [...this.haltedPairs.entries()].map(([pairId, halt]) => ({ pairId, ...halt })),
      totalDailyLoss: this.totalDailyLoss(),
      pairDailyLoss: Object.fromEntries(this.pairDailyLoss),
      eventsLastHour: this.log.filter((event) => event.timestamp > now - 3_600_000).length,
    };
  }

  private warnOnce(
    raised: RiskEvent[],
    key: string,
    value: number,
    limit: number,
    input: Omit<RiskEventInput, 'action' | 'value' | 'limit'>,
    now: number,
  ): void {
    if (value <= 0 || value < limit * this.config.warnRatio || this.warned.has(key)) return;
    this.warned.add(key);
    raised.push(this.raise({ ...input, action: 'warn', value, limit }, now));
  }

  private affectedPairs(event: RiskEvent): string[] {
    switch (event.action) {
      case 'warn':
        return [];
      case 'emergency-stop-all':
        return this.pairs.map((pair) => pair.id);
      case 'halt-pair':
        return event.pairId ? [event.pairId] : [];
      case 'halt-account': {
        const account = event.accountId ? this.registry.get(event.accountId) : undefined;
        if (!account) return event.pairId ? [event.pairId] : [];
        const address = account.address.toLowerCase();
        return this.pairs
          .filter((pair) => pair.accountAddresses.some((candidate) => candidate.toLowerCase() === address))
          .map((pair) => pair.id);
      }
    }
  }

  /** Opens a window of the pair's `cooldownMinutes`; a longer running window is kept. */
  private coolDown(pairIds: string[], reason: string, now: number): void {
    for (const pair of this.pairs) {
      if (!pairIds.includes(pair.id)) continue;
      const durationMs = minutesToMs(pair.cooldownMinutes);
      if (durationMs <= 0 || this.cooldowns.remainingMs(pair.id, now) >= durationMs) continue;
      this.cooldowns.open(pair.id, durationMs, reason, now);
    }
  }

  private rollDay(now: number): void {
    const today = dayKey(now);
    if (today === this.day) return;

    this.day = today;
    this.pairDailyLoss.clear();
    this.warned.clear();
    for (const [pairId, halt] of this.haltedPairs) {
      if (halt.reason === 'pair_daily_loss') this.haltedPairs.delete(pairId);
    }
  }
}
