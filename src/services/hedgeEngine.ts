import type { AccountRegistry, AccountSummary } from '../domain/accounts/accountRegistry.js';
import type { CooldownTracker } from '../domain/cooldown/cooldownTracker.js';
import type { RiskManager, RiskSummary } from '../domain/risk/riskManager.js';
import { type EngineEvents, eventBus } from '../infra/eventBus.js';
import type { EventLogger } from '../infra/logger.js';
import type { EngineMetrics, Hedge, HedgeState } from '../types.js';
import { type Clock, systemClock } from '../utils/time.js';
import type { PairOutcome, PositionCoordinator } from './positionCoordinator.js';

export interface HedgeEngineDeps {
  coordinator: PositionCoordinator;
  registry: AccountRegistry;
  risk: RiskManager;
  cooldowns: CooldownTracker;
  logger: EventLogger;
  clock?: Clock;
}

export interface PairStatus {
  id: string;
  name: string;
  market: string;
  isEnabled: boolean;
  liveHedges: number;
  halted: boolean;
  dailyLoss: number;
  cooldownRemainingMs: number;
}

export interface EngineStatus {
  running: boolean;
  startedAt?: number;
  uptimeSeconds: number;
  hedges: Record<HedgeState, number>;
  pairs: PairStatus[];
  accounts: { total: number; locked: number; reserved: number };
  risk: RiskSummary;
  metrics: EngineMetrics;
  bufferedCallbacks: number;
  lastAdmissionAt?: number;
  lastRiskEventAt?: number;
  recentTransitions: StateTransition[];
}

export interface StateTransition {
  hedgeId: string;
  pairId: string;
  from: HedgeState | null;
  to: HedgeState;
  reason?: string;
  at: number;
}

export interface StopOptions {
  /** Drive every open and opening hedge through the unwind path. */
  closePositions?: boolean;
}

const OPERATOR_STOP = 'operator_stop';
const MAX_TRANSITIONS = 50;

/**
 * Operator-facing facade. The running flag only gates admission: ticks keep sweeping
 * timeouts and closing positions while the engine is stopped.
 */
export class HedgeEngine {
  private running = false;
  private startedAt?: number;
  private readonly clock: Clock;
  private readonly transitions: StateTransition[] = [];
  private lastAdmissionAt?: number;
  private lastRiskEventAt?: number;
  private unsubscribers: Array<() => void> = [];

  constructor(private readonly deps: HedgeEngineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.clock();
    this.deps.risk.resumeAdmissions();

    await this.deps.logger.log('info', 'engine.started', {
      pairs: this.deps.coordinator.pairs().filter((pair) => pair.isEnabled).map((pair) => pair.id),
    });
  }

  async stop(options: StopOptions = {}): Promise<{ unwinding: number }> {
    this.running = false;
    this.deps.risk.haltAdmissions(OPERATOR_STOP, this.clock());

    const unwinding = options.closePositions ? await this.deps.coordinator.unwindAll(OPERATOR_STOP) : 0;
    await this.deps.logger.log('info', 'engine.stopped', { closePositions: options.closePositions ?? false, unwinding });
    return { unwinding };
  }

  /** Follows engine events so status can report recent activity. */
  startListening(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers = [
      eventBus.on('hedge.state', (event) => this.recordTransition(event)),
      eventBus.on('admission.admitted', () => {
        this.lastAdmissionAt = this.clock();
      }),
      eventBus.on('risk.event', (event) => {
        this.lastRiskEventAt = event.timestamp;
      }),
    ];
  }

  stopListening(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<PairOutcome[]> {
    return this.deps.coordinator.tick({ admit: this.running });
  }

  hedges(state?: HedgeState): Hedge[] {
    return this.deps.coordinator.hedges(state);
  }

  accounts(): AccountSummary[] {
    return this.deps.registry.summaries();
  }

  status(): EngineStatus {
    const now = this.clock();
    const { coordinator, registry, risk, cooldowns } = this.deps;
    const live = coordinator.book.live();
    const accounts = registry.list();

    return {
      running: this.running,
      startedAt: this.startedAt,
      uptimeSeconds: this.running && this.startedAt !== undefined ? Math.floor((now - this.startedAt) / 1000) : 0,
      hedges: coordinator.book.countByState(),
      pairs: coordinator.pairs().map((pair) => ({
        id: pair.id,
        name: pair.name,
        market: pair.market,
        isEnabled: pair.isEnabled,
        liveHedges: live.filter((hedge) => hedge.pairId === pair.id).length,
        halted: risk.isPairHalted(pair.id),
        dailyLoss: risk.pairLoss(pair.id),
        cooldownRemainingMs: cooldowns.remainingMs(pair.id, now),
      })),
      accounts: {
        total: accounts.length,
        locked: accounts.filter((account) => account.locked).length,
        reserved: accounts.filter((account) => account.reservedBy !== undefined).length,
      },
      risk: risk.summary(now),
      metrics: coordinator.metricsSnapshot(),
      bufferedCallbacks: coordinator.book.orphanCount(),
      lastAdmissionAt: this.lastAdmissionAt,
      lastRiskEventAt: this.lastRiskEventAt,
      recentTransitions: [...this.transitions],
    };
  }

  private recordTransition(event: EngineEvents['hedge.state']): void {
    this.transitions.push({ ...event, at: this.clock() });
    if (this.transitions.length > MAX_TRANSITIONS) {
      this.transitions.splice(0, this.transitions.length - MAX_TRANSITIONS);
    }
  }
}
