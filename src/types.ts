export type LegSide = 'long' | 'short';
export type OrderSide = 'buy' | 'sell';

export type HedgeState = 'pending' | 'opening' | 'open' | 'closing' | 'closed' | 'failed';
export type LegFillState = 'pending' | 'filled' | 'rejected' | 'cancelled';
export type UnwindState = 'placing' | 'pending' | 'filled' | 'failed';
export type CloseIntent = 'close' | 'failure';

export type LockReason = 'daily_loss' | 'min_balance' | 'emergency_stop' | 'unwind_failed' | 'manual';

export type RiskLevel = 'global' | 'pair' | 'account';
export type RiskAction = 'warn' | 'halt-pair' | 'halt-account' | 'emergency-stop-all';

export interface AccountLimits {
  maxDailyLoss: number;
  minBalance: number;
  maxDailyTrades: number;
}

export interface Account {
  id: string;
  address: string;
  availableBalance: number;
  reservedBalance: number;
  reservedBy?: string;
  locked: boolean;
  lockReason?: LockReason;
  activeOrders: number;
  dailyLoss: number;
  dailyTrades: number;
  realizedPnl: number;
  lastResetDay: string;
  /** Epoch ms until which the account is kept out of new hedges. */
  cooldownUntil?: number;
  limits: AccountLimits;
}

export interface PriceConditions {
  maxSpread: number;
  minVolatility: number;
  maxVolatility: number;
  minLiquidity: number;
}

export interface PairRiskLimits {
  maxDailyLoss: number;
  maxPositionSize: number;
}

export interface ExitPolicy {
  /** Absolute price move from entry, in basis points, that closes an open hedge. 0 disables. */
  targetMoveBps: number;
  /** Favourable move of any single leg, in basis points. 0 disables. */
  takeProfitBps: number;
  /** Adverse move of any single leg, in basis points, before leverage tightening. 0 disables. */
  stopLossBps: number;
  leverage: number;
  /**
   * Share of the liquidation distance (10000 / leverage bps) a leg may lose before the
   * hedge is closed as an emergency. Only applies with leverage above 1.
   */
  liquidationBufferRatio: number;
  /** 0 disables. */
  maxHoldMinutes: number;
  closeOnPairHalt: boolean;
}

export interface TradingPair {
  id: string;
  name: string;
  market: string;
  isEnabled: boolean;
  baseAmount: number;
  maxPositions: number;
  cooldownMinutes: number;
  accountCooldownMinutes: number;
  accountsPerHedge: number;
  accountAddresses: string[];
  riskLimits: PairRiskLimits;
  priceConditions: PriceConditions;
  exit: ExitPolicy;
}

export interface LegUnwind {
  orderRef?: string;
  state: UnwindState;
  attempts: number;
  filledSize: number;
  avgPrice?: number;
  placedAt?: number;
  reason?: string;
  cancelAttempts?: number;
}

export interface Leg {
  accountId: string;
  side: LegSide;
  size: number;
  orderRef?: string;
  fillState: LegFillState;
  filledSize: number;
  avgPrice?: number;
  placedAt?: number;
  reason?: string;
  /** Set once the entry order outlived the order timeout. */
  expired?: boolean;
  cancelAttempts?: number;
  unwind?: LegUnwind;
}

export interface Hedge {
  id: string;
  pairId: string;
  market: string;
  legs: Leg[];
  state: HedgeState;
  createdAt: number;
  openedAt?: number;
  closedAt?: number;
  closeIntent?: CloseIntent;
  closeReason?: string;
  failureReason?: string;
  entryPrice?: number;
  realizedPnl?: number;
}

export interface RiskEvent {
  readonly id: string;
  readonly level: RiskLevel;
  readonly reason: string;
  readonly action: RiskAction;
  readonly timestamp: number;
  readonly pairId?: string;
  readonly accountId?: string;
  readonly value?: number;
  readonly limit?: number;
}

export interface CooldownWindow {
  pairId: string;
  openedAt: number;
  expiresAt: number;
  reason: string;
}

export interface MarketSnapshot {
  market: string;
  isOpen: boolean;
  price: number;
  priceAgeMs: number;
  volatility: number;
  liquidity: number;
  spread: number;
}

export interface EngineMetrics {
  ticks: number;
  lastTickAt?: number;
  admissions: number;
  denialsByCheck: Record<string, number>;
  hedgesOpened: number;
  hedgesClosed: number;
  hedgesFailed: number;
  unwindFailures: number;
}
