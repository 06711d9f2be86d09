import type { ExitPolicy, Hedge, LegSide, MarketSnapshot, TradingPair } from '../../types.js';
import { minutesToMs } from '../../utils/time.js';

export type CloseReason = 'risk_halt' | 'near_liquidation' | 'stop_loss' | 'take_profit' | 'max_hold' | 'target_hit';

export interface CloseInput {
  hedge: Hedge;
  pair: TradingPair;
  snapshot?: MarketSnapshot;
  now: number;
  pairHalted: boolean;
  maxPriceAgeMs: number;
}

const MIN_STOP_LOSS_BPS = 10;

export const priceMoveBps = (entryPrice: number, price: number): number =>
  Math.abs(price - entryPrice) / entryPrice * 10_000;

/** Signed move in the leg's favour. */
export const legMoveBps = (side: LegSide, entryPrice: number, price: number): number => {
  const move = (price - entryPrice) / entryPrice * 10_000;
  return side === 'long' ? move : -move;
};

/** Leverage tightens the stop loss (never below 10 bps); take profit stays as configured. */
export const effectiveStopLossBps = (exit: ExitPolicy): number => {
  if (exit.stopLossBps <= 0) return 0;
  if (exit.leverage <= 1) return exit.stopLossBps;
  return Math.max(Math.floor(exit.stopLossBps / exit.leverage), MIN_STOP_LOSS_BPS);
};

/** Adverse move at which a leveraged leg is closed before the venue liquidates it. */
export const liquidationTriggerBps = (exit: ExitPolicy): number =>
  exit.leverage > 1 ? 10_000 / exit.leverage * exit.liquidationBufferRatio : 0;

const priceRule = (hedge: Hedge, exit: ExitPolicy, price: number): CloseReason | undefined => {
  const moves = hedge.legs
    .map((leg) => {
      const entry = leg.avgPrice ?? hedge.entryPrice;
      return entry ? legMoveBps(leg.side, entry, price) : undefined;
    })
    .filter((move): move is number => move !== undefined);
  if (moves.length === 0) return undefined;

  const worst = Math.min(...moves);
  const best = Math.max(...moves);

  const liquidation = liquidationTriggerBps(exit);
  if (liquidation > 0 && -worst >= liquidation) return 'near_liquidation';

  const stopLoss = effectiveStopLossBps(exit);
  if (stopLoss > 0 && -worst >= stopLoss) return 'stop_loss';

  if (exit.takeProfitBps > 0 && best >= exit.takeProfitBps) return 'take_profit';
  return undefined;
};

/**
 * Decides whether an open hedge should be closed on this tick. A stale or missing
 * quote never triggers a price rule. Legs are judged one by one: the first leg to reach
 * its stop loss or take profit closes the whole hedge.
 */
export function evaluateClose(input: CloseInput): CloseReason | undefined {
  const { hedge, pair, snapshot, now } = input;
  if (hedge.state !== 'open') return undefined;

  if (pair.exit.closeOnPairHalt && input.pairHalted) return 'risk_halt';

  const fresh = snapshot !== undefined && snapshot.price > 0 && snapshot.priceAgeMs <= input.maxPriceAgeMs;
  const byLeg = fresh ? priceRule(hedge, pair.exit, snapshot.price) : undefined;
  if (byLeg) return byLeg;

  if (pair.exit.maxHoldMinutes > 0 && hedge.openedAt !== undefined
    && now - hedge.openedAt >= minutesToMs(pair.exit.maxHoldMinutes)) {
    return 'max_hold';
  }

  if (fresh && pair.exit.targetMoveBps > 0 && hedge.entryPrice
    && priceMoveBps(hedge.entryPrice, snapshot.price) >= pair.exit.targetMoveBps) {
    return 'target_hit';
  }

  return undefined;
}
