import type { Hedge, HedgeState } from '../../types.js';

export type OrderKind = 'entry' | 'unwind';

export interface OrderLink {
  hedgeId: string;
  legIndex: number;
  kind: OrderKind;
}

export type OrderCallback =
  | { type: 'fill'; filledSize: number; avgPrice: number }
  | { type: 'reject'; reason: string };

const MAX_ORPHANS = 1_000;

export const LIVE_STATES: ReadonlySet<HedgeState> = new Set(['pending', 'opening', 'open', 'closing']);
export const TERMINAL_STATES: ReadonlySet<HedgeState> = new Set(['closed', 'failed']);

/**
 * Arena of hedges plus the order-reference index used to route fill callbacks.
 * Terminal hedges stay in the book for inspection.
 */
export class HedgeBook {
  private readonly hedges = new Map<string, Hedge>();
  private readonly orders = new Map<string, OrderLink>();
  private readonly orphans = new Map<string, OrderCallback[]>();

  add(hedge: Hedge): void {
    this.hedges.set(hedge.id, hedge);
  }

  get(hedgeId: string): Hedge | undefined {
    return this.hedges.get(hedgeId);
  }

  all(): Hedge[] {
    return [...this.hedges.values()].sort((a, b) => a.createdAt - b.createdAt);
  }

  forPair(pairId: string): Hedge[] {
    return this.all().filter((hedge) => hedge.pairId === pairId);
  }

  live(): Hedge[] {
    return this.all().filter((hedge) => LIVE_STATES.has(hedge.state));
  }

  countByState(): Record<HedgeState, number> {
    const counts: Record<HedgeState, number> = {
      pending: 0,
      opening: 0,
      open: 0,
      closing: 0,
      closed: 0,
      failed: 0,
    };
    for (const hedge of this.hedges.values()) {
      counts[hedge.state] += 1;
    }
    return counts;
  }

  /**
   * Indexes an order reference. Callbacks that arrived before the reference was known
   * are handed back, oldest first, so the caller can replay them.
   */
  linkOrder(orderRef: string, link: OrderLink): OrderCallback[] {
    this.orders.set(orderRef, link);
    return this.takeOrphans(orderRef);
  }

  takeOrphans(orderRef: string): OrderCallback[] {
    const early = this.orphans.get(orderRef) ?? [];
    this.orphans.delete(orderRef);
    return early;
  }

  resolve(orderRef: string): OrderLink | undefined {
    return this.orders.get(orderRef);
  }

  bufferOrphan(orderRef: string, callback: OrderCallback): void {
    this.orphans.set(orderRef, [...(this.orphans.get(orderRef) ?? []), callback]);
    if (this.orphans.size > MAX_ORPHANS) {
      const oldest = this.orphans.keys().next();
      if (!oldest.done) this.orphans.delete(oldest.value);
    }
  }

  orphanCount(): number {
    return this.orphans.size;
  }
}
