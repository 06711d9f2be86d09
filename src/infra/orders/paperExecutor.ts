import { v4 as uuid } from 'uuid';
import { OrderRejectedError, describeError } from '../../errors/taxonomy.js';
import type { EventLogger } from '../logger.js';
import type { MarketSnapshotProvider } from '../markets/marketFeed.js';
import type { FillListener, OrderExecutor, PlaceOrderRequest } from './orderExecutor.js';

export interface PaperExecutorOptions {
  fillDelayMs: number;
}

interface PaperOrder {
  request: PlaceOrderRequest;
  price: number;
  timer: NodeJS.Timeout;
}

/**
 * Simulated exchange: every accepted order fills in full after `fillDelayMs` at the
 * current feed price, crossing half the quoted spread.
 */
export class PaperOrderExecutor implements OrderExecutor {
  private listener?: FillListener;
  private readonly orders = new Map<string, PaperOrder>();

  constructor(
    private readonly feed: MarketSnapshotProvider,
    private readonly logger: EventLogger,
    private readonly options: PaperExecutorOptions,
  ) {}

  setListener(listener: FillListener): void {
    this.listener = listener;
  }

  async placeOrder(request: PlaceOrderRequest): Promise<string> {
    const snapshot = await this.feed.getSnapshot(request.market);
    if (!snapshot || !snapshot.isOpen) {
      throw new OrderRejectedError('market_unavailable', { market: request.market });
    }

    const halfSpread = snapshot.spread / 2;
    const price = request.side === 'buy'
      ? snapshot.price * (1 + halfSpread)
      : snapshot.price * (1 - halfSpread);

    const orderRef = `paper-${uuid()}`;
    const timer = setTimeout(() => {
      void this.fill(orderRef);
    }, this.options.fillDelayMs);

    this.orders.set(orderRef, { request, price: Number(price.toFixed(8)), timer });
    return orderRef;
  }

  async cancelOrder(orderRef: string): Promise<void> {
    const order = this.orders.get(orderRef);
    if (!order) return;
    clearTimeout(order.timer);
    this.orders.delete(orderRef);
  }

  async close(): Promise<void> {
    for (const order of this.orders.values()) {
      clearTimeout(order.timer);
    }
    this.orders.clear();
  }

  private async fill(orderRef: string): Promise<void> {
    const order = this.orders.get(orderRef);
    if (!order) return;
    this.orders.delete(orderRef);

    if (!this.listener) {
      await this.logger.log('warn', 'paper.fill.unrouted', { orderRef });
      return;
    }

    try {
      await this.listener.onFill(orderRef, order.request.size, order.price);
    } catch (error) {
      await this.logger.log('error', 'paper.fill.listener_error', { orderRef, error: describeError(error) });
    }
  }
}
