import type { MarketSnapshot } from '../../types.js';
import { type Clock, systemClock } from '../../utils/time.js';

export interface MarketSnapshotProvider {
  getSnapshot(market: string): Promise<MarketSnapshot | undefined>;
}

export interface MarketQuote {
  isOpen: boolean;
  price: number;
  volatility: number;
  liquidity: number;
  spread: number;
}

interface StoredQuote extends MarketQuote {
  updatedAt: number;
}

/**
 * Latest-quote cache fed by pushes (HTTP or an exchange stream). Price age is measured
 * at read time, so a quote that stops updating goes stale on its own.
 */
export class InMemoryMarketFeed implements MarketSnapshotProvider {
  private readonly quotes = new Map<string, StoredQuote>();

  constructor(private readonly clock: Clock = systemClock) {}

  update(market: string, quote: MarketQuote, at: number = this.clock()): void {
    this.quotes.set(market.toUpperCase(), {
      ...quote,
      price: Number(quote.price.toFixed(8)),
      updatedAt: at,
    });
  }

  async getSnapshot(market: string): Promise<MarketSnapshot | undefined> {
    const quote = this.quotes.get(market.toUpperCase());
    if (!quote) return undefined;

    return {
      market: market.toUpperCase(),
      isOpen: quote.isOpen,
      price: quote.price,
      priceAgeMs: Math.max(0, this.clock() - quote.updatedAt),
      volatility: quote.volatility,
      liquidity: quote.liquidity,
      spread: quote.spread,
    };
  }
}
