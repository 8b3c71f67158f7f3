import type { PriceQuote, PriceSource } from '../domain/types';
import { applyBpsDrop, toCents } from '../utils/math';

// Before/after quote of one crashed source, in display units.
export type CrashTick = {
  at: string;
  changed: { source: string; old: number; new: number; dropPct: number };
};

// Settable quotes keyed by price source id. Stands in for an on-chain feed.
export class InMemoryPriceFeed implements PriceSource {
  private readonly quotes = new Map<string, PriceQuote>();

  constructor(initial: Record<string, bigint> = {}, private readonly decimals = 8) {
    for (const [source, price] of Object.entries(initial)) this.setPrice(source, price);
  }

  latestPrice(priceSourceId: string): PriceQuote {
    const quote = this.quotes.get(priceSourceId);
    if (!quote) throw new Error(`No quote for ${priceSourceId}`);
    return quote;
  }

  setPrice(priceSourceId: string, price: bigint, decimals = this.decimals): void {
    this.quotes.set(priceSourceId, { price, decimals });
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(
      [...this.quotes].map(([source, q]) => [source, toCents(q.price, q.decimals)]),
    );
  }

  // Lowers one source by `dropBps` basis points, keeping its decimals.
  applyCrashTick(priceSourceId: string, dropBps: number): CrashTick {
    const current = this.latestPrice(priceSourceId);
    const next = applyBpsDrop(current.price, dropBps);
    this.setPrice(priceSourceId, next, current.decimals);
    return {
      at: new Date().toISOString(),
      changed: {
        source: priceSourceId,
        old: toCents(current.price, current.decimals),
        new: toCents(next, current.decimals),
        dropPct: dropBps / 100,
      },
    };
  }
}
