import { Inject, Injectable } from '@nestjs/common';
import { ANALYTICS_CONFIG, AnalyticsConfig } from '../config/analytics.config';
import { CLOCK, Clock } from '../common/clock';
import { TickerSymbol } from '../symbols/symbol.types';
import { PriceQuote } from './entities/price-quote.entity';
import { RefreshAbortedError } from './market-price.errors';
import { QuoteWriteBatch } from './quote-write-batch';

interface CacheEntry {
  quote: PriceQuote;
  storedAt: number;
  expiresAt: number;
}

export interface CacheLookupOptions {
  forceRefresh?: boolean;       // skip fresh entries (user refresh)
  signal?: AbortSignal;
  batch?: QuoteWriteBatch;      // stage writes instead of storing
}

export type QuoteFetcher = (symbol: TickerSymbol) => Promise<PriceQuote>;

// One entry per symbol, overwritten on refresh.
// Expired entries are kept as last-known quotes for stale fallback.
@Injectable()
export class PriceCacheService {
  private entries: Map<TickerSymbol, CacheEntry> = new Map();

  constructor(
    @Inject(ANALYTICS_CONFIG) private readonly config: AnalyticsConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** Entry within its TTL, or undefined */
  getFresh(symbol: TickerSymbol): PriceQuote | undefined {
    const entry = this.entries.get(symbol);
    if (!entry || this.clock.now() >= entry.expiresAt) {
      return undefined;
    }
    return entry.quote;
  }

  /** Most recent quote stored no longer than maxAgeMs ago, expired or not */
  getLastKnown(symbol: TickerSymbol, maxAgeMs: number): PriceQuote | undefined {
    const entry = this.entries.get(symbol);
    if (!entry || this.clock.now() - entry.storedAt > maxAgeMs) {
      return undefined;
    }
    return entry.quote;
  }

  store(quote: PriceQuote): void {
    const now = this.clock.now();
    this.entries.set(quote.symbol, {
      quote,
      storedAt: now,
      expiresAt: now + this.config.priceCache.ttlMs,
    });
  }

  commit(batch: QuoteWriteBatch): void {
    batch.quotes().forEach((quote) => this.store(quote));
  }

  /**
   * Returns a fresh cached quote tagged `cached`, otherwise calls the fetcher.
   * Only live quotes are written back; fallbacks never refresh an entry.
   */
  async getOrFetch(
    symbol: TickerSymbol,
    fetcher: QuoteFetcher,
    options: CacheLookupOptions = {},
  ): Promise<PriceQuote> {
    const { forceRefresh = false, signal, batch } = options;

    const staged = batch?.get(symbol);
    if (staged) {
      return staged;
    }

    if (!forceRefresh) {
      const fresh = this.getFresh(symbol);
      if (fresh) {
        return { ...fresh, source: 'cached' };
      }
    }

    const quote = await fetcher(symbol);
    if (signal?.aborted) {
      throw new RefreshAbortedError();
    }

    if (quote.source === 'live') {
      if (batch) {
        batch.stage(quote);
      } else {
        this.store(quote);
      }
    }
    return quote;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
