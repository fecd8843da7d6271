import { Inject, Injectable } from '@nestjs/common';
import { ANALYTICS_CONFIG, AnalyticsConfig } from '../config/analytics.config';
import { TickerSymbol } from '../symbols/symbol.types';
import { PricePoint, PriceQuote } from './entities/price-quote.entity';
import { QuoteProvider } from './entities/quote-provider.interface';
import { CacheLookupOptions, PriceCacheService } from './price-cache.service';
import { PriceSourceService } from './price-source.service';

/**
 * Entry point for prices: cache first, then the source adapter.
 * Symbols must already be normalized.
 */
@Injectable()
export class MarketPriceService {
  constructor(
    private readonly cache: PriceCacheService,
    private readonly source: PriceSourceService,
    @Inject(ANALYTICS_CONFIG) private readonly config: AnalyticsConfig,
  ) {}

  /**
   * Current quote, served from cache within its TTL.
   * @throws PriceUnavailableError
   */
  getQuote(symbol: TickerSymbol, options: CacheLookupOptions = {}): Promise<PriceQuote> {
    return this.cache.getOrFetch(
      symbol,
      (s) => this.source.fetchQuote(s, { signal: options.signal }),
      options,
    );
  }

  /** Ascending daily points; defaults to the volatility lookback */
  getHistory(symbol: TickerSymbol, days = this.config.volatility.historyLookbackDays): Promise<PricePoint[]> {
    return this.source.fetchHistory(symbol, days).toArray();
  }

  /**
   * Quote source for one analytics pass. With a batch, live quotes are
   * staged and reach the cache only when the caller commits.
   */
  createQuoteProvider(options: CacheLookupOptions = {}): QuoteProvider {
    return {
      getQuote: (symbol) => this.getQuote(symbol, options),
      getHistory: (symbol, lookbackDays) =>
        this.source.fetchHistory(symbol, lookbackDays, { signal: options.signal }),
    };
  }

  commitBatch(batch: NonNullable<CacheLookupOptions['batch']>): void {
    this.cache.commit(batch);
  }

  /** Drops every cached quote, fallbacks included */
  clearCache(): void {
    this.cache.clear();
  }
}
