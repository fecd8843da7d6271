import { Inject, Injectable, Logger } from '@nestjs/common';
import { ANALYTICS_CONFIG, AnalyticsConfig } from '../config/analytics.config';
import { CLOCK, Clock } from '../common/clock';
import { toDecimal } from '../common/utils/decimal.util';
import { TickerSymbol } from '../symbols/symbol.types';
import { PricePoint, PriceQuote } from './entities/price-quote.entity';
import { PRICE_PROVIDER, PriceProvider, ProviderPrice } from './providers/price-provider.interface';
import { PriceCacheService } from './price-cache.service';
import { PriceHistory } from './price-history';
import { PriceUnavailableError, ProviderTransientError } from './market-price.errors';
import { RetryState, withRetry, withTimeout } from './retry';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FetchOptions {
  signal?: AbortSignal;
}

function isUsablePrice(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Adapter between the provider and the rest of the system.
 * Normalizes provider results into PriceQuote / PricePoint and owns retry,
 * backoff and stale fallback.
 */
@Injectable()
export class PriceSourceService {
  private readonly logger = new Logger(PriceSourceService.name);

  constructor(
    @Inject(PRICE_PROVIDER) private readonly provider: PriceProvider,
    private readonly cache: PriceCacheService,
    @Inject(ANALYTICS_CONFIG) private readonly config: AnalyticsConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Current price for a normalized symbol.
   * Falls back to the last cached quote within the staleness window.
   * @throws PriceUnavailableError when neither live nor fallback data exists
   * @throws RefreshAbortedError when the signal fires (from withRetry)
   */
  async fetchQuote(symbol: TickerSymbol, options: FetchOptions = {}): Promise<PriceQuote> {
    try {
      const result = await this.callProvider(
        `quote ${symbol}`,
        async () => {
          const price = await this.provider.latestPrice(symbol);
          if (!price || !isUsablePrice(price.price)) {
            throw new ProviderTransientError(`empty quote for ${symbol}`);
          }
          return price;
        },
        options.signal,
      );
      return {
        symbol,
        price: toDecimal(result.price),
        asOf: result.timestamp ?? new Date(this.clock.now()),
        source: 'live',
      };
    } catch (error) {
      if (!(error instanceof ProviderTransientError)) {
        throw error;
      }
      const lastKnown = this.cache.getLastKnown(symbol, this.config.priceCache.staleWindowMs);
      if (lastKnown) {
        this.logger.warn(`Using stale quote for ${symbol} from ${lastKnown.asOf.toISOString()}: ${error.message}`);
        return { ...lastKnown, source: 'stale-fallback' };
      }
      this.logger.warn(`No price for ${symbol}: ${error.message}`);
      throw new PriceUnavailableError(symbol, error.message);
    }
  }

  /**
   * Daily history covering the last `windowDays` days.
   * Points with a non-positive or non-finite price are dropped, gaps are kept.
   */
  fetchHistory(symbol: TickerSymbol, windowDays: number, options: FetchOptions = {}): PriceHistory {
    return new PriceHistory(symbol, () => this.loadHistory(symbol, windowDays, options.signal));
  }

  private async loadHistory(
    symbol: TickerSymbol,
    windowDays: number,
    signal?: AbortSignal,
  ): Promise<PricePoint[]> {
    const to = new Date(this.clock.now());
    const from = new Date(to.getTime() - windowDays * DAY_MS);

    let raw: ProviderPrice[];
    try {
      raw = await this.callProvider(
        `history ${symbol}`,
        async () => {
          const points = await this.provider.history(symbol, from, to);
          if (points.length === 0) {
            throw new ProviderTransientError(`empty history for ${symbol}`);
          }
          return points;
        },
        signal,
      );
    } catch (error) {
      if (error instanceof ProviderTransientError) {
        throw new PriceUnavailableError(symbol, error.message);
      }
      throw error;
    }

    return raw
      .filter((point): point is Required<ProviderPrice> =>
        isUsablePrice(point.price) && point.timestamp instanceof Date && !isNaN(point.timestamp.getTime()),
      )
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((point) => ({ timestamp: point.timestamp, price: toDecimal(point.price) }));
  }

  private callProvider<T>(label: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, baseDelayMs, maxDelayMs, requestTimeoutMs } = this.config.priceFetch;
    return withRetry(() => withTimeout(call(), requestTimeoutMs, `${this.provider.name} ${label}`), {
      policy: { maxAttempts, baseDelayMs, maxDelayMs },
      clock: this.clock,
      signal,
      onRetry: (state: RetryState) =>
        this.logger.warn(
          `${label} failed (attempt ${state.attempt}/${maxAttempts}): ${state.lastError?.message}; retrying in ${state.delayMs}ms`,
        ),
    });
  }
}
