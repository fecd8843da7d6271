import { Test, TestingModule } from '@nestjs/testing';
import { MarketPriceService } from './market-price.service';
import { QuoteWriteBatch } from './quote-write-batch';
import { PriceUnavailableError } from './market-price.errors';
import { FakeClock } from '../testing/fake-clock';
import { FakePriceProvider } from '../testing/fake-price-provider';
import { pricingProviders } from '../testing/pricing-providers';

describe('MarketPriceService', () => {
  let service: MarketPriceService;
  let provider: FakePriceProvider;
  let clock: FakeClock;

  beforeEach(async () => {
    provider = new FakePriceProvider();
    clock = new FakeClock();
    const module: TestingModule = await Test.createTestingModule({
      providers: pricingProviders(provider, clock),
    }).compile();

    service = module.get<MarketPriceService>(MarketPriceService);
  });

  describe('getQuote', () => {
    it('should fetch live once and serve from cache within the TTL', async () => {
      provider.setPrice('AAPL', 187.5);

      const first = await service.getQuote('AAPL');
      const second = await service.getQuote('AAPL');

      expect(first.source).toBe('live');
      expect(second.source).toBe('cached');
      expect(second.price.toNumber()).toBe(187.5);
      expect(provider.quoteCalls).toEqual(['AAPL']);
    });

    it('should bypass the cache on forceRefresh', async () => {
      provider.setPrice('AAPL', 187.5);
      await service.getQuote('AAPL');
      provider.setPrice('AAPL', 190);

      const quote = await service.getQuote('AAPL', { forceRefresh: true });

      expect(quote.source).toBe('live');
      expect(quote.price.toNumber()).toBe(190);
      expect(provider.quoteCalls).toHaveLength(2);
    });

    it('should fall back to the expired cache entry when the provider is down', async () => {
      provider.setPrice('AAPL', 187.5);
      await service.getQuote('AAPL');
      clock.advance(5 * 60 * 1000);
      provider.failAlways('AAPL');

      const quote = await service.getQuote('AAPL');

      expect(quote.source).toBe('stale-fallback');
      expect(quote.price.toNumber()).toBe(187.5);
    });

    it('should reject with PriceUnavailableError when nothing is known', async () => {
      await expect(service.getQuote('NOPE')).rejects.toThrow(PriceUnavailableError);
    });
  });

  describe('getHistory', () => {
    it('should return ascending points', async () => {
      provider.setHistory('AAPL', [100, 101, 102]);

      const points = await service.getHistory('AAPL', 30);

      expect(points.map((p) => p.price.toNumber())).toEqual([100, 101, 102]);
      expect(points[0].timestamp.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    });
  });

  describe('createQuoteProvider', () => {
    it('should stage quotes in the batch until committed', async () => {
      provider.setPrice('MSFT', 410);
      const batch = new QuoteWriteBatch();
      const quotes = service.createQuoteProvider({ batch });

      await quotes.getQuote('MSFT');
      expect(batch.size).toBe(1);

      // not in the cache yet, so this goes to the provider
      await service.getQuote('MSFT');
      expect(provider.quoteCalls).toHaveLength(2);

      service.clearCache();
      service.commitBatch(batch);
      const cached = await service.getQuote('MSFT');
      expect(cached.source).toBe('cached');
      expect(provider.quoteCalls).toHaveLength(2);
    });

    it('should expose history as an async iterable', async () => {
      provider.setHistory('MSFT', [400, 405]);
      const prices: number[] = [];

      for await (const point of service.createQuoteProvider().getHistory('MSFT', 10)) {
        prices.push(point.price.toNumber());
      }

      expect(prices).toEqual([400, 405]);
    });
  });

  describe('clearCache', () => {
    it('should force the next lookup to the provider', async () => {
      provider.setPrice('AAPL', 187.5);
      await service.getQuote('AAPL');

      service.clearCache();
      await service.getQuote('AAPL');

      expect(provider.quoteCalls).toEqual(['AAPL', 'AAPL']);
    });
  });
});
