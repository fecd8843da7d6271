import { Injectable } from '@nestjs/common';
import yahooFinance from 'yahoo-finance2';
import { PriceProvider, ProviderPrice } from './price-provider.interface';

/**
 * Yahoo Finance market data via yahoo-finance2.
 * Daily closes for history; regular market price for quotes.
 */
@Injectable()
export class YahooPriceProvider implements PriceProvider {
  readonly name = 'yahoo-finance';

  async latestPrice(symbol: string): Promise<ProviderPrice | null> {
    const quote = await yahooFinance.quote(symbol);
    if (!quote || typeof quote.regularMarketPrice !== 'number') {
      return null;
    }
    return {
      price: quote.regularMarketPrice,
      timestamp: quote.regularMarketTime instanceof Date ? quote.regularMarketTime : undefined,
    };
  }

  async history(symbol: string, from: Date, to: Date): Promise<ProviderPrice[]> {
    const chart = await yahooFinance.chart(symbol, {
      period1: from,
      period2: to,
      interval: '1d',
    });
    const points: ProviderPrice[] = [];
    for (const point of chart.quotes ?? []) {
      if (typeof point.close === 'number' && point.date instanceof Date) {
        points.push({ price: point.close, timestamp: point.date });
      }
    }
    return points;
  }
}
