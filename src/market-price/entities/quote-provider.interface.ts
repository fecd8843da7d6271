import { TickerSymbol } from '../../symbols/symbol.types';
import { PricePoint, PriceQuote } from './price-quote.entity';

/**
 * What the metrics engine needs from the pricing side.
 * getQuote rejects with PriceUnavailableError when a symbol cannot be priced.
 */
export interface QuoteProvider {
  getQuote(symbol: TickerSymbol): Promise<PriceQuote>;
  getHistory(symbol: TickerSymbol, lookbackDays: number): AsyncIterable<PricePoint>;
}
