import Decimal from 'decimal.js';
import { TickerSymbol } from '../../symbols/symbol.types';

// live: fetched in this call; cached: served from the TTL cache;
// stale-fallback: provider failed, last known quote within the staleness window.
export type QuoteSource = 'live' | 'cached' | 'stale-fallback';

export interface PriceQuote {
  symbol: TickerSymbol;
  price: Decimal;
  asOf: Date;
  source: QuoteSource;
}

export interface PricePoint {
  timestamp: Date;
  price: Decimal;
}
