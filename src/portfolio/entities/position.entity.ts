import Decimal from 'decimal.js';
import { TickerSymbol } from '../../symbols/symbol.types';

// Derived holding for one symbol, never stored on its own.
// netQuantity = sum(buys) - sum(sells); averageCost moves on buys only.
export interface Position {
  symbol: TickerSymbol;
  netQuantity: Decimal;
  averageCost: Decimal;   // weighted average of buy prices
}
