import { TickerSymbol } from '../symbols/symbol.types';
import { PriceQuote } from './entities/price-quote.entity';

/**
 * Live quotes gathered during one analytics pass.
 * Written to the cache only on commit, so an aborted pass leaves it as it was.
 */
export class QuoteWriteBatch {
  private staged: Map<TickerSymbol, PriceQuote> = new Map();

  stage(quote: PriceQuote): void {
    this.staged.set(quote.symbol, quote);
  }

  get(symbol: TickerSymbol): PriceQuote | undefined {
    return this.staged.get(symbol);
  }

  quotes(): PriceQuote[] {
    return Array.from(this.staged.values());
  }

  get size(): number {
    return this.staged.size;
  }
}
