import { TickerSymbol } from '../symbols/symbol.types';
import { PricePoint } from './entities/price-quote.entity';

/**
 * Lazy, finite, restartable price series in ascending time order.
 * Nothing is fetched until iteration starts; every iteration loads afresh.
 */
export class PriceHistory implements AsyncIterable<PricePoint> {
  constructor(
    readonly symbol: TickerSymbol,
    private readonly load: () => Promise<PricePoint[]>,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<PricePoint> {
    const points = await this.load();
    yield* points;
  }

  async toArray(): Promise<PricePoint[]> {
    const points: PricePoint[] = [];
    for await (const point of this) {
      points.push(point);
    }
    return points;
  }
}
