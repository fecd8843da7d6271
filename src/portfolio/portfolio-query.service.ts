import { Injectable, Logger } from '@nestjs/common';
import { MarketPriceService } from '../market-price/market-price.service';
import { QuoteWriteBatch } from '../market-price/quote-write-batch';
import { MetricsService } from '../metrics/metrics.service';
import { PortfolioSnapshot } from '../metrics/entities/portfolio-snapshot.entity';
import { riskProfile } from '../metrics/volatility';
import { SymbolNormalizerService } from '../symbols/symbol-normalizer.service';
import { add, toDecimal, toNumber } from '../common/utils/decimal.util';
import { MonthlyRecapDto } from './dto/portfolio-response.dto';
import { Position } from './entities/position.entity';
import { Transaction, TransactionSide } from './entities/transaction.entity';
import { PortfolioStorageService } from './portfolio-storage.service';

export interface SnapshotOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

const NO_RECAP: MonthlyRecapDto = {
  month: null,
  ventures: 0,
  ventureSymbols: [],
  unrealizedPnl: null,
  averagePercentReturn: null,
  riskProfile: null,
  asOf: null,
};

function monthOf(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 7);
}

// Read-only operations for portfolio data.
// CQRS pattern - queries separated from mutations.
@Injectable()
export class PortfolioQueryService {
  private readonly logger = new Logger(PortfolioQueryService.name);

  constructor(
    private readonly storage: PortfolioStorageService,
    private readonly normalizer: SymbolNormalizerService,
    private readonly marketPriceService: MarketPriceService,
    private readonly metricsService: MetricsService,
  ) {}

  /** Open positions (net quantity > 0), ordered by symbol */
  getPositions(): Position[] {
    return Array.from(this.storage.ledger.positions().values())
      .filter((position) => position.netQuantity.greaterThan(0))
      .sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  /** Transaction log in append order; the filter accepts user-entered symbols */
  getTransactions(symbol?: string): Transaction[] {
    return this.storage.ledger.transactions(symbol ? this.normalizer.normalize(symbol) : undefined);
  }

  /**
   * Prices every open position and computes metrics.
   * Quotes fetched during the pass reach the cache only once it completes.
   * @throws RefreshAbortedError when `signal` fires mid-pass
   */
  async getSnapshot(options: SnapshotOptions = {}): Promise<PortfolioSnapshot> {
    const batch = new QuoteWriteBatch();
    const quotes = this.marketPriceService.createQuoteProvider({ ...options, batch });

    const snapshot = await this.metricsService.compute(this.storage.ledger.positions().values(), quotes);

    this.marketPriceService.commitBatch(batch);
    this.logger.debug(`Snapshot of ${snapshot.holdings.length} holdings, ${batch.size} quotes fetched`);
    return snapshot;
  }

  /** User-initiated refresh: bypasses fresh cache entries */
  async refresh(signal?: AbortSignal): Promise<PortfolioSnapshot> {
    this.logger.log('Refreshing prices');
    return this.getSnapshot({ forceRefresh: true, signal });
  }

  /**
   * Recap of the latest month with buys: the number of buys, portfolio P&L,
   * the mean return across holdings and the profile implied by that month's
   * buys. No buys means no pricing pass.
   */
  async getRecap(options: SnapshotOptions = {}): Promise<MonthlyRecapDto> {
    const buys = this.storage.ledger.transactions().filter((t) => t.side === TransactionSide.BUY);
    if (buys.length === 0) {
      return { ...NO_RECAP, ventureSymbols: [] };
    }

    const latest = buys.reduce((a, b) => (b.timestamp.getTime() > a.timestamp.getTime() ? b : a));
    const month = monthOf(latest.timestamp);
    const ventures = buys.filter((t) => monthOf(t.timestamp) === month);

    const snapshot = await this.getSnapshot(options);
    const labels = new Map(snapshot.holdings.map((h) => [h.symbol, h.riskLabel]));
    const returns = snapshot.holdings
      .map((h) => h.percentReturn)
      .filter((r): r is number => r !== null);

    return {
      month,
      ventures: ventures.length,
      ventureSymbols: ventures.map((t) => t.symbol),
      unrealizedPnl: snapshot.totals.unrealizedPnl,
      averagePercentReturn:
        returns.length > 0 ? toNumber(add(...returns.map(toDecimal)).dividedBy(returns.length)) : null,
      riskProfile: riskProfile(ventures.map((t) => labels.get(t.symbol) ?? null)),
      asOf: snapshot.asOf,
    };
  }
}
