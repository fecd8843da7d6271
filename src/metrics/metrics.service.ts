import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ANALYTICS_CONFIG, AnalyticsConfig } from '../config/analytics.config';
import { CLOCK, Clock } from '../common/clock';
import { executeConcurrently } from '../common/utils/concurrency.util';
import { toMoney, toNumber } from '../common/utils/decimal.util';
import { PriceQuote } from '../market-price/entities/price-quote.entity';
import { QuoteProvider } from '../market-price/entities/quote-provider.interface';
import { PriceUnavailableError, RefreshAbortedError } from '../market-price/market-price.errors';
import { Position } from '../portfolio/entities/position.entity';
import {
  HoldingMetrics,
  PortfolioRankings,
  PortfolioSnapshot,
  PortfolioTotals,
  PriceGap,
  RiskLabel,
} from './entities/portfolio-snapshot.entity';
import { annualize, classifyRisk, riskProfile, rollingVolatility } from './volatility';

// Intermediate per-holding result kept in Decimal until the snapshot is built.
interface HoldingEvaluation {
  position: Position;
  quote: PriceQuote | null;
  gapReason: string | null;
  volatility: Decimal | null;
  annualizedVolatility: Decimal | null;
}

const RISK_WEIGHT: Record<RiskLabel, number> = {
  [RiskLabel.LOW]: 1,
  [RiskLabel.MEDIUM]: 2,
  [RiskLabel.HIGH]: 3,
};

function riskWeight(label: RiskLabel | null): number {
  return label !== null ? RISK_WEIGHT[label] : 0;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Turns positions plus prices into a point-in-time snapshot.
 * A symbol without a price becomes a gap; it never aborts the pass.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    @Inject(ANALYTICS_CONFIG) private readonly config: AnalyticsConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Computes per-holding and aggregate metrics. Closed positions are skipped.
   * @throws RefreshAbortedError when the quote provider was aborted
   */
  async compute(positions: Iterable<Position>, quotes: QuoteProvider): Promise<PortfolioSnapshot> {
    const open = Array.from(positions)
      .filter((position) => position.netQuantity.greaterThan(0))
      .sort((a, b) => a.symbol.localeCompare(b.symbol));

    const settled = await executeConcurrently(
      open.map((position) => () => this.evaluate(position, quotes)),
      this.config.quoteConcurrency,
    );

    const evaluations = settled.map((result, i): HoldingEvaluation => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      if (result.reason instanceof RefreshAbortedError) {
        throw result.reason;
      }
      this.logger.error(`Unexpected failure evaluating ${open[i].symbol}: ${errorMessage(result.reason)}`);
      return {
        position: open[i],
        quote: null,
        gapReason: errorMessage(result.reason),
        volatility: null,
        annualizedVolatility: null,
      };
    });

    return this.buildSnapshot(evaluations);
  }

  private async evaluate(position: Position, quotes: QuoteProvider): Promise<HoldingEvaluation> {
    const { symbol } = position;
    let quote: PriceQuote;
    try {
      quote = await quotes.getQuote(symbol);
    } catch (error) {
      if (!(error instanceof PriceUnavailableError)) {
        throw error;
      }
      this.logger.warn(`Gap for ${symbol}: ${error.reason}`);
      return { position, quote: null, gapReason: error.reason, volatility: null, annualizedVolatility: null };
    }

    const volatility = await this.volatilityFor(symbol, quotes);
    return {
      position,
      quote,
      gapReason: null,
      volatility,
      annualizedVolatility: volatility !== null ? annualize(volatility, this.config.volatility.annualizationDays) : null,
    };
  }

  // N/A when history is unavailable; only an abort propagates.
  private async volatilityFor(symbol: string, quotes: QuoteProvider): Promise<Decimal | null> {
    const { window, historyLookbackDays } = this.config.volatility;
    const prices: Decimal[] = [];
    try {
      for await (const point of quotes.getHistory(symbol, historyLookbackDays)) {
        prices.push(point.price);
      }
    } catch (error) {
      if (!(error instanceof PriceUnavailableError)) {
        throw error;
      }
      this.logger.warn(`No history for ${symbol}, volatility N/A: ${error.reason}`);
      return null;
    }
    return rollingVolatility(prices, window);
  }

  private buildSnapshot(evaluations: HoldingEvaluation[]): PortfolioSnapshot {
    const thresholds = this.config.riskThresholds;
    const holdings: HoldingMetrics[] = [];
    const gaps: PriceGap[] = [];

    let totalValue = new Decimal(0);
    let totalCost = new Decimal(0);
    let totalPnl = new Decimal(0);
    let weightedVolatility = new Decimal(0);
    let volatilityWeight = new Decimal(0);

    for (const evaluation of evaluations) {
      const { position, quote } = evaluation;
      const costBasis = position.netQuantity.times(position.averageCost);
      const riskLabel = classifyRisk(evaluation.annualizedVolatility, thresholds);

      if (!quote) {
        gaps.push({ symbol: position.symbol, reason: evaluation.gapReason ?? 'price unavailable' });
        holdings.push({
          symbol: position.symbol,
          netQuantity: toNumber(position.netQuantity),
          averageCost: toNumber(position.averageCost),
          costBasis: toNumber(costBasis),
          price: null,
          quoteSource: null,
          quoteAsOf: null,
          marketValue: null,
          unrealizedPnl: null,
          percentReturn: null,
          volatility: null,
          annualizedVolatility: null,
          riskLabel: null,
          status: null,
          gap: true,
        });
        continue;
      }

      const marketValue = position.netQuantity.times(quote.price);
      const unrealizedPnl = quote.price.minus(position.averageCost).times(position.netQuantity);
      // N/A rather than a division by zero when there is no cost basis
      const percentReturn = position.averageCost.isZero()
        ? null
        : quote.price.minus(position.averageCost).dividedBy(position.averageCost).times(100);

      totalValue = totalValue.plus(marketValue);
      totalCost = totalCost.plus(costBasis);
      totalPnl = totalPnl.plus(unrealizedPnl);
      if (evaluation.annualizedVolatility !== null) {
        weightedVolatility = weightedVolatility.plus(evaluation.annualizedVolatility.times(marketValue));
        volatilityWeight = volatilityWeight.plus(marketValue);
      }

      holdings.push({
        symbol: position.symbol,
        netQuantity: toNumber(position.netQuantity),
        averageCost: toNumber(position.averageCost),
        costBasis: toNumber(costBasis),
        price: toNumber(quote.price),
        quoteSource: quote.source,
        quoteAsOf: quote.asOf.toISOString(),
        marketValue: toNumber(marketValue),
        unrealizedPnl: toNumber(unrealizedPnl),
        percentReturn: percentReturn !== null ? toNumber(percentReturn) : null,
        volatility: evaluation.volatility !== null ? toNumber(evaluation.volatility) : null,
        annualizedVolatility:
          evaluation.annualizedVolatility !== null ? toNumber(evaluation.annualizedVolatility) : null,
        riskLabel,
        status: percentReturn !== null ? (percentReturn.greaterThan(0) ? 'profit' : 'loss') : null,
        gap: false,
      });
    }

    const aggregateVolatility = volatilityWeight.greaterThan(0)
      ? weightedVolatility.dividedBy(volatilityWeight)
      : null;

    const totals: PortfolioTotals = {
      marketValue: toMoney(totalValue),
      costBasis: toMoney(totalCost),
      unrealizedPnl: toMoney(totalPnl),
      percentReturn: totalCost.greaterThan(0) ? toNumber(totalPnl.dividedBy(totalCost).times(100)) : null,
      annualizedVolatility: aggregateVolatility !== null ? toNumber(aggregateVolatility) : null,
      riskLabel: classifyRisk(aggregateVolatility, thresholds),
      pricedHoldings: holdings.length - gaps.length,
      gappedHoldings: gaps.length,
    };

    const rankings = rank(holdings);

    return {
      asOf: new Date(this.clock.now()).toISOString(),
      holdings,
      gaps,
      totals,
      riskProfile: riskProfile(holdings.map((h) => h.riskLabel)),
      rankings,
      topPerformers: rankings.byReturn.slice(0, 3),
      worstPerformer: rankings.byReturn.length > 0 ? rankings.byReturn[rankings.byReturn.length - 1] : null,
      riskThresholds: { ...thresholds },
    };
  }
}

function rank(holdings: HoldingMetrics[]): PortfolioRankings {
  const symbolsBy = (
    items: HoldingMetrics[],
    value: (h: HoldingMetrics) => number,
  ): string[] => [...items].sort((a, b) => value(b) - value(a)).map((h) => h.symbol);

  const withReturn = holdings.filter((h) => h.percentReturn !== null);
  const withPnl = holdings.filter((h) => h.unrealizedPnl !== null);
  const rated = holdings.filter((h) => h.riskLabel !== null);
  const unrated = holdings.filter((h) => h.riskLabel === null).map((h) => h.symbol);
  const highToLow = symbolsBy(rated, (h) => riskWeight(h.riskLabel));
  const lowToHigh = symbolsBy(rated, (h) => -riskWeight(h.riskLabel));

  return {
    byReturn: symbolsBy(withReturn, (h) => h.percentReturn ?? 0),
    byUnrealizedPnl: symbolsBy(withPnl, (h) => h.unrealizedPnl ?? 0),
    byRisk: [...highToLow, ...unrated],
    byRiskAscending: [...lowToHigh, ...unrated],
  };
}
