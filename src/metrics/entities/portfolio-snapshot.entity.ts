import { QuoteSource } from '../../market-price/entities/price-quote.entity';
import { RiskThresholds } from '../../config/analytics.config';

export enum RiskLabel {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High',
}

// High-labelled holdings outnumber Low ones -> daring, the reverse -> conservative
export type RiskProfile = 'daring' | 'conservative' | 'balanced';

// null means N/A throughout.
export interface HoldingMetrics {
  symbol: string;
  netQuantity: number;
  averageCost: number;
  costBasis: number;                 // netQuantity * averageCost
  price: number | null;
  quoteSource: QuoteSource | null;
  quoteAsOf: string | null;          // ISO timestamp
  marketValue: number | null;
  unrealizedPnl: number | null;
  percentReturn: number | null;      // percent, e.g. 12.5
  volatility: number | null;         // std dev of daily returns
  annualizedVolatility: number | null;
  riskLabel: RiskLabel | null;
  status: 'profit' | 'loss' | null;
  gap: boolean;                      // price could not be resolved
}

export interface PriceGap {
  symbol: string;
  reason: string;
}

// Sums cover priced holdings only; gapped ones are listed in `gaps`.
export interface PortfolioTotals {
  marketValue: number;
  costBasis: number;
  unrealizedPnl: number;
  percentReturn: number | null;
  annualizedVolatility: number | null;   // market-value weighted
  riskLabel: RiskLabel | null;
  pricedHoldings: number;
  gappedHoldings: number;
}

export interface PortfolioRankings {
  byReturn: string[];          // best first
  byUnrealizedPnl: string[];   // largest first
  byRisk: string[];            // High -> Low, unknown last
  byRiskAscending: string[];   // Low -> High, unknown last
}

// Ephemeral view handed to the display layer. Never persisted.
export interface PortfolioSnapshot {
  asOf: string;
  holdings: HoldingMetrics[];
  gaps: PriceGap[];
  totals: PortfolioTotals;
  riskProfile: RiskProfile;
  rankings: PortfolioRankings;
  topPerformers: string[];
  worstPerformer: string | null;
  riskThresholds: RiskThresholds;
}
