import Decimal from 'decimal.js';
import { standardDeviation } from '../common/utils/decimal.util';
import { RiskThresholds } from '../config/analytics.config';
import { RiskLabel, RiskProfile } from './entities/portfolio-snapshot.entity';

/** Fractional day-over-day changes: (p[i] - p[i-1]) / p[i-1] */
export function dailyReturns(prices: Decimal[]): Decimal[] {
  const returns: Decimal[] = [];
  for (let i = 1; i < prices.length; i++) {
    returns.push(prices[i].minus(prices[i - 1]).dividedBy(prices[i - 1]));
  }
  return returns;
}

/**
 * Sample std dev of daily returns over the last `window` prices.
 * N/A (null) with fewer than two returns, i.e. fewer than three prices.
 */
export function rollingVolatility(prices: Decimal[], window: number): Decimal | null {
  return standardDeviation(dailyReturns(prices.slice(-window)));
}

export function annualize(volatility: Decimal, periodsPerYear: number): Decimal {
  return volatility.times(new Decimal(periodsPerYear).sqrt());
}

export function classifyRisk(volatility: Decimal | null, thresholds: RiskThresholds): RiskLabel | null {
  if (volatility === null) {
    return null;
  }
  if (volatility.greaterThan(thresholds.high)) {
    return RiskLabel.HIGH;
  }
  if (volatility.greaterThan(thresholds.medium)) {
    return RiskLabel.MEDIUM;
  }
  return RiskLabel.LOW;
}

/**
 * Investor profile from a set of risk labels: more High than Low is daring,
 * the reverse conservative. Unknown labels count for neither.
 */
export function riskProfile(labels: Iterable<RiskLabel | null>): RiskProfile {
  let high = 0;
  let low = 0;
  for (const label of labels) {
    if (label === RiskLabel.HIGH) high++;
    if (label === RiskLabel.LOW) low++;
  }
  if (high > low) return 'daring';
  if (high < low) return 'conservative';
  return 'balanced';
}
