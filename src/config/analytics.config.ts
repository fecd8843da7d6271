import { Logger } from '@nestjs/common';

export const ANALYTICS_CONFIG = Symbol('ANALYTICS_CONFIG');

export interface RiskThresholds {
  medium: number; // annualized volatility above this is Medium
  high: number;   // above this is High
}

export interface AnalyticsConfig {
  port: number;
  priceCache: {
    ttlMs: number;
    staleWindowMs: number; // oldest quote usable as a fallback
  };
  priceFetch: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;
  };
  quoteConcurrency: number;
  volatility: {
    window: number;             // trailing price points
    historyLookbackDays: number;
    annualizationDays: number;
  };
  riskThresholds: RiskThresholds;
}

type Env = Record<string, string | undefined>;

const logger = new Logger('AnalyticsConfig');

function getEnvInt(env: Env, name: string, defaultValue: number, min: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min) {
    logger.warn(`Invalid number for ${name}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function getEnvFloat(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    logger.warn(`Invalid number for ${name}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = { medium: 0.2, high: 0.45 };

function loadRiskThresholds(env: Env): RiskThresholds {
  const medium = getEnvFloat(env, 'RISK_MEDIUM_THRESHOLD', DEFAULT_RISK_THRESHOLDS.medium);
  const high = getEnvFloat(env, 'RISK_HIGH_THRESHOLD', DEFAULT_RISK_THRESHOLDS.high);
  if (medium >= high) {
    logger.warn(
      `RISK_MEDIUM_THRESHOLD (${medium}) must be below RISK_HIGH_THRESHOLD (${high}), using defaults`,
    );
    return { ...DEFAULT_RISK_THRESHOLDS };
  }
  return { medium, high };
}

/**
 * Builds the typed configuration from environment variables.
 * Thresholds are fixed for the lifetime of the process.
 */
export function loadAnalyticsConfig(env: Env = process.env): AnalyticsConfig {
  return {
    port: getEnvInt(env, 'PORT', 3000, 1),
    priceCache: {
      ttlMs: getEnvInt(env, 'PRICE_CACHE_TTL_MS', 60_000, 0),
      staleWindowMs: getEnvInt(env, 'PRICE_STALE_WINDOW_MS', 24 * 60 * 60 * 1000, 0),
    },
    priceFetch: {
      maxAttempts: getEnvInt(env, 'PRICE_FETCH_MAX_ATTEMPTS', 3, 1),
      baseDelayMs: getEnvInt(env, 'PRICE_RETRY_BASE_DELAY_MS', 250, 0),
      maxDelayMs: getEnvInt(env, 'PRICE_RETRY_MAX_DELAY_MS', 2000, 0),
      requestTimeoutMs: getEnvInt(env, 'PRICE_REQUEST_TIMEOUT_MS', 10_000, 1),
    },
    quoteConcurrency: getEnvInt(env, 'QUOTE_CONCURRENCY', 4, 1),
    volatility: {
      window: getEnvInt(env, 'VOLATILITY_WINDOW', 20, 2),
      historyLookbackDays: getEnvInt(env, 'HISTORY_LOOKBACK_DAYS', 60, 2),
      annualizationDays: getEnvInt(env, 'ANNUALIZATION_DAYS', 252, 1),
    },
    riskThresholds: loadRiskThresholds(env),
  };
}
