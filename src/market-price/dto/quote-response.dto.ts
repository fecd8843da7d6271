import { PricePoint, PriceQuote, QuoteSource } from '../entities/price-quote.entity';
import { toNumber } from '../../common/utils/decimal.util';

export interface QuoteResponseDto {
  symbol: string;
  price: number;
  asOf: string;          // ISO timestamp
  source: QuoteSource;
}

export interface PriceHistoryResponseDto {
  symbol: string;
  points: Array<{ timestamp: string; price: number }>;
}

export function toQuoteResponse(quote: PriceQuote): QuoteResponseDto {
  return {
    symbol: quote.symbol,
    price: toNumber(quote.price),
    asOf: quote.asOf.toISOString(),
    source: quote.source,
  };
}

export function toHistoryResponse(symbol: string, points: PricePoint[]): PriceHistoryResponseDto {
  return {
    symbol,
    points: points.map((point) => ({
      timestamp: point.timestamp.toISOString(),
      price: toNumber(point.price),
    })),
  };
}
