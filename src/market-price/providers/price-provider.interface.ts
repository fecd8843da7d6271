export const PRICE_PROVIDER = Symbol('PRICE_PROVIDER');

export interface ProviderPrice {
  price: number;
  timestamp?: Date;
}

/**
 * External market-data boundary.
 * Returning null or an empty list means "unavailable"; throwing means the
 * call failed. Both are treated as transient by the caller.
 */
export interface PriceProvider {
  readonly name: string;
  latestPrice(symbol: string): Promise<ProviderPrice | null>;
  history(symbol: string, from: Date, to: Date): Promise<ProviderPrice[]>;
}
