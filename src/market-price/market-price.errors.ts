import { TickerSymbol } from '../symbols/symbol.types';

/** Raised inside the retry loop only; never leaves PriceSourceService. */
export class ProviderTransientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderTransientError';
  }
}

/** Per-symbol and non-fatal: snapshots record the symbol as a gap. */
export class PriceUnavailableError extends Error {
  constructor(
    readonly symbol: TickerSymbol,
    readonly reason: string,
  ) {
    super(`Price unavailable for ${symbol}: ${reason}`);
    this.name = 'PriceUnavailableError';
  }
}

export class RefreshAbortedError extends Error {
  constructor() {
    super('Price refresh aborted');
    this.name = 'RefreshAbortedError';
  }
}
