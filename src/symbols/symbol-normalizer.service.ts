import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { TickerSymbol } from './symbol.types';

export const CRYPTO_QUOTE_CURRENCY = 'USD';

// Crypto roots the price provider only resolves with a market suffix.
const CRYPTO_ROOTS: ReadonlySet<string> = new Set([
  'BTC',
  'ETH',
  'XRP',
  'LTC',
  'ADA',
  'SOL',
  'DOGE',
  'SHIB',
]);

export class InvalidAliasException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

function clean(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Maps user-entered tickers to canonical symbols.
 * Lookup order: alias overrides, static crypto table, cleaned input.
 */
@Injectable()
export class SymbolNormalizerService {
  private readonly logger = new Logger(SymbolNormalizerService.name);
  private aliasOverrides: Map<string, TickerSymbol> = new Map();

  normalize(raw: string): TickerSymbol {
    const key = clean(raw);
    return this.aliasOverrides.get(key) ?? resolveStatic(key);
  }

  /**
   * Registers a user alias. Both sides are cleaned; the target is resolved
   * through the static table so "btc" and "BTC-USD" land on the same symbol.
   */
  setAlias(alias: string, target: string): TickerSymbol {
    const key = clean(alias);
    const canonical = resolveStatic(clean(target));
    if (!key || !canonical) {
      throw new InvalidAliasException('Alias and target must be non-empty');
    }
    if (key === canonical) {
      throw new InvalidAliasException(`Alias ${key} cannot point at itself`);
    }
    this.aliasOverrides.set(key, canonical);
    this.logger.log(`Alias ${key} -> ${canonical}`);
    return canonical;
  }

  removeAlias(alias: string): boolean {
    return this.aliasOverrides.delete(clean(alias));
  }

  aliasOverridesRecord(): Record<string, TickerSymbol> {
    return Object.fromEntries(this.aliasOverrides);
  }

  /** Replaces all overrides, e.g. when loading persisted state. All or nothing. */
  restoreAliases(record: Record<string, string>): void {
    const previous = this.aliasOverrides;
    this.aliasOverrides = new Map();
    try {
      Object.entries(record).forEach(([alias, target]) => this.setAlias(alias, target));
    } catch (error) {
      this.aliasOverrides = previous;
      throw error;
    }
  }

  clearAliases(): void {
    this.aliasOverrides.clear();
  }
}

function resolveStatic(key: string): TickerSymbol {
  return CRYPTO_ROOTS.has(key) ? `${key}-${CRYPTO_QUOTE_CURRENCY}` : key;
}
