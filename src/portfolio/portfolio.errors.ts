import { BadRequestException } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TickerSymbol } from '../symbols/symbol.types';

/** Bad quantity, price, symbol or timestamp. Rejected before mutation. */
export class InvalidTransactionException extends BadRequestException {
  constructor(readonly reason: string) {
    super(`Invalid transaction: ${reason}`);
  }
}

/** Sell larger than the open position. Rejected before mutation. */
export class InsufficientPositionException extends BadRequestException {
  constructor(
    readonly symbol: TickerSymbol,
    readonly available: Decimal,
    readonly requested: Decimal,
  ) {
    super(
      `Insufficient quantity for ${symbol}. Available: ${available.toString()}, Requested: ${requested.toString()}`,
    );
  }
}

export type LedgerError = InvalidTransactionException | InsufficientPositionException;
