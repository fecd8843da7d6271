import Decimal from 'decimal.js';
import { TickerSymbol } from '../../symbols/symbol.types';

export enum TransactionSide {
  BUY = 'buy',
  SELL = 'sell',
}

// What callers hand to the ledger. Numbers are parsed into Decimal on apply.
export interface TransactionInput {
  id?: string;                       // kept when replaying a persisted log
  symbol: TickerSymbol;              // already normalized
  side: TransactionSide;
  quantity: Decimal | number | string;
  unitPrice: Decimal | number | string;
  timestamp: Date;
}

// Recorded transaction. Frozen once appended to the ledger.
export interface Transaction {
  readonly id: string;               // internal UUID
  readonly sequence: number;         // 1-based append order
  readonly symbol: TickerSymbol;
  readonly side: TransactionSide;
  readonly quantity: Decimal;
  readonly unitPrice: Decimal;
  readonly timestamp: Date;
}
