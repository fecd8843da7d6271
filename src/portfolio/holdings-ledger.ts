import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { TickerSymbol } from '../symbols/symbol.types';
import { Position } from './entities/position.entity';
import { Transaction, TransactionInput, TransactionSide } from './entities/transaction.entity';
import { InsufficientPositionException, InvalidTransactionException, LedgerError } from './portfolio.errors';

export type LedgerResult =
  | { ok: true; transaction: Transaction; position: Position }
  | { ok: false; error: LedgerError };

export interface ReplayRejection {
  index: number;
  error: LedgerError;
}

function parseDecimal(value: Decimal | number | string): Decimal | null {
  if (Decimal.isDecimal(value)) {
    return value;
  }
  try {
    return new Decimal(value);
  } catch {
    return null; // unparseable string
  }
}

function parsePositive(value: Decimal | number | string, field: string): Decimal | InvalidTransactionException {
  const parsed = parseDecimal(value);
  if (!parsed || !parsed.isFinite() || !parsed.greaterThan(0)) {
    return new InvalidTransactionException(`${field} must be a positive number, got ${String(value)}`);
  }
  return parsed;
}

/**
 * Next position after one (already validated) transaction.
 * Buy: new_avg = (old_qty*old_avg + qty*price) / (old_qty + qty).
 * Sell: only net quantity changes.
 */
export function applyToPosition(position: Position | undefined, transaction: Transaction): Position {
  const netQuantity = position?.netQuantity ?? new Decimal(0);
  const averageCost = position?.averageCost ?? new Decimal(0);

  if (transaction.side === TransactionSide.SELL) {
    return {
      symbol: transaction.symbol,
      netQuantity: netQuantity.minus(transaction.quantity),
      averageCost,
    };
  }

  const newQuantity = netQuantity.plus(transaction.quantity);
  const totalCost = netQuantity.times(averageCost).plus(transaction.quantity.times(transaction.unitPrice));
  return {
    symbol: transaction.symbol,
    netQuantity: newQuantity,
    averageCost: totalCost.dividedBy(newQuantity),
  };
}

/** Rebuilds every position from the ordered log. */
export function replayPositions(transactions: readonly Transaction[]): Map<TickerSymbol, Position> {
  const positions = new Map<TickerSymbol, Position>();
  for (const transaction of transactions) {
    positions.set(transaction.symbol, applyToPosition(positions.get(transaction.symbol), transaction));
  }
  return positions;
}

function copyPosition(position: Position): Position {
  return { ...position };
}

/**
 * Append-only transaction log with derived positions.
 * Owned by its caller; apply() either appends and updates the position, or
 * changes nothing.
 */
export class HoldingsLedger {
  private log: Transaction[] = [];
  private current: Map<TickerSymbol, Position> = new Map();

  constructor(private readonly idFactory: () => string = uuidv4) {}

  apply(input: TransactionInput): LedgerResult {
    const symbol = input.symbol.trim();
    if (!symbol) {
      return { ok: false, error: new InvalidTransactionException('symbol is required') };
    }
    if (input.side !== TransactionSide.BUY && input.side !== TransactionSide.SELL) {
      return { ok: false, error: new InvalidTransactionException(`unknown side ${String(input.side)}`) };
    }
    if (!(input.timestamp instanceof Date) || isNaN(input.timestamp.getTime())) {
      return { ok: false, error: new InvalidTransactionException('timestamp is not a valid date') };
    }

    const quantity = parsePositive(input.quantity, 'quantity');
    if (quantity instanceof InvalidTransactionException) {
      return { ok: false, error: quantity };
    }
    const unitPrice = parsePositive(input.unitPrice, 'unit price');
    if (unitPrice instanceof InvalidTransactionException) {
      return { ok: false, error: unitPrice };
    }

    const existing = this.current.get(symbol);
    if (input.side === TransactionSide.SELL) {
      const available = existing?.netQuantity ?? new Decimal(0);
      if (available.lessThan(quantity)) {
        return { ok: false, error: new InsufficientPositionException(symbol, available, quantity) };
      }
    }

    const transaction: Transaction = Object.freeze({
      id: input.id ?? this.idFactory(),
      sequence: this.log.length + 1,
      symbol,
      side: input.side,
      quantity,
      unitPrice,
      timestamp: new Date(input.timestamp.getTime()),
    });
    const next = applyToPosition(existing, transaction);

    // commit both together
    this.log.push(transaction);
    this.current.set(symbol, next);

    return { ok: true, transaction, position: copyPosition(next) };
  }

  /** Positions recomputed by replaying the whole log */
  positions(): Map<TickerSymbol, Position> {
    return replayPositions(this.log);
  }

  position(symbol: TickerSymbol): Position | undefined {
    const position = this.current.get(symbol);
    return position ? copyPosition(position) : undefined;
  }

  /** Returns a copy of the log, optionally for one symbol */
  transactions(symbol?: TickerSymbol): Transaction[] {
    return symbol ? this.log.filter((t) => t.symbol === symbol) : [...this.log];
  }

  get size(): number {
    return this.log.length;
  }

  /**
   * Rebuilds a ledger from a persisted log. Entries that no longer apply
   * (e.g. an oversell after manual edits) are reported, not thrown.
   */
  static replay(
    inputs: readonly TransactionInput[],
    idFactory: () => string = uuidv4,
  ): { ledger: HoldingsLedger; rejected: ReplayRejection[] } {
    const ledger = new HoldingsLedger(idFactory);
    const rejected: ReplayRejection[] = [];
    inputs.forEach((input, index) => {
      const result = ledger.apply(input);
      if (!result.ok) {
        rejected.push({ index, error: result.error });
      }
    });
    return { ledger, rejected };
  }
}
