import { toNumber } from '../../common/utils/decimal.util';
import { RiskProfile } from '../../metrics/entities/portfolio-snapshot.entity';
import { Position } from '../entities/position.entity';
import { Transaction, TransactionSide } from '../entities/transaction.entity';

export interface TransactionResponseDto {
  id: string;
  sequence: number;
  symbol: string;
  side: TransactionSide;
  quantity: number;
  unitPrice: number;
  timestamp: string;
}

export interface PositionResponseDto {
  symbol: string;
  netQuantity: number;
  averageCost: number;
  costBasis: number;
}

export interface PositionsResponseDto {
  positions: PositionResponseDto[];
  count: number;
}

export interface RejectedRecordDto {
  index: number;
  reason: string;
}

export interface ImportResultDto {
  accepted: TransactionResponseDto[];
  rejected: RejectedRecordDto[];
}

export interface RestoreResultDto {
  restored: number;
  rejected: RejectedRecordDto[];
  aliasOverrides: number;
}

// Summary of the latest calendar month (UTC) that has buys. Everything is
// null when no buy has been recorded yet.
export interface MonthlyRecapDto {
  month: string | null;                  // YYYY-MM
  ventures: number;                      // buys recorded in that month
  ventureSymbols: string[];
  unrealizedPnl: number | null;          // whole portfolio
  averagePercentReturn: number | null;   // mean over priced holdings
  riskProfile: RiskProfile | null;       // over that month's buys only
  asOf: string | null;
}

export function toTransactionResponse(transaction: Transaction): TransactionResponseDto {
  return {
    id: transaction.id,
    sequence: transaction.sequence,
    symbol: transaction.symbol,
    side: transaction.side,
    quantity: toNumber(transaction.quantity),
    unitPrice: toNumber(transaction.unitPrice),
    timestamp: transaction.timestamp.toISOString(),
  };
}

export function toPositionResponse(position: Position): PositionResponseDto {
  return {
    symbol: position.symbol,
    netQuantity: toNumber(position.netQuantity),
    averageCost: toNumber(position.averageCost),
    costBasis: toNumber(position.netQuantity.times(position.averageCost)),
  };
}
