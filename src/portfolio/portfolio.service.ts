import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { MarketPriceService } from '../market-price/market-price.service';
import { SymbolNormalizerService } from '../symbols/symbol-normalizer.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { PortfolioStateDto, TransactionRecordDto } from './dto/portfolio-state.dto';
import { RejectedRecordDto } from './dto/portfolio-response.dto';
import { Transaction, TransactionInput } from './entities/transaction.entity';
import { HoldingsLedger } from './holdings-ledger';
import { PortfolioStorageService } from './portfolio-storage.service';

export interface ImportResult {
  accepted: Transaction[];
  rejected: RejectedRecordDto[];
}

export interface RestoreResult {
  restored: number;
  rejected: RejectedRecordDto[];
  aliasOverrides: number;
}

function validationMessages(errors: ValidationError[]): string {
  return errors
    .flatMap((error) => Object.values(error.constraints ?? {}))
    .join('; ');
}

// Transaction recording and persistence boundary.
// The ledger validates and applies; this layer normalizes symbols and
// turns ledger rejections into HTTP exceptions.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(
    private readonly storage: PortfolioStorageService,
    private readonly normalizer: SymbolNormalizerService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  /**
   * Normalizes the symbol and appends the transaction.
   * @throws InvalidTransactionException | InsufficientPositionException
   */
  addTransaction(dto: CreateTransactionDto): Transaction {
    const result = this.storage.ledger.apply(this.toInput(dto));
    if (!result.ok) {
      throw result.error;
    }

    const { transaction, position } = result;
    this.logger.log(
      `Recorded ${transaction.side} ${transaction.quantity.toString()} ${transaction.symbol} @ ${transaction.unitPrice.toString()}; net ${position.netQuantity.toString()}`,
    );
    return transaction;
  }

  /**
   * Applies records in order. Each one is validated and applied on its own;
   * failures are reported by index and never stop the batch.
   */
  importTransactions(records: unknown[]): ImportResult {
    const accepted: Transaction[] = [];
    const rejected: RejectedRecordDto[] = [];

    records.forEach((record, index) => {
      if (typeof record !== 'object' || record === null || Array.isArray(record)) {
        rejected.push({ index, reason: 'record must be an object' });
        return;
      }

      const dto = plainToInstance(CreateTransactionDto, record);
      const errors = validateSync(dto);
      if (errors.length > 0) {
        rejected.push({ index, reason: validationMessages(errors) });
        return;
      }

      const result = this.storage.ledger.apply(this.toInput(dto));
      if (result.ok) {
        accepted.push(result.transaction);
      } else {
        rejected.push({ index, reason: result.error.message });
      }
    });

    this.logger.log(`Imported ${accepted.length} of ${records.length} records`);
    if (rejected.length > 0) {
      this.logger.warn(`Rejected ${rejected.length} records: ${rejected.map((r) => r.index).join(', ')}`);
    }
    return { accepted, rejected };
  }

  /** Transactions and alias overrides, the only state that must persist */
  exportState(): PortfolioStateDto {
    const transactions = this.storage.ledger.transactions().map((transaction): TransactionRecordDto => ({
      id: transaction.id,
      symbol: transaction.symbol,
      side: transaction.side,
      quantity: transaction.quantity.toNumber(),
      unitPrice: transaction.unitPrice.toNumber(),
      timestamp: transaction.timestamp.toISOString(),
    }));

    return { transactions, aliasOverrides: this.normalizer.aliasOverridesRecord() };
  }

  /**
   * Replaces the current state. Positions are rebuilt by replaying the
   * transactions; entries that no longer apply are reported.
   */
  restoreState(state: PortfolioStateDto): RestoreResult {
    const badAlias = Object.entries(state.aliasOverrides).find(([, target]) => typeof target !== 'string');
    if (badAlias) {
      throw new BadRequestException(`aliasOverrides.${badAlias[0]} must be a string`);
    }
    this.normalizer.restoreAliases(state.aliasOverrides);

    const { ledger, rejected } = HoldingsLedger.replay(
      state.transactions.map((record) => ({ ...this.toInput(record, false), id: record.id })),
    );
    this.storage.replace(ledger);
    this.marketPriceService.clearCache();

    this.logger.log(`Restored ${ledger.size} transactions, ${rejected.length} rejected`);
    return {
      restored: ledger.size,
      rejected: rejected.map(({ index, error }) => ({ index, reason: error.message })),
      aliasOverrides: Object.keys(state.aliasOverrides).length,
    };
  }

  /** Clears ledger, aliases and cached quotes */
  clearAll(): void {
    this.storage.clearAllData();
    this.normalizer.clearAliases();
    this.marketPriceService.clearCache();
  }

  // Persisted records already carry canonical symbols.
  private toInput(dto: CreateTransactionDto, normalize = true): TransactionInput {
    return {
      symbol: normalize ? this.normalizer.normalize(dto.symbol) : dto.symbol,
      side: dto.side,
      quantity: dto.quantity,
      unitPrice: dto.unitPrice,
      timestamp: new Date(dto.timestamp),
    };
  }
}
