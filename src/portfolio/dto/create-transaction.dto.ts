import { IsDateString, IsEnum, IsNotEmpty, IsNumber, IsPositive, IsString } from 'class-validator';
import { TransactionSide } from '../entities/transaction.entity';

// DTO for recording one buy or sell. The symbol may be user-entered
// ("btc", an alias); it is normalized before it reaches the ledger.
export class CreateTransactionDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsEnum(TransactionSide)
  side!: TransactionSide;

  @IsNumber()
  @IsPositive()
  quantity!: number;

  @IsNumber()
  @IsPositive()
  unitPrice!: number;

  @IsDateString()
  timestamp!: string;
}
