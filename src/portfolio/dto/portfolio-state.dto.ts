import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsObject, IsString, ValidateNested } from 'class-validator';
import { CreateTransactionDto } from './create-transaction.dto';

export class TransactionRecordDto extends CreateTransactionDto {
  @IsString()
  @IsNotEmpty()
  id!: string;
}

// Everything that has to survive a restart. Positions are derived on restore.
export class PortfolioStateDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TransactionRecordDto)
  transactions!: TransactionRecordDto[];

  @IsObject()
  aliasOverrides!: Record<string, string>;
}
