import { ArrayMaxSize, IsArray } from 'class-validator';

// Records are validated one by one so a bad row is reported, not fatal.
export class ImportTransactionsDto {
  @IsArray()
  @ArrayMaxSize(10000)
  records!: unknown[];
}
