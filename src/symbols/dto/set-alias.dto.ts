import { IsNotEmpty, IsString } from 'class-validator';

export class SetAliasDto {
  @IsString()
  @IsNotEmpty()
  alias!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;
}
