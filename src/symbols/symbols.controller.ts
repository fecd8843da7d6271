import { Body, Controller, Delete, Get, HttpCode, HttpStatus, NotFoundException, Param, Put, Query } from '@nestjs/common';
import { SymbolNormalizerService } from './symbol-normalizer.service';
import { SetAliasDto } from './dto/set-alias.dto';

@Controller('symbols')
export class SymbolsController {
  constructor(private readonly normalizer: SymbolNormalizerService) {}

  /**
   * GET /symbols/normalize?raw=btc
   */
  @Get('normalize')
  normalize(@Query('raw') raw = '') {
    return { raw, symbol: this.normalizer.normalize(raw) };
  }

  @Get('aliases')
  getAliases(): Record<string, string> {
    return this.normalizer.aliasOverridesRecord();
  }

  /**
   * PUT /symbols/aliases
   * Overrides persist with the portfolio state.
   */
  @Put('aliases')
  @HttpCode(HttpStatus.OK)
  setAlias(@Body() dto: SetAliasDto) {
    const symbol = this.normalizer.setAlias(dto.alias, dto.symbol);
    return { alias: dto.alias.trim().toUpperCase(), symbol };
  }

  @Delete('aliases/:alias')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeAlias(@Param('alias') alias: string): void {
    if (!this.normalizer.removeAlias(alias)) {
      throw new NotFoundException(`No alias ${alias}`);
    }
  }
}
