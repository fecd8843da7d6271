import {
  BadRequestException,
  Controller,
  DefaultValuePipe,
  Get,
  Param,
  ParseIntPipe,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { SymbolNormalizerService } from '../symbols/symbol-normalizer.service';
import { MarketPriceService } from './market-price.service';
import { PriceUnavailableError } from './market-price.errors';
import {
  PriceHistoryResponseDto,
  QuoteResponseDto,
  toHistoryResponse,
  toQuoteResponse,
} from './dto/quote-response.dto';

function rethrowUnavailable(error: unknown): never {
  if (error instanceof PriceUnavailableError) {
    throw new ServiceUnavailableException(error.message);
  }
  throw error;
}

@Controller('market-price')
export class MarketPriceController {
  constructor(
    private readonly marketPriceService: MarketPriceService,
    private readonly normalizer: SymbolNormalizerService,
  ) {}

  /**
   * Latest quote for a user-entered ticker.
   *
   * GET /market-price/quotes/btc
   * @returns 503 when the provider and cache both have nothing
   */
  @Get('quotes/:symbol')
  async getQuote(@Param('symbol') raw: string): Promise<QuoteResponseDto> {
    const symbol = this.normalizer.normalize(raw);
    const quote = await this.marketPriceService.getQuote(symbol).catch(rethrowUnavailable);
    return toQuoteResponse(quote);
  }

  /**
   * GET /market-price/history/AAPL?days=30
   * @returns 400 when days < 1
   */
  @Get('history/:symbol')
  async getHistory(
    @Param('symbol') raw: string,
    @Query('days', new DefaultValuePipe(60), ParseIntPipe) days: number,
  ): Promise<PriceHistoryResponseDto> {
    if (days < 1) {
      throw new BadRequestException(`days must be at least 1, got ${days}`);
    }
    const symbol = this.normalizer.normalize(raw);
    const points = await this.marketPriceService.getHistory(symbol, days).catch(rethrowUnavailable);
    return toHistoryResponse(symbol, points);
  }
}
