import { Module } from '@nestjs/common';
import { SymbolsModule } from '../symbols/symbols.module';
import { MarketPriceController } from './market-price.controller';
import { MarketPriceService } from './market-price.service';
import { PriceCacheService } from './price-cache.service';
import { PriceSourceService } from './price-source.service';
import { PRICE_PROVIDER } from './providers/price-provider.interface';
import { YahooPriceProvider } from './providers/yahoo-price.provider';

@Module({
  imports: [SymbolsModule],
  controllers: [MarketPriceController],
  providers: [
    PriceCacheService,
    PriceSourceService,
    MarketPriceService,
    { provide: PRICE_PROVIDER, useClass: YahooPriceProvider },
  ],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
