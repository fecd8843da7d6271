import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MarketPriceModule } from './market-price/market-price.module';
import { MetricsModule } from './metrics/metrics.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { SymbolsModule } from './symbols/symbols.module';

@Module({
  imports: [ConfigModule, SymbolsModule, MarketPriceModule, MetricsModule, PortfolioModule],
  controllers: [AppController],
})
export class AppModule {}
