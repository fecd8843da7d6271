import { Module } from '@nestjs/common';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStorageService } from './portfolio-storage.service';
import { MarketPriceModule } from '../market-price/market-price.module';
import { MetricsModule } from '../metrics/metrics.module';
import { SymbolsModule } from '../symbols/symbols.module';

@Module({
  imports: [MarketPriceModule, MetricsModule, SymbolsModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioStorageService,
    PortfolioService,      // Mutations: addTransaction, import, restoreState, clearAll
    PortfolioQueryService, // Queries: positions, transactions, snapshot, refresh
  ],
})
export class PortfolioModule {}
