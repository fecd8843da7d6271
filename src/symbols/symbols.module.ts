import { Module } from '@nestjs/common';
import { SymbolNormalizerService } from './symbol-normalizer.service';
import { SymbolsController } from './symbols.controller';

@Module({
  controllers: [SymbolsController],
  providers: [SymbolNormalizerService],
  exports: [SymbolNormalizerService],
})
export class SymbolsModule {}
