import { Test, TestingModule } from '@nestjs/testing';
import { InvalidAliasException, SymbolNormalizerService } from './symbol-normalizer.service';

describe('SymbolNormalizerService', () => {
  let service: SymbolNormalizerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SymbolNormalizerService],
    }).compile();

    service = module.get<SymbolNormalizerService>(SymbolNormalizerService);
  });

  describe('normalize', () => {
    it('should produce one canonical form regardless of case and whitespace', () => {
      expect(service.normalize('btc')).toBe('BTC-USD');
      expect(service.normalize('BTC')).toBe('BTC-USD');
      expect(service.normalize(' BTC ')).toBe('BTC-USD');
    });

    it('should suffix every known crypto root', () => {
      expect(service.normalize('eth')).toBe('ETH-USD');
      expect(service.normalize('Doge')).toBe('DOGE-USD');
      expect(service.normalize('shib')).toBe('SHIB-USD');
    });

    it('should pass unknown tickers through uppercased and trimmed', () => {
      expect(service.normalize('  aapl\t')).toBe('AAPL');
      expect(service.normalize('brk-b')).toBe('BRK-B');
    });

    it('should be idempotent on canonical symbols', () => {
      expect(service.normalize('BTC-USD')).toBe('BTC-USD');
      expect(service.normalize(service.normalize('sol'))).toBe('SOL-USD');
    });

    it('should never fail on empty input', () => {
      expect(service.normalize('   ')).toBe('');
    });
  });

  describe('aliases', () => {
    it('should consult overrides before the static table', () => {
      service.setAlias('apple', 'aapl');
      expect(service.normalize(' Apple ')).toBe('AAPL');
    });

    it('should resolve alias targets through the static table', () => {
      expect(service.setAlias('bitcoin', 'btc')).toBe('BTC-USD');
      expect(service.normalize('BITCOIN')).toBe('BTC-USD');
    });

    it('should let an override replace a static mapping', () => {
      service.setAlias('SOL', 'SOLV');
      expect(service.normalize('sol')).toBe('SOLV');
    });

    it('should reject self-referencing and empty aliases', () => {
      expect(() => service.setAlias('aapl', 'AAPL')).toThrow(InvalidAliasException);
      expect(() => service.setAlias(' ', 'AAPL')).toThrow(InvalidAliasException);
    });

    it('should remove aliases', () => {
      service.setAlias('apple', 'aapl');
      expect(service.removeAlias('APPLE')).toBe(true);
      expect(service.removeAlias('APPLE')).toBe(false);
      expect(service.normalize('apple')).toBe('APPLE');
    });

    it('should export and restore overrides', () => {
      service.setAlias('apple', 'aapl');
      service.setAlias('bitcoin', 'btc');
      const saved = service.aliasOverridesRecord();

      expect(saved).toEqual({ APPLE: 'AAPL', BITCOIN: 'BTC-USD' });

      service.clearAliases();
      service.restoreAliases(saved);
      expect(service.normalize('bitcoin')).toBe('BTC-USD');
    });

    it('should keep existing overrides when a restore fails', () => {
      service.setAlias('apple', 'aapl');

      expect(() => service.restoreAliases({ GOOGLE: 'goog', SELF: 'self' })).toThrow(InvalidAliasException);
      expect(service.aliasOverridesRecord()).toEqual({ APPLE: 'AAPL' });
    });
  });
});
