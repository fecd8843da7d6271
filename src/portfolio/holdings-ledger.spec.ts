import Decimal from 'decimal.js';
import { HoldingsLedger, replayPositions } from './holdings-ledger';
import { TransactionInput, TransactionSide } from './entities/transaction.entity';
import { InsufficientPositionException, InvalidTransactionException } from './portfolio.errors';

describe('HoldingsLedger', () => {
  let ledger: HoldingsLedger;
  let idCounter = 1;

  const createInput = (overrides: Partial<TransactionInput>): TransactionInput => ({
    symbol: 'AAPL',
    side: TransactionSide.BUY,
    quantity: 10,
    unitPrice: 100,
    timestamp: new Date('2024-01-02T15:00:00.000Z'),
    ...overrides,
  });

  const snapshot = (positions: Map<string, { netQuantity: Decimal; averageCost: Decimal }>) =>
    Array.from(positions.entries()).map(([symbol, p]) => [symbol, p.netQuantity.toString(), p.averageCost.toString()]);

  beforeEach(() => {
    idCounter = 1;
    ledger = new HoldingsLedger(() => `tx-${idCounter++}`);
  });

  describe('apply - buys', () => {
    it('should record a buy and open a position', () => {
      const result = ledger.apply(createInput({ quantity: 10, unitPrice: 100 }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.transaction.id).toBe('tx-1');
      expect(result.transaction.sequence).toBe(1);
      expect(result.position.netQuantity.toNumber()).toBe(10);
      expect(result.position.averageCost.toNumber()).toBe(100);
    });

    it('should compute weighted average cost of 150 for 10 @ 100 and 10 @ 200', () => {
      ledger.apply(createInput({ quantity: 10, unitPrice: 100 }));
      ledger.apply(createInput({ quantity: 10, unitPrice: 200 }));

      const position = ledger.position('AAPL');
      expect(position?.netQuantity.toString()).toBe('20');
      expect(position?.averageCost.toString()).toBe('150');
    });

    it('should weight the average by quantity', () => {
      ledger.apply(createInput({ quantity: 3, unitPrice: 10 }));
      ledger.apply(createInput({ quantity: 1, unitPrice: 30 }));

      // (3*10 + 1*30) / 4 = 15
      expect(ledger.position('AAPL')?.averageCost.toNumber()).toBe(15);
    });

    it('should accept decimal strings without float drift', () => {
      ledger.apply(createInput({ quantity: '0.1', unitPrice: '0.2' }));
      ledger.apply(createInput({ quantity: '0.2', unitPrice: '0.2' }));

      expect(ledger.position('AAPL')?.netQuantity.toString()).toBe('0.3');
      expect(ledger.position('AAPL')?.averageCost.toString()).toBe('0.2');
    });
  });

  describe('apply - sells', () => {
    it('should reduce net quantity and keep average cost', () => {
      ledger.apply(createInput({ quantity: 10, unitPrice: 100 }));
      ledger.apply(createInput({ quantity: 10, unitPrice: 200 }));

      const result = ledger.apply(createInput({ side: TransactionSide.SELL, quantity: 5, unitPrice: 300 }));

      expect(result.ok).toBe(true);
      expect(ledger.position('AAPL')?.netQuantity.toNumber()).toBe(15);
      expect(ledger.position('AAPL')?.averageCost.toNumber()).toBe(150);
    });

    it('should allow selling the exact open quantity', () => {
      ledger.apply(createInput({ quantity: 2 }));

      const result = ledger.apply(createInput({ side: TransactionSide.SELL, quantity: 2 }));

      expect(result.ok).toBe(true);
      expect(ledger.position('AAPL')?.netQuantity.isZero()).toBe(true);
    });

    it('should start a fresh average after a full close', () => {
      ledger.apply(createInput({ quantity: 2, unitPrice: 100 }));
      ledger.apply(createInput({ side: TransactionSide.SELL, quantity: 2, unitPrice: 120 }));
      ledger.apply(createInput({ quantity: 1, unitPrice: 80 }));

      expect(ledger.position('AAPL')?.averageCost.toNumber()).toBe(80);
    });

    it('should reject an oversell without mutating the ledger', () => {
      ledger.apply(createInput({ quantity: 5 }));
      const before = snapshot(ledger.positions());
      const sizeBefore = ledger.size;

      const result = ledger.apply(createInput({ side: TransactionSide.SELL, quantity: 6 }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(InsufficientPositionException);
      expect(result.error.message).toBe('Insufficient quantity for AAPL. Available: 5, Requested: 6');
      expect(ledger.size).toBe(sizeBefore);
      expect(snapshot(ledger.positions())).toEqual(before);
    });

    it('should reject selling a symbol never bought', () => {
      const result = ledger.apply(createInput({ symbol: 'MSFT', side: TransactionSide.SELL, quantity: 1 }));

      expect(result.ok).toBe(false);
      expect(ledger.size).toBe(0);
      expect(ledger.position('MSFT')).toBeUndefined();
    });
  });

  describe('apply - validation', () => {
    const invalidCases: Array<[string, Partial<TransactionInput>]> = [
      ['zero quantity', { quantity: 0 }],
      ['negative quantity', { quantity: -1 }],
      ['NaN quantity', { quantity: NaN }],
      ['unparseable quantity', { quantity: 'ten' }],
      ['zero price', { unitPrice: 0 }],
      ['negative price', { unitPrice: '-5' }],
      ['infinite price', { unitPrice: Infinity }],
      ['empty symbol', { symbol: '  ' }],
      ['invalid timestamp', { timestamp: new Date('not a date') }],
    ];

    it.each(invalidCases)('should reject %s with InvalidTransaction', (_label, overrides) => {
      const result = ledger.apply(createInput(overrides));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(InvalidTransactionException);
      expect(ledger.size).toBe(0);
    });
  });

  describe('positions', () => {
    it('should keep symbols independent', () => {
      ledger.apply(createInput({ symbol: 'AAPL', quantity: 1, unitPrice: 100 }));
      ledger.apply(createInput({ symbol: 'BTC-USD', quantity: 0.5, unitPrice: 40000 }));
      ledger.apply(createInput({ symbol: 'AAPL', side: TransactionSide.SELL, quantity: 0.25 }));

      const positions = ledger.positions();
      expect(positions.get('AAPL')?.netQuantity.toNumber()).toBe(0.75);
      expect(positions.get('BTC-USD')?.netQuantity.toNumber()).toBe(0.5);
    });

    it('should match the incrementally maintained positions', () => {
      ledger.apply(createInput({ quantity: 4, unitPrice: 10 }));
      ledger.apply(createInput({ quantity: 6, unitPrice: 12.5 }));
      ledger.apply(createInput({ side: TransactionSide.SELL, quantity: 3 }));

      const replayed = ledger.positions().get('AAPL');
      const current = ledger.position('AAPL');
      expect(replayed?.netQuantity.equals(current?.netQuantity ?? -1)).toBe(true);
      expect(replayed?.averageCost.equals(current?.averageCost ?? -1)).toBe(true);
    });

    it('should not expose internal state', () => {
      ledger.apply(createInput({ quantity: 1 }));

      const position = ledger.position('AAPL');
      if (position) position.netQuantity = new Decimal(999);
      ledger.transactions().pop();

      expect(ledger.position('AAPL')?.netQuantity.toNumber()).toBe(1);
      expect(ledger.size).toBe(1);
    });
  });

  describe('replay', () => {
    const inputs: TransactionInput[] = [
      { symbol: 'AAPL', side: TransactionSide.BUY, quantity: 10, unitPrice: 100, timestamp: new Date('2024-01-02') },
      { symbol: 'ETH-USD', side: TransactionSide.BUY, quantity: '1.5', unitPrice: '2250.75', timestamp: new Date('2024-01-03') },
      { symbol: 'AAPL', side: TransactionSide.BUY, quantity: 5, unitPrice: 130, timestamp: new Date('2024-01-04') },
      { symbol: 'AAPL', side: TransactionSide.SELL, quantity: 7, unitPrice: 140, timestamp: new Date('2024-01-05') },
    ];

    it('should yield identical positions when replayed twice', () => {
      const first = HoldingsLedger.replay(inputs).ledger.positions();
      const second = HoldingsLedger.replay(inputs).ledger.positions();

      expect(snapshot(second)).toEqual(snapshot(first));
      expect(first.get('AAPL')?.netQuantity.toNumber()).toBe(8);
      expect(first.get('AAPL')?.averageCost.toNumber()).toBe(110);
    });

    it('should keep persisted ids and report entries that no longer apply', () => {
      const { ledger: restored, rejected } = HoldingsLedger.replay([
        { ...inputs[0], id: 'persisted-1' },
        { ...inputs[3], quantity: 50 },
      ]);

      expect(restored.transactions().map((t) => t.id)).toEqual(['persisted-1']);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].index).toBe(1);
      expect(rejected[0].error).toBeInstanceOf(InsufficientPositionException);
    });

    it('should match replayPositions over the recorded log', () => {
      const { ledger: restored } = HoldingsLedger.replay(inputs);

      expect(snapshot(replayPositions(restored.transactions()))).toEqual(snapshot(restored.positions()));
    });
  });
});
