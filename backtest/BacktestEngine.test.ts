import { describe, it, expect } from 'vitest';
import { BacktestEngine } from './BacktestEngine';
import { StrategyValidationError } from '../compiler/errors';
import { makeBars } from '../__tests__/helpers';

function signalAt(length: number, ...indexes: number[]): boolean[] {
  return Array.from({ length }, (_, i) => indexes.includes(i));
}

describe('BacktestEngine', () => {
  const engine = new BacktestEngine({ initialCapital: 10000 });

  it('opens on the entry bar and closes on the exit bar', () => {
    const bars = makeBars(new Array(8).fill(100));
    const result = engine.run(bars, { entry: signalAt(8, 2), exit: signalAt(8, 5) });

    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({
      entryIndex: 2,
      exitIndex: 5,
      entryPrice: 100,
      exitPrice: 100,
      pnl: 0,
      entryTime: bars[2].timestamp,
      exitTime: bars[5].timestamp,
    });
    expect(result.finalEquity).toBe(10000);
    expect(result.finalState).toBe('NO_POSITION');
    expect(result.openPosition).toBeNull();
    expect(result.equityCurve).toEqual(new Array(8).fill(10000));
  });

  it('sizes the position with all available equity', () => {
    const result = engine.run(makeBars([50, 55, 60]), {
      entry: [true, false, false],
      exit: [false, false, true],
    });

    const [trade] = result.trades;
    expect(trade.shareCount).toBe(200);
    expect(trade.pnl).toBe(2000);
    expect(trade.pnlPct).toBeCloseTo(0.2, 12);
    expect(trade.returnPct).toBeCloseTo(20, 10);
    expect(result.equityCurve).toEqual([10000, 11000, 12000]);
    expect(result.finalEquity).toBe(12000);
    expect(result.totalReturn).toBe(2000);
    expect(result.totalReturnPct).toBe(20);
    expect(result.winRate).toBe(100);
    expect(result.profitFactor).toBe(Infinity);
  });

  it('leaves capital untouched without trades', () => {
    const bars = makeBars([100, 90, 80, 120]);
    const result = engine.run(bars, { entry: signalAt(4), exit: signalAt(4) });

    expect(result.totalTrades).toBe(0);
    expect(result.trades).toEqual([]);
    expect(result.finalEquity).toBe(10000);
    expect(result.maxDrawdown).toBe(0);
    expect(result.profitFactor).toBe(0);
    expect(result.sharpeRatio).toBe(0);
    expect(result.equityCurve).toEqual([10000, 10000, 10000, 10000]);
  });

  it('never exits and re-enters on the same bar', () => {
    const result = engine.run(makeBars([10, 20, 30]), {
      entry: [true, true, true],
      exit: [true, true, true],
    });

    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ entryIndex: 0, exitIndex: 1, pnl: 10000 });
    expect(result.finalState).toBe('IN_POSITION');
    expect(result.openPosition).toMatchObject({ entryIndex: 2, entryPrice: 30 });
    expect(result.finalEquity).toBe(20000);
  });

  it('marks an open position to market and tracks drawdown', () => {
    const result = engine.run(makeBars([100, 100, 50]), {
      entry: [undefined, true, false],
      exit: [null, false, false],
    });

    expect(result.equityCurve).toEqual([10000, 10000, 5000]);
    expect(result.maxDrawdown).toBe(-0.5);
    expect(result.maxDrawdownPct).toBe(-50);
    expect(result.openPosition).toMatchObject({ entryIndex: 1, shareCount: 100 });
    // No closed trades: final equity stays at the initial capital
    expect(result.finalEquity).toBe(10000);
  });

  it('carries equity through bars with undefined signals', () => {
    const result = engine.run(makeBars([100, 200, 50, 100]), {
      entry: [true, false, false, false],
      exit: [false, false, null, true],
    });

    expect(result.equityCurve).toEqual([10000, 20000, 20000, 10000]);
    expect(result.maxDrawdown).toBe(-0.5);
    expect(result.trades[0].pnl).toBe(0);
  });

  it('starts every run from a clean context', () => {
    const bars = makeBars([50, 55, 60]);
    const signals = { entry: [true, false, false], exit: [false, false, true] };

    const first = engine.run(bars, signals);
    const second = engine.run(bars, signals);

    expect(second.trades).toHaveLength(1);
    expect(second).toEqual(first);
  });

  it('runs compiled DSL end to end', () => {
    const result = engine.runFromDsl(
      'ENTRY: close > prev(close, 1) EXIT: close < prev(close, 1)',
      makeBars([10, 11, 12, 11, 10])
    );

    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ entryIndex: 1, exitIndex: 3, entryPrice: 11, exitPrice: 11 });
  });

  describe('input validation', () => {
    it('rejects signals that do not match the bars', () => {
      expect(() =>
        engine.run(makeBars([1, 2, 3]), { entry: [true, false], exit: [false, false, false] })
      ).toThrow('entry signals have 2 values but there are 3 bars');
    });

    it('rejects a zero close before sizing a position', () => {
      expect(() =>
        engine.run(makeBars([0, 1, 2]), { entry: signalAt(3, 0), exit: signalAt(3, 2) })
      ).toThrow(StrategyValidationError);
      expect(() =>
        engine.run(makeBars([0, 1, 2]), { entry: signalAt(3, 0), exit: signalAt(3, 2) })
      ).toThrow(/Invalid close at bar index 0/);
    });

    it('rejects negative prices and volume', () => {
      const bars = makeBars([1, 2]);
      bars[1].low = -1;
      expect(() => engine.run(bars, { entry: signalAt(2), exit: signalAt(2) })).toThrow(
        /Invalid low at bar index 1/
      );

      const quiet = makeBars([1, 2], -5);
      expect(() => engine.run(quiet, { entry: signalAt(2), exit: signalAt(2) })).toThrow(
        /Invalid volume at bar index 0/
      );
    });

    it('rejects a non-positive initial capital', () => {
      expect(() => new BacktestEngine({ initialCapital: 0 })).toThrow(StrategyValidationError);
    });

    it('defaults the initial capital to 10000', () => {
      const result = new BacktestEngine().run(makeBars([1]), { entry: [false], exit: [false] });
      expect(result.initialEquity).toBe(10000);
    });
  });
});
