/**
 * End-to-end pipeline tests
 *
 * Natural language translation is replaced by a fixed translator; everything
 * after it runs for real.
 */
import { describe, it, expect } from 'vitest';
import { StrategyPipeline } from '../pipeline/StrategyPipeline';
import { StrategyTranslator } from '../translate/StrategyTranslator';
import { StrategyJson } from '../spec/schema';
import { StrategySyntaxError, TranslationError } from '../compiler/errors';
import { makeBars } from './helpers';

const closes = [10, 11, 12, 11, 10, 9];

class FixedTranslator implements StrategyTranslator {
  readonly inputs: string[] = [];

  constructor(private readonly json: StrategyJson) {}

  async translate(text: string): Promise<StrategyJson> {
    this.inputs.push(text);
    return this.json;
  }
}

describe('StrategyPipeline', () => {
  it('runs from DSL text', () => {
    const pipeline = new StrategyPipeline({ initialCapital: 10000 });
    const result = pipeline.runFromDsl(
      'ENTRY: close > prev(close, 1) EXIT: close < prev(close, 1)',
      makeBars(closes)
    );

    expect(result.indicators).toEqual(['prev(close,1)']);
    expect(result.signals.entry).toEqual([false, true, true, false, false, false]);
    expect(result.signals.exit).toEqual([false, false, false, true, true, true]);
    expect(result.backtest.totalTrades).toBe(1);
    expect(result.backtest.trades[0]).toMatchObject({ entryPrice: 11, exitPrice: 11, pnl: 0 });
    expect(result.backtest.finalEquity).toBe(10000);
    expect(result.json).toBeUndefined();
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('runs from natural language through the translator', async () => {
    const translator = new FixedTranslator({
      entry: [{ left: 'close', operator: '>', right: 'prev(close, 1)' }],
      exit: [{ left: 'close', operator: '<', right: 'prev(close, 1)' }],
    });
    const pipeline = new StrategyPipeline({ translator });

    const result = await pipeline.run('Buy on an up day, sell on a down day', makeBars(closes));

    expect(translator.inputs).toEqual(['Buy on an up day, sell on a down day']);
    expect(result.input).toBe('Buy on an up day, sell on a down day');
    expect(result.dsl).toBe(
      'ENTRY:\n  close > PREV(close, 1)\n\nEXIT:\n  close < PREV(close, 1)'
    );
    expect(result.backtest.totalTrades).toBe(1);
  });

  it('runs from the JSON form', () => {
    const pipeline = new StrategyPipeline();
    const result = pipeline.runFromJson({ entry: [], exit: [] }, makeBars(closes));

    // TRUE entry, FALSE exit: buy the first bar and hold
    expect(result.json).toEqual({ entry: [], exit: [] });
    expect(result.backtest.openPosition).toMatchObject({ entryIndex: 0, entryPrice: 10 });
    expect(result.backtest.totalTrades).toBe(0);
  });

  it('needs a translator for natural language', async () => {
    await expect(new StrategyPipeline().run('anything', makeBars(closes))).rejects.toThrow(
      TranslationError
    );
  });

  it('propagates compiler errors', () => {
    expect(() => new StrategyPipeline().runFromDsl('ENTRY: close >', makeBars(closes))).toThrow(
      StrategySyntaxError
    );
  });

  it('gives every run its own id', () => {
    const pipeline = new StrategyPipeline();
    const bars = makeBars(closes);
    const first = pipeline.runFromDsl('ENTRY: TRUE EXIT: FALSE', bars);
    const second = pipeline.runFromDsl('ENTRY: TRUE EXIT: FALSE', bars);

    expect(second.runId).not.toBe(first.runId);
    expect(second.backtest).toEqual(first.backtest);
  });
});
