/**
 * Backtesting Engine
 * Replays entry/exit signals over historical bars with a single long
 * position and tracks equity, drawdown and closed trades
 */

import { Bar, BacktestResult, Position, PositionState, SignalSet, Strategy, Trade } from '../spec/types';
import { BacktestOptions, validateBacktestOptions } from '../spec/schema';
import { StrategyValidationError } from '../compiler/errors';
import { StrategyCompiler } from '../compiler/compile';
import { validateBars } from '../data/bars';
import { compileSignals } from '../runtime/eval';
import { Logger, LoggerFactory } from '../logging/logger';
import { computeTradeMetrics } from './metrics';

/** Signals as produced by the evaluator or supplied by hand; null/undefined skips the bar */
export type SignalInput = ReadonlyArray<boolean | null | undefined>;

export interface BacktestSignals {
  entry: SignalInput;
  exit: SignalInput;
}

/**
 * Per-run simulation state
 */
class SimulationContext {
  state: PositionState = 'NO_POSITION';
  position: Position | null = null;
  /** Realized capital: changes only when a trade closes */
  capital: number;
  /** Mark-to-market equity */
  equity: number;
  peakEquity: number;
  maxDrawdown = 0;
  readonly trades: Trade[] = [];
  readonly equityCurve: number[] = [];

  constructor(readonly initialCapital: number) {
    this.capital = initialCapital;
    this.equity = initialCapital;
    this.peakEquity = initialCapital;
  }

  open(bar: Bar, index: number): Position {
    const position: Position = {
      entryTime: bar.timestamp,
      entryIndex: index,
      entryPrice: bar.close,
      shareCount: this.equity / bar.close,
    };
    this.position = position;
    this.state = 'IN_POSITION';
    return position;
  }

  close(position: Position, bar: Bar, index: number): Trade {
    const exitPrice = bar.close;
    const pnl = position.shareCount * (exitPrice - position.entryPrice);
    const pnlPct = (exitPrice - position.entryPrice) / position.entryPrice;

    const trade: Trade = Object.freeze({
      entryTime: position.entryTime,
      exitTime: bar.timestamp,
      entryIndex: position.entryIndex,
      exitIndex: index,
      entryPrice: position.entryPrice,
      exitPrice,
      shareCount: position.shareCount,
      pnl,
      pnlPct,
      returnPct: pnlPct * 100,
    });

    this.capital += pnl;
    this.equity = this.capital;
    this.trades.push(trade);
    this.position = null;
    this.state = 'NO_POSITION';
    return trade;
  }

  markToMarket(position: Position, bar: Bar): void {
    this.equity = position.shareCount * bar.close;
  }

  trackDrawdown(): void {
    if (this.equity > this.peakEquity) {
      this.peakEquity = this.equity;
    }
    const drawdown = (this.equity - this.peakEquity) / this.peakEquity;
    if (drawdown < this.maxDrawdown) {
      this.maxDrawdown = drawdown;
    }
  }
}

/**
 * Backtest Engine - runs signals against historical data
 */
export class BacktestEngine {
  private readonly initialCapital: number;
  private readonly logger: Logger;

  constructor(options: BacktestOptions = {}, logger?: Logger) {
    this.initialCapital = validateBacktestOptions(options).initialCapital;
    this.logger = logger ?? LoggerFactory.getLogger('BacktestEngine');
  }

  /**
   * Simulate the two-state machine over the bars. Entry is only checked while
   * flat and exit only while in a position, so a bar never both opens and
   * closes a trade.
   */
  run(bars: readonly Bar[], signals: BacktestSignals): BacktestResult {
    validateBars(bars);
    this.checkSignalLength('entry', signals.entry, bars.length);
    this.checkSignalLength('exit', signals.exit, bars.length);

    const ctx = new SimulationContext(this.initialCapital);

    for (let i = 0; i < bars.length; i++) {
      const bar = bars[i];
      const entry = signals.entry[i];
      const exit = signals.exit[i];

      // Undefined signal: carry equity forward untouched
      if (entry === null || entry === undefined || exit === null || exit === undefined) {
        ctx.equityCurve.push(ctx.equity);
        continue;
      }

      const position = ctx.position;
      if (position === null) {
        if (entry) {
          ctx.open(bar, i);
        }
      } else if (exit) {
        const trade = ctx.close(position, bar, i);
        this.logger.debug('Trade closed', {
          entryIndex: trade.entryIndex,
          exitIndex: trade.exitIndex,
          entryPrice: trade.entryPrice,
          exitPrice: trade.exitPrice,
          pnl: trade.pnl,
        });
      } else {
        ctx.markToMarket(position, bar);
      }

      ctx.trackDrawdown();
      ctx.equityCurve.push(ctx.equity);
    }

    const result = this.buildResult(ctx, bars.length);

    this.logger.info('Backtest complete', {
      bars: result.barsProcessed,
      trades: result.totalTrades,
      finalEquity: result.finalEquity,
      maxDrawdownPct: result.maxDrawdownPct,
    });

    return result;
  }

  /**
   * Evaluate a compiled strategy's signals and simulate them
   */
  runStrategy(strategy: Strategy, bars: readonly Bar[]): BacktestResult {
    const signals: SignalSet = compileSignals(strategy)(bars);
    return this.run(bars, signals);
  }

  /**
   * Compile DSL text, evaluate and simulate
   */
  runFromDsl(text: string, bars: readonly Bar[]): BacktestResult {
    const strategy = new StrategyCompiler().compileFromDSL(text);
    return this.runStrategy(strategy, bars);
  }

  private checkSignalLength(name: string, signal: SignalInput, expected: number): void {
    if (signal.length !== expected) {
      throw new StrategyValidationError(
        `${name} signals have ${signal.length} values but there are ${expected} bars`,
        String(signal.length),
        [String(expected)]
      );
    }
  }

  private buildResult(ctx: SimulationContext, barsProcessed: number): BacktestResult {
    const metrics = computeTradeMetrics(ctx.trades);
    const lastEquity = ctx.equityCurve[ctx.equityCurve.length - 1];
    const finalEquity =
      ctx.trades.length === 0 || lastEquity === undefined ? ctx.initialCapital : lastEquity;
    const totalReturn = finalEquity - ctx.initialCapital;

    return {
      ...metrics,
      barsProcessed,
      initialEquity: ctx.initialCapital,
      finalEquity,
      totalReturn,
      totalReturnPct: (totalReturn / ctx.initialCapital) * 100,
      maxDrawdown: ctx.maxDrawdown,
      maxDrawdownPct: ctx.maxDrawdown * 100,
      finalState: ctx.state,
      openPosition: ctx.position,
      trades: ctx.trades,
      equityCurve: ctx.equityCurve,
    };
  }
}
