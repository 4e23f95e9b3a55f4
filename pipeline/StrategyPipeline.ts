/**
 * Strategy Pipeline
 * Natural language → JSON → DSL → AST → signals → backtest.
 * Every stage's output is returned so callers can inspect or reuse it.
 */

import { v4 as uuidv4 } from 'uuid';
import { Bar, BacktestResult, SignalSet, Strategy } from '../spec/types';
import { StrategyJson, StrategyJsonInput, validateStrategyJson } from '../spec/schema';
import { StrategyCompiler, CompiledStrategy } from '../compiler/compile';
import { TranslationError } from '../compiler/errors';
import { SignalEvaluator, countTrue } from '../runtime/eval';
import { BacktestEngine } from '../backtest/BacktestEngine';
import { StrategyTranslator } from '../translate/StrategyTranslator';
import { Logger, LoggerFactory } from '../logging/logger';

export interface PipelineOptions {
  translator?: StrategyTranslator;
  initialCapital?: number;
  logger?: Logger;
}

export interface PipelineResult {
  runId: string;
  /** Present when the run started from natural language */
  input?: string;
  /** Present when the run started from natural language or JSON */
  json?: StrategyJson;
  dsl: string;
  strategy: Strategy;
  indicators: string[];
  signals: SignalSet;
  backtest: BacktestResult;
}

export class StrategyPipeline {
  private readonly compiler: StrategyCompiler;
  private readonly engine: BacktestEngine;
  private readonly logger: Logger;

  constructor(private readonly options: PipelineOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.getLogger('StrategyPipeline');
    this.compiler = new StrategyCompiler();
    this.engine = new BacktestEngine({ initialCapital: options.initialCapital });
  }

  /**
   * Full run from natural language. The translation step is the only
   * non-deterministic stage; use runFromDsl for reproducible results.
   */
  async run(text: string, bars: readonly Bar[]): Promise<PipelineResult> {
    const runId = uuidv4();
    const translator = this.options.translator;
    if (!translator) {
      throw new TranslationError('No translator configured for natural language input');
    }

    this.logger.logRun('info', 'Translating natural language', runId, { chars: text.length });
    let json: StrategyJson;
    try {
      json = await translator.translate(text);
    } catch (error) {
      this.logger.error('Pipeline failed during translation', error, { runId });
      throw error;
    }

    return { ...this.execute(runId, () => this.compiler.compileFromJSON(json), bars), input: text, json };
  }

  runFromJson(input: StrategyJsonInput, bars: readonly Bar[]): PipelineResult {
    const json = validateStrategyJson(input);
    return { ...this.execute(uuidv4(), () => this.compiler.compileFromJSON(json), bars), json };
  }

  runFromDsl(dsl: string, bars: readonly Bar[]): PipelineResult {
    return this.execute(uuidv4(), () => this.compiler.compile(dsl), bars);
  }

  private execute(runId: string, compile: () => CompiledStrategy, bars: readonly Bar[]): PipelineResult {
    try {
      const compiled = compile();
      this.logger.logRun('info', 'Strategy compiled', runId, { indicators: compiled.indicators });

      const signals = new SignalEvaluator(compiled.strategy).evaluate(bars);
      this.logger.logRun('info', 'Signals evaluated', runId, {
        bars: bars.length,
        entries: countTrue(signals.entry),
        exits: countTrue(signals.exit),
      });

      const backtest = this.engine.run(bars, signals);
      this.logger.logRun('info', 'Backtest finished', runId, {
        trades: backtest.totalTrades,
        finalEquity: backtest.finalEquity,
      });

      return {
        runId,
        dsl: compiled.dsl,
        strategy: compiled.strategy,
        indicators: compiled.indicators,
        signals,
        backtest,
      };
    } catch (error) {
      this.logger.error('Pipeline failed', error, { runId });
      throw error;
    }
  }
}
