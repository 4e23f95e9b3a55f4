/**
 * Signal evaluation
 * Turns a validated Strategy into a reusable procedure that maps a price table
 * to aligned entry/exit signals. Indicators are collected once up front and
 * materialized per run in canonical-key order.
 */
import {
  Bar,
  ComparisonOperator,
  ConditionNode,
  IndicatorNode,
  NumericSeries,
  Signal,
  SignalProcedure,
  SignalSet,
  Strategy,
  ValueNode,
} from '../spec/types';
import { computeIndicator, getIndicatorSignature, IndicatorArgument } from '../features/registry';
import { PriceColumns, toColumns, validateBars } from '../data/bars';
import { describeError, StrategyRuntimeError } from '../compiler/errors';
import { Logger, LoggerFactory } from '../logging/logger';
import { canonicalKey, IndicatorCache } from './cache';

export interface EvaluatorOptions {
  logger?: Logger;
  /** Called once per indicator computation, in computation order */
  onIndicatorComputed?: (key: string) => void;
}

export interface EvaluationTrace {
  signals: SignalSet;
  /** Canonical keys in the order they were computed during the run */
  materializationOrder: string[];
}

// ============================================================================
// Evaluator
// ============================================================================

export class SignalEvaluator {
  private readonly cache: IndicatorCache;
  private readonly logger: Logger;

  constructor(
    private readonly strategy: Strategy,
    private readonly options: EvaluatorOptions = {}
  ) {
    this.cache = IndicatorCache.fromStrategy(strategy);
    this.logger = options.logger ?? LoggerFactory.getLogger('SignalEvaluator');
    this.logger.debug('Indicator plan built', { indicators: this.cache.keys() });
  }

  /** Distinct indicator calls in materialization order */
  get indicatorKeys(): string[] {
    return this.cache.keys();
  }

  evaluate(bars: readonly Bar[]): SignalSet {
    return this.trace(bars).signals;
  }

  trace(bars: readonly Bar[]): EvaluationTrace {
    validateBars(bars);

    // Fresh per-run state: nothing computed for one table leaks into the next
    const run = new EvaluationRun(toColumns(bars), bars.length, this.cache, this.options.onIndicatorComputed);
    run.materializeAll();

    const signals: SignalSet = {
      entry: run.evaluateCondition(this.strategy.entry),
      exit: run.evaluateCondition(this.strategy.exit),
    };

    this.logger.debug('Signals evaluated', {
      bars: bars.length,
      materialized: run.order,
      entrySignals: countTrue(signals.entry),
      exitSignals: countTrue(signals.exit),
    });

    return { signals, materializationOrder: run.order };
  }
}

export function compileSignals(strategy: Strategy, options?: EvaluatorOptions): SignalProcedure {
  const evaluator = new SignalEvaluator(strategy, options);
  return (bars) => evaluator.evaluate(bars);
}

export function countTrue(signal: Signal): number {
  return signal.reduce((count, value) => (value ? count + 1 : count), 0);
}

// ============================================================================
// Per-run state
// ============================================================================

class EvaluationRun {
  private readonly columns: Map<string, NumericSeries> = new Map();
  readonly order: string[] = [];

  constructor(
    private readonly fields: PriceColumns,
    private readonly length: number,
    private readonly cache: IndicatorCache,
    private readonly onComputed?: (key: string) => void
  ) {}

  materializeAll(): void {
    for (const key of this.cache.keys()) {
      this.materialize(key);
    }
  }

  /**
   * Compute an indicator column once per run. Nested indicator arguments are
   * pulled in on demand, so a dependency may be computed ahead of its own
   * position in key order.
   */
  private materialize(key: string): NumericSeries {
    const existing = this.columns.get(key);
    if (existing) return existing;

    const node = this.cache.get(key);
    if (!node) {
      throw new StrategyRuntimeError(`Indicator ${key} was not collected before evaluation`, key);
    }

    let args: IndicatorArgument[];
    try {
      args = this.resolveArgs(node);
    } catch (error) {
      if (error instanceof StrategyRuntimeError) throw error;
      throw new StrategyRuntimeError(
        `Failed to resolve arguments for ${key}: ${describeError(error)}`,
        key,
        { cause: error }
      );
    }

    let values: NumericSeries;
    try {
      values = computeIndicator(node.name, args);
    } catch (error) {
      throw new StrategyRuntimeError(`Error computing ${key}: ${describeError(error)}`, key, {
        cause: error,
      });
    }

    this.columns.set(key, values);
    this.order.push(key);
    this.onComputed?.(key);
    return values;
  }

  private resolveArgs(node: IndicatorNode): IndicatorArgument[] {
    const { params } = getIndicatorSignature(node.name);
    if (params.length !== node.args.length) {
      throw new Error(`expected ${params.length} arguments, got ${node.args.length}`);
    }

    return params.map((param, index): IndicatorArgument => {
      const arg = node.args[index];
      if (param.kind === 'period') {
        if (arg.type !== 'literal' || typeof arg.value !== 'number') {
          throw new Error(`${param.name} must be a number literal`);
        }
        return { kind: 'period', value: arg.value };
      }
      return { kind: 'series', values: this.evaluateValue(arg) };
    });
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  evaluateValue(node: ValueNode): NumericSeries {
    switch (node.type) {
      case 'literal': {
        const value = typeof node.value === 'boolean' ? Number(node.value) : node.value;
        return new Array<number | undefined>(this.length).fill(value);
      }
      case 'field':
        return this.fields[node.name];
      case 'indicator':
        return this.materialize(canonicalKey(node));
      case 'arithmetic': {
        const left = this.evaluateValue(node.left);
        const right = this.evaluateValue(node.right);
        return left.map((l, i) => {
          const r = right[i];
          if (l === undefined || r === undefined) return undefined;
          const result = applyArithmetic(node.operator, l, r);
          return Number.isNaN(result) ? undefined : result;
        });
      }
    }
  }

  // ==========================================================================
  // Conditions
  // ==========================================================================

  evaluateCondition(node: ConditionNode): Signal {
    switch (node.type) {
      case 'literal':
        return new Array<boolean>(this.length).fill(node.value);

      case 'combinator': {
        const seed = node.kind === 'AND';
        let result = new Array<boolean>(this.length).fill(seed);
        for (const child of node.children) {
          const values = this.evaluateCondition(child);
          result =
            node.kind === 'AND'
              ? result.map((v, i) => v && values[i])
              : result.map((v, i) => v || values[i]);
        }
        return result;
      }

      case 'comparison': {
        const left = this.evaluateValue(node.left);
        const right = this.evaluateValue(node.right);
        return compareSeries(node.operator, left, right);
      }
    }
  }
}

// ============================================================================
// Elementwise operators
// ============================================================================

function applyArithmetic(operator: '+' | '-' | '*' | '/', l: number, r: number): number {
  switch (operator) {
    case '+':
      return l + r;
    case '-':
      return l - r;
    case '*':
      return l * r;
    case '/':
      return l / r;
  }
}

/**
 * Any comparison touching an undefined value is false, so warm-up bars
 * resolve to false instead of failing.
 */
export function compareSeries(
  operator: ComparisonOperator,
  left: NumericSeries,
  right: NumericSeries
): Signal {
  return left.map((l, i) => {
    const r = right[i];
    if (l === undefined || r === undefined) return false;

    switch (operator) {
      case '>':
        return l > r;
      case '<':
        return l < r;
      case '>=':
        return l >= r;
      case '<=':
        return l <= r;
      case '==':
        return l === r;
      case 'CROSSES_ABOVE':
      case 'CROSSES_BELOW': {
        if (i === 0) return false;
        const pl = left[i - 1];
        const pr = right[i - 1];
        if (pl === undefined || pr === undefined) return false;
        return operator === 'CROSSES_ABOVE' ? l > r && pl <= pr : l < r && pl >= pr;
      }
    }
  });
}
