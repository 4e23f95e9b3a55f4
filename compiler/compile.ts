/**
 * Compiler: DSL text → Strategy
 * Orchestrates parsing, AST building and the indicator plan
 */
import { Strategy } from '../spec/types';
import { StrategyJsonInput } from '../spec/schema';
import { renderDsl } from '../lib/dslConverter';
import { IndicatorCache } from '../runtime/cache';
import { Logger, LoggerFactory } from '../logging/logger';
import { parseDsl } from './expr';
import { buildStrategyAst } from './typecheck';

export interface CompiledStrategy {
  dsl: string;
  strategy: Strategy;
  /** Distinct indicator calls, in materialization order */
  indicators: string[];
}

// ============================================================================
// Compiler
// ============================================================================

export class StrategyCompiler {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? LoggerFactory.getLogger('StrategyCompiler');
  }

  /**
   * Compile DSL text. Throws StrategySyntaxError or StrategyValidationError.
   */
  compileFromDSL(text: string): Strategy {
    return this.compile(text).strategy;
  }

  /**
   * Render the JSON form to DSL text, then compile it
   */
  compileFromJSON(input: StrategyJsonInput): CompiledStrategy {
    return this.compile(renderDsl(input));
  }

  compile(text: string): CompiledStrategy {
    const tree = parseDsl(text);
    const strategy = buildStrategyAst(tree);
    const indicators = IndicatorCache.fromStrategy(strategy).keys();

    this.logger.debug('Strategy compiled', {
      entry: strategy.entry.type,
      exit: strategy.exit.type,
      indicators,
    });

    return { dsl: text, strategy, indicators };
  }
}
