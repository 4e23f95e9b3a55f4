/**
 * Strategy DSL Backtester
 * Main entry point and public API
 */

// ============================================================================
// Core Types
// ============================================================================
export type {
  Bar,
  PriceField,
  NumericSeries,
  Signal,
  SignalSet,
  SignalProcedure,
  ComparisonOperator,
  ArithmeticOperator,
  IndicatorName,
  LiteralNode,
  NumberLiteralNode,
  BooleanLiteralNode,
  FieldNode,
  IndicatorNode,
  ArithmeticNode,
  ComparisonNode,
  CombinatorNode,
  ValueNode,
  ConditionNode,
  AstNode,
  Strategy,
  PositionState,
  Position,
  Trade,
  TradeMetrics,
  BacktestResult,
} from './spec/types';
export { PRICE_FIELDS, INDICATOR_NAMES, COMPARISON_OPERATORS, ARITHMETIC_OPERATORS } from './spec/types';

// ============================================================================
// Schema & Validation
// ============================================================================
export {
  BarSchema,
  ConditionSchema,
  StrategyJsonSchema,
  BacktestOptionsSchema,
  validateStrategyJson,
} from './spec/schema';
export type { ConditionJson, StrategyJson, StrategyJsonInput, BacktestOptions } from './spec/schema';

// ============================================================================
// Compiler
// ============================================================================
export { StrategyCompiler } from './compiler/compile';
export type { CompiledStrategy } from './compiler/compile';
export { parseDsl } from './compiler/expr';
export { buildStrategyAst } from './compiler/typecheck';
export {
  StrategyError,
  StrategySyntaxError,
  StrategyValidationError,
  StrategyRuntimeError,
  TranslationError,
} from './compiler/errors';

// ============================================================================
// Indicators & Evaluation
// ============================================================================
export { sma, ema, rsi, prev } from './features/indicators';
export { getIndicatorSignature, computeIndicator } from './features/registry';
export { IndicatorCache, canonicalKey } from './runtime/cache';
export { SignalEvaluator, compileSignals } from './runtime/eval';
export type { EvaluatorOptions, EvaluationTrace } from './runtime/eval';

// ============================================================================
// Backtesting
// ============================================================================
export { BacktestEngine } from './backtest/BacktestEngine';
export type { BacktestSignals, SignalInput } from './backtest/BacktestEngine';
export { computeTradeMetrics } from './backtest/metrics';
export { formatResults, summarizeResult } from './backtest/report';

// ============================================================================
// Data, Translation & Pipeline
// ============================================================================
export { parseBarsCsv, loadBarsCsv } from './data/csv';
export { renderDsl } from './lib/dslConverter';
export { generateTranslationSystemPrompt } from './lib/dslDocGenerator';
export { ChatCompletionTranslator } from './translate/StrategyTranslator';
export type { StrategyTranslator } from './translate/StrategyTranslator';
export { StrategyPipeline } from './pipeline/StrategyPipeline';
export type { PipelineOptions, PipelineResult } from './pipeline/StrategyPipeline';

// ============================================================================
// Logging & Configuration
// ============================================================================
export { Logger, LoggerFactory } from './logging/logger';
export { loadConfig, loadEnvFile } from './config';
export type { AppConfig, TranslatorConfig } from './config';
