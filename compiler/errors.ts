/**
 * Error taxonomy shared by the compiler, evaluator and backtester
 */

export type StrategyErrorCode =
  | 'SYNTAX_ERROR'
  | 'VALIDATION_ERROR'
  | 'RUNTIME_ERROR'
  | 'TRANSLATION_ERROR';

export abstract class StrategyError extends Error {
  abstract readonly code: StrategyErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Grammar violation. `position` is a character offset into the full DSL text.
 */
export class StrategySyntaxError extends StrategyError {
  readonly code = 'SYNTAX_ERROR';

  constructor(
    message: string,
    readonly token: string | null,
    readonly position: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Grammatically valid input that names something outside the language:
 * unknown field, indicator or operator, bad indicator arguments, bad price data.
 */
export class StrategyValidationError extends StrategyError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly value: string | null = null,
    readonly validValues: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Unexpected failure while computing signals.
 */
export class StrategyRuntimeError extends StrategyError {
  readonly code = 'RUNTIME_ERROR';

  constructor(
    message: string,
    readonly indicator: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TranslationError extends StrategyError {
  readonly code = 'TRANSLATION_ERROR';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
