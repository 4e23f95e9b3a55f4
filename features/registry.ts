/**
 * Indicator registry
 *
 * The indicator set is closed: signatures and dispatch are exhaustive switches
 * over IndicatorName, so a new name does not compile until it is handled
 * everywhere. Validation and computation share these definitions.
 */
import { INDICATOR_NAMES, IndicatorName, NumericSeries, PRICE_FIELDS, PriceField } from '../spec/types';
import { ema, prev, rsi, sma } from './indicators';

// ============================================================================
// Signatures
// ============================================================================

export type IndicatorParamKind = 'series' | 'period';

export interface IndicatorParam {
  name: string;
  kind: IndicatorParamKind;
  /** Smallest accepted value for period parameters */
  minimum?: number;
}

export interface IndicatorSignature {
  name: IndicatorName;
  params: readonly IndicatorParam[];
  description: string;
}

const SERIES: IndicatorParam = { name: 'series', kind: 'series' };

export function getIndicatorSignature(name: IndicatorName): IndicatorSignature {
  switch (name) {
    case 'sma':
      return {
        name,
        params: [SERIES, { name: 'period', kind: 'period', minimum: 1 }],
        description: 'Simple Moving Average',
      };
    case 'ema':
      return {
        name,
        params: [SERIES, { name: 'period', kind: 'period', minimum: 1 }],
        description: 'Exponential Moving Average',
      };
    case 'rsi':
      return {
        name,
        params: [SERIES, { name: 'period', kind: 'period', minimum: 1 }],
        description: 'Relative Strength Index',
      };
    case 'prev':
      return {
        name,
        params: [SERIES, { name: 'n', kind: 'period', minimum: 0 }],
        description: 'Value N bars ago',
      };
    default:
      return assertNever(name);
  }
}

export function isIndicatorName(name: string): name is IndicatorName {
  return INDICATOR_NAMES.some((known) => known === name);
}

export function isPriceField(name: string): name is PriceField {
  return PRICE_FIELDS.some((known) => known === name);
}

/** e.g. "sma(series, period)" */
export function formatIndicatorUsage(name: IndicatorName): string {
  const signature = getIndicatorSignature(name);
  return `${name}(${signature.params.map((p) => p.name).join(', ')})`;
}

// ============================================================================
// Dispatch
// ============================================================================

export type IndicatorArgument =
  | { kind: 'series'; values: NumericSeries }
  | { kind: 'period'; value: number };

export function computeIndicator(
  name: IndicatorName,
  args: readonly IndicatorArgument[]
): NumericSeries {
  switch (name) {
    case 'sma':
      return sma(seriesArg(name, args, 0), periodArg(name, args, 1));
    case 'ema':
      return ema(seriesArg(name, args, 0), periodArg(name, args, 1));
    case 'rsi':
      return rsi(seriesArg(name, args, 0), periodArg(name, args, 1));
    case 'prev':
      return prev(seriesArg(name, args, 0), periodArg(name, args, 1));
    default:
      return assertNever(name);
  }
}

function seriesArg(name: IndicatorName, args: readonly IndicatorArgument[], index: number): NumericSeries {
  const arg = args[index];
  if (arg === undefined || arg.kind !== 'series') {
    throw new TypeError(`${name}: argument ${index + 1} must be a series`);
  }
  return arg.values;
}

function periodArg(name: IndicatorName, args: readonly IndicatorArgument[], index: number): number {
  const arg = args[index];
  if (arg === undefined || arg.kind !== 'period') {
    throw new TypeError(`${name}: argument ${index + 1} must be a number`);
  }
  return arg.value;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
