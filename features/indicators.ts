/**
 * Technical indicator implementations
 *
 * Every function maps aligned series to a new series of the same length.
 * Undefined entries mark bars without enough history. Inputs are never mutated.
 *
 */
import { NumericSeries } from '../spec/types';

// ============================================================================
// Helper Functions
// ============================================================================

interface DefinedRun {
  start: number;
  values: number[];
}

/**
 * Split a series into maximal runs of finite values.
 * Windows never span a gap, so a run shorter than the period yields nothing.
 */
function definedRuns(series: readonly (number | undefined)[]): DefinedRun[] {
  const runs: DefinedRun[] = [];
  let current: DefinedRun | null = null;

  for (let index = 0; index < series.length; index++) {
    const value = series[index];
    if (value === undefined || !Number.isFinite(value)) {
      current = null;
      continue;
    }
    if (current === null) {
      current = { start: index, values: [] };
      runs.push(current);
    }
    current.values.push(value);
  }

  return runs;
}

function emptySeries(length: number): NumericSeries {
  return new Array<number | undefined>(length).fill(undefined);
}

/** Lookback periods arrive as plain numbers; 20.0 and 20 are the same window */
export function toPeriod(period: number, minimum: number = 1): number {
  const whole = Math.trunc(period);
  if (!Number.isFinite(whole) || whole < minimum) {
    throw new RangeError(`period must be an integer >= ${minimum}, got ${period}`);
  }
  return whole;
}

/** Running sum with Neumaier compensation */
class CompensatedSum {
  private sum = 0;
  private compensation = 0;

  add(value: number): void {
    const total = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += this.sum - total + value;
    } else {
      this.compensation += value - total + this.sum;
    }
    this.sum = total;
  }

  get value(): number {
    return this.sum + this.compensation;
  }
}

/**
 * Mean of each full window, one entry per window end. A window holding a
 * single repeated value yields that value exactly.
 */
function trailingMean(values: number[], period: number): number[] {
  const means: number[] = [];
  const sum = new CompensatedSum();
  let repeated = 0;

  values.forEach((value, j) => {
    sum.add(value);
    if (j >= period) {
      sum.add(-values[j - period]);
    }
    repeated = j > 0 && value === values[j - 1] ? repeated + 1 : 1;

    if (j >= period - 1) {
      means.push(repeated >= period ? value : sum.value / period);
    }
  });

  return means;
}

// ============================================================================
// SMA (Simple Moving Average)
// ============================================================================

export function sma(series: readonly (number | undefined)[], period: number): NumericSeries {
  const p = toPeriod(period);
  const out = emptySeries(series.length);

  for (const run of definedRuns(series)) {
    trailingMean(run.values, p).forEach((value, j) => {
      out[run.start + p - 1 + j] = value;
    });
  }

  return out;
}

// ============================================================================
// EMA (Exponential Moving Average)
// Keep custom: the library seeds with an SMA, this seeds with the first value
// (span semantics, no bias adjustment)
// ============================================================================

export function ema(series: readonly (number | undefined)[], period: number): NumericSeries {
  const p = toPeriod(period);
  const alpha = 2 / (p + 1);
  const out = emptySeries(series.length);

  for (const run of definedRuns(series)) {
    let smoothed = run.values[0];
    run.values.forEach((value, j) => {
      if (j > 0) {
        smoothed = alpha * value + (1 - alpha) * smoothed;
      }
      if (j >= p - 1) {
        out[run.start + j] = smoothed;
      }
    });
  }

  return out;
}

// ============================================================================
// RSI (Relative Strength Index)
// Simple trailing averages of gains and losses (not Wilder smoothing).
// The first delta of a run counts as zero.
// ============================================================================

export function rsi(series: readonly (number | undefined)[], period: number): NumericSeries {
  const p = toPeriod(period);
  const out = emptySeries(series.length);

  for (const run of definedRuns(series)) {
    const gains = run.values.map((value, j) => (j === 0 ? 0 : Math.max(value - run.values[j - 1], 0)));
    const losses = run.values.map((value, j) => (j === 0 ? 0 : Math.max(run.values[j - 1] - value, 0)));

    const avgGain = trailingMean(gains, p);
    const avgLoss = trailingMean(losses, p);

    avgGain.forEach((gain, j) => {
      const loss = avgLoss[j];
      let value: number | undefined;
      if (loss === 0) {
        // No losses: saturated when anything was gained, undefined on a flat window
        value = gain === 0 ? undefined : 100;
      } else {
        value = 100 - 100 / (1 + gain / loss);
      }
      out[run.start + p - 1 + j] = value;
    });
  }

  return out;
}

// ============================================================================
// PREV (value n bars ago)
// ============================================================================

export function prev(series: readonly (number | undefined)[], n: number): NumericSeries {
  const offset = toPeriod(n, 0);
  return series.map((_, i) => (i >= offset ? series[i - offset] : undefined));
}
