/**
 * Price table validation and column extraction
 */
import { Bar, NumericSeries, PRICE_FIELDS, PriceField } from '../spec/types';
import { BarSchema } from '../spec/schema';
import { StrategyValidationError } from '../compiler/errors';

/**
 * Ensure every bar carries finite OHLCV values and the time index is
 * unique and increasing.
 */
export function validateBars(bars: readonly Bar[]): void {
  bars.forEach((bar, index) => {
    const parsed = BarSchema.safeParse(bar);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const column = issue.path.join('.') || 'bar';
      throw new StrategyValidationError(
        `Invalid ${column} at bar index ${index}: ${issue.message}`,
        column,
        ['timestamp', ...PRICE_FIELDS]
      );
    }

    if (index > 0 && bar.timestamp <= bars[index - 1].timestamp) {
      throw new StrategyValidationError(
        `Time index must be unique and increasing: bar ${index} at ${bar.timestamp} ` +
          `does not follow ${bars[index - 1].timestamp}`,
        String(bar.timestamp)
      );
    }
  });
}

export type PriceColumns = Record<PriceField, NumericSeries>;

export function toColumns(bars: readonly Bar[]): PriceColumns {
  return {
    open: bars.map((b) => b.open),
    high: bars.map((b) => b.high),
    low: bars.map((b) => b.low),
    close: bars.map((b) => b.close),
    volume: bars.map((b) => b.volume),
  };
}
