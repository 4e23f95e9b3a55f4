/**
 * Shared test fixtures
 */
import { Bar } from '../spec/types';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START = Date.UTC(2024, 0, 1);

/** One bar per day; open/high/low all equal the close */
export function makeBars(closes: number[], volume = 1000): Bar[] {
  return closes.map((close, i) => ({
    timestamp: START + i * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume,
  }));
}
