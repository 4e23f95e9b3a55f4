/**
 * Trade statistics
 */
import { Trade, TradeMetrics } from '../spec/types';

/** Trading days per year used to annualize the per-trade Sharpe ratio */
export const ANNUALIZATION_PERIODS = 252;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - avg) ** 2)));
}

/**
 * Sum of winning P&L over the absolute sum of losing P&L.
 * Infinity when there are wins but no losses, 0 when there are neither.
 */
export function profitFactor(trades: readonly Trade[]): number {
  const totalWins = trades.filter((t) => t.pnl > 0).reduce((sum, t) => sum + t.pnl, 0);
  const totalLosses = Math.abs(trades.filter((t) => t.pnl < 0).reduce((sum, t) => sum + t.pnl, 0));

  if (totalLosses > 0) return totalWins / totalLosses;
  return totalWins > 0 ? Infinity : 0;
}

/**
 * Mean over population standard deviation of per-trade percent returns,
 * scaled by sqrt(252 / N). Needs at least two trades with some dispersion.
 */
export function sharpeRatio(returnsPct: readonly number[]): number {
  if (returnsPct.length < 2) return 0;
  const deviation = populationStdDev(returnsPct);
  if (deviation === 0) return 0;
  return (mean(returnsPct) / deviation) * Math.sqrt(ANNUALIZATION_PERIODS / returnsPct.length);
}

export function computeTradeMetrics(trades: readonly Trade[]): TradeMetrics {
  const winners = trades.filter((t) => t.pnl > 0);
  const losers = trades.filter((t) => t.pnl < 0);
  const returns = trades.map((t) => t.returnPct);

  return {
    totalTrades: trades.length,
    winningTrades: winners.length,
    losingTrades: losers.length,
    winRate: trades.length > 0 ? (winners.length / trades.length) * 100 : 0,
    averageReturn: mean(returns),
    averageWin: mean(winners.map((t) => t.returnPct)),
    averageLoss: mean(losers.map((t) => t.returnPct)),
    profitFactor: profitFactor(trades),
    sharpeRatio: sharpeRatio(returns),
  };
}
