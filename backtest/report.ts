/**
 * Backtest report formatting
 */
import { BacktestResult, Trade } from '../spec/types';

const RULE = '='.repeat(60);

export function roundTo(value: number, digits = 2): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export interface ResultSummary {
  initialEquity: number;
  finalEquity: number;
  totalReturn: number;
  totalReturnPct: number;
  maxDrawdownPct: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  averageReturn: number;
  averageWin: number;
  averageLoss: number;
  profitFactor: number;
  sharpeRatio: number;
}

/**
 * Headline figures rounded to cents / hundredths of a percent
 */
export function summarizeResult(result: BacktestResult): ResultSummary {
  return {
    initialEquity: result.initialEquity,
    finalEquity: roundTo(result.finalEquity),
    totalReturn: roundTo(result.totalReturn),
    totalReturnPct: roundTo(result.totalReturnPct),
    maxDrawdownPct: roundTo(result.maxDrawdownPct),
    totalTrades: result.totalTrades,
    winningTrades: result.winningTrades,
    losingTrades: result.losingTrades,
    winRate: roundTo(result.winRate),
    averageReturn: roundTo(result.averageReturn),
    averageWin: roundTo(result.averageWin),
    averageLoss: roundTo(result.averageLoss),
    profitFactor: roundTo(result.profitFactor),
    sharpeRatio: roundTo(result.sharpeRatio),
  };
}

export function formatMoney(value: number): string {
  const formatted = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return value < 0 ? `-$${formatted}` : `$${formatted}`;
}

export function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

function formatRatio(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : 'inf';
}

export function formatResults(result: BacktestResult): string {
  const lines = [
    RULE,
    ' BACKTEST RESULTS',
    RULE,
    '',
    `Initial Capital: ${formatMoney(result.initialEquity)}`,
    `Final Equity:    ${formatMoney(result.finalEquity)}`,
    `Total Return:    ${formatMoney(result.totalReturn)} (${result.totalReturnPct.toFixed(2)}%)`,
    `Max Drawdown:    ${result.maxDrawdownPct.toFixed(2)}%`,
    '',
    `Total Trades:    ${result.totalTrades}`,
    `Winning Trades:  ${result.winningTrades}`,
    `Losing Trades:   ${result.losingTrades}`,
    `Win Rate:        ${result.winRate.toFixed(2)}%`,
    '',
    `Average Return:  ${result.averageReturn.toFixed(2)}%`,
    `Average Win:     ${result.averageWin.toFixed(2)}%`,
    `Average Loss:    ${result.averageLoss.toFixed(2)}%`,
    `Profit Factor:   ${formatRatio(result.profitFactor)}`,
    `Sharpe Ratio:    ${formatRatio(result.sharpeRatio)}`,
  ];

  if (result.openPosition) {
    lines.push(
      '',
      `Open Position:   ${result.openPosition.shareCount.toFixed(4)} shares @ ` +
        `${formatMoney(result.openPosition.entryPrice)} since ${formatDate(result.openPosition.entryTime)}`
    );
  }

  if (result.trades.length > 0) {
    lines.push('', RULE, ' TRADE LOG', RULE, formatTradeHeader(), '-'.repeat(60));
    lines.push(...result.trades.map(formatTradeRow));
  }

  lines.push(RULE);
  return lines.join('\n');
}

function formatTradeHeader(): string {
  return [
    'Entry Date'.padEnd(12),
    'Exit Date'.padEnd(12),
    'Entry $'.padEnd(10),
    'Exit $'.padEnd(10),
    'Return'.padEnd(10),
  ].join(' ');
}

export function formatTradeRow(trade: Trade): string {
  return [
    formatDate(trade.entryTime).padEnd(12),
    formatDate(trade.exitTime).padEnd(12),
    `$${trade.entryPrice.toFixed(2)}`.padEnd(10),
    `$${trade.exitPrice.toFixed(2)}`.padEnd(10),
    `${trade.returnPct.toFixed(2)}%`.padEnd(10),
  ].join(' ');
}
