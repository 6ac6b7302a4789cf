import { formatCurrency, formatPercent, round } from '../utils/helpers.js';
import {
  calculateMaxDrawdown,
  computeCalmar,
  computeDailyReturns,
  computeSharpe,
  computeSortino,
} from './metrics.js';
import type { BacktestResult } from './result.js';

export interface BacktestMetrics {
  tradingDays: number;
  initialCapital: number;
  finalValue: number;
  returnPct: number;
  maxDrawdown: number;
  maxDrawdownPct: number;
  peakDate: string | null;
  troughDate: string | null;
  sharpeRatio: number | null;
  sortinoRatio: number | null;
  calmarRatio: number | null;
}

export interface SummaryMeta {
  strategy: string;
  indexSymbol: string;
  watchlist: readonly string[];
}

export function computeMetrics(result: BacktestResult, initialCapital: number): BacktestMetrics {
  const finalValue = result.finalValue ?? initialCapital;
  // The account starts at initialCapital before the first recorded point
  const dailyReturns = computeDailyReturns([initialCapital, ...result.values]);
  const drawdown = calculateMaxDrawdown(result.points, initialCapital);

  return {
    tradingDays: result.length,
    initialCapital,
    finalValue: round(finalValue, 2),
    returnPct: initialCapital > 0 ? round((finalValue - initialCapital) / initialCapital, 4) : 0,
    maxDrawdown: drawdown.maxDrawdown,
    maxDrawdownPct: drawdown.maxDrawdownPct,
    peakDate: drawdown.peakDate,
    troughDate: drawdown.troughDate,
    sharpeRatio: computeSharpe(dailyReturns),
    sortinoRatio: computeSortino(dailyReturns),
    calmarRatio: computeCalmar(dailyReturns, drawdown.maxDrawdownPct),
  };
}

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(
  result: BacktestResult,
  metrics: BacktestMetrics,
  meta: SummaryMeta,
): string {
  const lines: string[] = [];
  const period =
    result.length > 0 ? `${result.dates[0]} to ${result.dates[result.length - 1]}` : 'N/A';

  lines.push('=== Backtest Results ===');
  lines.push(`Strategy: ${meta.strategy}`);
  lines.push(`Calendar: ${meta.indexSymbol}`);
  lines.push(`Watchlist: ${meta.watchlist.join(', ')}`);
  lines.push(`Period: ${period} (${metrics.tradingDays} days)`);
  lines.push(`Initial Capital: ${formatCurrency(metrics.initialCapital)}`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Value: ${formatCurrency(metrics.finalValue)}`);
  lines.push(`Return: ${formatPercent(metrics.returnPct)}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  const drawdown = formatCurrency(metrics.maxDrawdown);
  lines.push(`Max Drawdown: ${formatPercent(metrics.maxDrawdownPct)} (${drawdown})`);
  if (metrics.peakDate && metrics.troughDate) {
    lines.push(`Drawdown Window: ${metrics.peakDate} to ${metrics.troughDate}`);
  }
  lines.push(`Sharpe Ratio: ${metrics.sharpeRatio ?? 'N/A'}`);
  lines.push(`Sortino Ratio: ${metrics.sortinoRatio ?? 'N/A'}`);
  lines.push(`Calmar Ratio: ${metrics.calmarRatio ?? 'N/A'}`);

  return lines.join('\n');
}

/**
 * Format the equity curve for API response.
 */
export function formatEquityCurve(
  result: BacktestResult,
  initialCapital: number,
): {
  dates: string[];
  values: number[];
  initialCapital: number;
} {
  return {
    dates: result.dates,
    values: result.values.map((v) => round(v, 2)),
    initialCapital,
  };
}
