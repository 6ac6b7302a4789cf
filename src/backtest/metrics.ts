import { round } from '../utils/helpers.js';
import type { EquityPoint } from './types.js';

export const TRADING_DAYS_PER_YEAR = 252;
const MIN_RETURNS_FOR_RATIOS = 5;

export interface DrawdownResult {
  maxDrawdown: number;
  maxDrawdownPct: number;
  peakDate: string | null;
  troughDate: string | null;
}

/**
 * Largest peak-to-trough fall of the equity curve. `startValue`, when given,
 * is treated as the peak before the first point.
 */
export function calculateMaxDrawdown(
  points: readonly EquityPoint[],
  startValue?: number,
): DrawdownResult {
  if (points.length === 0) {
    return {
      maxDrawdown: 0,
      maxDrawdownPct: 0,
      peakDate: null,
      troughDate: null,
    };
  }

  let peak = startValue ?? points[0].value;
  let currentPeakDate: string | null = startValue !== undefined ? null : points[0].date;
  let maxDrawdown = 0;
  let maxDrawdownPct = 0;
  let peakDate: string | null = null;
  let troughDate: string | null = null;

  for (const point of points) {
    if (point.value > peak) {
      peak = point.value;
      currentPeakDate = point.date;
    }

    const dd = peak - point.value;
    if (dd > maxDrawdown) {
      maxDrawdown = dd;
      maxDrawdownPct = peak > 0 ? dd / peak : 0;
      peakDate = currentPeakDate;
      troughDate = point.date;
    }
  }

  return {
    maxDrawdown: round(maxDrawdown, 2),
    maxDrawdownPct: round(maxDrawdownPct, 4),
    peakDate,
    troughDate,
  };
}

/** Simple returns between consecutive values; steps from a non-positive value are skipped. */
export function computeDailyReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    if (prev > 0) {
      returns.push((values[i] - prev) / prev);
    }
  }
  return returns;
}

export function computeSharpe(dailyReturns: number[], riskFreeAnnual = 0.05): number | null {
  if (dailyReturns.length < MIN_RETURNS_FOR_RATIOS) return null;

  const riskFreeDaily = riskFreeAnnual / TRADING_DAYS_PER_YEAR;
  const excessReturns = dailyReturns.map((r) => r - riskFreeDaily);
  const meanExcess = excessReturns.reduce((a, b) => a + b, 0) / excessReturns.length;
  const variance =
    excessReturns.reduce((sum, r) => sum + (r - meanExcess) ** 2, 0) / excessReturns.length;
  const stdDev = Math.sqrt(variance);
  if (stdDev === 0) return null;

  return round((meanExcess / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR), 2);
}

export function computeSortino(dailyReturns: number[], riskFreeAnnual = 0.05): number | null {
  if (dailyReturns.length < MIN_RETURNS_FOR_RATIOS) return null;

  const riskFreeDaily = riskFreeAnnual / TRADING_DAYS_PER_YEAR;
  const excessReturns = dailyReturns.map((r) => r - riskFreeDaily);
  const meanExcess = excessReturns.reduce((a, b) => a + b, 0) / excessReturns.length;

  // Downside deviation: std of negative excess returns only
  const negativeExcess = excessReturns.filter((r) => r < 0);
  if (negativeExcess.length === 0) {
    return meanExcess > 0 ? null : 0;
  }

  const downsideVariance =
    negativeExcess.reduce((sum, r) => sum + r ** 2, 0) / excessReturns.length;
  const downsideDeviation = Math.sqrt(downsideVariance);
  if (downsideDeviation === 0) return 0;

  return round((meanExcess / downsideDeviation) * Math.sqrt(TRADING_DAYS_PER_YEAR), 2);
}

export function computeCalmar(dailyReturns: number[], maxDrawdownPct: number): number | null {
  if (dailyReturns.length < MIN_RETURNS_FOR_RATIOS) return null;
  if (maxDrawdownPct <= 0) return null;

  const meanDailyReturn = dailyReturns.reduce((a, b) => a + b, 0) / dailyReturns.length;
  return round((meanDailyReturn * TRADING_DAYS_PER_YEAR) / maxDrawdownPct, 2);
}
