import { describe, expect, it } from 'vitest';
import {
  computeMetrics,
  formatEquityCurve,
  generateSummary,
} from '../../src/backtest/reporter.js';
import { BacktestResult } from '../../src/backtest/result.js';

const META = { strategy: 'momentum', indexSymbol: '^GSPC', watchlist: ['AAPL', 'MSFT'] };

function sampleResult(): BacktestResult {
  return new BacktestResult([
    { date: '2024-01-03', value: 1100 },
    { date: '2024-01-04', value: 990 },
    { date: '2024-01-05', value: 1210 },
  ]);
}

describe('computeMetrics', () => {
  it('measures return and drawdown from the initial capital', () => {
    expect(computeMetrics(sampleResult(), 1000)).toEqual({
      tradingDays: 3,
      initialCapital: 1000,
      finalValue: 1210,
      returnPct: 0.21,
      maxDrawdown: 110,
      maxDrawdownPct: 0.1,
      peakDate: '2024-01-03',
      troughDate: '2024-01-04',
      sharpeRatio: null,
      sortinoRatio: null,
      calmarRatio: null,
    });
  });

  it('counts a fall below the initial capital on the first point as drawdown', () => {
    const result = new BacktestResult([{ date: '2024-01-03', value: 900 }]);
    const metrics = computeMetrics(result, 1000);

    expect(metrics.maxDrawdown).toBe(100);
    expect(metrics.maxDrawdownPct).toBe(0.1);
    expect(metrics.peakDate).toBeNull();
    expect(metrics.returnPct).toBe(-0.1);
  });

  it('falls back to the initial capital for an empty result', () => {
    const metrics = computeMetrics(new BacktestResult([]), 500);

    expect(metrics.finalValue).toBe(500);
    expect(metrics.returnPct).toBe(0);
    expect(metrics.tradingDays).toBe(0);
  });

  it('reports a zero return for zero capital', () => {
    expect(computeMetrics(new BacktestResult([]), 0).returnPct).toBe(0);
  });
});

describe('generateSummary', () => {
  it('renders the performance and risk sections', () => {
    const result = sampleResult();
    const summary = generateSummary(result, computeMetrics(result, 1000), META);

    expect(summary.split('\n')).toEqual([
      '=== Backtest Results ===',
      'Strategy: momentum',
      'Calendar: ^GSPC',
      'Watchlist: AAPL, MSFT',
      'Period: 2024-01-03 to 2024-01-05 (3 days)',
      'Initial Capital: $1,000.00',
      '',
      '--- Performance ---',
      'Final Value: $1,210.00',
      'Return: 21.00%',
      '',
      '--- Risk Metrics ---',
      'Max Drawdown: 10.00% ($110.00)',
      'Drawdown Window: 2024-01-03 to 2024-01-04',
      'Sharpe Ratio: N/A',
      'Sortino Ratio: N/A',
      'Calmar Ratio: N/A',
    ]);
  });

  it('omits the period and drawdown window for an empty result', () => {
    const result = new BacktestResult([]);
    const lines = generateSummary(result, computeMetrics(result, 500), META).split('\n');

    expect(lines).toContain('Period: N/A (0 days)');
    expect(lines.some((l) => l.startsWith('Drawdown Window'))).toBe(false);
  });
});

describe('formatEquityCurve', () => {
  it('splits the curve into rounded series', () => {
    const result = new BacktestResult([
      { date: '2024-01-03', value: 1000.456 },
      { date: '2024-01-04', value: 999.994 },
    ]);

    expect(formatEquityCurve(result, 1000)).toEqual({
      dates: ['2024-01-03', '2024-01-04'],
      values: [1000.46, 999.99],
      initialCapital: 1000,
    });
  });
});
