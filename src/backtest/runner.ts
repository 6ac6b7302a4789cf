import { z } from 'zod';
import { type ConfigManager, configManager } from '../config/manager.js';
import {
  DUPLICATE_SYMBOL_MESSAGE,
  hasUniqueSymbols,
  isoDateSchema,
  strategyNameSchema,
} from '../config/schema-validator.js';
import { createStrategy } from '../strategies/index.js';
import { createLogger } from '../utils/logger.js';
import { MarketDataProvider, type HistorySource } from './data-provider.js';
import { Backtester, DEFAULT_INITIAL_CAPITAL } from './engine.js';
import { ValidationError } from './errors.js';
import { type BacktestMetrics, computeMetrics } from './reporter.js';
import type { BacktestResult } from './result.js';

const log = createLogger('backtest-runner');

export const backtestRunSchema = z
  .object({
    strategy: strategyNameSchema.default('momentum'),
    watchlist: z
      .array(z.string().trim().min(1).max(20))
      .min(1)
      .max(500)
      .refine(hasUniqueSymbols, DUPLICATE_SYMBOL_MESSAGE),
    lookback: z.number().int().min(1).max(5000).default(60),
    topN: z.number().int().min(1).max(500).default(3),
    indexSymbol: z.string().trim().min(1).max(20).default('^GSPC'),
    startDate: isoDateSchema.nullable().default(null),
    endDate: isoDateSchema.nullable().default(null),
    initialCapital: z.number().finite().min(0).default(DEFAULT_INITIAL_CAPITAL),
  })
  .refine((o) => !o.startDate || !o.endDate || o.startDate <= o.endDate, {
    message: 'startDate must not be after endDate',
    path: ['startDate'],
  });

export type BacktestRunOptions = z.output<typeof backtestRunSchema>;
export type BacktestRunInput = z.input<typeof backtestRunSchema>;

export interface BacktestRun {
  options: BacktestRunOptions;
  result: BacktestResult;
  metrics: BacktestMetrics;
}

export function parseRunOptions(input: unknown): BacktestRunOptions {
  const parsed = backtestRunSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromIssues('Invalid backtest options', parsed.error.issues);
  }
  return parsed.data;
}

/** Backtest options as configured through defaults, runtime overrides and the environment. */
export function loadRunOptions(config: ConfigManager = configManager): BacktestRunOptions {
  return parseRunOptions({
    strategy: config.get<string>('strategy.name'),
    watchlist: config.get<string[]>('strategy.watchlist'),
    lookback: config.get<number>('strategy.lookback'),
    topN: config.get<number>('strategy.topN'),
    indexSymbol: config.get<string>('backtest.indexSymbol'),
    startDate: config.get<string | null>('backtest.startDate'),
    endDate: config.get<string | null>('backtest.endDate'),
    initialCapital: config.get<number>('backtest.initialCapital'),
  });
}

/**
 * Load the calendar and the watchlist's history from `source`, then run the
 * simulation. Provider failures propagate as they are.
 */
export async function runBacktest(
  options: BacktestRunOptions,
  source: HistorySource,
): Promise<BacktestRun> {
  const strategy = createStrategy(options.strategy, {
    watchlist: options.watchlist,
    lookback: options.lookback,
    topN: options.topN,
  });

  const provider = new MarketDataProvider(source, {
    indexSymbol: options.indexSymbol,
    startDate: options.startDate,
    endDate: options.endDate,
  });
  await provider.load(options.watchlist);

  const backtester = new Backtester(provider, strategy, {
    initialCapital: options.initialCapital,
  });
  const result = backtester.run();
  const metrics = computeMetrics(result, options.initialCapital);

  log.info(
    {
      strategy: strategy.name,
      finalValue: metrics.finalValue,
      returnPct: metrics.returnPct,
      holdings: backtester.portfolio.snapshot(),
    },
    'Backtest run finished',
  );

  return { options, result, metrics };
}
