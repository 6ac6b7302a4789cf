import type { DataProvider } from './data-provider.js';
import type { PortfolioView } from './portfolio.js';
import type { Bar, Order } from './types.js';

export interface StrategyContext {
  readonly currentDate: string;
  readonly dataProvider: DataProvider;
  readonly portfolio: PortfolioView;
  /** Bars for `symbol` up to and including the current date. */
  history(symbol: string): readonly Bar[];
}

/**
 * A decision policy. Called once per simulated date; returns the target
 * weights it wants the engine to rebalance towards. Any state a policy keeps
 * between calls is its own business.
 */
export interface Strategy {
  readonly name: string;
  onDate(context: StrategyContext): Order[];
}

export function createStrategyContext(
  currentDate: string,
  dataProvider: DataProvider,
  portfolio: PortfolioView,
): StrategyContext {
  return {
    currentDate,
    dataProvider,
    portfolio,
    history: (symbol) => dataProvider.history(symbol, currentDate),
  };
}
