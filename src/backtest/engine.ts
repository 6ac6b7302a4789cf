import { round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import type { DataProvider } from './data-provider.js';
import { InsufficientDataError, InsufficientFundsError } from './errors.js';
import { Portfolio } from './portfolio.js';
import { BacktestResult } from './result.js';
import { createStrategyContext, type Strategy } from './strategy.js';
import type { EquityPoint, Order } from './types.js';

const log = createLogger('backtest-engine');

export const DEFAULT_INITIAL_CAPITAL = 1_000_000;

export interface BacktesterOptions {
  initialCapital?: number;
}

/**
 * Steps through the trading calendar one date at a time:
 *
 *   1. ask the strategy for target weights on `d[i]`
 *   2. rebalance towards them at `d[i]` closing prices
 *   3. mark the account to market at `d[i+1]` opening prices
 *
 * and records one account value per step, dated `d[i+1]`.
 */
export class Backtester {
  readonly portfolio: Portfolio;
  private readonly dataProvider: DataProvider;
  private readonly strategy: Strategy;

  constructor(dataProvider: DataProvider, strategy: Strategy, options: BacktesterOptions = {}) {
    this.dataProvider = dataProvider;
    this.strategy = strategy;
    this.portfolio = new Portfolio(options.initialCapital ?? DEFAULT_INITIAL_CAPITAL);
  }

  run(): BacktestResult {
    const calendar = this.dataProvider.tradingCalendar();
    if (calendar.length < 2) {
      throw new InsufficientDataError(calendar.length);
    }

    log.info(
      {
        strategy: this.strategy.name,
        from: calendar[0],
        to: calendar[calendar.length - 1],
        tradingDays: calendar.length,
        initialCapital: this.portfolio.cash,
      },
      'Starting backtest',
    );

    const view = this.portfolio.view();
    const points: EquityPoint[] = [];

    for (let i = 0; i < calendar.length - 1; i++) {
      const currentDate = calendar[i];
      const nextDate = calendar[i + 1];

      const context = createStrategyContext(currentDate, this.dataProvider, view);
      const orders = this.strategy.onDate(context);
      this.executeOrders(currentDate, orders);

      points.push({ date: nextDate, value: this.markToMarket(nextDate) });
    }

    const result = new BacktestResult(points);
    log.info(
      {
        points: result.length,
        finalValue: round(result.finalValue ?? this.portfolio.cash, 2),
        positions: this.portfolio.positions.size,
      },
      'Backtest complete',
    );
    return result;
  }

  /**
   * Rebalance towards the given targets at `date`'s closing prices. Orders are
   * applied one after another, so cash spent by an earlier order is not
   * available to a later one on the same date.
   */
  private executeOrders(date: string, orders: Order[]): void {
    const symbols = new Set(orders.map((o) => o.symbol));
    const closePrices = this.dataProvider.closePrices(symbols, date);

    if (closePrices.size === 0) {
      if (orders.length > 0) {
        log.debug({ date, orders: orders.length }, 'No closing prices for ordered symbols');
      }
      return;
    }

    // Held symbols without a close today count as zero here, even though the
    // mark-to-market step values them at the next open.
    const valuationSymbols = new Set([...this.portfolio.positions.keys(), ...symbols]);
    const valuationPrices = this.dataProvider.closePrices(valuationSymbols, date);
    const totalValue = this.portfolio.totalValue(valuationPrices);

    for (const { symbol, targetPercent } of orders) {
      const price = closePrices.get(symbol);
      if (price === undefined) {
        log.debug({ date, symbol }, 'No closing price, order skipped');
        continue;
      }
      if (price <= 0) {
        log.debug({ date, symbol, price }, 'Non-positive closing price, order skipped');
        continue;
      }

      const targetValue = totalValue * targetPercent;
      const position = this.portfolio.getPosition(symbol);
      const currentValue = position ? position.quantity * price : 0;
      const quantity = (targetValue - currentValue) / price;

      if (quantity > 0) {
        try {
          this.portfolio.buy(symbol, quantity, price);
        } catch (err) {
          if (!(err instanceof InsufficientFundsError)) throw err;
          log.debug(
            { date, symbol, cost: err.cost, cash: err.cash },
            'Insufficient cash, order skipped',
          );
        }
      } else if (quantity < 0) {
        this.portfolio.sell(symbol, -quantity, price);
      }
    }
  }

  /** Cash plus held positions at `date`'s open; positions without an open count as zero. */
  private markToMarket(date: string): number {
    const openPrices = this.dataProvider.openPrices(this.portfolio.positions.keys(), date);
    return this.portfolio.totalValue(openPrices);
  }
}
