import { createLogger } from '../utils/logger.js';
import { InsufficientFundsError, ValidationError } from './errors.js';
import type { PriceLookup } from './types.js';

const log = createLogger('portfolio');

export class Position {
  readonly symbol: string;
  quantity: number;
  avgPrice: number;

  constructor(symbol: string, quantity = 0, avgPrice = 0) {
    this.symbol = symbol;
    this.quantity = quantity;
    this.avgPrice = avgPrice;
  }

  marketValue(price: number): number {
    return this.quantity * price;
  }
}

export interface PositionState {
  readonly symbol: string;
  readonly quantity: number;
  readonly avgPrice: number;
}

export type PortfolioSnapshot = Record<string, { quantity: number; avgPrice: number }>;

export interface PositionSummaryRow {
  symbol: string;
  quantity: number;
  avgPrice: number;
  marketPrice: number | null;
  marketValue: number | null;
}

/**
 * What a decision policy gets to see of the account. Positions are copies;
 * there is no way to trade through a view.
 */
export interface PortfolioView {
  readonly cash: number;
  readonly positions: ReadonlyMap<string, PositionState>;
  has(symbol: string): boolean;
  snapshot(): PortfolioSnapshot;
  totalValue(prices: PriceLookup): number;
}

function assertPrice(symbol: string, price: number): void {
  if (!Number.isFinite(price) || price < 0) {
    throw new ValidationError(`Invalid price for ${symbol}: ${price}`);
  }
}

export class Portfolio {
  private _cash: number;
  private readonly holdings = new Map<string, Position>();

  constructor(initialCash: number) {
    if (!Number.isFinite(initialCash) || initialCash < 0) {
      throw new ValidationError(`Initial capital must be a finite number >= 0, got ${initialCash}`);
    }
    this._cash = initialCash;
  }

  get cash(): number {
    return this._cash;
  }

  /** Copy of the symbol -> Position mapping. */
  get positions(): ReadonlyMap<string, Position> {
    return new Map(this.holdings);
  }

  getPosition(symbol: string): Position | undefined {
    return this.holdings.get(symbol);
  }

  getOrCreate(symbol: string): Position {
    let position = this.holdings.get(symbol);
    if (!position) {
      position = new Position(symbol);
      this.holdings.set(symbol, position);
    }
    return position;
  }

  remove(symbol: string): void {
    this.holdings.delete(symbol);
  }

  /** Cash plus held positions; symbols missing from `prices` count as zero. */
  totalValue(prices: PriceLookup): number {
    let value = this._cash;
    for (const [symbol, position] of this.holdings) {
      const price = prices.get(symbol);
      if (price === undefined) continue;
      value += position.marketValue(price);
    }
    return value;
  }

  /**
   * Buy `quantity` units at `price`. All-or-nothing: when the cost exceeds
   * available cash an InsufficientFundsError is thrown and nothing changes.
   */
  buy(symbol: string, quantity: number, price: number): void {
    if (!(quantity > 0)) return;
    assertPrice(symbol, price);

    const cost = quantity * price;
    if (cost > this._cash) {
      throw new InsufficientFundsError(symbol, quantity, price, this._cash);
    }

    const position = this.getOrCreate(symbol);
    const totalCost = position.avgPrice * position.quantity + cost;
    position.quantity += quantity;
    position.avgPrice = totalCost / position.quantity;
    this._cash -= cost;

    log.debug({ symbol, quantity, price, cost, cash: this._cash }, 'Bought');
  }

  /**
   * Sell up to `quantity` units at `price`. The amount is clamped to what is
   * held; selling an unheld symbol does nothing.
   */
  sell(symbol: string, quantity: number, price: number): void {
    const position = this.holdings.get(symbol);
    if (!position || !(quantity > 0)) return;
    assertPrice(symbol, price);

    const sold = Math.min(quantity, position.quantity);
    const proceeds = sold * price;
    position.quantity -= sold;
    if (position.quantity === 0) {
      position.avgPrice = 0;
      this.remove(symbol);
    }
    this._cash += proceeds;

    log.debug({ symbol, quantity: sold, price, proceeds, cash: this._cash }, 'Sold');
  }

  snapshot(): PortfolioSnapshot {
    const result: PortfolioSnapshot = {};
    for (const [symbol, position] of this.holdings) {
      result[symbol] = { quantity: position.quantity, avgPrice: position.avgPrice };
    }
    return result;
  }

  summary(prices: PriceLookup): PositionSummaryRow[] {
    const rows: PositionSummaryRow[] = [];
    for (const [symbol, position] of this.holdings) {
      const price = prices.get(symbol);
      rows.push({
        symbol,
        quantity: position.quantity,
        avgPrice: position.avgPrice,
        marketPrice: price ?? null,
        marketValue: price !== undefined ? position.marketValue(price) : null,
      });
    }
    return rows;
  }

  view(): PortfolioView {
    const portfolio = this;
    return {
      get cash() {
        return portfolio.cash;
      },
      get positions() {
        const copies = new Map<string, PositionState>();
        for (const [symbol, position] of portfolio.holdings) {
          copies.set(
            symbol,
            Object.freeze({
              symbol,
              quantity: position.quantity,
              avgPrice: position.avgPrice,
            }),
          );
        }
        return copies;
      },
      has: (symbol) => portfolio.holdings.has(symbol),
      snapshot: () => portfolio.snapshot(),
      totalValue: (prices) => portfolio.totalValue(prices),
    };
  }
}
