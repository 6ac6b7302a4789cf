import { ValidationError } from './errors.js';

/** One day's OHLCV observation for a single symbol. Dates are YYYY-MM-DD. */
export interface Candle {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type Bar = Readonly<Candle>;

/** symbol -> price; symbols without a price on the requested date are absent. */
export type PriceLookup = ReadonlyMap<string, number>;

/**
 * Instruction to hold `targetPercent` of total portfolio value in `symbol`.
 * A target of 0 closes the position.
 */
export interface Order {
  symbol: string;
  targetPercent: number;
}

export interface EquityPoint {
  date: string;
  value: number;
}

const BAR_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

export function createBar(candle: Candle): Bar {
  const issues: string[] = [];
  for (const field of BAR_FIELDS) {
    const value = candle[field];
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`${field} must be a finite number >= 0, got ${value}`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid bar for ${candle.date}: ${issues.join('; ')}`, issues);
  }
  return Object.freeze({
    date: candle.date,
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
  });
}
