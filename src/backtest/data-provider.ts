import { addDays } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { DataProviderError, ValidationError } from './errors.js';
import { type Bar, type Candle, createBar, type PriceLookup } from './types.js';

const log = createLogger('market-data');

/** Calendar days of history fetched before the start date so look-back windows are filled. */
const DEFAULT_WARMUP_DAYS = 365;

export interface DataProvider {
  /** Ascending, de-duplicated trading dates that drive the simulation. */
  tradingCalendar(): string[];
  closePrices(symbols: Iterable<string>, date: string): PriceLookup;
  openPrices(symbols: Iterable<string>, date: string): PriceLookup;
  getBar(symbol: string, date: string): Bar | undefined;
  /** Bars for `symbol` in date order, up to and including `until` when given. */
  history(symbol: string, until?: string): readonly Bar[];
}

export interface HistoryRange {
  startDate?: string;
  endDate?: string;
}

/** Where raw daily candles come from (Yahoo Finance in production, fixtures in tests). */
export interface HistorySource {
  getHistoricalData(symbol: string, range: HistoryRange): Promise<Candle[]>;
}

export interface MarketDataOptions {
  indexSymbol: string;
  startDate?: string | null;
  endDate?: string | null;
  warmupDays?: number;
}

/** Sorted, date-unique bars; a malformed candle fails as a `DataProviderError` for `symbol`. */
function normalize(symbol: string, candles: Candle[]): Bar[] {
  const byDate = new Map<string, Bar>();
  for (const candle of candles) {
    try {
      byDate.set(candle.date, createBar(candle));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      throw new DataProviderError(`Invalid history for ${symbol}: ${err.message}`, symbol, {
        cause: err,
      });
    }
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Number of bars with `date <= until` in an ascending series. */
function upperBound(bars: readonly Bar[], until: string): number {
  let lo = 0;
  let hi = bars.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (bars[mid].date <= until) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Daily bars for a benchmark index (the calendar) and a set of stocks.
 *
 * Everything is fetched up front by `load()`; afterwards every lookup is
 * synchronous and served from memory. Bars are memoised per (symbol, date)
 * the first time a symbol is priced. The caches live as long as the provider
 * and are never shared between providers.
 */
export class MarketDataProvider implements DataProvider {
  private readonly source: HistorySource;
  private readonly options: MarketDataOptions;
  private indexBars: Bar[] | null = null;
  private readonly histories = new Map<string, readonly Bar[]>();
  private readonly barsByDate = new Map<string, Map<string, Bar>>();

  constructor(source: HistorySource, options: MarketDataOptions) {
    this.source = source;
    this.options = options;
  }

  get indexSymbol(): string {
    return this.options.indexSymbol;
  }

  /** Fetch the index series (once) and the history of every symbol not loaded yet. */
  async load(symbols: Iterable<string>): Promise<void> {
    const { indexSymbol, startDate, endDate } = this.options;

    if (!this.indexBars) {
      const raw = await this.source.getHistoricalData(indexSymbol, {
        startDate: startDate ?? undefined,
        endDate: endDate ?? undefined,
      });
      this.indexBars = normalize(indexSymbol, raw);
      log.info({ indexSymbol, bars: this.indexBars.length }, 'Index series loaded');
    }

    const pending = [...new Set(symbols)].filter((s) => !this.histories.has(s));
    if (pending.length === 0) return;

    const warmupStart = startDate
      ? addDays(startDate, -(this.options.warmupDays ?? DEFAULT_WARMUP_DAYS))
      : undefined;

    const entries = await Promise.all(
      pending.map(async (symbol) => {
        const raw = await this.source.getHistoricalData(symbol, {
          startDate: warmupStart,
          endDate: endDate ?? undefined,
        });
        return { symbol, bars: normalize(symbol, raw) };
      }),
    );

    for (const { symbol, bars } of entries) {
      if (bars.length === 0) {
        log.warn({ symbol }, 'No history returned, symbol will never be priced');
      }
      this.histories.set(symbol, bars);
    }

    log.info({ symbols: entries.length }, 'Symbol histories loaded');
  }

  tradingCalendar(): string[] {
    if (!this.indexBars) {
      throw new DataProviderError(
        'Index series not loaded; call load() first',
        this.options.indexSymbol,
      );
    }
    const { startDate, endDate } = this.options;
    return this.indexBars
      .map((b) => b.date)
      .filter((d) => (!startDate || d >= startDate) && (!endDate || d <= endDate));
  }

  history(symbol: string, until?: string): readonly Bar[] {
    const bars = this.histories.get(symbol);
    if (!bars) {
      throw new DataProviderError(`No history loaded for ${symbol}`, symbol);
    }
    if (until === undefined) return bars;
    return bars.slice(0, upperBound(bars, until));
  }

  getBar(symbol: string, date: string): Bar | undefined {
    let byDate = this.barsByDate.get(symbol);
    if (!byDate) {
      const bars = this.histories.get(symbol);
      if (!bars) return undefined;
      byDate = new Map(bars.map((b) => [b.date, b]));
      this.barsByDate.set(symbol, byDate);
    }
    return byDate.get(date);
  }

  closePrices(symbols: Iterable<string>, date: string): PriceLookup {
    return this.pricesOn(symbols, date, 'close');
  }

  openPrices(symbols: Iterable<string>, date: string): PriceLookup {
    return this.pricesOn(symbols, date, 'open');
  }

  private pricesOn(symbols: Iterable<string>, date: string, field: 'open' | 'close'): PriceLookup {
    const prices = new Map<string, number>();
    for (const symbol of symbols) {
      const bar = this.getBar(symbol, date);
      if (bar) prices.set(symbol, bar[field]);
    }
    return prices;
  }
}
