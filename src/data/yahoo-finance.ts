import axios from 'axios';
import { z } from 'zod';
import type { HistoryRange, HistorySource } from '../backtest/data-provider.js';
import { DataProviderError } from '../backtest/errors.js';
import type { Candle } from '../backtest/types.js';
import { configManager } from '../config/manager.js';
import { addDays, retryAsync, toIsoDate } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('yahoo-finance');

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

// Common headers for Yahoo Finance REST calls
const YF_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)',
};

const seriesSchema = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: seriesSchema,
                high: seriesSchema,
                low: seriesSchema,
                close: seriesSchema,
                volume: seriesSchema,
              }),
            ),
          }),
        }),
      )
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string(), description: z.string() })
      .nullable()
      .optional(),
  }),
});

export interface YahooFinanceOptions {
  timeoutMs?: number;
  /** Calendar days fetched when the range has no start date. */
  historyDays?: number;
  attempts?: number;
  retryDelayMs?: number;
}

function toEpochSeconds(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);
}

export class YahooFinanceClient implements HistorySource {
  private readonly timeoutMs: number;
  private readonly historyDays: number;
  private readonly attempts: number;
  private readonly retryDelayMs: number;

  constructor(options: YahooFinanceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? configManager.get<number>('data.requestTimeoutMs');
    this.historyDays = options.historyDays ?? configManager.get<number>('data.historyDays');
    this.attempts = options.attempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Daily candles for `symbol` within `range` (inclusive). Rows without an
   * open or close are dropped. Network and API failures are retried, then
   * surfaced as DataProviderError.
   */
  async getHistoricalData(symbol: string, range: HistoryRange = {}): Promise<Candle[]> {
    const today = toIsoDate(new Date());
    const start = range.startDate ?? addDays(range.endDate ?? today, -this.historyDays);
    // period2 is exclusive on Yahoo's side
    const period1 = toEpochSeconds(start);
    const period2 = toEpochSeconds(addDays(range.endDate ?? today, 1));

    let body: unknown;
    try {
      const response = await retryAsync(
        () =>
          axios.get<unknown>(`${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`, {
            params: {
              period1,
              period2,
              interval: '1d',
              includePrePost: false,
            },
            headers: YF_HEADERS,
            timeout: this.timeoutMs,
          }),
        this.attempts,
        this.retryDelayMs,
      );
      body = response.data;
    } catch (err) {
      log.error({ symbol, err }, 'Failed to fetch historical data');
      throw new DataProviderError(`Failed to fetch historical data for ${symbol}`, symbol, {
        cause: err,
      });
    }

    const parsed = chartResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataProviderError(`Unexpected chart response for ${symbol}`, symbol, {
        cause: parsed.error,
      });
    }

    const { chart } = parsed.data;
    if (chart.error) {
      throw new DataProviderError(
        `Yahoo Finance error for ${symbol}: ${chart.error.code} ${chart.error.description}`,
        symbol,
      );
    }

    const result = chart.result?.[0];
    const quote = result?.indicators.quote[0];
    if (!result?.timestamp || !quote) {
      log.warn({ symbol }, 'No historical data returned');
      return [];
    }

    const candles: Candle[] = [];
    const timestamps = result.timestamp;
    for (let i = 0; i < timestamps.length; i++) {
      const o = quote.open?.[i];
      const h = quote.high?.[i];
      const l = quote.low?.[i];
      const c = quote.close?.[i];
      const v = quote.volume?.[i];

      if (o == null || c == null) continue;

      candles.push({
        date: toIsoDate(new Date(timestamps[i] * 1000)),
        open: o,
        high: h ?? o,
        low: l ?? o,
        close: c,
        volume: v ?? 0,
      });
    }

    log.debug({ symbol, candles: candles.length, start, end: range.endDate }, 'History fetched');
    return candles;
  }
}
