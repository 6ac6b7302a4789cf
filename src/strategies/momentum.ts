import { z } from 'zod';
import { ValidationError } from '../backtest/errors.js';
import type { Strategy, StrategyContext } from '../backtest/strategy.js';
import { DUPLICATE_SYMBOL_MESSAGE, hasUniqueSymbols } from '../config/schema-validator.js';
import type { Order } from '../backtest/types.js';

export const momentumParamsSchema = z.object({
  watchlist: z.array(z.string().trim().min(1)).refine(hasUniqueSymbols, DUPLICATE_SYMBOL_MESSAGE),
  lookback: z.number().int().positive().default(60),
  topN: z.number().int().positive().default(3),
});

export type MomentumParams = z.input<typeof momentumParamsSchema>;

export interface MomentumScore {
  symbol: string;
  momentum: number;
}

/**
 * Holds the `topN` watchlist symbols with the highest trailing return over
 * `lookback` bars, equally weighted, and closes everything else it holds.
 */
export class MomentumStrategy implements Strategy {
  readonly name = 'momentum';
  readonly watchlist: readonly string[];
  readonly lookback: number;
  readonly topN: number;

  constructor(params: MomentumParams) {
    const parsed = momentumParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw ValidationError.fromIssues('Invalid momentum parameters', parsed.error.issues);
    }
    this.watchlist = parsed.data.watchlist;
    this.lookback = parsed.data.lookback;
    this.topN = parsed.data.topN;
  }

  /**
   * Trailing return for every watchlist symbol that trades today and has at
   * least `lookback + 1` bars, best first.
   */
  rank(ctx: StrategyContext): MomentumScore[] {
    const scores: MomentumScore[] = [];

    for (const symbol of this.watchlist) {
      const history = ctx.history(symbol);
      const last = history[history.length - 1];
      if (!last || last.date !== ctx.currentDate) continue;
      if (history.length < this.lookback + 1) continue;

      const startPrice = history[history.length - 1 - this.lookback].close;
      if (startPrice <= 0) continue;

      scores.push({ symbol, momentum: last.close / startPrice - 1 });
    }

    // Array.prototype.sort is stable: ties keep watchlist order
    return scores.sort((a, b) => b.momentum - a.momentum);
  }

  onDate(ctx: StrategyContext): Order[] {
    const selected = this.rank(ctx)
      .slice(0, this.topN)
      .map((s) => s.symbol);
    if (selected.length === 0) return [];

    const weight = 1 / selected.length;
    const orders: Order[] = selected.map((symbol) => ({ symbol, targetPercent: weight }));

    const keep = new Set(selected);
    for (const symbol of ctx.portfolio.positions.keys()) {
      if (!keep.has(symbol)) {
        orders.push({ symbol, targetPercent: 0 });
      }
    }

    return orders;
  }
}
