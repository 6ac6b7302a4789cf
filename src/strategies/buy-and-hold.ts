import { z } from 'zod';
import { ValidationError } from '../backtest/errors.js';
import type { Strategy, StrategyContext } from '../backtest/strategy.js';
import { DUPLICATE_SYMBOL_MESSAGE, hasUniqueSymbols } from '../config/schema-validator.js';
import type { Order } from '../backtest/types.js';

export const buyAndHoldParamsSchema = z.object({
  watchlist: z
    .array(z.string().trim().min(1))
    .min(1)
    .refine(hasUniqueSymbols, DUPLICATE_SYMBOL_MESSAGE),
});

export type BuyAndHoldParams = z.input<typeof buyAndHoldParamsSchema>;

/**
 * Benchmark policy: splits the account equally across the watchlist symbols
 * that have a close on the first date any of them does, then never trades again.
 */
export class BuyAndHoldStrategy implements Strategy {
  readonly name = 'buyAndHold';
  readonly watchlist: readonly string[];
  private invested = false;

  constructor(params: BuyAndHoldParams) {
    const parsed = buyAndHoldParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw ValidationError.fromIssues('Invalid buy-and-hold parameters', parsed.error.issues);
    }
    this.watchlist = parsed.data.watchlist;
  }

  onDate(ctx: StrategyContext): Order[] {
    if (this.invested) return [];

    const priced = [...ctx.dataProvider.closePrices(this.watchlist, ctx.currentDate).keys()];
    if (priced.length === 0) return [];

    this.invested = true;
    const weight = 1 / priced.length;
    return priced.map((symbol) => ({ symbol, targetPercent: weight }));
  }
}
