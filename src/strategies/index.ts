import type { Strategy } from '../backtest/strategy.js';
import { BuyAndHoldStrategy } from './buy-and-hold.js';
import { MomentumStrategy } from './momentum.js';

export type StrategyName = 'momentum' | 'buyAndHold';

export interface StrategyParams {
  watchlist: string[];
  lookback?: number;
  topN?: number;
}

export function createStrategy(name: StrategyName, params: StrategyParams): Strategy {
  switch (name) {
    case 'momentum':
      return new MomentumStrategy(params);
    case 'buyAndHold':
      return new BuyAndHoldStrategy({ watchlist: params.watchlist });
  }
}

export { BuyAndHoldStrategy, MomentumStrategy };
