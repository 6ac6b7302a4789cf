export interface ConfigDefault {
  key: string;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Backtest
  {
    key: 'backtest.indexSymbol',
    value: '"^GSPC"',
    category: 'backtest',
    description: 'Index whose trading days drive the calendar',
  },
  {
    key: 'backtest.startDate',
    value: 'null',
    category: 'backtest',
    description: 'First calendar date (YYYY-MM-DD), null for all history',
  },
  {
    key: 'backtest.endDate',
    value: 'null',
    category: 'backtest',
    description: 'Last calendar date (YYYY-MM-DD), null for today',
  },
  {
    key: 'backtest.initialCapital',
    value: '1000000',
    category: 'backtest',
    description: 'Starting cash',
  },

  // Strategy
  {
    key: 'strategy.name',
    value: '"momentum"',
    category: 'strategy',
    description: 'momentum | buyAndHold',
  },
  {
    key: 'strategy.watchlist',
    value: '["AAPL","MSFT","NVDA","AMZN","GOOGL"]',
    category: 'strategy',
    description: 'Candidate symbols',
  },
  {
    key: 'strategy.lookback',
    value: '60',
    category: 'strategy',
    description: 'Momentum look-back in trading days',
  },
  {
    key: 'strategy.topN',
    value: '3',
    category: 'strategy',
    description: 'Number of symbols held by the momentum policy',
  },

  // Data
  {
    key: 'data.historyDays',
    value: '3650',
    category: 'data',
    description: 'Calendar days of history fetched when no start date is set',
  },
  {
    key: 'data.requestTimeoutMs',
    value: '15000',
    category: 'data',
    description: 'HTTP timeout for market data requests',
  },

  // API
  { key: 'api.port', value: '3001', category: 'api', description: 'HTTP API port' },
];
