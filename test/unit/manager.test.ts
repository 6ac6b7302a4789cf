import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';

// Mock logger
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { ValidationError } from '../../src/backtest/errors.js';
import { ConfigManager } from '../../src/config/manager.js';

describe('ConfigManager', () => {
  let manager: ConfigManager;

  beforeEach(() => {
    manager = new ConfigManager();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('get', () => {
    it('returns the parsed default', () => {
      expect(manager.get<number>('backtest.initialCapital')).toBe(1_000_000);
      expect(manager.get<string[]>('strategy.watchlist')).toEqual([
        'AAPL',
        'MSFT',
        'NVDA',
        'AMZN',
        'GOOGL',
      ]);
      expect(manager.get<string | null>('backtest.startDate')).toBeNull();
    });

    it('throws for unknown keys', () => {
      expect(() => manager.get('strategy.unknown')).toThrow(
        'Config key not found: strategy.unknown',
      );
    });

    it('prefers a runtime override to the default', () => {
      manager.set('strategy.topN', 5);
      expect(manager.get<number>('strategy.topN')).toBe(5);
    });

    it('prefers the environment to a runtime override', () => {
      manager.set('strategy.topN', 5);
      vi.stubEnv('STRATEGY_TOP_N', '7');
      expect(manager.get<number>('strategy.topN')).toBe(7);
    });

    it('parses JSON environment values', () => {
      vi.stubEnv('STRATEGY_WATCHLIST', '["SPY","QQQ"]');
      expect(manager.get<string[]>('strategy.watchlist')).toEqual(['SPY', 'QQQ']);
    });

    it('keeps non-JSON environment values as strings', () => {
      vi.stubEnv('BACKTEST_START_DATE', '2024-01-02');
      vi.stubEnv('BACKTEST_INDEX_SYMBOL', '^NDX');
      expect(manager.get<string>('backtest.startDate')).toBe('2024-01-02');
      expect(manager.get<string>('backtest.indexSymbol')).toBe('^NDX');
    });

    it('rejects invalid environment values naming the variable', () => {
      vi.stubEnv('STRATEGY_TOP_N', '0');
      expect(() => manager.get('strategy.topN')).toThrow(ValidationError);
      expect(() => manager.get('strategy.topN')).toThrow(/^Invalid value for STRATEGY_TOP_N: /);
    });
  });

  describe('set', () => {
    it('rejects values that fail the key schema', () => {
      expect(() => manager.set('strategy.name', 'meanReversion')).toThrow(
        /^Invalid value for strategy\.name: /,
      );
      expect(manager.get<string>('strategy.name')).toBe('momentum');
    });

    it('accepts keys without a schema', () => {
      manager.set('custom.flag', true);
      expect(manager.get<boolean>('custom.flag')).toBe(true);
    });
  });

  describe('reset', () => {
    it('drops a single override', () => {
      manager.set('strategy.topN', 5);
      manager.set('strategy.lookback', 20);
      manager.reset('strategy.topN');

      expect(manager.get<number>('strategy.topN')).toBe(3);
      expect(manager.get<number>('strategy.lookback')).toBe(20);
    });

    it('drops every override', () => {
      manager.set('strategy.topN', 5);
      manager.set('custom.flag', true);
      manager.reset();

      expect(manager.get<number>('strategy.topN')).toBe(3);
      expect(() => manager.get('custom.flag')).toThrow('Config key not found: custom.flag');
    });
  });

  describe('configKeyToEnvVar', () => {
    it('converts dotted camelCase keys', () => {
      expect(manager.configKeyToEnvVar('backtest.initialCapital')).toBe('BACKTEST_INITIAL_CAPITAL');
      expect(manager.configKeyToEnvVar('strategy.topN')).toBe('STRATEGY_TOP_N');
      expect(manager.configKeyToEnvVar('data.requestTimeoutMs')).toBe('DATA_REQUEST_TIMEOUT_MS');
    });
  });
});
