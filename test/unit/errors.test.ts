import { describe, expect, it } from 'vitest';
import {
  BacktestError,
  DataProviderError,
  InsufficientDataError,
  InsufficientFundsError,
  serializeError,
  ValidationError,
} from '../../src/backtest/errors.js';

describe('Backtest errors', () => {
  describe('BacktestError', () => {
    it('sets name, message and code', () => {
      const err = new BacktestError('test error', 'TEST_CODE');
      expect(err.name).toBe('BacktestError');
      expect(err.message).toBe('test error');
      expect(err.code).toBe('TEST_CODE');
      expect(err).toBeInstanceOf(Error);
    });

    it('captures a stack trace', () => {
      const err = new BacktestError('test', 'CODE');
      expect(err.stack).toContain('BacktestError');
    });
  });

  describe('InsufficientDataError', () => {
    it('reports how many dates were available', () => {
      const err = new InsufficientDataError(1);
      expect(err).toBeInstanceOf(BacktestError);
      expect(err.name).toBe('InsufficientDataError');
      expect(err.code).toBe('INSUFFICIENT_DATA');
      expect(err.available).toBe(1);
      expect(err.message).toBe(
        'Not enough index data to run the backtest: need at least 2 trading dates, got 1',
      );
    });
  });

  describe('InsufficientFundsError', () => {
    it('carries the attempted trade and the available cash', () => {
      const err = new InsufficientFundsError('AAPL', 3, 150, 400);
      expect(err).toBeInstanceOf(BacktestError);
      expect(err.code).toBe('INSUFFICIENT_FUNDS');
      expect(err.cost).toBe(450);
      expect(err.message).toBe(
        'Insufficient cash to buy 3 shares of AAPL at 150.00: cost 450.00, cash 400.00',
      );
    });
  });

  describe('ValidationError', () => {
    it('defaults the issue list to the message', () => {
      const err = new ValidationError('bad input');
      expect(err.code).toBe('VALIDATION_ERROR');
      expect(err.issues).toEqual(['bad input']);
    });

    it('builds a message from schema issues', () => {
      const err = ValidationError.fromIssues('Invalid options', [
        { path: ['watchlist', 0], message: 'Required' },
        { path: [], message: 'startDate must not be after endDate' },
      ]);
      expect(err.message).toBe(
        'Invalid options: watchlist.0: Required; startDate must not be after endDate',
      );
      expect(err.issues).toEqual(['watchlist.0: Required', 'startDate must not be after endDate']);
    });
  });

  describe('DataProviderError', () => {
    it('keeps the symbol and the cause', () => {
      const cause = new Error('timeout');
      const err = new DataProviderError('fetch failed', 'MSFT', { cause });
      expect(err.code).toBe('DATA_PROVIDER_ERROR');
      expect(err.symbol).toBe('MSFT');
      expect(err.cause).toBe(cause);
    });

    it('leaves the cause unset when none is given', () => {
      expect(new DataProviderError('fetch failed').cause).toBeUndefined();
    });
  });

  describe('serializeError', () => {
    it('includes the code for backtest errors', () => {
      expect(serializeError(new InsufficientDataError(0))).toEqual({
        name: 'InsufficientDataError',
        message: 'Not enough index data to run the backtest: need at least 2 trading dates, got 0',
        code: 'INSUFFICIENT_DATA',
      });
    });

    it('handles plain errors and thrown values', () => {
      expect(serializeError(new TypeError('nope'))).toEqual({ name: 'TypeError', message: 'nope' });
      expect(serializeError('boom')).toEqual({ name: 'Error', message: 'boom' });
    });
  });
});
