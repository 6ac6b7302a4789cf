import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { DataProviderError } from '../../../src/backtest/errors.js';
import { candle, indexCandles, FixtureSource } from '../../helpers/market.js';
import { createTestApp, fixtureMarket } from '../helpers/test-server.js';

const BUY_AND_HOLD = {
  strategy: 'buyAndHold',
  watchlist: ['AAPL', 'MSFT'],
  initialCapital: 10000,
};

describe('GET /api/health', () => {
  it('returns ok', async () => {
    const res = await request(createTestApp()).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});

describe('POST /api/backtest', () => {
  it('runs, stores and reports a buy-and-hold backtest', async () => {
    const res = await request(createTestApp()).post('/api/backtest').send(BUY_AND_HOLD);

    expect(res.status).toBe(201);
    expect(typeof res.body.id).toBe('number');
    expect(res.body.equityCurve).toEqual({
      dates: ['2024-01-03', '2024-01-04', '2024-01-05'],
      values: [10500, 11000, 11500],
      initialCapital: 10000,
    });
    expect(res.body.metrics).toMatchObject({
      tradingDays: 3,
      finalValue: 11500,
      returnPct: 0.15,
      maxDrawdown: 0,
      sharpeRatio: null,
    });
    expect(res.body.summary.split('\n')).toContain('Final Value: $11,500.00');
  });

  it('runs the momentum strategy with the given parameters', async () => {
    const res = await request(createTestApp())
      .post('/api/backtest')
      .send({ watchlist: ['AAPL', 'MSFT'], lookback: 1, topN: 1, initialCapital: 11000 });

    expect(res.status).toBe(201);
    expect(res.body.equityCurve.values).toEqual([11000, 12000, 13000]);
    expect(res.body.metrics.returnPct).toBe(0.1818);
    expect(res.body.summary.split('\n')[1]).toBe('Strategy: momentum');
  });

  it('rejects an invalid body with 400', async () => {
    const res = await request(createTestApp()).post('/api/backtest').send({ watchlist: [] });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Array must contain at least 1 element(s)' });
  });

  it('rejects a reversed date range with 400', async () => {
    const res = await request(createTestApp())
      .post('/api/backtest')
      .send({ ...BUY_AND_HOLD, startDate: '2024-02-01', endDate: '2024-01-01' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'startDate must not be after endDate' });
  });

  it('answers 422 when the calendar is too short', async () => {
    const source = new FixtureSource({ '^GSPC': indexCandles(['2024-01-02']) });
    const res = await request(createTestApp({ source })).post('/api/backtest').send(BUY_AND_HOLD);

    expect(res.status).toBe(422);
    expect(res.body.error).toEqual({
      name: 'InsufficientDataError',
      message: 'Not enough index data to run the backtest: need at least 2 trading dates, got 1',
      code: 'INSUFFICIENT_DATA',
    });
  });

  it('answers 502 when market data cannot be fetched', async () => {
    const source = {
      getHistoricalData: (symbol: string) =>
        Promise.reject(
          new DataProviderError(`Failed to fetch historical data for ${symbol}`, symbol),
        ),
    };
    const res = await request(createTestApp({ source })).post('/api/backtest').send(BUY_AND_HOLD);

    expect(res.status).toBe(502);
    expect(res.body.error).toEqual({
      name: 'DataProviderError',
      message: 'Failed to fetch historical data for ^GSPC',
      code: 'DATA_PROVIDER_ERROR',
    });
  });

  it('answers 502 when the market data contains a malformed candle', async () => {
    const source = new FixtureSource({
      ...fixtureMarket(),
      AAPL: [{ ...candle('2024-01-02', 100), low: -1 }],
    });
    const res = await request(createTestApp({ source }))
      .post('/api/backtest')
      .send({ strategy: 'buyAndHold', watchlist: ['AAPL'] });

    expect(res.status).toBe(502);
    expect(res.body.error).toEqual({
      name: 'DataProviderError',
      message:
        'Invalid history for AAPL: Invalid bar for 2024-01-02: low must be a finite number >= 0, got -1',
      code: 'DATA_PROVIDER_ERROR',
    });
  });

  it('hides unexpected failures behind a 500', async () => {
    const source = { getHistoricalData: () => Promise.reject(new Error('disk on fire')) };
    const res = await request(createTestApp({ source })).post('/api/backtest').send(BUY_AND_HOLD);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Failed to run backtest' });
  });
});

describe('stored backtests', () => {
  async function createRun(app: ReturnType<typeof createTestApp>): Promise<number> {
    const res = await request(app).post('/api/backtest').send(BUY_AND_HOLD);
    return res.body.id;
  }

  it('lists stored runs newest first', async () => {
    const app = createTestApp();
    const first = await createRun(app);
    const second = await createRun(app);

    const res = await request(app).get('/api/backtests');

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(2);
    expect(res.body.runs.map((r: { id: number }) => r.id)).toEqual([second, first]);
  });

  it('honours the limit and rejects a bad one', async () => {
    const app = createTestApp();
    await createRun(app);
    await createRun(app);

    const limited = await request(app).get('/api/backtests?limit=1');
    expect(limited.body.runs).toHaveLength(1);
    expect(limited.body.total).toBe(2);

    const bad = await request(app).get('/api/backtests?limit=0');
    expect(bad.status).toBe(400);
  });

  it('returns a stored run with its equity curve', async () => {
    const app = createTestApp();
    const id = await createRun(app);

    const res = await request(app).get(`/api/backtests/${id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id,
      strategy: 'buyAndHold',
      indexSymbol: '^GSPC',
      initialCapital: 10000,
      finalValue: 11500,
    });
    expect(res.body.equityCurve).toEqual([
      { date: '2024-01-03', value: 10500 },
      { date: '2024-01-04', value: 11000 },
      { date: '2024-01-05', value: 11500 },
    ]);
  });

  it('answers 400 for a malformed id and 404 for an unknown one', async () => {
    const app = createTestApp();

    expect((await request(app).get('/api/backtests/abc')).status).toBe(400);
    expect((await request(app).get('/api/backtests/999')).body).toEqual({
      error: 'Backtest not found',
    });
  });

  it('deletes a stored run', async () => {
    const app = createTestApp();
    const id = await createRun(app);

    expect((await request(app).delete(`/api/backtests/${id}`)).status).toBe(204);
    expect((await request(app).get(`/api/backtests/${id}`)).status).toBe(404);
    expect((await request(app).delete(`/api/backtests/${id}`)).status).toBe(404);
  });
});
