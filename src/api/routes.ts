import { Router } from 'express';
import { z } from 'zod';
import {
  BacktestError,
  DataProviderError,
  InsufficientDataError,
  ValidationError,
  serializeError,
} from '../backtest/errors.js';
import { formatEquityCurve, generateSummary } from '../backtest/reporter.js';
import {
  type BacktestRun,
  type BacktestRunOptions,
  backtestRunSchema,
} from '../backtest/runner.js';
import { countRuns, deleteRun, getRun, listRuns, saveRun } from '../db/repositories/runs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('api-routes');

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

const idParamSchema = z.coerce.number().int().positive();

export interface RouterDeps {
  runBacktest: (options: BacktestRunOptions) => Promise<BacktestRun>;
}

function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof InsufficientDataError) return 422;
  if (err instanceof DataProviderError) return 502;
  return 500;
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  router.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ── Backtest ────────────────────────────────────────────────────────
  router.post('/api/backtest', async (req, res) => {
    const parsed = backtestRunSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }

    const options = parsed.data;
    try {
      const run = await deps.runBacktest(options);
      const id = saveRun(run);

      res.status(201).json({
        id,
        summary: generateSummary(run.result, run.metrics, {
          strategy: options.strategy,
          indexSymbol: options.indexSymbol,
          watchlist: options.watchlist,
        }),
        metrics: run.metrics,
        equityCurve: formatEquityCurve(run.result, options.initialCapital),
      });
    } catch (err) {
      const status = statusFor(err);
      if (status === 500) {
        log.error({ err }, 'Error running backtest');
        res.status(500).json({ error: 'Failed to run backtest' });
        return;
      }
      log.warn(
        { err, code: err instanceof BacktestError ? err.code : undefined },
        'Backtest rejected',
      );
      res.status(status).json({ error: serializeError(err) });
    }
  });

  // ── Stored runs ─────────────────────────────────────────────────────
  router.get('/api/backtests', (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' });
      return;
    }
    try {
      const runs = listRuns(parsed.data.limit);
      res.json({ runs, total: countRuns() });
    } catch (err) {
      log.error({ err }, 'Error listing backtests');
      res.status(500).json({ error: 'Failed to list backtests' });
    }
  });

  router.get('/api/backtests/:id', (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json({ error: 'Invalid backtest id' });
      return;
    }
    try {
      const run = getRun(id.data);
      if (!run) {
        res.status(404).json({ error: 'Backtest not found' });
        return;
      }
      res.json(run);
    } catch (err) {
      log.error({ err, id: id.data }, 'Error fetching backtest');
      res.status(500).json({ error: 'Failed to fetch backtest' });
    }
  });

  router.delete('/api/backtests/:id', (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json({ error: 'Invalid backtest id' });
      return;
    }
    try {
      if (!deleteRun(id.data)) {
        res.status(404).json({ error: 'Backtest not found' });
        return;
      }
      res.status(204).end();
    } catch (err) {
      log.error({ err, id: id.data }, 'Error deleting backtest');
      res.status(500).json({ error: 'Failed to delete backtest' });
    }
  });

  return router;
}
