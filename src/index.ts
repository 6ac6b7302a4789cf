import 'dotenv/config';

import { ApiServer } from './api/server.js';
import { generateSummary } from './backtest/reporter.js';
import { loadRunOptions, runBacktest } from './backtest/runner.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { saveRun } from './db/repositories/runs.js';
import { YahooFinanceClient } from './data/yahoo-finance.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('main');

async function runOnce(): Promise<void> {
  const options = loadRunOptions();
  log.info({ options }, 'Running configured backtest');

  const run = await runBacktest(options, new YahooFinanceClient());
  const id = saveRun(run);

  process.stdout.write(
    `${generateSummary(run.result, run.metrics, {
      strategy: options.strategy,
      indexSymbol: options.indexSymbol,
      watchlist: options.watchlist,
    })}\n\nSaved as run #${id}\n`,
  );
}

async function serve(): Promise<void> {
  const source = new YahooFinanceClient();
  const server = new ApiServer({ runBacktest: (options) => runBacktest(options, source) });
  await server.start();

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    server
      .stop()
      .then(() => {
        closeDatabase();
        process.exit(0);
      })
      .catch((err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  initDatabase();

  const mode = process.argv[2] ?? 'run';
  if (mode === 'serve') {
    await serve();
    return;
  }
  if (mode !== 'run') {
    throw new Error(`Unknown mode "${mode}", expected "run" or "serve"`);
  }

  try {
    await runOnce();
  } finally {
    closeDatabase();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Backtest failed');
  process.exitCode = 1;
});
