import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const log = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

let sqlite: Database.Database | undefined;
let db: AppDatabase | undefined;

export function getDb(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function initDatabase(dbPath?: string): AppDatabase {
  const resolvedPath = dbPath || process.env.DB_PATH || './data/backtests.db';
  log.info({ path: resolvedPath }, 'Initializing database');

  closeDatabase();
  if (resolvedPath !== ':memory:') {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }
  sqlite = new Database(resolvedPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('foreign_keys = ON');

  db = drizzle(sqlite, { schema });

  createTables(sqlite);

  log.info('Database initialized');
  return db;
}

export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = undefined;
    db = undefined;
  }
}

function createTables(conn: Database.Database): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS backtest_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      strategy TEXT NOT NULL,
      indexSymbol TEXT NOT NULL,
      startDate TEXT,
      endDate TEXT,
      initialCapital REAL NOT NULL,
      finalValue REAL NOT NULL,
      returnPct REAL NOT NULL,
      maxDrawdownPct REAL NOT NULL,
      tradingDays INTEGER NOT NULL,
      params TEXT NOT NULL,
      createdAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_backtest_runs_created ON backtest_runs(createdAt);

    CREATE TABLE IF NOT EXISTS equity_points (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      runId INTEGER NOT NULL REFERENCES backtest_runs(id) ON DELETE CASCADE,
      date TEXT NOT NULL,
      value REAL NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_equity_points_run ON equity_points(runId, date);
  `);
}
