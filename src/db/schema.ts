import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const backtestRuns = sqliteTable(
  'backtest_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    strategy: text('strategy').notNull(),
    indexSymbol: text('indexSymbol').notNull(),
    startDate: text('startDate'),
    endDate: text('endDate'),
    initialCapital: real('initialCapital').notNull(),
    finalValue: real('finalValue').notNull(),
    returnPct: real('returnPct').notNull(),
    maxDrawdownPct: real('maxDrawdownPct').notNull(),
    tradingDays: integer('tradingDays').notNull(),
    params: text('params').notNull(), // JSON of the full run options
    createdAt: text('createdAt').notNull(),
  },
  (table) => [index('idx_backtest_runs_created').on(table.createdAt)],
);

export const equityPoints = sqliteTable(
  'equity_points',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: integer('runId')
      .notNull()
      .references(() => backtestRuns.id, { onDelete: 'cascade' }),
    date: text('date').notNull(),
    value: real('value').notNull(),
  },
  (table) => [index('idx_equity_points_run').on(table.runId, table.date)],
);
