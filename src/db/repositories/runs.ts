import { count, desc, eq } from 'drizzle-orm';
import type { BacktestRun } from '../../backtest/runner.js';
import type { EquityPoint } from '../../backtest/types.js';
import { getDb } from '../index.js';
import { backtestRuns, equityPoints } from '../schema.js';

// SQLite caps bound parameters per statement
const POINT_CHUNK_SIZE = 500;

export type BacktestRunRow = typeof backtestRuns.$inferSelect;

export interface StoredRun extends BacktestRunRow {
  equityCurve: EquityPoint[];
}

export function saveRun(run: BacktestRun, createdAt = new Date().toISOString()): number {
  const db = getDb();
  const { options, metrics, result } = run;

  return db.transaction((tx) => {
    const row = tx
      .insert(backtestRuns)
      .values({
        strategy: options.strategy,
        indexSymbol: options.indexSymbol,
        startDate: options.startDate,
        endDate: options.endDate,
        initialCapital: options.initialCapital,
        finalValue: metrics.finalValue,
        returnPct: metrics.returnPct,
        maxDrawdownPct: metrics.maxDrawdownPct,
        tradingDays: metrics.tradingDays,
        params: JSON.stringify(options),
        createdAt,
      })
      .returning({ id: backtestRuns.id })
      .get();

    for (let i = 0; i < result.points.length; i += POINT_CHUNK_SIZE) {
      const chunk = result.points.slice(i, i + POINT_CHUNK_SIZE);
      tx.insert(equityPoints)
        .values(chunk.map((p) => ({ runId: row.id, date: p.date, value: p.value })))
        .run();
    }

    return row.id;
  });
}

export function getRun(id: number): StoredRun | undefined {
  const db = getDb();
  const row = db.select().from(backtestRuns).where(eq(backtestRuns.id, id)).get();
  if (!row) return undefined;

  const points = db
    .select({ date: equityPoints.date, value: equityPoints.value })
    .from(equityPoints)
    .where(eq(equityPoints.runId, id))
    .orderBy(equityPoints.date)
    .all();

  return { ...row, equityCurve: points };
}

export function listRuns(limit = 20): BacktestRunRow[] {
  const db = getDb();
  return db
    .select()
    .from(backtestRuns)
    .orderBy(desc(backtestRuns.createdAt), desc(backtestRuns.id))
    .limit(limit)
    .all();
}

export function countRuns(): number {
  const db = getDb();
  const row = db.select({ n: count() }).from(backtestRuns).get();
  return row?.n ?? 0;
}

export function deleteRun(id: number): boolean {
  const db = getDb();
  db.delete(equityPoints).where(eq(equityPoints.runId, id)).run();
  const res = db.delete(backtestRuns).where(eq(backtestRuns.id, id)).run();
  return res.changes > 0;
}
