import { z } from 'zod';
import { isIsoDate } from '../utils/helpers.js';

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format')
  .refine(isIsoDate, 'Must be a real calendar date');

export const strategyNameSchema = z.enum(['momentum', 'buyAndHold']);

const symbolSchema = z.string().trim().min(1).max(20);

export function hasUniqueSymbols(symbols: readonly string[]): boolean {
  return new Set(symbols).size === symbols.length;
}

export const DUPLICATE_SYMBOL_MESSAGE = 'Watchlist must not repeat a symbol';

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = new Map<string, z.ZodType>([
  ['backtest.indexSymbol', symbolSchema],
  ['backtest.startDate', isoDateSchema.nullable()],
  ['backtest.endDate', isoDateSchema.nullable()],
  ['backtest.initialCapital', z.number().finite().min(0)],
]);

// ── Strategy ─────────────────────────────────────────────────────────────────
const strategySchemas = new Map<string, z.ZodType>([
  ['strategy.name', strategyNameSchema],
  [
    'strategy.watchlist',
    z.array(symbolSchema).max(500).refine(hasUniqueSymbols, DUPLICATE_SYMBOL_MESSAGE),
  ],
  ['strategy.lookback', z.number().int().min(1).max(5000)],
  ['strategy.topN', z.number().int().min(1).max(500)],
]);

// ── Data ─────────────────────────────────────────────────────────────────────
const dataSchemas = new Map<string, z.ZodType>([
  ['data.historyDays', z.number().int().min(1).max(36_500)],
  ['data.requestTimeoutMs', z.number().int().min(1000).max(120_000)],
]);

// ── API ──────────────────────────────────────────────────────────────────────
const apiSchemas = new Map<string, z.ZodType>([['api.port', z.number().int().min(1).max(65_535)]]);

// ── Merged schema map ────────────────────────────────────────────────────────
export const configSchemas: Map<string, z.ZodType> = new Map([
  ...backtestSchemas,
  ...strategySchemas,
  ...dataSchemas,
  ...apiSchemas,
]);

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are considered valid (forward-compatibility).
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = configSchemas.get(key);
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}
