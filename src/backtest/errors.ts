export class BacktestError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** The calendar has fewer than two dates, so there is nothing to step through. */
export class InsufficientDataError extends BacktestError {
  readonly available: number;

  constructor(available: number) {
    super(
      `Not enough index data to run the backtest: need at least 2 trading dates, got ${available}`,
      'INSUFFICIENT_DATA',
    );
    this.name = 'InsufficientDataError';
    this.available = available;
  }
}

export class InsufficientFundsError extends BacktestError {
  readonly symbol: string;
  readonly quantity: number;
  readonly price: number;
  readonly cost: number;
  readonly cash: number;

  constructor(symbol: string, quantity: number, price: number, cash: number) {
    const cost = quantity * price;
    super(
      `Insufficient cash to buy ${quantity} shares of ${symbol} at ${price.toFixed(2)}: ` +
        `cost ${cost.toFixed(2)}, cash ${cash.toFixed(2)}`,
      'INSUFFICIENT_FUNDS',
    );
    this.name = 'InsufficientFundsError';
    this.symbol = symbol;
    this.quantity = quantity;
    this.price = price;
    this.cost = cost;
    this.cash = cash;
  }
}

export class ValidationError extends BacktestError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromIssues(
    context: string,
    issues: Array<{ path: (string | number)[]; message: string }>,
  ): ValidationError {
    const messages = issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    );
    return new ValidationError(`${context}: ${messages.join('; ')}`, messages);
  }
}

export class DataProviderError extends BacktestError {
  readonly symbol?: string;

  constructor(message: string, symbol?: string, options?: { cause?: unknown }) {
    super(message, 'DATA_PROVIDER_ERROR');
    this.name = 'DataProviderError';
    this.symbol = symbol;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof BacktestError) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
