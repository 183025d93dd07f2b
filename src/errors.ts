export type GridErrorCode =
  | 'config_error'
  | 'market_data_error'
  | 'order_rejected'
  | 'order_not_found'
  | 'persistence_error';

export abstract class GridError extends Error {
  abstract readonly code: GridErrorCode;
  /** Fatal errors stop the process instead of being isolated to one symbol or level. */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GridError {
  readonly code = 'config_error';
  readonly fatal = true;
}

export class MarketDataError extends GridError {
  readonly code = 'market_data_error';
  readonly fatal = false;

  constructor(
    readonly symbol: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${symbol}: ${message}`, options);
  }
}

export class OrderRejectedError extends GridError {
  readonly code = 'order_rejected';
  readonly fatal = false;

  constructor(
    readonly symbol: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`order rejected on ${symbol}: ${reason}`, options);
  }
}

/**
 * The venue does not know the order. Ambiguous: it may have filled and been
 * purged, or it never existed.
 */
export class OrderNotFoundError extends GridError {
  readonly code = 'order_not_found';
  readonly fatal = false;

  constructor(
    readonly orderId: string,
    readonly symbol: string,
    options?: { cause?: unknown }
  ) {
    super(`order ${orderId} not found on ${symbol}`, options);
  }
}

export class PersistenceError extends GridError {
  readonly code = 'persistence_error';
  readonly fatal = true;

  constructor(
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    const cause = options?.cause;
    const detail = cause instanceof Error ? cause.message : cause === undefined ? 'unknown' : String(cause);
    super(`ledger ${operation} failed: ${detail}`, options);
  }
}

export function isGridError(error: unknown): error is GridError {
  return error instanceof GridError;
}
