/**
 * Standardized Error Handling
 *
 * Error taxonomy shared by the engine and whatever surface wraps it.
 * Format when serialized: { error: string, code: string, details?: unknown }
 *
 * Insufficient data (a market with no trusted wallets, a market too young to
 * backtest) is deliberately absent here: those are well-defined outputs.
 */

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 404 Not Found
  MARKET_NOT_FOUND: { status: 404, code: "market_not_found" },

  // 422 Unprocessable Entity
  INVALID_TRADE_ROW: { status: 422, code: "invalid_trade_row" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

// ---------------------------------------------------------------------------
// Application errors
// ---------------------------------------------------------------------------

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "AppError";
    this.statusCode = ErrorCodes[code].status;
    this.errorCode = ErrorCodes[code].code;
  }

  toJSON(): ApiError {
    return { error: this.errorCode, code: this.errorCode, details: this.message };
  }
}

/**
 * A snapshot was requested for a market the store does not know.
 * Propagated to the caller and never retried.
 */
export class UnknownMarketError extends AppError {
  public readonly marketId: string;

  constructor(marketId: string) {
    super("MARKET_NOT_FOUND", `Market does not exist: ${marketId}`);
    this.name = "UnknownMarketError";
    this.marketId = marketId;
  }
}

/**
 * A trade row failed validation at the ingestion boundary. The engine itself
 * never throws this; it skips malformed rows.
 */
export class InputDataError extends AppError {
  constructor(message: string) {
    super("INVALID_TRADE_ROW", message);
    this.name = "InputDataError";
  }
}

/**
 * Extract a printable message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Narrow any thrown value to an Error instance for structured logging.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
