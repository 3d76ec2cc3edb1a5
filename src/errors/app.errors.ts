/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when an environment variable cannot be parsed
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Balance error - thrown when a paper buy needs more cash than is available
 */
export class InsufficientBalanceError extends AppError {
  constructor(
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Insufficient balance: $${available.toFixed(2)} available, $${required.toFixed(2)} needed`,
      "INSUFFICIENT_BALANCE",
    );
  }
}

/**
 * Thrown when closing a market that has no open position
 */
export class PositionNotFoundError extends AppError {
  constructor(public readonly market: string) {
    super(`No position found for ${market}`, "POSITION_NOT_FOUND");
  }
}

/**
 * Thrown when a size, price or identifier cannot enter the ledger
 */
export class InvalidTradeInputError extends AppError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid ${field} (${String(value)}): ${reason}`, "INVALID_TRADE_INPUT");
  }
}

/**
 * Thrown when a trade record is moved out of a state it cannot leave
 */
export class TradeStateError extends AppError {
  constructor(
    public readonly tradeId: string,
    public readonly status: string,
    action: string,
  ) {
    super(`Cannot ${action} trade ${tradeId}: status is ${status}`, "TRADE_STATE");
  }
}

export class DuplicateTradeError extends AppError {
  constructor(public readonly tradeId: string) {
    super(`Trade ${tradeId} is already recorded`, "DUPLICATE_TRADE");
  }
}

export type PersistenceOperation = "load" | "save";

/**
 * Persistence error - a snapshot could not be read, decoded or written
 */
export class PersistenceError extends AppError {
  constructor(
    public readonly operation: PersistenceOperation,
    public readonly location: string,
    cause?: Error,
  ) {
    super(
      `Failed to ${operation} ${location}${cause ? `: ${cause.message}` : ""}`,
      "PERSISTENCE_ERROR",
      cause,
    );
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * One-line description for log output
 */
export function describeError(err: unknown): string {
  if (isAppError(err) && err.code) {
    return `[${err.code}] ${err.message}`;
  }
  return toError(err).message;
}
