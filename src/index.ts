/**
 * Cross-venue arbitrage bot: paper-trading ledger, spread detection, copy
 * trading and the infrastructure they share.
 */

export * from "./paper";
export * from "./arbitrage";
export * from "./copy";

export { loadBotConfig, validateBotConfig, type BotConfig } from "./config";

export {
  AppError,
  ConfigurationError,
  InsufficientBalanceError,
  PositionNotFoundError,
  InvalidTradeInputError,
  TradeStateError,
  DuplicateTradeError,
  PersistenceError,
  isAppError,
  describeError,
} from "./errors/app.errors";

export {
  createLogger,
  createNullLogger,
  formatUsd,
  formatPnl,
  formatPriceCents,
  formatPercent,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from "./infra/logging";

export {
  JsonFileStore,
  MemorySnapshotStore,
  type SnapshotStore,
  type PersistenceErrorPolicy,
} from "./infra/persistence";

export { runPaperCommand } from "./cli/paper.command";
