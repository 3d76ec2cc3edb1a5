import { ConfigurationError } from "../errors/app.errors";
import { LOG_LEVELS, type LogLevel } from "../infra/logging";
import {
  PERSISTENCE_ERROR_POLICIES,
  type PersistenceErrorPolicy,
} from "../infra/persistence";
import {
  createEnvReader,
  envBool,
  envEnum,
  envList,
  envNum,
  envStr,
  type EnvSource,
} from "./env";

export type BotConfig = {
  /** Directory for portfolio.json and paper_trades.json */
  dataDir: string;
  initialBalance: number;
  /** Size used when a buy does not name one */
  defaultTradeUsd: number;
  persistenceErrors: PersistenceErrorPolicy;
  logLevel: LogLevel;
  /** Minimum cross-venue spread (0.02 = 2¢ per share) worth acting on */
  minProfitThreshold: number;
  /** Largest USD size for one arbitrage entry */
  maxPositionSize: number;
  /** Pause between arbitrage scans */
  scanIntervalMs: number;
  /** Log opportunities only; record nothing */
  dryRun: boolean;
  /** Wallets whose trades are copied */
  copyTargetTraders: string[];
  /** Trades below this USD size are ignored */
  copyMinTradeSize: number;
  /** Largest USD size for one copied trade */
  copyMaxPositionSize: number;
  /** Wallet whose value scales copied trades; empty to size off the paper portfolio */
  copyOurAddress: string;
};

export function loadBotConfig(
  overrides: EnvSource = {},
  env: EnvSource = process.env,
): BotConfig {
  const read = createEnvReader(overrides, env);

  const config: BotConfig = {
    dataDir: envStr(read, "PAPER_DATA_DIR", "data"),
    initialBalance: envNum(read, "PAPER_INITIAL_BALANCE", 1000),
    defaultTradeUsd: envNum(read, "PAPER_TRADE_SIZE_USD", 10),
    persistenceErrors: envEnum(read, "PAPER_PERSISTENCE_ERRORS", PERSISTENCE_ERROR_POLICIES, "warn"),
    logLevel: envEnum(read, "LOG_LEVEL", LOG_LEVELS, "info"),
    minProfitThreshold: envNum(read, "MIN_PROFIT_THRESHOLD", 0.02),
    maxPositionSize: envNum(read, "MAX_POSITION_SIZE", 100),
    scanIntervalMs: envNum(read, "ARB_SCAN_INTERVAL_MS", 10_000),
    dryRun: envBool(read, "DRY_RUN", true),
    copyTargetTraders: envList(read, "COPY_TARGET_TRADERS"),
    copyMinTradeSize: envNum(read, "COPY_MIN_TRADE_SIZE", 5),
    copyMaxPositionSize: envNum(read, "COPY_MAX_POSITION_SIZE", 50),
    copyOurAddress: envStr(read, "COPY_OUR_ADDRESS", ""),
  };

  validateBotConfig(config);
  return config;
}

export function validateBotConfig(config: BotConfig): void {
  if (config.initialBalance < 0) {
    throw new ConfigurationError("PAPER_INITIAL_BALANCE must not be negative");
  }
  if (config.defaultTradeUsd <= 0) {
    throw new ConfigurationError("PAPER_TRADE_SIZE_USD must be positive");
  }
  if (config.minProfitThreshold < 0 || config.minProfitThreshold >= 1) {
    throw new ConfigurationError("MIN_PROFIT_THRESHOLD must be within [0, 1)");
  }
  if (config.maxPositionSize <= 0) {
    throw new ConfigurationError("MAX_POSITION_SIZE must be positive");
  }
  if (config.scanIntervalMs < 0) {
    throw new ConfigurationError("ARB_SCAN_INTERVAL_MS must not be negative");
  }
  if (config.copyMinTradeSize < 0) {
    throw new ConfigurationError("COPY_MIN_TRADE_SIZE must not be negative");
  }
  if (config.copyMaxPositionSize <= 0) {
    throw new ConfigurationError("COPY_MAX_POSITION_SIZE must be positive");
  }
}
