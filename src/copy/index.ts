/**
 * Copy Trading Module
 *
 * Watches trader wallets through an ActivityProvider and mirrors their new
 * BUY fills into the paper ledger at a size scaled to our portfolio.
 */

export type {
  TradeSide,
  TraderActivity,
  TraderPosition,
  ActivityProvider,
  CopyTrade,
  TraderSummary,
  CopyExecutionResult,
  CopyTradeExecutor,
} from "./types";

export {
  CopyTrader,
  ACTIVITY_FETCH_LIMIT,
  MAX_ACTIVITY_AGE_MS,
  FALLBACK_OUR_VALUE,
  FALLBACK_TRADER_VALUE,
  type CopyTraderConfig,
} from "./copy-trader";

export {
  PaperCopyExecutor,
  COPY_CONFIDENCE,
  copyMarketName,
  type PaperCopyExecutorConfig,
} from "./paper-executor";
