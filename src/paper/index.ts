/**
 * Paper Trading Module
 *
 * Simulated trading against a virtual balance:
 * - Portfolio: cash, positions, realized P&L (portfolio.json)
 * - TradeLog: audit trail of every trade (paper_trades.json)
 * - PaperTradingEngine: buy/sell/summary over both
 */

export type {
  Side,
  TradeStatus,
  KnownStrategy,
  PositionRecord,
  PositionView,
  PortfolioSnapshot,
  TradeRecord,
  BuyOrder,
  SellOutcome,
  WinRate,
  PortfolioSummary,
  LedgerOptions,
  PriceMap,
} from "./types";

export { SIDES, TRADE_STATUSES } from "./types";

export { Position } from "./position";
export { Portfolio } from "./portfolio";
export { TradeLog } from "./trade-log";

export {
  createTradeRecord,
  closeTradeRecord,
  cancelTradeRecord,
  computeTradePnl,
  tradeShares,
  isProfitable,
  type NewTradeInput,
} from "./trade-record";

export {
  decodePortfolioSnapshot,
  decodePositionRecord,
  decodeTradeHistory,
  decodeTradeRecord,
} from "./codec";

export {
  PaperTradingEngine,
  createPaperTradingEngine,
  formatSummary,
  DEFAULT_INITIAL_BALANCE,
  PORTFOLIO_FILE,
  TRADES_FILE,
  type PaperEngineOptions,
} from "./engine";
