/**
 * Paper Trading Engine
 *
 * Coordinates the Portfolio (cash and positions) with the Trade Log (audit
 * trail). Per market: no position -> buy -> open -> sell -> no position.
 * Repeated buys into an open market blend into the same position.
 *
 * The engine is meant for one caller at a time; hosts that drive it from
 * several loops must serialize buy/sell themselves.
 */

import * as path from "path";
import {
  createNullLogger,
  formatPercent,
  formatPnl,
  formatUsd,
  type Logger,
} from "../infra/logging";
import {
  JsonFileStore,
  type PersistenceErrorPolicy,
  type SnapshotStore,
} from "../infra/persistence";
import { decodePortfolioSnapshot, decodeTradeHistory } from "./codec";
import { Portfolio } from "./portfolio";
import { TradeLog } from "./trade-log";
import { createTradeRecord } from "./trade-record";
import type {
  BuyOrder,
  LedgerOptions,
  PortfolioSnapshot,
  PortfolioSummary,
  PositionView,
  PriceMap,
  SellOutcome,
  TradeRecord,
} from "./types";
import { assertConfidence } from "./validation";

export const DEFAULT_INITIAL_BALANCE = 1000;
export const PORTFOLIO_FILE = "portfolio.json";
export const TRADES_FILE = "paper_trades.json";

export class PaperTradingEngine {
  constructor(
    readonly portfolio: Portfolio,
    readonly tradeLog: TradeLog,
    private readonly logger: Logger = createNullLogger(),
  ) {}

  /**
   * Open (or add to) a position and record the trade.
   * Returns the new trade record id.
   */
  buy(order: BuyOrder): string {
    assertConfidence(order.confidence);

    // Balance and price checks happen here, before the log is touched
    this.portfolio.openPosition(
      order.market,
      order.coin,
      order.platform,
      order.sizeUsd,
      order.price,
    );

    const trade = createTradeRecord({
      market: order.market,
      coin: order.coin,
      timeframe: order.timeframe,
      platform: order.platform,
      side: "Buy",
      size: order.sizeUsd,
      entryPrice: order.price,
      strategy: order.strategy,
      confidence: order.confidence,
      notes: order.notes,
    });
    this.tradeLog.addTrade(trade);

    this.logger.info(
      `[Paper] BUY ${formatUsd(order.sizeUsd)} ${order.market} @ ${order.price.toFixed(3)} (${order.strategy})`,
    );
    return trade.id;
  }

  /**
   * Liquidate the position in `market` and close its open trade records.
   */
  sell(market: string, exitPrice: number): SellOutcome {
    const pnl = this.portfolio.closePosition(market, exitPrice);

    const tradeIds = this.tradeLog.findOpenByMarket(market).map((t) => t.id);
    for (const id of tradeIds) {
      this.tradeLog.closeTrade(id, exitPrice);
    }

    if (tradeIds.length === 0) {
      const reason = `no open trade record for ${market}`;
      this.logger.warn(`[Paper] SELL ${market} realized ${formatPnl(pnl)} but ${reason}`);
      return { status: "untracked", pnl, reason };
    }

    this.logger.info(`[Paper] SELL ${market} @ ${exitPrice.toFixed(3)} realized ${formatPnl(pnl)}`);
    return { status: "closed", pnl, tradeIds };
  }

  updatePrices(prices: PriceMap): void {
    this.portfolio.updatePrices(prices);
  }

  summary(): PortfolioSummary {
    const { rate, wins, total } = this.tradeLog.winRate();

    return {
      totalValue: this.portfolio.totalValue(),
      cashBalance: this.portfolio.cashBalance,
      positionsCount: this.portfolio.positionCount(),
      realizedPnl: this.portfolio.realizedPnl,
      unrealizedPnl: this.portfolio.unrealizedPnl(),
      totalPnl: this.portfolio.totalPnl(),
      pnlPercent: this.portfolio.pnlPercent(),
      winRate: rate,
      wins,
      totalTrades: total,
      bestTradePnl: this.tradeLog.bestTrade()?.pnl ?? null,
      worstTradePnl: this.tradeLog.worstTrade()?.pnl ?? null,
    };
  }

  /**
   * Reset the portfolio. Trade history is kept for reference.
   */
  reset(): void {
    this.portfolio.reset();
    this.logger.info(
      `[Paper] Portfolio reset to ${formatUsd(this.portfolio.initialBalance)} (trade history kept)`,
    );
  }

  getOpenPositions(): PositionView[] {
    return this.portfolio.getPositions();
  }

  getRecentTrades(n = 10): Readonly<TradeRecord>[] {
    return this.tradeLog.getRecent(n);
  }
}

/**
 * Format a summary as the dashboard's performance block
 */
export function formatSummary(summary: PortfolioSummary): string {
  const orDash = (value: number | null): string => (value === null ? "-" : formatPnl(value));

  return [
    `=== Paper Portfolio ===`,
    `Total Value:   ${formatUsd(summary.totalValue)}`,
    `Cash Balance:  ${formatUsd(summary.cashBalance)}`,
    `Positions:     ${summary.positionsCount}`,
    `Realized:      ${formatPnl(summary.realizedPnl)}`,
    `Unrealized:    ${formatPnl(summary.unrealizedPnl)}`,
    `Total P&L:     ${formatPnl(summary.totalPnl)} (${formatPercent(summary.pnlPercent)})`,
    `Win Rate:      ${formatPercent(summary.winRate * 100, 0)} (${summary.wins}/${summary.totalTrades})`,
    `Best Trade:    ${orDash(summary.bestTradePnl)}`,
    `Worst Trade:   ${orDash(summary.worstTradePnl)}`,
  ].join("\n");
}

export interface PaperEngineOptions {
  /** Directory holding portfolio.json and paper_trades.json */
  dataDir: string;
  initialBalance?: number;
  logger?: Logger;
  persistenceErrors?: PersistenceErrorPolicy;
  /** Override the file-backed stores (tests, in-memory runs) */
  portfolioStore?: SnapshotStore<PortfolioSnapshot>;
  tradeStore?: SnapshotStore<TradeRecord[]>;
}

/**
 * Build an engine over JSON files in `dataDir`, loading any saved state
 */
export function createPaperTradingEngine(options: PaperEngineOptions): PaperTradingEngine {
  const logger = options.logger ?? createNullLogger();
  const ledgerOptions: LedgerOptions = {
    logger,
    persistenceErrors: options.persistenceErrors ?? "warn",
  };

  const portfolioStore =
    options.portfolioStore ??
    new JsonFileStore(path.join(options.dataDir, PORTFOLIO_FILE), decodePortfolioSnapshot);
  const tradeStore =
    options.tradeStore ??
    new JsonFileStore(path.join(options.dataDir, TRADES_FILE), decodeTradeHistory);

  const portfolio = Portfolio.loadOrCreate(
    portfolioStore,
    options.initialBalance ?? DEFAULT_INITIAL_BALANCE,
    ledgerOptions,
  );
  const tradeLog = TradeLog.load(tradeStore, ledgerOptions);

  return new PaperTradingEngine(portfolio, tradeLog, logger);
}
