/**
 * Paper Trading Types
 *
 * Domain types for the simulated ledger, plus the snake_case documents it
 * persists (portfolio.json / paper_trades.json).
 */

import type { Logger } from "../infra/logging";
import type { PersistenceErrorPolicy } from "../infra/persistence";

// ============================================================================
// Enumerations
// ============================================================================

/** Trade direction: Buy holds YES, Sell models the NO side */
export type Side = "Buy" | "Sell";

export const SIDES: readonly Side[] = ["Buy", "Sell"];

export type TradeStatus = "Open" | "Closed" | "Cancelled";

export const TRADE_STATUSES: readonly TradeStatus[] = ["Open", "Closed", "Cancelled"];

/** Free-text strategy tag; these are the ones the bot itself writes */
export type KnownStrategy = "arbitrage" | "copy_trade" | "manual";

/** Fails compilation when a switch over a closed union misses a variant */
export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${String(value)}`);
}

// ============================================================================
// Persisted documents
// ============================================================================

export interface PositionRecord {
  market: string;
  coin: string;
  platform: string;
  size: number;
  avg_price: number;
  current_price: number;
  unrealized_pnl: number;
}

/** Frozen copy of a position as the portfolio hands it out */
export type PositionView = Readonly<{
  market: string;
  coin: string;
  platform: string;
  size: number;
  avgPrice: number;
  currentPrice: number;
  unrealizedPnl: number;
  currentValue: number;
  initialValue: number;
}>;

export interface PortfolioSnapshot {
  initial_balance: number;
  cash_balance: number;
  positions: Record<string, PositionRecord>;
  realized_pnl: number;
}

/**
 * One trade lifecycle. `exit_price` and `pnl` are null while Open and set
 * together when the record closes.
 */
export interface TradeRecord {
  id: string;
  /** ISO-8601 UTC instant */
  timestamp: string;
  market: string;
  coin: string;
  timeframe: string;
  platform: string;
  side: Side;
  /** USD notional */
  size: number;
  entry_price: number;
  exit_price: number | null;
  pnl: number | null;
  status: TradeStatus;
  strategy: string;
  confidence: number;
  notes: string | null;
}

// ============================================================================
// Engine API
// ============================================================================

export interface BuyOrder {
  market: string;
  coin: string;
  timeframe: string;
  platform: string;
  sizeUsd: number;
  price: number;
  strategy: KnownStrategy | (string & {});
  confidence: number;
  notes?: string;
}

export type SellOutcome =
  | {
      status: "closed";
      pnl: number;
      /** Trade records closed by this sell */
      tradeIds: string[];
    }
  | {
      /** Portfolio closed but no open trade record matched the market */
      status: "untracked";
      pnl: number;
      reason: string;
    };

export interface WinRate {
  /** wins / total, 0 when nothing has closed */
  rate: number;
  wins: number;
  total: number;
}

export interface PortfolioSummary {
  totalValue: number;
  cashBalance: number;
  positionsCount: number;
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  pnlPercent: number;
  winRate: number;
  wins: number;
  /** Closed trade count */
  totalTrades: number;
  bestTradePnl: number | null;
  worstTradePnl: number | null;
}

/** Options shared by Portfolio and TradeLog */
export interface LedgerOptions {
  logger?: Logger;
  persistenceErrors?: PersistenceErrorPolicy;
}

/** Market id -> mark price */
export type PriceMap = ReadonlyMap<string, number> | Readonly<Record<string, number>>;
