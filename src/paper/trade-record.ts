/**
 * Trade records - one logical buy/sell lifecycle per record.
 *
 * Open -> Closed sets exit price and P&L together, once.
 * Open -> Cancelled sets neither.
 */

import { randomUUID } from "crypto";
import { TradeStateError } from "../errors/app.errors";
import { assertNever, type Side, type TradeRecord } from "./types";

export interface NewTradeInput {
  market: string;
  coin: string;
  timeframe: string;
  platform: string;
  side: Side;
  /** USD notional */
  size: number;
  entryPrice: number;
  strategy: string;
  confidence: number;
  notes?: string;
}

export function createTradeRecord(input: NewTradeInput, now: Date = new Date()): TradeRecord {
  return {
    id: randomUUID(),
    timestamp: now.toISOString(),
    market: input.market,
    coin: input.coin,
    timeframe: input.timeframe,
    platform: input.platform,
    side: input.side,
    size: input.size,
    entry_price: input.entryPrice,
    exit_price: null,
    pnl: null,
    status: "Open",
    strategy: input.strategy,
    confidence: input.confidence,
    notes: input.notes ?? null,
  };
}

/** Shares bought with the record's USD notional at its entry price */
export function tradeShares(record: TradeRecord): number {
  return record.size / record.entry_price;
}

/**
 * P&L of closing `record` at `exitPrice`.
 * Buy holds YES: profit when the price rises.
 * Sell holds NO: profit when the price falls.
 */
export function computeTradePnl(record: TradeRecord, exitPrice: number): number {
  const shares = tradeShares(record);
  switch (record.side) {
    case "Buy":
      return shares * (exitPrice - record.entry_price);
    case "Sell":
      return shares * (record.entry_price - exitPrice);
    default:
      return assertNever(record.side);
  }
}

function assertOpen(record: TradeRecord, action: string): void {
  switch (record.status) {
    case "Open":
      return;
    case "Closed":
    case "Cancelled":
      throw new TradeStateError(record.id, record.status, action);
    default:
      assertNever(record.status);
  }
}

/** Close an open record in place */
export function closeTradeRecord(record: TradeRecord, exitPrice: number): TradeRecord {
  assertOpen(record, "close");

  record.exit_price = exitPrice;
  record.pnl = computeTradePnl(record, exitPrice);
  record.status = "Closed";
  return record;
}

/** Cancel an open record in place, optionally noting why */
export function cancelTradeRecord(record: TradeRecord, note?: string): TradeRecord {
  assertOpen(record, "cancel");

  record.status = "Cancelled";
  if (note !== undefined) {
    record.notes = record.notes ? `${record.notes}; ${note}` : note;
  }
  return record;
}

export function isProfitable(record: TradeRecord): boolean {
  return record.pnl !== null && record.pnl > 0;
}
