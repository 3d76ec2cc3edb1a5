/**
 * Trade Log - append-only history of paper trades
 *
 * Records are kept in insertion (chronological) order and are never
 * removed; closing or cancelling updates a record in place. Every mutation
 * writes the whole sequence through to its store.
 */

import { DuplicateTradeError, PersistenceError } from "../errors/app.errors";
import { createNullLogger, type Logger } from "../infra/logging";
import type { SnapshotStore } from "../infra/persistence";
import { SnapshotWriter } from "./snapshot-writer";
import { cancelTradeRecord, closeTradeRecord, isProfitable } from "./trade-record";
import type { LedgerOptions, TradeRecord, WinRate } from "./types";
import { assertExitPrice } from "./validation";

export class TradeLog {
  private readonly writer: SnapshotWriter<TradeRecord[]>;
  private readonly ids = new Set<string>();

  private constructor(
    private readonly trades: TradeRecord[],
    store: SnapshotStore<TradeRecord[]>,
    options: LedgerOptions,
  ) {
    this.writer = new SnapshotWriter(
      store,
      options.persistenceErrors ?? "throw",
      options.logger ?? createNullLogger(),
      "TradeLog",
    );
    for (const trade of trades) {
      this.ids.add(trade.id);
    }
  }

  /**
   * Load history from the store; an empty or undecodable store yields an
   * empty log
   */
  static load(store: SnapshotStore<TradeRecord[]>, options: LedgerOptions = {}): TradeLog {
    const logger: Logger = options.logger ?? createNullLogger();

    let trades: TradeRecord[] = [];
    try {
      trades = store.load() ?? [];
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      logger.warn(`[TradeLog] ${err.message}; starting with empty history`);
    }

    return new TradeLog(trades, store, options);
  }

  addTrade(trade: TradeRecord): void {
    if (this.ids.has(trade.id)) {
      throw new DuplicateTradeError(trade.id);
    }
    this.trades.push(trade);
    this.ids.add(trade.id);
    this.save();
  }

  /**
   * Close the record with `id` at `exitPrice`.
   * Returns false when no record has that id.
   */
  closeTrade(id: string, exitPrice: number): boolean {
    const trade = this.trades.find((t) => t.id === id);
    if (!trade) return false;

    assertExitPrice(exitPrice);
    closeTradeRecord(trade, exitPrice);
    this.save();
    return true;
  }

  /**
   * Cancel the open record with `id`.
   * Returns false when no record has that id.
   */
  cancelTrade(id: string, note?: string): boolean {
    const trade = this.trades.find((t) => t.id === id);
    if (!trade) return false;

    cancelTradeRecord(trade, note);
    this.save();
    return true;
  }

  getAll(): readonly Readonly<TradeRecord>[] {
    return this.trades;
  }

  getById(id: string): Readonly<TradeRecord> | undefined {
    return this.trades.find((t) => t.id === id);
  }

  getOpen(): Readonly<TradeRecord>[] {
    return this.trades.filter((t) => t.status === "Open");
  }

  getClosed(): Readonly<TradeRecord>[] {
    return this.trades.filter((t) => t.status === "Closed");
  }

  /** Open records for `market`, oldest first */
  findOpenByMarket(market: string): Readonly<TradeRecord>[] {
    return this.trades.filter((t) => t.status === "Open" && t.market === market);
  }

  /** Last `n` records, newest first */
  getRecent(n: number): Readonly<TradeRecord>[] {
    if (n <= 0) return [];
    return this.trades.slice(-n).reverse();
  }

  /** Sum of every recorded P&L */
  totalPnl(): number {
    let total = 0;
    for (const trade of this.trades) {
      if (trade.pnl !== null) total += trade.pnl;
    }
    return total;
  }

  winRate(): WinRate {
    const closed = this.getClosed();
    if (closed.length === 0) {
      return { rate: 0, wins: 0, total: 0 };
    }
    const wins = closed.filter((t) => isProfitable(t)).length;
    return { rate: wins / closed.length, wins, total: closed.length };
  }

  /** Highest-P&L record among those that carry a P&L */
  bestTrade(): Readonly<TradeRecord> | undefined {
    return this.pickByPnl((candidate, current) => candidate > current);
  }

  /** Lowest-P&L record among those that carry a P&L */
  worstTrade(): Readonly<TradeRecord> | undefined {
    return this.pickByPnl((candidate, current) => candidate < current);
  }

  size(): number {
    return this.trades.length;
  }

  getLastPersistenceError(): PersistenceError | null {
    return this.writer.getLastError();
  }

  private pickByPnl(
    better: (candidate: number, current: number) => boolean,
  ): Readonly<TradeRecord> | undefined {
    let picked: TradeRecord | undefined;
    let pickedPnl = 0;

    for (const trade of this.trades) {
      if (trade.pnl === null) continue;
      if (picked === undefined || better(trade.pnl, pickedPnl)) {
        picked = trade;
        pickedPnl = trade.pnl;
      }
    }
    return picked;
  }

  private save(): void {
    this.writer.write(this.trades);
  }
}
