/**
 * Portfolio - virtual cash and positions for paper trading
 *
 * Tracks:
 * - Cash balance against a fixed initial balance
 * - One position per market at average entry price
 * - Cumulative realized P&L
 *
 * Every mutation writes the full snapshot through to its store. Positions
 * leave the portfolio only as frozen views.
 */

import {
  InsufficientBalanceError,
  PersistenceError,
  PositionNotFoundError,
} from "../errors/app.errors";
import { createNullLogger, formatUsd, type Logger } from "../infra/logging";
import type { SnapshotStore } from "../infra/persistence";
import { Position } from "./position";
import { SnapshotWriter } from "./snapshot-writer";
import type { LedgerOptions, PortfolioSnapshot, PositionView, PriceMap } from "./types";
import {
  assertEntryPrice,
  assertExitPrice,
  assertMarket,
  assertSizeUsd,
  isValidMark,
} from "./validation";

function isPriceMap(prices: PriceMap): prices is ReadonlyMap<string, number> {
  return prices instanceof Map;
}

function priceEntries(prices: PriceMap): Array<[string, number]> {
  if (isPriceMap(prices)) {
    return Array.from(prices.entries());
  }
  return Object.entries(prices);
}

export class Portfolio {
  private readonly logger: Logger;
  private readonly writer: SnapshotWriter<PortfolioSnapshot>;

  /** Starting balance (for reference) */
  readonly initialBalance: number;

  private _cashBalance: number;
  private _realizedPnl: number;
  private readonly positions = new Map<string, Position>();

  private constructor(
    snapshot: PortfolioSnapshot,
    store: SnapshotStore<PortfolioSnapshot>,
    options: LedgerOptions,
  ) {
    this.logger = options.logger ?? createNullLogger();
    this.writer = new SnapshotWriter(
      store,
      options.persistenceErrors ?? "throw",
      this.logger,
      "Portfolio",
    );

    this.initialBalance = snapshot.initial_balance;
    this._cashBalance = snapshot.cash_balance;
    this._realizedPnl = snapshot.realized_pnl;

    for (const [market, record] of Object.entries(snapshot.positions)) {
      this.positions.set(market, Position.fromRecord(record));
    }
  }

  /**
   * Create a fresh portfolio and write it to the store immediately
   */
  static create(
    store: SnapshotStore<PortfolioSnapshot>,
    initialBalance: number,
    options: LedgerOptions = {},
  ): Portfolio {
    const portfolio = new Portfolio(
      {
        initial_balance: initialBalance,
        cash_balance: initialBalance,
        positions: {},
        realized_pnl: 0,
      },
      store,
      options,
    );
    portfolio.save();
    return portfolio;
  }

  /**
   * Load the stored snapshot, or start fresh with `defaultBalance` when the
   * store is empty or its snapshot cannot be decoded
   */
  static loadOrCreate(
    store: SnapshotStore<PortfolioSnapshot>,
    defaultBalance: number,
    options: LedgerOptions = {},
  ): Portfolio {
    const logger = options.logger ?? createNullLogger();

    try {
      const snapshot = store.load();
      if (snapshot) {
        logger.debug?.(`[Portfolio] Loaded snapshot from ${store.describe()}`);
        return new Portfolio(snapshot, store, options);
      }
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      logger.warn(`[Portfolio] ${err.message}; starting fresh with ${formatUsd(defaultBalance)}`);
    }

    return Portfolio.create(store, defaultBalance, options);
  }

  get cashBalance(): number {
    return this._cashBalance;
  }

  get realizedPnl(): number {
    return this._realizedPnl;
  }

  /**
   * Open a new position or add to the existing one in `market`
   */
  openPosition(
    market: string,
    coin: string,
    platform: string,
    sizeUsd: number,
    price: number,
  ): PositionView {
    assertMarket(market);
    assertSizeUsd(sizeUsd);
    assertEntryPrice(price);

    if (sizeUsd > this._cashBalance) {
      throw new InsufficientBalanceError(sizeUsd, this._cashBalance);
    }

    this._cashBalance -= sizeUsd;

    let position = this.positions.get(market);
    if (position) {
      position.addShares(sizeUsd, price);
    } else {
      position = Position.open(market, coin, platform, sizeUsd, price);
      this.positions.set(market, position);
    }

    this.logger.debug?.(
      `[Portfolio] Opened ${formatUsd(sizeUsd)} of ${market} @ ${price} (cash ${formatUsd(this._cashBalance)})`,
    );

    this.save();
    return position.toView();
  }

  /**
   * Close the whole position in `market` at `exitPrice`; returns realized P&L
   */
  closePosition(market: string, exitPrice: number): number {
    const position = this.positions.get(market);
    if (!position) {
      throw new PositionNotFoundError(market);
    }
    assertExitPrice(exitPrice);

    this.positions.delete(market);

    const pnl = position.size * (exitPrice - position.avgPrice);
    this._cashBalance += position.size * exitPrice;
    this._realizedPnl += pnl;

    this.logger.debug?.(`[Portfolio] Closed ${market} @ ${exitPrice} (P&L ${formatUsd(pnl)})`);

    this.save();
    return pnl;
  }

  /**
   * Mark positions whose market appears in `prices`; others keep their mark
   */
  updatePrices(prices: PriceMap): void {
    for (const [market, price] of priceEntries(prices)) {
      const position = this.positions.get(market);
      if (!position) continue;

      if (!isValidMark(price)) {
        this.logger.warn(`[Portfolio] Ignoring invalid price ${price} for ${market}`);
        continue;
      }
      position.updatePnl(price);
    }
    this.save();
  }

  /** Cash plus the marked value of every position */
  totalValue(): number {
    let positionsValue = 0;
    for (const position of this.positions.values()) {
      positionsValue += position.currentValue();
    }
    return this._cashBalance + positionsValue;
  }

  unrealizedPnl(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += position.unrealizedPnl;
    }
    return total;
  }

  totalPnl(): number {
    return this._realizedPnl + this.unrealizedPnl();
  }

  pnlPercent(): number {
    if (this.initialBalance === 0) {
      return 0;
    }
    return (this.totalPnl() / this.initialBalance) * 100;
  }

  positionCount(): number {
    return this.positions.size;
  }

  getPosition(market: string): PositionView | undefined {
    return this.positions.get(market)?.toView();
  }

  getPositions(): PositionView[] {
    return Array.from(this.positions.values(), (position) => position.toView());
  }

  /**
   * Back to the initial balance with no positions
   */
  reset(): void {
    this._cashBalance = this.initialBalance;
    this.positions.clear();
    this._realizedPnl = 0;
    this.save();
  }

  toSnapshot(): PortfolioSnapshot {
    const positions: PortfolioSnapshot["positions"] = {};
    for (const [market, position] of this.positions) {
      positions[market] = position.toRecord();
    }

    return {
      initial_balance: this.initialBalance,
      cash_balance: this._cashBalance,
      positions,
      realized_pnl: this._realizedPnl,
    };
  }

  /** Most recent failed save, cleared by the next successful one */
  getLastPersistenceError(): PersistenceError | null {
    return this.writer.getLastError();
  }

  private save(): void {
    this.writer.write(this.toSnapshot());
  }
}
