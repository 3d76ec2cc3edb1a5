import type { PositionRecord, PositionView } from "./types";

/**
 * One open holding in one market, tracked at average entry price.
 *
 * `unrealizedPnl` is always derived from size, average and mark; nothing
 * assigns it directly.
 */
export class Position {
  private _unrealizedPnl = 0;

  constructor(
    readonly market: string,
    readonly coin: string,
    readonly platform: string,
    private _size: number,
    private _avgPrice: number,
    private _currentPrice: number = _avgPrice,
  ) {
    this.updatePnl(_currentPrice);
  }

  /** Open a position by spending `sizeUsd` at `price` */
  static open(
    market: string,
    coin: string,
    platform: string,
    sizeUsd: number,
    price: number,
  ): Position {
    return new Position(market, coin, platform, sizeUsd / price, price, price);
  }

  static fromRecord(record: PositionRecord): Position {
    return new Position(
      record.market,
      record.coin,
      record.platform,
      record.size,
      record.avg_price,
      record.current_price,
    );
  }

  get size(): number {
    return this._size;
  }

  get avgPrice(): number {
    return this._avgPrice;
  }

  get currentPrice(): number {
    return this._currentPrice;
  }

  get unrealizedPnl(): number {
    return this._unrealizedPnl;
  }

  /** Mark to `currentPrice` and recompute unrealized P&L */
  updatePnl(currentPrice: number): void {
    this._currentPrice = currentPrice;
    this._unrealizedPnl = this._size * (currentPrice - this._avgPrice);
  }

  /**
   * Add `sizeUsd` worth of shares bought at `price`, blending the average.
   * The mark is left where it was.
   */
  addShares(sizeUsd: number, price: number): void {
    const shares = sizeUsd / price;
    const totalShares = this._size + shares;
    const totalCost = this._size * this._avgPrice + sizeUsd;

    this._avgPrice = totalCost / totalShares;
    this._size = totalShares;
    this.updatePnl(this._currentPrice);
  }

  currentValue(): number {
    return this._size * this._currentPrice;
  }

  initialValue(): number {
    return this._size * this._avgPrice;
  }

  toView(): PositionView {
    return Object.freeze({
      market: this.market,
      coin: this.coin,
      platform: this.platform,
      size: this._size,
      avgPrice: this._avgPrice,
      currentPrice: this._currentPrice,
      unrealizedPnl: this._unrealizedPnl,
      currentValue: this.currentValue(),
      initialValue: this.initialValue(),
    });
  }

  toRecord(): PositionRecord {
    return {
      market: this.market,
      coin: this.coin,
      platform: this.platform,
      size: this._size,
      avg_price: this._avgPrice,
      current_price: this._currentPrice,
      unrealized_pnl: this._unrealizedPnl,
    };
  }
}
