export type TradeSide = "BUY" | "SELL";

/** One fill from a watched trader's activity feed */
export type TraderActivity = {
  conditionId: string;
  /** Outcome token id */
  asset: string;
  side: TradeSide;
  /** USD notional of the fill */
  usdcSize: number;
  price: number;
  /** Fill time, epoch milliseconds */
  timestamp: number;
  transactionHash: string;
  title: string;
  eventSlug: string;
  outcome: string;
};

export type TraderPosition = {
  conditionId: string;
  title: string;
  size: number;
  currentValue: number;
};

/**
 * Source of trader activity and holdings. HTTP clients live behind this
 * interface; the copy trader never talks to a venue itself.
 */
export interface ActivityProvider {
  getRecentActivity(address: string, limit: number): Promise<TraderActivity[]>;
  getPositions(address: string): Promise<TraderPosition[]>;
}

/** A trader's fill, rescaled to our portfolio */
export type CopyTrade = {
  traderAddress: string;
  conditionId: string;
  asset: string;
  side: TradeSide;
  /** Trader's USD size */
  originalSize: number;
  /** Our USD size after scaling and the cap */
  ourSize: number;
  price: number;
  title: string;
  eventSlug: string;
  outcome: string;
};

export type TraderSummary = {
  address: string;
  totalValue: number;
  positionCount: number;
};

export type CopyExecutionResult =
  | { status: "dry_run" }
  | { status: "recorded"; tradeId: string; sizeUsd: number }
  | { status: "skipped"; reason: string };

export interface CopyTradeExecutor {
  execute(trade: CopyTrade): CopyExecutionResult;
}
