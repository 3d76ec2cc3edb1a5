export type Venue = "polymarket" | "kalshi";

/** Top of book on one venue; null when that side is empty */
export type VenueQuote = {
  bid: number | null;
  ask: number | null;
};

/** The same event listed on both venues */
export type MarketPair = {
  name: string;
  coin: string;
  timeframe: string;
  polymarketId: string;
  kalshiTicker: string;
};

export type SpreadOpportunity = {
  pair: MarketPair;
  buyVenue: Venue;
  sellVenue: Venue;
  /** Ask paid on the buy venue */
  buyPrice: number;
  /** Bid received on the sell venue */
  sellPrice: number;
  /** sellPrice - buyPrice, per share */
  spread: number;
  detectedAt: number;
};

export type ExecutionResult =
  | { status: "dry_run" }
  | { status: "recorded"; tradeId: string; sizeUsd: number }
  | { status: "skipped"; reason: string };

export interface QuoteProvider {
  getBestPrices: (venue: Venue, marketId: string) => Promise<VenueQuote>;
}

export interface OpportunityExecutor {
  execute: (opportunity: SpreadOpportunity) => ExecutionResult;
}
