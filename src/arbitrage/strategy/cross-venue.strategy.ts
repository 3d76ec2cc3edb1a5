import type { MarketPair, SpreadOpportunity, Venue, VenueQuote } from "../types";

function checkDirection(
  pair: MarketPair,
  buyVenue: Venue,
  buyAsk: number | null,
  sellVenue: Venue,
  sellBid: number | null,
  minProfit: number,
  now: number,
): SpreadOpportunity | null {
  if (buyAsk === null || sellBid === null) return null;

  const spread = sellBid - buyAsk;
  if (spread <= minProfit) return null;

  return {
    pair,
    buyVenue,
    sellVenue,
    buyPrice: buyAsk,
    sellPrice: sellBid,
    spread,
    detectedAt: now,
  };
}

/**
 * Compare both venues' books for one pair.
 *
 * Two directions are checked: buy Kalshi / sell Polymarket, then buy
 * Polymarket / sell Kalshi. A direction qualifies when both prices exist and
 * the bid exceeds the ask by more than `minProfit`.
 */
export function findSpreadOpportunities(
  pair: MarketPair,
  polymarket: VenueQuote,
  kalshi: VenueQuote,
  minProfit: number,
  now: number = Date.now(),
): SpreadOpportunity[] {
  const found: SpreadOpportunity[] = [];

  const kalshiToPoly = checkDirection(
    pair,
    "kalshi",
    kalshi.ask,
    "polymarket",
    polymarket.bid,
    minProfit,
    now,
  );
  if (kalshiToPoly) found.push(kalshiToPoly);

  const polyToKalshi = checkDirection(
    pair,
    "polymarket",
    polymarket.ask,
    "kalshi",
    kalshi.bid,
    minProfit,
    now,
  );
  if (polyToKalshi) found.push(polyToKalshi);

  return found;
}
