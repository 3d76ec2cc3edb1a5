/**
 * Input checks applied where sizes and prices enter the ledger, so every
 * stored P&L is a finite number.
 */

import { InvalidTradeInputError } from "../errors/app.errors";

export function assertMarket(market: string): void {
  if (market.trim().length === 0) {
    throw new InvalidTradeInputError("market", market, "must not be empty");
  }
}

export function assertSizeUsd(sizeUsd: number): void {
  if (!Number.isFinite(sizeUsd) || sizeUsd <= 0) {
    throw new InvalidTradeInputError("sizeUsd", sizeUsd, "must be a positive amount");
  }
}

/** Entry prices are probabilities in (0, 1]; zero would mean infinite shares */
export function assertEntryPrice(price: number): void {
  if (!Number.isFinite(price) || price <= 0 || price > 1) {
    throw new InvalidTradeInputError("price", price, "must be within (0, 1]");
  }
}

/** Exit prices may reach 0 when a market resolves against the position */
export function assertExitPrice(price: number): void {
  if (!isValidMark(price)) {
    throw new InvalidTradeInputError("exitPrice", price, "must be within [0, 1]");
  }
}

export function assertConfidence(confidence: number): void {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new InvalidTradeInputError("confidence", confidence, "must be within [0, 1]");
  }
}

export function isValidMark(price: number): boolean {
  return Number.isFinite(price) && price >= 0 && price <= 1;
}
