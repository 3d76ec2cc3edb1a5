/**
 * Copy Trader
 *
 * Polls the activity of watched wallets and turns each new fill into a
 * CopyTrade sized to our portfolio:
 * - fills already seen (by transaction hash) are skipped
 * - fills below the minimum USD size are skipped
 * - fills older than an hour are skipped
 * - our size = trader size * (our value / trader value), capped
 */

import type { BotConfig } from "../config";
import { describeError } from "../errors/app.errors";
import { formatUsd, type Logger } from "../infra/logging";
import type {
  ActivityProvider,
  CopyTrade,
  TraderActivity,
  TraderPosition,
  TraderSummary,
} from "./types";

export type CopyTraderConfig = Pick<
  BotConfig,
  "copyTargetTraders" | "copyMinTradeSize" | "copyMaxPositionSize" | "copyOurAddress"
>;

export const ACTIVITY_FETCH_LIMIT = 25;
export const MAX_ACTIVITY_AGE_MS = 60 * 60 * 1000;
/** Our value when it cannot be looked up */
export const FALLBACK_OUR_VALUE = 1000;
/** A trader's value when it cannot be looked up */
export const FALLBACK_TRADER_VALUE = 100_000;

function shortAddress(address: string): string {
  return address.slice(0, 8);
}

function sumCurrentValue(positions: readonly TraderPosition[]): number {
  return positions.reduce((total, position) => total + position.currentValue, 0);
}

export class CopyTrader {
  private readonly provider: ActivityProvider;
  private readonly config: CopyTraderConfig;
  private readonly logger: Logger;
  private readonly ourValue?: () => number;
  private readonly processedHashes = new Set<string>();

  constructor(params: {
    provider: ActivityProvider;
    config: CopyTraderConfig;
    logger: Logger;
    /** Sizes trades off this value instead of `copyOurAddress` holdings */
    ourValue?: () => number;
  }) {
    this.provider = params.provider;
    this.config = params.config;
    this.logger = params.logger;
    this.ourValue = params.ourValue;
  }

  /**
   * New fills across every watched trader, in feed order per trader.
   * A trader whose activity cannot be fetched is logged and skipped.
   */
  async scanForNewTrades(now: number = Date.now()): Promise<CopyTrade[]> {
    const trades: CopyTrade[] = [];
    const ourValue = await this.resolveOurValue();

    for (const trader of this.config.copyTargetTraders) {
      let activities: TraderActivity[];
      try {
        activities = await this.provider.getRecentActivity(trader, ACTIVITY_FETCH_LIMIT);
      } catch (err) {
        this.logger.warn(
          `[Copy] Activity fetch failed for ${shortAddress(trader)}: ${describeError(err)}`,
        );
        continue;
      }

      const traderValue = await this.resolveTraderValue(trader);
      const ratio = ourValue / traderValue;
      this.logger.debug?.(
        `[Copy] Size ratio for ${shortAddress(trader)}: ${ratio.toFixed(6)} (ours ${formatUsd(ourValue)}, trader ${formatUsd(traderValue)})`,
      );

      for (const activity of activities) {
        const trade = this.toCopyTrade(trader, activity, ratio, now);
        if (trade) trades.push(trade);
      }
    }

    return trades;
  }

  /** Value and open position count per watched trader */
  async getTraderSummaries(): Promise<TraderSummary[]> {
    const summaries: TraderSummary[] = [];
    for (const address of this.config.copyTargetTraders) {
      const positions = await this.fetchPositions(address);
      summaries.push({
        address,
        totalValue: positions ? sumCurrentValue(positions) : 0,
        positionCount: positions ? positions.length : 0,
      });
    }
    return summaries;
  }

  /** Transaction hashes already turned into copy trades */
  processedCount(): number {
    return this.processedHashes.size;
  }

  private toCopyTrade(
    trader: string,
    activity: TraderActivity,
    ratio: number,
    now: number,
  ): CopyTrade | null {
    if (this.processedHashes.has(activity.transactionHash)) return null;
    if (activity.usdcSize < this.config.copyMinTradeSize) return null;
    if (now - activity.timestamp > MAX_ACTIVITY_AGE_MS) return null;

    const ourSize = Math.min(activity.usdcSize * ratio, this.config.copyMaxPositionSize);
    this.processedHashes.add(activity.transactionHash);

    this.logger.info(
      `[Copy] New trade from ${shortAddress(trader)}: ${activity.side} ${activity.outcome} @ $${activity.price.toFixed(4)} (${formatUsd(activity.usdcSize)} -> ${formatUsd(ourSize)})`,
    );

    return {
      traderAddress: trader,
      conditionId: activity.conditionId,
      asset: activity.asset,
      side: activity.side,
      originalSize: activity.usdcSize,
      ourSize,
      price: activity.price,
      title: activity.title,
      eventSlug: activity.eventSlug,
      outcome: activity.outcome,
    };
  }

  private async resolveOurValue(): Promise<number> {
    if (this.ourValue) return this.ourValue();
    if (!this.config.copyOurAddress) return FALLBACK_OUR_VALUE;

    const positions = await this.fetchPositions(this.config.copyOurAddress);
    return positions ? sumCurrentValue(positions) : FALLBACK_OUR_VALUE;
  }

  private async resolveTraderValue(address: string): Promise<number> {
    const positions = await this.fetchPositions(address);
    if (!positions) return FALLBACK_TRADER_VALUE;

    const value = sumCurrentValue(positions);
    return value > 0 ? value : FALLBACK_TRADER_VALUE;
  }

  /** Positions for `address`, or null (logged) when the lookup fails */
  private async fetchPositions(address: string): Promise<TraderPosition[] | null> {
    try {
      return await this.provider.getPositions(address);
    } catch (err) {
      this.logger.warn(
        `[Copy] Position lookup failed for ${shortAddress(address)}: ${describeError(err)}`,
      );
      return null;
    }
  }
}
