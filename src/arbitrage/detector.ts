import type { BotConfig } from "../config";
import { describeError } from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import { findSpreadOpportunities } from "./strategy/cross-venue.strategy";
import type {
  MarketPair,
  OpportunityExecutor,
  QuoteProvider,
  SpreadOpportunity,
} from "./types";

export type DetectorConfig = Pick<BotConfig, "minProfitThreshold" | "scanIntervalMs">;

/**
 * Polls both venues for every matched pair and hands qualifying spreads to
 * the executor.
 */
export class ArbitrageDetector {
  private readonly provider: QuoteProvider;
  private readonly pairs: readonly MarketPair[];
  private readonly executor?: OpportunityExecutor;
  private readonly config: DetectorConfig;
  private readonly logger: Logger;
  private running = false;
  /** Bumped by every start(); a loop whose generation is stale exits */
  private generation = 0;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeSleeper: (() => void) | null = null;

  constructor(params: {
    provider: QuoteProvider;
    pairs: readonly MarketPair[];
    executor?: OpportunityExecutor;
    config: DetectorConfig;
    logger: Logger;
  }) {
    this.provider = params.provider;
    this.pairs = params.pairs;
    this.executor = params.executor;
    this.config = params.config;
    this.logger = params.logger;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const generation = ++this.generation;

    this.logger.info(`[ARB] Monitoring ${this.pairs.length} market pair(s)`);
    while (this.isCurrent(generation)) {
      const startedAt = Date.now();
      await this.scanOnce(startedAt);
      if (!this.isCurrent(generation)) break;

      const elapsed = Date.now() - startedAt;
      await this.sleep(Math.max(0, this.config.scanIntervalMs - elapsed));
    }
  }

  /**
   * Stop the loop. A pending wait between scans ends immediately; a scan in
   * flight finishes and its loop then exits.
   */
  stop(): void {
    this.running = false;
    this.cancelSleep();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Check one pair. Quote failures propagate to the caller.
   */
  async checkOpportunity(pair: MarketPair, now: number = Date.now()): Promise<SpreadOpportunity[]> {
    this.logger.debug?.(`[ARB] Checking ${pair.name}`);

    const polymarket = await this.provider.getBestPrices("polymarket", pair.polymarketId);
    const kalshi = await this.provider.getBestPrices("kalshi", pair.kalshiTicker);

    const opportunities = findSpreadOpportunities(
      pair,
      polymarket,
      kalshi,
      this.config.minProfitThreshold,
      now,
    );

    for (const opp of opportunities) {
      this.logger.info(
        `[ARB] Opportunity: buy ${opp.buyVenue} @ ${opp.buyPrice.toFixed(3)}, sell ${opp.sellVenue} @ ${opp.sellPrice.toFixed(3)} | spread ${(opp.spread * 100).toFixed(2)}% (${pair.name})`,
      );
    }
    return opportunities;
  }

  /**
   * One pass over every pair. A failing pair is logged and skipped.
   */
  async scanOnce(now: number = Date.now()): Promise<SpreadOpportunity[]> {
    const found: SpreadOpportunity[] = [];
    let failures = 0;

    for (const pair of this.pairs) {
      try {
        found.push(...(await this.checkOpportunity(pair, now)));
      } catch (err) {
        failures++;
        this.logger.warn(`[ARB] Quote error for ${pair.name}: ${describeError(err)}`);
      }
    }

    this.logger.debug?.(
      `[ARB] Scan complete: ${found.length} opportunity(ies) across ${this.pairs.length} pair(s), ${failures} failure(s)`,
    );

    if (this.executor) {
      for (const opportunity of found) {
        const result = this.executor.execute(opportunity);
        if (result.status === "skipped") {
          this.logger.debug?.(`[ARB] Skipped ${opportunity.pair.name}: ${result.reason}`);
        }
      }
    }

    return found;
  }

  private isCurrent(generation: number): boolean {
    return this.running && this.generation === generation;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeSleeper = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeSleeper = null;
        resolve();
      }, ms);
    });
  }

  private cancelSleep(): void {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wakeSleeper;
    this.wakeSleeper = null;
    wake?.();
  }
}
