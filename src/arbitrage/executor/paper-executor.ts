import type { BotConfig } from "../../config";
import { describeError, isAppError } from "../../errors/app.errors";
import { formatUsd, type Logger } from "../../infra/logging";
import type { PaperTradingEngine } from "../../paper";
import type { ExecutionResult, OpportunityExecutor, SpreadOpportunity } from "../types";

export type PaperExecutorConfig = Pick<
  BotConfig,
  "dryRun" | "maxPositionSize" | "minProfitThreshold"
>;

/**
 * Confidence grows with the spread: 0.5 at the threshold, 1 at twice it.
 */
export function spreadConfidence(spread: number, minProfit: number): number {
  if (minProfit <= 0) return 1;
  return Math.max(0, Math.min(1, spread / (2 * minProfit)));
}

/**
 * Records the buy leg of a cross-venue spread in the paper ledger.
 *
 * Nothing reaches a venue: in dry-run mode the opportunity is only logged,
 * otherwise it becomes a paper buy tagged "arbitrage".
 */
export class PaperArbitrageExecutor implements OpportunityExecutor {
  constructor(
    private readonly engine: PaperTradingEngine,
    private readonly config: PaperExecutorConfig,
    private readonly logger: Logger,
  ) {}

  execute(opportunity: SpreadOpportunity): ExecutionResult {
    const { pair } = opportunity;

    if (this.config.dryRun) {
      this.logger.info(
        `[ARB] DRY RUN: would buy ${pair.name} on ${opportunity.buyVenue} @ ${opportunity.buyPrice.toFixed(3)}`,
      );
      return { status: "dry_run" };
    }

    if (this.engine.portfolio.getPosition(pair.name)) {
      return { status: "skipped", reason: "position already open" };
    }

    const cash = this.engine.portfolio.cashBalance;
    if (cash <= 0) {
      return { status: "skipped", reason: "no cash available" };
    }

    const sizeUsd = Math.min(this.config.maxPositionSize, cash);

    try {
      const tradeId = this.engine.buy({
        market: pair.name,
        coin: pair.coin,
        timeframe: pair.timeframe,
        platform: opportunity.buyVenue,
        sizeUsd,
        price: opportunity.buyPrice,
        strategy: "arbitrage",
        confidence: spreadConfidence(opportunity.spread, this.config.minProfitThreshold),
        notes: `hedge: sell ${opportunity.sellVenue} @ ${opportunity.sellPrice.toFixed(3)}`,
      });

      this.logger.info(`[ARB] Paper entry ${formatUsd(sizeUsd)} ${pair.name} (trade ${tradeId})`);
      return { status: "recorded", tradeId, sizeUsd };
    } catch (err) {
      if (!isAppError(err)) throw err;
      this.logger.warn(`[ARB] Paper entry declined for ${pair.name}: ${describeError(err)}`);
      return { status: "skipped", reason: err.message };
    }
  }
}
