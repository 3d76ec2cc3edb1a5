import type { BotConfig } from "../config";
import { describeError, isAppError } from "../errors/app.errors";
import { formatUsd, type Logger } from "../infra/logging";
import type { PaperTradingEngine } from "../paper";
import type { CopyExecutionResult, CopyTrade, CopyTradeExecutor } from "./types";

export type PaperCopyExecutorConfig = Pick<BotConfig, "dryRun">;

/** Copied trades carry no signal strength of their own */
export const COPY_CONFIDENCE = 0.5;

/** Ledger market for a copied trade: one per outcome */
export function copyMarketName(trade: CopyTrade): string {
  return `${trade.title} (${trade.outcome})`;
}

/**
 * Records copied BUY fills as paper buys tagged "copy_trade".
 *
 * SELL fills are not copied: the trader's entry is unknown, so exits stay
 * with our own sell decisions.
 */
export class PaperCopyExecutor implements CopyTradeExecutor {
  constructor(
    private readonly engine: PaperTradingEngine,
    private readonly config: PaperCopyExecutorConfig,
    private readonly logger: Logger,
  ) {}

  execute(trade: CopyTrade): CopyExecutionResult {
    const market = copyMarketName(trade);

    if (trade.side !== "BUY") {
      this.logger.debug?.(`[Copy] Skipping SELL on ${market}; only BUY trades are copied`);
      return { status: "skipped", reason: "only BUY trades are copied" };
    }

    if (this.config.dryRun) {
      this.logger.info(
        `[Copy] DRY RUN: would buy ${formatUsd(trade.ourSize)} of ${market} @ ${trade.price.toFixed(4)}`,
      );
      return { status: "dry_run" };
    }

    const cash = this.engine.portfolio.cashBalance;
    if (cash <= 0) {
      return { status: "skipped", reason: "no cash available" };
    }

    const sizeUsd = Math.min(trade.ourSize, cash);

    try {
      const tradeId = this.engine.buy({
        market,
        coin: "unknown",
        timeframe: "unknown",
        platform: "polymarket",
        sizeUsd,
        price: trade.price,
        strategy: "copy_trade",
        confidence: COPY_CONFIDENCE,
        notes: `copied from ${trade.traderAddress} (${formatUsd(trade.originalSize)})`,
      });

      this.logger.info(`[Copy] Paper entry ${formatUsd(sizeUsd)} ${market} (trade ${tradeId})`);
      return { status: "recorded", tradeId, sizeUsd };
    } catch (err) {
      if (!isAppError(err)) throw err;
      this.logger.warn(`[Copy] Paper entry declined for ${market}: ${describeError(err)}`);
      return { status: "skipped", reason: err.message };
    }
  }
}
