#!/usr/bin/env node
/**
 * Paper Trading CLI Command
 *
 * Drives the paper ledger from the terminal:
 * - status / positions / trades: read the portfolio and trade history
 * - buy / sell: simulated entries and exits
 * - mark: update mark prices
 * - reset: back to the initial balance (history kept)
 *
 * Usage:
 *   npm run paper -- status
 *   npm run paper -- buy BTC-UP-15M 0.42 25 --coin BTC --timeframe 15m
 *   npm run paper -- sell BTC-UP-15M 0.58
 */

import { config as loadEnv } from "dotenv";
import { parseArgs } from "util";
import { loadBotConfig, type BotConfig } from "../config";
import {
  describeError,
  InvalidTradeInputError,
  isAppError,
  toError,
} from "../errors/app.errors";
import {
  createLogger,
  formatPnl,
  formatPriceCents,
  formatUsd,
  truncate,
  type Logger,
} from "../infra/logging";
import { createPaperTradingEngine, formatSummary, type PaperTradingEngine } from "../paper";

export const USAGE = [
  "Usage: paper <command> [args]",
  "  status                              portfolio summary",
  "  positions                           open positions",
  "  trades [n]                          last n trades (default 10)",
  "  buy <market> <price> [sizeUsd]      paper buy; flags: --coin --timeframe --platform --strategy --confidence --note",
  "  sell <market> <price>               close the whole position",
  "  mark <market>=<price> ...           update mark prices",
  "  reset                               reset the portfolio (trade history is kept)",
].join("\n");

export const EXIT_OK = 0;
export const EXIT_DECLINED = 1;
export const EXIT_USAGE = 2;

export interface PaperCommandDeps {
  engine: PaperTradingEngine;
  config: Pick<BotConfig, "defaultTradeUsd">;
  logger: Logger;
}

class UsageError extends Error {}

function parseNumberArg(field: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new UsageError(`missing ${field}`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidTradeInputError(field, raw, "not a number");
  }
  return value;
}

function printLines(logger: Logger, text: string): void {
  for (const line of text.split("\n")) {
    logger.info(line);
  }
}

function showPositions(engine: PaperTradingEngine, logger: Logger): void {
  const positions = engine.getOpenPositions();
  if (positions.length === 0) {
    logger.info("No open positions");
    return;
  }
  for (const p of positions) {
    logger.info(
      `${truncate(p.market, 32)} [${p.platform}] ${p.size.toFixed(2)} sh @ ${formatPriceCents(p.avgPrice)} -> ${formatPriceCents(p.currentPrice)} ${formatPnl(p.unrealizedPnl)}`,
    );
  }
}

function showTrades(engine: PaperTradingEngine, logger: Logger, rawCount: string | undefined): void {
  const count = rawCount === undefined ? 10 : parseNumberArg("count", rawCount);
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidTradeInputError("count", rawCount, "must be a positive integer");
  }

  const trades = engine.getRecentTrades(count);
  if (trades.length === 0) {
    logger.info("No trades recorded");
    return;
  }
  for (const t of trades) {
    const pnl = t.pnl === null ? "" : ` ${formatPnl(t.pnl)}`;
    logger.info(
      `${t.timestamp} ${t.side.toUpperCase()} ${truncate(t.market, 32)} ${formatUsd(t.size)} @ ${t.entry_price.toFixed(3)} ${t.status}${pnl}`,
    );
  }
}

function parseBuyArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        coin: { type: "string" },
        timeframe: { type: "string" },
        platform: { type: "string" },
        strategy: { type: "string" },
        confidence: { type: "string" },
        note: { type: "string" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(toError(err).message);
  }
}

function runBuy(args: string[], deps: PaperCommandDeps): void {
  const { values, positionals } = parseBuyArgs(args);

  const [market, rawPrice, rawSize]: Array<string | undefined> = positionals;
  if (market === undefined) {
    throw new UsageError("missing market");
  }
  const price = parseNumberArg("price", rawPrice);
  const sizeUsd =
    rawSize === undefined ? deps.config.defaultTradeUsd : parseNumberArg("sizeUsd", rawSize);
  const confidence =
    values.confidence === undefined ? 0.5 : parseNumberArg("confidence", values.confidence);

  const tradeId = deps.engine.buy({
    market,
    coin: values.coin ?? "unknown",
    timeframe: values.timeframe ?? "unknown",
    platform: values.platform ?? "polymarket",
    sizeUsd,
    price,
    strategy: values.strategy ?? "manual",
    confidence,
    notes: values.note,
  });

  deps.logger.info(`Bought ${formatUsd(sizeUsd)} of ${market} @ ${price.toFixed(2)} (trade ${tradeId})`);
}

function runSell(args: string[], deps: PaperCommandDeps): void {
  const [market, rawPrice]: Array<string | undefined> = args;
  if (market === undefined) {
    throw new UsageError("missing market");
  }
  const exitPrice = parseNumberArg("price", rawPrice);

  const outcome = deps.engine.sell(market, exitPrice);
  deps.logger.info(`Sold ${market} for ${formatPnl(outcome.pnl)} P&L`);

  switch (outcome.status) {
    case "closed":
      return;
    case "untracked":
      deps.logger.warn(`Trade log not updated: ${outcome.reason}`);
      return;
  }
}

function runMark(args: string[], deps: PaperCommandDeps): void {
  if (args.length === 0) {
    throw new UsageError("mark needs at least one <market>=<price>");
  }

  const prices = new Map<string, number>();
  for (const arg of args) {
    const eq = arg.lastIndexOf("=");
    if (eq <= 0) {
      throw new UsageError(`expected <market>=<price>, got "${arg}"`);
    }
    prices.set(arg.slice(0, eq), parseNumberArg("price", arg.slice(eq + 1)));
  }

  deps.engine.updatePrices(prices);
  deps.logger.info(`Marked ${prices.size} market(s)`);
}

/**
 * Run one CLI command against `deps.engine`; returns the process exit code
 */
export function runPaperCommand(argv: string[], deps: PaperCommandDeps): number {
  const command: string | undefined = argv[0];
  const args = argv.slice(1);
  const { engine, logger } = deps;

  try {
    switch (command) {
      case "status":
        printLines(logger, formatSummary(engine.summary()));
        return EXIT_OK;
      case "positions":
        showPositions(engine, logger);
        return EXIT_OK;
      case "trades":
        showTrades(engine, logger, args[0]);
        return EXIT_OK;
      case "buy":
        runBuy(args, deps);
        return EXIT_OK;
      case "sell":
        runSell(args, deps);
        return EXIT_OK;
      case "mark":
        runMark(args, deps);
        return EXIT_OK;
      case "reset":
        engine.reset();
        logger.info(`Portfolio reset to ${formatUsd(engine.portfolio.initialBalance)}`);
        return EXIT_OK;
      case undefined:
      case "help":
        printLines(logger, USAGE);
        return command === undefined ? EXIT_USAGE : EXIT_OK;
      default:
        logger.error(`Unknown command: ${command}`);
        printLines(logger, USAGE);
        return EXIT_USAGE;
    }
  } catch (err) {
    if (isAppError(err)) {
      logger.error(`${command} failed: ${describeError(err)}`);
      return EXIT_DECLINED;
    }
    if (err instanceof UsageError) {
      logger.error(`${command}: ${err.message}`);
      printLines(logger, USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }
}

function main(): void {
  loadEnv();

  const config = loadBotConfig();
  const logger = createLogger({ level: config.logLevel });
  const engine = createPaperTradingEngine({
    dataDir: config.dataDir,
    initialBalance: config.initialBalance,
    persistenceErrors: config.persistenceErrors,
    logger,
  });

  process.exitCode = runPaperCommand(process.argv.slice(2), { engine, config, logger });
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error("Fatal error:", describeError(error));
    process.exit(1);
  }
}
