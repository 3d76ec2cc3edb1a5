import assert from "node:assert";
import { describe, test } from "node:test";
import {
  PaperArbitrageExecutor,
  spreadConfidence,
  type PaperExecutorConfig,
} from "../../src/arbitrage/executor/paper-executor";
import type { SpreadOpportunity } from "../../src/arbitrage/types";
import { createCapturingLogger, createTestEngine } from "../helpers/ledger";

function opportunity(overrides: Partial<SpreadOpportunity> = {}): SpreadOpportunity {
  return {
    pair: {
      name: "BTC up 15m",
      coin: "BTC",
      timeframe: "15m",
      polymarketId: "poly-btc-15m",
      kalshiTicker: "KXBTC15M",
    },
    buyVenue: "kalshi",
    sellVenue: "polymarket",
    buyPrice: 0.5,
    sellPrice: 0.75,
    spread: 0.25,
    detectedAt: 0,
    ...overrides,
  };
}

const live: PaperExecutorConfig = {
  dryRun: false,
  maxPositionSize: 100,
  minProfitThreshold: 0.25,
};

describe("spreadConfidence", () => {
  test("scales with the spread and clamps to [0, 1]", () => {
    assert.strictEqual(spreadConfidence(0.25, 0.25), 0.5);
    assert.strictEqual(spreadConfidence(0.5, 0.25), 1);
    assert.strictEqual(spreadConfidence(2, 0.25), 1);
    assert.strictEqual(spreadConfidence(-0.5, 0.25), 0);
    assert.strictEqual(spreadConfidence(0.01, 0), 1);
  });
});

describe("PaperArbitrageExecutor", () => {
  test("dry run only logs", () => {
    const { engine } = createTestEngine();
    const logger = createCapturingLogger();
    const executor = new PaperArbitrageExecutor(engine, { ...live, dryRun: true }, logger);

    assert.deepStrictEqual(executor.execute(opportunity()), { status: "dry_run" });
    assert.strictEqual(engine.tradeLog.size(), 0);
    assert.deepStrictEqual(logger.messages("info"), [
      "[ARB] DRY RUN: would buy BTC up 15m on kalshi @ 0.500",
    ]);
  });

  test("records the buy leg as an arbitrage paper trade", () => {
    const { engine } = createTestEngine();
    const executor = new PaperArbitrageExecutor(engine, live, createCapturingLogger());

    const result = executor.execute(opportunity());

    assert.strictEqual(result.status, "recorded");
    if (result.status !== "recorded") return;
    assert.strictEqual(result.sizeUsd, 100);

    const record = engine.tradeLog.getById(result.tradeId);
    assert.ok(record);
    assert.strictEqual(record.market, "BTC up 15m");
    assert.strictEqual(record.platform, "kalshi");
    assert.strictEqual(record.strategy, "arbitrage");
    assert.strictEqual(record.entry_price, 0.5);
    assert.strictEqual(record.confidence, 0.5);
    assert.strictEqual(record.notes, "hedge: sell polymarket @ 0.750");
    assert.strictEqual(engine.portfolio.cashBalance, 900);
  });

  test("skips a market that already has a position", () => {
    const { engine } = createTestEngine();
    const executor = new PaperArbitrageExecutor(engine, live, createCapturingLogger());
    executor.execute(opportunity());

    assert.deepStrictEqual(executor.execute(opportunity()), {
      status: "skipped",
      reason: "position already open",
    });
    assert.strictEqual(engine.tradeLog.size(), 1);
  });

  test("sizes down to the remaining cash", () => {
    const { engine } = createTestEngine(40);
    const executor = new PaperArbitrageExecutor(engine, live, createCapturingLogger());

    const result = executor.execute(opportunity());

    assert.strictEqual(result.status, "recorded");
    assert.strictEqual(engine.portfolio.cashBalance, 0);
  });

  test("skips when there is no cash", () => {
    const { engine } = createTestEngine(0);
    const executor = new PaperArbitrageExecutor(engine, live, createCapturingLogger());

    assert.deepStrictEqual(executor.execute(opportunity()), {
      status: "skipped",
      reason: "no cash available",
    });
  });

  test("a ledger rejection becomes a skip", () => {
    const { engine } = createTestEngine();
    const logger = createCapturingLogger();
    const executor = new PaperArbitrageExecutor(engine, live, logger);

    const result = executor.execute(opportunity({ buyPrice: 0 }));

    assert.deepStrictEqual(result, {
      status: "skipped",
      reason: "Invalid price (0): must be within (0, 1]",
    });
    assert.deepStrictEqual(logger.messages("warn"), [
      "[ARB] Paper entry declined for BTC up 15m: [INVALID_TRADE_INPUT] Invalid price (0): must be within (0, 1]",
    ]);
  });
});
