import assert from "node:assert";
import { describe, test } from "node:test";
import { ArbitrageDetector } from "../../src/arbitrage/detector";
import type {
  ExecutionResult,
  MarketPair,
  OpportunityExecutor,
  QuoteProvider,
  SpreadOpportunity,
  Venue,
  VenueQuote,
} from "../../src/arbitrage/types";
import { createCapturingLogger } from "../helpers/ledger";

function pair(name: string): MarketPair {
  return {
    name,
    coin: "BTC",
    timeframe: "15m",
    polymarketId: `poly-${name}`,
    kalshiTicker: `KX-${name}`,
  };
}

class FakeProvider implements QuoteProvider {
  readonly calls: Array<[Venue, string]> = [];
  onCall?: () => void;

  constructor(private readonly quotes: Record<string, VenueQuote>) {}

  async getBestPrices(venue: Venue, marketId: string): Promise<VenueQuote> {
    this.calls.push([venue, marketId]);
    this.onCall?.();
    const quote = this.quotes[marketId];
    if (!quote) throw new Error(`no book for ${marketId}`);
    return quote;
  }
}

class RecordingExecutor implements OpportunityExecutor {
  readonly seen: SpreadOpportunity[] = [];

  execute(opportunity: SpreadOpportunity): ExecutionResult {
    this.seen.push(opportunity);
    return { status: "skipped", reason: "test" };
  }
}

const quotes: Record<string, VenueQuote> = {
  "poly-wide": { bid: 0.75, ask: 0.8 },
  "KX-wide": { bid: 0.25, ask: 0.5 },
  "poly-flat": { bid: 0.5, ask: 0.5 },
  "KX-flat": { bid: 0.5, ask: 0.5 },
};

describe("ArbitrageDetector", () => {
  test("checkOpportunity asks Polymarket then Kalshi and logs each find", async () => {
    const provider = new FakeProvider(quotes);
    const logger = createCapturingLogger();
    const detector = new ArbitrageDetector({
      provider,
      pairs: [],
      config: { minProfitThreshold: 0.02, scanIntervalMs: 0 },
      logger,
    });

    const found = await detector.checkOpportunity(pair("wide"), 42);

    assert.deepStrictEqual(provider.calls, [
      ["polymarket", "poly-wide"],
      ["kalshi", "KX-wide"],
    ]);
    assert.strictEqual(found.length, 1);
    assert.strictEqual(found[0].detectedAt, 42);
    assert.deepStrictEqual(logger.messages("info"), [
      "[ARB] Opportunity: buy kalshi @ 0.500, sell polymarket @ 0.750 | spread 25.00% (wide)",
    ]);
  });

  test("scanOnce skips failing pairs and hands finds to the executor", async () => {
    const logger = createCapturingLogger();
    const executor = new RecordingExecutor();
    const detector = new ArbitrageDetector({
      provider: new FakeProvider(quotes),
      pairs: [pair("missing"), pair("flat"), pair("wide")],
      executor,
      config: { minProfitThreshold: 0.02, scanIntervalMs: 0 },
      logger,
    });

    const found = await detector.scanOnce();

    assert.deepStrictEqual(found.map((o) => o.pair.name), ["wide"]);
    assert.deepStrictEqual(executor.seen, found);
    assert.deepStrictEqual(logger.messages("warn"), [
      "[ARB] Quote error for missing: no book for poly-missing",
    ]);
  });

  test("start loops until stop is called", async () => {
    const provider = new FakeProvider(quotes);
    const detector = new ArbitrageDetector({
      provider,
      pairs: [pair("flat")],
      config: { minProfitThreshold: 0.02, scanIntervalMs: 0 },
      logger: createCapturingLogger(),
    });
    provider.onCall = () => {
      if (provider.calls.length >= 4) detector.stop();
    };

    await detector.start();

    assert.strictEqual(detector.isRunning(), false);
    assert.strictEqual(provider.calls.length, 4);
  });

  test("stop ends the wait between scans without waiting out the interval", async () => {
    const provider = new FakeProvider(quotes);
    const detector = new ArbitrageDetector({
      provider,
      pairs: [pair("flat")],
      config: { minProfitThreshold: 0.02, scanIntervalMs: 60_000 },
      logger: createCapturingLogger(),
    });
    const startedAt = Date.now();

    const run = detector.start();
    await flush();
    detector.stop();
    await run;

    assert.strictEqual(provider.calls.length, 2);
    assert.ok(Date.now() - startedAt < 1_000);
  });

  test("a restart right after stop leaves a single loop running", async () => {
    const provider = new FakeProvider(quotes);
    const detector = new ArbitrageDetector({
      provider,
      pairs: [pair("flat")],
      config: { minProfitThreshold: 0.02, scanIntervalMs: 60_000 },
      logger: createCapturingLogger(),
    });

    const first = detector.start();
    await flush();
    detector.stop();
    const second = detector.start();
    await first;
    await flush();

    assert.strictEqual(detector.isRunning(), true);
    assert.strictEqual(provider.calls.length, 4);

    detector.stop();
    await second;
    assert.strictEqual(provider.calls.length, 4);
  });
});

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
