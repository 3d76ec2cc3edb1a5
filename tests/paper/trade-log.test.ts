import assert from "node:assert";
import { describe, test } from "node:test";
import {
  DuplicateTradeError,
  InvalidTradeInputError,
  PersistenceError,
  TradeStateError,
} from "../../src/errors/app.errors";
import { TradeLog } from "../../src/paper/trade-log";
import { createTradeRecord, type NewTradeInput } from "../../src/paper/trade-record";
import type { TradeRecord } from "../../src/paper/types";
import { createCapturingLogger, FailingStore, newTradeStore } from "../helpers/ledger";

function trade(overrides: Partial<NewTradeInput> = {}): TradeRecord {
  return createTradeRecord({
    market: "BTC-UP-15M",
    coin: "BTC",
    timeframe: "15m",
    platform: "polymarket",
    side: "Buy",
    size: 100,
    entryPrice: 0.5,
    strategy: "manual",
    confidence: 0.5,
    ...overrides,
  });
}

/** +50, -50 and +100 closed, one still open */
function seededLog() {
  const store = newTradeStore();
  const log = TradeLog.load(store);

  const win = trade({ market: "A" });
  const loss = trade({ market: "B" });
  const bigWin = trade({ market: "C", size: 50, entryPrice: 0.25 });
  const open = trade({ market: "D" });
  for (const t of [win, loss, bigWin, open]) log.addTrade(t);

  log.closeTrade(win.id, 0.75);
  log.closeTrade(loss.id, 0.25);
  log.closeTrade(bigWin.id, 0.75);

  return { store, log, win, loss, bigWin, open };
}

describe("TradeLog", () => {
  test("loads empty from an empty store", () => {
    const log = TradeLog.load(newTradeStore());
    assert.strictEqual(log.size(), 0);
    assert.deepStrictEqual(log.getAll(), []);
  });

  test("addTrade appends and writes through", () => {
    const store = newTradeStore();
    const log = TradeLog.load(store);
    const t = trade();

    log.addTrade(t);

    assert.strictEqual(log.size(), 1);
    assert.deepStrictEqual(store.load(), [t]);
  });

  test("rejects a duplicate id", () => {
    const log = TradeLog.load(newTradeStore());
    const t = trade();
    log.addTrade(t);

    assert.throws(() => log.addTrade({ ...t }), DuplicateTradeError);
    assert.strictEqual(log.size(), 1);
  });

  test("closeTrade returns false for an unknown id", () => {
    const log = TradeLog.load(newTradeStore());
    assert.strictEqual(log.closeTrade("missing", 0.5), false);
  });

  test("closeTrade closes the record with share-based P&L", () => {
    const { log, win } = seededLog();
    const closed = log.getById(win.id);

    assert.ok(closed);
    assert.strictEqual(closed.status, "Closed");
    assert.strictEqual(closed.exit_price, 0.75);
    assert.strictEqual(closed.pnl, 50);
  });

  test("closeTrade refuses a second close and a bad exit price", () => {
    const { log, win, open } = seededLog();

    assert.throws(() => log.closeTrade(win.id, 0.5), TradeStateError);
    assert.throws(() => log.closeTrade(open.id, -0.1), InvalidTradeInputError);
    assert.strictEqual(log.getById(open.id)?.status, "Open");
  });

  test("cancelTrade marks the record cancelled", () => {
    const { log, open } = seededLog();

    assert.strictEqual(log.cancelTrade(open.id, "stale"), true);
    assert.strictEqual(log.getById(open.id)?.status, "Cancelled");
    assert.strictEqual(log.getById(open.id)?.notes, "stale");
    assert.strictEqual(log.cancelTrade("missing"), false);
  });

  test("open and closed views", () => {
    const { log, win, loss, bigWin, open } = seededLog();

    assert.deepStrictEqual(log.getOpen().map((t) => t.id), [open.id]);
    assert.deepStrictEqual(log.getClosed().map((t) => t.id), [win.id, loss.id, bigWin.id]);
    assert.deepStrictEqual(log.findOpenByMarket("D").map((t) => t.id), [open.id]);
    assert.deepStrictEqual(log.findOpenByMarket("A"), []);
  });

  test("getRecent returns newest first", () => {
    const { log, loss, bigWin, open } = seededLog();

    assert.deepStrictEqual(log.getRecent(3).map((t) => t.id), [open.id, bigWin.id, loss.id]);
    assert.strictEqual(log.getRecent(10).length, 4);
    assert.deepStrictEqual(log.getRecent(0), []);
  });

  test("statistics over closed records", () => {
    const { log, loss, bigWin } = seededLog();

    assert.deepStrictEqual(log.winRate(), { rate: 2 / 3, wins: 2, total: 3 });
    assert.strictEqual(log.totalPnl(), 100);
    assert.strictEqual(log.bestTrade()?.id, bigWin.id);
    assert.strictEqual(log.worstTrade()?.id, loss.id);
  });

  test("statistics on an empty log", () => {
    const log = TradeLog.load(newTradeStore());

    assert.deepStrictEqual(log.winRate(), { rate: 0, wins: 0, total: 0 });
    assert.strictEqual(log.totalPnl(), 0);
    assert.strictEqual(log.bestTrade(), undefined);
    assert.strictEqual(log.worstTrade(), undefined);
  });

  test("the first of equal P&Ls wins the tie", () => {
    const log = TradeLog.load(newTradeStore());
    const first = trade({ market: "A" });
    const second = trade({ market: "B" });
    log.addTrade(first);
    log.addTrade(second);
    log.closeTrade(first.id, 0.75);
    log.closeTrade(second.id, 0.75);

    assert.strictEqual(log.bestTrade()?.id, first.id);
    assert.strictEqual(log.worstTrade()?.id, first.id);
  });

  test("reloading restores every record in order", () => {
    const { store, log } = seededLog();

    const reloaded = TradeLog.load(store);

    assert.deepStrictEqual(reloaded.getAll(), log.getAll());
  });

  test("a corrupt store loads as empty with a warning", () => {
    const store = newTradeStore();
    store.setRaw(JSON.stringify([{ id: "x", side: "Hold" }]));
    const logger = createCapturingLogger();

    const log = TradeLog.load(store, { logger });

    assert.strictEqual(log.size(), 0);
    assert.deepStrictEqual(logger.messages("warn"), [
      "[TradeLog] Failed to load trades-test: trades[0].side: expected one of Buy|Sell; starting with empty history",
    ]);
  });

  test("a store holding the same id twice loads as empty with a warning", () => {
    const store = newTradeStore();
    const record = trade();
    store.setRaw(JSON.stringify([record, record]));
    const logger = createCapturingLogger();

    const log = TradeLog.load(store, { logger });

    assert.strictEqual(log.size(), 0);
    assert.deepStrictEqual(logger.messages("warn"), [
      `[TradeLog] Failed to load trades-test: trades[1].id: duplicate id ${record.id}; starting with empty history`,
    ]);
  });

  test("the throw policy surfaces a failed save after the record is appended", () => {
    const log = TradeLog.load(new FailingStore<TradeRecord[]>());

    assert.throws(() => log.addTrade(trade()), PersistenceError);
    assert.strictEqual(log.size(), 1);
    assert.ok(log.getLastPersistenceError());
  });
});
