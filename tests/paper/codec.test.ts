import assert from "node:assert";
import { describe, test } from "node:test";
import {
  decodePortfolioSnapshot,
  decodeTradeHistory,
  decodeTradeRecord,
} from "../../src/paper/codec";

const validTrade = {
  id: "t-1",
  timestamp: "2026-03-01T12:00:00.000Z",
  market: "ETH-UP-1H",
  coin: "ETH",
  timeframe: "1h",
  platform: "kalshi",
  side: "Sell",
  size: 25,
  entry_price: 0.35,
  exit_price: null,
  pnl: null,
  status: "Open",
  strategy: "copy_trade",
  confidence: 0.8,
  notes: null,
};

describe("ledger codec", () => {
  test("decodes a trade record", () => {
    assert.deepStrictEqual(decodeTradeRecord(validTrade), validTrade);
  });

  test("missing optional fields decode as null", () => {
    const { exit_price: _exit, pnl: _pnl, notes: _notes, ...rest } = validTrade;
    const decoded = decodeTradeRecord(rest);

    assert.strictEqual(decoded.exit_price, null);
    assert.strictEqual(decoded.pnl, null);
    assert.strictEqual(decoded.notes, null);
  });

  test("rejects unknown sides and statuses", () => {
    assert.throws(() => decodeTradeRecord({ ...validTrade, side: "Hold" }), {
      message: "trade.side: expected one of Buy|Sell",
    });
    assert.throws(() => decodeTradeRecord({ ...validTrade, status: "Pending" }), {
      message: "trade.status: expected one of Open|Closed|Cancelled",
    });
  });

  test("rejects a timestamp that is not an instant", () => {
    assert.throws(() => decodeTradeRecord({ ...validTrade, timestamp: "yesterday" }), {
      message: "trade.timestamp: expected an ISO-8601 instant",
    });
  });

  test("rejects non-numeric sizes", () => {
    assert.throws(() => decodeTradeRecord({ ...validTrade, size: "25" }), {
      message: "trade.size: expected a finite number",
    });
  });

  test("trade history must be an array and reports the failing index", () => {
    assert.throws(() => decodeTradeHistory({}), { message: "trades: expected an array" });
    assert.throws(() => decodeTradeHistory([validTrade, { ...validTrade, coin: 7 }]), {
      message: "trades[1].coin: expected a string",
    });
  });

  test("rejects a history that repeats a trade id", () => {
    assert.throws(
      () => decodeTradeHistory([validTrade, { ...validTrade, id: "t-2" }, { ...validTrade }]),
      { message: "trades[2].id: duplicate id t-1" },
    );
  });

  test("decodes a portfolio snapshot with positions", () => {
    const snapshot = {
      initial_balance: 1000,
      cash_balance: 900,
      positions: {
        "BTC-UP-15M": {
          market: "BTC-UP-15M",
          coin: "BTC",
          platform: "polymarket",
          size: 200,
          avg_price: 0.5,
          current_price: 0.5,
          unrealized_pnl: 0,
        },
      },
      realized_pnl: 0,
    };

    assert.deepStrictEqual(decodePortfolioSnapshot(snapshot), snapshot);
  });

  test("rejects a snapshot without a cash balance", () => {
    assert.throws(
      () => decodePortfolioSnapshot({ initial_balance: 1000, positions: {}, realized_pnl: 0 }),
      { message: "portfolio.cash_balance: expected a finite number" },
    );
  });

  test("names the failing position", () => {
    assert.throws(
      () =>
        decodePortfolioSnapshot({
          initial_balance: 1000,
          cash_balance: 1000,
          positions: { X: null },
          realized_pnl: 0,
        }),
      { message: "portfolio.positions[X]: expected an object" },
    );
  });

  test("rejects a position filed under another market's key", () => {
    assert.throws(
      () =>
        decodePortfolioSnapshot({
          initial_balance: 1000,
          cash_balance: 900,
          positions: {
            "ETH-UP-1H": {
              market: "BTC-UP-15M",
              coin: "BTC",
              platform: "polymarket",
              size: 200,
              avg_price: 0.5,
              current_price: 0.5,
              unrealized_pnl: 0,
            },
          },
          realized_pnl: 0,
        }),
      { message: 'portfolio.positions[ETH-UP-1H].market: expected "ETH-UP-1H", got "BTC-UP-15M"' },
    );
  });
});
