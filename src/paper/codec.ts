/**
 * Decoders for the persisted ledger documents.
 *
 * Each decoder validates the parsed JSON field by field and throws on the
 * first mismatch; the snapshot stores wrap that into a PersistenceError.
 */

import {
  SIDES,
  TRADE_STATUSES,
  type PortfolioSnapshot,
  type PositionRecord,
  type Side,
  type TradeRecord,
  type TradeStatus,
} from "./types";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new Error(`${where}: expected an object`);
  }
  return value;
}

function expectNumber(obj: JsonObject, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where}.${key}: expected a finite number`);
  }
  return value;
}

function expectString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new Error(`${where}.${key}: expected a string`);
  }
  return value;
}

function expectNullableNumber(obj: JsonObject, key: string, where: string): number | null {
  if (obj[key] === null || obj[key] === undefined) return null;
  return expectNumber(obj, key, where);
}

function expectNullableString(obj: JsonObject, key: string, where: string): string | null {
  if (obj[key] === null || obj[key] === undefined) return null;
  return expectString(obj, key, where);
}

function expectOneOf<T extends string>(
  obj: JsonObject,
  key: string,
  allowed: readonly T[],
  where: string,
): T {
  const value = obj[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${where}.${key}: expected one of ${allowed.join("|")}`);
  }
  return match;
}

export function decodePositionRecord(raw: unknown, where = "position"): PositionRecord {
  const obj = expectObject(raw, where);
  return {
    market: expectString(obj, "market", where),
    coin: expectString(obj, "coin", where),
    platform: expectString(obj, "platform", where),
    size: expectNumber(obj, "size", where),
    avg_price: expectNumber(obj, "avg_price", where),
    current_price: expectNumber(obj, "current_price", where),
    unrealized_pnl: expectNumber(obj, "unrealized_pnl", where),
  };
}

export function decodePortfolioSnapshot(raw: unknown): PortfolioSnapshot {
  const obj = expectObject(raw, "portfolio");
  const positionsRaw = expectObject(obj.positions, "portfolio.positions");

  const positions: Record<string, PositionRecord> = {};
  for (const [market, value] of Object.entries(positionsRaw)) {
    const where = `portfolio.positions[${market}]`;
    const record = decodePositionRecord(value, where);
    if (record.market !== market) {
      throw new Error(`${where}.market: expected "${market}", got "${record.market}"`);
    }
    positions[market] = record;
  }

  return {
    initial_balance: expectNumber(obj, "initial_balance", "portfolio"),
    cash_balance: expectNumber(obj, "cash_balance", "portfolio"),
    positions,
    realized_pnl: expectNumber(obj, "realized_pnl", "portfolio"),
  };
}

export function decodeTradeRecord(raw: unknown, where = "trade"): TradeRecord {
  const obj = expectObject(raw, where);
  const side: Side = expectOneOf(obj, "side", SIDES, where);
  const status: TradeStatus = expectOneOf(obj, "status", TRADE_STATUSES, where);

  const timestamp = expectString(obj, "timestamp", where);
  if (Number.isNaN(Date.parse(timestamp))) {
    throw new Error(`${where}.timestamp: expected an ISO-8601 instant`);
  }

  return {
    id: expectString(obj, "id", where),
    timestamp,
    market: expectString(obj, "market", where),
    coin: expectString(obj, "coin", where),
    timeframe: expectString(obj, "timeframe", where),
    platform: expectString(obj, "platform", where),
    side,
    size: expectNumber(obj, "size", where),
    entry_price: expectNumber(obj, "entry_price", where),
    exit_price: expectNullableNumber(obj, "exit_price", where),
    pnl: expectNullableNumber(obj, "pnl", where),
    status,
    strategy: expectString(obj, "strategy", where),
    confidence: expectNumber(obj, "confidence", where),
    notes: expectNullableString(obj, "notes", where),
  };
}

export function decodeTradeHistory(raw: unknown): TradeRecord[] {
  if (!Array.isArray(raw)) {
    throw new Error("trades: expected an array");
  }
  const seen = new Set<string>();
  return raw.map((entry: unknown, index) => {
    const record = decodeTradeRecord(entry, `trades[${index}]`);
    if (seen.has(record.id)) {
      throw new Error(`trades[${index}].id: duplicate id ${record.id}`);
    }
    seen.add(record.id);
    return record;
  });
}
