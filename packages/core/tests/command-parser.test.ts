/**
 * Command Parser Unit Tests
 *
 * - Verb matching and the unrecognized path
 * - Two-phase symbol/limit disambiguation
 * - Order argument validation messages
 */

import { describe, expect, test } from "vitest";

import { ArgumentMessages, AUTHENTICATED_COMMANDS, parseCommand, tokenize } from "../src/command-parser";

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function parsed(line: string) {
  const result = parseCommand(line);
  if (result.isErr()) {
    throw new Error(`expected "${line}" to parse, got ${result.error.type}`);
  }
  return result.value;
}

function argumentMessage(line: string): string | undefined {
  const result = parseCommand(line);
  if (result.isOk() || result.error.type !== "argument") return undefined;
  return result.error.message;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tokenizing & verbs
// ─────────────────────────────────────────────────────────────────────────────

describe("tokenize", () => {
  test("should lowercase the verb and keep argument case", () => {
    expect(tokenize("  BOOK  ethbtc   5 ")).toEqual({ verb: "book", args: ["ethbtc", "5"] });
  });

  test("should return an empty verb for blank input", () => {
    expect(tokenize("   ")).toEqual({ verb: "", args: [] });
  });
});

describe("parseCommand verbs", () => {
  test("should treat empty input as help", () => {
    expect(parsed("")).toEqual({ type: "help" });
  });

  test("should match verbs case-insensitively", () => {
    expect(parsed("QUIT")).toEqual({ type: "quit" });
    expect(parsed("Ping")).toEqual({ type: "ping" });
  });

  test("should report an unknown verb as unrecognized with the trimmed input", () => {
    const result = parseCommand("  frobnicate now ");
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "unrecognized", input: "frobnicate now" });
    }
  });

  test("should not match verbs by prefix", () => {
    expect(parseCommand("boo").isErr()).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

describe("book", () => {
  test("should parse symbol and limit", () => {
    expect(parsed("book BTCUSDT 5")).toEqual({
      type: "query",
      request: { family: "orderBook", symbol: "BTCUSDT", limit: 5 },
    });
  });

  test("should read a lone integer as the limit for the default symbol", () => {
    expect(parsed("book 5")).toEqual({
      type: "query",
      request: { family: "orderBook", symbol: "BTCUSDT", limit: 5 },
    });
  });

  test("should uppercase the symbol and default the limit", () => {
    expect(parsed("depth ethbtc")).toEqual({
      type: "query",
      request: { family: "orderBook", symbol: "ETHBTC", limit: 10 },
    });
  });

  test("should fall back to the default limit when the second token is not an integer", () => {
    expect(parsed("book 5 X")).toEqual({
      type: "query",
      request: { family: "orderBook", symbol: "BTCUSDT", limit: 10 },
    });
  });

  test("should fall back to the default limit below 1", () => {
    expect(parsed("book 0")).toEqual({
      type: "query",
      request: { family: "orderBook", symbol: "BTCUSDT", limit: 10 },
    });
  });
});

describe("candles", () => {
  test("should parse symbol, interval and limit", () => {
    expect(parsed("candles ethbtc 4h 20")).toEqual({
      type: "query",
      request: { family: "candlesticks", symbol: "ETHBTC", interval: "4h", limit: 20 },
    });
  });

  test("should default an unknown interval to 1h", () => {
    expect(parsed("klines ethbtc bogus")).toEqual({
      type: "query",
      request: { family: "candlesticks", symbol: "ETHBTC", interval: "1h", limit: 10 },
    });
  });
});

describe("other queries", () => {
  test("should parse top for a symbol", () => {
    expect(parsed("top ethbtc")).toEqual({ type: "query", request: { family: "top", symbol: "ETHBTC" } });
  });

  test("should parse tradesfrom with id and limit", () => {
    expect(parsed("tradesfrom ethbtc 100 20")).toEqual({
      type: "tradesFrom",
      symbol: "ETHBTC",
      fromId: 100,
      limit: 20,
    });
  });

  test("should omit unparsable time bounds", () => {
    expect(parsed("tradesin btcusdt 1000 later")).toEqual({
      type: "tradesIn",
      symbol: "BTCUSDT",
      startTime: 1000,
      endTime: undefined,
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Live
// ─────────────────────────────────────────────────────────────────────────────

describe("live", () => {
  test("should default to the order book of the default symbol", () => {
    expect(parsed("live")).toEqual({ type: "liveStart", spec: { kind: "orderBook", symbol: "BTCUSDT" } });
  });

  test("should parse a candlestick stream with interval", () => {
    expect(parsed("live kline ethbtc 1m")).toEqual({
      type: "liveStart",
      spec: { kind: "candlesticks", symbol: "ETHBTC", interval: "1m" },
    });
  });

  test("should parse the account stream without a symbol", () => {
    expect(parsed("live account")).toEqual({ type: "liveStart", spec: { kind: "userData" } });
  });

  test("should parse off and status", () => {
    expect(parsed("live off")).toEqual({ type: "liveOff" });
    expect(parsed("live status")).toEqual({ type: "liveStatus" });
  });

  test("should report an unknown endpoint as unrecognized", () => {
    const result = parseCommand("live foo");
    expect(result.isErr() && result.error).toEqual({ type: "unrecognized", input: "live foo" });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Orders & account
// ─────────────────────────────────────────────────────────────────────────────

describe("market / limit", () => {
  test("should require side, symbol and quantity for market", () => {
    expect(argumentMessage("market buy btcusdt")).toBe(ArgumentMessages.marketArgs);
  });

  test("should require a price for limit", () => {
    expect(argumentMessage("limit buy btcusdt 1")).toBe(ArgumentMessages.limitArgs);
  });

  test("should reject an unknown side", () => {
    expect(argumentMessage("market hold btcusdt 1")).toBe(ArgumentMessages.side);
  });

  test("should reject a non-positive quantity", () => {
    expect(argumentMessage("market buy btcusdt 0")).toBe(ArgumentMessages.quantity);
  });

  test("should reject an unparsable price", () => {
    expect(argumentMessage("limit sell btcusdt 1 abc")).toBe(ArgumentMessages.price);
  });

  test("should reject an unparsable stop price", () => {
    expect(argumentMessage("limit sell btcusdt 1.50 30000 x")).toBe(ArgumentMessages.stopPrice);
  });

  test("should normalize a valid limit order", () => {
    expect(parsed("limit SELL btcusdt 1.50 30000")).toEqual({
      type: "placeOrder",
      order: { type: "limit", side: "sell", symbol: "BTCUSDT", quantity: "1.5", price: "30000" },
    });
  });

  test("should carry a stop price on a market order", () => {
    expect(parsed("market buy ethbtc 2 0.05")).toEqual({
      type: "placeOrder",
      order: { type: "market", side: "buy", symbol: "ETHBTC", quantity: "2", stopPrice: "0.05" },
    });
  });
});

describe("orders / order", () => {
  test("should parse an open-only listing", () => {
    expect(parsed("orders ethbtc open")).toEqual({ type: "orders", symbol: "ETHBTC", limit: 10, openOnly: true });
  });

  test("should read a lone integer as the limit", () => {
    expect(parsed("orders 5")).toEqual({ type: "orders", symbol: "BTCUSDT", limit: 5, openOnly: false });
  });

  test("should require symbol and id", () => {
    expect(argumentMessage("order btcusdt")).toBe(ArgumentMessages.orderArgs);
  });

  test("should reject a negative order id", () => {
    expect(argumentMessage("order btcusdt -1")).toBe(ArgumentMessages.orderId);
  });

  test("should treat a non-integer id as a client order id", () => {
    expect(parsed("order btcusdt my-order-1 cancel")).toEqual({
      type: "order",
      symbol: "BTCUSDT",
      ref: { clientOrderId: "my-order-1" },
      cancel: true,
    });
  });
});

describe("withdraw / test mode", () => {
  test("should reject a non-positive amount", () => {
    expect(argumentMessage("withdraw btc addr 0")).toBe(ArgumentMessages.amount);
  });

  test("should uppercase the asset and keep the address", () => {
    expect(parsed("withdraw btc bc1-test-address 0.5")).toEqual({
      type: "withdraw",
      asset: "BTC",
      address: "bc1-test-address",
      amount: "0.5",
    });
  });

  test("should toggle test mode", () => {
    expect(parsed("test off")).toEqual({ type: "testMode", enabled: false });
    expect(parsed("test")).toEqual({ type: "testMode", enabled: true });
  });
});

describe("AUTHENTICATED_COMMANDS", () => {
  test("should gate account commands but not market data", () => {
    expect(AUTHENTICATED_COMMANDS.has("account")).toBe(true);
    expect(AUTHENTICATED_COMMANDS.has("placeOrder")).toBe(true);
    expect(AUTHENTICATED_COMMANDS.has("query")).toBe(false);
    expect(AUTHENTICATED_COMMANDS.has("ping")).toBe(false);
  });
});
