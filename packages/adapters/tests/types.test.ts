/**
 * Spot Types Unit Tests
 *
 * Tests for configuration schema validation and stream payload parsing
 */

import { describe, expect, test } from "vitest";

import { toAccountEvent } from "../src/spot/live-streams";
import { KlineSchema, SpotConfigSchema, UserDataEventSchema } from "../src/spot/types";

describe("SpotConfigSchema", () => {
  test("should apply defaults", () => {
    const result = SpotConfigSchema.safeParse({});

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.restUrl).toBe("https://api.binance.com");
      expect(result.data.streamUrl).toBe("wss://stream.binance.com:9443");
      expect(result.data.recvWindowMs).toBe(5_000);
      expect(result.data.requestTimeoutMs).toBe(10_000);
      expect(result.data.apiKey).toBeUndefined();
    }
  });

  test("should reject an empty API key", () => {
    expect(SpotConfigSchema.safeParse({ apiKey: "" }).success).toBe(false);
  });

  test("should reject a receive window above 60 seconds", () => {
    expect(SpotConfigSchema.safeParse({ recvWindowMs: 60_001 }).success).toBe(false);
  });
});

describe("KlineSchema", () => {
  test("should accept rows with trailing fields", () => {
    const row = [1, "100", "110", "90", "105", "12.5", 3_599_999, "1250", 42, "6", "600", "0"];

    expect(KlineSchema.safeParse(row).success).toBe(true);
  });

  test("should reject a row with a numeric price", () => {
    const row = [1, 100, "110", "90", "105", "12.5", 3_599_999, "1250", 42];

    expect(KlineSchema.safeParse(row).success).toBe(false);
  });
});

describe("UserDataEventSchema", () => {
  test("should turn a filled execution report into a trade event", () => {
    const parsed = UserDataEventSchema.parse({
      e: "executionReport",
      E: 1_700_000_000_000,
      s: "BTCUSDT",
      c: "client-1",
      S: "SELL",
      o: "LIMIT",
      X: "FILLED",
      x: "TRADE",
      i: 77,
      p: "100",
      q: "1",
      l: "1",
      L: "100",
      z: "1",
    });

    const event = toAccountEvent(parsed);

    expect(event.type).toBe("trade");
    expect(event.type === "trade" && event.order.side).toBe("sell");
    expect(event.type === "trade" && event.order.orderId).toBe(77);
  });

  test("should map a balance update", () => {
    const parsed = UserDataEventSchema.parse({ e: "balanceUpdate", E: 5, a: "BTC", d: "-0.1" });

    expect(toAccountEvent(parsed)).toEqual({ type: "balance", time: 5, asset: "BTC", delta: "-0.1" });
  });

  test("should reject an unknown event type", () => {
    expect(UserDataEventSchema.safeParse({ e: "listStatus", E: 1 }).success).toBe(false);
  });
});
