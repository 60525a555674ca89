import { describe, expect, test } from "vitest";

import { describeStream, parseInterval, streamKindFor } from "../src/stream-kind";

describe("parseInterval", () => {
  test("should keep minute and month apart", () => {
    expect(parseInterval("1m")).toBe("1m");
    expect(parseInterval("1M")).toBe("1M");
  });

  test("should accept upper-case hour and day spellings", () => {
    expect(parseInterval("4H")).toBe("4h");
    expect(parseInterval("1D")).toBe("1d");
  });

  test("should return undefined for unknown tokens", () => {
    expect(parseInterval("2x")).toBeUndefined();
    expect(parseInterval(undefined)).toBeUndefined();
  });
});

describe("streamKindFor", () => {
  test("should serve top-of-book from the order book stream", () => {
    expect(streamKindFor("top")).toBe("orderBook");
    expect(streamKindFor("candlesticks")).toBe("candlesticks");
  });
});

describe("describeStream", () => {
  test("should label each kind", () => {
    expect(describeStream({ kind: "orderBook", symbol: "BTCUSDT" })).toBe("order book BTCUSDT");
    expect(describeStream({ kind: "candlesticks", symbol: "ETHBTC", interval: "1h" })).toBe("candlesticks ETHBTC 1h");
    expect(describeStream({ kind: "userData" })).toBe("account");
  });
});
