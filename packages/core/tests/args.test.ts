/**
 * Argument Parsing Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  normalizeSymbol,
  parseLimit,
  parsePositiveDecimal,
  parseSymbolOrLimit,
  parseTimeMs,
  tryParseInt,
} from "../src/args";

describe("tryParseInt", () => {
  test("should accept signed whole numbers", () => {
    expect(tryParseInt("+7")).toBe(7);
    expect(tryParseInt("-3")).toBe(-3);
  });

  test("should reject fractions and unsafe integers", () => {
    expect(tryParseInt("1.5")).toBeUndefined();
    expect(tryParseInt("9007199254740993")).toBeUndefined();
    expect(tryParseInt("")).toBeUndefined();
  });
});

describe("parsePositiveDecimal", () => {
  test("should normalize positive decimals", () => {
    expect(parsePositiveDecimal("0.10")).toBe("0.1");
    expect(parsePositiveDecimal(".5")).toBe("0.5");
  });

  test("should reject zero, negatives and junk", () => {
    expect(parsePositiveDecimal("0")).toBeUndefined();
    expect(parsePositiveDecimal("-1")).toBeUndefined();
    expect(parsePositiveDecimal("1e3")).toBeUndefined();
  });
});

describe("parseLimit", () => {
  test("should fall back when missing or below 1", () => {
    expect(parseLimit(undefined)).toBe(10);
    expect(parseLimit("0")).toBe(10);
    expect(parseLimit("abc", 25)).toBe(25);
    expect(parseLimit("50")).toBe(50);
  });
});

describe("parseSymbolOrLimit", () => {
  test("should read an integer as limit", () => {
    expect(parseSymbolOrLimit("20")).toEqual({ symbol: "BTCUSDT", limit: 20 });
  });

  test("should read anything else as symbol", () => {
    expect(parseSymbolOrLimit("ethbtc")).toEqual({ symbol: "ETHBTC", limit: 10 });
  });

  test("should default both when absent", () => {
    expect(parseSymbolOrLimit(undefined)).toEqual({ symbol: "BTCUSDT", limit: 10 });
  });
});

describe("normalizeSymbol / parseTimeMs", () => {
  test("should uppercase symbols", () => {
    expect(normalizeSymbol("bnbusdt")).toBe("BNBUSDT");
    expect(normalizeSymbol("")).toBe("BTCUSDT");
  });

  test("should omit negative times", () => {
    expect(parseTimeMs("-5")).toBeUndefined();
    expect(parseTimeMs("1700000000000")).toBe(1700000000000);
  });
});
