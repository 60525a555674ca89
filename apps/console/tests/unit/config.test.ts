/**
 * Console Config Unit Tests
 */

import { describe, expect, test, vi } from "vitest";
import { LogLevel } from "@spot-console/utils";

import { createConsoleEnv, resolveCredentials } from "../../src/config";

describe("createConsoleEnv", () => {
  test("should apply defaults for an empty environment", () => {
    const env = createConsoleEnv({});

    expect(env.SPOT_REST_URL).toBe("https://api.binance.com");
    expect(env.SPOT_STREAM_URL).toBe("wss://stream.binance.com:9443");
    expect(env.SPOT_RECV_WINDOW_MS).toBe(5_000);
    expect(env.SPOT_REQUEST_TIMEOUT_MS).toBe(10_000);
    expect(env.LIVE_STOP_TIMEOUT_MS).toBe(5_000);
    expect(env.LOG_LEVEL).toBe(LogLevel.INFO);
    expect(env.SPOT_API_KEY).toBeUndefined();
  });

  test("should coerce numeric values and treat empty strings as unset", () => {
    const env = createConsoleEnv({
      LIVE_STOP_TIMEOUT_MS: "2500",
      SPOT_API_KEY: "",
      LOG_LEVEL: "DEBUG",
    });

    expect(env.LIVE_STOP_TIMEOUT_MS).toBe(2_500);
    expect(env.SPOT_API_KEY).toBeUndefined();
    expect(env.LOG_LEVEL).toBe(LogLevel.DEBUG);
  });

  test("should throw on an invalid value", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => createConsoleEnv({ SPOT_REST_URL: "not a url" })).toThrow();
    expect(() => createConsoleEnv({ LIVE_STOP_TIMEOUT_MS: "-1" })).toThrow();
  });
});

describe("resolveCredentials", () => {
  test("should return both halves when configured", () => {
    expect(resolveCredentials({ SPOT_API_KEY: "test-key", SPOT_API_SECRET: "test-secret" })).toEqual({
      apiKey: "test-key",
      apiSecret: "test-secret",
    });
  });

  test("should be undefined when either half is missing", () => {
    expect(resolveCredentials({ SPOT_API_KEY: "test-key", SPOT_API_SECRET: undefined })).toBeUndefined();
    expect(resolveCredentials({ SPOT_API_KEY: undefined, SPOT_API_SECRET: "test-secret" })).toBeUndefined();
  });
});
