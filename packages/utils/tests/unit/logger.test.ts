import { afterEach, describe, expect, test, vi } from "vitest";

import { formatLogRecord, LogLevel, logger, type LogRecord } from "../../src/logger";

afterEach(() => {
  logger.clearSink();
  logger.setLevel(null);
});

describe("logger sink routing", () => {
  test("when a sink is set, INFO logs are routed to the sink and not to console", () => {
    const records: LogRecord[] = [];
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logger.setLevel(LogLevel.INFO);
    logger.setSink({ write: r => records.push(r) });
    logger.info("hello", { a: 1 });

    expect(infoSpy).not.toHaveBeenCalled();
    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe(LogLevel.INFO);
    expect(records[0]?.message).toBe("hello");
    expect(records[0]?.fields).toEqual({ a: "1" });
  });

  test("ERROR logs are routed to the sink as well", () => {
    const records: LogRecord[] = [];
    logger.setSink({ write: r => records.push(r) });

    logger.error("boom", { error: new Error("socket hang up") });

    expect(records).toHaveLength(1);
    expect(records[0]?.fields).toEqual({ error: "socket hang up" });
  });

  test("drops records below the pinned level", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.WARN);
    logger.setSink({ write: r => records.push(r) });

    logger.info("ignored");
    logger.debug("ignored");
    logger.warn("kept");

    expect(records.map(r => r.message)).toEqual(["kept"]);
  });

  test("extra positional args are appended to the message", () => {
    const records: LogRecord[] = [];
    logger.setSink({ write: r => records.push(r) });

    logger.warn("stream ended", { kind: "trades" }, "code", 1006);

    expect(records[0]?.message).toBe("stream ended code 1006");
    expect(records[0]?.fields).toEqual({ kind: "trades" });
  });
});

describe("formatLogRecord", () => {
  const record: LogRecord = {
    tsMs: Date.UTC(2024, 0, 1, 12, 0, 0),
    level: LogLevel.WARN,
    message: "live stream fault",
    fields: { kind: "orderBook", symbol: "BTCUSDT" },
  };

  test("renders header, message and fields without color", () => {
    expect(formatLogRecord(record, { color: false })).toBe(
      "[2024-01-01T12:00:00.000Z] [WARN] live stream fault kind=orderBook symbol=BTCUSDT",
    );
  });

  test("colors only the header", () => {
    expect(formatLogRecord({ ...record, fields: undefined }, { color: true })).toBe(
      "\x1b[33m[2024-01-01T12:00:00.000Z] [WARN]\x1b[0m live stream fault",
    );
  });
});
