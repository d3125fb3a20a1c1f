import { afterEach, describe, expect, test, vi } from "vitest";

import { LogLevel, logger, type LogRecord } from "../../src/logger";

describe("logger sink routing", () => {
  afterEach(() => {
    logger.clearSink();
    logger.setLevel(null);
    vi.restoreAllMocks();
  });

  test("when a sink is set, INFO logs are routed to the sink and not to console", () => {
    const records: LogRecord[] = [];
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logger.setLevel(LogLevel.INFO);
    logger.setSink({ write: r => records.push(r) });
    logger.info("hello", { a: 1 });

    expect(info).not.toHaveBeenCalled();
    expect(records.length).toBe(1);
    expect(records[0]?.level).toBe(LogLevel.INFO);
    expect(records[0]?.message).toBe("hello");
    expect(records[0]?.fields).toEqual({ a: "1" });
  });

  test("bigint fields are rendered as decimal strings", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.DEBUG);
    logger.setSink({ write: r => records.push(r) });

    logger.debug("fill", { size: 10n ** 18n, nested: { fee: 3n } });

    expect(records[0]?.fields).toEqual({ size: "1000000000000000000", nested: '{"fee":"3"}' });
  });

  test("child loggers merge context under call-site fields", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.INFO);
    logger.setSink({ write: r => records.push(r) });

    const log = logger.child({ component: "engine", market: "ETH-USD" });
    log.info("open", { market: "BTC-USD" });
    log.warn("no fields");

    expect(records[0]?.fields).toEqual({ component: "engine", market: "BTC-USD" });
    expect(records[1]?.fields).toEqual({ component: "engine", market: "ETH-USD" });
  });

  test("records below the current level are dropped", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.WARN);
    logger.setSink({ write: r => records.push(r) });

    logger.info("ignored");
    logger.debug("ignored");
    logger.error("kept", new Error("boom"));

    expect(records.map(r => r.message)).toEqual(["kept boom"]);
  });
});
