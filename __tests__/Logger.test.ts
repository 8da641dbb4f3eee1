import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createLogger,
  resolveDebugOptions,
  sanitizeForLog,
  summarizeForLog,
  type LogRecord,
} from "../src/observability/Logger.js";

function capture(): { records: LogRecord[]; sink: (record: LogRecord) => void } {
  const records: LogRecord[] = [];
  return { records, sink: (record) => records.push(record) };
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("passes records at or above the configured level to the sink", () => {
    const { records, sink } = capture();
    const logger = createLogger({ enabled: true, level: "warn", prefix: "Test" }, sink);

    logger.warn("careful", { step: "a" });
    logger.debug("hidden");

    expect(records).toEqual([{ level: "warn", prefix: "Test", message: "careful", fields: { step: "a" } }]);
  });

  it("binds fields with with() and keeps them in child loggers", () => {
    const { records, sink } = capture();
    const logger = createLogger({ enabled: true, level: "info", prefix: "Engine" }, sink)
      .with({ runId: "run-1" })
      .child("Step");

    logger.info("started", { stepId: "a" });
    expect(records).toEqual([
      { level: "info", prefix: "Step", message: "started", fields: { runId: "run-1", stepId: "a" } },
    ]);
    expect(logger.isEnabled("debug")).toBe(false);
  });

  it("formats console lines with prefix, level and redacted fields", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ enabled: true, level: "warn", prefix: "Test" });

    logger.warn("careful", { step: "a", token: "test-secret" });
    logger.error("failed");

    expect(warn).toHaveBeenCalledWith('[Test] [WARN] careful {"step":"a","token":"[REDACTED]"}');
    expect(error).toHaveBeenCalledWith("[Test] [ERROR] failed");
  });

  it("stays silent when disabled", () => {
    const { records, sink } = capture();
    const logger = createLogger({ enabled: false }, sink);
    logger.error("nope");
    expect(records).toEqual([]);
    expect(logger.isEnabled("error")).toBe(false);
  });

  it("reads the level from the environment", () => {
    vi.stubEnv("AGENT_FLOW_LOG_LEVEL", "info");
    expect(resolveDebugOptions()).toMatchObject({ enabled: true, level: "info" });

    vi.stubEnv("AGENT_FLOW_LOG_LEVEL", "off");
    expect(resolveDebugOptions()).toMatchObject({ enabled: false, level: "silent" });
  });

  it("redacts secrets", () => {
    expect(sanitizeForLog({ token: "test-secret", user: "ada" })).toBe('{"token":"[REDACTED]","user":"ada"}');
  });

  it("summarizes values", () => {
    expect(summarizeForLog([1, 2, 3])).toBe("Array(3)");
    expect(summarizeForLog({ a: 1, b: 2 })).toBe("Object(keys: a, b)");
    expect(summarizeForLog("abcdef", 3)).toBe("abc...");
    expect(summarizeForLog(null)).toBe("null");
  });
});
