import { describe, expect, it } from "vitest";
import { createLogger, parseLogLevel, redact, type LogSink } from "./logger.js";

function captureSink() {
  const lines: Array<{ method: "log" | "warn" | "error"; args: unknown[] }> = [];
  const sink: LogSink = {
    log: (...args) => lines.push({ method: "log", args }),
    warn: (...args) => lines.push({ method: "warn", args }),
    error: (...args) => lines.push({ method: "error", args }),
  };
  return { sink, lines };
}

describe("createLogger", () => {
  it("filters below the level and prefixes scope", () => {
    const { sink, lines } = captureSink();
    const log = createLogger("chart", { level: "warn", sink, timestamps: false });
    log.info("ignored");
    log.warn("slow fetch", { jobId: 1 });
    log.error("failed");
    expect(lines).toEqual([
      { method: "warn", args: ["[WARN] [chart] slow fetch", { jobId: 1 }] },
      { method: "error", args: ["[ERROR] [chart] failed"] },
    ]);
  });

  it("debug and info go to log", () => {
    const { sink, lines } = captureSink();
    const log = createLogger("burn", { level: "debug", sink, timestamps: false });
    log.debug("a");
    log.info("b");
    expect(lines.map((l) => l.method)).toEqual(["log", "log"]);
  });

  it("silent drops everything", () => {
    const { sink, lines } = captureSink();
    createLogger("burn", { level: "silent", sink }).error("x");
    expect(lines).toEqual([]);
  });
});

describe("redact", () => {
  it("masks credentials at any depth and flattens errors", () => {
    expect(
      redact({ config: { API_TOKEN: "test-secret", url: "https://x.test" }, err: new Error("boom") })
    ).toEqual({
      config: { API_TOKEN: "[REDACTED]", url: "https://x.test" },
      err: { name: "Error", message: "boom" },
    });
  });
});

describe("parseLogLevel", () => {
  it("case-insensitive; unknown → fallback", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
