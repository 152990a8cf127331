import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger } from "./logger.js";

describe("createLogger", () => {
  let stdout: MockInstance;
  let stderr: MockInstance;

  beforeEach(() => {
    stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    stderr = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("drops messages below the configured level", () => {
    const logger = createLogger({ level: "warn", json: false });
    logger.debug("poll tick");
    logger.info("poll done");
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).not.toHaveBeenCalled();
  });

  it("routes info to stdout and warn/error to stderr", () => {
    const logger = createLogger({ level: "debug", json: false });
    logger.info("a");
    logger.warn("b");
    logger.error("c");
    expect(stdout).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledTimes(2);
  });

  it("sends everything to stderr when stdout carries results", () => {
    const logger = createLogger({ level: "debug", json: false, stderrOnly: true });
    logger.debug("Polling interval changed");
    logger.info("Poll batch correlated");
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(2);
  });

  it("writes one JSON object per line in JSON mode", () => {
    const logger = createLogger({ level: "info", json: true });
    logger.warn("Poll failed, backing off", { pendingJobs: 2 });

    const line = String(stderr.mock.calls[0][0]);
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({ level: "warn", message: "Poll failed, backing off", pendingJobs: 2 });
    expect(entry).toHaveProperty("timestamp");
  });

  it("formats human lines with level and metadata", () => {
    const logger = createLogger({ level: "info", json: false });
    logger.info("Loaded configuration", { sources: 1 });
    expect(String(stdout.mock.calls[0][0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO  Loaded configuration \{"sources":1\}$/
    );
  });

  it("merges child metadata into every entry", () => {
    const logger = createLogger({ level: "info", json: true }).child({ component: "coordinator" });
    logger.info("started", { intervalMs: 5000 });
    expect(JSON.parse(String(stdout.mock.calls[0][0]))).toMatchObject({
      component: "coordinator",
      intervalMs: 5000,
    });
  });
});

describe("createNoopLogger", () => {
  it("never writes", () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createNoopLogger();
    logger.info("ignored");
    logger.child({ a: 1 }).error("ignored");
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).not.toHaveBeenCalled();
  });
});
