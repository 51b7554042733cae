import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger, type LogEntry } from "./logger.js";

describe("logger", () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    logger.resetHandlers(false);
    logger.addHandler((entry) => entries.push(entry));
    logger.setLevel("debug");
  });

  afterEach(() => {
    logger.resetHandlers();
    logger.setLevel("error");
  });

  it("drops entries below the current level", () => {
    logger.setLevel("warn");

    logger.info("ignored");
    logger.warn("kept");

    expect(entries.map((e) => e.message)).toEqual(["kept"]);
  });

  it("merges child context into every entry", () => {
    const log = logger.child({ component: "pipeline" }).child({ sessionId: "s-1" });

    log.debug("Batch done", { size: 5 });

    expect(entries[0].context).toEqual({ component: "pipeline", sessionId: "s-1", size: 5 });
  });

  it("tags metric entries with their name and value", () => {
    logger.child({ component: "pipeline" }).metric("credits.fetched", 3, { stage: "collection" });

    expect(entries[0]).toMatchObject({
      level: "info",
      message: "METRIC credits.fetched=3",
      metric: { name: "credits.fetched", value: 3 },
      context: { component: "pipeline", stage: "collection" },
    });
  });

  it("records error details, including values that are not errors", () => {
    const error = Object.assign(new Error("boom"), { code: "DATABASE_ERROR" });

    logger.error("Write failed", error);
    logger.error("Odd failure", "plain string");

    expect(entries[0].error).toMatchObject({ name: "Error", message: "boom", code: "DATABASE_ERROR" });
    expect(entries[1].error).toEqual({ name: "NonError", message: "plain string" });
  });

  it("writes one JSON line per entry after switching to the json format", () => {
    const write = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.resetHandlers();
    logger.setFormat("json");

    logger.info("Session created", { component: "session-store", sessionId: "s-1" });

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0][0]))).toMatchObject({
      level: "info",
      message: "Session created",
      context: { component: "session-store", sessionId: "s-1" },
    });
    write.mockRestore();
  });
});
