import { describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel } from "../src/observability/logger";

const fixedNow = () => new Date("2024-01-01T00:00:00.000Z");

describe("createLogger", () => {
  it("writes one JSON object per line with context and fields", () => {
    const write = vi.fn();
    const logger = createLogger("engine", { level: "debug", write, now: fixedNow });

    logger.info("Workflow started", { instanceId: "inst-1" });

    expect(write).toHaveBeenCalledWith(
      "info",
      '{"level":"info","context":"engine","message":"Workflow started","instanceId":"inst-1","timestamp":"2024-01-01T00:00:00.000Z"}',
    );
  });

  it("drops lines below the threshold", () => {
    const write = vi.fn();
    const logger = createLogger("engine", { level: "warn", write, now: fixedNow });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("TimerMissed", { lateByMs: 9000 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toBe("warn");
  });

  it("prefixes child contexts", () => {
    const write = vi.fn();
    createLogger("workflow", { level: "info", write, now: fixedNow }).child("scheduler").error("boom");

    expect(JSON.parse(String(write.mock.calls[0]?.[1]))).toEqual({
      level: "error",
      context: "workflow.scheduler",
      message: "boom",
      timestamp: "2024-01-01T00:00:00.000Z",
    });
  });

  it("recognises log levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
