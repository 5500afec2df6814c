import { afterEach, describe, expect, it, vi } from "vitest";
import { asInstanceId, asNodeId } from "../src/core/types";
import { type Logger, silentLogger } from "../src/observability/logger";
import { ManualClock } from "../src/runtime/clock";
import {
  type TimerHandler,
  type TimerRequest,
  TimerScheduler,
  nextFiring,
} from "../src/runtime/timer-scheduler";

const HOUR = 60 * 60 * 1000;

const escalation = (overrides: Partial<TimerRequest> = {}): TimerRequest => ({
  instanceId: asInstanceId("inst-1"),
  nodeId: asNodeId("review"),
  visit: 1,
  kind: "escalation",
  ruleId: "overdue",
  fireAt: "2024-01-01T01:00:00.000Z",
  ...overrides,
});

describe("TimerScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires a due timer exactly once", async () => {
    const clock = new ManualClock();
    const scheduler = new TimerScheduler(clock, undefined, { logger: silentLogger });
    const handler = vi.fn<TimerHandler>(async () => "fired");
    scheduler.onFire(handler);
    scheduler.schedule(escalation());

    expect(await scheduler.runOnce()).toEqual([]);

    clock.advance(HOUR);
    const runs = await scheduler.runOnce();
    expect(runs.map((run) => [run.outcome, run.lateByMs, run.entry.firing])).toEqual([["fired", 0, 1]]);
    expect(await scheduler.runOnce()).toEqual([]);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(scheduler.pending()).toEqual([]);
  });

  it("repeats escalations from the previous fire time up to maxRepeats", async () => {
    const clock = new ManualClock();
    const scheduler = new TimerScheduler(clock, undefined, { logger: silentLogger, lateToleranceMs: 10 * HOUR });
    const firings: number[] = [];
    scheduler.onFire(async (entry) => {
      firings.push(entry.firing);
      return "fired";
    });
    scheduler.schedule(escalation({ repeatIntervalMs: HOUR, maxRepeats: 3 }));

    clock.advance(90 * 60 * 1000);
    await scheduler.runOnce();
    expect(firings).toEqual([1]);
    expect(scheduler.pending().map((entry) => entry.fireAt)).toEqual(["2024-01-01T02:00:00.000Z"]);

    clock.advance(5 * HOUR);
    await scheduler.runOnce();
    expect(firings).toEqual([1, 2, 3]);
    expect(scheduler.pending()).toEqual([]);
  });

  it("does not re-arm discarded timers", async () => {
    const clock = new ManualClock("2024-01-01T02:00:00.000Z");
    const scheduler = new TimerScheduler(clock, undefined, { logger: silentLogger });
    scheduler.onFire(async () => "discarded");
    scheduler.schedule(escalation({ repeatIntervalMs: HOUR }));

    const runs = await scheduler.runOnce();
    expect(runs.map((run) => run.outcome)).toEqual(["discarded"]);
    expect(scheduler.pending()).toEqual([]);
  });

  it("logs late firings and still runs them", async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const clock = new ManualClock("2024-01-01T01:00:10.000Z");
    const scheduler = new TimerScheduler(clock, undefined, { logger, lateToleranceMs: 5_000 });
    const handler = vi.fn<TimerHandler>(async () => "fired");
    scheduler.onFire(handler);
    scheduler.schedule(escalation({ kind: "timeout", ruleId: undefined }));

    await scheduler.runOnce();

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ kind: "timeout" }), { lateByMs: 10_000 });
    expect(warn).toHaveBeenCalledWith("TimerMissed", {
      instanceId: "inst-1",
      nodeId: "review",
      kind: "timeout",
      fireAt: "2024-01-01T01:00:00.000Z",
      lateByMs: 10_000,
    });
  });

  it("reports handler failures without stopping the queue", async () => {
    const clock = new ManualClock("2024-01-01T05:00:00.000Z");
    const scheduler = new TimerScheduler(clock, undefined, { logger: silentLogger, lateToleranceMs: 10 * HOUR });
    scheduler.onFire(async (entry) => {
      if (entry.nodeId === "review") throw new Error("store offline");
      return "fired";
    });
    scheduler.schedule(escalation());
    scheduler.schedule(escalation({ nodeId: asNodeId("legal"), fireAt: "2024-01-01T01:30:00.000Z" }));

    const runs = await scheduler.runOnce();
    expect(runs.map((run) => [run.entry.nodeId, run.outcome])).toEqual([
      ["review", "failed"],
      ["legal", "fired"],
    ]);
  });

  it("disarms by instance and node", () => {
    const scheduler = new TimerScheduler(new ManualClock(), undefined, { logger: silentLogger });
    scheduler.schedule(escalation());
    scheduler.schedule(escalation({ nodeId: asNodeId("legal") }));
    scheduler.schedule(escalation({ instanceId: asInstanceId("inst-2") }));

    expect(scheduler.disarm(asInstanceId("inst-1"), asNodeId("legal"))).toBe(1);
    expect(scheduler.pending(asInstanceId("inst-1")).map((entry) => entry.nodeId)).toEqual(["review"]);
    expect(scheduler.disarm(asInstanceId("inst-2"))).toBe(1);
    expect(scheduler.pending()).toHaveLength(1);
  });

  it("discards due timers when no handler is registered", async () => {
    const scheduler = new TimerScheduler(new ManualClock("2024-01-02T00:00:00.000Z"), undefined, {
      logger: silentLogger,
      lateToleranceMs: 48 * HOUR,
    });
    scheduler.schedule(escalation());

    expect((await scheduler.runOnce()).map((run) => run.outcome)).toEqual(["discarded"]);
  });

  it("polls on an interval once started", async () => {
    vi.useFakeTimers();
    const clock = new ManualClock("2024-01-01T01:00:00.000Z");
    const scheduler = new TimerScheduler(clock, undefined, { logger: silentLogger, pollIntervalMs: 1_000 });
    const handler = vi.fn<TimerHandler>(async () => "fired");
    scheduler.onFire(handler);
    scheduler.schedule(escalation());

    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(1_000);
    scheduler.stop();
    scheduler.stop();

    expect(handler).toHaveBeenCalledTimes(1);
  });
});

describe("nextFiring", () => {
  it("only repeats escalations with an interval and budget left", () => {
    const timer = { ...escalation({ repeatIntervalMs: HOUR, maxRepeats: 2 }), firing: 1 };
    expect(nextFiring(timer)).toEqual({ ...timer, fireAt: "2024-01-01T02:00:00.000Z", firing: 2 });
    expect(nextFiring({ ...timer, firing: 2 })).toBeNull();
    expect(nextFiring({ ...timer, kind: "timeout" })).toBeNull();
    expect(nextFiring({ ...escalation(), firing: 1 })).toBeNull();
  });
});
