import { describe, expect, it, vi } from "vitest";
import { EventBus, type WorkflowEvent } from "../src/core/events";
import { asDefinitionId, asInstanceId, asNodeId } from "../src/core/types";
import { type Logger, silentLogger } from "../src/observability/logger";

const base = {
  instanceId: asInstanceId("inst-1"),
  definitionId: asDefinitionId("approval@1.0.0"),
  nodeIds: [asNodeId("done")],
  actor: "user-1",
  at: "2024-01-01T00:00:00.000Z",
  variables: {},
};

const completed: WorkflowEvent = { ...base, type: "WorkflowCompleted" };
const started: WorkflowEvent = { ...base, type: "WorkflowStarted", entityRef: "doc-1" };

describe("EventBus", () => {
  it("delivers events to exact-type and wildcard subscribers", async () => {
    const bus = new EventBus(silentLogger);
    const onCompleted = vi.fn();
    const onAny = vi.fn();
    bus.subscribe("WorkflowCompleted", onCompleted);
    bus.subscribeAll(onAny);

    await bus.publish(completed);
    await bus.publish(started);

    expect(onCompleted).toHaveBeenCalledTimes(1);
    expect(onCompleted).toHaveBeenCalledWith(completed);
    expect(onAny.mock.calls.map(([event]) => event.type)).toEqual([
      "WorkflowCompleted",
      "WorkflowStarted",
    ]);
  });

  it("logs failing subscribers without affecting the others", async () => {
    const error = vi.fn();
    const logger: Logger = { ...silentLogger, error };
    const bus = new EventBus(logger);
    const healthy = vi.fn();
    bus.subscribe(
      "WorkflowCompleted",
      () => {
        throw new Error("projection offline");
      },
      "search-index",
    );
    bus.subscribe("WorkflowCompleted", healthy);

    await expect(bus.publish(completed)).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("Event subscriber failed", {
      subscriber: "search-index",
      eventType: "WorkflowCompleted",
      instanceId: "inst-1",
      error: "projection offline",
    });
  });

  it("unsubscribes", async () => {
    const bus = new EventBus(silentLogger);
    const handler = vi.fn();
    const unsubscribe = bus.subscribe("WorkflowCompleted", handler);
    expect(bus.subscriberCount()).toBe(1);

    unsubscribe();
    await bus.publish(completed);

    expect(bus.subscriberCount()).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});
