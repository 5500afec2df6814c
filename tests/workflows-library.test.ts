import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import type { NotificationSink } from "../src/core/actions";
import { validateDefinition } from "../src/core/graph";
import { InMemoryInstanceStore } from "../src/core/instance-store";
import type { Actor } from "../src/core/types";
import { builtinWorkflows, createWorkflowRuntime } from "../src/index";
import { silentLogger } from "../src/observability/logger";
import { defaultEngineConfig } from "../src/project/config";
import { ManualClock } from "../src/runtime/clock";

const author: Actor = { id: "user-author", roles: ["author"] };

const createRuntime = async (cwd = fs.mkdtempSync(path.join(os.tmpdir(), "workflow-runtime-"))) => {
  const notifications = { notify: vi.fn<NotificationSink["notify"]>(async () => {}) };
  const runtime = await createWorkflowRuntime({
    cwd,
    config: defaultEngineConfig,
    store: new InMemoryInstanceStore(),
    notifications,
    clock: new ManualClock(),
    logger: silentLogger,
  });
  return { runtime, notifications };
};

describe("built-in workflows", () => {
  it("are valid graphs", () => {
    expect(builtinWorkflows.map((definition) => definition.id)).toEqual([
      "document-approval@1.0.0",
      "contract-review@1.0.0",
      "compliance-review@1.0.0",
    ]);
    for (const definition of builtinWorkflows) {
      expect(validateDefinition(definition)).toEqual({ ok: true });
    }
  });

  it("takes a document from draft to approved", async () => {
    const { runtime, notifications } = await createRuntime();
    const { engine } = runtime;
    const { instance } = await engine.startWorkflow({
      definitionId: "document-approval",
      entityRef: "doc-1",
      initiator: author,
      variables: { author: "user-author" },
    });
    expect(instance.assignments).toEqual({ draft: "user-author" });
    expect(instance.variables.title).toBe("Untitled document");

    await engine.completeTask({ instanceId: instance.id, nodeId: "draft", actor: author });
    const outcome = await engine.completeTask({
      instanceId: instance.id,
      nodeId: "review",
      data: { decision: "approve" },
      actor: { id: "user-approver", roles: ["reviewer", "approver"] },
    });

    expect(outcome.status).toBe("transitioned");
    expect(outcome.instance.status).toBe("completed");
    expect(outcome.instance.activeNodes).toEqual(["approved"]);
    expect(outcome.instance.variables.approved).toBe(true);
    expect(notifications.notify.mock.calls.map(([notification]) => notification.recipients)).toEqual([
      ["role:reviewer"],
      ["user-author"],
    ]);
  });

  it("lets only an approver approve", async () => {
    const { runtime } = await createRuntime();
    const { engine } = runtime;
    const { instance } = await engine.startWorkflow({
      definitionId: "document-approval",
      entityRef: "doc-2",
      initiator: author,
      variables: { author: "user-author" },
    });
    await engine.completeTask({ instanceId: instance.id, nodeId: "draft", actor: author });

    const outcome = await engine.completeTask({
      instanceId: instance.id,
      nodeId: "review",
      data: { decision: "approve" },
      actor: { id: "user-reviewer", roles: ["reviewer"] },
    });

    expect(outcome.status).toBe("rejected");
    if (outcome.status !== "rejected") return;
    expect(outcome.rejection.code).toBe("guard_denied");
    expect(outcome.rejection.nodeId).toBe("approved");
    expect(outcome.instance.activeNodes).toEqual(["review"]);
  });
});

describe("createWorkflowRuntime", () => {
  it("loads project definitions beside the built-ins", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "workflow-runtime-"));
    const definitionsDir = path.join(cwd, ".workflow", "definitions");
    fs.mkdirSync(definitionsDir, { recursive: true });
    fs.writeFileSync(
      path.join(definitionsDir, "leave-request.json"),
      JSON.stringify({
        name: "leave-request",
        version: "1.0.0",
        nodes: {
          start: { type: "start", name: "Start" },
          approve: { type: "task", name: "Approve" },
          done: { type: "end", name: "Done" },
        },
        edges: {
          "start-approve": { from: "start", to: "approve" },
          "approve-done": { from: "approve", to: "done" },
        },
      }),
    );

    const { runtime } = await createRuntime(cwd);

    expect(runtime.registry.list().map((definition) => definition.id)).toEqual([
      "compliance-review@1.0.0",
      "contract-review@1.0.0",
      "document-approval@1.0.0",
      "leave-request@1.0.0",
    ]);
  });

  it("stores instances as files under the configured directory by default", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "workflow-runtime-"));
    const runtime = await createWorkflowRuntime({
      cwd,
      config: { ...defaultEngineConfig, storeDir: "instances" },
      clock: new ManualClock(),
      logger: silentLogger,
      includeBuiltins: false,
    });
    expect(runtime.registry.list()).toEqual([]);
    expect(fs.existsSync(path.join(cwd, "instances"))).toBe(true);

    await runtime.start();
    runtime.stop();
  });
});
