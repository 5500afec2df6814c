import { describe, expect, it } from "vitest";
import { DefinitionError } from "../src/core/errors";
import {
  assertValidDefinition,
  errorEdge,
  outgoingEdges,
  reachableNodes,
  validateDefinition,
} from "../src/core/graph";
import { asNodeId } from "../src/core/types";
import {
  type WorkflowInput,
  decision,
  defineWorkflow,
  end,
  join,
  parallel,
  start,
  task,
  timer,
} from "../src/core/workflow-definition";

const linear = (overrides: Partial<WorkflowInput> = {}): WorkflowInput => ({
  name: "linear",
  version: "1.0.0",
  nodes: {
    start: start(),
    draft: task({ name: "Draft" }),
    done: end(),
  },
  edges: {
    "start-draft": { from: "start", to: "draft" },
    "draft-done": { from: "draft", to: "done" },
  },
  ...overrides,
});

const codes = (input: WorkflowInput): string[] => {
  const result = validateDefinition(defineWorkflow(input));
  return result.ok ? [] : result.issues.map((issue) => issue.code);
};

describe("graph validation", () => {
  it("accepts a well-formed graph", () => {
    expect(validateDefinition(defineWorkflow(linear()))).toEqual({ ok: true });
  });

  it("requires start and end nodes", () => {
    expect(
      codes(
        linear({
          nodes: { draft: task({ name: "Draft" }) },
          edges: {},
        }),
      ),
    ).toEqual(["no_start_node", "no_end_node", "dead_end"]);
  });

  it("flags dangling edges and edges into a start node", () => {
    expect(
      codes(
        linear({
          edges: {
            "start-draft": { from: "start", to: "draft" },
            "draft-done": { from: "draft", to: "done" },
            "draft-ghost": { from: "draft", to: "ghost" },
            "done-start": { from: "done", to: "start" },
          },
        }),
      ),
    ).toEqual(["dangling_edge", "start_has_incoming"]);
  });

  it("flags unreachable nodes and dead ends", () => {
    expect(
      codes(
        linear({
          nodes: {
            start: start(),
            draft: task({ name: "Draft" }),
            orphan: task({ name: "Orphan" }),
            done: end(),
          },
          edges: {
            "start-draft": { from: "start", to: "draft" },
            "draft-done": { from: "draft", to: "done" },
            "orphan-done": { from: "orphan", to: "done" },
          },
        }),
      ),
    ).toEqual(["unreachable_node"]);

    expect(
      codes(
        linear({
          edges: { "start-draft": { from: "start", to: "draft" } },
        }),
      ),
    ).toEqual(["dead_end", "unreachable_node"]);
  });

  it("requires a default edge on decisions that are not exhaustive", () => {
    const decisionGraph = (defaultEdge?: string, firstWhen = "ok == true"): WorkflowInput =>
      linear({
        nodes: {
          start: start(),
          check: decision({
            name: "Check",
            branches: [{ name: "ok", when: firstWhen, edge: "check-done" }],
            ...(defaultEdge ? { defaultEdge } : {}),
          }),
          done: end(),
          other: end("Other"),
        },
        edges: {
          "start-check": { from: "start", to: "check" },
          "check-done": { from: "check", to: "done" },
          "check-other": { from: "check", to: "other" },
        },
      });

    expect(codes(decisionGraph())).toEqual(["missing_default_edge"]);
    expect(codes(decisionGraph("check-other"))).toEqual([]);
    expect(codes(decisionGraph(undefined, "true"))).toEqual([]);
    expect(codes(decisionGraph("start-check"))).toEqual(["decision_edge_mismatch"]);
  });

  it("reports unparsable conditions", () => {
    expect(
      codes(
        linear({
          edges: {
            "start-draft": { from: "start", to: "draft" },
            "draft-done": { from: "draft", to: "done", when: "amount >" },
          },
        }),
      ),
    ).toEqual(["invalid_condition"]);
  });

  it("checks join arity against incoming edges", () => {
    const withJoin = (expectedBranches: number): WorkflowInput =>
      linear({
        nodes: {
          start: start(),
          fork: parallel("Fork"),
          a: task({ name: "A" }),
          b: task({ name: "B" }),
          sync: join({ name: "Sync", expectedBranches }),
          done: end(),
        },
        edges: {
          "start-fork": { from: "start", to: "fork" },
          "fork-a": { from: "fork", to: "a" },
          "fork-b": { from: "fork", to: "b" },
          "a-sync": { from: "a", to: "sync" },
          "b-sync": { from: "b", to: "sync" },
          "sync-done": { from: "sync", to: "done" },
        },
      });

    expect(codes(withJoin(2))).toEqual([]);
    expect(codes(withJoin(3))).toEqual(["invalid_join"]);
    expect(codes(withJoin(0))).toEqual(["invalid_join"]);
  });

  it("rejects cycles that nothing can stop", () => {
    expect(
      codes(
        linear({
          nodes: {
            start: start(),
            fork: parallel("Fork"),
            sync: join({ name: "Sync", expectedBranches: 1 }),
            done: end(),
          },
          edges: {
            "start-fork": { from: "start", to: "fork" },
            "fork-sync": { from: "fork", to: "sync" },
            "sync-fork": { from: "sync", to: "fork" },
            "fork-done": { from: "fork", to: "done" },
          },
        }),
      ),
    ).toEqual(["unguarded_cycle"]);
  });

  it("allows rework loops through a task", () => {
    expect(
      codes(
        linear({
          nodes: {
            start: start(),
            draft: task({ name: "Draft" }),
            decide: decision({
              name: "Decide",
              branches: [{ name: "approve", when: "decision == 'approve'", edge: "decide-done" }],
              defaultEdge: "decide-draft",
            }),
            done: end(),
          },
          edges: {
            "start-draft": { from: "start", to: "draft" },
            "draft-decide": { from: "draft", to: "decide" },
            "decide-done": { from: "decide", to: "done" },
            "decide-draft": { from: "decide", to: "draft" },
          },
        }),
      ),
    ).toEqual([]);
  });

  it("validates timer durations and escalation timing", () => {
    expect(
      codes(
        linear({
          nodes: {
            start: start(),
            wait: timer({ name: "Wait", durationMs: 0 }),
            draft: task({
              name: "Draft",
              escalations: [{ id: "late", targets: ["role:lead"] }],
            }),
            done: end(),
          },
          edges: {
            "start-wait": { from: "start", to: "wait" },
            "wait-draft": { from: "wait", to: "draft" },
            "draft-done": { from: "draft", to: "done" },
          },
        }),
      ),
    ).toEqual(["invalid_timer", "invalid_timer"]);
  });

  it("throws a DefinitionError listing every issue", () => {
    const broken = defineWorkflow(linear({ edges: {} }));
    expect(() => assertValidDefinition(broken)).toThrow(DefinitionError);
    try {
      assertValidDefinition(broken);
    } catch (error) {
      expect(error).toBeInstanceOf(DefinitionError);
      if (error instanceof DefinitionError) {
        expect(error.issues.map((issue) => issue.node)).toEqual(["start", "draft", "draft", "done"]);
      }
    }
  });
});

describe("graph queries", () => {
  const graph = defineWorkflow(
    linear({
      nodes: {
        start: start(),
        draft: task({ name: "Draft" }),
        done: end(),
        failed: end("Failed"),
      },
      edges: {
        "start-draft": { from: "start", to: "draft" },
        "draft-z": { from: "draft", to: "done" },
        "draft-a": { from: "draft", to: "done" },
        "draft-first": { from: "draft", to: "done", priority: -1 },
        "draft-failed": { from: "draft", to: "failed", kind: "error" },
      },
    }),
  ).graph;

  it("orders outgoing edges by priority, then id", () => {
    expect(outgoingEdges(graph, asNodeId("draft")).map((edge) => edge.id)).toEqual([
      "draft-first",
      "draft-a",
      "draft-z",
    ]);
  });

  it("keeps error edges apart", () => {
    expect(errorEdge(graph, asNodeId("draft"))?.id).toBe("draft-failed");
    expect(errorEdge(graph, asNodeId("start"))).toBeUndefined();
  });

  it("walks reachable nodes through error edges too", () => {
    expect([...reachableNodes(graph, [asNodeId("start")])].sort()).toEqual([
      "done",
      "draft",
      "failed",
      "start",
    ]);
  });
});
