import { describe, expect, it } from "vitest";
import {
  allOf,
  anyOf,
  decision,
  defineWorkflow,
  end,
  escalate,
  expr,
  invokeExternal,
  log,
  namedAction,
  namedGuard,
  not,
  requireRole,
  start,
  task,
  whenGuard,
} from "../src/core/workflow-definition";

describe("workflow-definition helpers", () => {
  it("derives ids and start/end lists", () => {
    const definition = defineWorkflow({
      name: "memo",
      version: "0.2.0",
      nodes: { begin: start(), write: task({ name: "Write" }), filed: end("Filed") },
      edges: {
        "begin-write": { from: "begin", to: "write" },
        "write-filed": { from: "write", to: "filed", when: "ready == true", priority: 2 },
      },
    });

    expect(definition.id).toBe("memo@0.2.0");
    expect(definition.description).toBe("");
    expect(definition.active).toBe(true);
    expect(definition.graph.startNodes).toEqual(["begin"]);
    expect(definition.graph.endNodes).toEqual(["filed"]);
    expect(definition.graph.edges["begin-write"]).toEqual({ from: "begin", to: "write" });
    expect(definition.graph.edges["write-filed"]).toEqual({
      from: "write",
      to: "filed",
      condition: { kind: "expression", expression: "ready == true" },
      priority: 2,
    });
    expect("onCancel" in definition).toBe(false);
  });

  it("builds decision branches from strings or conditions", () => {
    const node = decision({
      name: "Route",
      branches: [
        { name: "big", when: "amount > 100", edge: "route-big" },
        { name: "lead", when: whenGuard(requireRole("lead")), edge: "route-lead" },
      ],
    });

    expect(node).toEqual({
      type: "decision",
      name: "Route",
      conditions: [
        { name: "big", when: expr("amount > 100"), edge: "route-big" },
        { name: "lead", when: { kind: "guard", guard: { kind: "requireRole", role: "lead" } }, edge: "route-lead" },
      ],
    });
  });

  it("composes guards", () => {
    expect(allOf(requireRole("a"), not(anyOf(requireRole("b"), namedGuard("weekday"))))).toEqual({
      kind: "all",
      guards: [
        { kind: "requireRole", role: "a" },
        {
          kind: "not",
          guard: { kind: "any", guards: [{ kind: "requireRole", role: "b" }, { kind: "named", name: "weekday" }] },
        },
      ],
    });
  });

  it("omits optional action fields that were not given", () => {
    expect(invokeExternal("call", "crm")).toEqual({ id: "call", type: "invokeExternal", target: "crm" });
    expect(escalate("up", ["role:lead"])).toEqual({ id: "up", type: "escalate", targets: ["role:lead"] });
    expect(namedAction("stamp", "stamp", { color: "red" })).toEqual({
      id: "stamp",
      type: "named",
      name: "stamp",
      params: { color: "red" },
    });
    expect(log("note", "warn", "late")).toEqual({ id: "note", type: "log", level: "warn", message: "late" });
  });
});
