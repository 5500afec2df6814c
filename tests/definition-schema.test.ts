import { describe, expect, it } from "vitest";
import { parseDefinition } from "../src/core/definition-schema";
import { DefinitionError } from "../src/core/errors";
import contractReview from "../src/workflows/contract-review";

describe("parseDefinition", () => {
  it("builds a definition from the authoring form", () => {
    const definition = parseDefinition({
      name: "expense",
      version: "1.0.0",
      variables: { amount: { type: "number", required: true } },
      nodes: {
        start: { type: "start", name: "Start" },
        approve: {
          type: "task",
          name: "Approve",
          guards: [{ kind: "any", guards: [{ kind: "requireRole", role: "manager" }, { kind: "not", guard: { kind: "requireRole", role: "intern" } }] }],
          entryActions: [{ id: "ping", type: "notify", template: "approve", recipients: ["$assignee"] }],
        },
        route: {
          type: "decision",
          name: "Route",
          conditions: [{ name: "large", when: { kind: "expression", expression: "amount > 1000" }, edge: "route-cfo" }],
          defaultEdge: "route-done",
        },
        cfo: { type: "task", name: "CFO" },
        done: { type: "end", name: "Done" },
      },
      edges: {
        "start-approve": { from: "start", to: "approve" },
        "approve-route": { from: "approve", to: "route" },
        "route-cfo": { from: "route", to: "cfo" },
        "route-done": { from: "route", to: "done" },
        "cfo-done": { from: "cfo", to: "done", condition: { kind: "guard", guard: { kind: "requireRole", role: "cfo" } } },
      },
    });

    expect(definition.id).toBe("expense@1.0.0");
    expect(definition.graph.startNodes).toEqual(["start"]);
    expect(definition.graph.endNodes).toEqual(["done"]);
    expect(definition.graph.nodes.route).toEqual({
      type: "decision",
      name: "Route",
      conditions: [{ name: "large", when: { kind: "expression", expression: "amount > 1000" }, edge: "route-cfo" }],
      defaultEdge: "route-done",
    });
    expect(definition.graph.edges["cfo-done"]?.condition).toEqual({
      kind: "guard",
      guard: { kind: "requireRole", role: "cfo" },
    });
    expect(definition.active).toBe(true);
  });

  it("accepts a published definition read back from JSON", () => {
    const parsed = parseDefinition(JSON.parse(JSON.stringify(contractReview)), "contract-review.json");
    expect(parsed).toEqual(contractReview);
  });

  it("reports schema violations with their paths", () => {
    try {
      parseDefinition({ name: "x", version: "1.0.0", nodes: { a: { type: "loop", name: "A" } }, edges: {} }, "x.json");
      expect.unreachable("parseDefinition should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(DefinitionError);
      if (error instanceof DefinitionError) {
        expect(error.message.startsWith("Malformed workflow x.json: ")).toBe(true);
        expect(error.issues.length).toBeGreaterThan(0);
        expect(error.issues.every((issue) => issue.code === "schema")).toBe(true);
      }
    }
  });

  it("rejects non-semver versions", () => {
    expect(() => parseDefinition({ name: "x", version: "latest", nodes: {}, edges: {} })).toThrow(
      "Malformed workflow definition",
    );
  });
});
