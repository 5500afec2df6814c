import { describe, expect, it } from "vitest";
import {
  ConditionSyntaxError,
  evaluateExpression,
  lookupVariable,
  parseCondition,
  referencedVariables,
} from "../src/core/conditions";

describe("condition expressions", () => {
  it("compares variables against literals", () => {
    const vars = { decision: "approve", amount: 12_500, urgent: true };

    expect(evaluateExpression("decision == 'approve'", vars)).toBe(true);
    expect(evaluateExpression('decision != "approve"', vars)).toBe(false);
    expect(evaluateExpression("amount > 10000", vars)).toBe(true);
    expect(evaluateExpression("amount <= 10000", vars)).toBe(false);
    expect(evaluateExpression("urgent == true", vars)).toBe(true);
  });

  it("combines clauses with boolean operators and parentheses", () => {
    const vars = { amount: 500, region: "eu" };

    expect(evaluateExpression("amount > 100 && !(region in ['us', 'ca'])", vars)).toBe(true);
    expect(evaluateExpression("amount > 1000 || region in ['eu']", vars)).toBe(true);
    expect(evaluateExpression("!(amount > 100) && region == 'eu'", vars)).toBe(false);
  });

  it("treats comparisons on unset variables as false", () => {
    expect(evaluateExpression("decision == 'approve'", {})).toBe(false);
    expect(evaluateExpression("decision != 'approve'", {})).toBe(false);
    expect(evaluateExpression("score > 3", {})).toBe(false);
    expect(evaluateExpression("region in ['eu']", {})).toBe(false);
  });

  it("tests bare paths for truthiness, flat keys first", () => {
    expect(evaluateExpression("legal.approved", { "legal.approved": true })).toBe(true);
    expect(evaluateExpression("legal.approved", { legal: { approved: true } })).toBe(true);
    expect(evaluateExpression("legal.approved", { legal: { approved: false } })).toBe(false);
    expect(evaluateExpression("legal.approved", {})).toBe(false);
  });

  it("only orders values of the same primitive type", () => {
    expect(evaluateExpression("amount > 5", { amount: "10" })).toBe(false);
    expect(evaluateExpression("name < 'm'", { name: "alice" })).toBe(true);
  });

  it("reports syntax errors with their position", () => {
    expect(() => parseCondition("amount >")).toThrow(ConditionSyntaxError);
    expect(() => parseCondition("'open")).toThrow('Unterminated string at position 0 in "\'open"');
    expect(() => parseCondition("a == 1 )")).toThrow("Unexpected token at position 7");
    expect(() => parseCondition("a in [b]")).toThrow("List items must be literals");
  });

  it("lists the variables an expression reads", () => {
    expect(referencedVariables("legal.approved && finance.approved")).toEqual([
      "legal.approved",
      "finance.approved",
    ]);
    expect(referencedVariables("risk in ['high'] || score >= 7")).toEqual(["risk", "score"]);
  });

  it("looks up nested values", () => {
    expect(lookupVariable({ a: { b: { c: 3 } } }, "a.b.c")).toEqual({ defined: true, value: 3 });
    expect(lookupVariable({ a: [1] }, "a.length")).toEqual({ defined: false, value: undefined });
  });
});
