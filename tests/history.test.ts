import { describe, expect, it } from "vitest";
import {
  GENESIS_HASH,
  firstRewrittenEntry,
  hashTransition,
  nextTransition,
  verifyHistory,
} from "../src/core/history";
import { type WorkflowTransition, asNodeId } from "../src/core/types";

const append = (history: WorkflowTransition[], from: string, to: string): WorkflowTransition[] => [
  ...history,
  nextTransition(history, {
    from: asNodeId(from),
    to: asNodeId(to),
    at: "2024-01-01T00:00:00.000Z",
    actor: "user-1",
    reason: "task_completed",
    variables: { decision: "approve" },
  }),
];

describe("transition history", () => {
  it("chains entries by hash", () => {
    const history = append(append([], "draft", "review"), "review", "decide");
    const [first, second] = history;

    expect(first?.sequence).toBe(1);
    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.sequence).toBe(2);
    expect(second?.previousHash).toBe(first?.hash);
    expect(verifyHistory(history)).toEqual({ ok: true });
  });

  it("hashes independently of key order", () => {
    const [entry] = append([], "draft", "review");
    if (!entry) throw new Error("expected an entry");
    const { hash, ...body } = entry;
    const { previousHash, variables, ...rest } = body;

    expect(hashTransition({ previousHash, variables, ...rest })).toBe(hash);
  });

  it("detects edited and dropped entries", () => {
    const history = append(append(append([], "draft", "review"), "review", "decide"), "decide", "done");

    const edited = history.map((entry, index) =>
      index === 1 ? { ...entry, actor: "someone-else" } : entry,
    );
    expect(verifyHistory(edited)).toEqual({
      ok: false,
      index: 1,
      reason: "entry content does not match its hash",
    });

    expect(verifyHistory(history.filter((_, index) => index !== 1))).toEqual({
      ok: false,
      index: 1,
      reason: "expected sequence 2, found 3",
    });
  });

  it("finds where a stored prefix was rewritten", () => {
    const stored = append(append([], "draft", "review"), "review", "decide");
    const extended = append(stored, "decide", "done");

    expect(firstRewrittenEntry(stored, extended)).toBeNull();
    expect(firstRewrittenEntry(stored, extended.slice(1))).toBe(0);
    expect(firstRewrittenEntry(stored, stored.slice(0, 1))).toBe(1);
  });
});
