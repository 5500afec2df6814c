import { createHash } from "node:crypto";
import stringify from "json-stable-stringify";
import { nanoid } from "nanoid";
import {
  type EdgeId,
  type NodeId,
  type WorkflowTransition,
  asTransitionId,
} from "./types";

export const GENESIS_HASH = "0".repeat(64);

export interface TransitionInput {
  from: NodeId;
  to: NodeId;
  edge?: EdgeId;
  at: string;
  actor: string;
  reason: string;
  variables: Record<string, unknown>;
}

export const hashTransition = (entry: Omit<WorkflowTransition, "hash">): string =>
  createHash("sha256")
    .update(stringify(entry) ?? "{}")
    .digest("hex");

/** Builds the next entry of `history`, chained to its last hash. */
export const nextTransition = (
  history: readonly WorkflowTransition[],
  input: TransitionInput,
): WorkflowTransition => {
  const body: Omit<WorkflowTransition, "hash"> = {
    id: asTransitionId(nanoid()),
    sequence: history.length + 1,
    from: input.from,
    to: input.to,
    ...(input.edge ? { edge: input.edge } : {}),
    at: input.at,
    actor: input.actor,
    reason: input.reason,
    variables: input.variables,
    previousHash: history.at(-1)?.hash ?? GENESIS_HASH,
  };
  return { ...body, hash: hashTransition(body) };
};

export type HistoryVerification =
  | { ok: true }
  | { ok: false; index: number; reason: string };

export const verifyHistory = (history: readonly WorkflowTransition[]): HistoryVerification => {
  let previous = GENESIS_HASH;
  for (const [index, entry] of history.entries()) {
    if (entry.sequence !== index + 1) {
      return { ok: false, index, reason: `expected sequence ${index + 1}, found ${entry.sequence}` };
    }
    if (entry.previousHash !== previous) {
      return { ok: false, index, reason: "chain link does not match the preceding entry" };
    }
    const { hash, ...body } = entry;
    if (hashTransition(body) !== hash) {
      return { ok: false, index, reason: "entry content does not match its hash" };
    }
    previous = hash;
  }
  return { ok: true };
};

/**
 * Index of the first entry of `prefix` that `history` no longer carries
 * unchanged, or null when `prefix` is a leading slice of `history`.
 */
export const firstRewrittenEntry = (
  prefix: readonly WorkflowTransition[],
  history: readonly WorkflowTransition[],
): number | null => {
  for (const [index, entry] of prefix.entries()) {
    if (history[index]?.hash !== entry.hash) {
      return index;
    }
  }
  return null;
};
