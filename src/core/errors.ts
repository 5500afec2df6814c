import type { ActionId, InstanceId, NodeId } from "./types";

export type WorkflowErrorCode =
  | "definition_error"
  | "guard_denied"
  | "action_failed"
  | "concurrency_conflict"
  | "terminal_state_violation"
  | "instance_not_found"
  | "definition_not_found"
  | "history_rewrite"
  | "invalid_input"
  | "entity_not_found";

/**
 * Base class for every error the engine raises on purpose. `code` is stable
 * and safe to branch on; `message` is meant for display.
 */
export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

export type DefinitionIssueCode =
  | "no_start_node"
  | "no_end_node"
  | "undeclared_start_or_end"
  | "start_has_incoming"
  | "dangling_edge"
  | "unreachable_node"
  | "dead_end"
  | "missing_default_edge"
  | "decision_edge_mismatch"
  | "invalid_join"
  | "unguarded_cycle"
  | "invalid_condition"
  | "invalid_timer"
  | "duplicate_definition"
  | "schema";

export interface DefinitionIssue {
  code: DefinitionIssueCode;
  message: string;
  node?: string;
  edge?: string;
}

export class DefinitionError extends WorkflowError {
  constructor(
    public readonly issues: DefinitionIssue[],
    context = "Invalid workflow definition",
  ) {
    super(
      "definition_error",
      `${context}: ${issues.map((issue) => issue.message).join("; ")}`,
    );
    this.name = "DefinitionError";
  }
}

export class GuardDeniedError extends WorkflowError {
  constructor(
    public readonly nodeId: NodeId,
    public readonly guard: string,
    public readonly reason: string,
  ) {
    super("guard_denied", `Guard ${guard} denied entry to ${nodeId}: ${reason}`);
    this.name = "GuardDeniedError";
  }
}

export type ActionFailureSeverity = "transient" | "fatal";

/**
 * Thrown by notification/integration sinks for failures worth retrying
 * (timeouts, 5xx, throttling).
 */
export class TransientActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransientActionError";
  }
}

export class ActionFailedError extends WorkflowError {
  constructor(
    public readonly actionId: ActionId,
    public readonly severity: ActionFailureSeverity,
    message: string,
    public readonly attempts: number,
    public readonly exhausted = false,
  ) {
    super("action_failed", `Action ${actionId} failed (${severity}): ${message}`);
    this.name = "ActionFailedError";
  }
}

export class ConcurrencyConflictError extends WorkflowError {
  constructor(
    public readonly instanceId: InstanceId,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      "concurrency_conflict",
      `Instance ${instanceId} is at version ${actualVersion}, expected ${expectedVersion}. Reload and retry.`,
    );
    this.name = "ConcurrencyConflictError";
  }
}

export class InstanceNotFoundError extends WorkflowError {
  constructor(public readonly instanceId: string) {
    super("instance_not_found", `Unknown workflow instance: ${instanceId}`);
    this.name = "InstanceNotFoundError";
  }
}

export class HistoryRewriteError extends WorkflowError {
  constructor(
    public readonly instanceId: InstanceId,
    public readonly index: number,
  ) {
    super(
      "history_rewrite",
      `History of ${instanceId} is append-only; entry ${index} was changed or removed`,
    );
    this.name = "HistoryRewriteError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
