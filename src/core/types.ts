export type Brand<T, B extends string> = T & { readonly __brand: B };

export type DefinitionId = Brand<string, "DefinitionId">;
export type InstanceId = Brand<string, "InstanceId">;
export type NodeId = Brand<string, "NodeId">;
export type EdgeId = Brand<string, "EdgeId">;
export type ActionId = Brand<string, "ActionId">;
export type TransitionId = Brand<string, "TransitionId">;

export const asDefinitionId = (value: string): DefinitionId =>
  value as DefinitionId;
export const asInstanceId = (value: string): InstanceId => value as InstanceId;
export const asNodeId = (value: string): NodeId => value as NodeId;
export const asEdgeId = (value: string): EdgeId => value as EdgeId;
export const asActionId = (value: string): ActionId => value as ActionId;
export const asTransitionId = (value: string): TransitionId =>
  value as TransitionId;

// --- Conditions ---

export interface ExpressionCondition {
  kind: "expression";
  expression: string;
}

export interface GuardCondition {
  kind: "guard";
  guard: Guard;
}

export type Condition = ExpressionCondition | GuardCondition;

// --- Guards ---

export interface TimeWindow {
  /** ISO instant; the window is open-ended when omitted. */
  from?: string;
  to?: string;
  /** 0 = Sunday … 6 = Saturday, in UTC. */
  daysOfWeek?: number[];
  /** Half-open UTC hour range, e.g. `{ start: 9, end: 17 }`. */
  hours?: { start: number; end: number };
}

export type Guard =
  | { kind: "requireRole"; role: string }
  | { kind: "requirePermission"; permission: string }
  | { kind: "withinTimeWindow"; window: TimeWindow }
  | { kind: "approvalCount"; variable: string; required: number }
  | { kind: "variableEquals"; variable: string; value: unknown }
  | { kind: "named"; name: string; params?: Record<string, unknown> }
  | { kind: "all"; guards: Guard[] }
  | { kind: "any"; guards: Guard[] }
  | { kind: "not"; guard: Guard };

export type Requirement =
  | { kind: "approvals"; variable: string; missing: number }
  | { kind: "role"; role: string }
  | { kind: "permission"; permission: string }
  | { kind: "variable"; variable: string }
  | { kind: "custom"; description: string };

export type GuardResult =
  | { outcome: "allow" }
  | { outcome: "deny"; guard: string; reason: string }
  | { outcome: "requireAdditional"; guard: string; requirements: Requirement[] };

// --- Actions ---

export type NotificationChannel = "email" | "in-app" | "webhook" | "chat";
export type LogLevel = "debug" | "info" | "warn" | "error";

interface ActionBase {
  id: ActionId;
}

export interface SetVariableAction extends ActionBase {
  type: "setVariable";
  name: string;
  value: unknown;
}

export interface NotifyAction extends ActionBase {
  type: "notify";
  template: string;
  /**
   * User ids, `role:<name>`, `{{variable}}` templates, or the placeholder
   * `$assignee` which resolves to the node's current assignment.
   */
  recipients: string[];
  channel?: NotificationChannel;
}

export interface InvokeExternalAction extends ActionBase {
  type: "invokeExternal";
  target: string;
  payload?: Record<string, unknown>;
}

export interface EscalateAction extends ActionBase {
  type: "escalate";
  targets: string[];
  template?: string;
}

export interface LogAction extends ActionBase {
  type: "log";
  level: LogLevel;
  message: string;
}

export interface NamedAction extends ActionBase {
  type: "named";
  name: string;
  params?: Record<string, unknown>;
}

export type WorkflowAction =
  | SetVariableAction
  | NotifyAction
  | InvokeExternalAction
  | EscalateAction
  | LogAction
  | NamedAction;

export interface EscalationRule {
  id: string;
  /** Measured from node entry. Defaults to the task SLA. */
  triggerAfterMs?: number;
  targets: string[];
  repeatIntervalMs?: number;
  /** Total firings including the first. Unlimited when omitted. */
  maxRepeats?: number;
  /** Defaults to a single `escalate` action to `targets`. */
  actions?: WorkflowAction[];
}

// --- Nodes ---

export type AssigneeRule =
  | { kind: "user"; userId: string }
  | { kind: "role"; role: string }
  | { kind: "variable"; variable: string };

interface NodeBase {
  name: string;
  guards?: Guard[];
  entryActions?: WorkflowAction[];
  exitActions?: WorkflowAction[];
}

export interface StartNode extends NodeBase {
  type: "start";
}

export interface TaskNode extends NodeBase {
  type: "task";
  taskType?: "manual" | "automatic" | "review";
  assignee?: AssigneeRule;
  slaMs?: number;
  escalations?: EscalationRule[];
}

export interface DecisionBranch {
  name: string;
  when: Condition;
  edge: EdgeId;
}

export interface DecisionNode extends NodeBase {
  type: "decision";
  conditions: DecisionBranch[];
  defaultEdge?: EdgeId;
}

export interface ParallelNode extends NodeBase {
  type: "parallel";
}

export interface JoinNode extends NodeBase {
  type: "join";
  expectedBranches: number;
}

export interface TimerNode extends NodeBase {
  type: "timer";
  durationMs: number;
  timeoutActions?: WorkflowAction[];
  escalations?: EscalationRule[];
}

export interface EndNode extends NodeBase {
  type: "end";
  outcome?: "success" | "failure" | "cancelled";
}

export type WorkflowNode =
  | StartNode
  | TaskNode
  | DecisionNode
  | ParallelNode
  | JoinNode
  | TimerNode
  | EndNode;

export type NodeType = WorkflowNode["type"];

export interface WorkflowEdge {
  from: NodeId;
  to: NodeId;
  condition?: Condition;
  priority?: number;
  /** Error edges are only followed when an action on `from` fails fatally. */
  kind?: "normal" | "error";
}

export interface WorkflowGraph {
  nodes: Record<string, WorkflowNode>;
  edges: Record<string, WorkflowEdge>;
  startNodes: NodeId[];
  endNodes: NodeId[];
}

export type VariableType = "string" | "number" | "boolean" | "datetime" | "json";

export interface VariableDeclaration {
  type: VariableType;
  default?: unknown;
  required?: boolean;
  description?: string;
}

export interface WorkflowDefinition {
  id: DefinitionId;
  name: string;
  version: string;
  description: string;
  graph: WorkflowGraph;
  variables: Record<string, VariableDeclaration>;
  active: boolean;
  category?: string;
  tags?: string[];
  /** Run once per active node when an instance is cancelled. */
  onCancel?: WorkflowAction[];
}

// --- Instances ---

export type InstanceStatus =
  | "running"
  | "suspended"
  | "completed"
  | "failed"
  | "cancelled";

export const TERMINAL_STATUSES: readonly InstanceStatus[] = [
  "completed",
  "failed",
  "cancelled",
];

export interface Actor {
  id: string;
  roles?: string[];
  /** Glob patterns, e.g. `documents:*`. */
  permissions?: string[];
}

export interface WorkflowTransition {
  id: TransitionId;
  sequence: number;
  from: NodeId;
  to: NodeId;
  edge?: EdgeId;
  at: string;
  actor: string;
  reason: string;
  variables: Record<string, unknown>;
  previousHash: string;
  hash: string;
}

export interface JoinArrival {
  from: NodeId;
  at: string;
}

export interface JoinState {
  visit: number;
  arrivals: JoinArrival[];
}

/** Persisted copy of a scheduled timer, used to re-arm after a restart. */
export interface ArmedTimer {
  nodeId: NodeId;
  visit: number;
  kind: "timeout" | "escalation";
  ruleId?: string;
  fireAt: string;
  /** 1 for the first firing of an escalation rule. */
  firing: number;
  repeatIntervalMs?: number;
  maxRepeats?: number;
}

export interface InstanceFailure {
  nodeId: NodeId;
  actionId?: ActionId;
  message: string;
  at: string;
}

export interface WorkflowInstance {
  id: InstanceId;
  definitionId: DefinitionId;
  entityRef: string;
  initiator: string;
  status: InstanceStatus;
  activeNodes: NodeId[];
  variables: Record<string, unknown>;
  history: WorkflowTransition[];
  /** Node → SLA or timeout deadline (ISO). */
  deadlines: Record<string, string>;
  timers: ArmedTimer[];
  joins: Record<string, JoinState>;
  visits: Record<string, number>;
  assignments: Record<string, string>;
  executedActions: string[];
  failure?: InstanceFailure;
  version: number;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}
