import {
  type ActionId,
  type AssigneeRule,
  type Condition,
  type DecisionNode,
  type EndNode,
  type EscalateAction,
  type EscalationRule,
  type Guard,
  type InvokeExternalAction,
  type JoinNode,
  type LogAction,
  type LogLevel,
  type NamedAction,
  type NotificationChannel,
  type NotifyAction,
  type ParallelNode,
  type SetVariableAction,
  type StartNode,
  type TaskNode,
  type TimeWindow,
  type TimerNode,
  type VariableDeclaration,
  type WorkflowAction,
  type WorkflowDefinition,
  type WorkflowEdge,
  type WorkflowNode,
  asActionId,
  asDefinitionId,
  asEdgeId,
  asNodeId,
} from "./types";

type NodeOptions = {
  guards?: Guard[];
  entryActions?: WorkflowAction[];
  exitActions?: WorkflowAction[];
};

export interface EdgeInput {
  from: string;
  to: string;
  /** An expression string or a full condition. */
  when?: string | Condition;
  priority?: number;
  kind?: "normal" | "error";
}

export interface WorkflowInput {
  name: string;
  version: string;
  description?: string;
  nodes: Record<string, WorkflowNode>;
  edges: Record<string, EdgeInput>;
  variables?: Record<string, VariableDeclaration>;
  active?: boolean;
  category?: string;
  tags?: string[];
  onCancel?: WorkflowAction[];
}

export const definitionId = (name: string, version: string) =>
  asDefinitionId(`${name}@${version}`);

const toCondition = (when: string | Condition): Condition =>
  typeof when === "string" ? { kind: "expression", expression: when } : when;

const toEdge = (input: EdgeInput): WorkflowEdge => ({
  from: asNodeId(input.from),
  to: asNodeId(input.to),
  ...(input.when !== undefined ? { condition: toCondition(input.when) } : {}),
  ...(input.priority !== undefined ? { priority: input.priority } : {}),
  ...(input.kind ? { kind: input.kind } : {}),
});

/**
 * Assembles a definition from node and edge maps. Start and end node lists
 * are derived from node types. The result is not validated; publish it
 * through the registry for that.
 */
export const defineWorkflow = (input: WorkflowInput): WorkflowDefinition => {
  const nodeIds = Object.keys(input.nodes).map(asNodeId);
  return {
    id: definitionId(input.name, input.version),
    name: input.name,
    version: input.version,
    description: input.description ?? "",
    graph: {
      nodes: input.nodes,
      edges: Object.fromEntries(
        Object.entries(input.edges).map(([id, edge]) => [id, toEdge(edge)]),
      ),
      startNodes: nodeIds.filter((id) => input.nodes[id]?.type === "start"),
      endNodes: nodeIds.filter((id) => input.nodes[id]?.type === "end"),
    },
    variables: input.variables ?? {},
    active: input.active ?? true,
    ...(input.category ? { category: input.category } : {}),
    ...(input.tags ? { tags: input.tags } : {}),
    ...(input.onCancel ? { onCancel: input.onCancel } : {}),
  };
};

// --- Nodes ---

export const start = (name = "Start", options: NodeOptions = {}): StartNode => ({
  type: "start",
  name,
  ...options,
});

export const task = (
  config: NodeOptions & {
    name: string;
    taskType?: TaskNode["taskType"];
    assignee?: AssigneeRule;
    slaMs?: number;
    escalations?: EscalationRule[];
  },
): TaskNode => ({ type: "task", ...config });

export const decision = (
  config: NodeOptions & {
    name: string;
    branches: { name: string; when: string | Condition; edge: string }[];
    defaultEdge?: string;
  },
): DecisionNode => {
  const { branches, defaultEdge, ...rest } = config;
  return {
    type: "decision",
    ...rest,
    conditions: branches.map((branch) => ({
      name: branch.name,
      when: toCondition(branch.when),
      edge: asEdgeId(branch.edge),
    })),
    ...(defaultEdge ? { defaultEdge: asEdgeId(defaultEdge) } : {}),
  };
};

export const parallel = (name: string, options: NodeOptions = {}): ParallelNode => ({
  type: "parallel",
  name,
  ...options,
});

export const join = (
  config: NodeOptions & { name: string; expectedBranches: number },
): JoinNode => ({ type: "join", ...config });

export const timer = (
  config: NodeOptions & {
    name: string;
    durationMs: number;
    timeoutActions?: WorkflowAction[];
    escalations?: EscalationRule[];
  },
): TimerNode => ({ type: "timer", ...config });

export const end = (
  name = "End",
  config: NodeOptions & { outcome?: EndNode["outcome"] } = {},
): EndNode => ({ type: "end", name, ...config });

// --- Conditions and guards ---

export const expr = (expression: string): Condition => ({ kind: "expression", expression });

export const whenGuard = (guard: Guard): Condition => ({ kind: "guard", guard });

export const requireRole = (role: string): Guard => ({ kind: "requireRole", role });

export const requirePermission = (permission: string): Guard => ({
  kind: "requirePermission",
  permission,
});

export const withinTimeWindow = (window: TimeWindow): Guard => ({
  kind: "withinTimeWindow",
  window,
});

export const approvalCount = (variable: string, required: number): Guard => ({
  kind: "approvalCount",
  variable,
  required,
});

export const variableEquals = (variable: string, value: unknown): Guard => ({
  kind: "variableEquals",
  variable,
  value,
});

export const namedGuard = (name: string, params?: Record<string, unknown>): Guard => ({
  kind: "named",
  name,
  ...(params ? { params } : {}),
});

export const allOf = (...guards: Guard[]): Guard => ({ kind: "all", guards });
export const anyOf = (...guards: Guard[]): Guard => ({ kind: "any", guards });
export const not = (guard: Guard): Guard => ({ kind: "not", guard });

// --- Actions ---

const id = (value: string): ActionId => asActionId(value);

export const setVariable = (actionId: string, name: string, value: unknown): SetVariableAction => ({
  id: id(actionId),
  type: "setVariable",
  name,
  value,
});

export const notify = (
  actionId: string,
  config: { template: string; recipients: string[]; channel?: NotificationChannel },
): NotifyAction => ({ id: id(actionId), type: "notify", ...config });

export const invokeExternal = (
  actionId: string,
  target: string,
  payload?: Record<string, unknown>,
): InvokeExternalAction => ({
  id: id(actionId),
  type: "invokeExternal",
  target,
  ...(payload ? { payload } : {}),
});

export const escalate = (
  actionId: string,
  targets: string[],
  template?: string,
): EscalateAction => ({
  id: id(actionId),
  type: "escalate",
  targets,
  ...(template ? { template } : {}),
});

export const log = (actionId: string, level: LogLevel, message: string): LogAction => ({
  id: id(actionId),
  type: "log",
  level,
  message,
});

export const namedAction = (
  actionId: string,
  name: string,
  params?: Record<string, unknown>,
): NamedAction => ({
  id: id(actionId),
  type: "named",
  name,
  ...(params ? { params } : {}),
});
