import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DefinitionError } from "./errors";
import {
  type EscalationRule,
  type WorkflowAction,
  type WorkflowDefinition,
  type WorkflowNode,
  asActionId,
  asEdgeId,
} from "./types";
import { type EdgeInput, defineWorkflow } from "./workflow-definition";

const Params = Type.Record(Type.String(), Type.Unknown());

const TimeWindowSchema = Type.Object({
  from: Type.Optional(Type.String()),
  to: Type.Optional(Type.String()),
  daysOfWeek: Type.Optional(Type.Array(Type.Integer({ minimum: 0, maximum: 6 }))),
  hours: Type.Optional(
    Type.Object({
      start: Type.Integer({ minimum: 0, maximum: 24 }),
      end: Type.Integer({ minimum: 0, maximum: 24 }),
    }),
  ),
});

export const GuardSchema = Type.Recursive((This) =>
  Type.Union([
    Type.Object({ kind: Type.Literal("requireRole"), role: Type.String() }),
    Type.Object({ kind: Type.Literal("requirePermission"), permission: Type.String() }),
    Type.Object({ kind: Type.Literal("withinTimeWindow"), window: TimeWindowSchema }),
    Type.Object({
      kind: Type.Literal("approvalCount"),
      variable: Type.String(),
      required: Type.Integer({ minimum: 1 }),
    }),
    Type.Object({
      kind: Type.Literal("variableEquals"),
      variable: Type.String(),
      value: Type.Unknown(),
    }),
    Type.Object({
      kind: Type.Literal("named"),
      name: Type.String(),
      params: Type.Optional(Params),
    }),
    Type.Object({ kind: Type.Literal("all"), guards: Type.Array(This) }),
    Type.Object({ kind: Type.Literal("any"), guards: Type.Array(This) }),
    Type.Object({ kind: Type.Literal("not"), guard: This }),
  ]),
);

const ConditionSchema = Type.Union([
  Type.Object({ kind: Type.Literal("expression"), expression: Type.String() }),
  Type.Object({ kind: Type.Literal("guard"), guard: GuardSchema }),
]);

const LogLevelSchema = Type.Union([
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
]);

const ActionSchema = Type.Union([
  Type.Object({
    id: Type.String(),
    type: Type.Literal("setVariable"),
    name: Type.String(),
    value: Type.Unknown(),
  }),
  Type.Object({
    id: Type.String(),
    type: Type.Literal("notify"),
    template: Type.String(),
    recipients: Type.Array(Type.String()),
    channel: Type.Optional(
      Type.Union([
        Type.Literal("email"),
        Type.Literal("in-app"),
        Type.Literal("webhook"),
        Type.Literal("chat"),
      ]),
    ),
  }),
  Type.Object({
    id: Type.String(),
    type: Type.Literal("invokeExternal"),
    target: Type.String(),
    payload: Type.Optional(Params),
  }),
  Type.Object({
    id: Type.String(),
    type: Type.Literal("escalate"),
    targets: Type.Array(Type.String()),
    template: Type.Optional(Type.String()),
  }),
  Type.Object({
    id: Type.String(),
    type: Type.Literal("log"),
    level: LogLevelSchema,
    message: Type.String(),
  }),
  Type.Object({
    id: Type.String(),
    type: Type.Literal("named"),
    name: Type.String(),
    params: Type.Optional(Params),
  }),
]);

const EscalationSchema = Type.Object({
  id: Type.String(),
  triggerAfterMs: Type.Optional(Type.Number()),
  targets: Type.Array(Type.String()),
  repeatIntervalMs: Type.Optional(Type.Number()),
  maxRepeats: Type.Optional(Type.Integer()),
  actions: Type.Optional(Type.Array(ActionSchema)),
});

const nodeSchema = <K extends string, T extends Record<string, TSchema>>(type: K, fields: T) =>
  Type.Object({
    type: Type.Literal(type),
    name: Type.String(),
    guards: Type.Optional(Type.Array(GuardSchema)),
    entryActions: Type.Optional(Type.Array(ActionSchema)),
    exitActions: Type.Optional(Type.Array(ActionSchema)),
    ...fields,
  });

const StartSchema = nodeSchema("start", {});
const ParallelSchema = nodeSchema("parallel", {});
const TaskSchema = nodeSchema("task", {
  taskType: Type.Optional(
    Type.Union([Type.Literal("manual"), Type.Literal("automatic"), Type.Literal("review")]),
  ),
  assignee: Type.Optional(
    Type.Union([
      Type.Object({ kind: Type.Literal("user"), userId: Type.String() }),
      Type.Object({ kind: Type.Literal("role"), role: Type.String() }),
      Type.Object({ kind: Type.Literal("variable"), variable: Type.String() }),
    ]),
  ),
  slaMs: Type.Optional(Type.Number()),
  escalations: Type.Optional(Type.Array(EscalationSchema)),
});
const DecisionSchema = nodeSchema("decision", {
  conditions: Type.Array(
    Type.Object({ name: Type.String(), when: ConditionSchema, edge: Type.String() }),
  ),
  defaultEdge: Type.Optional(Type.String()),
});
const JoinSchema = nodeSchema("join", { expectedBranches: Type.Integer() });
const TimerSchema = nodeSchema("timer", {
  durationMs: Type.Number(),
  timeoutActions: Type.Optional(Type.Array(ActionSchema)),
  escalations: Type.Optional(Type.Array(EscalationSchema)),
});
const EndSchema = nodeSchema("end", {
  outcome: Type.Optional(
    Type.Union([Type.Literal("success"), Type.Literal("failure"), Type.Literal("cancelled")]),
  ),
});

const NodeSchema = Type.Union([
  StartSchema,
  TaskSchema,
  DecisionSchema,
  ParallelSchema,
  JoinSchema,
  TimerSchema,
  EndSchema,
]);

const EdgeSchema = Type.Object({
  from: Type.String(),
  to: Type.String(),
  when: Type.Optional(Type.Union([Type.String(), ConditionSchema])),
  condition: Type.Optional(ConditionSchema),
  priority: Type.Optional(Type.Integer()),
  kind: Type.Optional(Type.Union([Type.Literal("normal"), Type.Literal("error")])),
});

const VariableSchema = Type.Object({
  type: Type.Union([
    Type.Literal("string"),
    Type.Literal("number"),
    Type.Literal("boolean"),
    Type.Literal("datetime"),
    Type.Literal("json"),
  ]),
  default: Type.Optional(Type.Unknown()),
  required: Type.Optional(Type.Boolean()),
  description: Type.Optional(Type.String()),
});

const definitionFields = {
  name: Type.String({ minLength: 1 }),
  version: Type.String({ pattern: "^\\d+\\.\\d+\\.\\d+([-+].*)?$" }),
  description: Type.Optional(Type.String()),
  variables: Type.Optional(Type.Record(Type.String(), VariableSchema)),
  active: Type.Optional(Type.Boolean()),
  category: Type.Optional(Type.String()),
  tags: Type.Optional(Type.Array(Type.String())),
  onCancel: Type.Optional(Type.Array(ActionSchema)),
};

/** Authoring form: node and edge maps at the top level. */
export const WorkflowInputSchema = Type.Object({
  ...definitionFields,
  nodes: Type.Record(Type.String(), NodeSchema),
  edges: Type.Record(Type.String(), EdgeSchema),
});

/** Published form, as produced by `defineWorkflow` or read back from storage. */
export const PublishedWorkflowSchema = Type.Object({
  ...definitionFields,
  id: Type.String(),
  graph: Type.Object({
    nodes: Type.Record(Type.String(), NodeSchema),
    edges: Type.Record(Type.String(), EdgeSchema),
    startNodes: Type.Array(Type.String()),
    endNodes: Type.Array(Type.String()),
  }),
});

export const DefinitionDocumentSchema = Type.Union([WorkflowInputSchema, PublishedWorkflowSchema]);

type ActionJson = Static<typeof ActionSchema>;
type EscalationJson = Static<typeof EscalationSchema>;
type NodeJson = Static<typeof NodeSchema>;
type EdgeJson = Static<typeof EdgeSchema>;

const toAction = (action: ActionJson): WorkflowAction => ({
  ...action,
  id: asActionId(action.id),
});

const toRule = (rule: EscalationJson): EscalationRule => {
  const { actions, ...rest } = rule;
  return { ...rest, ...(actions ? { actions: actions.map(toAction) } : {}) };
};

const withHooks = <T extends { entryActions?: ActionJson[]; exitActions?: ActionJson[] }>(
  node: T,
) => {
  const { entryActions, exitActions, ...rest } = node;
  return {
    ...rest,
    ...(entryActions ? { entryActions: entryActions.map(toAction) } : {}),
    ...(exitActions ? { exitActions: exitActions.map(toAction) } : {}),
  };
};

const toNode = (node: NodeJson): WorkflowNode => {
  switch (node.type) {
    case "start":
      return { ...withHooks(node), type: "start" };
    case "parallel":
      return { ...withHooks(node), type: "parallel" };
    case "join":
      return { ...withHooks(node), type: "join" };
    case "end":
      return { ...withHooks(node), type: "end" };
    case "task": {
      const { escalations, ...rest } = withHooks(node);
      return {
        ...rest,
        type: "task",
        ...(escalations ? { escalations: escalations.map(toRule) } : {}),
      };
    }
    case "timer": {
      const { escalations, timeoutActions, ...rest } = withHooks(node);
      return {
        ...rest,
        type: "timer",
        ...(timeoutActions ? { timeoutActions: timeoutActions.map(toAction) } : {}),
        ...(escalations ? { escalations: escalations.map(toRule) } : {}),
      };
    }
    case "decision": {
      const { conditions, defaultEdge, ...rest } = withHooks(node);
      return {
        ...rest,
        type: "decision",
        conditions: conditions.map((branch) => ({ ...branch, edge: asEdgeId(branch.edge) })),
        ...(defaultEdge ? { defaultEdge: asEdgeId(defaultEdge) } : {}),
      };
    }
  }
};

const toEdgeInput = (edge: EdgeJson): EdgeInput => {
  const when = edge.when ?? edge.condition;
  return {
    from: edge.from,
    to: edge.to,
    ...(when !== undefined ? { when } : {}),
    ...(edge.priority !== undefined ? { priority: edge.priority } : {}),
    ...(edge.kind ? { kind: edge.kind } : {}),
  };
};

const mapValues = <A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> =>
  Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fn(value)]));

/**
 * Checks an untrusted document (parsed JSON or a module export) against
 * the definition schema and builds a `WorkflowDefinition` from it.
 * Graph-level validation still happens at publish time.
 */
export const parseDefinition = (raw: unknown, source = "definition"): WorkflowDefinition => {
  if (!Value.Check(DefinitionDocumentSchema, raw)) {
    const issues = [...Value.Errors(DefinitionDocumentSchema, raw)]
      .slice(0, 10)
      .map((error) => ({
        code: "schema" as const,
        message: `${error.path || "/"}: ${error.message}`,
      }));
    throw new DefinitionError(issues, `Malformed workflow ${source}`);
  }

  const nodes = "graph" in raw ? raw.graph.nodes : raw.nodes;
  const edges = "graph" in raw ? raw.graph.edges : raw.edges;

  return defineWorkflow({
    name: raw.name,
    version: raw.version,
    ...(raw.description !== undefined ? { description: raw.description } : {}),
    nodes: mapValues(nodes, toNode),
    edges: mapValues(edges, toEdgeInput),
    ...(raw.variables ? { variables: raw.variables } : {}),
    ...(raw.active !== undefined ? { active: raw.active } : {}),
    ...(raw.category ? { category: raw.category } : {}),
    ...(raw.tags ? { tags: raw.tags } : {}),
    ...(raw.onCancel ? { onCancel: raw.onCancel.map(toAction) } : {}),
  });
};
