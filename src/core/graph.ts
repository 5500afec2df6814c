import { ConditionSyntaxError, parseCondition } from "./conditions";
import { DefinitionError, type DefinitionIssue } from "./errors";
import {
  type Condition,
  type EdgeId,
  type NodeId,
  type WorkflowDefinition,
  type WorkflowEdge,
  type WorkflowGraph,
  type WorkflowNode,
  asEdgeId,
  asNodeId,
} from "./types";

export interface GraphEdge extends WorkflowEdge {
  id: EdgeId;
}

export type ValidationResult =
  | { ok: true }
  | { ok: false; issues: DefinitionIssue[] };

const byPriority = (a: GraphEdge, b: GraphEdge): number =>
  (a.priority ?? 0) - (b.priority ?? 0) || a.id.localeCompare(b.id);

const allEdges = (graph: WorkflowGraph): GraphEdge[] =>
  Object.entries(graph.edges).map(([id, edge]) => ({ ...edge, id: asEdgeId(id) }));

/** Normal edges leaving `nodeId`, in evaluation order. */
export const outgoingEdges = (graph: WorkflowGraph, nodeId: NodeId): GraphEdge[] =>
  allEdges(graph)
    .filter((edge) => edge.from === nodeId && edge.kind !== "error")
    .sort(byPriority);

export const errorEdge = (
  graph: WorkflowGraph,
  nodeId: NodeId,
): GraphEdge | undefined =>
  allEdges(graph)
    .filter((edge) => edge.from === nodeId && edge.kind === "error")
    .sort(byPriority)[0];

export const incomingEdges = (graph: WorkflowGraph, nodeId: NodeId): GraphEdge[] =>
  allEdges(graph)
    .filter((edge) => edge.to === nodeId && edge.kind !== "error")
    .sort(byPriority);

export const getNode = (graph: WorkflowGraph, nodeId: NodeId): WorkflowNode => {
  const node = graph.nodes[nodeId];
  if (!node) {
    throw new DefinitionError(
      [{ code: "dangling_edge", message: `Unknown node ${nodeId}`, node: nodeId }],
      "Broken workflow graph",
    );
  }
  return node;
};

export const getEdge = (graph: WorkflowGraph, edgeId: EdgeId): GraphEdge => {
  const edge = graph.edges[edgeId];
  if (!edge) {
    throw new DefinitionError(
      [{ code: "dangling_edge", message: `Unknown edge ${edgeId}`, edge: edgeId }],
      "Broken workflow graph",
    );
  }
  return { ...edge, id: edgeId };
};

/** Every node reachable from `from`, following normal and error edges. */
export const reachableNodes = (graph: WorkflowGraph, from: NodeId[]): Set<NodeId> => {
  const seen = new Set<NodeId>();
  const edges = allEdges(graph);
  const queue = [...from];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || seen.has(current)) {
      continue;
    }
    seen.add(current);
    for (const edge of edges) {
      if (edge.from === current && !seen.has(edge.to)) {
        queue.push(edge.to);
      }
    }
  }
  return seen;
};

const checkCondition = (
  condition: Condition | undefined,
  where: { node?: string; edge?: string },
  issues: DefinitionIssue[],
): void => {
  if (!condition || condition.kind !== "expression") {
    return;
  }
  try {
    parseCondition(condition.expression);
  } catch (error) {
    if (!(error instanceof ConditionSyntaxError)) {
      throw error;
    }
    issues.push({ code: "invalid_condition", message: error.message, ...where });
  }
};

const isPositive = (value: number | undefined): boolean =>
  value === undefined || (Number.isFinite(value) && value > 0);

const checkTiming = (
  nodeId: string,
  node: WorkflowNode,
  issues: DefinitionIssue[],
): void => {
  const invalid = (message: string) =>
    issues.push({ code: "invalid_timer", message, node: nodeId });

  if (node.type === "timer" && !isPositive(node.durationMs)) {
    invalid(`Timer ${nodeId} needs a positive duration`);
  }
  if (node.type === "task" && !isPositive(node.slaMs)) {
    invalid(`Task ${nodeId} has a non-positive SLA`);
  }
  if (node.type !== "task" && node.type !== "timer") {
    return;
  }
  for (const rule of node.escalations ?? []) {
    const fallback = node.type === "task" ? node.slaMs : undefined;
    if ((rule.triggerAfterMs ?? fallback) === undefined) {
      invalid(`Escalation ${rule.id} on ${nodeId} has no trigger time and no SLA to inherit`);
    }
    if (!isPositive(rule.triggerAfterMs) || !isPositive(rule.repeatIntervalMs)) {
      invalid(`Escalation ${rule.id} on ${nodeId} has a non-positive interval`);
    }
    if (rule.maxRepeats !== undefined && !(Number.isInteger(rule.maxRepeats) && rule.maxRepeats >= 1)) {
      invalid(`Escalation ${rule.id} on ${nodeId} needs maxRepeats >= 1`);
    }
  }
};

const PASS_THROUGH: ReadonlySet<WorkflowNode["type"]> = new Set(["start", "parallel", "join", "end"]);

/**
 * A cycle is unguarded when none of its edges has a condition and none of
 * its nodes waits for an external stimulus.
 */
const findUnguardedCycles = (graph: WorkflowGraph): NodeId[] => {
  const adjacency = new Map<string, string[]>();
  for (const edge of allEdges(graph)) {
    const from = graph.nodes[edge.from];
    const to = graph.nodes[edge.to];
    if (!from || !to || edge.condition || edge.kind === "error") continue;
    if (!PASS_THROUGH.has(from.type) || !PASS_THROUGH.has(to.type)) continue;
    adjacency.set(edge.from, [...(adjacency.get(edge.from) ?? []), edge.to]);
  }

  const state = new Map<string, "visiting" | "done">();
  const offenders: NodeId[] = [];
  const visit = (nodeId: string): void => {
    state.set(nodeId, "visiting");
    for (const next of adjacency.get(nodeId) ?? []) {
      const seen = state.get(next);
      if (seen === "visiting") {
        offenders.push(asNodeId(next));
      } else if (seen === undefined) {
        visit(next);
      }
    }
    state.set(nodeId, "done");
  };
  for (const nodeId of adjacency.keys()) {
    if (!state.has(nodeId)) visit(nodeId);
  }
  return offenders;
};

export const validateDefinition = (definition: WorkflowDefinition): ValidationResult => {
  const { graph } = definition;
  const issues: DefinitionIssue[] = [];
  const edges = allEdges(graph);

  if (graph.startNodes.length === 0) {
    issues.push({ code: "no_start_node", message: "Graph declares no start node" });
  }
  if (graph.endNodes.length === 0) {
    issues.push({ code: "no_end_node", message: "Graph declares no end node" });
  }

  for (const nodeId of graph.startNodes) {
    if (graph.nodes[nodeId]?.type !== "start") {
      issues.push({
        code: "undeclared_start_or_end",
        message: `Start node ${nodeId} is missing or not of type start`,
        node: nodeId,
      });
    }
  }
  for (const nodeId of graph.endNodes) {
    if (graph.nodes[nodeId]?.type !== "end") {
      issues.push({
        code: "undeclared_start_or_end",
        message: `End node ${nodeId} is missing or not of type end`,
        node: nodeId,
      });
    }
  }
  for (const [nodeId, node] of Object.entries(graph.nodes)) {
    const id = asNodeId(nodeId);
    if (node.type === "start" && !graph.startNodes.includes(id)) {
      issues.push({
        code: "undeclared_start_or_end",
        message: `Start node ${nodeId} is not listed in startNodes`,
        node: nodeId,
      });
    }
    if (node.type === "end" && !graph.endNodes.includes(id)) {
      issues.push({
        code: "undeclared_start_or_end",
        message: `End node ${nodeId} is not listed in endNodes`,
        node: nodeId,
      });
    }
  }

  for (const edge of edges) {
    for (const end of [edge.from, edge.to]) {
      if (!graph.nodes[end]) {
        issues.push({
          code: "dangling_edge",
          message: `Edge ${edge.id} references unknown node ${end}`,
          edge: edge.id,
        });
      }
    }
    if (graph.nodes[edge.to]?.type === "start") {
      issues.push({
        code: "start_has_incoming",
        message: `Edge ${edge.id} enters start node ${edge.to}`,
        edge: edge.id,
        node: edge.to,
      });
    }
    checkCondition(edge.condition, { edge: edge.id }, issues);
  }

  const reachable = reachableNodes(
    graph,
    graph.startNodes.filter((nodeId) => graph.nodes[nodeId]),
  );

  for (const [nodeId, node] of Object.entries(graph.nodes)) {
    const id = asNodeId(nodeId);
    const outgoing = outgoingEdges(graph, id);

    if (graph.startNodes.length > 0 && !reachable.has(id)) {
      issues.push({
        code: "unreachable_node",
        message: `Node ${nodeId} cannot be reached from a start node`,
        node: nodeId,
      });
    }

    if (node.type !== "end" && outgoing.length === 0) {
      issues.push({
        code: "dead_end",
        message: `Node ${nodeId} has no outgoing edge`,
        node: nodeId,
      });
    }

    checkTiming(nodeId, node, issues);

    if (node.type === "decision") {
      const referenced = [
        ...node.conditions.map((branch) => branch.edge),
        ...(node.defaultEdge ? [node.defaultEdge] : []),
      ];
      for (const edgeId of referenced) {
        if (graph.edges[edgeId]?.from !== id) {
          issues.push({
            code: "decision_edge_mismatch",
            message: `Decision ${nodeId} refers to edge ${edgeId}, which does not leave it`,
            node: nodeId,
            edge: edgeId,
          });
        }
      }
      for (const branch of node.conditions) {
        checkCondition(branch.when, { node: nodeId }, issues);
      }
      const exhaustive = node.conditions.some(
        (branch) => branch.when.kind === "expression" && branch.when.expression.trim() === "true",
      );
      if (!node.defaultEdge && !exhaustive) {
        issues.push({
          code: "missing_default_edge",
          message: `Decision ${nodeId} has no default edge`,
          node: nodeId,
        });
      }
    }

    if (node.type === "join") {
      const incoming = incomingEdges(graph, id).length;
      if (!Number.isInteger(node.expectedBranches) || node.expectedBranches < 1) {
        issues.push({
          code: "invalid_join",
          message: `Join ${nodeId} must expect at least one branch`,
          node: nodeId,
        });
      } else if (node.expectedBranches > incoming) {
        issues.push({
          code: "invalid_join",
          message: `Join ${nodeId} expects ${node.expectedBranches} branches but has ${incoming} incoming edges`,
          node: nodeId,
        });
      }
    }
  }

  for (const nodeId of findUnguardedCycles(graph)) {
    issues.push({
      code: "unguarded_cycle",
      message: `Node ${nodeId} is part of a cycle with no condition or waiting node`,
      node: nodeId,
    });
  }

  return issues.length === 0 ? { ok: true } : { ok: false, issues };
};

export const assertValidDefinition = (definition: WorkflowDefinition): void => {
  const result = validateDefinition(definition);
  if (!result.ok) {
    throw new DefinitionError(result.issues, `Invalid workflow definition ${definition.id}`);
  }
};
