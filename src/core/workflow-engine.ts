import { nanoid } from "nanoid";
import { type Logger, createLogger } from "../observability/logger";
import { type Clock, systemClock } from "../runtime/clock";
import {
  type TimerEntry,
  type TimerOutcome,
  type TimerScheduler,
  nextFiring,
} from "../runtime/timer-scheduler";
import type { ActionContext, ActionExecutor } from "./actions";
import { lookupVariable, referencedVariables } from "./conditions";
import type { DefinitionRegistry } from "./definition-registry";
import {
  ActionFailedError,
  ConcurrencyConflictError,
  DefinitionError,
  GuardDeniedError,
  InstanceNotFoundError,
  WorkflowError,
  errorMessage,
} from "./errors";
import { type EventPublisher, EventBus, type WorkflowEvent } from "./events";
import { type GraphEdge, errorEdge, getEdge, getNode, outgoingEdges } from "./graph";
import { GuardEvaluator, type GuardContext } from "./guards";
import { type HistoryVerification, nextTransition, verifyHistory } from "./history";
import type { InstanceFilter, InstanceStore } from "./instance-store";
import {
  type Actor,
  type ArmedTimer,
  type AssigneeRule,
  type Condition,
  type DefinitionId,
  type Guard,
  type GuardResult,
  type InstanceFailure,
  type InstanceId,
  type InstanceStatus,
  type NodeId,
  type Requirement,
  type VariableDeclaration,
  type WorkflowAction,
  type WorkflowDefinition,
  type WorkflowInstance,
  type WorkflowNode,
  type WorkflowTransition,
  TERMINAL_STATUSES,
  asActionId,
  asInstanceId,
  asNodeId,
} from "./types";

export interface EntityResolver {
  exists(entityRef: string): Promise<boolean>;
}

export type RejectionCode =
  | "guard_denied"
  | "requires_additional"
  | "concurrency_conflict"
  | "terminal_state_violation"
  | "no_eligible_edge"
  | "instance_suspended"
  | "not_suspended";

export interface Rejection {
  code: RejectionCode;
  message: string;
  nodeId?: NodeId;
  guard?: string;
  requirements?: Requirement[];
  expectedVersion?: number;
  actualVersion?: number;
}

export type TransitionOutcome =
  | { status: "transitioned"; instance: WorkflowInstance; transitions: WorkflowTransition[] }
  | {
      status: "failed";
      instance: WorkflowInstance;
      transitions: WorkflowTransition[];
      failure: InstanceFailure;
    }
  | { status: "rejected"; instance: WorkflowInstance; rejection: Rejection };

export interface StartWorkflowInput {
  /** A `<name>@<version>` id, or a bare name for its latest active version. */
  definitionId: string;
  entityRef: string;
  initiator: Actor;
  variables?: Record<string, unknown>;
}

export interface TransitionWorkflowInput {
  instanceId: string;
  expectedVersion: number;
  triggerNode: string;
  targetNode?: string;
  data?: Record<string, unknown>;
  actor: Actor;
}

export interface CompleteTaskInput {
  instanceId: string;
  nodeId: string;
  data?: Record<string, unknown>;
  actor: Actor;
  expectedVersion?: number;
}

export interface SignalInput {
  instanceId: string;
  nodeId: string;
  data?: Record<string, unknown>;
  actor: Actor;
}

export interface LifecycleInput {
  instanceId: string;
  actor: Actor;
  reason?: string;
}

export interface AuditTrail {
  instanceId: InstanceId;
  definitionId: DefinitionId;
  history: WorkflowTransition[];
  verification: HistoryVerification;
}

export interface EngineStatistics {
  total: number;
  byStatus: Record<InstanceStatus, number>;
  byDefinition: Record<string, number>;
}

export interface WorkflowEngineOptions {
  registry: DefinitionRegistry;
  store: InstanceStore;
  executor: ActionExecutor;
  scheduler: TimerScheduler;
  clock?: Clock;
  guards?: GuardEvaluator;
  events?: EventPublisher;
  entities?: EntityResolver;
  logger?: Logger;
  /** Attempts a timer firing gets when it loses a version race. */
  timerRetryLimit?: number;
}

export const SCHEDULER_ACTOR: Actor = { id: "system:scheduler" };

const MAX_HOPS = 500;

interface Step {
  edge: GraphEdge;
  reason: string;
  snapshot: string[];
}

/** Working copy of one stimulus. Discarded unless the stimulus commits. */
interface Run {
  instance: WorkflowInstance;
  definition: WorkflowDefinition;
  actor: Actor;
  now: Date;
  transitions: WorkflowTransition[];
  events: WorkflowEvent[];
  touched: Set<NodeId>;
  dataKeys: string[];
  hops: number;
  rearmAll: boolean;
}

class StimulusRejected extends Error {
  constructor(public readonly rejection: Rejection) {
    super(rejection.message);
    this.name = "StimulusRejected";
  }
}

const guardVariables = (guard: Guard): string[] => {
  switch (guard.kind) {
    case "approvalCount":
    case "variableEquals":
      return [guard.variable];
    case "all":
    case "any":
      return guard.guards.flatMap(guardVariables);
    case "not":
      return guardVariables(guard.guard);
    default:
      return [];
  }
};

const conditionVariables = (condition: Condition | undefined): string[] => {
  if (!condition) return [];
  return condition.kind === "expression"
    ? referencedVariables(condition.expression)
    : guardVariables(condition.guard);
};

const pick = (variables: Record<string, unknown>, keys: Iterable<string>): Record<string, unknown> => {
  const snapshot: Record<string, unknown> = {};
  for (const key of keys) {
    const found = lookupVariable(variables, key);
    if (found.defined) snapshot[key] = found.value;
  }
  return snapshot;
};

const matchesType = (declaration: VariableDeclaration, value: unknown): boolean => {
  switch (declaration.type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "datetime":
      return typeof value === "string" && !Number.isNaN(Date.parse(value));
    case "json":
      return true;
  }
};

const variableProblems = (
  declarations: Record<string, VariableDeclaration>,
  values: Record<string, unknown>,
  requireAll: boolean,
): string[] =>
  Object.entries(declarations).flatMap(([name, declaration]) => {
    const value = values[name];
    if (value === undefined) {
      return requireAll && declaration.required ? [`${name} is required`] : [];
    }
    return matchesType(declaration, value) ? [] : [`${name} must be a ${declaration.type}`];
  });

const guardRejection = (nodeId: NodeId, result: Exclude<GuardResult, { outcome: "allow" }>): Rejection =>
  result.outcome === "deny"
    ? {
        code: "guard_denied",
        message: `Entry to ${nodeId} denied by ${result.guard}: ${result.reason}`,
        nodeId,
        guard: result.guard,
      }
    : {
        code: "requires_additional",
        message: `Entry to ${nodeId} needs more before ${result.guard} passes`,
        nodeId,
        guard: result.guard,
        requirements: result.requirements,
      };

const isTerminal = (status: InstanceStatus): boolean => TERMINAL_STATUSES.includes(status);

export class WorkflowEngine {
  private readonly registry: DefinitionRegistry;
  private readonly store: InstanceStore;
  private readonly executor: ActionExecutor;
  private readonly scheduler: TimerScheduler;
  private readonly clock: Clock;
  private readonly guards: GuardEvaluator;
  private readonly events: EventPublisher;
  private readonly entities: EntityResolver | undefined;
  private readonly logger: Logger;
  private readonly timerRetryLimit: number;

  constructor(options: WorkflowEngineOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.executor = options.executor;
    this.scheduler = options.scheduler;
    this.clock = options.clock ?? systemClock;
    this.guards = options.guards ?? new GuardEvaluator();
    this.logger = options.logger ?? createLogger("engine");
    this.events = options.events ?? new EventBus(this.logger.child("events"));
    this.entities = options.entities;
    this.timerRetryLimit = options.timerRetryLimit ?? 3;

    this.scheduler.onFire((entry, context) => this.handleTimer(entry, context));
  }

  // --- Commands ---

  async startWorkflow(
    input: StartWorkflowInput,
  ): Promise<{ status: "started"; instance: WorkflowInstance }> {
    const definition =
      this.registry.get(input.definitionId) ??
      this.registry.latest(input.definitionId, { activeOnly: true });
    if (!definition) {
      throw new WorkflowError("definition_not_found", `Unknown workflow definition: ${input.definitionId}`);
    }
    if (!definition.active) {
      throw new WorkflowError("invalid_input", `Workflow definition ${definition.id} is not active`);
    }
    if (this.entities && !(await this.entities.exists(input.entityRef))) {
      throw new WorkflowError("entity_not_found", `Unknown entity: ${input.entityRef}`);
    }

    const variables: Record<string, unknown> = { ...input.variables };
    for (const [name, declaration] of Object.entries(definition.variables)) {
      if (variables[name] === undefined && declaration.default !== undefined) {
        variables[name] = structuredClone(declaration.default);
      }
    }
    const problems = variableProblems(definition.variables, variables, true);
    if (problems.length > 0) {
      throw new WorkflowError("invalid_input", `Invalid workflow variables: ${problems.join("; ")}`);
    }

    const now = this.clock.now();
    const at = now.toISOString();
    const instance: WorkflowInstance = {
      id: asInstanceId(`${definition.name}-${nanoid(8)}`),
      definitionId: definition.id,
      entityRef: input.entityRef,
      initiator: input.initiator.id,
      status: "running",
      activeNodes: [],
      variables,
      history: [],
      deadlines: {},
      timers: [],
      joins: {},
      visits: {},
      assignments: {},
      executedActions: [],
      version: 0,
      createdAt: at,
      updatedAt: at,
    };
    const run = this.newRun(instance, definition, input.initiator, now);

    try {
      for (const startNode of definition.graph.startNodes) {
        this.activate(run, startNode);
        run.instance.visits[startNode] = 1;
        if (!(await this.runNodeActions(run, startNode, getNode(definition.graph, startNode).entryActions, "entry"))) {
          continue;
        }
        const step = this.chooseEdge(run, startNode, "started");
        if (!step) {
          throw new WorkflowError("invalid_input", `No eligible edge leaves start node ${startNode}`);
        }
        await this.follow(run, startNode, step, { record: false });
      }
    } catch (error) {
      if (!(error instanceof StimulusRejected)) throw error;
      const { rejection } = error;
      if (rejection.guard !== undefined) {
        throw new GuardDeniedError(
          rejection.nodeId ?? startNodeOf(definition),
          rejection.guard,
          rejection.message,
        );
      }
      throw new WorkflowError("invalid_input", rejection.message);
    }

    this.settle(run);
    run.instance.version = 1;
    await this.store.create(run.instance);
    this.executor.release(run.instance.executedActions);
    this.syncTimers(run);

    this.logger.info("Workflow started", {
      instanceId: run.instance.id,
      definitionId: definition.id,
      entityRef: input.entityRef,
      activeNodes: run.instance.activeNodes,
    });
    await this.publishAll([
      {
        ...this.eventBase(run, run.instance.activeNodes),
        type: "WorkflowStarted",
        entityRef: input.entityRef,
      },
      ...run.events,
    ]);
    return { status: "started", instance: run.instance };
  }

  async transitionWorkflow(input: TransitionWorkflowInput): Promise<TransitionOutcome> {
    return this.apply(input.instanceId, { expectedVersion: input.expectedVersion, actor: input.actor }, async (run) => {
      const nodeId = asNodeId(input.triggerNode);
      const rejection = this.checkTrigger(run, nodeId, ["task", "timer"]);
      if (rejection) return rejection;

      this.mergeData(run, input.data);
      const step = this.chooseEdge(
        run,
        nodeId,
        "transition",
        input.targetNode === undefined ? undefined : asNodeId(input.targetNode),
      );
      if (!step) {
        return {
          code: "no_eligible_edge",
          message: input.targetNode
            ? `No eligible edge from ${nodeId} to ${input.targetNode}`
            : `No eligible edge leaves ${nodeId}`,
          nodeId,
        };
      }
      await this.follow(run, nodeId, step, { record: true });
      return undefined;
    });
  }

  async completeTask(input: CompleteTaskInput): Promise<TransitionOutcome> {
    return this.apply(
      input.instanceId,
      { ...(input.expectedVersion !== undefined ? { expectedVersion: input.expectedVersion } : {}), actor: input.actor },
      async (run) => {
        const nodeId = asNodeId(input.nodeId);
        const rejection = this.checkTrigger(run, nodeId, ["task"]);
        if (rejection) return rejection;

        this.mergeData(run, input.data);
        const step = this.chooseEdge(run, nodeId, "task_completed");
        if (!step) {
          return { code: "no_eligible_edge", message: `No eligible edge leaves ${nodeId}`, nodeId };
        }
        run.events.push({ ...this.eventBase(run, [nodeId]), type: "TaskCompleted", nodeId });
        await this.follow(run, nodeId, step, { record: true });
        return undefined;
      },
    );
  }

  /** Releases a waiting timer node before its duration elapses. */
  async signal(input: SignalInput): Promise<TransitionOutcome> {
    return this.apply(input.instanceId, { actor: input.actor }, async (run) => {
      const nodeId = asNodeId(input.nodeId);
      const rejection = this.checkTrigger(run, nodeId, ["timer"]);
      if (rejection) return rejection;

      this.mergeData(run, input.data);
      const step = this.chooseEdge(run, nodeId, "signal");
      if (!step) {
        return { code: "no_eligible_edge", message: `No eligible edge leaves ${nodeId}`, nodeId };
      }
      await this.follow(run, nodeId, step, { record: true });
      return undefined;
    });
  }

  async cancelWorkflow(input: LifecycleInput): Promise<TransitionOutcome> {
    return this.apply(input.instanceId, { actor: input.actor, allowSuspended: true }, async (run) => {
      const reason = input.reason ?? "cancelled";
      const cancelled = [...run.instance.activeNodes];
      for (const nodeId of cancelled) {
        for (const action of run.definition.onCancel ?? []) {
          try {
            const result = await this.executor.execute(action, this.actionContext(run, nodeId, "cancel"));
            this.acknowledge(run, result.key, result.updates);
          } catch (error) {
            if (!(error instanceof ActionFailedError)) throw error;
            this.logger.error("Cancellation action failed", {
              instanceId: run.instance.id,
              nodeId,
              actionId: action.id,
              error: error.message,
            });
          }
        }
      }
      run.instance.status = "cancelled";
      run.instance.completedAt = run.now.toISOString();
      run.instance.timers = [];
      run.events.push({ ...this.eventBase(run, cancelled), type: "WorkflowCancelled", reason });
      return undefined;
    });
  }

  async suspendWorkflow(input: LifecycleInput): Promise<TransitionOutcome> {
    return this.apply(input.instanceId, { actor: input.actor }, async (run) => {
      run.instance.status = "suspended";
      run.events.push({
        ...this.eventBase(run, run.instance.activeNodes),
        type: "WorkflowSuspended",
        reason: input.reason ?? "suspended",
      });
      return undefined;
    });
  }

  async resumeWorkflow(input: LifecycleInput): Promise<TransitionOutcome> {
    return this.apply(input.instanceId, { actor: input.actor, allowSuspended: true }, async (run) => {
      if (run.instance.status !== "suspended") {
        return { code: "not_suspended", message: `Instance ${run.instance.id} is not suspended` };
      }
      run.instance.status = "running";
      run.rearmAll = true;
      run.events.push({ ...this.eventBase(run, run.instance.activeNodes), type: "WorkflowResumed" });
      return undefined;
    });
  }

  /**
   * Scheduler callback. Timers for a node the instance has left, for an
   * older visit, or for an instance that is no longer running are discarded.
   */
  async handleTimer(entry: TimerEntry, context: { lateByMs: number } = { lateByMs: 0 }): Promise<TimerOutcome> {
    for (let attempt = 1; attempt <= this.timerRetryLimit; attempt += 1) {
      const loaded = await this.store.load(entry.instanceId);
      const armed = loaded?.timers.find((timer) => sameTimer(timer, entry));
      if (
        !loaded ||
        loaded.status !== "running" ||
        !loaded.activeNodes.includes(entry.nodeId) ||
        loaded.visits[entry.nodeId] !== entry.visit ||
        !armed
      ) {
        return "discarded";
      }

      const outcome = await this.apply(
        entry.instanceId,
        { expectedVersion: loaded.version, actor: SCHEDULER_ACTOR },
        (run) => (entry.kind === "timeout" ? this.fireTimeout(run, armed) : this.fireEscalation(run, armed)),
      );

      if (outcome.status !== "rejected") {
        this.logger.info("Timer fired", {
          instanceId: entry.instanceId,
          nodeId: entry.nodeId,
          kind: entry.kind,
          firing: entry.firing,
          lateByMs: context.lateByMs,
        });
        return "fired";
      }
      if (outcome.rejection.code !== "concurrency_conflict") {
        this.logger.warn("Timer firing rejected", {
          instanceId: entry.instanceId,
          nodeId: entry.nodeId,
          code: outcome.rejection.code,
          reason: outcome.rejection.message,
        });
        return "fired";
      }
      this.logger.debug("Timer lost a version race, retrying", { instanceId: entry.instanceId, attempt });
    }

    throw new WorkflowError(
      "concurrency_conflict",
      `Timer on ${entry.nodeId} of ${entry.instanceId} lost ${this.timerRetryLimit} version races`,
    );
  }

  /** Re-arms the timers of every running instance from persisted state. */
  async recover(): Promise<number> {
    const running = await this.store.list({ status: "running" });
    let armed = 0;
    for (const instance of running) {
      this.scheduler.disarm(instance.id);
      for (const timer of instance.timers) {
        this.scheduler.schedule({ ...timer, instanceId: instance.id });
        armed += 1;
      }
    }
    this.logger.info("Timers recovered", { instances: running.length, timers: armed });
    return armed;
  }

  // --- Queries ---

  async getInstance(instanceId: string): Promise<WorkflowInstance | null> {
    return this.store.load(asInstanceId(instanceId));
  }

  async listInstances(filter?: InstanceFilter): Promise<WorkflowInstance[]> {
    return this.store.list(filter);
  }

  async getAuditTrail(instanceId: string): Promise<AuditTrail> {
    const instance = await this.store.load(asInstanceId(instanceId));
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return {
      instanceId: instance.id,
      definitionId: instance.definitionId,
      history: instance.history,
      verification: verifyHistory(instance.history),
    };
  }

  async getStatistics(): Promise<EngineStatistics> {
    const instances = await this.store.list();
    const byStatus: Record<InstanceStatus, number> = {
      running: 0,
      suspended: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    const byDefinition: Record<string, number> = {};
    for (const instance of instances) {
      byStatus[instance.status] += 1;
      byDefinition[instance.definitionId] = (byDefinition[instance.definitionId] ?? 0) + 1;
    }
    return { total: instances.length, byStatus, byDefinition };
  }

  // --- Stimulus pipeline ---

  private async apply(
    instanceId: string,
    options: { expectedVersion?: number; actor: Actor; allowSuspended?: boolean },
    body: (run: Run) => Promise<Rejection | undefined>,
  ): Promise<TransitionOutcome> {
    const loaded = await this.store.load(asInstanceId(instanceId));
    if (!loaded) {
      throw new InstanceNotFoundError(instanceId);
    }
    const reject = (rejection: Rejection): TransitionOutcome => {
      this.logger.info("Stimulus rejected", { instanceId, code: rejection.code, reason: rejection.message });
      return { status: "rejected", instance: loaded, rejection };
    };

    if (options.expectedVersion !== undefined && loaded.version !== options.expectedVersion) {
      return reject({
        code: "concurrency_conflict",
        message: `Instance ${instanceId} is at version ${loaded.version}, expected ${options.expectedVersion}. Reload and retry.`,
        expectedVersion: options.expectedVersion,
        actualVersion: loaded.version,
      });
    }
    if (isTerminal(loaded.status)) {
      return reject({
        code: "terminal_state_violation",
        message: `Instance ${instanceId} is ${loaded.status} and accepts no further changes`,
      });
    }
    if (loaded.status === "suspended" && !options.allowSuspended) {
      return reject({ code: "instance_suspended", message: `Instance ${instanceId} is suspended` });
    }

    const definition = this.registry.get(loaded.definitionId);
    if (!definition) {
      throw new WorkflowError("definition_not_found", `Workflow definition missing: ${loaded.definitionId}`);
    }

    const run = this.newRun(structuredClone(loaded), definition, options.actor, this.clock.now());
    try {
      const rejection = await body(run);
      if (rejection) return reject(rejection);
    } catch (error) {
      if (error instanceof StimulusRejected) return reject(error.rejection);
      throw error;
    }

    this.settle(run);
    run.instance.version = loaded.version + 1;
    run.instance.updatedAt = run.now.toISOString();
    try {
      await this.store.save(run.instance, loaded.version);
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        return reject({
          code: "concurrency_conflict",
          message: error.message,
          expectedVersion: error.expectedVersion,
          actualVersion: error.actualVersion,
        });
      }
      throw error;
    }

    this.executor.release(run.instance.executedActions);
    this.syncTimers(run);
    await this.publishAll(run.events);

    const { instance, transitions } = run;
    if (instance.status === "failed" && instance.failure) {
      return { status: "failed", instance, transitions, failure: instance.failure };
    }
    return { status: "transitioned", instance, transitions };
  }

  private newRun(instance: WorkflowInstance, definition: WorkflowDefinition, actor: Actor, now: Date): Run {
    return {
      instance,
      definition,
      actor,
      now,
      transitions: [],
      events: [],
      touched: new Set(),
      dataKeys: [],
      hops: 0,
      rearmAll: false,
    };
  }

  private checkTrigger(run: Run, nodeId: NodeId, accepts: WorkflowNode["type"][]): Rejection | undefined {
    const node = run.definition.graph.nodes[nodeId];
    if (!node || !run.instance.activeNodes.includes(nodeId)) {
      return {
        code: "terminal_state_violation",
        message: `Node ${nodeId} is not active in instance ${run.instance.id}`,
        nodeId,
      };
    }
    if (node.type === "join") {
      const arrived = run.instance.joins[nodeId]?.arrivals.length ?? 0;
      return {
        code: "no_eligible_edge",
        message: `Join ${nodeId} is waiting for ${node.expectedBranches - arrived} more branch(es)`,
        nodeId,
      };
    }
    if (!accepts.includes(node.type)) {
      return {
        code: "terminal_state_violation",
        message: `Node ${nodeId} is a ${node.type} node and cannot be triggered this way`,
        nodeId,
      };
    }
    return undefined;
  }

  private mergeData(run: Run, data: Record<string, unknown> | undefined): void {
    if (!data) return;
    const problems = variableProblems(run.definition.variables, data, false);
    if (problems.length > 0) {
      throw new WorkflowError("invalid_input", `Invalid completion data: ${problems.join("; ")}`);
    }
    Object.assign(run.instance.variables, data);
    run.dataKeys.push(...Object.keys(data));
  }

  private guardContext(run: Run, nodeId: NodeId): GuardContext {
    return { actor: run.actor, variables: run.instance.variables, now: run.now, nodeId };
  }

  /**
   * Picks the edge to leave `nodeId` by. Decisions use their ordered
   * branches and then the default edge; other nodes take the first edge,
   * by priority, whose condition holds (restricted to `target` if given).
   */
  private chooseEdge(run: Run, nodeId: NodeId, reason: string, target?: NodeId): Step | null {
    const { graph } = run.definition;
    const node = getNode(graph, nodeId);
    const context = this.guardContext(run, nodeId);

    if (node.type === "decision" && target === undefined) {
      for (const branch of node.conditions) {
        if (this.branchHolds(run, branch.when, context)) {
          return {
            edge: getEdge(graph, branch.edge),
            reason: `decision:${branch.name}`,
            snapshot: conditionVariables(branch.when),
          };
        }
      }
      if (node.defaultEdge) {
        return {
          edge: getEdge(graph, node.defaultEdge),
          reason: "decision:default",
          snapshot: node.conditions.flatMap((branch) => conditionVariables(branch.when)),
        };
      }
      throw new DefinitionError(
        [{ code: "missing_default_edge", message: `Decision ${nodeId} matched no branch and has no default`, node: nodeId }],
        "Workflow cannot continue",
      );
    }

    for (const edge of outgoingEdges(graph, nodeId)) {
      if (target !== undefined && edge.to !== target) continue;
      if (!edge.condition || this.guards.evaluateCondition(edge.condition, context)) {
        return { edge, reason, snapshot: conditionVariables(edge.condition) };
      }
    }
    return null;
  }

  /** A decision branch that reads an unset variable is skipped, negated or not. */
  private branchHolds(run: Run, condition: Condition, context: GuardContext): boolean {
    const unset = conditionVariables(condition).some(
      (name) => !lookupVariable(run.instance.variables, name).defined,
    );
    return !unset && this.guards.evaluateCondition(condition, context);
  }

  /** Moves one branch from `from` along `step.edge`, then keeps going through pass-through nodes. */
  private async follow(
    run: Run,
    from: NodeId,
    step: Step,
    options: { record: boolean; skipExit?: boolean },
  ): Promise<void> {
    if (run.instance.status !== "running") return;
    run.hops += 1;
    if (run.hops > MAX_HOPS) {
      throw new DefinitionError(
        [{ code: "unguarded_cycle", message: `More than ${MAX_HOPS} hops in one stimulus`, node: from }],
        "Workflow did not settle",
      );
    }

    const { graph } = run.definition;
    if (!options.skipExit) {
      const exited = await this.runNodeActions(run, from, getNode(graph, from).exitActions, "exit");
      if (!exited) return;
    }

    const to = step.edge.to;
    const node = getNode(graph, to);
    const verdict = this.guards.evaluateAll(node.guards ?? [], this.guardContext(run, to));
    if (verdict.outcome !== "allow") {
      throw new StimulusRejected(guardRejection(to, verdict));
    }

    this.leave(run, from);
    if (options.record) {
      this.record(run, from, to, step);
    }

    if (node.type === "join") {
      await this.arriveAtJoin(run, from, to, node.expectedBranches);
    } else {
      await this.enter(run, to, node);
    }
  }

  private async enter(run: Run, nodeId: NodeId, node: WorkflowNode): Promise<void> {
    const { instance } = run;
    instance.visits[nodeId] = (instance.visits[nodeId] ?? 0) + 1;
    this.activate(run, nodeId);

    if (node.type === "task" && node.assignee) {
      const assignee = this.resolveAssignee(run, node.assignee);
      if (assignee) instance.assignments[nodeId] = assignee;
    }
    this.armTimers(run, nodeId, node);

    if (!(await this.runNodeActions(run, nodeId, node.entryActions, "entry"))) {
      return;
    }

    if (node.type === "decision") {
      const step = this.chooseEdge(run, nodeId, "decision");
      if (step) await this.follow(run, nodeId, step, { record: true });
      return;
    }

    if (node.type === "parallel") {
      const context = this.guardContext(run, nodeId);
      const forks = outgoingEdges(run.definition.graph, nodeId).filter(
        (edge) => !edge.condition || this.guards.evaluateCondition(edge.condition, context),
      );
      if (forks.length === 0) {
        throw new StimulusRejected({
          code: "no_eligible_edge",
          message: `Parallel node ${nodeId} has no branch whose condition holds`,
          nodeId,
        });
      }
      for (const [index, edge] of forks.entries()) {
        await this.follow(
          run,
          nodeId,
          { edge, reason: "parallel_fork", snapshot: conditionVariables(edge.condition) },
          { record: true, skipExit: index > 0 },
        );
      }
    }
  }

  private async arriveAtJoin(run: Run, from: NodeId, joinId: NodeId, expectedBranches: number): Promise<void> {
    const { instance } = run;
    let state = instance.joins[joinId];
    if (!state) {
      instance.visits[joinId] = (instance.visits[joinId] ?? 0) + 1;
      state = { visit: instance.visits[joinId] ?? 1, arrivals: [] };
      instance.joins[joinId] = state;
      this.activate(run, joinId);
      const node = getNode(run.definition.graph, joinId);
      if (!(await this.runNodeActions(run, joinId, node.entryActions, "entry"))) {
        return;
      }
    }

    state.arrivals.push({ from, at: run.now.toISOString() });
    if (state.arrivals.length < expectedBranches) {
      return;
    }

    delete instance.joins[joinId];
    const step = this.chooseEdge(run, joinId, "join_complete");
    if (!step) {
      throw new StimulusRejected({
        code: "no_eligible_edge",
        message: `No eligible edge leaves join ${joinId}`,
        nodeId: joinId,
      });
    }
    await this.follow(run, joinId, step, { record: true });
  }

  private activate(run: Run, nodeId: NodeId): void {
    if (!run.instance.activeNodes.includes(nodeId)) {
      run.instance.activeNodes.push(nodeId);
    }
    run.touched.add(nodeId);
  }

  private leave(run: Run, nodeId: NodeId): void {
    const { instance } = run;
    instance.activeNodes = instance.activeNodes.filter((active) => active !== nodeId);
    instance.timers = instance.timers.filter((timer) => timer.nodeId !== nodeId);
    delete instance.deadlines[nodeId];
    run.touched.add(nodeId);
  }

  private record(run: Run, from: NodeId, to: NodeId, step: Step): void {
    const transition = nextTransition(run.instance.history, {
      from,
      to,
      edge: step.edge.id,
      at: run.now.toISOString(),
      actor: run.actor.id,
      reason: step.reason,
      variables: pick(run.instance.variables, new Set([...step.snapshot, ...run.dataKeys])),
    });
    run.instance.history.push(transition);
    run.transitions.push(transition);
    run.events.push({
      ...this.eventBase(run, [from, to]),
      type: "WorkflowTransitioned",
      from,
      to,
      edge: step.edge.id,
      reason: step.reason,
      variables: transition.variables,
    });
  }

  private resolveAssignee(run: Run, rule: AssigneeRule): string | undefined {
    switch (rule.kind) {
      case "user":
        return rule.userId;
      case "role":
        return `role:${rule.role}`;
      case "variable": {
        const found = lookupVariable(run.instance.variables, rule.variable);
        return typeof found.value === "string" ? found.value : undefined;
      }
    }
  }

  private armTimers(run: Run, nodeId: NodeId, node: WorkflowNode): void {
    if (node.type !== "task" && node.type !== "timer") return;

    const { instance } = run;
    const visit = instance.visits[nodeId] ?? 1;
    const base = run.now.getTime();
    const at = (offsetMs: number) => new Date(base + offsetMs).toISOString();
    instance.timers = instance.timers.filter((timer) => timer.nodeId !== nodeId);

    if (node.type === "timer") {
      instance.deadlines[nodeId] = at(node.durationMs);
      instance.timers.push({ nodeId, visit, kind: "timeout", fireAt: at(node.durationMs), firing: 1 });
    } else if (node.slaMs !== undefined) {
      instance.deadlines[nodeId] = at(node.slaMs);
    }

    const inherited = node.type === "task" ? node.slaMs : undefined;
    for (const rule of node.escalations ?? []) {
      const after = rule.triggerAfterMs ?? inherited;
      if (after === undefined) continue;
      instance.timers.push({
        nodeId,
        visit,
        kind: "escalation",
        ruleId: rule.id,
        fireAt: at(after),
        firing: 1,
        ...(rule.repeatIntervalMs !== undefined ? { repeatIntervalMs: rule.repeatIntervalMs } : {}),
        ...(rule.maxRepeats !== undefined ? { maxRepeats: rule.maxRepeats } : {}),
      });
    }
  }

  private async fireTimeout(run: Run, timer: ArmedTimer): Promise<Rejection | undefined> {
    const node = getNode(run.definition.graph, timer.nodeId);
    run.instance.timers = run.instance.timers.filter((armed) => !sameTimer(armed, timer));
    if (node.type === "timer" && !(await this.runNodeActions(run, timer.nodeId, node.timeoutActions, "timeout"))) {
      return undefined;
    }
    const step = this.chooseEdge(run, timer.nodeId, "timer_fired");
    if (!step) {
      return { code: "no_eligible_edge", message: `No eligible edge leaves ${timer.nodeId}`, nodeId: timer.nodeId };
    }
    await this.follow(run, timer.nodeId, step, { record: true });
    return undefined;
  }

  private async fireEscalation(run: Run, timer: ArmedTimer): Promise<Rejection | undefined> {
    const node = getNode(run.definition.graph, timer.nodeId);
    const rule =
      node.type === "task" || node.type === "timer"
        ? node.escalations?.find((candidate) => candidate.id === timer.ruleId)
        : undefined;
    if (!rule) {
      throw new DefinitionError(
        [{ code: "invalid_timer", message: `No escalation rule ${timer.ruleId} on ${timer.nodeId}`, node: timer.nodeId }],
        "Timer does not match its definition",
      );
    }

    const next = nextFiring(timer);
    run.instance.timers = [
      ...run.instance.timers.filter((armed) => !sameTimer(armed, timer)),
      ...(next ? [next] : []),
    ];

    const actions: WorkflowAction[] = rule.actions ?? [
      { id: asActionId(`${rule.id}.escalate`), type: "escalate", targets: rule.targets },
    ];
    const scope = `escalation:${rule.id}:${timer.firing}`;
    if (!(await this.runNodeActions(run, timer.nodeId, actions, scope))) {
      return undefined;
    }

    run.events.push({
      ...this.eventBase(run, [timer.nodeId]),
      type: "WorkflowEscalated",
      nodeId: timer.nodeId,
      ruleId: rule.id,
      firing: timer.firing,
      targets: rule.targets,
    });
    return undefined;
  }

  private actionContext(run: Run, nodeId: NodeId, scope: string): ActionContext {
    const assignee = run.instance.assignments[nodeId];
    return {
      instanceId: run.instance.id,
      definitionId: run.definition.id,
      nodeId,
      visit: run.instance.visits[nodeId] ?? 0,
      scope,
      actor: run.actor.id,
      variables: run.instance.variables,
      ...(assignee ? { assignee } : {}),
      executed: run.instance.executedActions,
    };
  }

  private acknowledge(run: Run, key: string, updates: Record<string, unknown>): void {
    if (!run.instance.executedActions.includes(key)) {
      run.instance.executedActions.push(key);
    }
    Object.assign(run.instance.variables, updates);
  }

  /**
   * Runs `actions` in order. Returns false when one failed fatally; the
   * failure has then been routed along the node's error edge or has
   * failed the instance.
   */
  private async runNodeActions(
    run: Run,
    nodeId: NodeId,
    actions: readonly WorkflowAction[] | undefined,
    scope: string,
  ): Promise<boolean> {
    for (const action of actions ?? []) {
      try {
        const result = await this.executor.execute(action, this.actionContext(run, nodeId, scope));
        this.acknowledge(run, result.key, result.updates);
      } catch (error) {
        if (!(error instanceof ActionFailedError)) throw error;
        await this.handleActionFailure(run, nodeId, error);
        return false;
      }
    }
    return true;
  }

  private async handleActionFailure(run: Run, nodeId: NodeId, error: ActionFailedError): Promise<void> {
    const fallback = errorEdge(run.definition.graph, nodeId);
    this.logger.error("Action failed fatally", {
      instanceId: run.instance.id,
      nodeId,
      actionId: error.actionId,
      severity: error.severity,
      attempts: error.attempts,
      errorEdge: fallback?.id,
      error: error.message,
    });

    if (fallback) {
      await this.follow(
        run,
        nodeId,
        { edge: fallback, reason: "action_failed", snapshot: [] },
        { record: true, skipExit: true },
      );
      return;
    }

    const failure: InstanceFailure = {
      nodeId,
      actionId: error.actionId,
      message: error.message,
      at: run.now.toISOString(),
    };
    run.instance.status = "failed";
    run.instance.failure = failure;
    run.instance.completedAt = failure.at;
    run.instance.timers = [];
    run.events.push({
      ...this.eventBase(run, [nodeId]),
      type: "WorkflowFailed",
      nodeId,
      actionId: error.actionId,
      message: error.message,
    });
  }

  /** Completes the instance once every active branch has reached an End node. */
  private settle(run: Run): void {
    const { instance } = run;
    if (instance.status !== "running" || instance.activeNodes.length === 0) return;
    const allEnded = instance.activeNodes.every(
      (nodeId) => run.definition.graph.nodes[nodeId]?.type === "end",
    );
    if (!allEnded) return;

    instance.status = "completed";
    instance.completedAt = run.now.toISOString();
    instance.timers = [];
    run.events.push({ ...this.eventBase(run, instance.activeNodes), type: "WorkflowCompleted" });
  }

  private syncTimers(run: Run): void {
    const { instance } = run;
    if (instance.status !== "running") {
      this.scheduler.disarm(instance.id);
      return;
    }
    const nodes = run.rearmAll ? new Set(instance.timers.map((timer) => timer.nodeId)) : run.touched;
    if (run.rearmAll) {
      this.scheduler.disarm(instance.id);
    }
    for (const nodeId of nodes) {
      this.scheduler.disarm(instance.id, nodeId);
      for (const timer of instance.timers.filter((armed) => armed.nodeId === nodeId)) {
        this.scheduler.schedule({ ...timer, instanceId: instance.id });
      }
    }
  }

  private eventBase(run: Run, nodeIds: NodeId[]) {
    return {
      instanceId: run.instance.id,
      definitionId: run.instance.definitionId,
      nodeIds: [...nodeIds],
      actor: run.actor.id,
      at: run.now.toISOString(),
      variables: pick(run.instance.variables, run.dataKeys),
    };
  }

  private async publishAll(events: WorkflowEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.events.publish(event);
      } catch (error) {
        this.logger.error("Event publication failed", {
          eventType: event.type,
          instanceId: event.instanceId,
          error: errorMessage(error),
        });
      }
    }
  }
}

const sameTimer = (a: ArmedTimer, b: ArmedTimer): boolean =>
  a.nodeId === b.nodeId &&
  a.kind === b.kind &&
  a.ruleId === b.ruleId &&
  a.firing === b.firing &&
  a.visit === b.visit;

const startNodeOf = (definition: WorkflowDefinition): NodeId =>
  definition.graph.startNodes[0] ?? asNodeId("start");
