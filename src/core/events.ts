import { type Logger, createLogger } from "../observability/logger";
import { errorMessage } from "./errors";
import type { ActionId, DefinitionId, EdgeId, InstanceId, NodeId } from "./types";

interface EventBase {
  instanceId: InstanceId;
  definitionId: DefinitionId;
  nodeIds: NodeId[];
  actor: string;
  at: string;
  variables: Record<string, unknown>;
}

export interface WorkflowStarted extends EventBase {
  type: "WorkflowStarted";
  entityRef: string;
}

export interface WorkflowTransitioned extends EventBase {
  type: "WorkflowTransitioned";
  from: NodeId;
  to: NodeId;
  edge?: EdgeId;
  reason: string;
}

export interface TaskCompleted extends EventBase {
  type: "TaskCompleted";
  nodeId: NodeId;
}

export interface WorkflowEscalated extends EventBase {
  type: "WorkflowEscalated";
  nodeId: NodeId;
  ruleId: string;
  firing: number;
  targets: string[];
}

export interface WorkflowCompleted extends EventBase {
  type: "WorkflowCompleted";
}

export interface WorkflowFailed extends EventBase {
  type: "WorkflowFailed";
  nodeId: NodeId;
  actionId?: ActionId;
  message: string;
}

export interface WorkflowCancelled extends EventBase {
  type: "WorkflowCancelled";
  reason: string;
}

export interface WorkflowSuspended extends EventBase {
  type: "WorkflowSuspended";
  reason: string;
}

export interface WorkflowResumed extends EventBase {
  type: "WorkflowResumed";
}

export type WorkflowEvent =
  | WorkflowStarted
  | WorkflowTransitioned
  | TaskCompleted
  | WorkflowEscalated
  | WorkflowCompleted
  | WorkflowFailed
  | WorkflowCancelled
  | WorkflowSuspended
  | WorkflowResumed;

export type WorkflowEventType = WorkflowEvent["type"];

export type EventOfType<T extends WorkflowEventType> = Extract<WorkflowEvent, { type: T }>;

export interface EventPublisher {
  publish(event: WorkflowEvent): Promise<void>;
}

type Subscriber = {
  name: string;
  handler: (event: WorkflowEvent) => Promise<void> | void;
};

/**
 * In-process publisher. Handlers subscribe to one event type or to `*`;
 * they run concurrently and a failing handler is logged, never rethrown.
 */
export class EventBus implements EventPublisher {
  private readonly subscribers = new Map<string, Subscriber[]>();

  constructor(private readonly logger: Logger = createLogger("events")) {}

  subscribe<T extends WorkflowEventType>(
    type: T,
    handler: (event: EventOfType<T>) => Promise<void> | void,
    name = `${type}-subscriber`,
  ): () => void {
    const matches = (event: WorkflowEvent): event is EventOfType<T> => event.type === type;
    const subscriber: Subscriber = {
      name,
      handler: (event) => (matches(event) ? handler(event) : undefined),
    };
    return this.add(type, subscriber);
  }

  subscribeAll(
    handler: (event: WorkflowEvent) => Promise<void> | void,
    name = "wildcard-subscriber",
  ): () => void {
    return this.add("*", { name, handler });
  }

  async publish(event: WorkflowEvent): Promise<void> {
    const handlers = [
      ...(this.subscribers.get(event.type) ?? []),
      ...(this.subscribers.get("*") ?? []),
    ];
    if (handlers.length === 0) return;

    const results = await Promise.allSettled(
      handlers.map(async (subscriber) => subscriber.handler(event)),
    );

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error("Event subscriber failed", {
          subscriber: handlers[index]?.name,
          eventType: event.type,
          instanceId: event.instanceId,
          error: errorMessage(result.reason),
        });
      }
    });
  }

  subscriberCount(): number {
    let count = 0;
    for (const subscribers of this.subscribers.values()) {
      count += subscribers.length;
    }
    return count;
  }

  private add(key: string, subscriber: Subscriber): () => void {
    this.subscribers.set(key, [...(this.subscribers.get(key) ?? []), subscriber]);
    return () => {
      this.subscribers.set(
        key,
        (this.subscribers.get(key) ?? []).filter((entry) => entry !== subscriber),
      );
    };
  }
}
