import { setTimeout as delay } from "node:timers/promises";
import { type Logger, createLogger } from "../observability/logger";
import { isRecord, lookupVariable } from "./conditions";
import {
  ActionFailedError,
  TransientActionError,
  errorMessage,
} from "./errors";
import type {
  DefinitionId,
  InstanceId,
  NodeId,
  NotificationChannel,
  WorkflowAction,
} from "./types";

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  multiplier: 2,
  maxDelayMs: 5_000,
};

export interface Notification {
  template: string;
  recipients: string[];
  channel: NotificationChannel;
  instanceId: InstanceId;
  nodeId: NodeId;
  variables: Record<string, unknown>;
}

export interface NotificationSink {
  notify(notification: Notification): Promise<void>;
}

export interface IntegrationRequest {
  target: string;
  payload: Record<string, unknown>;
  instanceId: InstanceId;
  nodeId: NodeId;
  idempotencyKey: string;
}

export interface IntegrationSink {
  /** May return variable updates to merge into the instance. */
  invoke(request: IntegrationRequest): Promise<Record<string, unknown> | void>;
}

export interface EscalationRequest {
  targets: string[];
  template: string;
  instanceId: InstanceId;
  nodeId: NodeId;
  variables: Record<string, unknown>;
}

export interface EscalationSink {
  escalate(request: EscalationRequest): Promise<void>;
}

export interface ActionContext {
  instanceId: InstanceId;
  definitionId: DefinitionId;
  nodeId: NodeId;
  visit: number;
  /** `entry`, `exit`, `timeout`, `cancel` or `escalation:<rule>:<firing>`. */
  scope: string;
  actor: string;
  variables: Record<string, unknown>;
  assignee?: string;
  /** Idempotency keys already acknowledged for this instance. */
  executed: readonly string[];
}

export type CustomAction = (
  params: Record<string, unknown>,
  context: ActionContext,
) => Promise<Record<string, unknown> | void> | Record<string, unknown> | void;

export interface ActionResult {
  status: "executed" | "skipped";
  key: string;
  updates: Record<string, unknown>;
}

export interface ActionExecutorOptions {
  notifications: NotificationSink;
  integrations?: IntegrationSink;
  escalations?: EscalationSink;
  customActions?: Record<string, CustomAction>;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export const idempotencyKey = (action: WorkflowAction, context: ActionContext): string =>
  [context.instanceId, context.nodeId, context.visit, context.scope, action.id].join("/");

/** Replaces `{{path}}` placeholders with variable values. */
export const renderTemplate = (text: string, variables: Record<string, unknown>): string =>
  text.replace(/\{\{\s*([\w$.]+)\s*\}\}/g, (match, path: string) => {
    const found = lookupVariable(variables, path);
    if (!found.defined) return match;
    return typeof found.value === "string" ? found.value : JSON.stringify(found.value);
  });

const renderPayload = (
  payload: Record<string, unknown>,
  variables: Record<string, unknown>,
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(payload).map(([key, value]) => [
      key,
      typeof value === "string" ? renderTemplate(value, variables) : value,
    ]),
  );

const isTransient = (error: unknown): boolean =>
  error instanceof TransientActionError ||
  (error instanceof Error && "transient" in error && error.transient === true);

/**
 * Runs workflow actions against the configured sinks. Keys the instance has
 * persisted in `executedActions` are skipped. Sink actions that ran for a
 * stimulus that was never persisted are remembered with their updates, so a
 * retried stimulus replays the updates instead of calling the sink again;
 * the engine releases those keys once they are persisted. Transient sink
 * failures are retried with exponential backoff.
 */
export class ActionExecutor {
  private readonly retry: Readonly<RetryPolicy>;
  private readonly customActions: ReadonlyMap<string, CustomAction>;
  private readonly pending = new Map<string, Record<string, unknown>>();
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ActionExecutorOptions) {
    this.retry = Object.freeze({ ...defaultRetryPolicy, ...options.retry });
    this.customActions = new Map(Object.entries(options.customActions ?? {}));
    this.logger = options.logger ?? createLogger("actions");
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.retry;
  }

  /** Forgets keys that are now persisted on the instance. */
  release(keys: Iterable<string>): void {
    for (const key of keys) {
      this.pending.delete(key);
    }
  }

  get pendingKeys(): number {
    return this.pending.size;
  }

  backoff(attempt: number): number {
    return Math.min(
      this.retry.initialDelayMs * this.retry.multiplier ** (attempt - 1),
      this.retry.maxDelayMs,
    );
  }

  async execute(action: WorkflowAction, context: ActionContext): Promise<ActionResult> {
    const key = idempotencyKey(action, context);
    if (context.executed.includes(key)) {
      this.logger.debug("Action already executed", { key, actionId: action.id });
      return { status: "skipped", key, updates: {} };
    }
    const replay = this.pending.get(key);
    if (replay) {
      this.logger.debug("Action replayed from an unpersisted run", { key, actionId: action.id });
      return { status: "skipped", key, updates: { ...replay } };
    }

    for (let attempt = 1; ; attempt += 1) {
      try {
        const updates = await this.run(action, context, key);
        if (action.type !== "setVariable") {
          this.pending.set(key, updates);
        }
        this.logger.info("Action executed", {
          actionId: action.id,
          type: action.type,
          instanceId: context.instanceId,
          nodeId: context.nodeId,
          scope: context.scope,
          attempt,
        });
        return { status: "executed", key, updates };
      } catch (error) {
        const message = errorMessage(error);
        if (!isTransient(error)) {
          this.logger.error("Action failed", { actionId: action.id, key, error: message, attempt });
          throw new ActionFailedError(action.id, "fatal", message, attempt);
        }
        if (attempt >= this.retry.maxAttempts) {
          this.logger.error("Action retries exhausted", { actionId: action.id, key, error: message, attempt });
          throw new ActionFailedError(action.id, "transient", message, attempt, true);
        }
        const wait = this.backoff(attempt);
        this.logger.warn("Action failed, retrying", {
          actionId: action.id,
          key,
          error: message,
          attempt,
          retryInMs: wait,
        });
        await this.sleep(wait);
      }
    }
  }

  private async run(
    action: WorkflowAction,
    context: ActionContext,
    key: string,
  ): Promise<Record<string, unknown>> {
    switch (action.type) {
      case "setVariable":
        return { [action.name]: action.value };

      case "notify": {
        const recipients = action.recipients.flatMap((recipient) => {
          if (recipient !== "$assignee") return [renderTemplate(recipient, context.variables)];
          return context.assignee ? [context.assignee] : [];
        });
        await this.options.notifications.notify({
          template: action.template,
          recipients,
          channel: action.channel ?? "email",
          instanceId: context.instanceId,
          nodeId: context.nodeId,
          variables: context.variables,
        });
        return {};
      }

      case "invokeExternal": {
        if (!this.options.integrations) {
          throw new Error(`No integration sink configured for ${action.target}`);
        }
        const result = await this.options.integrations.invoke({
          target: action.target,
          payload: renderPayload(action.payload ?? {}, context.variables),
          instanceId: context.instanceId,
          nodeId: context.nodeId,
          idempotencyKey: key,
        });
        return isRecord(result) ? result : {};
      }

      case "escalate": {
        const template = action.template ?? "escalation";
        if (this.options.escalations) {
          await this.options.escalations.escalate({
            targets: action.targets,
            template,
            instanceId: context.instanceId,
            nodeId: context.nodeId,
            variables: context.variables,
          });
        } else {
          await this.options.notifications.notify({
            template,
            recipients: action.targets,
            channel: "email",
            instanceId: context.instanceId,
            nodeId: context.nodeId,
            variables: context.variables,
          });
        }
        return {};
      }

      case "log":
        this.logger[action.level](renderTemplate(action.message, context.variables), {
          instanceId: context.instanceId,
          nodeId: context.nodeId,
        });
        return {};

      case "named": {
        const custom = this.customActions.get(action.name);
        if (!custom) {
          throw new Error(`No action registered under ${action.name}`);
        }
        const result = await custom(action.params ?? {}, context);
        return isRecord(result) ? result : {};
      }
    }
  }
}
