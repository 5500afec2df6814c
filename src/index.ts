import path from "node:path";
import {
  ActionExecutor,
  type CustomAction,
  type EscalationSink,
  type IntegrationSink,
  type NotificationSink,
} from "./core/actions";
import { DefinitionRegistry } from "./core/definition-registry";
import { EventBus } from "./core/events";
import { FileInstanceStore } from "./core/file-instance-store";
import { GuardEvaluator, type NamedGuard } from "./core/guards";
import type { InstanceStore } from "./core/instance-store";
import type { WorkflowDefinition } from "./core/types";
import { type EntityResolver, WorkflowEngine } from "./core/workflow-engine";
import { type Logger, createLogger } from "./observability/logger";
import { type EngineConfig, loadEngineConfig } from "./project/config";
import { type Clock, systemClock } from "./runtime/clock";
import { TimerScheduler } from "./runtime/timer-scheduler";
import complianceReview from "./workflows/compliance-review";
import contractReview from "./workflows/contract-review";
import documentApproval from "./workflows/document-approval";

export * from "./core/actions";
export * from "./core/conditions";
export * from "./core/definition-registry";
export * from "./core/definition-schema";
export * from "./core/errors";
export * from "./core/events";
export * from "./core/file-instance-store";
export * from "./core/graph";
export * from "./core/guards";
export * from "./core/history";
export * from "./core/instance-store";
export * from "./core/types";
export * from "./core/workflow-definition";
export * from "./core/workflow-engine";
export * from "./observability/logger";
export * from "./project/config";
export * from "./runtime/clock";
export * from "./runtime/timer-scheduler";

export const builtinWorkflows: readonly WorkflowDefinition[] = [
  documentApproval,
  contractReview,
  complianceReview,
];

export interface WorkflowRuntimeOptions {
  /** Project root; config and relative directories resolve against it. */
  cwd?: string;
  /** Skips `.workflow/engine.*` when given. */
  config?: EngineConfig;
  store?: InstanceStore;
  notifications?: NotificationSink;
  integrations?: IntegrationSink;
  escalations?: EscalationSink;
  customActions?: Record<string, CustomAction>;
  namedGuards?: Record<string, NamedGuard>;
  entities?: EntityResolver;
  clock?: Clock;
  logger?: Logger;
  includeBuiltins?: boolean;
}

export interface WorkflowRuntime {
  config: EngineConfig;
  registry: DefinitionRegistry;
  store: InstanceStore;
  scheduler: TimerScheduler;
  events: EventBus;
  engine: WorkflowEngine;
  /** Re-arms persisted timers and starts polling. */
  start(): Promise<void>;
  stop(): void;
}

const loggingNotifications = (logger: Logger): NotificationSink => ({
  notify: async (notification) => {
    logger.info("Notification", {
      template: notification.template,
      recipients: notification.recipients,
      channel: notification.channel,
      instanceId: notification.instanceId,
      nodeId: notification.nodeId,
    });
  },
});

export const createWorkflowRuntime = async (
  options: WorkflowRuntimeOptions = {},
): Promise<WorkflowRuntime> => {
  const cwd = options.cwd ?? process.cwd();
  const config = options.config ?? (await loadEngineConfig(cwd));
  const logger = options.logger ?? createLogger("workflow", { level: config.logLevel });
  const clock = options.clock ?? systemClock;

  const registry = new DefinitionRegistry(logger.child("definitions"));
  if (options.includeBuiltins ?? true) {
    for (const definition of builtinWorkflows) {
      registry.publish(definition);
    }
  }
  await registry.loadDirectory(path.resolve(cwd, config.definitionsDir));

  const store =
    options.store ??
    (() => {
      const files = new FileInstanceStore(path.resolve(cwd, config.storeDir));
      files.ensure();
      return files;
    })();

  const scheduler = new TimerScheduler(clock, undefined, {
    ...config.scheduler,
    logger: logger.child("scheduler"),
  });
  const events = new EventBus(logger.child("events"));
  const executor = new ActionExecutor({
    notifications: options.notifications ?? loggingNotifications(logger.child("notifications")),
    ...(options.integrations ? { integrations: options.integrations } : {}),
    ...(options.escalations ? { escalations: options.escalations } : {}),
    ...(options.customActions ? { customActions: options.customActions } : {}),
    retry: config.retry,
    logger: logger.child("actions"),
  });

  const engine = new WorkflowEngine({
    registry,
    store,
    executor,
    scheduler,
    clock,
    guards: new GuardEvaluator(options.namedGuards),
    events,
    ...(options.entities ? { entities: options.entities } : {}),
    logger: logger.child("engine"),
  });

  return {
    config,
    registry,
    store,
    scheduler,
    events,
    engine,
    start: async () => {
      await engine.recover();
      scheduler.start();
    },
    stop: () => scheduler.stop(),
  };
};
