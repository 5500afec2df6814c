import {
  ConcurrencyConflictError,
  HistoryRewriteError,
  InstanceNotFoundError,
  WorkflowError,
} from "./errors";
import { firstRewrittenEntry } from "./history";
import type {
  DefinitionId,
  InstanceId,
  InstanceStatus,
  WorkflowInstance,
} from "./types";

export interface InstanceFilter {
  status?: InstanceStatus;
  definitionId?: DefinitionId;
}

/**
 * Persistence contract for workflow instances. `save` is a compare-and-set
 * on `version`: it fails with ConcurrencyConflictError when the stored
 * version is not `expectedVersion`, and with HistoryRewriteError when the
 * stored history is not a prefix of the new one.
 */
export interface InstanceStore {
  create(instance: WorkflowInstance): Promise<void>;
  load(id: InstanceId): Promise<WorkflowInstance | null>;
  save(instance: WorkflowInstance, expectedVersion: number): Promise<void>;
  list(filter?: InstanceFilter): Promise<WorkflowInstance[]>;
}

export const assertWritable = (
  current: WorkflowInstance,
  next: WorkflowInstance,
  expectedVersion: number,
): void => {
  if (current.version !== expectedVersion) {
    throw new ConcurrencyConflictError(next.id, expectedVersion, current.version);
  }
  const rewritten = firstRewrittenEntry(current.history, next.history);
  if (rewritten !== null) {
    throw new HistoryRewriteError(next.id, rewritten);
  }
};

export const matchesFilter = (instance: WorkflowInstance, filter: InstanceFilter = {}): boolean =>
  (filter.status === undefined || instance.status === filter.status) &&
  (filter.definitionId === undefined || instance.definitionId === filter.definitionId);

export const byCreation = (a: WorkflowInstance, b: WorkflowInstance): number =>
  a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);

export class DuplicateInstanceError extends WorkflowError {
  constructor(public readonly instanceId: InstanceId) {
    super("invalid_input", `Instance ${instanceId} already exists`);
    this.name = "DuplicateInstanceError";
  }
}

export class InMemoryInstanceStore implements InstanceStore {
  private readonly instances = new Map<string, WorkflowInstance>();

  async create(instance: WorkflowInstance): Promise<void> {
    if (this.instances.has(instance.id)) {
      throw new DuplicateInstanceError(instance.id);
    }
    this.instances.set(instance.id, structuredClone(instance));
  }

  async load(id: InstanceId): Promise<WorkflowInstance | null> {
    const found = this.instances.get(id);
    return found ? structuredClone(found) : null;
  }

  async save(instance: WorkflowInstance, expectedVersion: number): Promise<void> {
    const current = this.instances.get(instance.id);
    if (!current) {
      throw new InstanceNotFoundError(instance.id);
    }
    assertWritable(current, instance, expectedVersion);
    this.instances.set(instance.id, structuredClone(instance));
  }

  async list(filter?: InstanceFilter): Promise<WorkflowInstance[]> {
    return [...this.instances.values()]
      .filter((instance) => matchesFilter(instance, filter))
      .sort(byCreation)
      .map((instance) => structuredClone(instance));
  }
}
