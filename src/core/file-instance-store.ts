import fs from "node:fs";
import path from "node:path";
import { InstanceNotFoundError } from "./errors";
import {
  DuplicateInstanceError,
  type InstanceFilter,
  type InstanceStore,
  assertWritable,
  byCreation,
  matchesFilter,
} from "./instance-store";
import type { InstanceId, WorkflowInstance } from "./types";

/**
 * One `instance.json` per instance under `<rootDir>/instances/<id>/`.
 * Writes go through a temp file and a rename so a crash never leaves a
 * half-written instance behind.
 */
export class FileInstanceStore implements InstanceStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "instances"), { recursive: true });
  }

  instanceDir(id: InstanceId): string {
    return path.join(this.rootDir, "instances", id);
  }

  instancePath(id: InstanceId): string {
    return path.join(this.instanceDir(id), "instance.json");
  }

  async create(instance: WorkflowInstance): Promise<void> {
    if (fs.existsSync(this.instancePath(instance.id))) {
      throw new DuplicateInstanceError(instance.id);
    }
    this.write(instance);
  }

  async load(id: InstanceId): Promise<WorkflowInstance | null> {
    return this.read(this.instancePath(id));
  }

  async save(instance: WorkflowInstance, expectedVersion: number): Promise<void> {
    const current = this.read(this.instancePath(instance.id));
    if (!current) {
      throw new InstanceNotFoundError(instance.id);
    }
    assertWritable(current, instance, expectedVersion);
    this.write(instance);
  }

  async list(filter?: InstanceFilter): Promise<WorkflowInstance[]> {
    const instancesDir = path.join(this.rootDir, "instances");
    if (!fs.existsSync(instancesDir)) {
      return [];
    }

    return fs
      .readdirSync(instancesDir)
      .flatMap((entry) => {
        const instance = this.read(path.join(instancesDir, entry, "instance.json"));
        return instance ? [instance] : [];
      })
      .filter((instance) => matchesFilter(instance, filter))
      .sort(byCreation);
  }

  private read(file: string): WorkflowInstance | null {
    if (!fs.existsSync(file)) {
      return null;
    }
    return JSON.parse(fs.readFileSync(file, "utf8")) as WorkflowInstance;
  }

  private write(instance: WorkflowInstance): void {
    fs.mkdirSync(this.instanceDir(instance.id), { recursive: true });
    const target = this.instancePath(instance.id);
    const temp = `${target}.tmp`;
    fs.writeFileSync(temp, JSON.stringify(instance, null, 2));
    fs.renameSync(temp, target);
  }
}
