import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { type Logger, createLogger } from "../observability/logger";
import { isRecord } from "./conditions";
import { parseDefinition } from "./definition-schema";
import { DefinitionError } from "./errors";
import { assertValidDefinition } from "./graph";
import type { DefinitionId, WorkflowDefinition } from "./types";

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
};

const versionParts = (version: string): number[] =>
  version
    .split(/[-+]/)[0]
    ?.split(".")
    .map((part) => Number.parseInt(part, 10) || 0) ?? [];

export const compareVersions = (a: string, b: string): number => {
  const left = versionParts(a);
  const right = versionParts(b);
  for (let i = 0; i < Math.max(left.length, right.length); i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
};

/**
 * Published workflow definitions, keyed by `<name>@<version>`. A definition
 * is validated and deep-frozen on publish; edits go out under a new version.
 */
export class DefinitionRegistry {
  private readonly definitions = new Map<string, WorkflowDefinition>();

  constructor(private readonly logger: Logger = createLogger("definitions")) {}

  publish(definition: WorkflowDefinition): WorkflowDefinition {
    if (this.definitions.has(definition.id)) {
      throw new DefinitionError(
        [
          {
            code: "duplicate_definition",
            message: `${definition.id} is already published; bump the version to change it`,
          },
        ],
        "Cannot publish workflow",
      );
    }
    assertValidDefinition(definition);

    const frozen = deepFreeze(structuredClone(definition));
    this.definitions.set(frozen.id, frozen);
    this.logger.info("Workflow definition published", {
      definitionId: frozen.id,
      nodes: Object.keys(frozen.graph.nodes).length,
      edges: Object.keys(frozen.graph.edges).length,
    });
    return frozen;
  }

  get(id: DefinitionId | string): WorkflowDefinition | undefined {
    return this.definitions.get(id);
  }

  /** Highest published version of `name`. */
  latest(name: string, options: { activeOnly?: boolean } = {}): WorkflowDefinition | undefined {
    return this.list()
      .filter((definition) => definition.name === name)
      .filter((definition) => !options.activeOnly || definition.active)
      .sort((a, b) => compareVersions(b.version, a.version))[0];
  }

  list(): WorkflowDefinition[] {
    return [...this.definitions.values()].sort(
      (a, b) => a.name.localeCompare(b.name) || compareVersions(a.version, b.version),
    );
  }

  /**
   * Publishes every `.ts`, `.js` and `.json` definition in `directory`.
   * Modules provide the definition as their default export.
   */
  async loadDirectory(directory: string): Promise<WorkflowDefinition[]> {
    if (!fs.existsSync(directory)) {
      return [];
    }

    const jiti = createJiti(import.meta.url);
    const published: WorkflowDefinition[] = [];
    const entries = fs
      .readdirSync(directory)
      .filter((file) => [".ts", ".js", ".json"].includes(path.extname(file)))
      .sort();

    for (const entry of entries) {
      const file = path.join(directory, entry);
      let loaded: unknown;
      if (path.extname(entry) === ".json") {
        loaded = JSON.parse(fs.readFileSync(file, "utf8"));
      } else {
        const module: unknown = await jiti.import(file);
        loaded = isRecord(module) && "default" in module ? module.default : module;
      }
      published.push(this.publish(parseDefinition(loaded, entry)));
    }

    return published;
  }
}
