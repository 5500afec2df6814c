import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { type RetryPolicy, defaultRetryPolicy } from "../core/actions";
import { isRecord } from "../core/conditions";
import type { LogLevel } from "../core/types";
import { isLogLevel } from "../observability/logger";

export interface SchedulerConfig {
  pollIntervalMs: number;
  lateToleranceMs: number;
}

export interface EngineConfig {
  logLevel: LogLevel;
  /** Extra workflow definitions (.ts, .js, .json), relative to the project root. */
  definitionsDir: string;
  /** Where the file instance store keeps its data, relative to the project root. */
  storeDir: string;
  retry: RetryPolicy;
  scheduler: SchedulerConfig;
}

export const defaultEngineConfig: EngineConfig = {
  logLevel: "info",
  definitionsDir: ".workflow/definitions",
  storeDir: ".workflow/data",
  retry: defaultRetryPolicy,
  scheduler: {
    pollIntervalMs: 1_000,
    lateToleranceMs: 5_000,
  },
};

const positive = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;

const text = (value: unknown, fallback: string): string =>
  typeof value === "string" && value.trim().length > 0 ? value : fallback;

const normalizeRetry = (raw: unknown): RetryPolicy => {
  if (!isRecord(raw)) return defaultEngineConfig.retry;
  const base = defaultEngineConfig.retry;
  return {
    maxAttempts: Math.max(1, Math.floor(positive(raw.maxAttempts, base.maxAttempts))),
    initialDelayMs: positive(raw.initialDelayMs, base.initialDelayMs),
    multiplier: Math.max(1, positive(raw.multiplier, base.multiplier)),
    maxDelayMs: positive(raw.maxDelayMs, base.maxDelayMs),
  };
};

const normalizeScheduler = (raw: unknown): SchedulerConfig => {
  const base = defaultEngineConfig.scheduler;
  if (!isRecord(raw)) return base;
  return {
    pollIntervalMs: positive(raw.pollIntervalMs, base.pollIntervalMs),
    lateToleranceMs:
      typeof raw.lateToleranceMs === "number" && raw.lateToleranceMs >= 0
        ? raw.lateToleranceMs
        : base.lateToleranceMs,
  };
};

export const normalizeEngineConfig = (parsed: unknown): EngineConfig => {
  if (!isRecord(parsed)) {
    return defaultEngineConfig;
  }

  return {
    logLevel: isLogLevel(parsed.logLevel) ? parsed.logLevel : defaultEngineConfig.logLevel,
    definitionsDir: text(parsed.definitionsDir, defaultEngineConfig.definitionsDir),
    storeDir: text(parsed.storeDir, defaultEngineConfig.storeDir),
    retry: normalizeRetry(parsed.retry),
    scheduler: normalizeScheduler(parsed.scheduler),
  };
};

/**
 * Reads `.workflow/engine.ts` (default export) or, failing that,
 * `.workflow/engine.json`. Unknown or malformed fields fall back to
 * their defaults one by one.
 */
export const loadEngineConfig = async (cwd: string): Promise<EngineConfig> => {
  const modulePath = path.join(cwd, ".workflow", "engine.ts");
  if (fs.existsSync(modulePath)) {
    const jiti = createJiti(import.meta.url);
    const loaded: unknown = await jiti.import(modulePath);
    return normalizeEngineConfig(
      isRecord(loaded) && "default" in loaded ? loaded.default : loaded,
    );
  }

  const jsonPath = path.join(cwd, ".workflow", "engine.json");
  if (!fs.existsSync(jsonPath)) {
    return defaultEngineConfig;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
  return normalizeEngineConfig(parsed);
};
