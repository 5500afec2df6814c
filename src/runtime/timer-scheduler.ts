import { nanoid } from "nanoid";
import { errorMessage } from "../core/errors";
import type { ArmedTimer, InstanceId, NodeId } from "../core/types";
import { type Logger, createLogger } from "../observability/logger";
import type { Clock } from "./clock";

export type TimerKind = ArmedTimer["kind"];

/** `visit` is the node visit the timer was armed for; stale visits are discarded. */
export interface TimerEntry extends ArmedTimer {
  id: string;
  instanceId: InstanceId;
}

export type TimerRequest = Omit<TimerEntry, "id" | "firing"> & { firing?: number };

export type TimerOutcome = "fired" | "discarded";

export type TimerHandler = (
  entry: TimerEntry,
  context: { lateByMs: number },
) => Promise<TimerOutcome>;

export interface TimerRun {
  entry: TimerEntry;
  outcome: TimerOutcome | "failed";
  lateByMs: number;
}

/**
 * The escalation firing that follows `timer`, measured from its scheduled
 * time, or null when the rule does not repeat or has used up `maxRepeats`.
 */
export const nextFiring = <T extends ArmedTimer>(timer: T): T | null => {
  if (
    timer.kind !== "escalation" ||
    timer.repeatIntervalMs === undefined ||
    (timer.maxRepeats !== undefined && timer.firing >= timer.maxRepeats)
  ) {
    return null;
  }
  return {
    ...timer,
    fireAt: new Date(Date.parse(timer.fireAt) + timer.repeatIntervalMs).toISOString(),
    firing: timer.firing + 1,
  };
};

export interface TimerQueue {
  push(entry: TimerEntry): void;
  /** Removes and returns every entry due at `now`, earliest first. */
  popDue(now: Date): TimerEntry[];
  remove(predicate: (entry: TimerEntry) => boolean): number;
  list(): TimerEntry[];
}

export class InMemoryTimerQueue implements TimerQueue {
  private entries: TimerEntry[] = [];

  push(entry: TimerEntry): void {
    const at = Date.parse(entry.fireAt);
    const index = this.entries.findIndex((existing) => Date.parse(existing.fireAt) > at);
    if (index === -1) {
      this.entries.push(entry);
    } else {
      this.entries.splice(index, 0, entry);
    }
  }

  popDue(now: Date): TimerEntry[] {
    const cutoff = now.getTime();
    const due = this.entries.filter((entry) => Date.parse(entry.fireAt) <= cutoff);
    this.entries = this.entries.filter((entry) => Date.parse(entry.fireAt) > cutoff);
    return due;
  }

  remove(predicate: (entry: TimerEntry) => boolean): number {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => !predicate(entry));
    return before - this.entries.length;
  }

  list(): TimerEntry[] {
    return [...this.entries];
  }
}

export interface TimerSchedulerOptions {
  pollIntervalMs?: number;
  /** Firings later than this are logged as missed; they still run. */
  lateToleranceMs?: number;
  logger?: Logger;
}

/**
 * Polls a time-ordered queue and hands due entries to the registered
 * handler. Escalations with a repeat interval are re-armed from their
 * previous fire time until `maxRepeats` firings have happened.
 */
export class TimerScheduler {
  private timer: NodeJS.Timeout | undefined;
  private handler: TimerHandler | undefined;
  private busy = false;
  private readonly pollIntervalMs: number;
  private readonly lateToleranceMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly clock: Clock,
    private readonly queue: TimerQueue = new InMemoryTimerQueue(),
    options: TimerSchedulerOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.lateToleranceMs = options.lateToleranceMs ?? 5_000;
    this.logger = options.logger ?? createLogger("scheduler");
  }

  onFire(handler: TimerHandler): void {
    this.handler = handler;
  }

  schedule(request: TimerRequest): TimerEntry {
    const entry: TimerEntry = { ...request, id: nanoid(), firing: request.firing ?? 1 };
    this.queue.push(entry);
    this.logger.debug("Timer armed", {
      instanceId: entry.instanceId,
      nodeId: entry.nodeId,
      kind: entry.kind,
      fireAt: entry.fireAt,
      ...(entry.ruleId ? { ruleId: entry.ruleId } : {}),
    });
    return entry;
  }

  disarm(instanceId: InstanceId, nodeId?: NodeId): number {
    return this.queue.remove(
      (entry) =>
        entry.instanceId === instanceId && (nodeId === undefined || entry.nodeId === nodeId),
    );
  }

  pending(instanceId?: InstanceId): TimerEntry[] {
    return this.queue
      .list()
      .filter((entry) => instanceId === undefined || entry.instanceId === instanceId);
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      if (this.busy) return;
      void this.runOnce();
    }, this.pollIntervalMs);
  }

  async runOnce(): Promise<TimerRun[]> {
    this.busy = true;
    const runs: TimerRun[] = [];
    try {
      const now = this.clock.now();
      for (let due = this.queue.popDue(now); due.length > 0; due = this.queue.popDue(now)) {
        for (const entry of due) {
          runs.push(await this.fire(entry, now));
        }
      }
    } finally {
      this.busy = false;
    }
    return runs;
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private async fire(entry: TimerEntry, now: Date): Promise<TimerRun> {
    const lateByMs = now.getTime() - Date.parse(entry.fireAt);
    if (lateByMs > this.lateToleranceMs) {
      this.logger.warn("TimerMissed", {
        instanceId: entry.instanceId,
        nodeId: entry.nodeId,
        kind: entry.kind,
        fireAt: entry.fireAt,
        lateByMs,
      });
    }

    if (!this.handler) {
      this.logger.warn("Timer due with no handler registered", { timerId: entry.id });
      return { entry, outcome: "discarded", lateByMs };
    }

    let outcome: TimerOutcome;
    try {
      outcome = await this.handler(entry, { lateByMs });
    } catch (error) {
      this.logger.error("Timer handler failed", {
        instanceId: entry.instanceId,
        nodeId: entry.nodeId,
        kind: entry.kind,
        error: errorMessage(error),
      });
      return { entry, outcome: "failed", lateByMs };
    }

    if (outcome === "discarded") {
      this.logger.debug("Stale timer discarded", {
        instanceId: entry.instanceId,
        nodeId: entry.nodeId,
        visit: entry.visit,
      });
    }

    const next = outcome === "fired" ? nextFiring(entry) : null;
    if (next) {
      this.schedule(next);
    }

    return { entry, outcome, lateByMs };
  }
}
