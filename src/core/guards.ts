import { isDeepStrictEqual } from "node:util";
import { minimatch } from "minimatch";
import { evaluateExpression, lookupVariable } from "./conditions";
import type {
  Actor,
  Condition,
  Guard,
  GuardResult,
  NodeId,
  Requirement,
  TimeWindow,
} from "./types";

export interface GuardContext {
  actor: Actor;
  variables: Record<string, unknown>;
  now: Date;
  nodeId?: NodeId;
}

export type NamedGuard = (
  params: Record<string, unknown>,
  context: GuardContext,
) => GuardResult;

export const ALLOW: GuardResult = { outcome: "allow" };

export const describeGuard = (guard: Guard): string => {
  switch (guard.kind) {
    case "requireRole":
      return `requireRole(${guard.role})`;
    case "requirePermission":
      return `requirePermission(${guard.permission})`;
    case "withinTimeWindow":
      return "withinTimeWindow";
    case "approvalCount":
      return `approvalCount(${guard.variable} >= ${guard.required})`;
    case "variableEquals":
      return `variableEquals(${guard.variable})`;
    case "named":
      return guard.name;
    case "all":
    case "any":
      return `${guard.kind}(${guard.guards.map(describeGuard).join(", ")})`;
    case "not":
      return `not(${describeGuard(guard.guard)})`;
  }
};

const inWindow = (window: TimeWindow, now: Date): string | null => {
  const at = now.getTime();
  if (window.from && at < Date.parse(window.from)) {
    return `window opens at ${window.from}`;
  }
  if (window.to && at >= Date.parse(window.to)) {
    return `window closed at ${window.to}`;
  }
  if (window.daysOfWeek && !window.daysOfWeek.includes(now.getUTCDay())) {
    return `day ${now.getUTCDay()} is outside the allowed days`;
  }
  if (window.hours) {
    const hour = now.getUTCHours();
    const { start, end } = window.hours;
    const open = start <= end ? hour >= start && hour < end : hour >= start || hour < end;
    if (!open) {
      return `hour ${hour} is outside ${start}-${end} UTC`;
    }
  }
  return null;
};

const countApprovals = (value: unknown): number => {
  if (typeof value === "number") return value;
  if (Array.isArray(value)) return value.length;
  return 0;
};

/**
 * Evaluates entry guards. Pure: the only inputs are the guard, the context
 * (including `now`) and the named-guard table fixed at construction.
 */
export class GuardEvaluator {
  private readonly named: ReadonlyMap<string, NamedGuard>;

  constructor(named: Record<string, NamedGuard> = {}) {
    this.named = new Map(Object.entries(named));
  }

  evaluate(guard: Guard, context: GuardContext): GuardResult {
    const label = describeGuard(guard);
    const deny = (reason: string): GuardResult => ({ outcome: "deny", guard: label, reason });

    switch (guard.kind) {
      case "requireRole":
        return context.actor.roles?.includes(guard.role)
          ? ALLOW
          : deny(`${context.actor.id} does not hold role ${guard.role}`);

      case "requirePermission":
        return (context.actor.permissions ?? []).some((grant) =>
          minimatch(guard.permission, grant),
        )
          ? ALLOW
          : deny(`${context.actor.id} lacks permission ${guard.permission}`);

      case "withinTimeWindow": {
        const closed = inWindow(guard.window, context.now);
        return closed === null ? ALLOW : deny(closed);
      }

      case "approvalCount": {
        const found = lookupVariable(context.variables, guard.variable);
        const count = countApprovals(found.value);
        if (count >= guard.required) {
          return ALLOW;
        }
        return {
          outcome: "requireAdditional",
          guard: label,
          requirements: [
            { kind: "approvals", variable: guard.variable, missing: guard.required - count },
          ],
        };
      }

      case "variableEquals": {
        const found = lookupVariable(context.variables, guard.variable);
        if (!found.defined) {
          return deny(`${guard.variable} is not set`);
        }
        return isDeepStrictEqual(found.value, guard.value)
          ? ALLOW
          : deny(`${guard.variable} has an unexpected value`);
      }

      case "named": {
        const fn = this.named.get(guard.name);
        if (!fn) {
          return deny(`No guard registered under ${guard.name}`);
        }
        return fn(guard.params ?? {}, context);
      }

      case "all":
        return this.evaluateAll(guard.guards, context);

      case "any": {
        const results = guard.guards.map((inner) => this.evaluate(inner, context));
        if (results.some((result) => result.outcome === "allow")) {
          return ALLOW;
        }
        const requirements = results.flatMap((result) =>
          result.outcome === "requireAdditional" ? result.requirements : [],
        );
        if (requirements.length > 0) {
          return { outcome: "requireAdditional", guard: label, requirements };
        }
        return deny(
          results
            .flatMap((result) => (result.outcome === "deny" ? [result.reason] : []))
            .join(" or ") || "no alternative allowed",
        );
      }

      case "not":
        return this.evaluate(guard.guard, context).outcome === "allow"
          ? deny(`${describeGuard(guard.guard)} holds`)
          : ALLOW;
    }
  }

  /**
   * AND of `guards`. The first Deny wins; otherwise outstanding requirements
   * from every RequireAdditional are merged.
   */
  evaluateAll(guards: readonly Guard[], context: GuardContext): GuardResult {
    const requirements: Requirement[] = [];
    const pending: string[] = [];
    for (const guard of guards) {
      const result = this.evaluate(guard, context);
      if (result.outcome === "deny") {
        return result;
      }
      if (result.outcome === "requireAdditional") {
        requirements.push(...result.requirements);
        pending.push(result.guard);
      }
    }
    return requirements.length > 0
      ? { outcome: "requireAdditional", guard: pending.join(", "), requirements }
      : ALLOW;
  }

  evaluateCondition(condition: Condition, context: GuardContext): boolean {
    if (condition.kind === "expression") {
      return evaluateExpression(condition.expression, context.variables);
    }
    return this.evaluate(condition.guard, context).outcome === "allow";
  }
}
