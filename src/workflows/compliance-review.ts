import {
  approvalCount,
  decision,
  defineWorkflow,
  end,
  log,
  notify,
  start,
  task,
  timer,
} from "../core/workflow-definition";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

/**
 * Compliance review of a policy change.
 *
 * A cooling-off timer runs first (an early `signal` releases it). The
 * assessment escalates daily once its two-day SLA lapses, at most three
 * times. High-risk changes go to the board, which needs two approvals.
 */
export default defineWorkflow({
  name: "compliance-review",
  version: "1.0.0",
  description: "Cooling-off period, risk assessment and board sign-off",
  category: "compliance",
  tags: ["timer", "escalation"],
  variables: {
    risk: { type: "string", description: "low | medium | high" },
    boardApprovals: { type: "json", default: [] },
  },
  nodes: {
    start: start(),
    cooling: timer({
      name: "Cooling-off period",
      durationMs: DAY,
      timeoutActions: [log("cooling.elapsed", "info", "Cooling-off period elapsed")],
    }),
    assess: task({
      name: "Risk assessment",
      assignee: { kind: "role", role: "compliance-officer" },
      slaMs: 2 * DAY,
      escalations: [
        {
          id: "assess-overdue",
          targets: ["role:compliance-lead"],
          repeatIntervalMs: DAY,
          maxRepeats: 3,
        },
      ],
    }),
    triage: decision({
      name: "Risk triage",
      branches: [{ name: "high", when: "risk == 'high'", edge: "triage-board" }],
      defaultEdge: "triage-cleared",
    }),
    board: task({
      name: "Board review",
      assignee: { kind: "role", role: "board" },
      entryActions: [
        notify("board.requested", {
          template: "board-review-requested",
          recipients: ["role:board"],
          channel: "chat",
        }),
      ],
    }),
    endorsed: end("Endorsed", {
      outcome: "success",
      guards: [approvalCount("boardApprovals", 2)],
    }),
    cleared: end("Cleared", { outcome: "success" }),
  },
  edges: {
    "start-cooling": { from: "start", to: "cooling" },
    "cooling-assess": { from: "cooling", to: "assess" },
    "assess-triage": { from: "assess", to: "triage" },
    "triage-board": { from: "triage", to: "board" },
    "triage-cleared": { from: "triage", to: "cleared" },
    "board-endorsed": { from: "board", to: "endorsed" },
  },
});
