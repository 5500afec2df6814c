import {
  decision,
  defineWorkflow,
  end,
  invokeExternal,
  join,
  notify,
  parallel,
  requirePermission,
  start,
  task,
} from "../core/workflow-definition";

const DAY = 24 * 60 * 60 * 1000;

/**
 * Contract review with legal and finance working side by side.
 *
 * Flow:
 *   intake  → contract owner checks the submission
 *   fork    → legal and finance review in parallel (SLA: 3 days each)
 *   sync    → waits for both reviews
 *   verdict → signed only when both approved, otherwise declined
 */
export default defineWorkflow({
  name: "contract-review",
  version: "1.0.0",
  description: "Parallel legal and finance review of a contract",
  category: "contracts",
  tags: ["approval", "parallel"],
  variables: {
    counterparty: { type: "string", required: true },
    amount: { type: "number", default: 0 },
    "legal.approved": { type: "boolean" },
    "finance.approved": { type: "boolean" },
  },
  nodes: {
    start: start(),
    intake: task({
      name: "Intake",
      assignee: { kind: "role", role: "contract-owner" },
    }),
    fork: parallel("Fork reviews"),
    legal: task({
      name: "Legal review",
      taskType: "review",
      assignee: { kind: "role", role: "legal" },
      slaMs: 3 * DAY,
      escalations: [{ id: "legal-overdue", targets: ["role:general-counsel"] }],
      guards: [requirePermission("contracts:submit")],
    }),
    finance: task({
      name: "Finance review",
      taskType: "review",
      assignee: { kind: "role", role: "finance" },
      slaMs: 3 * DAY,
      escalations: [{ id: "finance-overdue", targets: ["role:cfo"] }],
    }),
    sync: join({ name: "Both reviews in", expectedBranches: 2 }),
    verdict: decision({
      name: "Verdict",
      branches: [
        {
          name: "approved",
          when: "legal.approved && finance.approved",
          edge: "verdict-signed",
        },
      ],
      defaultEdge: "verdict-declined",
    }),
    signed: end("Signed", {
      outcome: "success",
      entryActions: [
        invokeExternal("signed.e-signature", "e-signature", { counterparty: "{{counterparty}}" }),
      ],
    }),
    declined: end("Declined", {
      outcome: "failure",
      entryActions: [
        notify("declined.owner", {
          template: "contract-declined",
          recipients: ["role:contract-owner"],
          channel: "in-app",
        }),
      ],
    }),
  },
  edges: {
    "start-intake": { from: "start", to: "intake" },
    "intake-fork": { from: "intake", to: "fork" },
    "fork-legal": { from: "fork", to: "legal", priority: 1 },
    "fork-finance": { from: "fork", to: "finance", priority: 2 },
    "legal-sync": { from: "legal", to: "sync" },
    "finance-sync": { from: "finance", to: "sync" },
    "sync-verdict": { from: "sync", to: "verdict" },
    "verdict-signed": { from: "verdict", to: "signed" },
    "verdict-declined": { from: "verdict", to: "declined" },
  },
});
