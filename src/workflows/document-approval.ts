import {
  decision,
  defineWorkflow,
  end,
  notify,
  requireRole,
  setVariable,
  start,
  task,
} from "../core/workflow-definition";

const HOUR = 60 * 60 * 1000;

/**
 * Single-reviewer approval of a document.
 *
 * Flow:
 *   draft    → the author prepares the document
 *   review   → a reviewer records `decision` (SLA: 24h, then escalation)
 *   decide   → approve / reject, anything else goes back to draft
 *
 * Only an approver may move the document into `approved`.
 */
export default defineWorkflow({
  name: "document-approval",
  version: "1.0.0",
  description: "Draft, review and approve a document",
  category: "documents",
  tags: ["approval"],
  variables: {
    author: { type: "string", required: true },
    title: { type: "string", default: "Untitled document" },
    decision: { type: "string", description: "approve | reject | rework" },
    comments: { type: "string" },
  },
  nodes: {
    start: start(),
    draft: task({
      name: "Draft",
      taskType: "manual",
      assignee: { kind: "variable", variable: "author" },
    }),
    review: task({
      name: "Review",
      taskType: "review",
      assignee: { kind: "role", role: "reviewer" },
      slaMs: 24 * HOUR,
      escalations: [{ id: "review-overdue", targets: ["role:review-lead"] }],
      entryActions: [
        notify("review.requested", {
          template: "review-requested",
          recipients: ["$assignee"],
        }),
      ],
    }),
    decide: decision({
      name: "Decide",
      branches: [
        { name: "approve", when: "decision == 'approve'", edge: "decide-approved" },
        { name: "reject", when: "decision == 'reject'", edge: "decide-rejected" },
      ],
      defaultEdge: "decide-rework",
    }),
    approved: end("Approved", {
      outcome: "success",
      guards: [requireRole("approver")],
      entryActions: [
        setVariable("approved.flag", "approved", true),
        notify("approved.author", { template: "document-approved", recipients: ["{{author}}"] }),
      ],
    }),
    rejected: end("Rejected", {
      outcome: "failure",
      entryActions: [
        notify("rejected.author", { template: "document-rejected", recipients: ["{{author}}"] }),
      ],
    }),
  },
  edges: {
    "start-draft": { from: "start", to: "draft" },
    "draft-review": { from: "draft", to: "review" },
    "review-decide": { from: "review", to: "decide" },
    "decide-approved": { from: "decide", to: "approved" },
    "decide-rejected": { from: "decide", to: "rejected" },
    "decide-rework": { from: "decide", to: "draft" },
  },
});
