import type { JobState, JobStatus } from "../types/handover.js";

/**
 * Non-terminal stages, in pipeline order. `skip_validation` and
 * `awaiting_validation` are alternatives at the same depth.
 */
export const HANDOVER_STAGES = [
  "intake",
  "skip_validation",
  "awaiting_validation",
  "awaiting_copy",
  "awaiting_metadata",
] as const;

export type HandoverStage = (typeof HANDOVER_STAGES)[number];

export const HANDOVER_OUTCOMES = ["done", "validation_rejected", "validation_error", "copy_failed"] as const;

export type HandoverOutcome = (typeof HANDOVER_OUTCOMES)[number];

export type HandoverStatus = HandoverStage | HandoverOutcome;

/** What a check step does with the job status it just read. */
export type StageDecision =
  | { kind: "wait" }
  | { kind: "advance"; to: HandoverStage }
  | { kind: "terminal"; outcome: HandoverOutcome };

const TRANSITIONS: Record<HandoverStage, readonly HandoverStatus[]> = {
  intake: ["skip_validation", "awaiting_validation"],
  skip_validation: ["awaiting_copy"],
  awaiting_validation: ["awaiting_copy", "validation_error", "validation_rejected"],
  awaiting_copy: ["awaiting_metadata", "copy_failed"],
  awaiting_metadata: ["done"],
};

const DEPTH: Record<HandoverStatus, number> = {
  intake: 0,
  skip_validation: 1,
  awaiting_validation: 1,
  awaiting_copy: 2,
  awaiting_metadata: 3,
  done: 4,
  validation_rejected: 4,
  validation_error: 4,
  copy_failed: 4,
};

const POLLING_STATES: ReadonlySet<JobState> = new Set(["submitted", "running", "incomplete"]);

const OUTCOMES: ReadonlySet<string> = new Set(HANDOVER_OUTCOMES);
const STATUSES: ReadonlySet<string> = new Set([...HANDOVER_STAGES, ...HANDOVER_OUTCOMES]);

export function isHandoverStatus(value: unknown): value is HandoverStatus {
  return typeof value === "string" && STATUSES.has(value);
}

export function isTerminal(status: HandoverStatus): status is HandoverOutcome {
  return OUTCOMES.has(status);
}

/** A job still queued or running. The only condition that reschedules a check. */
export function isIncomplete(status: JobStatus): boolean {
  return POLLING_STATES.has(status.status);
}

/** True when `to` is a legal next state of `from`. Stages never move backwards. */
export function canTransition(from: HandoverStatus, to: HandoverStatus): boolean {
  if (isTerminal(from)) return false;
  return TRANSITIONS[from].includes(to);
}

/** True when `status` lies strictly beyond `stage` in the pipeline. */
export function isPast(status: HandoverStatus, stage: HandoverStage): boolean {
  return DEPTH[status] > DEPTH[stage];
}

/** Route a freshly accepted request: no validation group means no validation. */
export function routeIntake(group: string | null): HandoverStage {
  return group === null ? "skip_validation" : "awaiting_validation";
}

/**
 * Validation job → next step.
 * `failed` means the checks could not run; `succeeded` with a failed output
 * means they ran and found problems.
 */
export function decideValidation(status: JobStatus): StageDecision {
  if (isIncomplete(status)) return { kind: "wait" };
  if (status.status === "failed") return { kind: "terminal", outcome: "validation_error" };
  if (status.output?.status === "failed") return { kind: "terminal", outcome: "validation_rejected" };
  return { kind: "advance", to: "awaiting_copy" };
}

/** Copy job → next step. */
export function decideCopy(status: JobStatus): StageDecision {
  if (isIncomplete(status)) return { kind: "wait" };
  if (status.status === "failed") return { kind: "terminal", outcome: "copy_failed" };
  return { kind: "advance", to: "awaiting_metadata" };
}
