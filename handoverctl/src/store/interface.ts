/**
 * Storage abstraction for the task queue and the handover ledger.
 *
 * Implementations:
 * - SQLite (durable, survives restarts)
 * - In-memory (testing)
 */

import type { HandoverStatus } from "../core/state-machine.js";
import type { HandoverRequest, JobStage } from "../types/handover.js";

// --- Task queue ---

export type TaskState = "pending" | "running" | "done" | "dead";

export const TASK_STATES = ["pending", "running", "done", "dead"] as const;

const VALID_TASK_STATES = new Set<string>(TASK_STATES);

export function isTaskState(v: unknown): v is TaskState {
  return typeof v === "string" && VALID_TASK_STATES.has(v);
}

/** One unit of deferred work. `payload` is JSON text. */
export interface QueueTask {
  taskId: string;
  step: string;
  /** Correlation key, e.g. the handover token. */
  key: string | null;
  payload: string;
  state: TaskState;
  /** Failed executions (thrown errors). Polling reschedules do not count. */
  attempts: number;
  reschedules: number;
  runAt: number;
  leaseExpiresAt: number | null;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface TaskFilter {
  key?: string;
  step?: string;
  state?: TaskState;
  limit?: number;
}

export type TaskUpdateFields = Partial<
  Pick<QueueTask, "state" | "attempts" | "reschedules" | "runAt" | "leaseExpiresAt" | "lastError" | "updatedAt">
>;

export interface TaskStore {
  insert(task: QueueTask): void;
  get(taskId: string): QueueTask | null;
  /**
   * Apply `fields`. With `lease`, only while the task is still running under
   * that lease expiry; returns false when another claim has taken it over.
   */
  update(taskId: string, fields: TaskUpdateFields, lease?: number | null): boolean;
  /**
   * Atomically lease up to `limit` due tasks: pending ones whose `runAt` has
   * passed, and running ones whose lease expired (their worker died).
   */
  claim(now: number, leaseMs: number, limit: number): QueueTask[];
  /** Mark a task done and, in the same transaction, insert its successor. */
  finish(taskId: string, now: number, next: QueueTask | null, lease?: number | null): boolean;
  list(filter?: TaskFilter): QueueTask[];
}

// --- Handover ledger ---

export interface HandoverRecord {
  handoverToken: string;
  sourceUri: string;
  targetUri: string;
  contact: string;
  changeType: string;
  comment: string | null;
  status: HandoverStatus;
  validationJobId: string | null;
  copyJobId: string | null;
  metadataJobId: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface HandoverFilter {
  /** Only records that have not reached a terminal outcome. */
  active?: boolean;
  limit?: number;
}

export interface HandoverLedger {
  open(request: HandoverRequest, now: number): void;
  get(handoverToken: string): HandoverRecord | null;
  /** Move to `to`. Repeating the current status is a no-op; going backwards throws. */
  transition(handoverToken: string, to: HandoverStatus, now: number): void;
  /** Record a job id unless one is already recorded; returns the id that is kept. */
  recordJob(handoverToken: string, stage: JobStage, jobId: string, now: number): string;
  list(filter?: HandoverFilter): HandoverRecord[];
}

export interface HandoverDatabase {
  readonly tasks: TaskStore;
  readonly ledger: HandoverLedger;
  close(): void;
}
