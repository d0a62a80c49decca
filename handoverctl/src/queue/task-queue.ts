import { randomUUID } from "node:crypto";
import type { QueueTask, TaskFilter, TaskStore } from "../store/interface.js";

export type EnqueueOptions = {
  delayMs?: number;
  /** Correlation key used to find every task of one handover. */
  key?: string | null;
};

/** Build a fresh pending task. */
export function buildTask(step: string, payload: unknown, opts: EnqueueOptions, now: number): QueueTask {
  return {
    taskId: randomUUID(),
    step,
    key: opts.key ?? null,
    payload: JSON.stringify(payload),
    state: "pending",
    attempts: 0,
    reschedules: 0,
    runAt: now + (opts.delayMs ?? 0),
    leaseExpiresAt: null,
    lastError: null,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Producer side of the deferred-execution substrate. Tasks are durable once
 * `enqueue` returns; the TaskWorker executes them at least once.
 */
export class TaskQueue {
  constructor(
    private readonly store: TaskStore,
    private readonly now: () => number = Date.now,
  ) {}

  enqueue(step: string, payload: unknown, opts: EnqueueOptions = {}): string {
    const task = buildTask(step, payload, opts, this.now());
    this.store.insert(task);
    return task.taskId;
  }

  get(taskId: string): QueueTask | null {
    return this.store.get(taskId);
  }

  list(filter?: TaskFilter): QueueTask[] {
    return this.store.list(filter);
  }

  /** Revive a dead-lettered task with a clean attempt count. */
  requeue(taskId: string): QueueTask {
    const task = this.store.get(taskId);
    if (!task) throw new Error(`No task found: ${taskId}`);
    if (task.state !== "dead") throw new Error(`Task ${taskId} is ${task.state}, only dead tasks can be requeued`);

    const now = this.now();
    this.store.update(taskId, { state: "pending", attempts: 0, runAt: now, lastError: null, updatedAt: now });
    return { ...task, state: "pending", attempts: 0, runAt: now, lastError: null, updatedAt: now };
  }
}
