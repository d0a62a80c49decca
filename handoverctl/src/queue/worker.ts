/**
 * Task Worker
 *
 * Consumer side of the deferred-execution substrate. Polls the store for due
 * tasks, leases them, and dispatches each to its registered step.
 *
 * - `reschedule` outcomes re-arm the same task after a fixed delay, forever.
 *   This is how steps wait for external jobs without blocking a worker.
 * - Thrown errors count as failed attempts and back off exponentially until
 *   `maxAttempts`, then the task is dead-lettered. Non-retryable errors
 *   dead-letter at once.
 * - A lease that expires (worker crash) makes the task due again, so every
 *   step must tolerate running twice. Results are written only while the
 *   worker's own lease is current; a superseded run's outcome is dropped.
 */

import { errorMessage, isRetryable } from "../errors.js";
import type { Logger } from "../logger.js";
import { backoffDelay } from "../retry.js";
import type { QueueTask, TaskStore } from "../store/interface.js";
import { buildTask } from "./task-queue.js";
import type { StepContext, StepDefinition, StepOutcome } from "./types.js";

export interface TaskWorkerDeps {
  store: TaskStore;
  logger: Logger;
  concurrency: number;
  pollIntervalMs: number;
  leaseMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  now?: () => number;
}

type Handler = (raw: unknown, ctx: StepContext) => Promise<StepOutcome>;

export class TaskWorker {
  private readonly handlers = new Map<string, Handler>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking: Promise<number> | null = null;
  private readonly now: () => number;

  constructor(private readonly deps: TaskWorkerDeps) {
    this.now = deps.now ?? Date.now;
  }

  register<P>(def: StepDefinition<P>): this {
    if (this.handlers.has(def.name)) {
      throw new Error(`Step already registered: ${def.name}`);
    }
    this.handlers.set(def.name, (raw, ctx) => def.run(def.parse(raw), ctx));
    return this;
  }

  steps(): string[] {
    return [...this.handlers.keys()].sort();
  }

  /**
   * Start the poll loop. Idempotent.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.tick(), this.deps.pollIntervalMs);
    this.deps.logger.info(
      `[queue] Worker started (steps: ${this.steps().join(", ")}, concurrency: ${this.deps.concurrency})`,
    );
  }

  /**
   * Stop polling and wait for the in-flight round. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.deps.logger.info(`[queue] Worker stopped`);
    }
    if (this.ticking) await this.ticking;
  }

  /**
   * Claim and execute one round of due tasks. Returns how many ran.
   */
  async runOnce(now: number = this.now()): Promise<number> {
    const tasks = this.deps.store.claim(now, this.deps.leaseMs, this.deps.concurrency);
    await Promise.all(tasks.map((task) => this.execute(task, now)));
    return tasks.length;
  }

  /**
   * Run rounds until nothing is due at `now`, or `maxRounds` is reached
   * (a step rescheduling itself with no delay is always due).
   */
  async drain(now: number = this.now(), maxRounds = 100): Promise<number> {
    let total = 0;
    for (let round = 0; round < maxRounds; round++) {
      const ran = await this.runOnce(now);
      if (ran === 0) break;
      total += ran;
    }
    return total;
  }

  private async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = this.runOnce().catch((err: unknown) => {
      this.deps.logger.error(`[queue] Poll failed: ${errorMessage(err)}`);
      return 0;
    });
    try {
      await this.ticking;
    } finally {
      this.ticking = null;
    }
  }

  private async execute(task: QueueTask, now: number): Promise<void> {
    const handler = this.handlers.get(task.step);
    if (!handler) {
      this.deadLetter(task, `Unknown step: ${task.step}`, now);
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(task.payload);
    } catch {
      this.deadLetter(task, `Payload is not JSON`, now);
      return;
    }

    let outcome: StepOutcome;
    try {
      outcome = await handler(raw, {
        taskId: task.taskId,
        key: task.key,
        attempts: task.attempts,
        reschedules: task.reschedules,
      });
    } catch (err) {
      this.fail(task, err, now);
      return;
    }

    this.apply(task, outcome, now);
  }

  private apply(task: QueueTask, outcome: StepOutcome, now: number): void {
    const { store, logger } = this.deps;

    switch (outcome.kind) {
      case "complete":
        if (!store.finish(task.taskId, now, null, task.leaseExpiresAt)) return this.superseded(task, outcome.kind);
        logger.debug(`[queue] ${task.step} ${task.taskId} complete`);
        return;

      case "advance": {
        const next = buildTask(outcome.step, outcome.payload, { delayMs: outcome.delayMs, key: task.key }, now);
        if (!store.finish(task.taskId, now, next, task.leaseExpiresAt)) return this.superseded(task, outcome.kind);
        logger.debug(`[queue] ${task.step} ${task.taskId} → ${next.step} ${next.taskId}`);
        return;
      }

      case "reschedule": {
        const applied = store.update(
          task.taskId,
          {
            state: "pending",
            runAt: now + outcome.delayMs,
            reschedules: task.reschedules + 1,
            leaseExpiresAt: null,
            updatedAt: now,
          },
          task.leaseExpiresAt,
        );
        if (!applied) return this.superseded(task, outcome.kind);
        logger.debug(`[queue] ${task.step} ${task.taskId} rescheduled in ${outcome.delayMs}ms`);
        return;
      }
    }
  }

  private superseded(task: QueueTask, what: string): void {
    this.deps.logger.warn(`[queue] ${task.step} ${task.taskId} lease was taken over; dropping ${what}`);
  }

  private fail(task: QueueTask, err: unknown, now: number): void {
    const message = errorMessage(err);
    const attempts = task.attempts + 1;

    if (!isRetryable(err) || attempts >= this.deps.maxAttempts) {
      this.deadLetter({ ...task, attempts }, message, now);
      return;
    }

    const delay = backoffDelay(attempts, {
      baseDelayMs: this.deps.backoffBaseMs,
      maxDelayMs: this.deps.backoffMaxMs,
    });
    const applied = this.deps.store.update(
      task.taskId,
      {
        state: "pending",
        attempts,
        runAt: now + delay,
        leaseExpiresAt: null,
        lastError: message,
        updatedAt: now,
      },
      task.leaseExpiresAt,
    );
    if (!applied) return this.superseded(task, `failure: ${message}`);
    this.deps.logger.warn(
      `[queue] ${task.step} ${task.taskId} attempt ${attempts}/${this.deps.maxAttempts} failed: ${message}. ` +
      `Retrying in ${delay}ms`,
    );
  }

  private deadLetter(task: QueueTask, reason: string, now: number): void {
    const applied = this.deps.store.update(
      task.taskId,
      {
        state: "dead",
        attempts: task.attempts,
        leaseExpiresAt: null,
        lastError: reason,
        updatedAt: now,
      },
      task.leaseExpiresAt,
    );
    if (!applied) return this.superseded(task, `dead-letter: ${reason}`);
    this.deps.logger.error(`[queue] ${task.step} ${task.taskId} dead-lettered: ${reason}`);
  }
}
