/** What a step tells the worker to do next. */
export type StepOutcome =
  | { kind: "complete" }
  | { kind: "advance"; step: string; payload: unknown; delayMs?: number }
  | { kind: "reschedule"; delayMs: number };

export type StepContext = {
  taskId: string;
  key: string | null;
  attempts: number;
  reschedules: number;
};

/**
 * A named unit of deferred work. `parse` validates the stored payload before
 * `run` sees it; a parse failure dead-letters the task.
 */
export type StepDefinition<P> = {
  name: string;
  parse: (raw: unknown) => P;
  run: (payload: P, ctx: StepContext) => Promise<StepOutcome>;
};

export const complete = (): StepOutcome => ({ kind: "complete" });

export const reschedule = (delayMs: number): StepOutcome => ({ kind: "reschedule", delayMs });

export const advance = (step: string, payload: unknown, delayMs?: number): StepOutcome =>
  ({ kind: "advance", step, payload, delayMs });
