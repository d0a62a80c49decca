import { IntakeValidationError } from "../errors.js";
import { EMAIL_STEPS, type EmailMessagePayload, type EmailWatchPayload } from "../notify/email-tasks.js";
import type { Runtime } from "../runtime.js";
import { withRuntime, type CommandOpts } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type EnqueueResult = { ok: true; taskId: string } | CommandFailure;

function enqueueChecked(rt: Runtime, step: string, schema: string, payload: unknown): string {
  const parsed = rt.schemas.parse(schema, payload);
  if (!parsed.ok) throw new IntakeValidationError(`Invalid ${schema}: ${parsed.errors}`);
  return rt.queue.enqueue(step, payload);
}

/**
 * Queue one email.
 */
export async function notify(opts: CommandOpts & EmailMessagePayload): Promise<EnqueueResult> {
  const payload: EmailMessagePayload = { address: opts.address, subject: opts.subject, body: opts.body };
  try {
    const taskId = await withRuntime(opts, (rt) => enqueueChecked(rt, EMAIL_STEPS.send, "email-message", payload));
    return { ok: true, taskId };
  } catch (err) {
    return failure(err);
  }
}

/**
 * Queue an email that is sent once the report at `url` is no longer in progress.
 */
export async function notifyWhenComplete(opts: CommandOpts & EmailWatchPayload): Promise<EnqueueResult> {
  const payload: EmailWatchPayload = { url: opts.url, address: opts.address };
  try {
    const taskId = await withRuntime(opts, (rt) => enqueueChecked(rt, EMAIL_STEPS.whenComplete, "email-watch", payload));
    return { ok: true, taskId };
  } catch (err) {
    return failure(err);
  }
}
