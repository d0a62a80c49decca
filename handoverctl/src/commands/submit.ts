import type { HandoverInput } from "../types/handover.js";
import { withRuntime, type CommandOpts } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type SubmitOpts = CommandOpts & HandoverInput;

export type SubmitResult = { ok: true; handoverToken: string } | CommandFailure;

/**
 * Intake entry point: validate, probe and start a handover.
 */
export async function submit(opts: SubmitOpts): Promise<SubmitResult> {
  const input: HandoverInput = {
    sourceUri: opts.sourceUri,
    contact: opts.contact,
    changeType: opts.changeType,
    ...(opts.targetUri !== undefined ? { targetUri: opts.targetUri } : {}),
    ...(opts.comment !== undefined ? { comment: opts.comment } : {}),
  };

  try {
    const handoverToken = await withRuntime(opts, (rt) => rt.coordinator.intake(input));
    return { ok: true, handoverToken };
  } catch (err) {
    return failure(err);
  }
}
