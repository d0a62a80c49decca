import type { HandoverRecord } from "../store/interface.js";
import { withRuntime, type CommandOpts } from "./context.js";
import { EXIT, failure, type CommandFailure } from "./exit-codes.js";

export type StatusResult = { ok: true; record: HandoverRecord } | CommandFailure;

/**
 * Read one handover from the ledger.
 */
export async function status(opts: CommandOpts & { handoverToken: string }): Promise<StatusResult> {
  try {
    const record = await withRuntime(opts, (rt) => rt.db.ledger.get(opts.handoverToken));
    if (!record) {
      return { ok: false, error: `No handover found: ${opts.handoverToken}`, exitCode: EXIT.NOT_FOUND };
    }
    return { ok: true, record };
  } catch (err) {
    return failure(err);
  }
}

export type ListHandoversResult = { ok: true; records: HandoverRecord[] } | CommandFailure;

/**
 * List handovers, most recently updated first.
 */
export async function listHandovers(
  opts: CommandOpts & { active?: boolean; limit?: number },
): Promise<ListHandoversResult> {
  try {
    const records = await withRuntime(opts, (rt) => rt.db.ledger.list({ active: opts.active, limit: opts.limit }));
    return { ok: true, records };
  } catch (err) {
    return failure(err);
  }
}
