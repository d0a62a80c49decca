import { canTransition, type HandoverStatus } from "../core/state-machine.js";
import { HandoverError } from "../errors.js";
import type { JobStage } from "../types/handover.js";
import type { HandoverRecord } from "./interface.js";

export const JOB_FIELDS = {
  validation: "validationJobId",
  copy: "copyJobId",
  metadata: "metadataJobId",
} as const satisfies Record<JobStage, keyof HandoverRecord>;

/**
 * Shared by every ledger backend. Returns false when the record is already
 * in `to` (a duplicate delivery) and throws on a backwards move.
 */
export function checkTransition(record: HandoverRecord, to: HandoverStatus): boolean {
  if (record.status === to) return false;
  if (!canTransition(record.status, to)) {
    throw new HandoverError(
      "STAGE_REGRESSION",
      `Handover ${record.handoverToken} cannot move from ${record.status} to ${to}`,
    );
  }
  return true;
}

export function missingRecord(handoverToken: string): HandoverError {
  return new HandoverError("PAYLOAD_INVALID", `Unknown handover: ${handoverToken}`);
}
