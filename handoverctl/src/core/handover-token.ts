import { randomUUID } from "node:crypto";

/** Generate the unique identifier for one handover invocation. */
export function generateHandoverToken(): string {
  return randomUUID();
}
