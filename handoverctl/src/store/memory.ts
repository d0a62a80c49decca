/**
 * In-memory backend.
 * For testing and development. No persistence.
 */

import { isTerminal } from "../core/state-machine.js";
import type {
  HandoverDatabase,
  HandoverFilter,
  HandoverLedger,
  HandoverRecord,
  QueueTask,
  TaskFilter,
  TaskStore,
} from "./interface.js";
import { checkTransition, JOB_FIELDS, missingRecord } from "./ledger-rules.js";

function applyLimit<T>(records: T[], limit?: number): T[] {
  if (!limit) return records;
  return records.slice(0, limit);
}

function isDue(task: QueueTask, now: number): boolean {
  if (task.state === "pending") return task.runAt <= now;
  if (task.state === "running") return task.leaseExpiresAt !== null && task.leaseExpiresAt <= now;
  return false;
}

function holdsLease(task: QueueTask, lease: number | null | undefined): boolean {
  return lease === undefined || (task.state === "running" && task.leaseExpiresAt === lease);
}

function byRunAt(a: QueueTask, b: QueueTask): number {
  return a.runAt - b.runAt || a.createdAt - b.createdAt;
}

export function createMemoryTaskStore(): TaskStore {
  const store = new Map<string, QueueTask>();

  return {
    insert(task) {
      store.set(task.taskId, { ...task });
    },
    get(taskId) {
      const task = store.get(taskId);
      return task ? { ...task } : null;
    },
    update(taskId, fields, lease) {
      const existing = store.get(taskId);
      if (!existing) throw new Error(`task not found: ${taskId}`);
      if (!holdsLease(existing, lease)) return false;
      Object.assign(existing, fields);
      return true;
    },
    claim(now, leaseMs, limit) {
      const due = [...store.values()].filter((t) => isDue(t, now)).sort(byRunAt).slice(0, limit);
      for (const task of due) {
        task.state = "running";
        task.leaseExpiresAt = now + leaseMs;
        task.updatedAt = now;
      }
      return due.map((t) => ({ ...t }));
    },
    finish(taskId, now, next, lease) {
      const existing = store.get(taskId);
      if (!existing) throw new Error(`task not found: ${taskId}`);
      if (!holdsLease(existing, lease)) return false;
      existing.state = "done";
      existing.leaseExpiresAt = null;
      existing.updatedAt = now;
      if (next) store.set(next.taskId, { ...next });
      return true;
    },
    list(filter?: TaskFilter) {
      const results = [...store.values()]
        .filter((t) => filter?.key === undefined || t.key === filter.key)
        .filter((t) => filter?.step === undefined || t.step === filter.step)
        .filter((t) => filter?.state === undefined || t.state === filter.state)
        .sort(byRunAt)
        .map((t) => ({ ...t }));
      return applyLimit(results, filter?.limit);
    },
  };
}

export function createMemoryLedger(): HandoverLedger {
  const store = new Map<string, HandoverRecord>();

  function mustGet(token: string): HandoverRecord {
    const record = store.get(token);
    if (!record) throw missingRecord(token);
    return record;
  }

  return {
    open(request, now) {
      store.set(request.handoverToken, {
        handoverToken: request.handoverToken,
        sourceUri: request.sourceUri,
        targetUri: request.targetUri,
        contact: request.contact,
        changeType: request.changeType,
        comment: request.comment ?? null,
        status: "intake",
        validationJobId: request.validationJobId ?? null,
        copyJobId: request.copyJobId ?? null,
        metadataJobId: request.metadataJobId ?? null,
        createdAt: now,
        updatedAt: now,
      });
    },
    get(token) {
      const record = store.get(token);
      return record ? { ...record } : null;
    },
    transition(token, to, now) {
      const record = mustGet(token);
      if (checkTransition(record, to)) {
        record.status = to;
        record.updatedAt = now;
      }
    },
    recordJob(token, stage, jobId, now) {
      const record = mustGet(token);
      const field = JOB_FIELDS[stage];
      const existing = record[field];
      if (existing !== null) return existing;
      record[field] = jobId;
      record.updatedAt = now;
      return jobId;
    },
    list(filter?: HandoverFilter) {
      const results = [...store.values()]
        .filter((r) => !filter?.active || !isTerminal(r.status))
        .sort((a, b) => b.updatedAt - a.updatedAt)
        .map((r) => ({ ...r }));
      return applyLimit(results, filter?.limit);
    },
  };
}

export function createMemoryDatabase(): HandoverDatabase {
  return {
    tasks: createMemoryTaskStore(),
    ledger: createMemoryLedger(),
    close() {},
  };
}
