import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { HandoverError } from "../src/errors.js";
import { buildTask } from "../src/queue/task-queue.js";
import { createMemoryDatabase, createSqliteDatabase, type HandoverDatabase } from "../src/store/index.js";
import type { HandoverRequest } from "../src/types/handover.js";

const backends: Array<[string, () => HandoverDatabase]> = [
  ["memory", createMemoryDatabase],
  ["sqlite", () => createSqliteDatabase(":memory:")],
];

function request(token: string, extra: Partial<HandoverRequest> = {}): HandoverRequest {
  return {
    sourceUri: `mysql://ensro@src:3306/${token}_core_99_38`,
    targetUri: `mysql://ensadmin@staging:3306/${token}_core_99_38`,
    contact: "curator@example.org",
    changeType: "new_assembly",
    handoverToken: token,
    ...extra,
  };
}

describe.each(backends)("task store (%s)", (_name, open) => {
  it("stores and reads back a task", () => {
    const { tasks } = open();
    const task = buildTask("email.send", { address: "a@example.org" }, { key: "k1", delayMs: 50 }, 1000);
    tasks.insert(task);

    expect(tasks.get(task.taskId)).toEqual({
      ...task,
      payload: '{"address":"a@example.org"}',
      runAt: 1050,
      state: "pending",
    });
    expect(tasks.get("missing")).toBeNull();
  });

  it("claims due tasks oldest first, up to the limit, and leases them", () => {
    const { tasks } = open();
    const late = buildTask("s", {}, { delayMs: 20 }, 0);
    const early = buildTask("s", {}, { delayMs: 10 }, 0);
    const future = buildTask("s", {}, { delayMs: 500 }, 0);
    const third = buildTask("s", {}, { delayMs: 30 }, 0);
    for (const t of [late, early, future, third]) tasks.insert(t);

    const claimed = tasks.claim(100, 1000, 2);
    expect(claimed.map((t) => t.taskId)).toEqual([early.taskId, late.taskId]);
    expect(claimed[0]).toMatchObject({ state: "running", leaseExpiresAt: 1100, updatedAt: 100 });
    expect(tasks.get(early.taskId)?.state).toBe("running");

    // leased tasks are not handed out twice
    expect(tasks.claim(100, 1000, 10).map((t) => t.taskId)).toEqual([third.taskId]);
    expect(tasks.claim(100, 1000, 10)).toEqual([]);
  });

  it("hands out a task again once its lease expires", () => {
    const { tasks } = open();
    const task = buildTask("s", {}, {}, 0);
    tasks.insert(task);

    expect(tasks.claim(0, 1000, 1)).toHaveLength(1);
    expect(tasks.claim(999, 1000, 1)).toHaveLength(0);
    expect(tasks.claim(1000, 1000, 1).map((t) => t.taskId)).toEqual([task.taskId]);
  });

  it("finishes a task and inserts its successor", () => {
    const { tasks } = open();
    const first = buildTask("a", {}, { key: "k" }, 0);
    const second = buildTask("b", { n: 2 }, { key: "k" }, 5);
    tasks.insert(first);

    tasks.finish(first.taskId, 5, second);

    expect(tasks.get(first.taskId)).toMatchObject({ state: "done", leaseExpiresAt: null, updatedAt: 5 });
    expect(tasks.get(second.taskId)).toMatchObject({ step: "b", state: "pending", key: "k" });
  });

  it("refuses to finish an unknown task", () => {
    const { tasks } = open();
    const next = buildTask("b", {}, {}, 0);
    expect(() => tasks.finish("missing", 0, next)).toThrow("task not found: missing");
    expect(tasks.get(next.taskId)).toBeNull();
  });

  it("updates selected fields", () => {
    const { tasks } = open();
    const task = buildTask("s", {}, {}, 0);
    tasks.insert(task);

    tasks.update(task.taskId, { state: "dead", attempts: 3, lastError: "boom", updatedAt: 9 });

    expect(tasks.get(task.taskId)).toMatchObject({ state: "dead", attempts: 3, lastError: "boom", runAt: 0 });
  });

  it("writes under a lease only while that lease is current", () => {
    const { tasks } = open();
    const task = buildTask("s", {}, {}, 0);
    const next = buildTask("t", {}, {}, 200);
    tasks.insert(task);

    tasks.claim(0, 100, 1);
    tasks.claim(200, 100, 1);

    expect(tasks.update(task.taskId, { state: "pending", runAt: 900 }, 100)).toBe(false);
    expect(tasks.finish(task.taskId, 250, next, 100)).toBe(false);
    expect(tasks.get(task.taskId)).toMatchObject({ state: "running", leaseExpiresAt: 300, runAt: 0 });
    expect(tasks.get(next.taskId)).toBeNull();

    expect(tasks.finish(task.taskId, 250, next, 300)).toBe(true);
    expect(tasks.get(task.taskId)?.state).toBe("done");
    expect(tasks.get(next.taskId)?.state).toBe("pending");
    expect(tasks.update(task.taskId, { state: "pending" }, 300)).toBe(false);
    expect(() => tasks.update("missing", { state: "dead" }, 300)).toThrow("task not found: missing");
  });

  it("lists by key, step and state", () => {
    const { tasks } = open();
    const a = buildTask("handover.check-copy", {}, { key: "t1" }, 0);
    const b = buildTask("handover.check-copy", {}, { key: "t2" }, 1);
    const c = buildTask("email.send", {}, { key: "t1" }, 2);
    for (const t of [a, b, c]) tasks.insert(t);
    tasks.update(c.taskId, { state: "dead" });

    expect(tasks.list({ key: "t1" }).map((t) => t.taskId)).toEqual([a.taskId, c.taskId]);
    expect(tasks.list({ step: "handover.check-copy" }).map((t) => t.taskId)).toEqual([a.taskId, b.taskId]);
    expect(tasks.list({ state: "dead" }).map((t) => t.taskId)).toEqual([c.taskId]);
    expect(tasks.list({ limit: 1 }).map((t) => t.taskId)).toEqual([a.taskId]);
  });
});

describe.each(backends)("handover ledger (%s)", (_name, open) => {
  it("opens a record at intake", () => {
    const { ledger } = open();
    ledger.open(request("t1", { comment: "rebuild", validationJobId: "hc-1" }), 100);

    expect(ledger.get("t1")).toEqual({
      handoverToken: "t1",
      sourceUri: "mysql://ensro@src:3306/t1_core_99_38",
      targetUri: "mysql://ensadmin@staging:3306/t1_core_99_38",
      contact: "curator@example.org",
      changeType: "new_assembly",
      comment: "rebuild",
      status: "intake",
      validationJobId: "hc-1",
      copyJobId: null,
      metadataJobId: null,
      createdAt: 100,
      updatedAt: 100,
    });
    expect(ledger.get("missing")).toBeNull();
  });

  it("moves forward and ignores a repeated move", () => {
    const { ledger } = open();
    ledger.open(request("t1"), 0);
    ledger.transition("t1", "awaiting_validation", 10);
    ledger.transition("t1", "awaiting_validation", 20);

    expect(ledger.get("t1")).toMatchObject({ status: "awaiting_validation", updatedAt: 10 });
  });

  it("refuses to move backwards", () => {
    const { ledger } = open();
    ledger.open(request("t1"), 0);
    ledger.transition("t1", "skip_validation", 1);
    ledger.transition("t1", "awaiting_copy", 2);

    const err = (() => {
      try {
        ledger.transition("t1", "awaiting_validation", 3);
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(HandoverError);
    expect(err).toMatchObject({ code: "STAGE_REGRESSION" });
    expect(ledger.get("t1")?.status).toBe("awaiting_copy");
  });

  it("rejects an unknown handover", () => {
    const { ledger } = open();
    expect(() => ledger.transition("nope", "done", 0)).toThrow("Unknown handover: nope");
    expect(() => ledger.recordJob("nope", "copy", "c-1", 0)).toThrow("Unknown handover: nope");
  });

  it("keeps the first job id recorded for a stage", () => {
    const { ledger } = open();
    ledger.open(request("t1"), 0);

    expect(ledger.recordJob("t1", "copy", "copy-1", 5)).toBe("copy-1");
    expect(ledger.recordJob("t1", "copy", "copy-2", 6)).toBe("copy-1");
    expect(ledger.recordJob("t1", "metadata", "meta-1", 7)).toBe("meta-1");
    expect(ledger.get("t1")).toMatchObject({ copyJobId: "copy-1", metadataJobId: "meta-1", updatedAt: 7 });
  });

  it("lists active handovers, most recently updated first", () => {
    const { ledger } = open();
    ledger.open(request("a"), 1);
    ledger.open(request("b"), 2);
    ledger.open(request("c"), 3);
    ledger.transition("a", "skip_validation", 4);
    ledger.transition("b", "awaiting_validation", 5);
    ledger.transition("b", "validation_rejected", 6);

    expect(ledger.list().map((r) => r.handoverToken)).toEqual(["b", "a", "c"]);
    expect(ledger.list({ active: true }).map((r) => r.handoverToken)).toEqual(["a", "c"]);
    expect(ledger.list({ active: true, limit: 1 }).map((r) => r.handoverToken)).toEqual(["a"]);
    // terminal records stay readable
    expect(ledger.get("b")?.status).toBe("validation_rejected");
  });
});

describe("sqlite database file", () => {
  it("keeps tasks and handovers across reopen", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "handover-store-"));
    const dbPath = path.join(dir, "nested", "queue.db");
    try {
      const first = createSqliteDatabase(dbPath);
      const task = buildTask("handover.check-copy", { n: 1 }, { key: "t1" }, 0);
      first.tasks.insert(task);
      first.ledger.open(request("t1"), 0);
      first.ledger.transition("t1", "skip_validation", 1);
      first.close();

      const second = createSqliteDatabase(dbPath);
      expect(second.tasks.get(task.taskId)?.payload).toBe('{"n":1}');
      expect(second.ledger.get("t1")?.status).toBe("skip_validation");
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
