/**
 * SQLite backend using better-sqlite3.
 * Queue tasks and ledger records share one database file so a step can
 * finish and enqueue its successor in a single transaction.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { HANDOVER_OUTCOMES, isHandoverStatus } from "../core/state-machine.js";
import { HandoverError } from "../errors.js";
import type {
  HandoverDatabase,
  HandoverFilter,
  HandoverLedger,
  HandoverRecord,
  QueueTask,
  TaskFilter,
  TaskStore,
  TaskUpdateFields,
} from "./interface.js";
import { isTaskState } from "./interface.js";
import { checkTransition, JOB_FIELDS, missingRecord } from "./ledger-rules.js";

// --- Schema ---

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS queue_tasks (
  taskId TEXT PRIMARY KEY,
  step TEXT NOT NULL,
  key TEXT,
  payload TEXT NOT NULL,
  state TEXT NOT NULL DEFAULT 'pending',
  attempts INTEGER NOT NULL DEFAULT 0,
  reschedules INTEGER NOT NULL DEFAULT 0,
  runAt INTEGER NOT NULL,
  leaseExpiresAt INTEGER,
  lastError TEXT,
  createdAt INTEGER NOT NULL,
  updatedAt INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_queue_tasks_due ON queue_tasks(state, runAt);
CREATE INDEX IF NOT EXISTS idx_queue_tasks_key ON queue_tasks(key);

CREATE TABLE IF NOT EXISTS handovers (
  handoverToken TEXT PRIMARY KEY,
  sourceUri TEXT NOT NULL,
  targetUri TEXT NOT NULL,
  contact TEXT NOT NULL,
  changeType TEXT NOT NULL,
  comment TEXT,
  status TEXT NOT NULL DEFAULT 'intake',
  validationJobId TEXT,
  copyJobId TEXT,
  metadataJobId TEXT,
  createdAt INTEGER NOT NULL,
  updatedAt INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_handovers_status ON handovers(status);
`;

// --- Row types (what SQLite returns) ---

interface TaskRow {
  taskId: string;
  step: string;
  key: string | null;
  payload: string;
  state: string;
  attempts: number;
  reschedules: number;
  runAt: number;
  leaseExpiresAt: number | null;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

interface HandoverRow {
  handoverToken: string;
  sourceUri: string;
  targetUri: string;
  contact: string;
  changeType: string;
  comment: string | null;
  status: string;
  validationJobId: string | null;
  copyJobId: string | null;
  metadataJobId: string | null;
  createdAt: number;
  updatedAt: number;
}

// --- Conversions ---

function rowToTask(row: TaskRow): QueueTask {
  if (!isTaskState(row.state)) {
    throw new HandoverError("PAYLOAD_INVALID", `Task ${row.taskId} has unknown state: ${row.state}`);
  }
  return { ...row, state: row.state };
}

function rowToHandover(row: HandoverRow): HandoverRecord {
  if (!isHandoverStatus(row.status)) {
    throw new HandoverError("PAYLOAD_INVALID", `Handover ${row.handoverToken} has unknown status: ${row.status}`);
  }
  return { ...row, status: row.status };
}

function createSqliteTaskStore(db: Database.Database): TaskStore {
  const stmts = {
    insert: db.prepare<QueueTask>(`
      INSERT INTO queue_tasks (taskId, step, key, payload, state, attempts, reschedules, runAt, leaseExpiresAt, lastError, createdAt, updatedAt)
      VALUES (@taskId, @step, @key, @payload, @state, @attempts, @reschedules, @runAt, @leaseExpiresAt, @lastError, @createdAt, @updatedAt)
    `),
    get: db.prepare<[string], TaskRow>(`SELECT * FROM queue_tasks WHERE taskId = ?`),
    due: db.prepare<{ now: number; limit: number }, TaskRow>(`
      SELECT * FROM queue_tasks
      WHERE (state = 'pending' AND runAt <= @now)
         OR (state = 'running' AND leaseExpiresAt <= @now)
      ORDER BY runAt ASC, createdAt ASC
      LIMIT @limit
    `),
    lease: db.prepare<{ taskId: string; leaseExpiresAt: number; now: number }>(`
      UPDATE queue_tasks SET state = 'running', leaseExpiresAt = @leaseExpiresAt, updatedAt = @now
      WHERE taskId = @taskId
    `),
    done: db.prepare<{ taskId: string; now: number }>(`
      UPDATE queue_tasks SET state = 'done', leaseExpiresAt = NULL, updatedAt = @now
      WHERE taskId = @taskId
    `),
    doneUnderLease: db.prepare<{ taskId: string; now: number; lease: number | null }>(`
      UPDATE queue_tasks SET state = 'done', leaseExpiresAt = NULL, updatedAt = @now
      WHERE taskId = @taskId AND state = 'running' AND leaseExpiresAt IS @lease
    `),
  };

  const exists = (taskId: string): boolean => stmts.get.get(taskId) !== undefined;

  const insert = (task: QueueTask): void => {
    stmts.insert.run(task);
  };

  const claim = db.transaction((now: number, leaseMs: number, limit: number): QueueTask[] => {
    const rows = stmts.due.all({ now, limit });
    for (const row of rows) {
      stmts.lease.run({ taskId: row.taskId, leaseExpiresAt: now + leaseMs, now });
    }
    return rows.map((row) => rowToTask({ ...row, state: "running", leaseExpiresAt: now + leaseMs, updatedAt: now }));
  });

  const finish = db.transaction(
    (taskId: string, now: number, next: QueueTask | null, lease: number | null | undefined): boolean => {
      const result =
        lease === undefined ? stmts.done.run({ taskId, now }) : stmts.doneUnderLease.run({ taskId, now, lease });
      if (result.changes === 0) {
        if (!exists(taskId)) throw new Error(`task not found: ${taskId}`);
        return false;
      }
      if (next) insert(next);
      return true;
    },
  );

  return {
    insert,

    get(taskId) {
      const row = stmts.get.get(taskId);
      return row ? rowToTask(row) : null;
    },

    update(taskId, fields: TaskUpdateFields, lease?: number | null) {
      const sets: string[] = [];
      const values: Record<string, unknown> = { taskId };

      for (const [column, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        sets.push(`${column} = @${column}`);
        values[column] = value;
      }

      let where = "taskId = @taskId";
      if (lease !== undefined) {
        where += " AND state = 'running' AND leaseExpiresAt IS @fence";
        values.fence = lease;
      }

      if (sets.length === 0) return true;
      const result = db.prepare(`UPDATE queue_tasks SET ${sets.join(", ")} WHERE ${where}`).run(values);
      if (result.changes === 0) {
        if (!exists(taskId)) throw new Error(`task not found: ${taskId}`);
        return false;
      }
      return true;
    },

    claim(now, leaseMs, limit) {
      // IMMEDIATE takes the write lock up front so two workers cannot lease the same row.
      return claim.immediate(now, leaseMs, limit);
    },

    finish(taskId, now, next, lease) {
      return finish.immediate(taskId, now, next, lease);
    },

    list(filter?: TaskFilter) {
      const conditions: string[] = [];
      const values: Record<string, unknown> = {};

      if (filter?.key) {
        conditions.push("key = @key");
        values.key = filter.key;
      }
      if (filter?.step) {
        conditions.push("step = @step");
        values.step = filter.step;
      }
      if (filter?.state) {
        conditions.push("state = @state");
        values.state = filter.state;
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      if (filter?.limit) {
        values._limit = Math.floor(filter.limit);
      }
      const limitClause = filter?.limit ? "LIMIT @_limit" : "";
      const sql = `SELECT * FROM queue_tasks ${where} ORDER BY runAt ASC, createdAt ASC ${limitClause}`;

      return db.prepare<[Record<string, unknown>], TaskRow>(sql).all(values).map(rowToTask);
    },
  };
}

function createSqliteLedger(db: Database.Database): HandoverLedger {
  const stmts = {
    insert: db.prepare<HandoverRow>(`
      INSERT INTO handovers (handoverToken, sourceUri, targetUri, contact, changeType, comment, status, validationJobId, copyJobId, metadataJobId, createdAt, updatedAt)
      VALUES (@handoverToken, @sourceUri, @targetUri, @contact, @changeType, @comment, @status, @validationJobId, @copyJobId, @metadataJobId, @createdAt, @updatedAt)
    `),
    get: db.prepare<[string], HandoverRow>(`SELECT * FROM handovers WHERE handoverToken = ?`),
    setStatus: db.prepare<{ handoverToken: string; status: string; now: number }>(`
      UPDATE handovers SET status = @status, updatedAt = @now WHERE handoverToken = @handoverToken
    `),
  };

  const load = (token: string): HandoverRecord => {
    const row = stmts.get.get(token);
    if (!row) throw missingRecord(token);
    return rowToHandover(row);
  };

  const transition = db.transaction((token: string, to: HandoverRecord["status"], now: number): void => {
    if (checkTransition(load(token), to)) {
      stmts.setStatus.run({ handoverToken: token, status: to, now });
    }
  });

  const recordJob = db.transaction(
    (token: string, stage: keyof typeof JOB_FIELDS, jobId: string, now: number): string => {
      const column = JOB_FIELDS[stage];
      const existing = load(token)[column];
      if (existing !== null) return existing;
      db.prepare(`UPDATE handovers SET ${column} = @jobId, updatedAt = @now WHERE handoverToken = @token`)
        .run({ jobId, now, token });
      return jobId;
    },
  );

  return {
    open(request, now) {
      stmts.insert.run({
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
      const row = stmts.get.get(token);
      return row ? rowToHandover(row) : null;
    },

    transition(token, to, now) {
      transition.immediate(token, to, now);
    },

    recordJob(token, stage, jobId, now) {
      return recordJob.immediate(token, stage, jobId, now);
    },

    list(filter?: HandoverFilter) {
      const where = filter?.active
        ? `WHERE status NOT IN (${HANDOVER_OUTCOMES.map((o) => `'${o}'`).join(", ")})`
        : "";
      const limitClause = filter?.limit ? `LIMIT ${Math.floor(filter.limit)}` : "";
      return db
        .prepare<[], HandoverRow>(`SELECT * FROM handovers ${where} ORDER BY updatedAt DESC ${limitClause}`)
        .all()
        .map(rowToHandover);
    },
  };
}

/**
 * Open (or create) the database at `dbPath`. `:memory:` gives a private
 * in-process database, which the tests use.
 */
export function createSqliteDatabase(dbPath: string): HandoverDatabase {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("busy_timeout = 5000");
  db.exec(SCHEMA_SQL);

  return {
    tasks: createSqliteTaskStore(db),
    ledger: createSqliteLedger(db),
    close() {
      db.close();
    },
  };
}
