/**
 * Creates the backend named in the queue config.
 */

export type {
  HandoverDatabase,
  HandoverFilter,
  HandoverLedger,
  HandoverRecord,
  QueueTask,
  TaskFilter,
  TaskState,
  TaskStore,
  TaskUpdateFields,
} from "./interface.js";
export { TASK_STATES, isTaskState } from "./interface.js";
export { createMemoryDatabase } from "./memory.js";
export { createSqliteDatabase } from "./sqlite.js";

import type { QueueConfig } from "../types/config.js";
import type { HandoverDatabase } from "./interface.js";
import { createMemoryDatabase } from "./memory.js";
import { createSqliteDatabase } from "./sqlite.js";

export function createDatabase(config: QueueConfig): HandoverDatabase {
  switch (config.backend) {
    case "memory":
      return createMemoryDatabase();
    case "sqlite":
      return createSqliteDatabase(config.db_path);
  }
}
