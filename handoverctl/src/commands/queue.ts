import type { QueueTask, TaskState } from "../store/interface.js";
import { withRuntime, type CommandOpts } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type ListTasksResult = { ok: true; tasks: QueueTask[] } | CommandFailure;

export async function listTasks(
  opts: CommandOpts & { state?: TaskState; key?: string; limit?: number },
): Promise<ListTasksResult> {
  try {
    const tasks = await withRuntime(opts, (rt) => rt.queue.list({ state: opts.state, key: opts.key, limit: opts.limit }));
    return { ok: true, tasks };
  } catch (err) {
    return failure(err);
  }
}

export type RequeueResult = { ok: true; task: QueueTask } | CommandFailure;

/**
 * Revive a dead-lettered task.
 */
export async function requeueTask(opts: CommandOpts & { taskId: string }): Promise<RequeueResult> {
  try {
    const task = await withRuntime(opts, (rt) => rt.queue.requeue(opts.taskId));
    return { ok: true, task };
  } catch (err) {
    return failure(err);
  }
}
