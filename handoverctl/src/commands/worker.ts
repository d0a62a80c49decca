import { openRuntime, type CommandOpts } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type WorkerOpts = CommandOpts & {
  /** Drain due tasks once and exit instead of polling. */
  once?: boolean;
  /** Stops the poll loop when aborted. Default: SIGINT or SIGTERM. */
  signal?: AbortSignal;
};

export type WorkerResult = { ok: true; ran: number | null } | CommandFailure;

function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return controller.signal;
}

function aborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

/**
 * Run the task worker. Returns the number of tasks executed with `once`,
 * otherwise null after shutdown.
 */
export async function runWorker(opts: WorkerOpts): Promise<WorkerResult> {
  try {
    const rt = openRuntime(opts);
    try {
      if (opts.once) {
        return { ok: true, ran: await rt.worker.drain() };
      }
      rt.worker.start();
      await aborted(opts.signal ?? shutdownSignal());
      return { ok: true, ran: null };
    } finally {
      await rt.close();
    }
  } catch (err) {
    return failure(err);
  }
}
