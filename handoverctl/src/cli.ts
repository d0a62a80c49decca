#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { notify, notifyWhenComplete } from "./commands/notify.js";
import { listTasks, requeueTask } from "./commands/queue.js";
import { listHandovers, status } from "./commands/status.js";
import { submit } from "./commands/submit.js";
import { validate } from "./commands/validate.js";
import { runWorker } from "./commands/worker.js";
import type { CommandFailure } from "./commands/exit-codes.js";
import { isTaskState, type TaskState } from "./store/interface.js";

type Format = "human" | "jsonl";

type GlobalOpts = { env?: string; config?: string; format: Format };

function parseFormat(value: string): Format {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("Expected human or jsonl.");
  }
  return value;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseTaskState(value: string): TaskState {
  if (!isTaskState(value)) throw new InvalidArgumentError("Expected pending, running, done or dead.");
  return value;
}

function emit(format: Format, jsonl: object, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(jsonl) + "\n");
  } else {
    console.log(human);
  }
}

function fail(format: Format, res: CommandFailure): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error: res.error }) + "\n");
  } else {
    console.error(res.error);
  }
  process.exit(res.exitCode);
}

const program = new Command();

program
  .name("handoverctl")
  .description("Database handover coordinator")
  .version("0.1.0")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--config <path>", "Path to config directory")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");

function globals(): GlobalOpts {
  return program.opts<GlobalOpts>();
}

function commandOpts(g: GlobalOpts): { env?: string; configDir?: string } {
  return { env: g.env, configDir: g.config };
}

program
  .command("submit")
  .description("Start a handover")
  .requiredOption("--source <uri>", "Source database URI")
  .requiredOption("--contact <email>", "Address to notify")
  .requiredOption("--type <changeType>", "Kind of update")
  .option("--target <uri>", "Target database URI (default: staging + database name)")
  .option("--comment <text>", "Free-text comment")
  .action(async (opts: { source: string; contact: string; type: string; target?: string; comment?: string }) => {
    const g = globals();
    const res = await submit({
      ...commandOpts(g),
      sourceUri: opts.source,
      contact: opts.contact,
      changeType: opts.type,
      targetUri: opts.target,
      comment: opts.comment,
    });
    if (!res.ok) fail(g.format, res);
    emit(g.format, { level: "info", handover_token: res.handoverToken }, res.handoverToken);
  });

program
  .command("worker")
  .description("Run queued handover and email steps until interrupted")
  .option("--once", "Run every due task once and exit")
  .action(async (opts: { once?: boolean }) => {
    const g = globals();
    const res = await runWorker({ ...commandOpts(g), once: opts.once });
    if (!res.ok) fail(g.format, res);
    if (res.ran !== null) emit(g.format, { level: "info", ran: res.ran }, `Ran ${res.ran} task(s).`);
  });

program
  .command("status")
  .description("Show a handover (omit the token to list them)")
  .argument("[token]", "Handover token")
  .option("--active", "Only handovers still in progress")
  .option("--limit <n>", "Maximum number of handovers", parsePositiveInt)
  .action(async (token: string | undefined, opts: { active?: boolean; limit?: number }) => {
    const g = globals();
    if (token) {
      const res = await status({ ...commandOpts(g), handoverToken: token });
      if (!res.ok) fail(g.format, res);
      emit(g.format, res.record, JSON.stringify(res.record, null, 2));
      return;
    }

    const res = await listHandovers({ ...commandOpts(g), active: opts.active, limit: opts.limit });
    if (!res.ok) fail(g.format, res);
    if (g.format === "jsonl") {
      for (const r of res.records) process.stdout.write(JSON.stringify(r) + "\n");
    } else {
      if (res.records.length === 0) { console.log("No handovers found."); return; }
      for (const r of res.records) console.log(`${r.handoverToken}  ${r.status}  ${r.sourceUri}`);
    }
  });

program
  .command("queue")
  .description("List queued tasks")
  .option("--state <state>", "pending|running|done|dead", parseTaskState)
  .option("--key <key>", "Correlation key (handover token)")
  .option("--limit <n>", "Maximum number of tasks", parsePositiveInt)
  .action(async (opts: { state?: TaskState; key?: string; limit?: number }) => {
    const g = globals();
    const res = await listTasks({ ...commandOpts(g), ...opts });
    if (!res.ok) fail(g.format, res);
    if (g.format === "jsonl") {
      for (const t of res.tasks) process.stdout.write(JSON.stringify(t) + "\n");
    } else {
      if (res.tasks.length === 0) { console.log("No tasks found."); return; }
      for (const t of res.tasks) {
        const error = t.lastError ? `  ${t.lastError}` : "";
        console.log(`${t.taskId}  ${t.step}  ${t.state}  attempts=${t.attempts}${error}`);
      }
    }
  });

program
  .command("requeue")
  .description("Revive a dead-lettered task")
  .argument("<taskId>", "Task id")
  .action(async (taskId: string) => {
    const g = globals();
    const res = await requeueTask({ ...commandOpts(g), taskId });
    if (!res.ok) fail(g.format, res);
    emit(g.format, { level: "info", task_id: res.task.taskId, state: res.task.state }, `Requeued ${res.task.taskId}`);
  });

program
  .command("notify")
  .description("Queue an email")
  .requiredOption("--address <email>", "Recipient")
  .requiredOption("--subject <text>", "Subject")
  .requiredOption("--body <text>", "Body")
  .action(async (opts: { address: string; subject: string; body: string }) => {
    const g = globals();
    const res = await notify({ ...commandOpts(g), ...opts });
    if (!res.ok) fail(g.format, res);
    emit(g.format, { level: "info", task_id: res.taskId }, res.taskId);
  });

program
  .command("notify-when-complete")
  .description("Queue an email sent once a job report is final")
  .requiredOption("--url <url>", "Report URL returning {status, subject, body}")
  .requiredOption("--address <email>", "Recipient")
  .action(async (opts: { url: string; address: string }) => {
    const g = globals();
    const res = await notifyWhenComplete({ ...commandOpts(g), ...opts });
    if (!res.ok) fail(g.format, res);
    emit(g.format, { level: "info", task_id: res.taskId }, res.taskId);
  });

program
  .command("validate")
  .description("Validate configuration and schemas")
  .action(() => {
    const g = globals();
    const res = validate(commandOpts(g));
    if (!res.ok) fail(g.format, res);
    emit(g.format, { level: "info", code: "OK", schemas: res.schemas }, "OK");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
