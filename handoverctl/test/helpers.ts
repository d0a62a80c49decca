import { fileURLToPath } from "node:url";
import { vi, type Mock } from "vitest";
import type { JobClient } from "../src/clients/job-client.js";
import { loadConfig } from "../src/config/loader.js";
import { requireValidConfig } from "../src/config/validator.js";
import type { DatabaseProbe } from "../src/db/probe.js";
import type { Logger } from "../src/logger.js";
import type { Notifier } from "../src/notify/notifier.js";
import type { HandoverConfig } from "../src/types/config.js";
import type { JobStatus } from "../src/types/handover.js";

export const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));

/** base.yaml + test.yaml, ignoring the real environment. */
export function testConfig(): HandoverConfig {
  return requireValidConfig(loadConfig("test", CONFIG_DIR, {}));
}

export type MockLogger = { [K in keyof Logger]: Mock<(msg: string) => void> };

export function mockLogger(): MockLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

/**
 * Job client double. `retrieve` replays `statuses` in order and repeats the
 * last one; a status may be an Error to throw instead.
 */
export class FakeJobClient<P> implements JobClient<P> {
  readonly submitted: P[] = [];
  readonly retrieved: string[] = [];
  /** Thrown by `submit` when set. */
  submitError: Error | null = null;
  private next = 1;

  constructor(
    private readonly prefix: string,
    private statuses: Array<JobStatus | Error> = [{ status: "succeeded" }],
  ) {}

  setStatuses(statuses: Array<JobStatus | Error>): void {
    this.statuses = statuses;
  }

  async submit(params: P): Promise<string> {
    if (this.submitError) throw this.submitError;
    this.submitted.push(params);
    return `${this.prefix}-${this.next++}`;
  }

  async retrieve(jobId: string): Promise<JobStatus> {
    this.retrieved.push(jobId);
    const status = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (status === undefined) throw new Error("no status configured");
    if (status instanceof Error) throw status;
    return status;
  }

  jobUrl(jobId: string): string {
    return `http://jobs.test/${this.prefix}/${jobId}`;
  }
}

export type SentMessage = { recipient: string; subject: string; body: string };

export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];

  async notify(recipient: string, subject: string, body: string): Promise<void> {
    this.sent.push({ recipient, subject, body });
  }

  subjects(): string[] {
    return this.sent.map((m) => m.subject);
  }
}

export class FakeProbe implements DatabaseProbe {
  readonly checked: string[] = [];

  constructor(private readonly existing: ReadonlySet<string> | "all" = "all") {}

  async exists(uri: string): Promise<boolean> {
    this.checked.push(uri);
    return this.existing === "all" || this.existing.has(uri);
  }
}

/** Response factory for stubbed fetch. */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
