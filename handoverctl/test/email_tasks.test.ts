import { describe, expect, it, vi } from "vitest";
import { HttpSession, type FetchLike } from "../src/clients/http-session.js";
import { HandoverError, QueryError } from "../src/errors.js";
import { EMAIL_STEPS, emailSendStep, emailWhenCompleteStep, type EmailTaskDeps } from "../src/notify/email-tasks.js";
import { MailChannel, type MailTransport } from "../src/notify/notifier.js";
import type { StepContext } from "../src/queue/types.js";
import { createRegistry } from "../src/schema/registry.js";
import { jsonResponse, mockLogger, testConfig, type MockLogger } from "./helpers.js";

const config = testConfig();
const schemas = createRegistry();
const ctx: StepContext = { taskId: "task-1", key: null, attempts: 0, reschedules: 0 };

type Sent = Parameters<MailTransport["sendMail"]>[0];

function setup(fetchImpl: FetchLike = vi.fn<FetchLike>()): {
  deps: EmailTaskDeps;
  sent: Sent[];
  logger: MockLogger;
} {
  const sent: Sent[] = [];
  const transport: MailTransport = {
    async sendMail(message) {
      sent.push(message);
      return {};
    },
  };
  const logger = mockLogger();
  const deps: EmailTaskDeps = {
    channel: new MailChannel(config.notifications, transport),
    session: new HttpSession(config.http, logger, fetchImpl),
    schemas,
    logger,
    retryDelayMs: 1000,
  };
  return { deps, sent, logger };
}

describe("email.send", () => {
  it("sends one message and completes", async () => {
    const { deps, sent } = setup();
    const step = emailSendStep(deps);

    const outcome = await step.run(
      step.parse({ address: "curator@example.org", subject: "Release", body: "All done" }),
      ctx,
    );

    expect(step.name).toBe(EMAIL_STEPS.send);
    expect(outcome).toEqual({ kind: "complete" });
    expect(sent).toEqual([
      { from: config.notifications.from_address, to: "curator@example.org", subject: "Release", text: "All done" },
    ]);
  });

  it("rejects a payload without a valid address", () => {
    const step = emailSendStep(setup().deps);
    expect(() => step.parse({ address: "nobody", subject: "s", body: "b" })).toThrow(HandoverError);
  });

  it("fails the task when the message cannot be sent", async () => {
    const { deps } = setup();
    const failing = {
      ...deps,
      channel: new MailChannel(config.notifications, {
        sendMail: async () => {
          throw new Error("smtp down");
        },
      }),
    };
    const step = emailSendStep(failing);

    await expect(step.run({ address: "curator@example.org", subject: "s", body: "b" }, ctx)).rejects.toThrow(
      "smtp down",
    );
  });
});

describe("email.when-complete", () => {
  const payload = { url: "http://reports.test/jobs/1", address: "curator@example.org" };

  it.each(["submitted", "running", "incomplete"])("reschedules while the report is %s", async (status) => {
    const { deps, sent } = setup(vi.fn<FetchLike>(async () => jsonResponse({ status })));
    const step = emailWhenCompleteStep(deps);

    await expect(step.run(step.parse(payload), ctx)).resolves.toEqual({ kind: "reschedule", delayMs: 1000 });
    expect(sent).toHaveLength(0);
  });

  it("mails the report once it is final", async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ status: "complete", subject: "Job 1 finished", body: "See the results" }),
    );
    const { deps, sent } = setup(fetchMock);
    const step = emailWhenCompleteStep(deps);

    await expect(step.run(step.parse(payload), ctx)).resolves.toEqual({ kind: "complete" });
    expect(fetchMock.mock.calls[0][0]).toBe("http://reports.test/jobs/1");
    expect(sent).toEqual([
      {
        from: config.notifications.from_address,
        to: "curator@example.org",
        subject: "Job 1 finished",
        text: "See the results",
      },
    ]);
  });

  it("mails a failed report too", async () => {
    const { deps, sent } = setup(
      vi.fn<FetchLike>(async () => jsonResponse({ status: "failed", subject: "Job 1 failed", body: "Error" })),
    );
    const step = emailWhenCompleteStep(deps);

    await step.run(step.parse(payload), ctx);
    expect(sent.map((m) => m.subject)).toEqual(["Job 1 failed"]);
  });

  it("refuses a response that is not JSON without retrying", async () => {
    const { deps, logger } = setup(vi.fn<FetchLike>(async () => new Response("<html>", { status: 200 })));
    const step = emailWhenCompleteStep(deps);

    const err = await step.run(step.parse(payload), ctx).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({ retryable: false });
    expect(logger.error).toHaveBeenCalledWith(
      "[email] Invalid response. URL: http://reports.test/jobs/1 Status: 200 Body: <html>",
    );
  });

  it("refuses a final report without subject and body", async () => {
    const { deps } = setup(vi.fn<FetchLike>(async () => jsonResponse({ status: "complete" })));
    const step = emailWhenCompleteStep(deps);

    await expect(step.run(step.parse(payload), ctx)).rejects.toMatchObject({ retryable: false });
  });
});
