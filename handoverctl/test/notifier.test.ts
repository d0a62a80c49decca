import nodemailer from "nodemailer";
import { describe, expect, it } from "vitest";
import { MailChannel, MailNotifier, type MailTransport } from "../src/notify/notifier.js";
import { mockLogger, testConfig } from "./helpers.js";

const notifications = testConfig().notifications;

type Sent = Parameters<MailTransport["sendMail"]>[0];

class RecordingTransport implements MailTransport {
  readonly sent: Sent[] = [];
  constructor(private readonly failWith?: Error) {}

  async sendMail(message: Sent): Promise<unknown> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
    return { messageId: `<${this.sent.length}@test>` };
  }
}

describe("MailChannel", () => {
  it("sends from the configured address", async () => {
    const transport = new RecordingTransport();
    const channel = new MailChannel(notifications, transport);

    await channel.send({ to: "curator@example.org", subject: "HC submitted", body: "db has been submitted" });

    expect(transport.sent).toEqual([
      {
        from: "handover@localhost.localdomain",
        to: "curator@example.org",
        subject: "HC submitted",
        text: "db has been submitted",
      },
    ]);
  });

  it("delivers through a nodemailer transport", async () => {
    const channel = new MailChannel(notifications, nodemailer.createTransport({ jsonTransport: true }));
    await expect(channel.send({ to: "curator@example.org", subject: "s", body: "b" })).resolves.toBeUndefined();
  });

  it("propagates transport failures", async () => {
    const channel = new MailChannel(notifications, new RecordingTransport(new Error("connection refused")));
    await expect(channel.send({ to: "curator@example.org", subject: "s", body: "b" })).rejects.toThrow(
      "connection refused",
    );
  });
});

describe("MailNotifier", () => {
  it("logs what it sent", async () => {
    const logger = mockLogger();
    const transport = new RecordingTransport();
    const notifier = new MailNotifier(new MailChannel(notifications, transport), logger);

    await notifier.notify("curator@example.org", "Database copy failed", "Copying a to b failed.");

    expect(transport.sent).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith('[notify] Sent "Database copy failed" to curator@example.org');
  });

  it("swallows and logs delivery failures", async () => {
    const logger = mockLogger();
    const notifier = new MailNotifier(
      new MailChannel(notifications, new RecordingTransport(new Error("connection refused"))),
      logger,
    );

    await expect(notifier.notify("curator@example.org", "HC submitted", "body")).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      '[notify] Could not send "HC submitted" to curator@example.org: connection refused',
    );
  });
});
