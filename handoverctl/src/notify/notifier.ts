import nodemailer from "nodemailer";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { NotificationsConfig } from "../types/config.js";

export type MailMessage = {
  to: string;
  subject: string;
  body: string;
};

/** The part of a nodemailer Transporter the channel uses. */
export interface MailTransport {
  sendMail(message: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

/** Delivery channel. `send` throws when the message could not be handed over. */
export class MailChannel {
  private readonly transport: MailTransport;

  constructor(
    private readonly config: NotificationsConfig,
    transport?: MailTransport,
  ) {
    this.transport = transport ?? nodemailer.createTransport(config.smtp_server);
  }

  async send(message: MailMessage): Promise<void> {
    await this.transport.sendMail({
      from: this.config.from_address,
      to: message.to,
      subject: message.subject,
      text: message.body,
    });
  }
}

export interface Notifier {
  /** Best effort: resolves even when delivery fails. */
  notify(recipient: string, subject: string, body: string): Promise<void>;
}

/** Notifier over a MailChannel. Delivery failures are logged and swallowed. */
export class MailNotifier implements Notifier {
  constructor(
    private readonly channel: MailChannel,
    private readonly logger: Logger,
  ) {}

  async notify(recipient: string, subject: string, body: string): Promise<void> {
    try {
      await this.channel.send({ to: recipient, subject, body });
      this.logger.info(`[notify] Sent "${subject}" to ${recipient}`);
    } catch (err) {
      this.logger.error(`[notify] Could not send "${subject}" to ${recipient}: ${errorMessage(err)}`);
    }
  }
}
