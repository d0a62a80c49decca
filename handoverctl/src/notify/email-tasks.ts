/**
 * Standalone email steps.
 *
 * - `email.send` delivers one message.
 * - `email.when-complete` polls a URL until the report it returns is no longer
 *   in progress, then mails the report's subject and body.
 *
 * Unlike handover notifications, delivery failures here fail the task so the
 * worker's backoff applies: sending the message is the whole job.
 */

import type { HttpSession } from "../clients/http-session.js";
import { HandoverError, QueryError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { complete, reschedule, type StepDefinition } from "../queue/types.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { MailChannel } from "./notifier.js";

export const EMAIL_STEPS = {
  send: "email.send",
  whenComplete: "email.when-complete",
} as const;

export type EmailMessagePayload = {
  address: string;
  subject: string;
  body: string;
};

export type EmailWatchPayload = {
  url: string;
  address: string;
};

type CompletionReport = {
  status: string;
  subject?: string;
  body?: string;
};

const IN_PROGRESS: ReadonlySet<string> = new Set(["submitted", "running", "incomplete"]);

export interface EmailTaskDeps {
  channel: MailChannel;
  session: HttpSession;
  schemas: SchemaRegistry;
  logger: Logger;
  retryDelayMs: number;
}

function payloadParser<P>(schemas: SchemaRegistry, schema: string): (raw: unknown) => P {
  return (raw) => {
    const parsed = schemas.parse<P>(schema, raw);
    if (!parsed.ok) throw new HandoverError("PAYLOAD_INVALID", `Invalid ${schema} payload: ${parsed.errors}`);
    return parsed.value;
  };
}

export function emailSendStep(deps: EmailTaskDeps): StepDefinition<EmailMessagePayload> {
  return {
    name: EMAIL_STEPS.send,
    parse: payloadParser(deps.schemas, "email-message"),
    async run(payload) {
      await deps.channel.send({ to: payload.address, subject: payload.subject, body: payload.body });
      deps.logger.info(`[email] Sent "${payload.subject}" to ${payload.address}`);
      return complete();
    },
  };
}

export function emailWhenCompleteStep(deps: EmailTaskDeps): StepDefinition<EmailWatchPayload> {
  return {
    name: EMAIL_STEPS.whenComplete,
    parse: payloadParser(deps.schemas, "email-watch"),
    async run(payload) {
      const report = await fetchReport(deps, payload.url);

      if (IN_PROGRESS.has(report.status)) {
        deps.logger.debug(`[email] ${payload.url} is ${report.status}, checking again later`);
        return reschedule(deps.retryDelayMs);
      }

      if (report.subject === undefined || report.body === undefined) {
        throw new QueryError(`Report at ${payload.url} is ${report.status} but has no subject/body`, {
          retryable: false,
        });
      }

      await deps.channel.send({ to: payload.address, subject: report.subject, body: report.body });
      deps.logger.info(`[email] Sent "${report.subject}" to ${payload.address}`);
      return complete();
    },
  };
}

async function fetchReport(deps: EmailTaskDeps, url: string): Promise<CompletionReport> {
  let text: string;
  let status: number;
  try {
    const res = await deps.session.request("GET", url);
    text = res.text;
    status = res.status;
  } catch (err) {
    throw new QueryError(`Could not read ${url}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    deps.logger.error(`[email] Invalid response. URL: ${url} Status: ${status} Body: ${text}`);
    throw new QueryError(`Response from ${url} is not JSON`, { retryable: false });
  }

  const parsed = deps.schemas.parse<CompletionReport>("completion-report", json);
  if (!parsed.ok) {
    throw new QueryError(`Response from ${url} is not a completion report: ${parsed.errors}`, { retryable: false });
  }
  return parsed.value;
}
