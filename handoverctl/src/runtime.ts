/**
 * Wires a HandoverConfig into the coordinator, the task queue and the worker.
 * Every external edge (fetch, SMTP transport, database probe, store) can be
 * replaced, which is how the tests run everything in process.
 */

import { CopyClient } from "./clients/copy.js";
import { HealthcheckClient } from "./clients/healthcheck.js";
import { HttpSession, type FetchLike } from "./clients/http-session.js";
import { MetadataClient } from "./clients/metadata.js";
import { HandoverCoordinator, type HandoverHooks } from "./core/coordinator.js";
import { SchemeDatabaseProbe, type DatabaseProbe } from "./db/probe.js";
import { createLogger, type Logger } from "./logger.js";
import { emailSendStep, emailWhenCompleteStep } from "./notify/email-tasks.js";
import { MailChannel, MailNotifier, type MailTransport } from "./notify/notifier.js";
import { TaskQueue } from "./queue/task-queue.js";
import { TaskWorker } from "./queue/worker.js";
import { createRegistry, type SchemaRegistry } from "./schema/registry.js";
import { createDatabase, type HandoverDatabase } from "./store/index.js";
import type { HandoverConfig } from "./types/config.js";

export interface RuntimeOptions {
  logger?: Logger;
  fetch?: FetchLike;
  transport?: MailTransport;
  probe?: DatabaseProbe;
  hooks?: HandoverHooks;
  db?: HandoverDatabase;
  schemas?: SchemaRegistry;
  now?: () => number;
}

export interface Runtime {
  config: HandoverConfig;
  logger: Logger;
  schemas: SchemaRegistry;
  db: HandoverDatabase;
  queue: TaskQueue;
  worker: TaskWorker;
  coordinator: HandoverCoordinator;
  close(): Promise<void>;
}

export function createRuntime(config: HandoverConfig, opts: RuntimeOptions = {}): Runtime {
  const logger = opts.logger ?? createLogger({ level: config.log.level });
  const now = opts.now ?? Date.now;
  const schemas = opts.schemas ?? createRegistry();
  const db = opts.db ?? createDatabase(config.queue);
  const session = new HttpSession(config.http, logger, opts.fetch);
  const channel = new MailChannel(config.notifications, opts.transport);
  const queue = new TaskQueue(db.tasks, now);

  const coordinator = new HandoverCoordinator({
    config,
    healthchecks: new HealthcheckClient(config, session, schemas),
    copies: new CopyClient(config.services.copy, session, schemas),
    metadata: new MetadataClient(config.services.metadata, session, schemas),
    notifier: new MailNotifier(channel, logger),
    queue,
    ledger: db.ledger,
    probe: opts.probe ?? new SchemeDatabaseProbe(),
    schemas,
    logger,
    hooks: opts.hooks,
    now,
  });

  const worker = new TaskWorker({
    store: db.tasks,
    logger,
    concurrency: config.queue.concurrency,
    pollIntervalMs: config.queue.poll_interval_ms,
    leaseMs: config.queue.lease_ms,
    maxAttempts: config.queue.max_attempts,
    backoffBaseMs: config.queue.backoff_base_ms,
    backoffMaxMs: config.queue.backoff_max_ms,
    now,
  });

  for (const step of coordinator.steps()) worker.register(step);
  const emailDeps = { channel, session, schemas, logger, retryDelayMs: config.queue.retry_delay_ms };
  worker.register(emailSendStep(emailDeps));
  worker.register(emailWhenCompleteStep(emailDeps));

  return {
    config,
    logger,
    schemas,
    db,
    queue,
    worker,
    coordinator,
    async close() {
      await worker.stop();
      db.close();
    },
  };
}
