/**
 * Handover Coordinator
 *
 * Drives one handover from intake to a terminal outcome:
 *
 *   intake → (skip_validation | awaiting_validation) → awaiting_copy
 *          → awaiting_metadata → done
 *
 * with validation_error, validation_rejected and copy_failed as the failure
 * outcomes. Intake runs in the caller; every later stage is a deferred step
 * on the task queue that polls one external job and either reschedules
 * itself, advances to the next step, or finishes with a notification.
 *
 * Steps run at least once. The ledger makes them safe to repeat: a job id is
 * recorded before the stage moves on, a recorded id is reused instead of
 * submitting again, and a step that finds its handover already past its
 * stage resumes from the ledger instead of redoing work.
 */

import { buildGroupRules, type GroupRule } from "../classifier/rules.js";
import { classifyDatabase } from "../classifier/classifier.js";
import type { CopyJob } from "../clients/copy.js";
import type { HealthcheckJob } from "../clients/healthcheck.js";
import type { JobClient } from "../clients/job-client.js";
import type { MetadataJob } from "../clients/metadata.js";
import { assertDatabaseExists, type DatabaseProbe } from "../db/probe.js";
import { HandoverError, IntakeValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Notifier } from "../notify/notifier.js";
import type { TaskQueue } from "../queue/task-queue.js";
import { advance, complete, reschedule, type StepDefinition, type StepOutcome } from "../queue/types.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { HandoverLedger, HandoverRecord } from "../store/interface.js";
import { JOB_FIELDS } from "../store/ledger-rules.js";
import type { HandoverConfig } from "../types/config.js";
import type { HandoverInput, HandoverRequest, JobStage } from "../types/handover.js";
import { generateHandoverToken } from "./handover-token.js";
import * as messages from "./messages.js";
import { decideCopy, decideValidation, isPast, routeIntake } from "./state-machine.js";
import { deriveTargetUri } from "./target-uri.js";

export const HANDOVER_STEPS = {
  checkValidation: "handover.check-validation",
  checkCopy: "handover.check-copy",
  checkMetadata: "handover.check-metadata",
} as const;

/** Extension points for behaviour the pipeline does not define yet. */
export interface HandoverHooks {
  /** Called once the metadata job is submitted and the handover is marked done. */
  onMetadataSubmitted?(request: HandoverRequest): void | Promise<void>;
}

export interface CoordinatorDeps {
  config: HandoverConfig;
  healthchecks: JobClient<HealthcheckJob>;
  copies: JobClient<CopyJob>;
  metadata: JobClient<MetadataJob>;
  notifier: Notifier;
  queue: TaskQueue;
  ledger: HandoverLedger;
  probe: DatabaseProbe;
  schemas: SchemaRegistry;
  logger: Logger;
  hooks?: HandoverHooks;
  now?: () => number;
}

/** Rebuild the snapshot a step would carry from what the ledger recorded. */
export function snapshotOf(record: HandoverRecord): HandoverRequest {
  return {
    sourceUri: record.sourceUri,
    targetUri: record.targetUri,
    contact: record.contact,
    changeType: record.changeType,
    handoverToken: record.handoverToken,
    ...(record.comment !== null ? { comment: record.comment } : {}),
    ...(record.validationJobId !== null ? { validationJobId: record.validationJobId } : {}),
    ...(record.copyJobId !== null ? { copyJobId: record.copyJobId } : {}),
    ...(record.metadataJobId !== null ? { metadataJobId: record.metadataJobId } : {}),
  };
}

export class HandoverCoordinator {
  private readonly rules: GroupRule[];
  private readonly now: () => number;

  constructor(private readonly deps: CoordinatorDeps) {
    this.rules = buildGroupRules(deps.config.groups);
    this.now = deps.now ?? Date.now;
  }

  /**
   * Accept a request and start its pipeline. Returns the handover token.
   * Throws IntakeValidationError (or NotFoundError) before anything is submitted
   * when the request is unusable, and SubmissionError when the first job could
   * not be created; in both cases nothing is recorded or queued.
   */
  async intake(input: unknown): Promise<string> {
    const { config, schemas, logger, ledger, queue } = this.deps;

    const parsed = schemas.parse<HandoverInput>("handover-request", input);
    if (!parsed.ok) {
      throw new IntakeValidationError(`Invalid handover request: ${parsed.errors}`);
    }
    const req = parsed.value;

    const targetUri = req.targetUri ?? deriveTargetUri(req.sourceUri, config.staging_uri);
    const handoverToken = generateHandoverToken();
    logger.info(`[intake] Handling ${req.sourceUri} → ${targetUri} (${handoverToken})`);

    await assertDatabaseExists(this.deps.probe, req.sourceUri, logger);

    const base: HandoverRequest = {
      sourceUri: req.sourceUri,
      targetUri,
      contact: req.contact,
      changeType: req.changeType,
      handoverToken,
      ...(req.comment !== undefined ? { comment: req.comment } : {}),
    };

    const { group, reason } = classifyDatabase(req.sourceUri, this.rules);
    const stage = routeIntake(group);
    logger.info(`[intake] ${reason}`);

    if (group === null) {
      const copyJobId = await this.deps.copies.submit(copyJob(base));
      const request = { ...base, copyJobId };
      const now = this.now();
      ledger.open(request, now);
      ledger.transition(handoverToken, stage, now);
      ledger.transition(handoverToken, "awaiting_copy", now);
      queue.enqueue(HANDOVER_STEPS.checkCopy, request, { key: handoverToken });
      logger.info(`[intake] Submitted copy job ${copyJobId} for ${handoverToken}`);
      return handoverToken;
    }

    const validationJobId = await this.deps.healthchecks.submit({ databaseUri: req.sourceUri, groups: [group] });
    const request = { ...base, validationJobId };
    const now = this.now();
    ledger.open(request, now);
    ledger.transition(handoverToken, stage, now);
    queue.enqueue(HANDOVER_STEPS.checkValidation, request, { key: handoverToken });
    logger.info(`[intake] Submitted validation job ${validationJobId} (${group}) for ${handoverToken}`);

    const msg = messages.validationSubmitted(req.sourceUri);
    await this.deps.notifier.notify(req.contact, msg.subject, msg.body);
    return handoverToken;
  }

  /** Step definitions to register on the task worker. */
  steps(): StepDefinition<HandoverRequest>[] {
    const parse = (raw: unknown): HandoverRequest => {
      const parsed = this.deps.schemas.parse<HandoverRequest>("handover-snapshot", raw);
      if (!parsed.ok) throw new HandoverError("PAYLOAD_INVALID", `Invalid handover snapshot: ${parsed.errors}`);
      return parsed.value;
    };
    return [
      { name: HANDOVER_STEPS.checkValidation, parse, run: (request) => this.checkValidation(request) },
      { name: HANDOVER_STEPS.checkCopy, parse, run: (request) => this.checkCopy(request) },
      { name: HANDOVER_STEPS.checkMetadata, parse, run: (request) => this.checkMetadata(request) },
    ];
  }

  async checkValidation(request: HandoverRequest): Promise<StepOutcome> {
    const { logger, healthchecks } = this.deps;
    const record = this.record(request.handoverToken);

    if (isPast(record.status, "awaiting_validation")) {
      return this.resume(record, "awaiting_copy", HANDOVER_STEPS.checkCopy);
    }

    const jobId = requireJobId(request, "validation");
    logger.info(`[handover] Checking validation job ${jobId} for ${request.sourceUri}`);
    const decision = decideValidation(await healthchecks.retrieve(jobId));

    switch (decision.kind) {
      case "wait":
        logger.info(`[handover] Validation job ${jobId} incomplete, checking again later`);
        return reschedule(this.deps.config.queue.retry_delay_ms);

      case "terminal": {
        const url = healthchecks.jobUrl(jobId);
        const msg =
          decision.outcome === "validation_error"
            ? messages.validationFailedToRun(request.sourceUri, url)
            : messages.validationFoundFailures(request.sourceUri, url);
        logger.info(`[handover] ${request.handoverToken} ended in ${decision.outcome}`);
        await this.deps.notifier.notify(request.contact, msg.subject, msg.body);
        this.deps.ledger.transition(request.handoverToken, decision.outcome, this.now());
        return complete();
      }

      case "advance": {
        logger.info(`[handover] Validation passed for ${request.sourceUri}, starting copy`);
        const copyJobId = await this.submitOnce(request.handoverToken, "copy", this.deps.copies, copyJob(request));
        this.deps.ledger.transition(request.handoverToken, decision.to, this.now());
        return advance(HANDOVER_STEPS.checkCopy, { ...request, copyJobId });
      }
    }
  }

  async checkCopy(request: HandoverRequest): Promise<StepOutcome> {
    const { logger, copies } = this.deps;
    const record = this.record(request.handoverToken);

    if (isPast(record.status, "awaiting_copy")) {
      return this.resume(record, "awaiting_metadata", HANDOVER_STEPS.checkMetadata);
    }

    const jobId = requireJobId(request, "copy");
    logger.info(`[handover] Checking copy job ${jobId} for ${request.sourceUri}`);
    const decision = decideCopy(await copies.retrieve(jobId));

    switch (decision.kind) {
      case "wait":
        logger.info(`[handover] Copy job ${jobId} incomplete, checking again later`);
        return reschedule(this.deps.config.queue.retry_delay_ms);

      case "terminal": {
        const msg = messages.copyFailed(request.sourceUri, request.targetUri, copies.jobUrl(jobId));
        logger.info(`[handover] ${request.handoverToken} ended in ${decision.outcome}`);
        await this.deps.notifier.notify(request.contact, msg.subject, msg.body);
        this.deps.ledger.transition(request.handoverToken, decision.outcome, this.now());
        return complete();
      }

      case "advance": {
        logger.info(`[handover] Copy of ${request.targetUri} complete, submitting metadata update`);
        const metadataJobId = await this.submitOnce(request.handoverToken, "metadata", this.deps.metadata, {
          databaseUri: request.targetUri,
          contact: request.contact,
          changeType: request.changeType,
          comment: request.comment,
          handoverToken: request.handoverToken,
        });
        this.deps.ledger.transition(request.handoverToken, decision.to, this.now());
        return advance(HANDOVER_STEPS.checkMetadata, { ...request, metadataJobId });
      }
    }
  }

  /**
   * Metadata stage. The job is submitted by the copy step; completion of the
   * metadata job is not awaited and no final message is sent.
   */
  async checkMetadata(request: HandoverRequest): Promise<StepOutcome> {
    const record = this.record(request.handoverToken);
    if (record.status === "done") return complete();

    const jobId = requireJobId(request, "metadata");
    this.deps.logger.info(`[handover] Metadata job ${jobId} submitted for ${request.targetUri}, handover done`);
    this.deps.ledger.transition(request.handoverToken, "done", this.now());
    await this.deps.hooks?.onMetadataSubmitted?.(request);
    return complete();
  }

  private record(handoverToken: string): HandoverRecord {
    const record = this.deps.ledger.get(handoverToken);
    if (!record) throw new HandoverError("PAYLOAD_INVALID", `Unknown handover: ${handoverToken}`);
    return record;
  }

  /**
   * A repeated delivery of a step whose work is already recorded. If the
   * ledger sits exactly at the stage this step hands over to, the successor
   * may never have been queued, so queue it again; anything further along
   * is handled by a later step.
   */
  private resume(record: HandoverRecord, next: HandoverRecord["status"], step: string): StepOutcome {
    if (record.status !== next) {
      this.deps.logger.debug(`[handover] ${record.handoverToken} already ${record.status}, nothing to do`);
      return complete();
    }
    this.deps.logger.warn(`[handover] ${record.handoverToken} already ${record.status}, re-queuing ${step}`);
    return advance(step, snapshotOf(record));
  }

  /** Submit a stage's job unless the ledger already holds one. */
  private async submitOnce<P>(handoverToken: string, stage: JobStage, client: JobClient<P>, params: P): Promise<string> {
    const existing = this.record(handoverToken)[JOB_FIELDS[stage]];
    if (existing !== null) {
      this.deps.logger.warn(`[handover] Reusing ${stage} job ${existing} for ${handoverToken}`);
      return existing;
    }
    const jobId = await client.submit(params);
    return this.deps.ledger.recordJob(handoverToken, stage, jobId, this.now());
  }
}

function copyJob(request: HandoverRequest): CopyJob {
  return { sourceUri: request.sourceUri, targetUri: request.targetUri, update: false, drop: true };
}

function requireJobId(request: HandoverRequest, stage: JobStage): string {
  const jobId = request[JOB_FIELDS[stage]];
  if (jobId === undefined) {
    throw new HandoverError("PAYLOAD_INVALID", `Handover ${request.handoverToken} has no ${stage} job id`);
  }
  return jobId;
}
