/**
 * Error taxonomy.
 *
 * Infrastructure failures (unreachable services, malformed payloads) are thrown
 * as HandoverError subclasses so the task worker's backoff and dead-letter policy
 * applies. Business outcomes (a job that ran and failed) are never thrown: the
 * coordinator resolves them with a notification.
 */

export type HandoverErrorCode =
  | "INTAKE_INVALID"
  | "SOURCE_NOT_FOUND"
  | "SUBMISSION_FAILED"
  | "QUERY_FAILED"
  | "PROBE_FAILED"
  | "PAYLOAD_INVALID"
  | "STAGE_REGRESSION"
  | "CONFIG_INVALID";

export class HandoverError extends Error {
  readonly code: HandoverErrorCode;
  /** False when repeating the same call cannot succeed. */
  readonly retryable: boolean;

  constructor(code: HandoverErrorCode, message: string, opts?: { retryable?: boolean; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts?.retryable ?? false;
  }
}

/** Bad or missing request fields. Surfaced synchronously to the submitter. */
export class IntakeValidationError extends HandoverError {
  constructor(message: string, code: "INTAKE_INVALID" | "SOURCE_NOT_FOUND" = "INTAKE_INVALID") {
    super(code, message);
  }
}

/** The source database does not exist. */
export class NotFoundError extends IntakeValidationError {
  constructor(message: string) {
    super(message, "SOURCE_NOT_FOUND");
  }
}

/** An external job service rejected a submission or could not be reached. */
export class SubmissionError extends HandoverError {
  constructor(message: string, opts?: { retryable?: boolean; cause?: unknown }) {
    super("SUBMISSION_FAILED", message, { retryable: opts?.retryable ?? true, cause: opts?.cause });
  }
}

/**
 * A job status query failed. Transport failures are retryable; a body that is
 * not a job status is not, and must never be read as "still running".
 */
export class QueryError extends HandoverError {
  constructor(message: string, opts?: { retryable?: boolean; cause?: unknown }) {
    super("QUERY_FAILED", message, { retryable: opts?.retryable ?? true, cause: opts?.cause });
  }
}

/** The database server behind a source URI could not be inspected. */
export class ProbeError extends HandoverError {
  constructor(message: string, cause?: unknown) {
    super("PROBE_FAILED", message, { retryable: true, cause });
  }
}

export class ConfigError extends HandoverError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errors that are not HandoverErrors (driver bugs, network stacks) are assumed transient. */
export function isRetryable(err: unknown): boolean {
  return err instanceof HandoverError ? err.retryable : true;
}
