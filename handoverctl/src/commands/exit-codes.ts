import { ConfigError, HandoverError, IntakeValidationError, NotFoundError, errorMessage } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  INPUT_INVALID: 2,
  NOT_FOUND: 3,
  CONFIG_INVALID: 4,
  RETRYABLE_FAILURE: 10,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type CommandFailure = { ok: false; error: string; exitCode: ExitCode };

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof NotFoundError) return EXIT.NOT_FOUND;
  if (err instanceof IntakeValidationError) return EXIT.INPUT_INVALID;
  if (err instanceof ConfigError) return EXIT.CONFIG_INVALID;
  if (err instanceof HandoverError && err.retryable) return EXIT.RETRYABLE_FAILURE;
  return EXIT.FAILURE;
}

export function failure(err: unknown): CommandFailure {
  return { ok: false, error: errorMessage(err), exitCode: exitCodeFor(err) };
}
