/**
 * Exponential backoff.
 *
 * Backoff formula: delay = min(baseDelayMs * backoffFactor^(attempt - 1), maxDelayMs)
 */

import type { Logger } from "./logger.js";

export type RetryPolicy = {
  /** Retries after the first attempt. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  backoffFactor?: number;
};

const DEFAULT_BACKOFF_FACTOR = 2;

const DEFAULT_MAX_DELAY_MS = 300_000;

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: Omit<RetryPolicy, "retries">): number {
  const factor = policy.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;
  const max = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  return Math.min(policy.baseDelayMs * Math.pow(factor, Math.max(attempt - 1, 0)), max);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry and exponential backoff.
 * Throws the last error once `policy.retries` retries are exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  label = "request",
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= policy.retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt < policy.retries) {
        const delay = backoffDelay(attempt + 1, policy);
        logger.warn(
          `[retry] ${label} attempt ${attempt + 1}/${policy.retries + 1} failed: ${lastError.message}. ` +
          `Retrying in ${delay}ms...`,
        );
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error(`${label} failed`);
}
