import type { Logger } from "../logger.js";
import { withRetry } from "../retry.js";
import type { HttpConfig } from "../types/config.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE";

export type HttpResponse = {
  status: number;
  ok: boolean;
  text: string;
};

/** Gateway and throttling statuses worth another try. */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export class RetryableStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP ${status}`);
    this.name = "RetryableStatusError";
  }
}

export type RequestOptions = {
  /**
   * Repeat the call on network errors and retryable statuses. Default: true.
   * Turn off for calls that create something remotely.
   */
  retry?: boolean;
};

/**
 * JSON over HTTP with retries on network errors and retryable statuses.
 * Any other status is returned for the caller to interpret.
 */
export class HttpSession {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: HttpConfig,
    private readonly logger: Logger,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async request(method: HttpMethod, url: string, body?: unknown, opts: RequestOptions = {}): Promise<HttpResponse> {
    return withRetry(
      async () => {
        const res = await this.fetchImpl(url, {
          method,
          headers: { Accept: "application/json", ...(body === undefined ? {} : { "Content-Type": "application/json" }) },
          body: body === undefined ? undefined : JSON.stringify(body),
        });
        const text = await res.text();
        if (RETRY_STATUSES.has(res.status)) {
          throw new RetryableStatusError(res.status, text);
        }
        return { status: res.status, ok: res.ok, text };
      },
      { retries: opts.retry === false ? 0 : this.config.retries, baseDelayMs: this.config.backoff_ms },
      this.logger,
      `${method} ${url}`,
    );
  }
}
