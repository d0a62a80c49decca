import { errorMessage, QueryError, SubmissionError } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ServiceEndpoint } from "../types/config.js";
import type { JobStatus } from "../types/handover.js";
import type { HttpResponse, HttpSession } from "./http-session.js";

/** Submit/poll contract shared by the validation, copy and metadata services. */
export interface JobClient<P> {
  /** Create a job. Throws SubmissionError. Sent once: the caller owns any retry. */
  submit(params: P): Promise<string>;
  /** Read a job's status. Throws QueryError on transport failure or a malformed body. */
  retrieve(jobId: string): Promise<JobStatus>;
  /** Link to the job in the service's web UI, if it has one. */
  jobUrl(jobId: string): string;
}

/**
 * REST job service: `POST {uri}jobs` returns `{ job_id }`,
 * `GET {uri}jobs/{id}` returns `{ status, output? }`.
 */
export abstract class HttpJobClient<P> implements JobClient<P> {
  protected abstract readonly service: string;

  constructor(
    protected readonly endpoint: ServiceEndpoint,
    protected readonly session: HttpSession,
    protected readonly schemas: SchemaRegistry,
  ) {}

  protected abstract toBody(params: P): Record<string, unknown>;

  async submit(params: P): Promise<string> {
    const url = new URL("jobs", this.endpoint.uri).toString();

    let res: HttpResponse;
    try {
      res = await this.session.request("POST", url, this.toBody(params), { retry: false });
    } catch (err) {
      throw new SubmissionError(`${this.service} service unreachable at ${url}: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new SubmissionError(`${this.service} service rejected job (${res.status}): ${res.text}`, {
        retryable: false,
      });
    }

    const parsed = this.schemas.parse<{ job_id: string | number }>("job-submission", parseJson(res.text));
    if (!parsed.ok) {
      throw new SubmissionError(`${this.service} service returned no job id: ${parsed.errors}`, { retryable: false });
    }
    return String(parsed.value.job_id);
  }

  async retrieve(jobId: string): Promise<JobStatus> {
    const url = new URL(`jobs/${encodeURIComponent(jobId)}`, this.endpoint.uri).toString();

    let res: HttpResponse;
    try {
      res = await this.session.request("GET", url);
    } catch (err) {
      throw new QueryError(`${this.service} job ${jobId} status unavailable: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new QueryError(`${this.service} job ${jobId} status request failed (${res.status}): ${res.text}`, {
        retryable: false,
      });
    }

    const parsed = this.schemas.parse<JobStatus>("job-status", parseJson(res.text));
    if (!parsed.ok) {
      throw new QueryError(`${this.service} job ${jobId} returned a malformed status: ${parsed.errors}`, {
        retryable: false,
      });
    }
    return parsed.value;
  }

  jobUrl(jobId: string): string {
    return `${this.endpoint.web_uri ?? new URL("jobs/", this.endpoint.uri).toString()}${jobId}`;
  }
}

/** Undefined for a body that is not JSON, so schema validation rejects it. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
