import { describe, expect, it, vi } from "vitest";
import { CopyClient } from "../src/clients/copy.js";
import { HealthcheckClient } from "../src/clients/healthcheck.js";
import { HttpSession, type FetchLike } from "../src/clients/http-session.js";
import { MetadataClient } from "../src/clients/metadata.js";
import { QueryError, SubmissionError } from "../src/errors.js";
import { createRegistry } from "../src/schema/registry.js";
import { jsonResponse, mockLogger, testConfig } from "./helpers.js";

const config = testConfig();
const schemas = createRegistry();

function bodyOf(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

function clients(fetchImpl: FetchLike) {
  const session = new HttpSession(config.http, mockLogger(), fetchImpl);
  return {
    healthchecks: new HealthcheckClient(config, session, schemas),
    copies: new CopyClient(config.services.copy, session, schemas),
    metadata: new MetadataClient(config.services.metadata, session, schemas),
  };
}

describe("submit", () => {
  it("posts the copy job and returns the job id as a string", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ job_id: 7 }));
    const { copies } = clients(fetchMock);

    const jobId = await copies.submit({
      sourceUri: "mysql://ensro@src:3306/homo_sapiens_core_99_38",
      targetUri: "mysql://ensadmin@staging-db:3306/homo_sapiens_core_99_38",
      update: false,
      drop: true,
    });

    expect(jobId).toBe("7");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:5002/jobs");
    expect(init?.method).toBe("POST");
    expect(bodyOf(init)).toEqual({
      source_db_uri: "mysql://ensro@src:3306/homo_sapiens_core_99_38",
      target_db_uri: "mysql://ensadmin@staging-db:3306/homo_sapiens_core_99_38",
      only_tables: null,
      skip_tables: null,
      update: false,
      drop: true,
    });
  });

  it("sends the configured locations with a healthcheck job", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ job_id: "hc-1" }));
    const { healthchecks } = clients(fetchMock);

    await healthchecks.submit({ databaseUri: "mysql://src/homo_sapiens_core_99_38", groups: ["CoreHandover"] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:5001/jobs");
    expect(bodyOf(init)).toEqual({
      db_uri: "mysql://src/homo_sapiens_core_99_38",
      production_uri: config.production_uri,
      compara_uri: config.compara_uri,
      staging_uri: config.staging_uri,
      live_uri: config.live_uri,
      hc_names: [],
      hc_groups: ["CoreHandover"],
      data_files_path: config.data_files_path,
    });
  });

  it("tags a metadata job with the handover token", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ job_id: 3 }));
    const { metadata } = clients(fetchMock);

    await metadata.submit({
      databaseUri: "mysql://staging/homo_sapiens_core_99_38",
      contact: "curator@example.org",
      changeType: "new_assembly",
      handoverToken: "token-1",
    });

    expect(bodyOf(fetchMock.mock.calls[0][1])).toEqual({
      database_uri: "mysql://staging/homo_sapiens_core_99_38",
      email: "curator@example.org",
      update_type: "new_assembly",
      comment: "",
      source: "Handover",
      handover_token: "token-1",
    });
  });

  it("does not retry a rejected submission", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ error: "bad uri" }, 400));
    const { copies } = clients(fetchMock);

    const err = await copies.submit({ sourceUri: "a", targetUri: "b" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SubmissionError);
    expect(err).toMatchObject({ retryable: false, code: "SUBMISSION_FAILED" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("surfaces an unreachable service as a retryable SubmissionError", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const { copies } = clients(fetchMock);

    const err = await copies.submit({ sourceUri: "a", targetUri: "b" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SubmissionError);
    expect(err).toMatchObject({ retryable: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("posts once on a gateway error and leaves the retry to the caller", async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse("unavailable", 503))
      .mockResolvedValueOnce(jsonResponse({ job_id: 9 }));
    const { copies } = clients(fetchMock);

    const err = await copies.submit({ sourceUri: "a", targetUri: "b" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SubmissionError);
    expect(err).toMatchObject({ retryable: true, message: "copy service unreachable at http://localhost:5002/jobs: HTTP 503" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects a response without a job id", async () => {
    const { copies } = clients(vi.fn<FetchLike>(async () => jsonResponse({ id: 1 })));
    await expect(copies.submit({ sourceUri: "a", targetUri: "b" })).rejects.toThrow("copy service returned no job id");
  });
});

describe("retrieve", () => {
  it("reads the job status", async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ status: "succeeded", output: { status: "passed" } }),
    );
    const { healthchecks } = clients(fetchMock);

    await expect(healthchecks.retrieve("abc")).resolves.toEqual({ status: "succeeded", output: { status: "passed" } });
    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:5001/jobs/abc");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
  });

  it("retries gateway errors and then succeeds", async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse("bad gateway", 502))
      .mockResolvedValueOnce(jsonResponse({ status: "running" }));
    const { copies } = clients(fetchMock);

    await expect(copies.retrieve("9")).resolves.toEqual({ status: "running" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("fails with a non-retryable QueryError on a body that is not JSON", async () => {
    const { copies } = clients(vi.fn<FetchLike>(async () => jsonResponse("<html>oops</html>")));

    const err = await copies.retrieve("9").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({ retryable: false });
    expect(String(err)).toContain("copy job 9 returned a malformed status");
  });

  it("never reads an unknown status as still running", async () => {
    const { copies } = clients(vi.fn<FetchLike>(async () => jsonResponse({ status: "queued" })));
    await expect(copies.retrieve("9")).rejects.toBeInstanceOf(QueryError);
  });

  it("fails on a missing job", async () => {
    const { copies } = clients(vi.fn<FetchLike>(async () => jsonResponse({ error: "not found" }, 404)));
    await expect(copies.retrieve("9")).rejects.toMatchObject({ code: "QUERY_FAILED", retryable: false });
  });

  it("surfaces exhausted retries as a retryable QueryError", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse("unavailable", 503));
    const { copies } = clients(fetchMock);

    await expect(copies.retrieve("9")).rejects.toMatchObject({ code: "QUERY_FAILED", retryable: true });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("jobUrl", () => {
  it("links into the web UI when one is configured", () => {
    const { copies, metadata } = clients(vi.fn<FetchLike>());
    expect(copies.jobUrl("12")).toBe("http://localhost:5002/#!/copy_result/12");
    expect(metadata.jobUrl("12")).toBe("http://localhost:5003/jobs/12");
  });
});
