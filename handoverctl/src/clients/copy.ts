import { HttpJobClient } from "./job-client.js";

export type CopyJob = {
  sourceUri: string;
  targetUri: string;
  onlyTables?: string[];
  skipTables?: string[];
  /** Copy into an existing database instead of replacing it. */
  update?: boolean;
  /** Drop the target database first. */
  drop?: boolean;
};

export class CopyClient extends HttpJobClient<CopyJob> {
  protected readonly service = "copy";

  protected toBody(job: CopyJob): Record<string, unknown> {
    return {
      source_db_uri: job.sourceUri,
      target_db_uri: job.targetUri,
      only_tables: job.onlyTables?.join(",") ?? null,
      skip_tables: job.skipTables?.join(",") ?? null,
      update: job.update ?? false,
      drop: job.drop ?? true,
    };
  }
}
