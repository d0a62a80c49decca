import type { SchemaRegistry } from "../schema/registry.js";
import type { HandoverConfig } from "../types/config.js";
import type { HttpSession } from "./http-session.js";
import { HttpJobClient } from "./job-client.js";

export type HealthcheckJob = {
  databaseUri: string;
  groups: string[];
};

/** Runs a group of healthchecks against a database. */
export class HealthcheckClient extends HttpJobClient<HealthcheckJob> {
  protected readonly service = "healthcheck";

  constructor(
    private readonly config: HandoverConfig,
    session: HttpSession,
    schemas: SchemaRegistry,
  ) {
    super(config.services.healthcheck, session, schemas);
  }

  protected toBody(job: HealthcheckJob): Record<string, unknown> {
    return {
      db_uri: job.databaseUri,
      production_uri: this.config.production_uri,
      compara_uri: this.config.compara_uri,
      staging_uri: this.config.staging_uri,
      live_uri: this.config.live_uri,
      hc_names: [],
      hc_groups: job.groups,
      data_files_path: this.config.data_files_path,
    };
  }
}
