import { HttpJobClient } from "./job-client.js";

export type MetadataJob = {
  databaseUri: string;
  contact: string;
  changeType: string;
  comment?: string;
  handoverToken: string;
};

/** Registers a copied database with the metadata service. */
export class MetadataClient extends HttpJobClient<MetadataJob> {
  protected readonly service = "metadata";

  protected toBody(job: MetadataJob): Record<string, unknown> {
    return {
      database_uri: job.databaseUri,
      email: job.contact,
      update_type: job.changeType,
      comment: job.comment ?? "",
      source: "Handover",
      handover_token: job.handoverToken,
    };
  }
}
