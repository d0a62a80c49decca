/** Handover request: the unit of work moving through the pipeline. */
export type HandoverInput = {
  sourceUri: string;
  targetUri?: string;
  contact: string;
  changeType: string;
  comment?: string;
};

/**
 * Snapshot of a request as it travels between deferred steps. Each step receives
 * its own copy and returns the next one; nothing mutates a snapshot in place.
 */
export type HandoverRequest = {
  readonly sourceUri: string;
  readonly targetUri: string;
  readonly contact: string;
  readonly changeType: string;
  readonly comment?: string;
  readonly handoverToken: string;
  readonly validationJobId?: string;
  readonly copyJobId?: string;
  readonly metadataJobId?: string;
};

/** Status vocabulary shared by every external job service. */
export const JOB_STATES = ["submitted", "running", "incomplete", "failed", "succeeded"] as const;

export type JobState = (typeof JOB_STATES)[number];

export type JobOutput = {
  status?: string;
  [key: string]: unknown;
};

export type JobStatus = {
  status: JobState;
  output?: JobOutput;
};

export type JobStage = "validation" | "copy" | "metadata";
