/** Configuration types for the layered config. */
import type { LogLevel } from "../logger.js";

export type ServiceEndpoint = {
  /** Base URI of the job API, e.g. `http://hc-host:5001/`. */
  uri: string;
  /** Base URI of the web UI; the job id is appended to build a link. */
  web_uri?: string;
};

export type GroupsConfig = {
  core: string;
  variation: string;
  funcgen: string;
  compara: string;
};

export type NotificationsConfig = {
  smtp_server: string;
  from_address: string;
};

export type QueueBackend = "sqlite" | "memory";

export type QueueConfig = {
  backend: QueueBackend;
  db_path: string;
  poll_interval_ms: number;
  /** Delay before re-checking a job that is still running. */
  retry_delay_ms: number;
  concurrency: number;
  /** Attempts before an infrastructure failure dead-letters a task. */
  max_attempts: number;
  backoff_base_ms: number;
  backoff_max_ms: number;
  lease_ms: number;
};

export type HttpConfig = {
  retries: number;
  backoff_ms: number;
};

export type HandoverConfig = {
  schema_version: string;
  staging_uri: string;
  production_uri: string;
  compara_uri: string;
  live_uri: string;
  data_files_path: string;
  services: {
    healthcheck: ServiceEndpoint;
    copy: ServiceEndpoint;
    metadata: ServiceEndpoint;
  };
  groups: GroupsConfig;
  notifications: NotificationsConfig;
  queue: QueueConfig;
  http: HttpConfig;
  log: { level: LogLevel };
};
