import { createAjv } from "../schema/ajv.js";
import { ConfigError } from "../errors.js";
import type { HandoverConfig } from "../types/config.js";

const endpoint = {
  type: "object",
  required: ["uri"],
  properties: {
    uri: { type: "string", format: "uri" },
    web_uri: { type: "string", minLength: 1 },
  },
};

const positiveInt = { type: "integer", minimum: 1 };
const nonNegativeInt = { type: "integer", minimum: 0 };

/** Every field the runtime reads must be present. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "staging_uri",
    "production_uri",
    "compara_uri",
    "live_uri",
    "data_files_path",
    "services",
    "groups",
    "notifications",
    "queue",
    "http",
    "log",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    staging_uri: { type: "string", minLength: 1 },
    production_uri: { type: "string", minLength: 1 },
    compara_uri: { type: "string", minLength: 1 },
    live_uri: { type: "string", minLength: 1 },
    data_files_path: { type: "string", minLength: 1 },
    services: {
      type: "object",
      required: ["healthcheck", "copy", "metadata"],
      properties: { healthcheck: endpoint, copy: endpoint, metadata: endpoint },
    },
    groups: {
      type: "object",
      required: ["core", "variation", "funcgen", "compara"],
      properties: {
        core: { type: "string", minLength: 1 },
        variation: { type: "string", minLength: 1 },
        funcgen: { type: "string", minLength: 1 },
        compara: { type: "string", minLength: 1 },
      },
    },
    notifications: {
      type: "object",
      required: ["smtp_server", "from_address"],
      properties: {
        smtp_server: { type: "string", minLength: 1 },
        from_address: { type: "string", format: "email" },
      },
    },
    queue: {
      type: "object",
      required: [
        "backend",
        "db_path",
        "poll_interval_ms",
        "retry_delay_ms",
        "concurrency",
        "max_attempts",
        "backoff_base_ms",
        "backoff_max_ms",
        "lease_ms",
      ],
      properties: {
        backend: { type: "string", enum: ["sqlite", "memory"] },
        db_path: { type: "string", minLength: 1 },
        poll_interval_ms: positiveInt,
        retry_delay_ms: nonNegativeInt,
        concurrency: positiveInt,
        max_attempts: positiveInt,
        backoff_base_ms: nonNegativeInt,
        backoff_max_ms: nonNegativeInt,
        lease_ms: positiveInt,
      },
    },
    http: {
      type: "object",
      required: ["retries", "backoff_ms"],
      properties: { retries: nonNegativeInt, backoff_ms: nonNegativeInt },
    },
    log: {
      type: "object",
      required: ["level"],
      properties: { level: { type: "string", enum: ["debug", "info", "warn", "error"] } },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: HandoverConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = createAjv();
  const validate = ajv.compile<HandoverConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Validate or throw ConfigError. */
export function requireValidConfig(config: unknown): HandoverConfig {
  const result = validateConfig(config);
  if (!result.valid) throw new ConfigError(`Invalid configuration: ${result.errors}`);
  return result.config;
}
