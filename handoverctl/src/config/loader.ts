import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "HANDOVER_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isTree(parsed) ? parsed : {};
}

/**
 * Apply HANDOVER_ prefixed environment variable overrides.
 * HANDOVER_STAGING_URI → staging_uri, HANDOVER_QUEUE__CONCURRENCY → queue.concurrency.
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const coerced: unknown = /^\d+$/.test(value) ? Number(value) : value;
    const patch = segments.reduceRight<unknown>((acc, segment) => ({ [segment]: acc }), coerced);
    if (isTree(patch)) result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 *
 * The result is unchecked; pass it through `validateConfig` before use.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
