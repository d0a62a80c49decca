import { loadConfig } from "../config/loader.js";
import { requireValidConfig } from "../config/validator.js";
import { createRuntime, type Runtime, type RuntimeOptions } from "../runtime.js";
import type { HandoverConfig } from "../types/config.js";

/** Options every command accepts for locating its configuration. */
export type CommandOpts = {
  /** Overlay `config/{env}.yaml` on the base config. */
  env?: string;
  configDir?: string;
  /** Source of HANDOVER_* overrides. Default: process.env. */
  environment?: NodeJS.ProcessEnv;
  /** Replacements for external edges (tests). */
  runtime?: RuntimeOptions;
};

export function resolveConfig(opts: CommandOpts): HandoverConfig {
  return requireValidConfig(loadConfig(opts.env, opts.configDir, opts.environment));
}

export function openRuntime(opts: CommandOpts): Runtime {
  return createRuntime(resolveConfig(opts), opts.runtime);
}

/** Run `fn` against a fresh runtime and close it afterwards. */
export async function withRuntime<T>(opts: CommandOpts, fn: (rt: Runtime) => Promise<T> | T): Promise<T> {
  const rt = openRuntime(opts);
  try {
    return await fn(rt);
  } finally {
    await rt.close();
  }
}
