import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry } from "../schema/registry.js";
import type { CommandOpts } from "./context.js";
import { EXIT, failure, type CommandFailure } from "./exit-codes.js";

export type ValidateResult = { ok: true; schemas: Record<string, string> } | CommandFailure;

/**
 * Check the layered configuration and that every JSON Schema compiles.
 */
export function validate(opts: CommandOpts): ValidateResult {
  try {
    const result = validateConfig(loadConfig(opts.env, opts.configDir, opts.environment));
    if (!result.valid) {
      return { ok: false, error: `Config invalid: ${result.errors}`, exitCode: EXIT.CONFIG_INVALID };
    }

    const registry = createRegistry();
    for (const name of registry.names()) {
      // Compiling is what surfaces a broken schema.
      registry.parse(name, null);
    }
    return { ok: true, schemas: registry.versions() };
  } catch (err) {
    return failure(err);
  }
}
