import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvInstance } from "./ajv.js";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string };

/**
 * Discovers and loads all JSON Schemas from a directory.
 * Ajv caches each compiled schema, so `parse` compiles once per schema.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "job-status.schema.json" → "job-status"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Get the version registry map (name → version). */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Validate data against a named schema, narrowing it on success. */
  parse<T>(name: string, data: unknown): ParseResult<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile<T>(entry.schema);
    if (validate(data)) return { ok: true, value: data };
    return { ok: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

/** Extract a semver-like version from the schema's $id (e.g. "urn:handoverctl:job-status@1.0.0"). */
function extractVersion(schema: unknown): string | null {
  if (schema === null || typeof schema !== "object" || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)$/.exec(id);
  return m ? m[1] : null;
}

/** Create and load a registry from the default schemas directory. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  registry.load();
  return registry;
}
