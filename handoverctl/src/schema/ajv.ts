import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

/** Ajv ships CommonJS; its default export needs reshaping under NodeNext. */
export function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}
