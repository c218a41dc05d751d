import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | undefined;

/**
 * JSON Schema 2020-12 validator with formats, created once per process.
 * Validation fills schema defaults and coerces scalars in place, so an
 * all-digit key id from the environment still validates as a string.
 */
export async function loadAjv(): Promise<AjvInstance> {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, useDefaults: true, coerceTypes: true });
  add(ajv);

  shared = ajv;
  return ajv;
}
