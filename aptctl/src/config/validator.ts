import { PublishError } from "../errors.js";
import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { AptctlConfig } from "../types/config.js";

const stringList = { type: "array", items: { type: "string", minLength: 1 } } as const;
const command = { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 } as const;
const indexMode = { type: "string", enum: ["template", "scan"], default: "template" } as const;

/** Config schema: every field the pipeline reads, with defaults for optional sections. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "package",
    "output_dir",
    "templates_dir",
    "distribution",
    "index",
    "tools",
    "signing",
    "publish",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    package: {
      type: "object",
      required: ["name", "version", "source_dir"],
      properties: {
        name: { type: "string", pattern: "^[a-z0-9][a-z0-9+.-]+$" },
        version: { type: "string", minLength: 1 },
        filename: { type: "string", pattern: "^[^/]+\\.deb$" },
        maintainer: { type: "string" },
        description: { type: "string" },
        section: { type: "string" },
        priority: { type: "string" },
        source_dir: { type: "string", minLength: 1 },
        artifact: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    output_dir: { type: "string", minLength: 1 },
    templates_dir: { type: "string", minLength: 1 },
    distribution: {
      type: "object",
      required: ["architectures"],
      properties: {
        codename: { type: "string", minLength: 1, default: "stable" },
        suite: { type: "string", minLength: 1, default: "stable" },
        component: { type: "string", minLength: 1, default: "main" },
        architectures: { ...stringList, minItems: 1 },
        origin: { type: "string" },
        label: { type: "string" },
        description: { type: "string" },
      },
      additionalProperties: false,
    },
    index: {
      type: "object",
      properties: {
        packages_mode: indexMode,
        release_mode: indexMode,
      },
      additionalProperties: false,
    },
    tools: {
      type: "object",
      required: ["build", "scan", "release"],
      properties: {
        build: command,
        scan: command,
        release: command,
        gpg: { type: "string", minLength: 1, default: "gpg" },
        timeout_seconds: { type: "integer", minimum: 1, default: 120 },
      },
      additionalProperties: false,
    },
    signing: {
      type: "object",
      properties: {
        key_id: { type: "string", default: "" },
        gpg_homedir: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    publish: {
      type: "object",
      required: ["destination", "owner"],
      properties: {
        destination: { type: "string", minLength: 1 },
        owner: { type: "string", pattern: "^[^\\s:]+(:[^\\s:]+)?$" },
        use_sudo: { type: "boolean", default: true },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;

export type ConfigValidationResult =
  | { valid: true; config: AptctlConfig; errors: null }
  | { valid: false; errors: string };

let compiled: AjvValidateFn | undefined;

/** Validate a loaded config against the config schema. Defaults are filled in place. */
export async function validateConfig(raw: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = compiled ?? ajv.compile(CONFIG_SCHEMA);
  compiled = validate;

  const isConfig = (data: unknown): data is AptctlConfig => validate(data);
  if (isConfig(raw)) return { valid: true, config: raw, errors: null };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Validate or throw a `ConfigurationError` naming every violation. */
export async function requireValidConfig(raw: unknown): Promise<AptctlConfig> {
  const res = await validateConfig(raw);
  if (!res.valid) {
    throw new PublishError("ConfigurationError", "CONFIG_INVALID", `Config invalid: ${res.errors}`);
  }
  return res.config;
}
