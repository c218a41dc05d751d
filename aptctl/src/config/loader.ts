import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { errorMessage, PublishError } from "../errors.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "APTCTL_";

export type RawConfig = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new PublishError("ConfigurationError", "CONFIG_INVALID", `Cannot parse ${filePath}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new PublishError("ConfigurationError", "CONFIG_INVALID", `${filePath} must contain a mapping`);
  }
  return doc;
}

/**
 * Config path for an override variable: `APTCTL_SIGNING__KEY_ID` →
 * `["signing", "key_id"]`. Returns null for unrelated variables.
 */
export function envKeyPath(name: string): string[] | null {
  if (!name.startsWith(ENV_PREFIX)) return null;
  const segments = name.slice(ENV_PREFIX.length).toLowerCase().split("__");
  return segments.every((s) => s.length > 0) ? segments : null;
}

const ENV_INTEGER = /^(0|-?[1-9][0-9]*)$/;

/**
 * Environment values stay strings unless they read back unchanged as a
 * boolean (`true`, `false`), a decimal integer (`120`) or a YAML flow
 * sequence (`[amd64, arm64]`). A value like `0xDEADBEEF` or `01234567` is
 * kept as typed, so string fields such as `signing.key_id` get the exact text.
 */
export function parseEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (ENV_INTEGER.test(value)) {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value;
  }
  if (value.trimStart().startsWith("[")) {
    try {
      const parsed: unknown = YAML.parse(value);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      return value;
    }
  }
  return value;
}

/** Apply APTCTL_ prefixed environment variable overrides. */
export function applyEnvOverrides(config: RawConfig, environ: NodeJS.ProcessEnv = process.env): RawConfig {
  let result = config;
  for (const [key, value] of Object.entries(environ)) {
    if (value === undefined) continue;
    const keyPath = envKeyPath(key);
    if (!keyPath) continue;

    let layer: RawConfig = { [keyPath[keyPath.length - 1]]: parseEnvValue(value) };
    for (let i = keyPath.length - 2; i >= 0; i--) layer = { [keyPath[i]]: layer };
    result = deepMerge(result, layer);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 * The result is unvalidated; see `validateConfig`.
 *
 * @param envName - Loads `config/{envName}.yaml` as override layer.
 */
export function loadConfig(envName?: string, configDir?: string, environ: NodeJS.ProcessEnv = process.env): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  if (!fs.existsSync(path.join(dir, "base.yaml"))) {
    throw new PublishError("ConfigurationError", "CONFIG_INVALID", `Missing base config: ${path.join(dir, "base.yaml")}`);
  }

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override (absent file = no override)
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, environ);
}
