import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { isPublishError } from "../errors.js";
import type { Diagnostic } from "../log/reporter.js";
import type { AptctlConfig } from "../types/config.js";

export type ValidateResult = { ok: true; config: AptctlConfig } | { ok: false; errors: Diagnostic[] };

function diag(code: string, message: string, details?: Record<string, unknown>): Diagnostic {
  return { level: "error", code, message, details };
}

/** Templates the configured index modes will read. */
export function requiredTemplates(config: AptctlConfig): string[] {
  const dir = path.resolve(config.templates_dir);
  const files: string[] = [];
  if (config.index.packages_mode === "template") files.push(path.join(dir, "Packages"));
  if (config.index.release_mode === "template") files.push(path.join(dir, "Release"));
  return files;
}

/**
 * `aptctl validate`: layered config against the schema, plus the files the
 * configured run would need before any stage starts.
 */
export async function validateAll(opts: {
  configDir?: string;
  env?: string;
  environ?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.env, opts.configDir, opts.environ);
  } catch (e) {
    if (!isPublishError(e)) throw e;
    return { ok: false, errors: [diag(e.site, e.message)] };
  }

  const res = await validateConfig(raw);
  if (!res.valid) {
    return { ok: false, errors: [diag("CONFIG_INVALID", `Config invalid: ${res.errors}`)] };
  }

  const errors: Diagnostic[] = [];
  for (const file of requiredTemplates(res.config)) {
    if (!fs.existsSync(file)) {
      errors.push(diag("TEMPLATE_NOT_FOUND", `Template file '${file}' not found`, { path: file }));
    }
  }

  if (res.config.package.artifact && !fs.existsSync(path.resolve(res.config.package.artifact))) {
    errors.push(
      diag("ARTIFACT_MISSING", `Package file '${res.config.package.artifact}' not found`, {
        path: res.config.package.artifact,
      }),
    );
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, config: res.config };
}
