import fs from "node:fs";
import path from "node:path";
import { sha256OfContent } from "../artifact-writer/checksum.js";
import { deepMerge, loadConfig } from "../config/loader.js";
import { requireValidConfig } from "../config/validator.js";
import { RepoLayout } from "../core/layout.js";
import { errorMessage, isPublishError, PublishError } from "../errors.js";
import { ExecFileRunner, type CommandRunner } from "../exec/command-runner.js";
import type { Reporter } from "../log/reporter.js";
import { SigningService, type SignatureBundle } from "../signing/signer.js";
import { EXIT } from "./exit-codes.js";

export type VerifyCliOptions = {
  output?: string;
  config?: string;
  env?: string;
};

export type VerifyCommandResult = { ok: true; bundle: SignatureBundle } | { ok: false; exitCode: number; problems: string[] };

/** Bundle for the signatures already on disk under a repository root. */
export async function bundleFromLayout(layout: RepoLayout): Promise<SignatureBundle> {
  let release: Buffer;
  try {
    release = await fs.promises.readFile(layout.releasePath);
  } catch (e) {
    throw new PublishError("MissingInput", "VERIFY_FAILED", `Cannot read ${layout.releasePath}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  return {
    release: layout.releasePath,
    in_release: layout.inReleasePath,
    release_gpg: layout.releaseGpgPath,
    release_sha256: sha256OfContent(release),
  };
}

/** `aptctl verify`: check Release.gpg and InRelease of a generated repository. */
export async function verify(
  opts: VerifyCliOptions,
  reporter: Reporter,
  deps: { runner?: CommandRunner; environ?: NodeJS.ProcessEnv } = {},
): Promise<VerifyCommandResult> {
  try {
    const overrides = opts.output !== undefined ? { output_dir: opts.output } : {};
    const config = await requireValidConfig(deepMerge(loadConfig(opts.env, opts.config, deps.environ), overrides));
    const layout = new RepoLayout(path.resolve(config.output_dir), config.distribution.codename, config.distribution.component);

    const signer = new SigningService({
      runner: deps.runner ?? new ExecFileRunner(),
      keyId: config.signing.key_id,
      gpg: config.tools.gpg,
      homedir: config.signing.gpg_homedir,
      timeoutMs: config.tools.timeout_seconds * 1000,
      reporter,
    });

    const bundle = await bundleFromLayout(layout);
    const res = await signer.verify(bundle);
    if (!res.ok) {
      for (const problem of res.problems) reporter.error("VERIFY_FAILED", problem);
      return { ok: false, exitCode: EXIT.VERIFY_FAILED, problems: res.problems };
    }

    reporter.info("VERIFY_OK", `Signatures of ${layout.distRelative}/Release verify`);
    return { ok: true, bundle };
  } catch (e) {
    if (!isPublishError(e)) throw e;
    reporter.error(e.site, `Error: ${e.message}`, { kind: e.kind, exit_code: e.exitCode });
    return { ok: false, exitCode: e.exitCode, problems: [e.message] };
  }
}
