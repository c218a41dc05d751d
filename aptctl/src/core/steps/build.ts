import fs from "node:fs";
import path from "node:path";
import { errnoCode, errorMessage, PublishError } from "../../errors.js";
import { expectSuccess, type CommandRunner } from "../../exec/command-runner.js";
import type { Reporter } from "../../log/reporter.js";

export type BuildOptions = {
  runner: CommandRunner;
  /** Build tool and its leading arguments, e.g. `["dpkg-deb", "--build"]`. */
  buildCommand: string[];
  sourceDir: string;
  artifactPath: string;
  timeoutMs: number;
  reporter: Reporter;
};

/**
 * Building stage: drop a stale artifact, then have the packaging tool turn the
 * staged tree into the `.deb`.
 */
export async function runBuild(opts: BuildOptions): Promise<string> {
  const { reporter, artifactPath } = opts;

  if (fs.existsSync(artifactPath)) {
    try {
      fs.rmSync(artifactPath);
      reporter.info("ARTIFACT_REMOVED", `Removed existing package: ${artifactPath}`);
    } catch (e) {
      throw new PublishError(
        "IOFailure",
        "ARTIFACT_REMOVE_FAILED",
        `Cannot remove existing package ${artifactPath}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  if (!fs.existsSync(opts.sourceDir)) {
    throw new PublishError("MissingInput", "BUILD_FAILED", `Package source directory not found: ${opts.sourceDir}`);
  }

  fs.mkdirSync(path.dirname(artifactPath), { recursive: true });
  reporter.info("BUILD_STARTED", `Building: ${path.basename(artifactPath)}`);

  const [command, ...lead] = opts.buildCommand;
  const args = [...lead, opts.sourceDir, artifactPath];
  expectSuccess(await opts.runner.run(command, args, { timeoutMs: opts.timeoutMs }), command, args, {
    missing: "BUILD_TOOL_MISSING",
    failed: "BUILD_FAILED",
  });

  if (!fs.existsSync(artifactPath)) {
    throw new PublishError("MissingInput", "ARTIFACT_MISSING", `${command} reported success but ${artifactPath} is missing`);
  }
  return artifactPath;
}

/**
 * Without a build the artifact must already sit in the pool, or be copied in
 * from `source`.
 */
export async function ingestArtifact(opts: {
  artifactPath: string;
  source?: string;
  reporter: Reporter;
}): Promise<string> {
  const { artifactPath, source, reporter } = opts;

  if (source && path.resolve(source) !== path.resolve(artifactPath)) {
    try {
      await fs.promises.mkdir(path.dirname(artifactPath), { recursive: true });
      await fs.promises.copyFile(source, artifactPath);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        throw new PublishError("MissingInput", "ARTIFACT_MISSING", `Package file '${source}' not found`);
      }
      throw new PublishError("IOFailure", "ARTIFACT_INGEST_FAILED", `Cannot copy ${source} into the pool: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    reporter.info("ARTIFACT_INGESTED", `Added ${path.basename(source)} to the pool`);
    return artifactPath;
  }

  if (!fs.existsSync(artifactPath)) {
    throw new PublishError("MissingInput", "ARTIFACT_MISSING", `Package file '${artifactPath}' not found and build skipped`);
  }
  return artifactPath;
}
