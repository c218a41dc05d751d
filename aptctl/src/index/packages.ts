import fs from "node:fs";
import path from "node:path";
import { gzipFile } from "../artifact-writer/compress.js";
import { errorMessage, PublishError } from "../errors.js";
import { expectSuccess, type CommandRunner } from "../exec/command-runner.js";
import type { RepoLayout } from "../core/layout.js";
import type { Reporter } from "../log/reporter.js";
import type { IndexMode } from "../types/config.js";
import { reportRenderFailures, type Artifact, type IndexFile } from "./bindings.js";
import { renderTemplateFile, type RenderFailure, type VariableBindings } from "./template.js";

export type PackageMetadata = {
  name: string;
  version: string;
  maintainer?: string;
  description?: string;
  section?: string;
  priority?: string;
};

export type PackageIndexOptions = {
  layout: RepoLayout;
  architectures: string[];
  artifact: Artifact;
  metadata: PackageMetadata;
  mode: IndexMode;
  /** Packages template, used in template mode. */
  templatePath: string;
  runner: CommandRunner;
  /** Scan tool and its leading arguments, used in scan mode. */
  scanCommand: string[];
  timeoutMs: number;
  reporter: Reporter;
};

export type PackageIndex = {
  arch: string;
  listing: IndexFile;
  failures: RenderFailure[];
};

/** Bindings for one architecture's Packages template. */
export function packageBindings(opts: {
  layout: RepoLayout;
  artifact: Artifact;
  metadata: PackageMetadata;
  arch: string;
}): VariableBindings {
  const { layout, artifact, metadata, arch } = opts;
  const record = { checksums: artifact.checksums, file_size: artifact.file_size };
  return Object.freeze({
    package: {
      name: metadata.name,
      version: metadata.version,
      architecture: arch,
      maintainer: metadata.maintainer,
      description: metadata.description,
      section: metadata.section,
      priority: metadata.priority,
      filename: layout.artifactRelative(artifact.filename),
    },
    artifact: {
      filename: artifact.filename,
      path: layout.artifactRelative(artifact.filename),
      ...record,
    },
    files: { [artifact.filename]: record },
  });
}

/**
 * Point every `Filename:` field at the pool, keeping only the basename the
 * scanner reported.
 */
export function rewriteFilenames(body: string, layout: RepoLayout): string {
  return body
    .split("\n")
    .map((line) => {
      const m = /^Filename:\s*(\S.*)$/.exec(line);
      return m ? `Filename: ${layout.artifactRelative(m[1].trim())}` : line;
    })
    .join("\n");
}

/**
 * Package listing builder. Writes `main/binary-<arch>/Packages` and its `.gz`
 * for every target architecture.
 */
export class PackageIndexBuilder {
  constructor(private readonly opts: PackageIndexOptions) {}

  async build(): Promise<PackageIndex[]> {
    const out: PackageIndex[] = [];
    for (const arch of this.opts.architectures) {
      out.push(await this.buildArch(arch));
    }
    return out;
  }

  async buildArch(arch: string): Promise<PackageIndex> {
    const { layout, reporter } = this.opts;
    const target = layout.packagesPath(arch);
    const relative = layout.packagesRelative(arch);

    let failures: RenderFailure[] = [];
    if (this.opts.mode === "scan") {
      await this.scan(arch, target);
    } else {
      const bindings = packageBindings({ layout, artifact: this.opts.artifact, metadata: this.opts.metadata, arch });
      const res = await renderTemplateFile(this.opts.templatePath, target, bindings);
      failures = res.failures;
      reportRenderFailures(reporter, target, failures);
    }

    if (!fs.existsSync(target)) {
      throw new PublishError("IOFailure", "INDEX_WRITE_FAILED", `Could not create ${target}`);
    }
    const compressed = await gzipFile(target);
    reporter.info("PACKAGES_WRITTEN", `Created ${relative} and ${relative}.gz`, { arch });

    return {
      arch,
      listing: {
        path: target,
        relative_path: relative,
        template: this.opts.mode === "template" ? this.opts.templatePath : undefined,
        compressed,
      },
      failures,
    };
  }

  private async scan(arch: string, target: string): Promise<void> {
    const { layout, runner, scanCommand, timeoutMs } = this.opts;
    const [command, ...lead] = scanCommand;
    const args = [...lead, "--arch", arch, layout.poolRelative];

    const res = expectSuccess(await runner.run(command, args, { cwd: layout.root, timeoutMs }), command, args, {
      missing: "SCAN_TOOL_MISSING",
      failed: "SCAN_FAILED",
    });

    if (res.stdout.trim().length === 0) {
      throw new PublishError("ToolFailure", "SCAN_EMPTY", `${command} produced no output for ${arch} in ${layout.poolRelative}`);
    }

    const body = rewriteFilenames(res.stdout, layout);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, body.endsWith("\n") ? body : body + "\n", "utf8");
    } catch (e) {
      throw new PublishError("IOFailure", "INDEX_WRITE_FAILED", `Cannot write ${target}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
