import fs from "node:fs";
import { CHECKSUM_ALGORITHMS, computeFileDigests, requireCompleteDigest } from "../artifact-writer/checksum.js";
import { errorMessage, PublishError } from "../errors.js";
import { expectSuccess, type CommandRunner } from "../exec/command-runner.js";
import type { RepoLayout } from "../core/layout.js";
import type { Reporter } from "../log/reporter.js";
import type { IndexMode } from "../types/config.js";
import { fileRecord, reportRenderFailures, type FileRecord, type IndexFile } from "./bindings.js";
import type { PackageIndex } from "./packages.js";
import { readTemplate, renderTemplate, toFileContent, type RenderFailure } from "./template.js";

/** Fields every Release must carry, with the value used when absent. */
export const RELEASE_DEFAULTS = [
  ["Suite", "stable"],
  ["Codename", "stable"],
] as const;

export type ReleaseInfo = {
  suite: string;
  codename: string;
  origin?: string;
  label?: string;
  description?: string;
  architectures: string[];
  components: string[];
  date: Date;
};

export type ReleaseOptions = {
  layout: RepoLayout;
  mode: IndexMode;
  templatePath: string;
  runner: CommandRunner;
  /** Release tool and its leading arguments, used in scan mode. */
  releaseCommand: string[];
  timeoutMs: number;
  reporter: Reporter;
  info: ReleaseInfo;
};

export type ReleaseDescriptor = IndexFile & {
  /** Dist-relative path → digests, for every index file the Release covers. */
  covered: Record<string, FileRecord>;
  /** Default field lines that were prepended. */
  added_defaults: string[];
  failures: RenderFailure[];
};

/**
 * Dist-relative paths the Release must list: each Packages file, its `.gz`,
 * and the compressed translation stub.
 */
export function coveredFiles(packages: PackageIndex[], translation: IndexFile): string[] {
  const files: string[] = [];
  for (const p of packages) {
    files.push(p.listing.relative_path, `${p.listing.relative_path}.gz`);
  }
  files.push(`${translation.relative_path}.gz`);
  return files;
}

/** Field names are case-insensitive. */
function hasField(body: string, field: string): boolean {
  return new RegExp(`^${field}:`, "mi").test(body);
}

/**
 * Prepend `Suite: stable` / `Codename: stable` for each field the body lacks.
 * Running it again on its own output adds nothing.
 */
export function applyReleaseDefaults(body: string): { text: string; added: string[] } {
  const added: string[] = [];
  for (const [field, value] of RELEASE_DEFAULTS) {
    if (!hasField(body, field)) added.push(`${field}: ${value}`);
  }
  if (added.length === 0) return { text: body, added };
  return { text: added.join("\n") + "\n" + body, added };
}

/** `MD5Sum:` … `SHA512:` sections in the layout apt-ftparchive writes. */
export function checksumSections(covered: Record<string, FileRecord>): string[] {
  const lines: string[] = [];
  for (const algorithm of CHECKSUM_ALGORITHMS) {
    lines.push(`${algorithm}:`);
    for (const [rel, record] of Object.entries(covered)) {
      lines.push(` ${record.checksums[algorithm] ?? ""} ${String(record.file_size).padStart(16)} ${rel}`);
    }
  }
  return lines;
}

/** Paths whose SHA256 and size are not listed in the descriptor. */
export function findUncovered(text: string, covered: Record<string, FileRecord>): string[] {
  const entries = new Set(
    text
      .split("\n")
      .map((l) => l.trim().split(/\s+/))
      .filter((parts) => parts.length === 3)
      .map((parts) => parts.join(" ")),
  );
  return Object.entries(covered)
    .filter(([rel, record]) => !entries.has(`${record.checksums.SHA256} ${record.file_size} ${rel}`))
    .map(([rel]) => rel);
}

/**
 * Release descriptor builder. Digests the covered index files, produces the
 * body from the template or the release tool, prepends missing defaults and
 * writes `dists/<dist>/Release`.
 */
export class ReleaseDescriptorBuilder {
  constructor(private readonly opts: ReleaseOptions) {}

  async build(files: string[]): Promise<ReleaseDescriptor> {
    const { layout, reporter } = this.opts;

    // A new Release makes any earlier signature stale.
    await this.removeStaleSignatures();

    const absolute = files.map((rel) => layout.distPath(rel));
    const digests = await computeFileDigests(absolute);
    const covered: Record<string, FileRecord> = {};
    files.forEach((rel, i) => {
      const file = absolute[i];
      const digest = digests.get(file);
      if (!digest) throw new PublishError("MissingInput", "CHECKSUM_FAILED", `No checksums for ${file}`);
      covered[rel] = fileRecord(requireCompleteDigest(file, digest));
    });

    let body: string;
    let failures: RenderFailure[] = [];
    if (this.opts.mode === "scan") {
      body = await this.scan();
    } else {
      const res = renderTemplate(await readTemplate(this.opts.templatePath), {
        release: {
          suite: this.opts.info.suite,
          codename: this.opts.info.codename,
          origin: this.opts.info.origin,
          label: this.opts.info.label,
          description: this.opts.info.description,
          date: this.opts.info.date,
          architectures: this.opts.info.architectures.join(" "),
          components: this.opts.info.components.join(" "),
        },
        files: covered,
      });
      failures = res.failures;
      reportRenderFailures(reporter, layout.releasePath, failures);
      body = toFileContent([...res.lines, ...checksumSections(covered)]);
    }

    const { text, added } = applyReleaseDefaults(body);
    for (const line of added) {
      reporter.warn("RELEASE_DEFAULT_ADDED", `Release had no ${line.split(":")[0]} field, added '${line}'`);
    }

    const uncovered = findUncovered(text, covered);
    if (uncovered.length > 0) {
      throw new PublishError("ToolFailure", "RELEASE_INCOMPLETE", `Release does not list: ${uncovered.join(", ")}`);
    }

    try {
      await fs.promises.mkdir(layout.distDir, { recursive: true });
      await fs.promises.writeFile(layout.releasePath, text, "utf8");
    } catch (e) {
      throw new PublishError("IOFailure", "RELEASE_FAILED", `Cannot write ${layout.releasePath}: ${errorMessage(e)}`, {
        cause: e,
      });
    }

    reporter.info("RELEASE_WRITTEN", `Created ${layout.distRelative}/Release covering ${files.length} file(s)`);

    return {
      path: layout.releasePath,
      relative_path: "Release",
      template: this.opts.mode === "template" ? this.opts.templatePath : undefined,
      covered,
      added_defaults: added,
      failures,
    };
  }

  private async scan(): Promise<string> {
    const { layout, runner, releaseCommand, timeoutMs } = this.opts;
    const [command, ...lead] = releaseCommand;
    const args = [...lead, layout.distRelative];

    const res = expectSuccess(await runner.run(command, args, { cwd: layout.root, timeoutMs }), command, args, {
      missing: "RELEASE_TOOL_MISSING",
      failed: "RELEASE_FAILED",
    });

    if (res.stdout.trim().length === 0) {
      throw new PublishError("ToolFailure", "RELEASE_SCAN_EMPTY", `${command} produced no output for ${layout.distRelative}`);
    }
    return res.stdout.endsWith("\n") ? res.stdout : res.stdout + "\n";
  }

  private async removeStaleSignatures(): Promise<void> {
    const { layout } = this.opts;
    for (const file of [layout.inReleasePath, layout.releaseGpgPath]) {
      try {
        await fs.promises.rm(file, { force: true });
      } catch (e) {
        throw new PublishError("IOFailure", "RELEASE_FAILED", `Cannot remove stale ${file}: ${errorMessage(e)}`, { cause: e });
      }
    }
  }
}
