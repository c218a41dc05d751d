import path from "node:path";
import { computeFileDigest, requireCompleteDigest } from "../artifact-writer/checksum.js";
import { errorMessage, isPublishError, PublishError, type ErrorKind } from "../errors.js";
import type { CommandRunner } from "../exec/command-runner.js";
import { artifactFromDigest, type Artifact, type FileRecord, type IndexFile } from "../index/bindings.js";
import { PackageIndexBuilder, type PackageIndex } from "../index/packages.js";
import { coveredFiles, ReleaseDescriptorBuilder, type ReleaseDescriptor } from "../index/release.js";
import type { VariableBindings } from "../index/template.js";
import { writeTranslationStub } from "../index/translation.js";
import type { Reporter } from "../log/reporter.js";
import { installRepository, type InstallResult } from "../publish/installer.js";
import { SigningService, type SignatureBundle } from "../signing/signer.js";
import type { AptctlConfig, PublishToggles } from "../types/config.js";
import type { ExitSite } from "../commands/exit-codes.js";
import { RepoLayout } from "./layout.js";
import { isTerminal, nextState, type PublishStage, type PublishState } from "./state-machine.js";
import { ingestArtifact, runBuild } from "./steps/build.js";

export type StageResult = {
  status: "success" | "skipped" | "declined" | "failed";
  duration_ms: number;
  error?: string;
};

export type PublishFailure = {
  kind: ErrorKind;
  site: ExitSite;
  exit_code: number;
  message: string;
};

export type PublishResult = {
  success: boolean;
  final_state: PublishState;
  /** Every state entered, starting with idle. */
  transitions: PublishState[];
  stage_results: Partial<Record<PublishStage, StageResult>>;
  artifact?: Artifact;
  packages?: PackageIndex[];
  translation?: IndexFile;
  release?: ReleaseDescriptor;
  signature?: SignatureBundle;
  install?: InstallResult;
  /** Per-file records gathered so far, keyed by basename or dist-relative path. */
  bindings: VariableBindings;
  error?: PublishFailure;
};

export type CoordinatorDeps = {
  runner: CommandRunner;
  reporter: Reporter;
  /** Ask the operator a yes/no question. */
  confirm: (question: string) => Promise<boolean>;
  now?: () => Date;
};

export const INSTALL_PROMPT = "Do you wish to install the package [y/N]: ";

/** Exit site used when a stage throws something other than a PublishError. */
const FALLBACK_SITE: Record<PublishStage, ExitSite> = {
  building: "BUILD_FAILED",
  index_generating: "INDEX_WRITE_FAILED",
  release_generating: "RELEASE_FAILED",
  signing: "SIGNING_FAILED",
  publishing: "COPY_FAILED",
};

/** Package filename from config: explicit, or `{name}-{version}.deb`. */
export function artifactFilename(config: AptctlConfig): string {
  return config.package.filename ?? `${config.package.name}-${config.package.version}.deb`;
}

/**
 * PublishCoordinator: drives the pipeline through the state machine.
 *
 * Stages run strictly one after another; the first fatal error moves the
 * run to `failed` and nothing after it runs. There is no rollback.
 */
export class PublishCoordinator {
  private readonly layout: RepoLayout;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private files: Record<string, FileRecord> = {};

  constructor(
    private readonly config: AptctlConfig,
    private readonly toggles: PublishToggles,
    private readonly deps: CoordinatorDeps,
  ) {
    this.layout = new RepoLayout(
      path.resolve(config.output_dir),
      config.distribution.codename,
      config.distribution.component,
    );
    this.timeoutMs = config.tools.timeout_seconds * 1000;
    this.now = deps.now ?? (() => new Date());
  }

  getLayout(): RepoLayout {
    return this.layout;
  }

  async run(): Promise<PublishResult> {
    this.files = {};
    const result: PublishResult = {
      success: false,
      final_state: "idle",
      transitions: ["idle"],
      stage_results: {},
      bindings: Object.freeze({ files: Object.freeze({}) }),
    };

    if (!this.toggles.build) result.stage_results.building = { status: "skipped", duration_ms: 0 };
    if (!this.toggles.install) result.stage_results.publishing = { status: "skipped", duration_ms: 0 };

    let state = nextState("idle", "start", this.toggles);
    result.transitions.push(state);

    while (state !== "idle" && !isTerminal(state)) {
      const stage: PublishStage = state;
      const start = Date.now();

      try {
        await this.runStage(stage, result);
        result.stage_results[stage] = { status: "success", duration_ms: Date.now() - start };
        state = nextState(stage, "success", this.toggles);
      } catch (e) {
        state = this.fail(stage, e, start, result);
      }

      // The operator confirms before anything is copied.
      if (state === "publishing") {
        const asked = Date.now();
        try {
          if (!(await this.confirmPublish())) {
            result.stage_results.publishing = { status: "declined", duration_ms: Date.now() - asked };
            state = nextState(stage, "declined", this.toggles);
          }
        } catch (e) {
          result.transitions.push(state);
          state = this.fail("publishing", e, asked, result);
        }
      }

      result.transitions.push(state);
    }

    result.final_state = state;
    result.success = state === "done";
    if (result.success) this.deps.reporter.info("PUBLISH_DONE", "Repository published");
    return result;
  }

  /** Record a stage failure and return the state it leads to. */
  private fail(stage: PublishStage, e: unknown, start: number, result: PublishResult): PublishState {
    const err = isPublishError(e)
      ? e
      : new PublishError("IOFailure", FALLBACK_SITE[stage], errorMessage(e), { cause: e });
    result.stage_results[stage] = { status: "failed", duration_ms: Date.now() - start, error: err.message };
    result.error = { kind: err.kind, site: err.site, exit_code: err.exitCode, message: err.message };
    this.deps.reporter.error(err.site, `Error: ${err.message}`, { kind: err.kind, exit_code: err.exitCode, stage });
    return nextState(stage, "failure", this.toggles);
  }

  private async runStage(stage: PublishStage, result: PublishResult): Promise<void> {
    switch (stage) {
      case "building":
        await this.build();
        return;
      case "index_generating":
        result.artifact = await this.resolveArtifact();
        result.packages = await this.buildPackages(result.artifact);
        result.translation = await writeTranslationStub(this.layout);
        this.addRecords(result, { [result.artifact.filename]: result.artifact });
        return;
      case "release_generating":
        result.release = await this.buildRelease(result);
        this.addRecords(result, result.release.covered);
        return;
      case "signing":
        result.signature = await this.sign(result);
        return;
      case "publishing":
        result.install = await installRepository({
          runner: this.deps.runner,
          source: this.layout.root,
          destination: this.config.publish.destination,
          owner: this.config.publish.owner,
          useSudo: this.config.publish.use_sudo,
          copy: this.toggles.copy,
          timeoutMs: this.timeoutMs,
          reporter: this.deps.reporter,
        });
        return;
    }
  }

  /** Replace the bindings table with a new one holding the extra records. */
  private addRecords(result: PublishResult, records: Record<string, FileRecord>): void {
    const files: Record<string, FileRecord> = { ...this.files };
    for (const [key, r] of Object.entries(records)) {
      files[key] = { checksums: { ...r.checksums }, file_size: r.file_size };
    }
    this.files = files;
    result.bindings = Object.freeze({ files: Object.freeze({ ...files }) });
  }

  private async build(): Promise<void> {
    await runBuild({
      runner: this.deps.runner,
      buildCommand: this.config.tools.build,
      sourceDir: path.resolve(this.config.package.source_dir),
      artifactPath: this.layout.artifactPath(artifactFilename(this.config)),
      timeoutMs: this.timeoutMs,
      reporter: this.deps.reporter,
    });
  }

  private async resolveArtifact(): Promise<Artifact> {
    const artifactPath = this.layout.artifactPath(artifactFilename(this.config));
    if (!this.toggles.build) {
      await ingestArtifact({
        artifactPath,
        source: this.config.package.artifact ? path.resolve(this.config.package.artifact) : undefined,
        reporter: this.deps.reporter,
      });
    }
    const digest = requireCompleteDigest(artifactPath, await computeFileDigest(artifactPath));
    return artifactFromDigest(artifactPath, digest);
  }

  private async buildPackages(artifact: Artifact): Promise<PackageIndex[]> {
    const pkg = this.config.package;
    const builder = new PackageIndexBuilder({
      layout: this.layout,
      architectures: this.config.distribution.architectures,
      artifact,
      metadata: {
        name: pkg.name,
        version: pkg.version,
        maintainer: pkg.maintainer,
        description: pkg.description,
        section: pkg.section,
        priority: pkg.priority,
      },
      mode: this.config.index.packages_mode,
      templatePath: path.join(path.resolve(this.config.templates_dir), "Packages"),
      runner: this.deps.runner,
      scanCommand: this.config.tools.scan,
      timeoutMs: this.timeoutMs,
      reporter: this.deps.reporter,
    });
    return builder.build();
  }

  private async buildRelease(result: PublishResult): Promise<ReleaseDescriptor> {
    if (!result.packages || !result.translation) {
      throw new PublishError("MissingInput", "RELEASE_FAILED", "Index files must be generated before the Release");
    }
    const dist = this.config.distribution;
    const builder = new ReleaseDescriptorBuilder({
      layout: this.layout,
      mode: this.config.index.release_mode,
      templatePath: path.join(path.resolve(this.config.templates_dir), "Release"),
      runner: this.deps.runner,
      releaseCommand: this.config.tools.release,
      timeoutMs: this.timeoutMs,
      reporter: this.deps.reporter,
      info: {
        suite: dist.suite,
        codename: dist.codename,
        origin: dist.origin,
        label: dist.label,
        description: dist.description,
        architectures: dist.architectures,
        components: [dist.component],
        date: this.now(),
      },
    });
    return builder.build(coveredFiles(result.packages, result.translation));
  }

  private async sign(result: PublishResult): Promise<SignatureBundle> {
    if (!result.release) {
      throw new PublishError("MissingInput", "SIGNING_FAILED", "Release must be generated before signing");
    }
    const signer = new SigningService({
      runner: this.deps.runner,
      keyId: this.config.signing.key_id,
      gpg: this.config.tools.gpg,
      homedir: this.config.signing.gpg_homedir,
      timeoutMs: this.timeoutMs,
      reporter: this.deps.reporter,
    });
    return signer.sign(result.release.path, {
      inRelease: this.layout.inReleasePath,
      releaseGpg: this.layout.releaseGpgPath,
    });
  }

  private async confirmPublish(): Promise<boolean> {
    if (this.toggles.autoConfirm) return true;
    try {
      return await this.deps.confirm(INSTALL_PROMPT);
    } catch (e) {
      throw new PublishError("IOFailure", "PROMPT_FAILED", `Cannot read confirmation: ${errorMessage(e)}`, { cause: e });
    }
  }
}
