import readline from "node:readline/promises";
import { loadConfig, deepMerge, type RawConfig } from "../config/loader.js";
import { requireValidConfig } from "../config/validator.js";
import { PublishCoordinator, type PublishResult } from "../core/orchestrator.js";
import { isPublishError } from "../errors.js";
import { ExecFileRunner, type CommandRunner } from "../exec/command-runner.js";
import { Reporter, type OutputFormat } from "../log/reporter.js";
import type { PublishToggles } from "../types/config.js";
import { EXIT } from "./exit-codes.js";

export type PublishCliOptions = {
  package?: string;
  version?: string;
  filename?: string;
  /** Publish destination. */
  dir?: string;
  output?: string;
  templates?: string;
  key?: string;
  arch?: string[];
  /** commander's `--no-build` / `--no-install` leave these false. */
  build?: boolean;
  install?: boolean;
  skipCopy?: boolean;
  yes?: boolean;
  config?: string;
  env?: string;
  format?: OutputFormat;
};

export type PublishDeps = {
  runner?: CommandRunner;
  reporter?: Reporter;
  confirm?: (question: string) => Promise<boolean>;
  environ?: NodeJS.ProcessEnv;
  now?: () => Date;
};

export type PublishCommandResult = {
  exitCode: number;
  result?: PublishResult;
};

/** Config layer built from command-line flags; only flags that were given. */
export function flagOverrides(opts: PublishCliOptions): RawConfig {
  const pkg: RawConfig = {};
  if (opts.package !== undefined) pkg.name = opts.package;
  if (opts.version !== undefined) pkg.version = opts.version;
  if (opts.filename !== undefined) pkg.filename = opts.filename;

  const layer: RawConfig = {};
  if (Object.keys(pkg).length > 0) layer.package = pkg;
  if (opts.output !== undefined) layer.output_dir = opts.output;
  if (opts.templates !== undefined) layer.templates_dir = opts.templates;
  if (opts.key !== undefined) layer.signing = { key_id: opts.key };
  if (opts.dir !== undefined) layer.publish = { destination: opts.dir };
  if (opts.arch !== undefined && opts.arch.length > 0) layer.distribution = { architectures: opts.arch };
  return layer;
}

export function togglesFrom(opts: PublishCliOptions): PublishToggles {
  return {
    build: opts.build !== false,
    install: opts.install !== false,
    copy: opts.skipCopy !== true,
    autoConfirm: opts.yes === true,
  };
}

/** Ask on the terminal; anything but y/yes is a no. */
export async function promptYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/** `aptctl publish`: build, index, sign and install one package. */
export async function publish(opts: PublishCliOptions, deps: PublishDeps = {}): Promise<PublishCommandResult> {
  const reporter = deps.reporter ?? new Reporter({ format: opts.format });

  let coordinator: PublishCoordinator;
  try {
    const raw = deepMerge(loadConfig(opts.env, opts.config, deps.environ), flagOverrides(opts));
    const config = await requireValidConfig(raw);
    coordinator = new PublishCoordinator(config, togglesFrom(opts), {
      runner: deps.runner ?? new ExecFileRunner(),
      reporter,
      confirm: deps.confirm ?? promptYesNo,
      now: deps.now,
    });
  } catch (e) {
    if (!isPublishError(e)) throw e;
    reporter.error(e.site, `Error: ${e.message}`, { kind: e.kind, exit_code: e.exitCode });
    return { exitCode: e.exitCode };
  }

  const result = await coordinator.run();
  return { exitCode: result.error ? result.error.exit_code : EXIT.SUCCESS, result };
}
