#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { checksum, parseAlgorithm } from "./commands/checksum.js";
import { EXIT } from "./commands/exit-codes.js";
import { publish, type PublishCliOptions } from "./commands/publish.js";
import { validateAll } from "./commands/validate.js";
import { verify } from "./commands/verify.js";
import { isPublishError, unexpectedFailure } from "./errors.js";
import { Reporter, type OutputFormat } from "./log/reporter.js";
import type { ChecksumAlgorithm } from "./artifact-writer/checksum.js";

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("expected human or jsonl");
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectAlgorithm(value: string, previous: ChecksumAlgorithm[]): ChecksumAlgorithm[] {
  try {
    return [...previous, parseAlgorithm(value)];
  } catch (e) {
    throw new InvalidArgumentError(isPublishError(e) ? e.message : String(e));
  }
}

const program = new Command();

program
  .name("aptctl")
  .description("Build, index, sign and publish a Debian package into an APT repository")
  .version("0.1.0")
  .enablePositionalOptions()
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .command("publish")
  .description("Run the publish pipeline: build, index, release, sign, install")
  .option("-p, --package <name>", "Package name")
  .option("-v, --version <version>", "Package version")
  .option("-f, --filename <file>", "Package file name (default: <name>-<version>.deb)")
  .option("-d, --dir <path>", "Publish destination directory")
  .option("-o, --output <path>", "Repository output root")
  .option("-t, --templates <path>", "Directory holding the Packages and Release templates")
  .option("-k, --key <id>", "gpg key id used to sign Release")
  .option("-a, --arch <arch>", "Architecture to index (repeatable)", collect, [])
  .option("-n, --no-build", "Skip the package build; the .deb must already exist")
  .option("-N, --no-install", "Skip copying the repository into the destination")
  .option("-s, --skip-copy", "Enter the publish stage but copy nothing")
  .option("-y, --yes", "Publish without asking")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: PublishCliOptions) => {
    const res = await publish(opts);
    process.exit(res.exitCode);
  });

program
  .command("checksum")
  .description("Print MD5Sum, SHA1, SHA256 and SHA512 of files")
  .argument("<files...>", "Files to digest")
  .option("--algorithm <name>", "Only this algorithm (repeatable)", collectAlgorithm, [])
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (files: string[], opts: { algorithm: ChecksumAlgorithm[]; format: OutputFormat }) => {
    const res = await checksum(files, opts.algorithm, new Reporter({ format: opts.format }));
    process.exit(res.ok ? EXIT.SUCCESS : res.exitCode);
  });

program
  .command("verify")
  .description("Verify Release.gpg and InRelease of a generated repository")
  .option("-o, --output <path>", "Repository output root")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { output?: string; config?: string; env?: string; format: OutputFormat }) => {
    const res = await verify(opts, new Reporter({ format: opts.format }));
    process.exit(res.ok ? EXIT.SUCCESS : res.exitCode);
  });

program
  .command("validate")
  .description("Validate config and the templates it needs")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config?: string; env?: string; format: OutputFormat }) => {
    const reporter = new Reporter({ format: opts.format });
    const res = await validateAll({ configDir: opts.config, env: opts.env });

    if (!res.ok) {
      for (const err of res.errors) reporter.emit(err);
      process.exit(EXIT.CONFIG_INVALID);
    }
    reporter.info("OK", "OK");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const failure = unexpectedFailure(err);
  process.stderr.write(failure.line + "\n");
  process.exit(failure.exitCode);
});
