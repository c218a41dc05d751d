import path from "node:path";
import { expectSuccess, formatCommand, type CommandRunner } from "../exec/command-runner.js";
import type { ExitSite } from "../commands/exit-codes.js";
import type { Reporter } from "../log/reporter.js";

export type InstallOptions = {
  runner: CommandRunner;
  /** Output root holding pool/ and dists/. */
  source: string;
  destination: string;
  /** `user:group` handed to chown. */
  owner: string;
  useSudo: boolean;
  /** false: leave the destination untouched. */
  copy: boolean;
  timeoutMs: number;
  reporter: Reporter;
};

export type InstallResult = {
  copied: boolean;
  /** Command lines that ran, in order. */
  commands: string[];
};

/**
 * Copy the repository tree into the served destination and hand it to the
 * serving user. Not transactional: a failure stops at the failing command and
 * leaves whatever was already copied in place.
 */
export async function installRepository(opts: InstallOptions): Promise<InstallResult> {
  const { reporter } = opts;
  if (!opts.copy) {
    reporter.warn("COPY_SKIPPED", `Copy skipped; ${opts.destination} left unchanged`);
    return { copied: false, commands: [] };
  }

  const commands: string[] = [];
  const exec = async (site: ExitSite, command: string, args: string[]): Promise<void> => {
    const [cmd, argv]: [string, string[]] = opts.useSudo ? ["sudo", [command, ...args]] : [command, args];
    commands.push(formatCommand(cmd, argv));
    const res = await opts.runner.run(cmd, argv, { timeoutMs: opts.timeoutMs });
    expectSuccess(res, cmd, argv, { missing: "PUBLISH_TOOL_MISSING", failed: site });
  };

  await exec("COPY_FAILED", "mkdir", ["-p", opts.destination]);
  await exec("COPY_FAILED", "cp", ["-r", `${path.resolve(opts.source)}/.`, opts.destination]);
  reporter.info("REPOSITORY_COPIED", `Repository copied to ${opts.destination}`);

  await exec("CHOWN_FAILED", "chown", ["-R", opts.owner, opts.destination]);
  reporter.info("OWNERSHIP_SET", `Ownership of ${opts.destination} set to ${opts.owner}`);

  return { copied: true, commands };
}
