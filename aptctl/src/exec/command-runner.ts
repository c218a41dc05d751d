import { execFile } from "node:child_process";
import { PublishError } from "../errors.js";
import type { ExitSite } from "../commands/exit-codes.js";

export type CommandOptions = {
  cwd?: string;
  /** Kill the process after this many milliseconds; 0 disables the limit. */
  timeoutMs?: number;
};

export type CommandResult = {
  exit_code: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process never ran to completion. */
  failure?: "not_found" | "timeout";
};

/**
 * The one capability the pipeline needs from the outside world: run a program
 * with an argument list and capture what it printed. Stages never spawn
 * processes themselves, so tests can pass a fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], opts?: CommandOptions): Promise<CommandResult>;
}

const MAX_BUFFER = 50 * 1024 * 1024; // 50MB

/** Runs commands through `execFile`, never through a shell. */
export class ExecFileRunner implements CommandRunner {
  run(command: string, args: string[], opts: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve) => {
      execFile(
        command,
        args,
        { cwd: opts.cwd, timeout: opts.timeoutMs ?? 0, maxBuffer: MAX_BUFFER, shell: false, encoding: "utf8" },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ exit_code: 0, stdout, stderr });
            return;
          }
          const code: unknown = err.code;
          if (code === "ENOENT") {
            resolve({ exit_code: null, stdout, stderr: stderr || err.message, failure: "not_found" });
            return;
          }
          if (err.killed && opts.timeoutMs) {
            resolve({ exit_code: null, stdout, stderr, failure: "timeout" });
            return;
          }
          resolve({ exit_code: typeof code === "number" ? code : null, stdout, stderr: stderr || err.message });
        },
      );
    });
  }
}

/** Render a command line for log messages. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a)).join(" ");
}

/**
 * Turn an unsuccessful result into a fatal error: a program that could not be
 * found is missing input, anything else is a tool failure.
 */
export function expectSuccess(
  result: CommandResult,
  command: string,
  args: string[],
  sites: { missing: ExitSite; failed: ExitSite },
): CommandResult {
  const line = formatCommand(command, args);
  if (result.failure === "not_found") {
    throw new PublishError("MissingInput", sites.missing, `Command not found: ${command}`);
  }
  if (result.failure === "timeout") {
    throw new PublishError("ToolFailure", sites.failed, `Command timed out: ${line}`);
  }
  if (result.exit_code !== 0) {
    const stderr = result.stderr.trim();
    throw new PublishError(
      "ToolFailure",
      sites.failed,
      `Command failed (exit ${result.exit_code ?? "unknown"}): ${line}${stderr ? `\n${stderr}` : ""}`,
    );
  }
  return result;
}
