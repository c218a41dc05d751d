import fs from "node:fs";
import path from "node:path";
import { sha256OfContent } from "../artifact-writer/checksum.js";
import { errorMessage, PublishError } from "../errors.js";
import { expectSuccess, formatCommand, type CommandRunner } from "../exec/command-runner.js";
import type { ExitSite } from "../commands/exit-codes.js";
import type { Reporter } from "../log/reporter.js";

/** Detached and clearsigned signatures over one Release file. */
export type SignatureBundle = {
  release: string;
  in_release: string;
  release_gpg: string;
  /** SHA256 of the Release bytes that were signed. */
  release_sha256: string;
};

export type VerifyResult = { ok: true } | { ok: false; problems: string[] };

export type SigningOptions = {
  runner: CommandRunner;
  keyId: string;
  gpg?: string;
  homedir?: string;
  timeoutMs?: number;
  reporter?: Reporter;
};

const SIGNED_MESSAGE = "-----BEGIN PGP SIGNED MESSAGE-----";
const SIGNATURE_START = "-----BEGIN PGP SIGNATURE-----";

/**
 * Text protected by a clearsigned message, with dash-escaping undone. Returns
 * null when the input is not a clearsigned message.
 */
export function extractClearsignedText(message: string): string | null {
  const lines = message.split("\n").map((l) => l.replace(/\r$/, ""));
  const start = lines.indexOf(SIGNED_MESSAGE);
  if (start === -1) return null;

  // Armor headers ("Hash: SHA512") end at the first empty line.
  let i = start + 1;
  while (i < lines.length && lines[i] !== "") i++;
  if (i >= lines.length) return null;
  i++;

  const body: string[] = [];
  for (; i < lines.length; i++) {
    if (lines[i] === SIGNATURE_START) {
      return body.length === 0 ? "" : body.join("\n") + "\n";
    }
    body.push(lines[i].startsWith("- ") ? lines[i].slice(2) : lines[i]);
  }
  return null;
}

/**
 * Signs Release files through gpg. The key id is checked before anything is
 * spawned; a failing gpg run is fatal and never retried.
 */
export class SigningService {
  private readonly gpg: string;

  constructor(private readonly opts: SigningOptions) {
    this.gpg = opts.gpg ?? "gpg";
  }

  /** Arguments shared by every gpg call. */
  private baseArgs(): string[] {
    const args = ["--batch", "--yes"];
    if (this.opts.homedir) args.push("--homedir", this.opts.homedir);
    return args;
  }

  private signArgs(): string[] {
    return [...this.baseArgs(), "--local-user", this.opts.keyId.trim()];
  }

  clearsignArgs(release: string, inRelease: string): string[] {
    return [...this.signArgs(), "--clearsign", "--output", inRelease, release];
  }

  detachSignArgs(release: string, releaseGpg: string): string[] {
    return [...this.signArgs(), "--armor", "--detach-sign", "--output", releaseGpg, release];
  }

  /**
   * Produce `InRelease` and `Release.gpg` beside `release` (or at the given
   * paths) from its current on-disk bytes.
   */
  async sign(release: string, outputs?: { inRelease?: string; releaseGpg?: string }): Promise<SignatureBundle> {
    if (this.opts.keyId.trim().length === 0) {
      throw new PublishError(
        "ConfigurationError",
        "SIGNING_KEY_MISSING",
        "No signing key configured (signing.key_id / --key); an unsigned repository is not installable",
      );
    }

    const dir = path.dirname(release);
    const inRelease = outputs?.inRelease ?? path.join(dir, "InRelease");
    const releaseGpg = outputs?.releaseGpg ?? path.join(dir, "Release.gpg");

    const before = await this.digestRelease(release);

    await this.runGpg(this.clearsignArgs(release, inRelease));
    await this.runGpg(this.detachSignArgs(release, releaseGpg));

    const after = await this.digestRelease(release);
    if (after !== before) {
      throw new PublishError("ToolFailure", "SIGNING_FAILED", `${release} changed while it was being signed`);
    }

    this.opts.reporter?.info("RELEASE_SIGNED", `Signed ${release} with key ${this.opts.keyId.trim()}`);
    return { release, in_release: inRelease, release_gpg: releaseGpg, release_sha256: before };
  }

  /**
   * Check both signatures against the Release file as it is now on disk and
   * that the clearsigned text is the same Release.
   */
  async verify(bundle: SignatureBundle): Promise<VerifyResult> {
    const problems: string[] = [];

    const release = await this.readFile(bundle.release, "VERIFY_FAILED");
    if (sha256OfContent(release) !== bundle.release_sha256) {
      problems.push(`${bundle.release} changed after signing`);
    }

    const detachedArgs = [...this.baseArgs(), "--verify", bundle.release_gpg, bundle.release];
    if (!(await this.verifyCall(detachedArgs))) {
      problems.push(`detached signature ${bundle.release_gpg} does not verify`);
    }

    const inlineArgs = [...this.baseArgs(), "--verify", bundle.in_release];
    if (!(await this.verifyCall(inlineArgs))) {
      problems.push(`clearsigned ${bundle.in_release} does not verify`);
    }

    const embedded = extractClearsignedText((await this.readFile(bundle.in_release, "VERIFY_FAILED")).toString("utf8"));
    if (embedded === null) {
      problems.push(`${bundle.in_release} is not a clearsigned message`);
    } else if (embedded !== release.toString("utf8")) {
      problems.push(`${bundle.in_release} does not contain the current ${bundle.release}`);
    }

    return problems.length === 0 ? { ok: true } : { ok: false, problems };
  }

  private async runGpg(args: string[]): Promise<void> {
    const res = await this.opts.runner.run(this.gpg, args, { timeoutMs: this.opts.timeoutMs });
    expectSuccess(res, this.gpg, args, { missing: "SIGNING_TOOL_MISSING", failed: "SIGNING_FAILED" });
  }

  private async verifyCall(args: string[]): Promise<boolean> {
    const res = await this.opts.runner.run(this.gpg, args, { timeoutMs: this.opts.timeoutMs });
    if (res.failure === "not_found") {
      throw new PublishError("MissingInput", "SIGNING_TOOL_MISSING", `Command not found: ${this.gpg}`);
    }
    if (res.exit_code !== 0) {
      this.opts.reporter?.warn("VERIFY_FAILED", `${formatCommand(this.gpg, args)}: ${res.stderr.trim()}`);
      return false;
    }
    return true;
  }

  private async digestRelease(release: string): Promise<string> {
    return sha256OfContent(await this.readFile(release, "SIGNING_FAILED"));
  }

  private async readFile(file: string, site: ExitSite): Promise<Buffer> {
    try {
      return await fs.promises.readFile(file);
    } catch (e) {
      throw new PublishError("MissingInput", site, `Cannot read ${file}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
