import {
  CHECKSUM_ALGORITHMS,
  computeFileDigests,
  type ChecksumAlgorithm,
} from "../artifact-writer/checksum.js";
import { PublishError } from "../errors.js";
import type { Reporter } from "../log/reporter.js";
import { EXIT } from "./exit-codes.js";

export type ChecksumLine = {
  file: string;
  algorithm: ChecksumAlgorithm;
  digest: string;
  file_size: number;
};

export type ChecksumCommandResult =
  | { ok: true; lines: ChecksumLine[] }
  | { ok: false; exitCode: number; lines: ChecksumLine[]; errors: string[] };

/** Algorithm names as typed on the command line: `sha256`, `md5` or `MD5Sum`. */
export function parseAlgorithm(name: string): ChecksumAlgorithm {
  const wanted = name.toLowerCase().replace(/sum$/, "");
  const found = CHECKSUM_ALGORITHMS.find((a) => a.toLowerCase().replace(/sum$/, "") === wanted);
  if (found) return found;
  throw new PublishError(
    "ConfigurationError",
    "INVALID_ARGS",
    `Unknown algorithm '${name}' (expected one of ${CHECKSUM_ALGORITHMS.join(", ")})`,
  );
}

/** `aptctl checksum`: print digests of arbitrary files. */
export async function checksum(
  files: string[],
  algorithms: ChecksumAlgorithm[],
  reporter: Reporter,
): Promise<ChecksumCommandResult> {
  const wanted = algorithms.length > 0 ? algorithms : [...CHECKSUM_ALGORITHMS];
  const digests = await computeFileDigests(files, wanted);

  const lines: ChecksumLine[] = [];
  const errors: string[] = [];
  for (const file of files) {
    const digest = digests.get(file);
    if (!digest) continue;
    for (const algorithm of wanted) {
      const hex = digest.checksums[algorithm];
      if (hex === undefined) continue;
      lines.push({ file, algorithm, digest: hex, file_size: digest.file_size });
      reporter.info("CHECKSUM", `${algorithm.padEnd(7)} ${hex}  ${file}`, {
        file,
        algorithm,
        digest: hex,
        file_size: digest.file_size,
      });
    }
    for (const err of digest.errors) {
      errors.push(err.message);
      reporter.error(err.code, err.message, { file, algorithm: err.algorithm });
    }
  }

  if (errors.length > 0) return { ok: false, exitCode: EXIT.CHECKSUM_FAILED, lines, errors };
  return { ok: true, lines };
}
