import { createHash } from "node:crypto";
import fs from "node:fs";
import { errnoCode, errorMessage, PublishError } from "../errors.js";

/** Checksum fields used by APT index files, in the order they are written. */
export const CHECKSUM_ALGORITHMS = ["MD5Sum", "SHA1", "SHA256", "SHA512"] as const;

export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

const HASH_NAMES: Record<ChecksumAlgorithm, string> = {
  MD5Sum: "md5",
  SHA1: "sha1",
  SHA256: "sha256",
  SHA512: "sha512",
};

/** Digest length in bytes per algorithm. */
export const DIGEST_BYTES: Record<ChecksumAlgorithm, number> = {
  MD5Sum: 16,
  SHA1: 20,
  SHA256: 32,
  SHA512: 64,
};

/** Files are hashed in blocks of this size. */
export const CHUNK_SIZE = 8192;

export type DigestSet = Partial<Record<ChecksumAlgorithm, string>>;

export type ChecksumErrorCode = "FileNotFound" | "UnknownAlgorithm" | "IOFailure";

export class ChecksumError extends Error {
  constructor(
    readonly code: ChecksumErrorCode,
    readonly file: string,
    readonly algorithm: string,
    message: string,
  ) {
    super(message);
    this.name = "ChecksumError";
  }
}

export type FileDigest = {
  checksums: DigestSet;
  file_size: number;
  /**
   * One entry per algorithm missing from `checksums`; a file that cannot be
   * read at all gives a single entry with algorithm `*` and an empty set.
   */
  errors: ChecksumError[];
};

const ALGORITHM_NAMES: readonly string[] = CHECKSUM_ALGORITHMS;

export function isChecksumAlgorithm(name: string): name is ChecksumAlgorithm {
  return ALGORITHM_NAMES.includes(name);
}

/** Stream a file through one hash algorithm and return the hex digest. */
export function computeDigest(filePath: string, algorithm: string): Promise<string> {
  if (!isChecksumAlgorithm(algorithm)) {
    return Promise.reject(
      new ChecksumError("UnknownAlgorithm", filePath, algorithm, `Unknown checksum type '${algorithm}'`),
    );
  }

  return new Promise((resolve, reject) => {
    const hash = createHash(HASH_NAMES[algorithm]);
    const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE });

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) => {
      const code: ChecksumErrorCode = errnoCode(err) === "ENOENT" ? "FileNotFound" : "IOFailure";
      const message =
        code === "FileNotFound"
          ? `File '${filePath}' not found`
          : `Failed to compute ${algorithm} for ${filePath}: ${errorMessage(err)}`;
      reject(new ChecksumError(code, filePath, algorithm, message));
    });
  });
}

/**
 * Size and digests of one file. A failing algorithm is recorded in `errors`
 * and the remaining algorithms are still computed.
 */
export async function computeFileDigest(
  filePath: string,
  algorithms: readonly string[] = CHECKSUM_ALGORITHMS,
): Promise<FileDigest> {
  let file_size: number;
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) {
      const err = new ChecksumError("FileNotFound", filePath, "*", `File '${filePath}' not found`);
      return { checksums: {}, file_size: 0, errors: [err] };
    }
    file_size = stat.size;
  } catch (e) {
    const code: ChecksumErrorCode = errnoCode(e) === "ENOENT" ? "FileNotFound" : "IOFailure";
    const message = code === "FileNotFound" ? `File '${filePath}' not found` : `Cannot get file size of ${filePath}: ${errorMessage(e)}`;
    return { checksums: {}, file_size: 0, errors: [new ChecksumError(code, filePath, "*", message)] };
  }

  const checksums: DigestSet = {};
  const errors: ChecksumError[] = [];

  for (const algorithm of algorithms) {
    try {
      const hex = await computeDigest(filePath, algorithm);
      if (isChecksumAlgorithm(algorithm)) checksums[algorithm] = hex;
    } catch (e) {
      errors.push(
        e instanceof ChecksumError ? e : new ChecksumError("IOFailure", filePath, algorithm, errorMessage(e)),
      );
    }
  }

  return { checksums, file_size, errors };
}

/**
 * Digest several files. Files are hashed concurrently; the algorithms of one
 * file run one after another.
 */
export async function computeFileDigests(
  files: string[],
  algorithms: readonly string[] = CHECKSUM_ALGORITHMS,
): Promise<Map<string, FileDigest>> {
  const digests = await Promise.all(files.map((f) => computeFileDigest(f, algorithms)));
  return new Map(files.map((f, i) => [f, digests[i]]));
}

/**
 * Stages that write every checksum field cannot continue with a short set.
 */
export function requireCompleteDigest(filePath: string, digest: FileDigest): FileDigest {
  if (digest.errors.length === 0) return digest;

  const first = digest.errors[0];
  const detail = digest.errors.map((e) => e.message).join("; ");
  throw new PublishError(
    first.code === "FileNotFound" ? "MissingInput" : "IOFailure",
    "CHECKSUM_FAILED",
    `Checksums incomplete for ${filePath}: ${detail}`,
    { cause: first },
  );
}

/** SHA256 of an in-memory buffer or string. */
export function sha256OfContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}
