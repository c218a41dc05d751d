import path from "node:path";
import type { DigestSet, FileDigest } from "../artifact-writer/checksum.js";
import type { Reporter } from "../log/reporter.js";
import type { RenderFailure } from "./template.js";

/** A generated index file and, when compressed, its `.gz` sibling. */
export type IndexFile = {
  path: string;
  /** Path relative to the dist directory, as listed in Release. */
  relative_path: string;
  template?: string;
  compressed?: string;
};

/** Per-file binding record: `files["Packages.gz"].checksums.SHA256`. */
export type FileRecord = {
  checksums: DigestSet;
  file_size: number;
};

/** The built or ingested package, with its digests. */
export type Artifact = {
  path: string;
  filename: string;
  checksums: DigestSet;
  file_size: number;
};

export function fileRecord(digest: FileDigest): FileRecord {
  return { checksums: { ...digest.checksums }, file_size: digest.file_size };
}

export function artifactFromDigest(artifactPath: string, digest: FileDigest): Artifact {
  return {
    path: artifactPath,
    filename: path.basename(artifactPath),
    checksums: { ...digest.checksums },
    file_size: digest.file_size,
  };
}

/** Report skipped template lines as warnings with a one-line summary. */
export function reportRenderFailures(reporter: Reporter, output: string, failures: RenderFailure[]): void {
  if (failures.length === 0) return;
  for (const f of failures) {
    reporter.warn("RENDER_LINE_SKIPPED", `Error processing line ${f.line_number}: ${f.line} -> ${f.reason}`, {
      output,
      line_number: f.line_number,
    });
  }
  reporter.warn("RENDER_PARTIAL", `${failures.length} template line(s) skipped while writing ${output}`, {
    output,
    skipped: failures.length,
  });
}
