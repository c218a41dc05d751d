import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import zlib from "node:zlib";
import { errorMessage, PublishError } from "../errors.js";
import type { ExitSite } from "../commands/exit-codes.js";

/**
 * Gzip `source` into `target` (by default the `.gz` sibling). Returns the
 * path written.
 */
export async function gzipFile(
  source: string,
  target = `${source}.gz`,
  site: ExitSite = "COMPRESS_FAILED",
): Promise<string> {
  try {
    await pipeline(
      fs.createReadStream(source),
      zlib.createGzip({ level: zlib.constants.Z_BEST_COMPRESSION }),
      fs.createWriteStream(target),
    );
  } catch (e) {
    throw new PublishError("IOFailure", site, `Failed to compress ${source}: ${errorMessage(e)}`, { cause: e });
  }
  return target;
}

/** Decompressed bytes of a gzip file. */
export async function gunzipFile(source: string): Promise<Buffer> {
  const compressed = await fs.promises.readFile(source);
  return zlib.gunzipSync(compressed);
}
