import fs from "node:fs";
import path from "node:path";
import { gzipFile } from "../artifact-writer/compress.js";
import { errorMessage, PublishError } from "../errors.js";
import type { RepoLayout } from "../core/layout.js";
import type { IndexFile } from "./bindings.js";

/**
 * Write the empty `i18n/Translation-en` stub and its `.gz`. Clients look for
 * the file even when no package carries translated descriptions.
 */
export async function writeTranslationStub(layout: RepoLayout): Promise<IndexFile> {
  const target = layout.translationPath;
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, "");
  } catch (e) {
    throw new PublishError("IOFailure", "TRANSLATION_FAILED", `Cannot write ${target}: ${errorMessage(e)}`, { cause: e });
  }
  const compressed = await gzipFile(target, `${target}.gz`, "TRANSLATION_FAILED");
  return { path: target, relative_path: layout.translationRelative, compressed };
}
