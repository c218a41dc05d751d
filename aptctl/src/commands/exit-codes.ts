/**
 * CLI exit codes. Every fatal error site owns one code, assigned here once in
 * pipeline order, so a failure is identifiable from `$?` alone.
 */
export const EXIT = {
  SUCCESS: 0,
  INVALID_ARGS: 1,
  CONFIG_INVALID: 2,
  ARTIFACT_REMOVE_FAILED: 3,
  BUILD_TOOL_MISSING: 4,
  BUILD_FAILED: 5,
  ARTIFACT_MISSING: 6,
  ARTIFACT_INGEST_FAILED: 7,
  CHECKSUM_FAILED: 8,
  TEMPLATE_NOT_FOUND: 9,
  INDEX_WRITE_FAILED: 10,
  SCAN_TOOL_MISSING: 11,
  SCAN_FAILED: 12,
  SCAN_EMPTY: 13,
  COMPRESS_FAILED: 14,
  TRANSLATION_FAILED: 15,
  RELEASE_TOOL_MISSING: 16,
  RELEASE_FAILED: 17,
  RELEASE_SCAN_EMPTY: 18,
  RELEASE_INCOMPLETE: 19,
  SIGNING_KEY_MISSING: 20,
  SIGNING_TOOL_MISSING: 21,
  SIGNING_FAILED: 22,
  VERIFY_FAILED: 23,
  PUBLISH_TOOL_MISSING: 24,
  COPY_FAILED: 25,
  CHOWN_FAILED: 26,
  PROMPT_FAILED: 27,
  /** Anything no stage classified; kept apart from INVALID_ARGS. */
  UNEXPECTED_ERROR: 28,
} as const;

export type ExitSite = Exclude<keyof typeof EXIT, "SUCCESS">;
