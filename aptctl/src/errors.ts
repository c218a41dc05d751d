import { EXIT, type ExitSite } from "./commands/exit-codes.js";

/**
 * Fatal error kinds. Partial render failures are not in this list: they are
 * reported as warnings and never thrown.
 */
export type ErrorKind = "MissingInput" | "ToolFailure" | "ConfigurationError" | "IOFailure";

export class PublishError extends Error {
  readonly kind: ErrorKind;
  readonly site: ExitSite;

  constructor(kind: ErrorKind, site: ExitSite, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
    this.kind = kind;
    this.site = site;
  }

  get exitCode(): number {
    return EXIT[this.site];
  }
}

export function isPublishError(e: unknown): e is PublishError {
  return e instanceof PublishError;
}

/** Message of any thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Exit code and stderr line for an error that reached the CLI unclassified. */
export function unexpectedFailure(e: unknown): { exitCode: number; line: string } {
  if (isPublishError(e)) {
    return { exitCode: e.exitCode, line: JSON.stringify({ ok: false, code: e.site, error: e.message }) };
  }
  return {
    exitCode: EXIT.UNEXPECTED_ERROR,
    line: JSON.stringify({ ok: false, code: "UNEXPECTED_ERROR", error: errorMessage(e) }),
  };
}

/** Node's errno code of a thrown value, if it carries one. */
export function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) {
    return typeof e.code === "string" ? e.code : undefined;
  }
  return undefined;
}
