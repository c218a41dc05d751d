import fs from "node:fs";
import path from "node:path";
import { errnoCode, errorMessage, PublishError } from "../errors.js";

export type BindingScalar = string | number | Date;
export type BindingValue = BindingScalar | BindingRecord | readonly BindingValue[];
export type BindingRecord = { readonly [key: string]: BindingValue | undefined };

/** Render-time input. Renderers only read it. */
export type VariableBindings = BindingRecord;

export type RenderFailure = {
  line_number: number;
  line: string;
  reason: string;
};

export type RenderResult = {
  lines: string[];
  failures: RenderFailure[];
};

type LineOutcome = { ok: true; text: string } | { ok: false; reason: string };

const IDENT = /^[A-Za-z_][A-Za-z0-9_-]*/;

/**
 * Parse a placeholder path: `release.date`, `files["Packages.gz"].file_size`,
 * `release.architectures[0]`. Returns the key segments.
 */
export function parsePath(expr: string): string[] {
  const src = expr.trim();
  const segments: string[] = [];
  let i = 0;

  const head = IDENT.exec(src);
  if (!head) throw new Error(`invalid path '${src}'`);
  segments.push(head[0]);
  i = head[0].length;

  while (i < src.length) {
    const ch = src[i];
    if (ch === ".") {
      const m = IDENT.exec(src.slice(i + 1));
      if (!m) throw new Error(`invalid path '${src}'`);
      segments.push(m[0]);
      i += 1 + m[0].length;
    } else if (ch === "[") {
      const close = readBracket(src, i);
      segments.push(close.key);
      i = close.end;
    } else {
      throw new Error(`unexpected '${ch}' in path '${src}'`);
    }
  }

  return segments;
}

function readBracket(src: string, start: number): { key: string; end: number } {
  const quote = src[start + 1];
  if (quote === '"' || quote === "'") {
    let key = "";
    let i = start + 2;
    while (i < src.length && src[i] !== quote) {
      if (src[i] === "\\" && i + 1 < src.length) i++;
      key += src[i];
      i++;
    }
    if (src[i] !== quote || src[i + 1] !== "]") throw new Error(`unterminated key in path '${src}'`);
    return { key, end: i + 2 };
  }

  const m = /^\[(\d+)\]/.exec(src.slice(start));
  if (!m) throw new Error(`invalid index in path '${src}'`);
  return { key: m[1], end: start + m[0].length };
}

/** RFC 2822 date in UTC, as APT expects in Release files. */
export function formatReleaseDate(date: Date): string {
  return date.toUTCString().replace(/GMT$/, "UTC");
}

function isScalar(value: BindingValue): value is BindingScalar {
  return typeof value === "string" || typeof value === "number" || value instanceof Date;
}

function isList(value: BindingValue): value is readonly BindingValue[] {
  return Array.isArray(value);
}

function lookup(bindings: VariableBindings, segments: string[]): BindingValue | undefined {
  let current: BindingValue | undefined = bindings;
  for (const key of segments) {
    if (current === undefined || isScalar(current)) return undefined;
    if (isList(current)) {
      current = /^\d+$/.test(key) ? current[Number(key)] : undefined;
    } else if (Object.prototype.hasOwnProperty.call(current, key)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

function renderScalar(value: BindingScalar): string {
  if (value instanceof Date) return formatReleaseDate(value);
  return String(value);
}

/** Substitute every `{{ path }}` of one line. */
export function renderLine(line: string, bindings: VariableBindings): LineOutcome {
  let out = "";
  let i = 0;

  while (i < line.length) {
    const open = line.indexOf("{{", i);
    if (open === -1) {
      out += line.slice(i);
      break;
    }
    const close = line.indexOf("}}", open + 2);
    if (close === -1) return { ok: false, reason: "unterminated '{{'" };

    out += line.slice(i, open);
    const expr = line.slice(open + 2, close);

    let segments: string[];
    try {
      segments = parsePath(expr);
    } catch (e) {
      return { ok: false, reason: errorMessage(e) };
    }

    const value = lookup(bindings, segments);
    if (value === undefined) return { ok: false, reason: `undefined binding '${expr.trim()}'` };
    if (!isScalar(value)) return { ok: false, reason: `binding '${expr.trim()}' is not a scalar` };

    out += renderScalar(value);
    i = close + 2;
  }

  return { ok: true, text: out };
}

/**
 * Render template text line by line. A line that fails to render is dropped
 * and recorded; the other lines are still rendered, in order.
 */
export function renderTemplate(text: string, bindings: VariableBindings): RenderResult {
  const raw = text.split("\n");
  if (raw.length > 0 && raw[raw.length - 1] === "") raw.pop();

  const lines: string[] = [];
  const failures: RenderFailure[] = [];

  raw.forEach((rawLine, idx) => {
    const line = rawLine.trimEnd();
    const res = renderLine(line, bindings);
    if (res.ok) {
      lines.push(res.text);
    } else {
      failures.push({ line_number: idx + 1, line, reason: res.reason });
    }
  });

  return { lines, failures };
}

/** Join rendered lines into file content. */
export function toFileContent(lines: string[]): string {
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
}

/** Read a template file; a missing template is fatal. */
export async function readTemplate(templatePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(templatePath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new PublishError("MissingInput", "TEMPLATE_NOT_FOUND", `Template file '${templatePath}' not found`);
    }
    throw new PublishError("IOFailure", "TEMPLATE_NOT_FOUND", `Cannot read template ${templatePath}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
}

/**
 * Render a template file into `outputPath`. A missing template fails the
 * whole render; failing lines only shorten the output.
 */
export async function renderTemplateFile(
  templatePath: string,
  outputPath: string,
  bindings: VariableBindings,
): Promise<RenderResult> {
  const result = renderTemplate(await readTemplate(templatePath), bindings);

  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, toFileContent(result.lines), "utf8");
  } catch (e) {
    throw new PublishError("IOFailure", "INDEX_WRITE_FAILED", `Cannot write ${outputPath}: ${errorMessage(e)}`, {
      cause: e,
    });
  }

  return result;
}
