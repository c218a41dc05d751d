import chalk, { Chalk, type ChalkInstance } from "chalk";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type TextSink = { write(chunk: string): unknown };

export type ReporterOptions = {
  format?: OutputFormat;
  /** Force colours on or off; defaults to chalk's terminal detection. */
  color?: boolean;
  stdout?: TextSink;
  stderr?: TextSink;
};

/**
 * Console reporter shared by every stage. Severity alone decides how a
 * message is shown: info in green, warn in orange, error in red on stderr.
 * In jsonl mode every diagnostic is one JSON object on stdout.
 */
export class Reporter {
  readonly format: OutputFormat;
  private readonly palette: ChalkInstance;
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;
  private readonly seen: Diagnostic[] = [];

  constructor(opts: ReporterOptions = {}) {
    this.format = opts.format ?? "human";
    this.palette = opts.color === undefined ? chalk : new Chalk({ level: opts.color ? 2 : 0 });
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
  }

  info(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "info", code, message, details });
  }

  warn(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "warn", code, message, details });
  }

  error(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "error", code, message, details });
  }

  emit(d: Diagnostic): void {
    this.seen.push(d);

    if (this.format === "jsonl") {
      const record = { level: d.level, code: d.code, message: d.message, ...d.details };
      this.stdout.write(JSON.stringify(record) + "\n");
      return;
    }

    switch (d.level) {
      case "info":
        this.stdout.write(this.palette.green(d.message) + "\n");
        break;
      case "warn":
        this.stdout.write(this.palette.ansi256(214)(d.message) + "\n");
        break;
      case "error":
        this.stderr.write(this.palette.red(d.message) + "\n");
        break;
    }
  }

  /** Every diagnostic emitted so far, oldest first. */
  diagnostics(): Diagnostic[] {
    return [...this.seen];
  }

  count(level: Diagnostic["level"]): number {
    return this.seen.filter((d) => d.level === level).length;
  }
}

/** Reporter that records diagnostics without writing anywhere. */
export function silentReporter(): Reporter {
  const sink: TextSink = { write: () => true };
  return new Reporter({ format: "jsonl", stdout: sink, stderr: sink });
}
