import type { Diagnostic } from "./diagnostics.js";

export type OutputFormat = "human" | "jsonl";

export type OutputStreams = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const PROCESS_STREAMS: OutputStreams = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

const HUMAN_PREFIX: Record<Diagnostic["level"], string> = {
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]",
};

/**
 * Writes diagnostics either as plain lines or as JSON lines. In human mode
 * errors go to stderr; jsonl writes everything to stdout.
 */
export class Reporter {
  constructor(
    readonly format: OutputFormat = "human",
    private readonly streams: OutputStreams = PROCESS_STREAMS,
  ) {}

  emit(d: Diagnostic): void {
    if (this.format === "jsonl") {
      this.streams.out(JSON.stringify(d));
      return;
    }
    const line = `${HUMAN_PREFIX[d.level]} ${d.message}`;
    if (d.level === "error") this.streams.err(line);
    else this.streams.out(line);
  }

  emitAll(diagnostics: Diagnostic[]): void {
    for (const d of diagnostics) this.emit(d);
  }

  /** Print a block of text (the Markdown summary when no summary file is set). */
  text(code: string, body: string): void {
    if (this.format === "jsonl") {
      this.streams.out(JSON.stringify({ level: "info", code, message: body }));
    } else {
      this.streams.out(body);
    }
  }
}

export function parseFormat(raw: string): OutputFormat | null {
  return raw === "human" || raw === "jsonl" ? raw : null;
}
