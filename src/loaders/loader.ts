import fs from "node:fs";
import { errorMessage } from "../log/diagnostics.js";
import type { AbsentReason, Presence, ReportKind } from "../types/reports.js";

/** Raised by parsers for input that exists but cannot be understood. */
export class MalformedReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedReportError";
  }
}

/**
 * One loader per report kind. `load` never throws: a missing or unreadable
 * artifact comes back as `absent`.
 */
export interface ReportLoader<T> {
  readonly kind: ReportKind;
  load(): Presence<T>;
}

export function present<T>(data: T, source: string[]): Presence<T> {
  return { state: "present", data, source };
}

export function absent<T>(reason: AbsentReason, source: string[], error?: string): Presence<T> {
  return error === undefined ? { state: "absent", reason, source } : { state: "absent", reason, source, error };
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Read one report file and hand its text to `parse`.
 * `parse` returns null when the document is readable but lacks the data.
 */
export function loadReportFile<T>(filePath: string, parse: (content: string) => T | null): Presence<T> {
  if (!isFile(filePath)) return absent("missing", [filePath]);

  try {
    const content = fs.readFileSync(filePath, "utf8");
    const data = parse(content);
    return data === null ? absent("empty", [filePath]) : present(data, [filePath]);
  } catch (err) {
    return absent("malformed", [filePath], errorMessage(err));
  }
}
