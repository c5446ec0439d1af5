import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { Diagnostic } from "../log/diagnostics.js";

export type WrittenFile = {
  path: string;
  /** Bytes this run wrote; for an append, only the appended part. */
  bytes: number;
  /** Hash of the whole file; null for appends to a shared file. */
  sha256: string | null;
};

export type SinkResult = {
  written: WrittenFile[];
  diagnostics: Diagnostic[];
};

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a file. */
export function computeSha256(filePath: string): string {
  return computeSha256FromContent(fs.readFileSync(filePath));
}

export function describeFile(filePath: string): WrittenFile {
  return { path: filePath, bytes: fs.statSync(filePath).size, sha256: computeSha256(filePath) };
}

/** Write (overwrite) a text file, creating its directory, and describe the result. */
export function writeTracked(filePath: string, content: string): WrittenFile {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
  return describeFile(filePath);
}
