import fs from "node:fs";
import { diag, errorMessage } from "../log/diagnostics.js";
import type { SinkResult } from "./files.js";

/**
 * Append the Markdown summary to the CI job-summary file, or hand it to
 * `print` when no file is configured. Other steps write to the same file; it
 * is never truncated.
 */
export function writeSummary(markdown: string, summaryPath: string | null, print: (text: string) => void): SinkResult {
  if (summaryPath === null) {
    print(markdown);
    return { written: [], diagnostics: [] };
  }

  try {
    fs.appendFileSync(summaryPath, markdown, "utf8");
    return {
      written: [{ path: summaryPath, bytes: Buffer.byteLength(markdown, "utf8"), sha256: null }],
      diagnostics: [diag("info", "SUMMARY_APPENDED", `Appended QA summary to ${summaryPath}`, { path: summaryPath })],
    };
  } catch (err) {
    print(markdown);
    return {
      written: [],
      diagnostics: [
        diag("warn", "SUMMARY_WRITE_FAILED", `Unable to append summary to ${summaryPath}: ${errorMessage(err)}`, {
          path: summaryPath,
        }),
      ],
    };
  }
}
