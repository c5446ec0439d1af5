import fs from "node:fs";
import path from "node:path";
import { diag, errorMessage, type Diagnostic } from "../log/diagnostics.js";
import { writeTracked, type SinkResult, type WrittenFile } from "./files.js";
import type { BadgePayload } from "../types/metrics.js";

/**
 * Writes one shield JSON file per badge. A badge directory that cannot be
 * created skips badge output for the run with a warning.
 */
export class BadgeWriter {
  constructor(private readonly badgeDir: string) {}

  write(badges: Record<string, BadgePayload>): SinkResult {
    try {
      fs.mkdirSync(this.badgeDir, { recursive: true });
    } catch (err) {
      return {
        written: [],
        diagnostics: [
          diag("warn", "BADGE_DIR_FAILED", `Unable to create badge directory at ${this.badgeDir}: ${errorMessage(err)}`, {
            path: this.badgeDir,
          }),
        ],
      };
    }

    const written: WrittenFile[] = [];
    const diagnostics: Diagnostic[] = [];
    for (const [fileName, payload] of Object.entries(badges)) {
      const target = path.join(this.badgeDir, fileName);
      try {
        written.push(writeTracked(target, JSON.stringify(payload)));
      } catch (err) {
        diagnostics.push(diag("warn", "BADGE_WRITE_FAILED", `Unable to write badge ${target}: ${errorMessage(err)}`, { path: target }));
      }
    }

    diagnostics.push(diag("info", "BADGES_UPDATED", `Updated badge JSON in ${this.badgeDir}`, { path: this.badgeDir }));
    return { written, diagnostics };
  }
}
