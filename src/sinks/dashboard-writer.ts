import fs from "node:fs";
import path from "node:path";
import { diag, errorMessage, type Diagnostic } from "../log/diagnostics.js";
import { describeFile, writeTracked, type SinkResult, type WrittenFile } from "./files.js";
import type { MetricsEnvelope } from "../types/metrics.js";

export const METRICS_FILE = "metrics.json";

export type DashboardPaths = {
  /** Directory the dashboard is served from; metrics.json lands here. */
  outputDir: string;
  /** Prebuilt dashboard UI, copied in when present. */
  bundleDir: string;
  /** Helper script copied to `helperTarget` when present. */
  helperScript: string;
  helperTarget: string;
};

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Dashboard output. When a bundle is available the output directory is
 * cleared and repopulated before metrics.json is written.
 */
export class DashboardWriter {
  constructor(private readonly paths: DashboardPaths) {}

  write(envelope: MetricsEnvelope): SinkResult {
    const { outputDir, bundleDir, helperScript, helperTarget } = this.paths;
    const written: WrittenFile[] = [];
    const diagnostics: Diagnostic[] = [];

    try {
      if (isDirectory(bundleDir)) {
        fs.rmSync(outputDir, { recursive: true, force: true });
        fs.cpSync(bundleDir, outputDir, { recursive: true });
        diagnostics.push(diag("info", "DASHBOARD_BUNDLE_COPIED", `Copied dashboard bundle from ${bundleDir}`, { path: outputDir }));
      } else {
        fs.mkdirSync(outputDir, { recursive: true });
      }
    } catch (err) {
      diagnostics.push(
        diag("warn", "DASHBOARD_PREPARE_FAILED", `Unable to prepare dashboard directory ${outputDir}: ${errorMessage(err)}`, {
          path: outputDir,
        }),
      );
    }

    const metricsPath = path.join(outputDir, METRICS_FILE);
    try {
      written.push(writeTracked(metricsPath, JSON.stringify(envelope, null, 2)));
      diagnostics.push(diag("info", "METRICS_WRITTEN", `Wrote dashboard metrics to ${metricsPath}`, { path: metricsPath }));
    } catch (err) {
      diagnostics.push(
        diag("warn", "METRICS_WRITE_FAILED", `Unable to write ${metricsPath}: ${errorMessage(err)}`, { path: metricsPath }),
      );
    }

    if (fs.existsSync(helperScript)) {
      try {
        fs.mkdirSync(path.dirname(helperTarget), { recursive: true });
        fs.copyFileSync(helperScript, helperTarget);
        written.push(describeFile(helperTarget));
      } catch (err) {
        diagnostics.push(
          diag("warn", "HELPER_COPY_FAILED", `Unable to copy ${helperScript}: ${errorMessage(err)}`, { path: helperTarget }),
        );
      }
    }

    return { written, diagnostics };
  }

  getMetricsPath(): string {
    return path.join(this.paths.outputDir, METRICS_FILE);
  }
}
