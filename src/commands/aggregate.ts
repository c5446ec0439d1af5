import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { resolveRunEnvironment } from "../config/environment.js";
import { validateConfig } from "../config/validator.js";
import { createLoaders, loadReports, type LoaderSet } from "../loaders/index.js";
import { diag, errorMessage, type Diagnostic } from "../log/diagnostics.js";
import { normalizeReports, type NormalizeResult } from "../normalize/normalizer.js";
import { buildBadges } from "../report/badges.js";
import { buildEnvelope, buildRunMetadata } from "../report/envelope.js";
import { buildSummaryRows, renderSummary, summaryTitle } from "../report/summary.js";
import { BadgeWriter } from "../sinks/badge-writer.js";
import { DashboardWriter } from "../sinks/dashboard-writer.js";
import { writeSummary } from "../sinks/summary-sink.js";
import type { WrittenFile } from "../sinks/files.js";
import type { QaConfig, RunEnvironment } from "../types/config.js";
import type { MetricsEnvelope } from "../types/metrics.js";
import { REPORT_KINDS, type RawReports } from "../types/reports.js";

export type AggregateInput = {
  rootDir: string;
  config: QaConfig;
  env: RunEnvironment;
  /** Receives the Markdown summary when no summary file is configured. */
  print: (text: string) => void;
  now?: () => Date;
  /** Defaults to the loaders built from `config`. */
  loaders?: LoaderSet;
};

export type AggregateResult = {
  reports: RawReports;
  normalized: NormalizeResult;
  envelope: MetricsEnvelope;
  summary: string;
  written: WrittenFile[];
  diagnostics: Diagnostic[];
};

const ABSENT_CODES = {
  missing: "REPORT_MISSING",
  malformed: "REPORT_MALFORMED",
  empty: "REPORT_EMPTY",
} as const;

function reportDiagnostics(reports: RawReports): Diagnostic[] {
  return REPORT_KINDS.map((kind) => {
    const r = reports[kind];
    const where = r.source.join(", ");
    if (r.state === "present") {
      return diag("info", "REPORT_LOADED", `${kind}: loaded ${where}`, { details: { kind, source: r.source } });
    }
    const suffix = r.error ? ` (${r.error})` : "";
    return diag("info", ABSENT_CODES[r.reason], `${kind}: ${r.reason} at ${where}${suffix}`, {
      details: { kind, source: r.source },
    });
  });
}

function summaryFooter(config: QaConfig): string[] {
  return [
    `Interactive dashboard: \`${config.dashboard.output_dir}/index.html\`.`,
    `Artifacts: \`${config.target_dir}/\`.`,
  ];
}

/**
 * The aggregation pipeline: load → normalize → render → write.
 * Completes for any combination of present, missing and malformed reports.
 */
export function aggregate(input: AggregateInput): AggregateResult {
  const { rootDir, config, env } = input;
  const now = input.now ?? (() => new Date());
  const diagnostics: Diagnostic[] = [];
  const written: WrittenFile[] = [];

  const reports = loadReports(input.loaders ?? createLoaders(config, rootDir));
  diagnostics.push(...reportDiagnostics(reports));

  const normalized = normalizeReports(reports);
  const envelope = buildEnvelope(normalized.metrics, buildRunMetadata(env, now()));

  const summary = renderSummary(
    summaryTitle(env.matrixOs, config.runtime_label, env.matrixRuntime),
    buildSummaryRows(reports),
    summaryFooter(config),
  );
  const summaryOut = writeSummary(summary, env.summaryPath, input.print);
  written.push(...summaryOut.written);
  diagnostics.push(...summaryOut.diagnostics);

  const dashboard = new DashboardWriter({
    outputDir: path.resolve(rootDir, config.dashboard.output_dir),
    bundleDir: path.resolve(rootDir, config.dashboard.bundle_dir),
    helperScript: path.resolve(rootDir, config.dashboard.helper_script),
    helperTarget: path.resolve(rootDir, config.dashboard.helper_target),
  });
  const dashboardOut = dashboard.write(envelope);
  written.push(...dashboardOut.written);
  diagnostics.push(...dashboardOut.diagnostics);

  if (env.badgesEnabled) {
    const badgeDir = path.resolve(rootDir, env.badgeDir ?? config.badges_dir);
    const badgeOut = new BadgeWriter(badgeDir).write(buildBadges(normalized));
    written.push(...badgeOut.written);
    diagnostics.push(...badgeOut.diagnostics);
  }

  return { reports, normalized, envelope, summary, written, diagnostics };
}

export type AggregateCommandOptions = {
  rootDir: string;
  configDir?: string;
  schemaDir?: string;
  profile?: string;
  processEnv: NodeJS.ProcessEnv;
  print: (text: string) => void;
  now?: () => Date;
};

export type AggregateCommandResult =
  | { ok: true; result: AggregateResult }
  | { ok: false; error: { code: string; message: string } };

/** Resolve config and environment, then run the pipeline. */
export async function runAggregate(opts: AggregateCommandOptions): Promise<AggregateCommandResult> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig({ configDir: opts.configDir, profile: opts.profile, env: opts.processEnv });
  } catch (e) {
    return { ok: false, error: { code: "CONFIG_READ_FAILED", message: errorMessage(e) } };
  }

  const checked = await validateConfig(raw, opts.schemaDir);
  if (!checked.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${checked.errors}` } };
  }

  const result = aggregate({
    rootDir: path.resolve(opts.rootDir),
    config: checked.config,
    env: resolveRunEnvironment(opts.processEnv),
    print: opts.print,
    now: opts.now,
  });
  return { ok: true, result };
}
