import { buildConsoleTranscript } from "./transcript.js";
import { buildTimeline } from "./timeline.js";
import { METRICS_SCHEMA_VERSION, type MetricsEnvelope, type NormalizedMetrics, type RunMetadata } from "../types/metrics.js";
import type { RunEnvironment } from "../types/config.js";

/** "2026-10-18 09:30:00 UTC" */
export function formatTimestamp(now: Date): string {
  return now.toISOString().slice(0, 19).replace("T", " ") + " UTC";
}

export function buildRunMetadata(env: RunEnvironment, now: Date): RunMetadata {
  return {
    repo: env.repository,
    workflow: env.workflow,
    os: env.runnerOs,
    jdk: env.runtime,
    branch: env.branch,
    commit: env.commit.slice(0, 7),
    author: env.actor,
    timestamp: formatTimestamp(now),
  };
}

/** The dashboard document. Key order is fixed so output is stable across runs. */
export function buildEnvelope(metrics: NormalizedMetrics, run: RunMetadata): MetricsEnvelope {
  return {
    schemaVersion: METRICS_SCHEMA_VERSION,
    run,
    tests: metrics.tests,
    coverage: metrics.coverage,
    mutation: metrics.mutation,
    dependencyCheck: metrics.dependencyCheck,
    staticAnalysis: metrics.staticAnalysis,
    timeline: buildTimeline(metrics.dependencyCheck),
    console: buildConsoleTranscript(metrics),
  };
}
