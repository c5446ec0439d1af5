/**
 * Normalized metrics and the dashboard envelope.
 *
 * Field names are the wire contract read by the dashboard UI; they do not
 * change when an upstream report format does.
 */
export type TestMetrics = {
  total: number;
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
  duration: number;
};

export type CoverageMetrics = {
  percent: number;
  covered: number;
  total: number;
};

export type MutationMetrics = {
  percent: number;
  killed: number;
  survived: number;
  noCoverage: number;
  detected: number;
  total: number;
};

export type SeverityCounts = {
  critical: number;
  high: number;
  medium: number;
  low: number;
  unknown: number;
};

export type DependencyMetrics = {
  scanned: number;
  vulnerableDeps: number;
  vulnerabilities: SeverityCounts;
};

export type StaticAnalysisMetrics = {
  /** null when the report is missing or unreadable; never conflated with 0. */
  issues: number | null;
};

export type NormalizedMetrics = {
  tests: TestMetrics;
  coverage: CoverageMetrics;
  mutation: MutationMetrics;
  dependencyCheck: DependencyMetrics;
  staticAnalysis: StaticAnalysisMetrics;
};

export type BadgePayload = {
  schemaVersion: 1;
  label: string;
  message: string;
  color: string;
};

export type TimelineStatus = "pass" | "warn";

export type TimelineStage = {
  stage: string;
  duration: number;
  status: TimelineStatus;
  short: string;
};

export type RunMetadata = {
  repo: string;
  workflow: string;
  os: string;
  jdk: string;
  branch: string;
  commit: string;
  author: string;
  timestamp: string;
};

export const METRICS_SCHEMA_VERSION = 1;

export type MetricsEnvelope = {
  schemaVersion: typeof METRICS_SCHEMA_VERSION;
  run: RunMetadata;
  tests: TestMetrics;
  coverage: CoverageMetrics;
  mutation: MutationMetrics;
  dependencyCheck: DependencyMetrics;
  staticAnalysis: StaticAnalysisMetrics;
  timeline: TimelineStage[];
  console: string[];
};
