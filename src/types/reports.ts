/** Raw report records, one per source kind, plus the presence wrapper. */
export type ReportKind = "tests" | "coverage" | "mutation" | "dependencyScan" | "staticAnalysis";

export const REPORT_KINDS: readonly ReportKind[] = [
  "tests",
  "coverage",
  "mutation",
  "dependencyScan",
  "staticAnalysis",
];

/** missing: nothing on disk. malformed: unreadable. empty: readable but without the records we need. */
export type AbsentReason = "missing" | "malformed" | "empty";

/**
 * A report either ran and left something readable, or it did not.
 * "present with zero counts" and "absent" are different states and stay so
 * end to end.
 */
export type Presence<T> =
  | { state: "present"; data: T; source: string[] }
  | { state: "absent"; reason: AbsentReason; source: string[]; error?: string };

export type TestRunReport = {
  suites: number;
  tests: number;
  failures: number;
  errors: number;
  skipped: number;
  /** Summed suite time in seconds, 2 decimals. */
  time: number;
};

export type CoverageReport = {
  covered: number;
  missed: number;
  total: number;
  percent: number;
};

export type MutationReport = {
  total: number;
  killed: number;
  survived: number;
  detected: number;
  percent: number;
};

export type SeverityLevel = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "UNKNOWN";

export type SeverityHistogram = Record<SeverityLevel, number>;

export type DependencyScanReport = {
  dependencies: number;
  vulnerableDependencies: number;
  vulnerabilities: number;
  severity: SeverityHistogram;
};

export type StaticBugsReport = {
  issues: number;
};

export type RawReports = {
  tests: Presence<TestRunReport>;
  coverage: Presence<CoverageReport>;
  mutation: Presence<MutationReport>;
  dependencyScan: Presence<DependencyScanReport>;
  staticAnalysis: Presence<StaticBugsReport>;
};
