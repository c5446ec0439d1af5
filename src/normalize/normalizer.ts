import type {
  CoverageMetrics,
  DependencyMetrics,
  MutationMetrics,
  NormalizedMetrics,
  StaticAnalysisMetrics,
  TestMetrics,
} from "../types/metrics.js";
import type {
  CoverageReport,
  DependencyScanReport,
  MutationReport,
  Presence,
  RawReports,
  ReportKind,
  StaticBugsReport,
  TestRunReport,
} from "../types/reports.js";

export function normalizeTests(tests: Presence<TestRunReport>): TestMetrics {
  if (tests.state === "absent") {
    return { total: 0, passed: 0, failed: 0, errors: 0, skipped: 0, duration: 0 };
  }
  const t = tests.data;
  return {
    total: t.tests,
    passed: Math.max(0, t.tests - t.failures - t.errors - t.skipped),
    failed: t.failures,
    errors: t.errors,
    skipped: t.skipped,
    duration: t.time,
  };
}

export function normalizeCoverage(coverage: Presence<CoverageReport>): CoverageMetrics {
  if (coverage.state === "absent") return { percent: 0, covered: 0, total: 0 };
  const c = coverage.data;
  return { percent: c.percent, covered: c.covered, total: c.total };
}

export function normalizeMutation(mutation: Presence<MutationReport>): MutationMetrics {
  if (mutation.state === "absent") {
    return { percent: 0, killed: 0, survived: 0, noCoverage: 0, detected: 0, total: 0 };
  }
  const m = mutation.data;
  return {
    percent: m.percent,
    killed: m.killed,
    survived: m.survived,
    // floored at 0
    noCoverage: Math.max(0, m.total - m.killed - m.survived),
    detected: m.detected,
    total: m.total,
  };
}

export function normalizeDependencies(scan: Presence<DependencyScanReport>): DependencyMetrics {
  if (scan.state === "absent") {
    return {
      scanned: 0,
      vulnerableDeps: 0,
      vulnerabilities: { critical: 0, high: 0, medium: 0, low: 0, unknown: 0 },
    };
  }
  const d = scan.data;
  return {
    scanned: d.dependencies,
    vulnerableDeps: d.vulnerableDependencies,
    vulnerabilities: {
      critical: d.severity.CRITICAL,
      high: d.severity.HIGH,
      medium: d.severity.MEDIUM,
      low: d.severity.LOW,
      unknown: d.severity.UNKNOWN,
    },
  };
}

export function normalizeStaticAnalysis(bugs: Presence<StaticBugsReport>): StaticAnalysisMetrics {
  return { issues: bugs.state === "present" ? bugs.data.issues : null };
}

export type Availability = Record<ReportKind, boolean>;

export type NormalizeResult = {
  metrics: NormalizedMetrics;
  /** Which sources were present; all-zero metrics alone cannot tell. */
  availability: Availability;
};

export function normalizeReports(reports: RawReports): NormalizeResult {
  return {
    metrics: {
      tests: normalizeTests(reports.tests),
      coverage: normalizeCoverage(reports.coverage),
      mutation: normalizeMutation(reports.mutation),
      dependencyCheck: normalizeDependencies(reports.dependencyScan),
      staticAnalysis: normalizeStaticAnalysis(reports.staticAnalysis),
    },
    availability: {
      tests: reports.tests.state === "present",
      coverage: reports.coverage.state === "present",
      mutation: reports.mutation.state === "present",
      dependencyScan: reports.dependencyScan.state === "present",
      staticAnalysis: reports.staticAnalysis.state === "present",
    },
  };
}

/** Total findings across all severity buckets. */
export function totalVulnerabilities(dep: DependencyMetrics): number {
  const v = dep.vulnerabilities;
  return v.critical + v.high + v.medium + v.low + v.unknown;
}
