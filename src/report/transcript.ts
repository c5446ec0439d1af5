import { formatPercent } from "../metrics/percent.js";
import { totalVulnerabilities } from "../normalize/normalizer.js";
import type { NormalizedMetrics } from "../types/metrics.js";

/** Log-style trace embedded in the metrics envelope for the dashboard console. */
export function buildConsoleTranscript(metrics: NormalizedMetrics): string[] {
  const { tests, coverage, mutation, dependencyCheck: dep, staticAnalysis } = metrics;
  const lines: string[] = [];

  lines.push(
    `[INFO] Tests: ${tests.passed}/${tests.total} passed ` +
      `(failures: ${tests.failed}, errors: ${tests.errors}, skipped: ${tests.skipped})`,
  );
  lines.push(`[INFO] JaCoCo coverage: ${formatPercent(coverage.percent)} (${coverage.covered}/${coverage.total})`);
  lines.push(
    `[INFO] PITest mutation score: ${formatPercent(mutation.percent)} ` +
      `(killed ${mutation.killed}, survived ${mutation.survived}, detected ${mutation.detected})`,
  );

  if (dep.vulnerableDeps > 0) {
    lines.push(`[WARN] Dependency-Check: ${dep.vulnerableDeps} vulnerable deps (${totalVulnerabilities(dep)} findings)`);
  } else {
    lines.push("[INFO] Dependency-Check: 0 vulnerable dependencies detected");
  }

  const issues = staticAnalysis.issues;
  if (issues === null) {
    lines.push("[INFO] SpotBugs: no report");
  } else if (issues > 0) {
    lines.push(`[WARN] SpotBugs: ${issues} issues`);
  } else {
    lines.push("[INFO] SpotBugs: 0 issues");
  }

  return lines;
}
