import { MalformedReportError, loadReportFile, type ReportLoader } from "./loader.js";
import { emptySeverityHistogram, foldSeverity } from "../metrics/severity.js";
import type { DependencyScanReport, Presence } from "../types/reports.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Dependency and vulnerability counts from a Dependency-Check JSON report.
 * Severities outside the five known levels land in UNKNOWN.
 */
export function parseDependencyCheck(jsonContent: string): DependencyScanReport {
  const data: unknown = JSON.parse(jsonContent);
  if (!isRecord(data)) {
    throw new MalformedReportError("report is not a JSON object");
  }

  const dependencies = data.dependencies ?? [];
  if (!Array.isArray(dependencies)) {
    throw new MalformedReportError("`dependencies` is not an array");
  }

  const severity = emptySeverityHistogram();
  let vulnerableDependencies = 0;
  let vulnerabilities = 0;

  for (const dep of dependencies) {
    if (!isRecord(dep)) {
      throw new MalformedReportError("dependency entry is not an object");
    }
    const vulns = dep.vulnerabilities;
    if (!Array.isArray(vulns) || vulns.length === 0) continue;

    vulnerableDependencies++;
    vulnerabilities += vulns.length;
    for (const vuln of vulns) {
      severity[foldSeverity(isRecord(vuln) ? vuln.severity : undefined)]++;
    }
  }

  return {
    dependencies: dependencies.length,
    vulnerableDependencies,
    vulnerabilities,
    severity,
  };
}

export class DependencyScanLoader implements ReportLoader<DependencyScanReport> {
  readonly kind = "dependencyScan" as const;

  constructor(private readonly file: string) {}

  load(): Presence<DependencyScanReport> {
    return loadReportFile(this.file, parseDependencyCheck);
  }
}
