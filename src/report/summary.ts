import { BAR_WIDTH, formatPercent, progressBar } from "../metrics/percent.js";
import { SEVERITY_LABELS, SEVERITY_LEVELS } from "../metrics/severity.js";
import type { AbsentReason, RawReports, ReportKind, SeverityHistogram } from "../types/reports.js";

export type SummaryRow = {
  metric: string;
  result: string;
  detail: string;
};

export const NO_DATA = "_no data_";
export const NOT_RUN = "_not run_";

const LABELS: Record<ReportKind, string> = {
  tests: "Tests",
  coverage: "Line coverage (JaCoCo)",
  mutation: "Mutation score (PITest)",
  dependencyScan: "Dependency-Check",
  staticAnalysis: "Static analysis (SpotBugs)",
};

/** What a reader should suspect when a report is absent. */
const ABSENT_DETAIL: Record<ReportKind, Record<AbsentReason, string>> = {
  tests: {
    missing: "Surefire reports not found.",
    malformed: "Surefire reports could not be parsed.",
    empty: "No Surefire suite files in the report directory.",
  },
  coverage: {
    missing: "Jacoco XML report missing.",
    malformed: "Jacoco XML report could not be parsed.",
    empty: "Jacoco XML report has no line counter.",
  },
  mutation: {
    missing: "PITest report not generated (likely skipped).",
    malformed: "PITest report could not be parsed.",
    empty: "PITest report holds no mutation data.",
  },
  dependencyScan: {
    missing: "Report missing (probably skipped when `NVD_API_KEY` was not provided).",
    malformed: "Dependency-Check report could not be parsed.",
    empty: "Dependency-Check report holds no dependency data.",
  },
  staticAnalysis: {
    missing: "SpotBugs report not found.",
    malformed: "SpotBugs report could not be parsed.",
    empty: "SpotBugs report holds no bug data.",
  },
};

function percentCell(pct: number): string {
  return formatPercent(pct).padEnd(8) + progressBar(pct, BAR_WIDTH);
}

export function severitySummary(counts: SeverityHistogram): string {
  return SEVERITY_LEVELS.map((level) => `${SEVERITY_LABELS[level]}: ${counts[level]}`).join(" &nbsp; ");
}

function absentRow(kind: ReportKind, reason: AbsentReason): SummaryRow {
  return {
    metric: LABELS[kind],
    result: kind === "dependencyScan" ? NOT_RUN : NO_DATA,
    detail: ABSENT_DETAIL[kind][reason],
  };
}

/**
 * One row per metric category (two for the dependency scan). An absent
 * report never renders as a zero value.
 */
export function buildSummaryRows(reports: RawReports): SummaryRow[] {
  const rows: SummaryRow[] = [];

  const tests = reports.tests;
  if (tests.state === "present") {
    const t = tests.data;
    rows.push({
      metric: LABELS.tests,
      result: `${t.tests} executed`,
      detail: `Total runtime ${t.time}s; failures: ${t.failures}, errors: ${t.errors}, skipped: ${t.skipped}`,
    });
  } else {
    rows.push(absentRow("tests", tests.reason));
  }

  const coverage = reports.coverage;
  if (coverage.state === "present") {
    const c = coverage.data;
    rows.push({
      metric: LABELS.coverage,
      result: percentCell(c.percent),
      detail: `${c.covered} / ${c.total} lines covered`,
    });
  } else {
    rows.push(absentRow("coverage", coverage.reason));
  }

  const mutation = reports.mutation;
  if (mutation.state === "present") {
    const m = mutation.data;
    rows.push({
      metric: LABELS.mutation,
      result: percentCell(m.percent),
      detail: `${m.killed} killed, ${m.survived} survived, ${m.detected} detected out of ${m.total} mutations`,
    });
  } else {
    rows.push(absentRow("mutation", mutation.reason));
  }

  const dep = reports.dependencyScan;
  if (dep.state === "present") {
    const d = dep.data;
    rows.push({
      metric: LABELS.dependencyScan,
      result: "scan complete",
      detail: `${d.vulnerableDependencies} dependencies with issues (${d.vulnerabilities} vulnerabilities) out of ${d.dependencies} scanned.`,
    });
    rows.push({ metric: "Dependency severity", result: severitySummary(d.severity), detail: "" });
  } else {
    rows.push(absentRow("dependencyScan", dep.reason));
  }

  const bugs = reports.staticAnalysis;
  if (bugs.state === "present") {
    const n = bugs.data.issues;
    rows.push({
      metric: LABELS.staticAnalysis,
      result: n === 0 ? "clean" : `${n} issues`,
      detail: `${n} bug instances reported`,
    });
  } else {
    rows.push(absentRow("staticAnalysis", bugs.reason));
  }

  return rows;
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

export function formatRow(row: SummaryRow): string {
  return `| ${cell(row.metric)} | ${cell(row.result)} | ${cell(row.detail)} |`;
}

export function summaryTitle(os: string, runtimeLabel: string, runtime: string): string {
  return `### QA Metrics (${os}, ${runtimeLabel} ${runtime})`;
}

/** Markdown block: title, table, footer lines. Always ends with a newline. */
export function renderSummary(title: string, rows: SummaryRow[], footer: string[]): string {
  const lines = [title, "", "| Metric | Result | Details |", "| --- | --- | --- |"];
  for (const row of rows) lines.push(formatRow(row));
  lines.push("", ...footer, "");
  return lines.join("\n") + "\n";
}
