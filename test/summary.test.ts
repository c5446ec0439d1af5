import { describe, expect, it } from "vitest";
import { NO_DATA, buildSummaryRows, formatRow, renderSummary, severitySummary, summaryTitle } from "../src/report/summary.js";
import { absentReports, fixtureReports } from "./helpers.js";

describe("summary table", () => {
  it("renders one row per category for present reports", () => {
    const lines = buildSummaryRows(fixtureReports()).map(formatRow);
    expect(lines).toEqual([
      "| Tests | 15 executed | Total runtime 1.75s; failures: 1, errors: 1, skipped: 1 |",
      `| Line coverage (JaCoCo) | 80.0%   ${"█".repeat(16)}${"░".repeat(4)} | 160 / 200 lines covered |`,
      `| Mutation score (PITest) | 70.0%   ${"█".repeat(14)}${"░".repeat(6)} | 7 killed, 2 survived, 7 detected out of 10 mutations |`,
      "| Dependency-Check | scan complete | 2 dependencies with issues (3 vulnerabilities) out of 3 scanned. |",
      "| Dependency severity | 🟥 Critical: 0 &nbsp; 🟧 High: 1 &nbsp; 🟨 Medium: 1 &nbsp; 🟩 Low: 0 &nbsp; ⬜ Unknown: 1 |  |",
      "| Static analysis (SpotBugs) | 3 issues | 3 bug instances reported |",
    ]);
  });

  it("shows sentinels and causes for missing reports", () => {
    const lines = buildSummaryRows(absentReports("missing")).map(formatRow);
    expect(lines).toEqual([
      "| Tests | _no data_ | Surefire reports not found. |",
      "| Line coverage (JaCoCo) | _no data_ | Jacoco XML report missing. |",
      "| Mutation score (PITest) | _no data_ | PITest report not generated (likely skipped). |",
      "| Dependency-Check | _not run_ | Report missing (probably skipped when `NVD_API_KEY` was not provided). |",
      "| Static analysis (SpotBugs) | _no data_ | SpotBugs report not found. |",
    ]);
  });

  it("tells a malformed report apart from a missing one", () => {
    const rows = buildSummaryRows(absentReports("malformed"));
    expect(rows[1]).toEqual({
      metric: "Line coverage (JaCoCo)",
      result: NO_DATA,
      detail: "Jacoco XML report could not be parsed.",
    });
    expect(rows[4].detail).toBe("SpotBugs report could not be parsed.");
  });

  it("never renders an absent coverage report as 0%", () => {
    const rows = buildSummaryRows(absentReports());
    expect(rows[1].result).not.toContain("%");
  });

  it("calls a report without bug instances clean", () => {
    const reports = absentReports();
    reports.staticAnalysis = { state: "present", data: { issues: 0 }, source: ["spotbugsXml.xml"] };
    expect(buildSummaryRows(reports)[4]).toEqual({
      metric: "Static analysis (SpotBugs)",
      result: "clean",
      detail: "0 bug instances reported",
    });
  });

  it("escapes pipes inside cells", () => {
    expect(formatRow({ metric: "a|b", result: "c", detail: "d|e|f" })).toBe("| a\\|b | c | d\\|e\\|f |");
  });

  it("lists severities in a fixed order", () => {
    expect(severitySummary({ CRITICAL: 2, HIGH: 0, MEDIUM: 0, LOW: 3, UNKNOWN: 0 })).toBe(
      "🟥 Critical: 2 &nbsp; 🟧 High: 0 &nbsp; 🟨 Medium: 0 &nbsp; 🟩 Low: 3 &nbsp; ⬜ Unknown: 0",
    );
  });
});

describe("renderSummary", () => {
  it("builds title, table and footer", () => {
    const md = renderSummary(
      summaryTitle("ubuntu-latest", "JDK", "21"),
      [{ metric: "Tests", result: "3 executed", detail: "ok" }],
      ["Interactive dashboard: `target/site/qa-dashboard/index.html`."],
    );
    expect(md).toBe(
      [
        "### QA Metrics (ubuntu-latest, JDK 21)",
        "",
        "| Metric | Result | Details |",
        "| --- | --- | --- |",
        "| Tests | 3 executed | ok |",
        "",
        "Interactive dashboard: `target/site/qa-dashboard/index.html`.",
        "",
        "",
      ].join("\n"),
    );
  });
});
