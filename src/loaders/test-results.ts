import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { errorMessage } from "../log/diagnostics.js";
import { roundHalfEven } from "../metrics/percent.js";
import { MalformedReportError, absent, isNotFound, present, type ReportLoader } from "./loader.js";
import { children, floatAttr, intAttr, isXmlNode, parseXml } from "./xml.js";
import type { Presence, TestRunReport } from "../types/reports.js";

export type SuiteCounts = {
  tests: number;
  failures: number;
  errors: number;
  skipped: number;
  time: number;
};

/**
 * Parse one JUnit/Surefire XML document. Handles both a bare <testsuite>
 * root and a <testsuites> wrapper; counts come from suite attributes.
 */
export function parseJunitSuites(xmlContent: string): SuiteCounts[] {
  const doc = parseXml(xmlContent, ["testsuite"]);

  let suites: unknown[];
  const wrapper = doc.testsuites;
  if (isXmlNode(wrapper)) {
    suites = children(wrapper, "testsuite");
  } else if (doc.testsuite !== undefined) {
    suites = children(doc, "testsuite");
  } else {
    throw new MalformedReportError("no <testsuite> element");
  }

  return suites.map((suite) => ({
    tests: intAttr(suite, "tests"),
    failures: intAttr(suite, "failures"),
    errors: intAttr(suite, "errors"),
    skipped: intAttr(suite, "skipped"),
    time: floatAttr(suite, "time"),
  }));
}

/**
 * Sums per-suite result files from a test-results directory.
 *
 * Unreadable suite files are skipped. The report is absent when the
 * directory is missing or none of its suite files could be read; a run whose
 * readable suites add up to zero tests is still present.
 */
export class TestResultsLoader implements ReportLoader<TestRunReport> {
  readonly kind = "tests" as const;

  constructor(
    private readonly dir: string,
    private readonly pattern: string = "TEST-*.xml",
  ) {}

  load(): Presence<TestRunReport> {
    let names: string[];
    try {
      if (!fs.statSync(this.dir).isDirectory()) return absent("missing", [this.dir]);
      names = fs
        .readdirSync(this.dir)
        .filter((name) => minimatch(name, this.pattern))
        .sort();
    } catch (err) {
      return isNotFound(err) ? absent("missing", [this.dir]) : absent("malformed", [this.dir], errorMessage(err));
    }

    const totals: TestRunReport = { suites: 0, tests: 0, failures: 0, errors: 0, skipped: 0, time: 0 };
    const read: string[] = [];
    const failed: string[] = [];

    for (const name of names) {
      const filePath = path.join(this.dir, name);
      let suites: SuiteCounts[];
      try {
        suites = parseJunitSuites(fs.readFileSync(filePath, "utf8"));
      } catch (err) {
        failed.push(`${name}: ${errorMessage(err)}`);
        continue;
      }
      read.push(filePath);
      for (const s of suites) {
        totals.suites += 1;
        totals.tests += s.tests;
        totals.failures += s.failures;
        totals.errors += s.errors;
        totals.skipped += s.skipped;
        totals.time += s.time;
      }
    }

    if (read.length === 0) {
      return names.length === 0
        ? absent("empty", [this.dir])
        : absent("malformed", [this.dir], failed.join("; "));
    }

    totals.time = roundHalfEven(totals.time, 2);
    return present(totals, read);
  }
}
