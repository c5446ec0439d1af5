import { describe, expect, it } from "vitest";
import { normalizeMutation, normalizeReports, normalizeTests, totalVulnerabilities } from "../src/normalize/normalizer.js";
import { absentReports, fixtureReports } from "./helpers.js";

describe("normalizer", () => {
  it("maps present reports onto the dashboard shape", () => {
    const { metrics, availability } = normalizeReports(fixtureReports());
    expect(metrics).toEqual({
      tests: { total: 15, passed: 12, failed: 1, errors: 1, skipped: 1, duration: 1.75 },
      coverage: { percent: 80, covered: 160, total: 200 },
      mutation: { percent: 70, killed: 7, survived: 2, noCoverage: 1, detected: 7, total: 10 },
      dependencyCheck: {
        scanned: 3,
        vulnerableDeps: 2,
        vulnerabilities: { critical: 0, high: 1, medium: 1, low: 0, unknown: 1 },
      },
      staticAnalysis: { issues: 3 },
    });
    expect(availability).toEqual({
      tests: true,
      coverage: true,
      mutation: true,
      dependencyScan: true,
      staticAnalysis: true,
    });
  });

  it("yields zero records and an unknown issue count when everything is absent", () => {
    const { metrics, availability } = normalizeReports(absentReports("malformed"));
    expect(metrics).toEqual({
      tests: { total: 0, passed: 0, failed: 0, errors: 0, skipped: 0, duration: 0 },
      coverage: { percent: 0, covered: 0, total: 0 },
      mutation: { percent: 0, killed: 0, survived: 0, noCoverage: 0, detected: 0, total: 0 },
      dependencyCheck: {
        scanned: 0,
        vulnerableDeps: 0,
        vulnerabilities: { critical: 0, high: 0, medium: 0, low: 0, unknown: 0 },
      },
      staticAnalysis: { issues: null },
    });
    expect(Object.values(availability).every((v) => !v)).toBe(true);
  });

  it("never reports a negative passed count", () => {
    const tests = normalizeTests({
      state: "present",
      data: { suites: 1, tests: 2, failures: 2, errors: 1, skipped: 0, time: 0 },
      source: [],
    });
    expect(tests.passed).toBe(0);
  });

  it("never reports a negative no-coverage count", () => {
    const mutation = normalizeMutation({
      state: "present",
      data: { total: 3, killed: 2, survived: 2, detected: 2, percent: 66.7 },
      source: [],
    });
    expect(mutation.noCoverage).toBe(0);
  });

  it("sums findings across severities", () => {
    const { metrics } = normalizeReports(fixtureReports());
    expect(totalVulnerabilities(metrics.dependencyCheck)).toBe(3);
  });
});
