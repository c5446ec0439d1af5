import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { resolveRunEnvironment } from "../src/config/environment.js";
import { createLoaders, loadReports } from "../src/loaders/index.js";
import type { QaConfig, RunEnvironment } from "../src/types/config.js";
import type { AbsentReason, RawReports } from "../src/types/reports.js";

const HERE = path.dirname(fileURLToPath(import.meta.url));

export const ROOT_DIR = path.resolve(HERE, "..");
export const FIXTURES_DIR = path.join(ROOT_DIR, "fixtures");
/** A project root whose target/ holds one report of every kind. */
export const FIXTURE_PROJECT = path.join(FIXTURES_DIR, "project");
export const FIXTURE_TARGET = path.join(FIXTURE_PROJECT, "target");
export const REPORTS_DIR = path.join(FIXTURES_DIR, "reports");
export const CONFIG_DIR = path.join(ROOT_DIR, "config");
export const SCHEMA_DIR = path.join(ROOT_DIR, "schemas");

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `qametrics-${prefix}-`));
}

/** Same values as config/base.yaml. */
export function testConfig(): QaConfig {
  return {
    schema_version: "1.0.0",
    target_dir: "target",
    badges_dir: "badges",
    runtime_label: "JDK",
    reports: {
      test_results_dir: "surefire-reports",
      test_results_pattern: "TEST-*.xml",
      coverage: "site/jacoco/jacoco.xml",
      mutation: "pit-reports/mutations.xml",
      dependency_scan: "dependency-check-report.json",
      static_analysis: ["spotbugsXml.xml", "spotbugs.xml"],
    },
    dashboard: {
      output_dir: "target/site/qa-dashboard",
      bundle_dir: "ui/qa-dashboard/dist",
      helper_script: "scripts/serve_quality_dashboard.py",
      helper_target: "target/site/serve_quality_dashboard.py",
    },
  };
}

export function testEnvironment(overrides: Record<string, string> = {}): RunEnvironment {
  return resolveRunEnvironment({
    MATRIX_OS: "ubuntu-latest",
    MATRIX_JAVA: "21",
    GITHUB_REPOSITORY: "example/shop",
    GITHUB_WORKFLOW: "ci",
    GITHUB_REF_NAME: "main",
    GITHUB_SHA: "0123456789abcdef",
    GITHUB_ACTOR: "octo",
    ...overrides,
  });
}

export const FIXED_NOW = (): Date => new Date("2026-10-18T09:30:00Z");

/** Every report kind loaded from the fixture project. */
export function fixtureReports(): RawReports {
  return loadReports(createLoaders(testConfig(), FIXTURE_PROJECT));
}

/** Every report kind absent for the given reason. */
export function absentReports(reason: AbsentReason = "missing"): RawReports {
  return {
    tests: { state: "absent", reason, source: ["surefire-reports"] },
    coverage: { state: "absent", reason, source: ["jacoco.xml"] },
    mutation: { state: "absent", reason, source: ["mutations.xml"] },
    dependencyScan: { state: "absent", reason, source: ["dependency-check-report.json"] },
    staticAnalysis: { state: "absent", reason, source: ["spotbugsXml.xml"] },
  };
}
