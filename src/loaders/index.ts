import path from "node:path";
import { CoverageLoader } from "./coverage.js";
import { DependencyScanLoader } from "./dependency-scan.js";
import { MutationLoader } from "./mutation.js";
import { StaticAnalysisLoader } from "./static-analysis.js";
import { TestResultsLoader } from "./test-results.js";
import type { ReportLoader } from "./loader.js";
import type { QaConfig } from "../types/config.js";
import type {
  CoverageReport,
  DependencyScanReport,
  MutationReport,
  RawReports,
  StaticBugsReport,
  TestRunReport,
} from "../types/reports.js";

export type LoaderSet = {
  tests: ReportLoader<TestRunReport>;
  coverage: ReportLoader<CoverageReport>;
  mutation: ReportLoader<MutationReport>;
  dependencyScan: ReportLoader<DependencyScanReport>;
  staticAnalysis: ReportLoader<StaticBugsReport>;
};

/** Build the loaders for a project root; report paths resolve under the target dir. */
export function createLoaders(config: QaConfig, rootDir: string): LoaderSet {
  const target = path.resolve(rootDir, config.target_dir);
  const at = (rel: string): string => path.resolve(target, rel);
  const r = config.reports;

  return {
    tests: new TestResultsLoader(at(r.test_results_dir), r.test_results_pattern),
    coverage: new CoverageLoader(at(r.coverage)),
    mutation: new MutationLoader(at(r.mutation)),
    dependencyScan: new DependencyScanLoader(at(r.dependency_scan)),
    staticAnalysis: new StaticAnalysisLoader(r.static_analysis.map(at)),
  };
}

/** Run every loader once, one after another, in a fixed order. */
export function loadReports(loaders: LoaderSet): RawReports {
  const tests = loaders.tests.load();
  const coverage = loaders.coverage.load();
  const mutation = loaders.mutation.load();
  const dependencyScan = loaders.dependencyScan.load();
  const staticAnalysis = loaders.staticAnalysis.load();
  return { tests, coverage, mutation, dependencyScan, staticAnalysis };
}
