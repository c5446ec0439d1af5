/** Configuration types: layered file config plus the CI run environment. */
export type ReportPathsConfig = {
  /** Directory holding one XML file per test suite. */
  test_results_dir: string;
  /** Glob applied to file names inside `test_results_dir`. */
  test_results_pattern: string;
  coverage: string;
  mutation: string;
  dependency_scan: string;
  /** Candidate static-analysis reports, first existing one wins. */
  static_analysis: string[];
};

export type DashboardConfig = {
  output_dir: string;
  bundle_dir: string;
  helper_script: string;
  helper_target: string;
};

export type QaConfig = {
  schema_version: string;
  /** Build output root; report paths are relative to it. */
  target_dir: string;
  badges_dir: string;
  runtime_label: string;
  reports: ReportPathsConfig;
  dashboard: DashboardConfig;
};

/**
 * Everything the pipeline needs from the CI environment, read once at startup.
 * Fields are documented with the variable they come from and the default.
 */
export type RunEnvironment = {
  /** MATRIX_OS, default "unknown-os". */
  matrixOs: string;
  /** MATRIX_JAVA, default "unknown". */
  matrixRuntime: string;
  /** GITHUB_STEP_SUMMARY; null prints the summary instead. */
  summaryPath: string | null;
  /** UPDATE_BADGES in 1|true|yes. */
  badgesEnabled: boolean;
  /** BADGE_OUTPUT_DIR; null uses the configured badges_dir. */
  badgeDir: string | null;
  /** GITHUB_REPOSITORY, default "local". */
  repository: string;
  /** GITHUB_WORKFLOW, default "local". */
  workflow: string;
  /** MATRIX_OS, else RUNNER_OS, default "local". */
  runnerOs: string;
  /** MATRIX_JAVA, default "local". */
  runtime: string;
  /** GITHUB_REF_NAME, default "local". */
  branch: string;
  /** GITHUB_SHA, default "local". */
  commit: string;
  /** GITHUB_ACTOR, default "local". */
  actor: string;
};
