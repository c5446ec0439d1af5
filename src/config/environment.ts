import type { RunEnvironment } from "../types/config.js";

type Env = Record<string, string | undefined>;

const TRUTHY = new Set(["1", "true", "yes"]);

/** Set and non-empty, else null. */
function read(env: Env, key: string): string | null {
  const value = env[key];
  return value === undefined || value === "" ? null : value;
}

/**
 * Snapshot the CI variables the pipeline uses. Called once at startup; the
 * pipeline itself never reads process.env.
 */
export function resolveRunEnvironment(env: Env): RunEnvironment {
  return {
    matrixOs: read(env, "MATRIX_OS") ?? "unknown-os",
    matrixRuntime: read(env, "MATRIX_JAVA") ?? "unknown",
    summaryPath: read(env, "GITHUB_STEP_SUMMARY"),
    badgesEnabled: TRUTHY.has((read(env, "UPDATE_BADGES") ?? "").toLowerCase()),
    badgeDir: read(env, "BADGE_OUTPUT_DIR"),
    repository: read(env, "GITHUB_REPOSITORY") ?? "local",
    workflow: read(env, "GITHUB_WORKFLOW") ?? "local",
    runnerOs: read(env, "MATRIX_OS") ?? read(env, "RUNNER_OS") ?? "local",
    runtime: read(env, "MATRIX_JAVA") ?? "local",
    branch: read(env, "GITHUB_REF_NAME") ?? "local",
    commit: read(env, "GITHUB_SHA") ?? "local",
    actor: read(env, "GITHUB_ACTOR") ?? "local",
  };
}
