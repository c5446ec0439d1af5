import type { DependencyMetrics, TimelineStage } from "../types/metrics.js";

const STAGES: ReadonlyArray<Omit<TimelineStage, "status">> = [
  { stage: "Checkout", duration: 6, short: "CK" },
  { stage: "Build", duration: 18, short: "BLD" },
  { stage: "Tests", duration: 3, short: "TST" },
  { stage: "SpotBugs", duration: 4, short: "BUG" },
  { stage: "Dependency-Check", duration: 22, short: "DC" },
  { stage: "PITest", duration: 45, short: "PIT" },
  { stage: "Artifacts", duration: 5, short: "ART" },
];

/**
 * Nominal pipeline stages for the dashboard. Durations are presentation
 * values, not measurements.
 */
export function buildTimeline(dep: DependencyMetrics): TimelineStage[] {
  return STAGES.map((s): TimelineStage => ({
    stage: s.stage,
    duration: s.duration,
    status: s.stage === "Dependency-Check" && dep.vulnerableDeps > 0 ? "warn" : "pass",
    short: s.short,
  }));
}
