import { formatPercent } from "../metrics/percent.js";
import { totalVulnerabilities, type NormalizeResult } from "../normalize/normalizer.js";
import type { BadgePayload } from "../types/metrics.js";

export const BADGE_COLORS = {
  strongest: "16A34A",
  second: "F59E0B",
  third: "EA580C",
  weakest: "DC2626",
  neutral: "9CA3AF",
} as const;

/** Four-tier ramp for percentage badges. */
export function badgeColor(pct: number): string {
  if (pct >= 90) return BADGE_COLORS.strongest;
  if (pct >= 75) return BADGE_COLORS.second;
  if (pct >= 60) return BADGE_COLORS.third;
  return BADGE_COLORS.weakest;
}

export function percentBadge(label: string, pct: number): BadgePayload {
  const safe = Math.max(0, Math.min(100, pct));
  return { schemaVersion: 1, label, message: formatPercent(safe), color: badgeColor(safe) };
}

/**
 * Badge for a count where fewer is better. null means the count is unknown
 * and renders gray, not green.
 */
export function countBadge(label: string, count: number | null, unit: string, cleanMessage: string): BadgePayload {
  if (count === null) {
    return { schemaVersion: 1, label, message: "n/a", color: BADGE_COLORS.neutral };
  }
  if (count === 0) {
    return { schemaVersion: 1, label, message: cleanMessage, color: BADGE_COLORS.strongest };
  }
  return {
    schemaVersion: 1,
    label,
    message: `${count} ${unit}`,
    color: count <= 5 ? BADGE_COLORS.second : BADGE_COLORS.weakest,
  };
}

/** Badge payloads keyed by output file name. */
export function buildBadges(normalized: NormalizeResult): Record<string, BadgePayload> {
  const { metrics, availability } = normalized;
  const vulns = availability.dependencyScan ? totalVulnerabilities(metrics.dependencyCheck) : null;

  return {
    "jacoco.json": percentBadge("JaCoCo", metrics.coverage.percent),
    "mutation.json": percentBadge("PITest", metrics.mutation.percent),
    "spotbugs.json": countBadge("SpotBugs", metrics.staticAnalysis.issues, "issues", "clean"),
    "dependency.json": countBadge("OWASP DC", vulns, "vulns", "clean"),
  };
}
