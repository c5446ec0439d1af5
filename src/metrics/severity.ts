import type { SeverityHistogram, SeverityLevel } from "../types/reports.js";

export const SEVERITY_LEVELS: readonly SeverityLevel[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "UNKNOWN"];

export const SEVERITY_LABELS: Record<SeverityLevel, string> = {
  CRITICAL: "🟥 Critical",
  HIGH: "🟧 High",
  MEDIUM: "🟨 Medium",
  LOW: "🟩 Low",
  UNKNOWN: "⬜ Unknown",
};

function isSeverityLevel(value: string): value is SeverityLevel {
  return (SEVERITY_LEVELS as readonly string[]).includes(value);
}

/** Map a scanner severity string onto one of the five buckets. */
export function foldSeverity(raw: unknown): SeverityLevel {
  if (typeof raw !== "string") return "UNKNOWN";
  const upper = raw.trim().toUpperCase();
  return isSeverityLevel(upper) ? upper : "UNKNOWN";
}

export function emptySeverityHistogram(): SeverityHistogram {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, UNKNOWN: 0 };
}
