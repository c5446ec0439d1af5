import { absent, isFile, loadReportFile, type ReportLoader } from "./loader.js";
import { descendants, parseXml } from "./xml.js";
import type { Presence, StaticBugsReport } from "../types/reports.js";

/** Count <BugInstance> records in a SpotBugs XML report. */
export function parseSpotbugs(xmlContent: string): StaticBugsReport {
  const doc = parseXml(xmlContent, ["BugInstance"]);
  return { issues: descendants(doc, "BugInstance").length };
}

/**
 * Tries each candidate report in order; the first file that exists is the
 * one parsed, even if it turns out to be unreadable.
 */
export class StaticAnalysisLoader implements ReportLoader<StaticBugsReport> {
  readonly kind = "staticAnalysis" as const;

  constructor(private readonly candidates: string[]) {}

  load(): Presence<StaticBugsReport> {
    const file = this.candidates.find(isFile);
    if (file === undefined) return absent("missing", [...this.candidates]);
    return loadReportFile(file, parseSpotbugs);
  }
}
