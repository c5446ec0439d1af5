import { MalformedReportError, loadReportFile, type ReportLoader } from "./loader.js";
import { attr, children, descendants, intAttr, isXmlNode, parseXml } from "./xml.js";
import { percent } from "../metrics/percent.js";
import type { CoverageReport, Presence } from "../types/reports.js";

const isLineCounter = (counter: unknown): boolean => attr(counter, "type") === "LINE";

/**
 * Line coverage from a JaCoCo XML report.
 *
 * The report-level counters are direct children of <report>. Only when the
 * root carries no counters at all is the whole tree searched for the first
 * LINE counter. Returns null when no LINE counter exists.
 */
export function parseJacoco(xmlContent: string): CoverageReport | null {
  const doc = parseXml(xmlContent, ["counter"]);
  const report = doc.report;
  if (!isXmlNode(report)) {
    throw new MalformedReportError("no <report> root element");
  }

  const direct = children(report, "counter");
  const line = direct.length > 0
    ? direct.find(isLineCounter)
    : descendants(report, "counter").find(isLineCounter);
  if (line === undefined) return null;

  const covered = intAttr(line, "covered");
  const missed = intAttr(line, "missed");
  const total = covered + missed;
  return { covered, missed, total, percent: percent(covered, total) };
}

export class CoverageLoader implements ReportLoader<CoverageReport> {
  readonly kind = "coverage" as const;

  constructor(private readonly file: string) {}

  load(): Presence<CoverageReport> {
    return loadReportFile(this.file, parseJacoco);
  }
}
