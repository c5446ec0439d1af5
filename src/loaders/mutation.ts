import { loadReportFile, type ReportLoader } from "./loader.js";
import { attr, descendants, parseXml } from "./xml.js";
import { percent } from "../metrics/percent.js";
import type { MutationReport, Presence } from "../types/reports.js";

/**
 * Kill/survive counts from a PITest mutations.xml.
 * A report with no <mutation> records is a valid, all-zero result.
 */
export function parsePitest(xmlContent: string): MutationReport {
  const mutations = descendants(parseXml(xmlContent, ["mutation"]), "mutation");
  const total = mutations.length;

  let killed = 0;
  let survived = 0;
  let detected = 0;
  for (const m of mutations) {
    const status = attr(m, "status");
    if (status === "KILLED") killed++;
    else if (status === "SURVIVED") survived++;
    if (attr(m, "detected") === "true") detected++;
  }

  return { total, killed, survived, detected, percent: percent(killed, total) };
}

export class MutationLoader implements ReportLoader<MutationReport> {
  readonly kind = "mutation" as const;

  constructor(private readonly file: string) {}

  load(): Presence<MutationReport> {
    return loadReportFile(this.file, parsePitest);
  }
}
