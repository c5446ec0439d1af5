#!/usr/bin/env node

import { Command } from "commander";
import { runAggregate } from "./commands/aggregate.js";
import { EXIT } from "./commands/exit-codes.js";
import { validateAll } from "./commands/validate.js";
import { CONFIG_DIR } from "./config/loader.js";
import { diag } from "./log/diagnostics.js";
import { parseFormat, Reporter } from "./log/reporter.js";

const program = new Command();

program
  .name("qametrics")
  .description("Aggregate build QA reports into a summary, badges and dashboard metrics")
  .version("0.1.0");

function reporterFor(raw: string): Reporter {
  const format = parseFormat(raw);
  if (!format) {
    process.stderr.write(`Unknown format: ${raw} (expected human|jsonl)\n`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return new Reporter(format);
}

program
  .command("aggregate")
  .description("Read the QA reports under the target dir and write summary, badges and metrics.json")
  .option("--root <path>", "Project root the config paths are relative to", ".")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--profile <name>", "Config profile layered over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { root: string; config?: string; profile?: string; format: string }) => {
    const reporter = reporterFor(opts.format);
    const res = await runAggregate({
      rootDir: opts.root,
      configDir: opts.config,
      profile: opts.profile,
      processEnv: process.env,
      print: (text) => reporter.text("SUMMARY", text),
    });

    if (!res.ok) {
      reporter.emit(diag("error", res.error.code, res.error.message));
      process.exit(EXIT.INVALID_ARGS);
    }

    reporter.emitAll(res.result.diagnostics);
    reporter.emit(
      diag("info", "OK", `Aggregated ${res.result.written.length} file(s)`, {
        details: { written: res.result.written },
      }),
    );
  });

program
  .command("validate")
  .description("Validate config and (optionally) a written metrics.json and badge directory")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--profile <name>", "Only check this profile (default: every profile)")
  .option("--metrics <file>", "Path to a metrics.json to check")
  .option("--badges <path>", "Path to a badge directory to check")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: { config?: string; profile?: string; metrics?: string; badges?: string; format: string }) => {
      const reporter = reporterFor(opts.format);
      const res = await validateAll({
        configDir: opts.config ?? CONFIG_DIR,
        profile: opts.profile,
        metricsPath: opts.metrics,
        badgesDir: opts.badges,
      });

      if (!res.ok) {
        reporter.emitAll(res.errors);
        process.exit(EXIT.VALIDATION_FAILED);
      }
      reporter.emit(diag("info", "OK", "OK"));
    }
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
