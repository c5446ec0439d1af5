import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { diag, errorMessage, type Diagnostic } from "../log/diagnostics.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

function listFiles(dir: string, ...extensions: string[]): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && extensions.some((ext) => e.name.endsWith(ext)))
    .map((e) => e.name)
    .sort();
}

/** Profile names present in the config dir, base.yaml excluded. */
export function listProfiles(configDir: string): string[] {
  return listFiles(configDir, ".yml", ".yaml")
    .map((f) => f.replace(/\.ya?ml$/, ""))
    .filter((name) => name !== "base");
}

async function checkConfig(
  registry: SchemaRegistry,
  configDir: string,
  profile: string | undefined,
): Promise<Diagnostic[]> {
  const label = profile ? `${profile} profile` : "base";
  let merged: Record<string, unknown>;
  try {
    merged = loadConfig({ configDir, profile });
  } catch (e) {
    return [diag("error", "CONFIG_READ_FAILED", `Failed to read config (${label}): ${errorMessage(e)}`, { path: configDir })];
  }
  const res = await registry.validate("config", merged);
  if (res.valid) return [];
  return [diag("error", "CONFIG_INVALID", `Config invalid (${label}): ${res.errors}`, { path: configDir })];
}

function readJson(filePath: string, code: string): { ok: true; doc: unknown } | { ok: false; error: Diagnostic } {
  try {
    const doc: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return { ok: true, doc };
  } catch (e) {
    return {
      ok: false,
      error: diag("error", code, `Invalid JSON (${path.basename(filePath)}): ${errorMessage(e)}`, { path: filePath }),
    };
  }
}

async function checkMetrics(registry: SchemaRegistry, metricsPath: string): Promise<Diagnostic[]> {
  if (!fs.existsSync(metricsPath)) {
    return [diag("error", "METRICS_MISSING", `Metrics file not found: ${metricsPath}`, { path: metricsPath })];
  }
  const read = readJson(metricsPath, "METRICS_JSON_INVALID");
  if (!read.ok) return [read.error];
  const res = await registry.validate("metrics", read.doc);
  if (res.valid) return [];
  return [diag("error", "METRICS_INVALID", `Metrics invalid: ${res.errors}`, { path: metricsPath })];
}

async function checkBadges(registry: SchemaRegistry, badgesDir: string): Promise<Diagnostic[]> {
  if (!fs.existsSync(badgesDir)) {
    return [diag("error", "BADGES_DIR_MISSING", `Badge directory not found: ${badgesDir}`, { path: badgesDir })];
  }
  const files = listFiles(badgesDir, ".json");
  if (files.length === 0) {
    return [diag("error", "BADGES_EMPTY", `No badge JSON found in ${badgesDir}`, { path: badgesDir })];
  }

  const errors: Diagnostic[] = [];
  for (const file of files) {
    const filePath = path.join(badgesDir, file);
    const read = readJson(filePath, "BADGE_JSON_INVALID");
    if (!read.ok) {
      errors.push(read.error);
      continue;
    }
    const res = await registry.validate("badge", read.doc);
    if (!res.valid) {
      errors.push(diag("error", "BADGE_INVALID", `Badge invalid (${file}): ${res.errors}`, { path: filePath }));
    }
  }
  return errors;
}

/**
 * Check the layered config (base plus every profile, or just the one named)
 * and, when given, a written metrics.json and badge directory.
 */
export async function validateAll(opts: {
  configDir: string;
  profile?: string;
  metricsPath?: string;
  badgesDir?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir);
  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let registry: SchemaRegistry;
  try {
    registry = await createRegistry(opts.schemaDir);
  } catch (e) {
    return { ok: false, errors: [diag("error", "SCHEMA_LOAD_FAILED", errorMessage(e))] };
  }

  const errors: Diagnostic[] = [];
  if (!fs.existsSync(path.join(configDir, "base.yaml"))) {
    errors.push(diag("error", "CONFIG_BASE_MISSING", `Missing base.yaml in ${configDir}`, { path: configDir }));
  } else {
    const profiles = opts.profile ? [opts.profile] : listProfiles(configDir);
    errors.push(...(await checkConfig(registry, configDir, undefined)));
    for (const profile of profiles) {
      errors.push(...(await checkConfig(registry, configDir, profile)));
    }
  }

  if (opts.metricsPath) errors.push(...(await checkMetrics(registry, path.resolve(opts.metricsPath))));
  if (opts.badgesDir) errors.push(...(await checkBadges(registry, path.resolve(opts.badgesDir))));

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}
