import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { aggregate } from "../src/commands/aggregate.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { listProfiles, validateAll, type ValidateResult } from "../src/commands/validate.js";
import { CONFIG_DIR, FIXED_NOW, FIXTURE_PROJECT, makeTmpDir, testConfig, testEnvironment } from "./helpers.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = makeTmpDir("validate");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function codes(res: ValidateResult): string[] {
  return res.ok ? [] : res.errors.map((e) => e.code);
}

describe("qametrics validate", () => {
  it("returns ok for the bundled config", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR });
    expect(res).toEqual({ ok: true });
  });

  it("lists profiles besides base", () => {
    expect(listProfiles(CONFIG_DIR)).toEqual(["gradle"]);
  });

  it("fails when the config dir is missing", async () => {
    const res = await validateAll({ configDir: path.join(tmpDir, "nope") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].message).toMatch(/Config directory not found/);
  });

  it("fails when base.yaml is missing", async () => {
    expect(codes(await validateAll({ configDir: tmpDir }))).toEqual(["CONFIG_BASE_MISSING"]);
  });

  it("names the profile that breaks the schema", async () => {
    fs.copyFileSync(path.join(CONFIG_DIR, "base.yaml"), path.join(tmpDir, "base.yaml"));
    fs.writeFileSync(path.join(tmpDir, "broken.yaml"), "target_dir: 5\n");
    const res = await validateAll({ configDir: tmpDir });
    expect(codes(res)).toEqual(["CONFIG_INVALID"]);
    if (!res.ok) expect(res.errors[0].message).toContain("(broken profile)");
  });

  it("accepts the output of an aggregate run", async () => {
    const root = path.join(tmpDir, "project");
    fs.cpSync(FIXTURE_PROJECT, root, { recursive: true });
    aggregate({
      rootDir: root,
      config: testConfig(),
      env: testEnvironment({ UPDATE_BADGES: "true" }),
      print: () => {},
      now: FIXED_NOW,
    });

    const res = await validateAll({
      configDir: CONFIG_DIR,
      metricsPath: path.join(root, "target/site/qa-dashboard/metrics.json"),
      badgesDir: path.join(root, "badges"),
    });
    expect(res).toEqual({ ok: true });
  });

  it("reports a missing metrics file", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, metricsPath: path.join(tmpDir, "metrics.json") });
    expect(codes(res)).toEqual(["METRICS_MISSING"]);
  });

  it("reports a metrics file that breaks the schema", async () => {
    const file = path.join(tmpDir, "metrics.json");
    fs.writeFileSync(file, JSON.stringify({ schemaVersion: 1 }));
    expect(codes(await validateAll({ configDir: CONFIG_DIR, metricsPath: file }))).toEqual(["METRICS_INVALID"]);
  });

  it("reports unreadable and invalid badges", async () => {
    const dir = path.join(tmpDir, "badges");
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, "a.json"), "{");
    fs.writeFileSync(path.join(dir, "b.json"), JSON.stringify({ schemaVersion: 1, label: "x", message: "y", color: "red" }));
    fs.writeFileSync(path.join(dir, "c.json"), JSON.stringify({ schemaVersion: 1, label: "x", message: "y", color: "DC2626" }));
    expect(codes(await validateAll({ configDir: CONFIG_DIR, badgesDir: dir }))).toEqual([
      "BADGE_JSON_INVALID",
      "BADGE_INVALID",
    ]);
  });

  it("reports an empty badge directory", async () => {
    expect(codes(await validateAll({ configDir: CONFIG_DIR, badgesDir: tmpDir }))).toEqual(["BADGES_EMPTY"]);
  });
});

describe("exit-codes", () => {
  it("defines the CLI exit codes", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, VALIDATION_FAILED: 1, INVALID_ARGS: 3 });
  });
});
