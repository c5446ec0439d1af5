import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "QA_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/** Top-level keys a QA_ variable may override. Other QA_ variables are ignored. */
export const ENV_OVERRIDE_KEYS: readonly string[] = ["schema_version", "target_dir", "badges_dir", "runtime_label"];

/** Apply QA_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  const result: ConfigTree = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // QA_TARGET_DIR → target_dir
    const name = key.slice(ENV_PREFIX.length).toLowerCase();
    if (ENV_OVERRIDE_KEYS.includes(name)) result[name] = value;
  }
  return result;
}

export type LoadConfigOptions = {
  /** Loads `<configDir>/<profile>.yaml` over base.yaml. */
  profile?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← <profile>.yaml ← QA_* variables.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ConfigTree {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.profile) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.profile}.yaml`)));
  }
  return applyEnvOverrides(merged, opts.env ?? {});
}
