import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/** A compiled validator; a type guard for the schema's document type. */
export type ValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

type SchemaCompiler = {
  compile: <T = unknown>(schema: unknown) => ValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

// ajv's CommonJS default export resolves to the module object under NodeNext.
function createCompiler(): SchemaCompiler {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): SchemaCompiler };
  const ajv = new AjvCtor({ allErrors: true, strict: true });
  (addFormats as unknown as (ajv: SchemaCompiler) => void)(ajv);
  return ajv;
}

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: SchemaCompiler | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "metrics.schema.json" → "metrics"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = createCompiler();
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  private instance(): SchemaCompiler {
    if (!this.ajv) {
      this.ajv = createCompiler();
    }
    return this.ajv;
  }

  /** Compile a validator for the given schema name. Ajv caches by schema object. */
  async getValidator<T = unknown>(name: string): Promise<ValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    return this.instance().compile<T>(entry.schema);
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.errorsText(validate.errors),
    };
  }

  errorsText(errors: unknown): string {
    if (!this.ajv) return "validation failed";
    return this.ajv.errorsText(errors);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Version from the `$id` suffix, e.g. ".../metrics@1.0.0". */
function extractVersion(schema: unknown): string | null {
  if (!isRecord(schema) || typeof schema.$id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
  return m ? m[1] : null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}
