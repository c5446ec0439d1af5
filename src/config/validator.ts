import { createRegistry } from "../schema/registry.js";
import type { QaConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: QaConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export async function validateConfig(config: unknown, schemaDir?: string): Promise<ConfigValidationResult> {
  const registry = await createRegistry(schemaDir);
  const validate = await registry.getValidator<QaConfig>("config");
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: registry.errorsText(validate.errors) };
}
