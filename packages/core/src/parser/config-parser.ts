import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import type { ConverterConfig } from "../types/config.js";
import { ConverterConfigSchema } from "../types/config.js";

/**
 * Parse a JSON or YAML string into a validated ConverterConfig.
 * Detects format automatically (tries JSON first, then YAML).
 * Throws a ConfigError if the input is invalid.
 */
export function parseConfig(input: string): ConverterConfig {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new ConfigError(
        `Failed to parse config as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  return resolveConfig(raw);
}

/**
 * Validate a config value and fill in defaults. Accepts anything so that
 * both parsed files and programmatic objects go through the same checks.
 */
export function resolveConfig(raw: unknown): ConverterConfig {
  const result = ConverterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid converter config:\n${issues}`);
  }

  return result.data;
}

/**
 * Return a copy of `config` with overrides applied (e.g. a CLI scale
 * factor), re-validated.
 */
export function withOverrides(
  config: ConverterConfig,
  overrides: Partial<ConverterConfig>,
): ConverterConfig {
  return resolveConfig({ ...config, ...overrides });
}
