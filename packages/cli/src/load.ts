import { readFileSync } from "node:fs";
import {
  parseConfig,
  parseDetectorOutput,
  withOverrides,
  type ConverterConfig,
  type DetectorOutput,
} from "@r2vscene/core";

export interface LoadOptions {
  config: string;
  scaleFactor?: string;
}

/**
 * Read the converter config and apply command-line overrides.
 */
export function loadConfig(options: LoadOptions): ConverterConfig {
  const config = parseConfig(readFileSync(options.config, "utf-8"));
  if (options.scaleFactor === undefined) return config;
  return withOverrides(config, { scale_factor: Number(options.scaleFactor) });
}

export function loadDetectorOutput(
  source: string,
  config: ConverterConfig,
): DetectorOutput {
  return parseDetectorOutput(
    readFileSync(source, "utf-8"),
    config.room_type_labels,
  );
}
