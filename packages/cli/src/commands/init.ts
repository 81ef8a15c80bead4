import { ConfigError, parseConfig, withOverrides } from "@r2vscene/core";
import yaml from "js-yaml";
import { errorMessage } from "../report.js";
import { defaultConfigTemplate } from "../templates/default-config.js";
import { minimalConfigTemplate } from "../templates/minimal-config.js";

const templates: Record<string, string> = {
  default: defaultConfigTemplate,
  minimal: minimalConfigTemplate,
};

export interface InitOptions {
  template: string;
  scaleFactor?: string;
  resolved?: boolean;
}

/**
 * Config text printed by `init`. The template is validated first, with the
 * scale factor override applied; `resolved` prints every setting the
 * converter will use, defaults included, instead of the template.
 */
export function configText(options: InitOptions): string {
  const tmpl = templates[options.template];
  if (tmpl === undefined) {
    throw new ConfigError(
      `Unknown template: ${options.template}. Available: ${Object.keys(templates).join(", ")}`,
    );
  }

  let config = parseConfig(tmpl);
  if (options.scaleFactor !== undefined) {
    config = withOverrides(config, { scale_factor: Number(options.scaleFactor) });
  }

  if (options.resolved) {
    return yaml.dump(config, { lineWidth: -1 });
  }
  if (options.scaleFactor === undefined) return tmpl;
  return tmpl.replace(/^scale_factor:.*$/m, `scale_factor: ${config.scale_factor}`);
}

export function initCommand(options: InitOptions): void {
  try {
    process.stdout.write(configText(options));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}
