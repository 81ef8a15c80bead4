import { ConfigError, parseConfig } from "@r2vscene/core";
import { describe, expect, it } from "vitest";
import { configText } from "../src/commands/init.js";
import { defaultConfigTemplate } from "../src/templates/default-config.js";
import { minimalConfigTemplate } from "../src/templates/minimal-config.js";

describe("config templates", () => {
  it("default template is a valid config", () => {
    const config = parseConfig(defaultConfigTemplate);
    expect(config.scale_factor).toBe(0.01);
    expect(config.room_type_labels).toHaveLength(11);
    expect(config.excluded_room_labels).toEqual(["outside"]);
    expect(config.arch_defaults.window_min_y).toBe(0.9);
    expect(config.opening_classification).toBe("entrance");
  });

  it("minimal template relies on defaults", () => {
    const config = parseConfig(minimalConfigTemplate);
    expect(config.room_type_labels).toEqual([
      "living_room",
      "kitchen",
      "bedroom",
      "bathroom",
      "outside",
    ]);
    expect(config.default_wall_thickness).toBe(0.1);
  });
});

describe("configText", () => {
  it("prints the template unchanged by default", () => {
    expect(configText({ template: "minimal" })).toBe(minimalConfigTemplate);
  });

  it("writes the scale factor override into the template", () => {
    expect(configText({ template: "minimal", scaleFactor: "0.02" })).toBe(
      "scale_factor: 0.02\nroom_type_labels: [living_room, kitchen, bedroom, bathroom, outside]\n",
    );
  });

  it("prints the resolved settings", () => {
    const text = configText({ template: "minimal", resolved: true });
    expect(text).toContain("opening_classification: detector\n");
    expect(parseConfig(text)).toEqual(parseConfig(minimalConfigTemplate));
  });

  it("rejects unknown templates and invalid overrides", () => {
    expect(() => configText({ template: "villa" })).toThrow(ConfigError);
    expect(() => configText({ template: "default", scaleFactor: "-1" })).toThrow(
      ConfigError,
    );
  });
});
