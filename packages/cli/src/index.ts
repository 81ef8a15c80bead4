import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { convertCommand } from "./commands/convert.js";
import { initCommand } from "./commands/init.js";

const program = new Command();

program
  .name("r2vscene")
  .description("Convert raster-to-vector floorplan detections into architecture scenes")
  .version("0.1.0");

program
  .command("convert <source> <output>")
  .description("Convert detector output into scene files in the output directory")
  .requiredOption("-c, --config <file>", "Converter config (YAML or JSON)")
  .option("--scale-factor <n>", "Metres per pixel (overrides the config)")
  .option("--scene-id <id>", "Scene id (default: source file name)")
  .option("--no-previews", "Skip the SVG sketches")
  .option("--skip-objects", "Do not write the object box file")
  .action(convertCommand);

program
  .command("check <source>")
  .description("Run the conversion and report errors and warnings")
  .requiredOption("-c, --config <file>", "Converter config (YAML or JSON)")
  .option("--scale-factor <n>", "Metres per pixel (overrides the config)")
  .action(checkCommand);

program
  .command("init")
  .description("Print a converter config template")
  .option("-t, --template <name>", "Template name (default, minimal)", "default")
  .option("--scale-factor <n>", "Metres per pixel to write into the template")
  .option("--resolved", "Print every setting with its default filled in")
  .action(initCommand);

program.parse();
