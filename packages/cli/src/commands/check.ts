import { convertFloorplan } from "@r2vscene/core";
import { loadConfig, loadDetectorOutput } from "../load.js";
import { errorMessage, printDiagnostics } from "../report.js";

interface CheckOptions {
  config: string;
  scaleFactor?: string;
}

export function checkCommand(source: string, options: CheckOptions): void {
  try {
    const config = loadConfig(options);
    const result = convertFloorplan(loadDetectorOutput(source, config), config);
    const { errors, warnings } = result.diagnostics;

    if (errors.length === 0 && warnings.length === 0) {
      console.log(
        `✓ ${result.scene.rooms.length} room(s), ${result.scene.openings.length} opening(s). No issues found.`,
      );
      return;
    }

    printDiagnostics(result.diagnostics);
    console.log(
      `\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`,
    );

    if (errors.length > 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}
