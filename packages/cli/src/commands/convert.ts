import { mkdirSync, writeFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import {
  convertFloorplan,
  toObjectAabbs,
  toSceneState,
} from "@r2vscene/core";
import { renderRoomOverlaySvg, renderSceneSvg } from "@r2vscene/render-svg";
import { loadConfig, loadDetectorOutput } from "../load.js";
import { errorMessage, printDiagnostics } from "../report.js";

interface ConvertOptions {
  config: string;
  scaleFactor?: string;
  sceneId?: string;
  previews?: boolean;
  skipObjects?: boolean;
}

function writeJson(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
  console.log(`Wrote: ${path}`);
}

export function convertCommand(
  source: string,
  output: string,
  options: ConvertOptions,
): void {
  try {
    const config = loadConfig(options);
    const result = convertFloorplan(loadDetectorOutput(source, config), config);
    const sceneId = options.sceneId ?? basename(source, extname(source));

    mkdirSync(output, { recursive: true });
    writeJson(
      join(output, `${sceneId}.scene.json`),
      toSceneState(result, config, sceneId),
    );
    if (!options.skipObjects) {
      writeJson(
        join(output, `${sceneId}.objectaabb.json`),
        toObjectAabbs(result.objects, config),
      );
    }
    writeJson(join(output, `${sceneId}.arch.json`), {
      id: sceneId,
      status: result.status,
      scene: result.scene,
      diagnostics: result.diagnostics,
    });

    if (options.previews !== false) {
      const planPath = join(output, "plan.svg");
      writeFileSync(planPath, renderSceneSvg(result.scene), "utf-8");
      for (const overlay of result.overlays) {
        writeFileSync(
          join(output, `${overlay.roomId}.svg`),
          renderRoomOverlaySvg(result.scene, overlay),
          "utf-8",
        );
      }
      console.log(
        `Rendered: ${planPath} and ${result.overlays.length} room sketch(es)`,
      );
    }

    printDiagnostics(result.diagnostics);
    console.log(
      `\nConverted ${sceneId}: ${result.scene.rooms.length} room(s), ${result.scene.openings.length} opening(s), ${result.objects.length} object(s) [${result.status}]`,
    );
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}
