import { IssueCollector } from "../errors.js";
import { resolveConfig } from "../parser/config-parser.js";
import type { ConverterConfigInput, DetectorOutput } from "../types/config.js";
import type { ConversionResult } from "../types/geometry.js";
import { normalizeDetectorOutput } from "./coordinate-normalizer.js";
import { extractFaces } from "./face-extractor.js";
import { buildObjectBoxes } from "./object-resolver.js";
import { resolveOpenings } from "./opening-resolver.js";
import { assignRoomLabels } from "./room-labeler.js";
import { assembleScene } from "./scene-assembler.js";
import { buildWallGraph } from "./wall-graph-builder.js";

/**
 * Convert one floorplan's detector output into an architecture scene.
 *
 * The configuration is validated first (ConfigError). Malformed detector
 * input throws GeometryError. Everything else is recorded in
 * `diagnostics`, and the conversion carries on without the affected
 * element.
 */
export function convertFloorplan(
  detector: DetectorOutput,
  configInput: ConverterConfigInput,
): ConversionResult {
  const config = resolveConfig(configInput);
  const issues = new IssueCollector();

  const plan = normalizeDetectorOutput(detector, config);
  const graph = buildWallGraph(plan.corners, plan.walls, config, issues);
  const extraction = assignRoomLabels(
    graph,
    extractFaces(graph, config, issues),
    plan.roomLabels,
    config,
  );
  const { openings, unmatched } = resolveOpenings(
    plan.icons,
    graph,
    extraction,
    config,
    issues,
  );
  const objects = buildObjectBoxes(plan.icons, unmatched, config);
  const assembled = assembleScene(graph, extraction, openings, objects, config);

  const diagnostics = issues.toDiagnostics();
  return {
    ...assembled,
    diagnostics,
    status: diagnostics.errors.length === 0 ? "clean" : "anomalies",
  };
}
