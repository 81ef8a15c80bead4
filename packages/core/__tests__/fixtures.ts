import { IssueCollector } from "../src/errors.js";
import { resolveConfig } from "../src/parser/config-parser.js";
import { normalizeDetectorOutput } from "../src/resolver/coordinate-normalizer.js";
import { extractFaces } from "../src/resolver/face-extractor.js";
import { buildWallGraph } from "../src/resolver/wall-graph-builder.js";
import type {
  ConverterConfig,
  ConverterConfigInput,
  DetectorIcon,
  DetectorOutput,
  DetectorWall,
} from "../src/types/config.js";
import type {
  FaceExtraction,
  NormalizedFloorplan,
  WallGraph,
} from "../src/types/geometry.js";

export const LABELS = ["living_room", "kitchen", "bedroom", "outside"];

/** Unit scale, no flip: metric coordinates equal pixel coordinates. */
export function makeConfig(
  overrides: Partial<ConverterConfigInput> = {},
): ConverterConfig {
  return resolveConfig({
    scale_factor: 1,
    room_type_labels: LABELS,
    axis: { flip_y: false },
    ...overrides,
  });
}

export function wall(
  a: number,
  b: number,
  labels?: DetectorWall["labels"],
): DetectorWall {
  return labels ? { corners: [a, b], labels } : { corners: [a, b] };
}

export function icon(
  cls: string,
  x_min: number,
  y_min: number,
  x_max: number,
  y_max: number,
): DetectorIcon {
  return { class: cls, box: { x_min, y_min, x_max, y_max } };
}

/**
 * Single 4 x 4 room:
 *
 *   3 ---- 2
 *   |      |
 *   0 ---- 1
 */
export function squareRoom(icons: DetectorIcon[] = []): DetectorOutput {
  return {
    corners: [
      [0, 0],
      [4, 0],
      [4, 4],
      [0, 4],
    ],
    walls: [wall(0, 1), wall(1, 2), wall(2, 3), wall(3, 0)],
    icons,
  };
}

/**
 * Two 4 x 4 rooms sharing the wall 1-4 (wall index 6):
 *
 *   5 ---- 4 ---- 3
 *   |      |      |
 *   0 ---- 1 ---- 2
 */
export function twoRooms(
  icons: DetectorIcon[] = [],
  walls?: DetectorWall[],
): DetectorOutput {
  return {
    corners: [
      [0, 0],
      [4, 0],
      [8, 0],
      [8, 4],
      [4, 4],
      [0, 4],
    ],
    walls: walls ?? [
      wall(0, 1),
      wall(1, 2),
      wall(2, 3),
      wall(3, 4),
      wall(4, 5),
      wall(5, 0),
      wall(1, 4),
    ],
    icons,
  };
}

/** 2 x 2 grid of 2 x 2 cells; corner r * 3 + c sits at (2c, 2r). */
export function grid(): DetectorOutput {
  const corners: [number, number][] = [];
  for (let r = 0; r < 3; r++) {
    for (let c = 0; c < 3; c++) corners.push([2 * c, 2 * r]);
  }
  const walls: DetectorWall[] = [];
  for (let r = 0; r < 3; r++) {
    for (let c = 0; c < 2; c++) walls.push(wall(r * 3 + c, r * 3 + c + 1));
  }
  for (let c = 0; c < 3; c++) {
    for (let r = 0; r < 2; r++) walls.push(wall(r * 3 + c, (r + 1) * 3 + c));
  }
  return { corners, walls, icons: [] };
}

export interface Prepared {
  plan: NormalizedFloorplan;
  graph: WallGraph;
  extraction: FaceExtraction;
  issues: IssueCollector;
}

/** Run the pipeline up to face extraction. */
export function prepare(
  detector: DetectorOutput,
  config: ConverterConfig,
): Prepared {
  const issues = new IssueCollector();
  const plan = normalizeDetectorOutput(detector, config);
  const graph = buildWallGraph(plan.corners, plan.walls, config, issues);
  const extraction = extractFaces(graph, config, issues);
  return { plan, graph, extraction, issues };
}
