import type { Point, SceneOpening, SceneWall } from "@r2vscene/core";
import { toSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";

const WALL_STYLE = { fill: "#000", stroke: "none" };
const GAP_EPSILON = 1e-6;

/**
 * The pieces of a wall left standing between its openings, as offset
 * intervals along the wall.
 */
export function solidIntervals(
  wall: SceneWall,
  openings: SceneOpening[],
): [number, number][] {
  const gaps = openings
    .filter((o) => o.hostWallId === wall.id)
    .map((o): [number, number] => [o.startOffset, o.endOffset])
    .sort((a, b) => a[0] - b[0]);

  const intervals: [number, number][] = [];
  let cursor = 0;
  for (const [start, end] of gaps) {
    if (start - cursor > GAP_EPSILON) intervals.push([cursor, start]);
    cursor = Math.max(cursor, end);
  }
  if (wall.length - cursor > GAP_EPSILON) intervals.push([cursor, wall.length]);
  return intervals;
}

/**
 * Corners of the wall band between two offsets, in scene coordinates.
 */
export function wallBand(wall: SceneWall, from: number, to: number): Point[] {
  if (wall.length === 0) return [];
  const ux = (wall.end.x - wall.start.x) / wall.length;
  const uy = (wall.end.y - wall.start.y) / wall.length;
  const half = wall.thickness / 2;
  const nx = -uy * half;
  const ny = ux * half;
  const a = { x: wall.start.x + ux * from, y: wall.start.y + uy * from };
  const b = { x: wall.start.x + ux * to, y: wall.start.y + uy * to };
  return [
    { x: a.x + nx, y: a.y + ny },
    { x: b.x + nx, y: b.y + ny },
    { x: b.x - nx, y: b.y - ny },
    { x: a.x - nx, y: a.y - ny },
  ];
}

/**
 * Render every wall as a filled band, split around its openings.
 */
export function renderWalls(
  walls: SceneWall[],
  openings: SceneOpening[],
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  dc.openGroup({ class: "walls" });
  for (const wall of walls) {
    dc.openGroup({ class: "wall", "data-id": wall.id });
    for (const [from, to] of solidIntervals(wall, openings)) {
      const band = wallBand(wall, from, to);
      dc.polygon(
        band.map((p) => toSvg(p, ctx)),
        WALL_STYLE,
      );
    }
    dc.closeGroup();
  }
  dc.closeGroup();
}
