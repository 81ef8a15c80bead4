import type { Point, SceneOpening, SceneWall } from "@r2vscene/core";
import { scaleValue, toSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";
import { wallBand } from "./wall-renderer.js";

const OPENING_STYLE = { stroke: "#000", strokeWidth: "1", fill: "none" };
const EXTERIOR_DOOR_COLOR = "#c0392b";
const INTERIOR_DOOR_COLOR = "#2471a3";

function pointAt(wall: SceneWall, offset: number): Point {
  const t = wall.length === 0 ? 0 : offset / wall.length;
  return {
    x: wall.start.x + (wall.end.x - wall.start.x) * t,
    y: wall.start.y + (wall.end.y - wall.start.y) * t,
  };
}

/**
 * Door: leaf drawn perpendicular to the wall at the opening start, plus a
 * quarter-circle swing to the opening end. Exterior doors are red,
 * interior ones blue.
 */
export function renderDoor(
  opening: SceneOpening,
  wall: SceneWall,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const width = opening.endOffset - opening.startOffset;
  if (width <= 0 || wall.length === 0) return;

  const hinge = pointAt(wall, opening.startOffset);
  const closed = pointAt(wall, opening.endOffset);
  const nx = -(wall.end.y - wall.start.y) / wall.length;
  const ny = (wall.end.x - wall.start.x) / wall.length;
  const open = { x: hinge.x + nx * width, y: hinge.y + ny * width };

  const color =
    opening.kind === "interior" ? INTERIOR_DOOR_COLOR : EXTERIOR_DOOR_COLOR;
  const style = { ...OPENING_STYLE, stroke: color };
  const hingeSvg = toSvg(hinge, ctx);
  const openSvg = toSvg(open, ctx);

  dc.openGroup({ class: "opening door", "data-id": opening.id });
  dc.line(hingeSvg, openSvg, style);
  // Clockwise in scene space, counter-clockwise once y is flipped.
  dc.arc(openSvg, scaleValue(width, ctx), toSvg(closed, ctx), 0, style);
  dc.closeGroup();
}

/**
 * Window: the outline of the wall band across the opening, with a line
 * along the centre.
 */
export function renderWindow(
  opening: SceneOpening,
  wall: SceneWall,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const band = wallBand(wall, opening.startOffset, opening.endOffset);
  if (band.length === 0) return;

  dc.openGroup({ class: "opening window", "data-id": opening.id });
  dc.polygon(
    band.map((p) => toSvg(p, ctx)),
    OPENING_STYLE,
  );
  dc.line(
    toSvg(pointAt(wall, opening.startOffset), ctx),
    toSvg(pointAt(wall, opening.endOffset), ctx),
    OPENING_STYLE,
  );
  dc.closeGroup();
}

export function renderOpenings(
  openings: SceneOpening[],
  walls: SceneWall[],
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const wallById = new Map(walls.map((w) => [w.id, w]));
  for (const opening of openings) {
    const wall = wallById.get(opening.hostWallId);
    if (!wall) continue;
    if (opening.type === "door") {
      renderDoor(opening, wall, ctx, dc);
    } else {
      renderWindow(opening, wall, ctx, dc);
    }
  }
}
