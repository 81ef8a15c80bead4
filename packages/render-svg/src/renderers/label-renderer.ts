import type { SceneRoom } from "@r2vscene/core";
import { scaleValue, toSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext } from "../drawing-context.js";

// Label font size in scene units (metres)
const LABEL_SIZE = 0.3;

/**
 * Room label at the room centroid: the room type, then the room id below.
 */
export function renderLabel(
  room: SceneRoom,
  ctx: TransformContext,
  dc: DrawingContext,
): void {
  const pos = toSvg(room.centroid, ctx);
  const fontSize = scaleValue(LABEL_SIZE, ctx);

  dc.text(pos, room.label, {
    fill: "#000",
    fontSize,
    textAnchor: "middle",
    dominantBaseline: "central",
  });
  dc.text({ x: pos.x, y: pos.y + fontSize * 1.2 }, room.id, {
    fill: "#555",
    fontSize: fontSize * 0.7,
    textAnchor: "middle",
    dominantBaseline: "central",
  });
}
