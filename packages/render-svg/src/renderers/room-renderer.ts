import type { SceneRoom } from "@r2vscene/core";
import { toSvg, type TransformContext } from "../coordinate-transform.js";
import type { DrawingContext, StyleOpts } from "../drawing-context.js";

export const ROOM_FILL = "#f2f2f2";
export const FOCUS_FILL = "#f5b041";
export const NEIGHBOR_FILL = "#aed6f1";

/** Fill a room polygon, leaving its holes open. */
export function renderRoom(
  room: SceneRoom,
  ctx: TransformContext,
  dc: DrawingContext,
  style: StyleOpts = { fill: ROOM_FILL, stroke: "none" },
): void {
  dc.openGroup({ class: "room", "data-id": room.id });
  if (room.holes.length === 0) {
    dc.polygon(
      room.polygon.map((p) => toSvg(p, ctx)),
      style,
    );
  } else {
    dc.rings(
      [room.polygon, ...room.holes].map((ring) => ring.map((p) => toSvg(p, ctx))),
      style,
    );
  }
  dc.closeGroup();
}
