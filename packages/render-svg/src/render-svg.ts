import type { ArchitectureScene, RoomOverlay } from "@r2vscene/core";
import { createTransform, toSvg } from "./coordinate-transform.js";
import { renderLabel } from "./renderers/label-renderer.js";
import { renderOpenings } from "./renderers/opening-renderer.js";
import {
  FOCUS_FILL,
  NEIGHBOR_FILL,
  ROOM_FILL,
  renderRoom,
} from "./renderers/room-renderer.js";
import { renderWalls } from "./renderers/wall-renderer.js";
import { SvgDocument } from "./svg-document.js";
import { SvgDrawingContext } from "./svg-drawing-context.js";

export interface SvgRenderOptions {
  /** Output width in pixels; height follows the scene's aspect ratio */
  width?: number;
  background?: string;
  /** Margin around the scene bounds, in scene units */
  margin?: number;
  showLabels?: boolean;
}

const DEFAULT_OPTIONS = {
  width: 1000,
  background: "white",
  margin: 1,
  showLabels: true,
} as const;

function createDocument(scene: ArchitectureScene, options?: SvgRenderOptions) {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const ctx = createTransform(scene.bounds, opts.width, opts.margin);
  const doc = new SvgDocument(
    { x: 0, y: 0, width: ctx.svgWidth, height: ctx.svgHeight },
    opts.background,
  );
  doc.setStyle("text { font-family: sans-serif; }");
  return { opts, ctx, doc };
}

/**
 * Overview sketch of a scene: room fills, walls split around openings,
 * door and window symbols, and room labels.
 */
export function renderSceneSvg(
  scene: ArchitectureScene,
  options?: SvgRenderOptions,
): string {
  const { opts, ctx, doc } = createDocument(scene, options);

  const roomDc = new SvgDrawingContext();
  for (const room of scene.rooms) {
    renderRoom(room, ctx, roomDc);
  }
  doc.addToLayer("rooms", roomDc.getOutput());

  const wallDc = new SvgDrawingContext();
  renderWalls(scene.walls, scene.openings, ctx, wallDc);
  doc.addToLayer("structural", wallDc.getOutput());

  const openingDc = new SvgDrawingContext();
  renderOpenings(scene.openings, scene.walls, ctx, openingDc);
  doc.addToLayer("openings", openingDc.getOutput());

  if (opts.showLabels) {
    const labelDc = new SvgDrawingContext();
    for (const room of scene.rooms) {
      renderLabel(room, ctx, labelDc);
    }
    doc.addToLayer("labels", labelDc.getOutput());
  }

  return doc.toString();
}

/**
 * Per-room sketch: the focus room highlighted, rooms reachable through a
 * door shaded, and the focus room's opening markers drawn on top.
 */
export function renderRoomOverlaySvg(
  scene: ArchitectureScene,
  overlay: RoomOverlay,
  options?: SvgRenderOptions,
): string {
  const { opts, ctx, doc } = createDocument(scene, options);

  const roomDc = new SvgDrawingContext();
  for (const room of scene.rooms) {
    let fill: string = ROOM_FILL;
    if (room.id === overlay.roomId) fill = FOCUS_FILL;
    else if (overlay.doorNeighborRoomIds.includes(room.id)) fill = NEIGHBOR_FILL;
    renderRoom(room, ctx, roomDc, { fill, stroke: "none" });
  }
  doc.addToLayer("rooms", roomDc.getOutput());

  const wallDc = new SvgDrawingContext();
  renderWalls(scene.walls, scene.openings, ctx, wallDc);
  doc.addToLayer("structural", wallDc.getOutput());

  const markerDc = new SvgDrawingContext();
  for (const marker of overlay.markers) {
    markerDc.line(toSvg(marker.start, ctx), toSvg(marker.end, ctx), {
      stroke: marker.type === "door" ? "#c0392b" : "#2471a3",
      strokeWidth: "4",
    });
  }
  doc.addToLayer("markers", markerDc.getOutput());

  if (opts.showLabels) {
    const labelDc = new SvgDrawingContext();
    for (const room of scene.rooms) {
      if (room.id === overlay.roomId || overlay.neighborRoomIds.includes(room.id)) {
        renderLabel(room, ctx, labelDc);
      }
    }
    doc.addToLayer("labels", labelDc.getOutput());
  }

  return doc.toString();
}
