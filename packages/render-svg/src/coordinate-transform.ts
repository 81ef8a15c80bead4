import type { Point, Rect } from "@r2vscene/core";

export interface TransformContext {
  sceneBounds: Rect;
  margin: number;
  scale: number;
  svgWidth: number;
  svgHeight: number;
}

/**
 * Create a transform context for converting scene coordinates to SVG
 * coordinates. The scene is y-up; SVG is y-down. A zero-size scene still
 * gets a drawable area from the margin.
 */
export function createTransform(
  bounds: Rect,
  svgWidth: number,
  margin: number,
): TransformContext {
  const totalWidth = bounds.width + 2 * margin;
  const totalHeight = bounds.height + 2 * margin;

  const scale = totalWidth > 0 ? svgWidth / totalWidth : 1;
  const svgHeight = totalHeight * scale;

  return {
    sceneBounds: bounds,
    margin,
    scale,
    svgWidth,
    svgHeight,
  };
}

export function toSvg(point: Point, ctx: TransformContext): Point {
  return {
    x: (point.x - ctx.sceneBounds.x + ctx.margin) * ctx.scale,
    y: ctx.svgHeight - (point.y - ctx.sceneBounds.y + ctx.margin) * ctx.scale,
  };
}

/** Scale a length from scene units to SVG pixels. */
export function scaleValue(value: number, ctx: TransformContext): number {
  return value * ctx.scale;
}
