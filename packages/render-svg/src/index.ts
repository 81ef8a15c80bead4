export { renderSceneSvg, renderRoomOverlaySvg } from "./render-svg.js";
export type { SvgRenderOptions } from "./render-svg.js";
export { SvgDocument } from "./svg-document.js";
export { SvgDrawingContext } from "./svg-drawing-context.js";
export type { DrawingContext, StyleOpts, TextOpts } from "./drawing-context.js";
export { createTransform, toSvg, scaleValue } from "./coordinate-transform.js";
export type { TransformContext } from "./coordinate-transform.js";
