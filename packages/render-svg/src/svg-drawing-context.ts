import type { Point } from "@r2vscene/core";
import type { DrawingContext, StyleOpts, TextOpts } from "./drawing-context.js";
import { escapeXml, fmt } from "./svg-document.js";

/**
 * SVG implementation of DrawingContext.
 * Builds SVG elements as string output.
 */
export class SvgDrawingContext implements DrawingContext {
  private parts: string[] = [];

  line(a: Point, b: Point, opts?: StyleOpts): void {
    this.parts.push(
      `<line x1="${fmt(a.x)}" y1="${fmt(a.y)}" x2="${fmt(b.x)}" y2="${fmt(b.y)}"${styleAttrs(opts)}/>`,
    );
  }

  polygon(points: Point[], opts?: StyleOpts): void {
    const pointsStr = points.map((p) => `${fmt(p.x)},${fmt(p.y)}`).join(" ");
    this.parts.push(`<polygon points="${pointsStr}"${styleAttrs(opts)}/>`);
  }

  rings(rings: Point[][], opts?: StyleOpts): void {
    const d = rings
      .filter((ring) => ring.length > 0)
      .map(
        (ring) =>
          `M ${ring.map((p) => `${fmt(p.x)},${fmt(p.y)}`).join(" L ")} Z`,
      )
      .join(" ");
    this.parts.push(`<path d="${d}" fill-rule="evenodd"${styleAttrs(opts)}/>`);
  }

  arc(start: Point, radius: number, end: Point, sweepFlag: 0 | 1, opts?: StyleOpts): void {
    this.parts.push(
      `<path d="M ${fmt(start.x)},${fmt(start.y)} A ${fmt(radius)},${fmt(radius)} 0 0,${sweepFlag} ${fmt(end.x)},${fmt(end.y)}"${styleAttrs(opts)}/>`,
    );
  }

  text(at: Point, content: string, opts?: TextOpts): void {
    this.parts.push(
      `<text x="${fmt(at.x)}" y="${fmt(at.y)}"${textAttrs(opts)}>${escapeXml(content)}</text>`,
    );
  }

  openGroup(attrs?: Record<string, string>): void {
    if (!attrs || Object.keys(attrs).length === 0) {
      this.parts.push("<g>");
    } else {
      const attrStr = Object.entries(attrs)
        .map(([k, v]) => `${k}="${escapeXml(v)}"`)
        .join(" ");
      this.parts.push(`<g ${attrStr}>`);
    }
  }

  closeGroup(): void {
    this.parts.push("</g>");
  }

  getOutput(): string {
    return this.parts.join("\n");
  }
}

function styleAttrs(opts?: StyleOpts): string {
  if (!opts) return "";
  const attrs: string[] = [];
  if (opts.stroke !== undefined) attrs.push(`stroke="${opts.stroke}"`);
  if (opts.strokeWidth !== undefined) attrs.push(`stroke-width="${opts.strokeWidth}"`);
  if (opts.fill !== undefined) attrs.push(`fill="${opts.fill}"`);
  if (opts.fillOpacity !== undefined) attrs.push(`fill-opacity="${fmt(opts.fillOpacity)}"`);
  if (opts.strokeDasharray !== undefined) attrs.push(`stroke-dasharray="${opts.strokeDasharray}"`);
  return attrs.length > 0 ? " " + attrs.join(" ") : "";
}

function textAttrs(opts?: TextOpts): string {
  if (!opts) return "";
  const attrs: string[] = [];
  const style = styleAttrs(opts);
  if (style) attrs.push(style.trimStart());
  if (opts.fontFamily !== undefined) attrs.push(`font-family="${opts.fontFamily}"`);
  if (opts.fontSize !== undefined) attrs.push(`font-size="${fmt(opts.fontSize)}"`);
  if (opts.textAnchor !== undefined) attrs.push(`text-anchor="${opts.textAnchor}"`);
  if (opts.dominantBaseline !== undefined) attrs.push(`dominant-baseline="${opts.dominantBaseline}"`);
  return attrs.length > 0 ? " " + attrs.join(" ") : "";
}
