import type { Point } from "@r2vscene/core";

/**
 * Abstract drawing interface for rendering primitives. Coordinates are
 * already in output (SVG) space.
 */
export interface StyleOpts {
  stroke?: string;
  strokeWidth?: string;
  fill?: string;
  fillOpacity?: number;
  strokeDasharray?: string;
}

export interface TextOpts extends StyleOpts {
  fontSize?: number;
  fontFamily?: string;
  textAnchor?: "start" | "middle" | "end";
  dominantBaseline?: string;
}

export interface DrawingContext {
  line(a: Point, b: Point, opts?: StyleOpts): void;
  polygon(points: Point[], opts?: StyleOpts): void;
  /** Closed rings filled even-odd, so inner rings cut holes */
  rings(rings: Point[][], opts?: StyleOpts): void;
  arc(start: Point, radius: number, end: Point, sweepFlag: 0 | 1, opts?: StyleOpts): void;
  text(at: Point, content: string, opts?: TextOpts): void;
  openGroup(attrs?: Record<string, string>): void;
  closeGroup(): void;
  getOutput(): string;
}
