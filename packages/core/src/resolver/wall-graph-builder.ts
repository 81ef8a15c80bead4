import type { IssueCollector } from "../errors.js";
import { GeometryError } from "../errors.js";
import { chebyshevDistance, distance } from "../geometry/polygon.js";
import type { ConverterConfig } from "../types/config.js";
import type {
  NormalizedWall,
  Point,
  SideLabels,
  WallGraph,
  WallSegment,
} from "../types/geometry.js";

interface DraftSegment {
  start: number;
  end: number;
  thickness: number;
  sideLabels: SideLabels;
  sourceIndex: number;
}

/**
 * Assemble corners and wall segments into the planar wall graph.
 *
 * Corners closer than `corner_snap_tolerance` become one node, degenerate
 * and duplicate segments are dropped with a warning, nearly axis-aligned
 * walls are optionally straightened (merging any nodes that meet), and
 * walls are split where another wall ends on them (T-junctions) so that
 * faces can be traced.
 */
export function buildWallGraph(
  corners: Point[],
  walls: NormalizedWall[],
  config: ConverterConfig,
  issues: IssueCollector,
): WallGraph {
  validateCornerRefs(corners, walls);

  const tolerance = config.corner_snap_tolerance;
  const { nodes, cornerToNode } = snapCorners(corners, tolerance);

  let segments: DraftSegment[] = [];
  walls.forEach((wall, sourceIndex) => {
    addSegment(
      segments,
      {
        start: cornerToNode[wall.corners[0]],
        end: cornerToNode[wall.corners[1]],
        thickness: wall.thickness ?? config.default_wall_thickness,
        sideLabels: wall.sideLabels,
        sourceIndex,
      },
      issues,
    );
  });

  if (config.straighten_walls.enabled) {
    straightenWalls(nodes, segments, config, issues);
    segments = mergeCoincidentNodes(nodes, segments, tolerance, issues);
  }

  if (config.split_walls.enabled) {
    segments = splitWalls(nodes, segments, config, issues);
  }

  return finalizeGraph(nodes, segments);
}

function validateCornerRefs(corners: Point[], walls: NormalizedWall[]): void {
  walls.forEach((wall, i) => {
    for (const ref of wall.corners) {
      if (!Number.isInteger(ref) || ref < 0 || ref >= corners.length) {
        throw new GeometryError(
          `Wall ${i} references corner ${ref}, but only ${corners.length} corners exist`,
          { elementId: `wall-input-${i}` },
        );
      }
    }
  });
}

/**
 * Visit corners in input order; each joins the closest node within the
 * tolerance (the earliest on ties) or starts a new node at its position.
 */
export function snapCorners(
  corners: Point[],
  tolerance: number,
): { nodes: Point[]; cornerToNode: number[] } {
  const nodes: Point[] = [];
  const cornerToNode: number[] = [];

  for (const corner of corners) {
    let best = -1;
    let bestDistance = Infinity;
    nodes.forEach((node, i) => {
      const d = chebyshevDistance(node, corner);
      if (d <= tolerance && d < bestDistance) {
        best = i;
        bestDistance = d;
      }
    });

    if (best === -1) {
      nodes.push({ x: corner.x, y: corner.y });
      best = nodes.length - 1;
    }
    cornerToNode.push(best);
  }

  return { nodes, cornerToNode };
}

function pairKey(a: number, b: number): string {
  return a < b ? `${a}-${b}` : `${b}-${a}`;
}

function addSegment(
  segments: DraftSegment[],
  draft: DraftSegment,
  issues: IssueCollector,
): boolean {
  if (draft.start === draft.end) {
    issues.warn(
      "degenerate-wall",
      `Wall ${draft.sourceIndex} collapses to a single corner after snapping or straightening and was dropped`,
      {
        elementId: `wall-input-${draft.sourceIndex}`,
        suggestion: "Lower corner_snap_tolerance if short walls are expected",
      },
    );
    return false;
  }

  const key = pairKey(draft.start, draft.end);
  if (segments.some((s) => pairKey(s.start, s.end) === key)) {
    issues.warn(
      "duplicate-wall",
      `Wall ${draft.sourceIndex} duplicates an existing wall between the same corners and was dropped`,
      { elementId: `wall-input-${draft.sourceIndex}` },
    );
    return false;
  }

  segments.push(draft);
  return true;
}

/**
 * Move the end node of nearly axis-aligned walls onto the start node's
 * axis. Moving a node drags every wall that shares it.
 */
function straightenWalls(
  nodes: Point[],
  segments: DraftSegment[],
  config: ConverterConfig,
  issues: IssueCollector,
): void {
  const { cutoff_gradient: cutoff, max_iter: maxIter } =
    config.straighten_walls;

  const inclination = (s: DraftSegment): "x" | "y" | null => {
    const a = nodes[s.start];
    const b = nodes[s.end];
    const len = distance(a, b);
    if (len === 0) return null;
    const rx = Math.abs(b.x - a.x) / len;
    if (rx > 0 && rx < cutoff) return "x";
    const ry = Math.abs(b.y - a.y) / len;
    if (ry > 0 && ry < cutoff) return "y";
    return null;
  };

  let iterations = 0;
  for (;;) {
    const found = segments.find((s) => inclination(s) !== null);
    if (!found) return;

    if (iterations >= maxIter) {
      issues.warn(
        "straighten-walls-truncated",
        `Wall straightening stopped after ${maxIter} iterations`,
        { suggestion: "Raise straighten_walls.max_iter or the input is oscillating" },
      );
      return;
    }

    const a = nodes[found.start];
    const b = nodes[found.end];
    nodes[found.end] =
      inclination(found) === "x" ? { x: a.x, y: b.y } : { x: b.x, y: a.y };
    iterations++;
  }
}

/**
 * Straightening can move a node onto another one. Segments are remapped to
 * the earliest node within the tolerance and re-added, so walls that now
 * collapse or overlap are dropped with the usual warnings. Nodes left
 * without walls stay in place and belong to no component.
 */
function mergeCoincidentNodes(
  nodes: Point[],
  segments: DraftSegment[],
  tolerance: number,
  issues: IssueCollector,
): DraftSegment[] {
  const remap = nodes.map((node, i) => {
    const target = nodes.findIndex(
      (other) => chebyshevDistance(other, node) <= tolerance,
    );
    return target === -1 ? i : target;
  });

  const merged: DraftSegment[] = [];
  for (const s of segments) {
    addSegment(
      merged,
      { ...s, start: remap[s.start], end: remap[s.end] },
      issues,
    );
  }
  return merged;
}

/**
 * Split walls at nodes that sit on their interior. Each split replaces the
 * wall by its two pieces in place.
 */
function splitWalls(
  nodes: Point[],
  input: DraftSegment[],
  config: ConverterConfig,
  issues: IssueCollector,
): DraftSegment[] {
  const tolerance = config.corner_snap_tolerance;
  const maxIter = config.split_walls.max_iter;
  let segments = [...input];

  let iterations = 0;
  for (;;) {
    const hit = findTJunction(nodes, segments, tolerance);
    if (!hit) break;

    if (iterations >= maxIter) {
      issues.warn(
        "split-walls-truncated",
        `Wall splitting stopped after ${maxIter} iterations`,
        { suggestion: "Raise split_walls.max_iter" },
      );
      break;
    }

    const target = segments[hit.segment];
    const rest = segments.filter((_, i) => i !== hit.segment);
    const pieces: DraftSegment[] = [];
    for (const piece of [
      { ...target, end: hit.node },
      { ...target, start: hit.node },
    ]) {
      const key = pairKey(piece.start, piece.end);
      if (rest.some((s) => pairKey(s.start, s.end) === key)) {
        issues.warn(
          "duplicate-wall",
          `Part of wall ${piece.sourceIndex} overlaps an existing wall and was dropped`,
          { elementId: `wall-input-${piece.sourceIndex}` },
        );
        continue;
      }
      pieces.push(piece);
    }

    segments = [
      ...segments.slice(0, hit.segment),
      ...pieces,
      ...segments.slice(hit.segment + 1),
    ];
    iterations++;
  }

  return segments;
}

function findTJunction(
  nodes: Point[],
  segments: DraftSegment[],
  tolerance: number,
): { segment: number; node: number } | null {
  const used = new Set<number>();
  for (const s of segments) {
    used.add(s.start);
    used.add(s.end);
  }
  const candidates = [...used].sort((a, b) => a - b);

  for (let i = 0; i < segments.length; i++) {
    const s = segments[i];
    const a = nodes[s.start];
    const b = nodes[s.end];
    const len = distance(a, b);
    if (len === 0) continue;
    const ux = (b.x - a.x) / len;
    const uy = (b.y - a.y) / len;

    for (const n of candidates) {
      if (n === s.start || n === s.end) continue;
      const p = nodes[n];
      const t = (p.x - a.x) * ux + (p.y - a.y) * uy;
      const perp = Math.abs((p.x - a.x) * uy - (p.y - a.y) * ux);
      if (perp <= tolerance && t > tolerance && t < len - tolerance) {
        return { segment: i, node: n };
      }
    }
  }
  return null;
}

function finalizeGraph(nodes: Point[], drafts: DraftSegment[]): WallGraph {
  const segments: WallSegment[] = drafts.map((d, index) => ({
    index,
    id: `wall_${index}`,
    start: d.start,
    end: d.end,
    thickness: d.thickness,
    sideLabels: d.sideLabels,
    sourceIndex: d.sourceIndex,
  }));

  const incident: number[][] = nodes.map(() => []);
  for (const s of segments) {
    incident[s.start].push(s.index);
    incident[s.end].push(s.index);
  }

  const componentOf: number[] = nodes.map(() => -1);
  const components: number[][] = [];
  for (let seed = 0; seed < nodes.length; seed++) {
    if (componentOf[seed] !== -1 || incident[seed].length === 0) continue;

    const id = components.length;
    const members: number[] = [];
    const stack = [seed];
    componentOf[seed] = id;
    while (stack.length > 0) {
      const n = stack.pop();
      if (n === undefined) break;
      members.push(n);
      for (const si of incident[n]) {
        const s = segments[si];
        const other = s.start === n ? s.end : s.start;
        if (componentOf[other] === -1) {
          componentOf[other] = id;
          stack.push(other);
        }
      }
    }
    components.push(members.sort((a, b) => a - b));
  }

  return { nodes, segments, incident, componentOf, components };
}

/** Length of a segment in the graph's frame. */
export function segmentLength(graph: WallGraph, segment: WallSegment): number {
  return distance(graph.nodes[segment.start], graph.nodes[segment.end]);
}
