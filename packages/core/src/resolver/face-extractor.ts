import type { IssueCollector } from "../errors.js";
import { TopologyError } from "../errors.js";
import {
  EPSILON,
  isSimplePolygon,
  pointInPolygon,
  polygonCentroid,
  signedArea,
} from "../geometry/polygon.js";
import type { ConverterConfig } from "../types/config.js";
import type {
  ExtractedFace,
  FaceExtraction,
  Point,
  WallGraph,
} from "../types/geometry.js";

/*
 * Half-edges are derived from segment indices: half-edge h belongs to
 * segment h >> 1, even ids run start → end, odd ids end → start, and the
 * twin of h is h ^ 1.
 */

export function halfEdgeSegment(h: number): number {
  return h >> 1;
}

export function twin(h: number): number {
  return h ^ 1;
}

export function halfEdgeOrigin(graph: WallGraph, h: number): number {
  const s = graph.segments[h >> 1];
  return h % 2 === 0 ? s.start : s.end;
}

export function halfEdgeTarget(graph: WallGraph, h: number): number {
  const s = graph.segments[h >> 1];
  return h % 2 === 0 ? s.end : s.start;
}

/**
 * Outgoing half-edges of every node, sorted counter-clockwise by angle
 * (ties by id).
 */
export function sortOutgoing(graph: WallGraph): number[][] {
  return graph.nodes.map((node, n) => {
    const outgoing = graph.incident[n].map((si) =>
      graph.segments[si].start === n ? si * 2 : si * 2 + 1,
    );
    const angle = (h: number): number => {
      const target = graph.nodes[halfEdgeTarget(graph, h)];
      return Math.atan2(target.y - node.y, target.x - node.x);
    };
    return outgoing.sort((a, b) => angle(a) - angle(b) || a - b);
  });
}

/**
 * Next half-edge on the same face: at the target node, take the outgoing
 * half-edge just before the twin in counter-clockwise order, i.e. the next
 * one clockwise from the incoming direction. Bounded faces then come out
 * counter-clockwise (positive area). At a dead end the walk turns back
 * along the twin.
 */
export function nextHalfEdge(
  graph: WallGraph,
  outgoing: number[][],
  h: number,
): number {
  const around = outgoing[halfEdgeTarget(graph, h)];
  const k = around.indexOf(twin(h));
  return around[(k - 1 + around.length) % around.length];
}

/**
 * Remove spurs: a half-edge immediately followed by its twin walks into a
 * dangling segment and straight back out.
 */
export function stripSpurs(walk: number[]): number[] {
  const stack: number[] = [];
  for (const h of walk) {
    if (stack.length > 0 && stack[stack.length - 1] === twin(h)) {
      stack.pop();
    } else {
      stack.push(h);
    }
  }
  // The walk is cyclic, so the seam between the last and first entries
  // can hide a spur too.
  let first = 0;
  let last = stack.length - 1;
  while (last - first >= 1 && stack[first] === twin(stack[last])) {
    first++;
    last--;
  }
  return stack.slice(first, last + 1);
}

/** Clockwise walk around the outside of one connected component */
interface OuterBoundary {
  component: number;
  halfEdges: number[];
  vertices: Point[];
}

/**
 * Enumerate the bounded faces of the wall graph, one candidate room each.
 *
 * Every connected component is walked half-edge by half-edge. Zero-area
 * walks left by dangling trees are discarded. The walk around a
 * component's outside has negative signed area; when the component stands
 * inside a face of another component, that outline becomes a hole of the
 * face (see cutIslands). Labels are assigned later (see room-labeler).
 */
export function extractFaces(
  graph: WallGraph,
  config: ConverterConfig,
  issues: IssueCollector,
): FaceExtraction {
  const halfEdgeCount = graph.segments.length * 2;
  const outgoing = sortOutgoing(graph);
  const visited: boolean[] = new Array<boolean>(halfEdgeCount).fill(false);
  const halfEdgeFace: (number | null)[] = new Array<number | null>(
    halfEdgeCount,
  ).fill(null);
  const faces: ExtractedFace[] = [];
  const outers: OuterBoundary[] = [];

  graph.components.forEach((members, component) => {
    const componentHalfEdges: number[] = [];
    for (const n of members) {
      componentHalfEdges.push(...outgoing[n]);
    }
    componentHalfEdges.sort((a, b) => a - b);

    for (const start of componentHalfEdges) {
      if (visited[start]) continue;

      const walk = traceWalk(graph, outgoing, start, visited, config.max_trace_steps);
      if (walk === null) {
        issues.record(
          new TopologyError(
            `Face trace starting on wall "${graph.segments[halfEdgeSegment(start)].id}" did not close within ${config.max_trace_steps} steps`,
            {
              wallId: graph.segments[halfEdgeSegment(start)].id,
              suggestion: "Raise max_trace_steps or check the wall input",
            },
          ),
        );
        continue;
      }

      const core = stripSpurs(walk);
      if (core.length < 3) continue;

      const nodeIds = core.map((h) => halfEdgeOrigin(graph, h));
      const vertices: Point[] = nodeIds.map((n) => graph.nodes[n]);
      const area = signedArea(vertices);
      if (area < -EPSILON) {
        outers.push({ component, halfEdges: core, vertices });
        continue;
      }
      if (area <= EPSILON) continue;

      if (!isSimplePolygon(vertices)) {
        issues.record(
          new TopologyError(
            `Face bounded by walls ${core.map((h) => graph.segments[halfEdgeSegment(h)].id).join(", ")} intersects itself and was dropped`,
            {
              wallId: graph.segments[halfEdgeSegment(core[0])].id,
              suggestion: "Walls that cross must share a corner",
            },
          ),
        );
        continue;
      }

      const index = faces.length;
      for (const h of core) {
        halfEdgeFace[h] = index;
      }
      faces.push({
        index,
        component,
        halfEdges: core,
        nodeIds,
        segmentIds: core.map(halfEdgeSegment),
        vertices: vertices.map((p) => ({ x: p.x, y: p.y })),
        holes: [],
        holeHalfEdges: [],
        area,
        centroid: polygonCentroid(vertices),
        label: config.unknown_room_label,
        labelSource: "none",
      });
    }
  });

  cutIslands(graph, faces, outers, halfEdgeFace, issues);
  return { faces, halfEdgeFace };
}

/**
 * Attach every component standing inside a face of another component to
 * the innermost such face: its outline becomes a hole, its outer
 * half-edges bound the face, and area and centroid are taken net of it.
 */
function cutIslands(
  graph: WallGraph,
  faces: ExtractedFace[],
  outers: OuterBoundary[],
  halfEdgeFace: (number | null)[],
  issues: IssueCollector,
): void {
  const grossArea = faces.map((f) => f.area);

  for (const outer of outers) {
    // Components share no node, so any vertex tells which faces enclose it.
    const anchor = outer.vertices[0];
    let host: number | null = null;
    for (const face of faces) {
      if (face.component === outer.component) continue;
      if (!pointInPolygon(anchor, face.vertices)) continue;
      if (host === null || grossArea[face.index] < grossArea[host]) {
        host = face.index;
      }
    }
    if (host === null) continue;

    const face = faces[host];
    face.holes.push(outer.vertices.map((p) => ({ x: p.x, y: p.y })));
    face.holeHalfEdges.push(outer.halfEdges);
    face.segmentIds.push(...outer.halfEdges.map(halfEdgeSegment));
    for (const h of outer.halfEdges) {
      halfEdgeFace[h] = host;
    }

    const wallIds = [
      ...new Set(outer.halfEdges.map((h) => graph.segments[halfEdgeSegment(h)].id)),
    ];
    issues.warn(
      "nested-component",
      `Walls ${wallIds.join(", ")} are not connected to the walls around them; their outline was cut out of the enclosing room`,
      {
        wallId: wallIds[0],
        suggestion: "Connect the inner walls to the enclosing room if they belong to it",
      },
    );
  }

  for (const face of faces) {
    if (face.holes.length === 0) continue;
    const gross = grossArea[face.index];
    const outerCentroid = polygonCentroid(face.vertices);
    let area = gross;
    let cx = gross * outerCentroid.x;
    let cy = gross * outerCentroid.y;
    for (const hole of face.holes) {
      const holeArea = Math.abs(signedArea(hole));
      const c = polygonCentroid(hole);
      area -= holeArea;
      cx -= holeArea * c.x;
      cy -= holeArea * c.y;
    }
    face.area = area;
    face.centroid = area > EPSILON ? { x: cx / area, y: cy / area } : outerCentroid;
  }
}

/**
 * Follow `next` from `start` until the walk closes. Returns null when the
 * step bound is exceeded; the rest of that cycle is still marked visited so
 * it is reported once.
 */
function traceWalk(
  graph: WallGraph,
  outgoing: number[][],
  start: number,
  visited: boolean[],
  maxSteps: number,
): number[] | null {
  const walk: number[] = [];
  let current = start;

  do {
    walk.push(current);
    visited[current] = true;
    current = nextHalfEdge(graph, outgoing, current);

    if (walk.length >= maxSteps && current !== start) {
      let drained = 0;
      while (current !== start && !visited[current] && drained < visited.length) {
        visited[current] = true;
        current = nextHalfEdge(graph, outgoing, current);
        drained++;
      }
      return null;
    }
  } while (current !== start);

  return walk;
}

/**
 * Distinct faces on either side of a segment, in half-edge order.
 */
export function facesOfSegment(
  extraction: FaceExtraction,
  segment: number,
): number[] {
  const result: number[] = [];
  for (const h of [segment * 2, segment * 2 + 1]) {
    const face = extraction.halfEdgeFace[h];
    if (face !== null && face !== undefined && !result.includes(face)) {
      result.push(face);
    }
  }
  return result;
}
