import type { IssueCollector } from "../errors.js";
import { UnattachedWallError, UnmatchedOpeningError } from "../errors.js";
import {
  EPSILON,
  distance,
  pointInRings,
  rectCenter,
  rectCorners,
} from "../geometry/polygon.js";
import type { ConverterConfig, OpeningType } from "../types/config.js";
import { OPENING_TYPES } from "../types/config.js";
import type {
  FaceExtraction,
  OpeningIcon,
  OpeningKind,
  OpeningResolution,
  Point,
  ResolvedOpening,
  WallGraph,
  WallSegment,
} from "../types/geometry.js";
import { facesOfSegment } from "./face-extractor.js";
import { segmentLength } from "./wall-graph-builder.js";

export function isOpeningType(value: string): value is OpeningType {
  return OPENING_TYPES.some((t) => t === value);
}

interface WallFrame {
  origin: Point;
  /** Unit direction start → end */
  ux: number;
  uy: number;
  length: number;
}

function wallFrame(graph: WallGraph, segment: WallSegment): WallFrame {
  const origin = graph.nodes[segment.start];
  const end = graph.nodes[segment.end];
  const length = segmentLength(graph, segment);
  return {
    origin,
    ux: (end.x - origin.x) / length,
    uy: (end.y - origin.y) / length,
    length,
  };
}

function pointAt(frame: WallFrame, offset: number): Point {
  return {
    x: frame.origin.x + frame.ux * offset,
    y: frame.origin.y + frame.uy * offset,
  };
}

/** Offset of `p` along the wall axis. */
function along(frame: WallFrame, p: Point): number {
  return (p.x - frame.origin.x) * frame.ux + (p.y - frame.origin.y) * frame.uy;
}

/** Distance of `p` from the wall's centreline (infinite line). */
function across(frame: WallFrame, p: Point): number {
  return Math.abs(
    (p.x - frame.origin.x) * frame.uy - (p.y - frame.origin.y) * frame.ux,
  );
}

/**
 * Pick the host wall for an opening icon, or null when no wall is within
 * reach. Candidates must contain the projection of the box centre and lie
 * within half their thickness plus `opening_match_tolerance` of it.
 */
export function findHostSegment(
  icon: OpeningIcon,
  graph: WallGraph,
  config: ConverterConfig,
): { segment: number; distance: number } | null {
  const center = rectCenter(icon.box);
  let best: { segment: number; distance: number; length: number } | null =
    null;

  for (const segment of graph.segments) {
    const frame = wallFrame(graph, segment);
    if (frame.length === 0) continue;

    if (icon.orientation !== undefined) {
      const horizontal = Math.abs(frame.ux) >= Math.abs(frame.uy);
      if ((icon.orientation === "horizontal") !== horizontal) continue;
    }

    const t = along(frame, center);
    if (t < 0 || t > frame.length) continue;

    const d = across(frame, center);
    if (d > segment.thickness / 2 + config.opening_match_tolerance) continue;

    if (best === null || d < best.distance - EPSILON) {
      best = { segment: segment.index, distance: d, length: frame.length };
      continue;
    }
    if (Math.abs(d - best.distance) <= EPSILON) {
      const preferred =
        config.host_tie_break === "shortest"
          ? frame.length < best.length - EPSILON
          : frame.length > best.length + EPSILON;
      if (preferred) {
        best = { segment: segment.index, distance: d, length: frame.length };
      }
    }
  }

  return best === null ? null : { segment: best.segment, distance: best.distance };
}

/**
 * Bind door and window icons to their host walls and to the rooms on
 * either side.
 *
 * Icons of other classes are ignored here. An opening with no host is
 * reported and handed back in `unmatched`; an opening whose host bounds no
 * room is kept as "unattached" and reported. With `opening_classification`
 * set to "entrance" the icon class is disregarded and the type is decided
 * by classifyByEntrances.
 */
export function resolveOpenings(
  icons: OpeningIcon[],
  graph: WallGraph,
  extraction: FaceExtraction,
  config: ConverterConfig,
  issues: IssueCollector,
): OpeningResolution {
  const openings: ResolvedOpening[] = [];
  const unmatched: OpeningIcon[] = [];

  for (const icon of icons) {
    const iconType = icon.class;
    if (!isOpeningType(iconType)) continue;

    const host = findHostSegment(icon, graph, config);
    if (host === null) {
      issues.record(
        new UnmatchedOpeningError(
          `${icon.class} ${icon.index} is not within reach of any wall`,
          {
            elementId: `icon-${icon.index}`,
            suggestion: "Raise opening_match_tolerance or check the icon box",
          },
        ),
      );
      unmatched.push(icon);
      continue;
    }

    const segment = graph.segments[host.segment];
    const frame = wallFrame(graph, segment);
    const offsets = rectCorners(icon.box).map((p) =>
      Math.min(frame.length, Math.max(0, along(frame, p))),
    );
    const startOffset = Math.min(...offsets);
    const endOffset = Math.max(...offsets);
    const centerOffset = along(frame, rectCenter(icon.box));

    const faces = facesOfSegment(extraction, segment.index);
    let kind: OpeningKind = "unattached";
    if (faces.length === 2) kind = "interior";
    if (faces.length === 1) kind = "exterior";

    if (kind === "unattached") {
      issues.record(
        new UnattachedWallError(
          `${icon.class} ${icon.index} sits on wall "${segment.id}", which bounds no room`,
          { wallId: segment.id, elementId: `icon-${icon.index}` },
        ),
      );
    }

    const type: OpeningType =
      kind === "interior" && config.interior_openings_as_doors
        ? "door"
        : iconType;

    openings.push({
      sourceIndex: icon.index,
      type,
      box: icon.box,
      hostSegment: segment.index,
      distance: host.distance,
      startOffset,
      endOffset,
      centerOffset,
      position: centerOffset / frame.length,
      order: 0,
      faces,
      kind,
    });
  }

  if (config.opening_classification === "entrance") {
    classifyByEntrances(openings, icons, graph, extraction, config);
  }
  rankAlongWalls(openings, graph, issues);
  return { openings, unmatched };
}

/**
 * Decide door or window from the plan: every opening on an interior wall is
 * a door; for each entrance marker, the nearest still undecided opening on
 * the walls of the room holding the marker is a door; the rest are windows.
 * Nearness is the shortest distance between a marker corner and an end of
 * the opening's footprint; ties go to the earlier opening.
 */
function classifyByEntrances(
  openings: ResolvedOpening[],
  icons: OpeningIcon[],
  graph: WallGraph,
  extraction: FaceExtraction,
  config: Pick<ConverterConfig, "entrance_classes">,
): void {
  const decided = new Set<ResolvedOpening>();
  for (const opening of openings) {
    if (opening.kind === "interior") {
      opening.type = "door";
      decided.add(opening);
    }
  }

  for (const icon of icons) {
    if (!config.entrance_classes.includes(icon.class)) continue;
    const center = rectCenter(icon.box);
    const corners = rectCorners(icon.box);

    for (const face of extraction.faces) {
      if (!pointInRings(center, face.vertices, face.holes)) continue;

      let nearest: ResolvedOpening | null = null;
      let nearestDistance = Infinity;
      for (const opening of openings) {
        if (decided.has(opening) || !opening.faces.includes(face.index)) continue;
        const frame = wallFrame(graph, graph.segments[opening.hostSegment]);
        const ends = [
          pointAt(frame, opening.startOffset),
          pointAt(frame, opening.endOffset),
        ];
        const d = Math.min(
          ...corners.flatMap((c) => ends.map((e) => distance(c, e))),
        );
        if (d < nearestDistance - EPSILON) {
          nearest = opening;
          nearestDistance = d;
        }
      }
      if (nearest !== null) {
        nearest.type = "door";
        decided.add(nearest);
      }
    }
  }

  for (const opening of openings) {
    if (!decided.has(opening)) opening.type = "window";
  }
}

/**
 * Number the openings of each wall by start offset (input order on ties)
 * and warn where consecutive footprints overlap.
 */
function rankAlongWalls(
  openings: ResolvedOpening[],
  graph: WallGraph,
  issues: IssueCollector,
): void {
  const byWall = new Map<number, ResolvedOpening[]>();
  for (const opening of openings) {
    const list = byWall.get(opening.hostSegment) ?? [];
    list.push(opening);
    byWall.set(opening.hostSegment, list);
  }

  for (const [segment, list] of byWall) {
    list.sort(
      (a, b) => a.startOffset - b.startOffset || a.sourceIndex - b.sourceIndex,
    );
    list.forEach((opening, i) => {
      opening.order = i;
    });

    for (let i = 1; i < list.length; i++) {
      const prev = list[i - 1];
      const curr = list[i];
      if (prev.endOffset > curr.startOffset + EPSILON) {
        issues.warn(
          "overlapping-openings",
          `Openings from icons ${prev.sourceIndex} and ${curr.sourceIndex} overlap on wall "${graph.segments[segment].id}"`,
          {
            wallId: graph.segments[segment].id,
            elementId: `icon-${curr.sourceIndex}`,
          },
        );
      }
    }
  }
}
