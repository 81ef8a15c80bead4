import { boundsOf, distance } from "../geometry/polygon.js";
import type { ConverterConfig } from "../types/config.js";
import type {
  ArchitectureScene,
  ExtractedFace,
  FaceExtraction,
  ObjectBox,
  OpeningMarker,
  Point,
  ResolvedOpening,
  RoomAdjacencyEdge,
  RoomOverlay,
  SceneOpening,
  SceneRoom,
  SceneWall,
  WallGraph,
} from "../types/geometry.js";
import { facesOfSegment } from "./face-extractor.js";

export interface AssembledScene {
  scene: ArchitectureScene;
  objects: ObjectBox[];
  overlays: RoomOverlay[];
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortRoomFaces(
  faces: ExtractedFace[],
  axis: ConverterConfig["room_sort_axis"],
): ExtractedFace[] {
  const other = axis === "x" ? "y" : "x";
  return [...faces].sort(
    (a, b) =>
      compareNumbers(a.centroid[axis], b.centroid[axis]) ||
      compareNumbers(a.centroid[other], b.centroid[other]) ||
      a.index - b.index,
  );
}

/**
 * Turn the pipeline's intermediate results into the output scene: stable
 * ids, deterministic ordering, room adjacency and per-room overlays.
 */
export function assembleScene(
  graph: WallGraph,
  extraction: FaceExtraction,
  openings: ResolvedOpening[],
  objects: ObjectBox[],
  config: Pick<ConverterConfig, "room_sort_axis">,
): AssembledScene {
  const orderedFaces = sortRoomFaces(extraction.faces, config.room_sort_axis);
  const roomIdOfFace = new Map<number, string>();
  orderedFaces.forEach((face, i) => roomIdOfFace.set(face.index, `room_${i}`));

  const roomIdsOf = (faces: number[]): string[] =>
    faces
      .map((f) => roomIdOfFace.get(f))
      .filter((id): id is string => id !== undefined)
      .sort(compareRoomIds);

  const rooms: SceneRoom[] = orderedFaces.map((face, i) => ({
    id: `room_${i}`,
    label: face.label,
    polygon: face.vertices.map((p) => ({ x: p.x, y: p.y })),
    holes: face.holes.map((ring) => ring.map((p) => ({ x: p.x, y: p.y }))),
    area: face.area,
    centroid: { ...face.centroid },
    wallIds: [
      ...new Set(face.segmentIds.map((s) => graph.segments[s].id)),
    ],
  }));

  const walls: SceneWall[] = graph.segments.map((segment) => ({
    id: segment.id,
    start: { ...graph.nodes[segment.start] },
    end: { ...graph.nodes[segment.end] },
    thickness: segment.thickness,
    length: distance(graph.nodes[segment.start], graph.nodes[segment.end]),
    roomIds: roomIdsOf(facesOfSegment(extraction, segment.index)),
  }));

  const orderedOpenings = [...openings].sort(
    (a, b) =>
      a.hostSegment - b.hostSegment ||
      compareNumbers(a.startOffset, b.startOffset) ||
      a.sourceIndex - b.sourceIndex,
  );

  const sceneOpenings: SceneOpening[] = orderedOpenings.map((opening, i) => ({
    id: `opening_${i}`,
    type: opening.type,
    kind: opening.kind,
    hostWallId: graph.segments[opening.hostSegment].id,
    position: opening.position,
    startOffset: opening.startOffset,
    endOffset: opening.endOffset,
    order: opening.order,
    roomIds: roomIdsOf(opening.faces),
    box: { ...opening.box },
    sourceIndex: opening.sourceIndex,
  }));

  const adjacency: RoomAdjacencyEdge[] = [];
  for (const opening of sceneOpenings) {
    if (opening.kind !== "interior" || opening.roomIds.length !== 2) continue;
    adjacency.push({
      rooms: [opening.roomIds[0], opening.roomIds[1]],
      openingId: opening.id,
      openingType: opening.type,
    });
  }

  const usedNodes = new Set<number>();
  for (const segment of graph.segments) {
    usedNodes.add(segment.start);
    usedNodes.add(segment.end);
  }
  const bounds = boundsOf(
    [...usedNodes].sort((a, b) => a - b).map((n) => graph.nodes[n]),
  );

  const scene: ArchitectureScene = {
    rooms,
    walls,
    openings: sceneOpenings,
    adjacency,
    bounds,
  };

  return {
    scene,
    objects: sortObjects(objects),
    overlays: buildOverlays(scene),
  };
}

/** Order `room_2` before `room_10`. */
function compareRoomIds(a: string, b: string): number {
  return roomOrdinal(a) - roomOrdinal(b);
}

function roomOrdinal(id: string): number {
  return Number(id.slice("room_".length));
}

function sortObjects(objects: ObjectBox[]): ObjectBox[] {
  return [...objects].sort(
    (a, b) =>
      (a.class < b.class ? -1 : a.class > b.class ? 1 : 0) ||
      compareNumbers(a.box.x, b.box.x) ||
      compareNumbers(a.box.y, b.box.y) ||
      a.sourceIndex - b.sourceIndex,
  );
}

function pointAlong(start: Point, end: Point, offset: number): Point {
  const length = distance(start, end);
  if (length === 0) return { ...start };
  return {
    x: start.x + ((end.x - start.x) * offset) / length,
    y: start.y + ((end.y - start.y) * offset) / length,
  };
}

/**
 * One overlay per room: the rooms it reaches through doors, the rooms it
 * reaches through any opening, and a marker for each opening on its walls.
 */
export function buildOverlays(scene: ArchitectureScene): RoomOverlay[] {
  const wallById = new Map(scene.walls.map((w) => [w.id, w]));

  return scene.rooms.map((room) => {
    const doorNeighbors = new Set<string>();
    const neighbors = new Set<string>();
    for (const edge of scene.adjacency) {
      if (!edge.rooms.includes(room.id)) continue;
      const other = edge.rooms[0] === room.id ? edge.rooms[1] : edge.rooms[0];
      neighbors.add(other);
      if (edge.openingType === "door") doorNeighbors.add(other);
    }

    const markers: OpeningMarker[] = [];
    for (const opening of scene.openings) {
      if (!room.wallIds.includes(opening.hostWallId)) continue;
      const wall = wallById.get(opening.hostWallId);
      if (!wall) continue;
      markers.push({
        openingId: opening.id,
        type: opening.type,
        start: pointAlong(wall.start, wall.end, opening.startOffset),
        end: pointAlong(wall.start, wall.end, opening.endOffset),
      });
    }

    return {
      roomId: room.id,
      polygon: room.polygon.map((p) => ({ ...p })),
      holes: room.holes.map((ring) => ring.map((p) => ({ ...p }))),
      doorNeighborRoomIds: [...doorNeighbors].sort(compareRoomIds),
      neighborRoomIds: [...neighbors].sort(compareRoomIds),
      markers,
    };
  });
}
