import type { IconOrientation, OpeningType } from "./config.js";

// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ---- Normalized detector input (metric frame) ----

export interface SideLabels {
  /**
   * Label index on the side where cross(end - start, p - start) > 0 in the
   * metric frame
   */
  left?: number;
  right?: number;
}

export interface NormalizedWall {
  corners: [number, number];
  thickness?: number;
  sideLabels: SideLabels;
}

export interface OpeningIcon {
  index: number;
  class: string;
  box: Rect;
  orientation?: IconOrientation;
}

export interface RoomLabelPrediction {
  label: number;
  point: Point;
}

export interface NormalizedFloorplan {
  corners: Point[];
  walls: NormalizedWall[];
  icons: OpeningIcon[];
  roomLabels: RoomLabelPrediction[];
}

// ---- Wall graph (arena storage, integer ids) ----

export interface WallSegment {
  index: number;
  id: string;
  /** Node index */
  start: number;
  /** Node index */
  end: number;
  thickness: number;
  sideLabels: SideLabels;
  /** Index of the detector wall this segment came from */
  sourceIndex: number;
}

export interface WallGraph {
  nodes: Point[];
  segments: WallSegment[];
  /** Segment indices incident to each node */
  incident: number[][];
  /** Connected component of each node; -1 for isolated nodes */
  componentOf: number[];
  /** Node indices of each connected component */
  components: number[][];
}

// ---- Faces ----

export type LabelSource = "wall-sides" | "centroid" | "none";

export interface ExtractedFace {
  index: number;
  component: number;
  /** Half-edge ids in walk order; half-edge h belongs to segment h >> 1 */
  halfEdges: number[];
  nodeIds: number[];
  /** Outer boundary segments in walk order, then those of every hole */
  segmentIds: number[];
  vertices: Point[];
  /** Outlines of separate wall components standing inside the face (clockwise) */
  holes: Point[][];
  holeHalfEdges: number[][];
  /** Net of holes */
  area: number;
  centroid: Point;
  label: string;
  labelSource: LabelSource;
}

export interface FaceExtraction {
  faces: ExtractedFace[];
  /** Face index bounded by each half-edge; null for exterior, spurs and dropped faces */
  halfEdgeFace: (number | null)[];
}

// ---- Openings ----

export type OpeningKind = "interior" | "exterior" | "unattached";

export interface ResolvedOpening {
  sourceIndex: number;
  type: OpeningType;
  box: Rect;
  hostSegment: number;
  /** Perpendicular distance from the icon centre to the host centreline */
  distance: number;
  startOffset: number;
  endOffset: number;
  centerOffset: number;
  /** centerOffset / wall length, 0..1 */
  position: number;
  /** Rank among openings on the same wall */
  order: number;
  /** Distinct face indices on either side of the host wall */
  faces: number[];
  kind: OpeningKind;
}

export interface OpeningResolution {
  openings: ResolvedOpening[];
  unmatched: OpeningIcon[];
}

// ---- Objects ----

export type ObjectBoxSource = "icon" | "unmatched-opening";

export interface ObjectBox {
  class: string;
  box: Rect;
  source: ObjectBoxSource;
  sourceIndex: number;
}

// ---- Assembled scene ----

export interface SceneRoom {
  id: string;
  label: string;
  polygon: Point[];
  holes: Point[][];
  area: number;
  centroid: Point;
  wallIds: string[];
}

export interface SceneWall {
  id: string;
  start: Point;
  end: Point;
  thickness: number;
  length: number;
  roomIds: string[];
}

export interface SceneOpening {
  id: string;
  type: OpeningType;
  kind: OpeningKind;
  hostWallId: string;
  position: number;
  startOffset: number;
  endOffset: number;
  order: number;
  roomIds: string[];
  box: Rect;
  sourceIndex: number;
}

export interface RoomAdjacencyEdge {
  rooms: [string, string];
  openingId: string;
  openingType: OpeningType;
}

export interface ArchitectureScene {
  rooms: SceneRoom[];
  walls: SceneWall[];
  openings: SceneOpening[];
  adjacency: RoomAdjacencyEdge[];
  bounds: Rect;
}

export interface OpeningMarker {
  openingId: string;
  type: OpeningType;
  start: Point;
  end: Point;
}

export interface RoomOverlay {
  roomId: string;
  polygon: Point[];
  holes: Point[][];
  doorNeighborRoomIds: string[];
  neighborRoomIds: string[];
  markers: OpeningMarker[];
}

// ---- Diagnostics ----

export interface ReconstructionIssue {
  code: string;
  severity: "error" | "warning";
  message: string;
  roomId: string | null;
  wallId: string | null;
  elementId: string | null;
  suggestion: string | null;
}

export interface Diagnostics {
  errors: ReconstructionIssue[];
  warnings: ReconstructionIssue[];
}

export interface ConversionResult {
  scene: ArchitectureScene;
  objects: ObjectBox[];
  overlays: RoomOverlay[];
  diagnostics: Diagnostics;
  status: "clean" | "anomalies";
}
