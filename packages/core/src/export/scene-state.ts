import type {
  ArchDefaultsConfig,
  AxisConfig,
  ConverterConfig,
} from "../types/config.js";
import type {
  ConversionResult,
  ObjectBox,
  Point,
  SceneOpening,
  SceneWall,
} from "../types/geometry.js";

// ---- Scene-state document shapes ----

export type Vec3 = [number, number, number];

export interface HoleJson {
  id: string;
  type: "Door" | "Window";
  /** x runs along the wall from points[0], y is height above the floor */
  box: { min: [number, number]; max: [number, number] };
}

export interface WallElementJson {
  id: string;
  type: "Wall";
  roomId: string[];
  points: [Vec3, Vec3];
  holes: HoleJson[];
  height: number;
  depth: number;
  extra_height: number;
}

export interface FloorElementJson {
  id: string;
  type: "Floor";
  roomId: string;
  points: Vec3[][];
  depth: number;
}

export interface CeilingElementJson {
  id: string;
  type: "Ceiling";
  roomId: string;
  points: Vec3[][];
  offset: Vec3;
  depth: number;
}

export type ArchElementJson =
  | WallElementJson
  | FloorElementJson
  | CeilingElementJson;

/** Room, opening, and the room on the far side (null for exterior doors) */
export type RdrTriple = [string, string, string | null];

export interface ArchJson {
  version: string;
  id: string;
  up: Vec3;
  front: Vec3;
  scaleToMeters: number;
  defaults: {
    Wall: { depth: number; extraHeight: number };
    Ceiling: { depth: number };
    Floor: { depth: number };
  };
  elements: ArchElementJson[];
  rooms: { id: string; types: string[] }[];
  rdr: RdrTriple[];
}

export interface SceneStateJson {
  format: "sceneState";
  scene: {
    up: { x: number; y: number; z: number };
    front: { x: number; y: number; z: number };
    unit: number;
    arch: ArchJson;
    object: never[];
  };
  selected: never[];
}

export interface ObjectAabbJson {
  objects: {
    type: string;
    bound_box: { p1: [number, number]; p2: [number, number] };
  }[];
}

// ---- Export ----

type ExportConfig = Pick<ConverterConfig, "arch_defaults" | "axis">;

/**
 * Plan coordinates go to the floor plane: x stays x and the plan's second
 * axis becomes z, growing the way image rows do, so a y-up plan is
 * negated back.
 */
function planToFloor(axis: AxisConfig): (p: Point) => Vec3 {
  const zSign = axis.flip_y ? -1 : 1;
  // + 0 turns -0 into 0
  return (p) => [p.x, 0, zSign * p.y + 0];
}

function holeJson(opening: SceneOpening, defaults: ArchDefaultsConfig): HoleJson {
  const isDoor = opening.type === "door";
  return {
    id: opening.id,
    type: isDoor ? "Door" : "Window",
    box: {
      min: [
        opening.startOffset,
        isDoor ? defaults.door_min_y : defaults.window_min_y,
      ],
      max: [
        opening.endOffset,
        isDoor ? defaults.door_max_y : defaults.window_max_y,
      ],
    },
  };
}

function wallJson(
  wall: SceneWall,
  openings: SceneOpening[],
  defaults: ArchDefaultsConfig,
  toVec3: (p: Point) => Vec3,
): WallElementJson {
  return {
    id: wall.id,
    type: "Wall",
    roomId: [...wall.roomIds],
    points: [toVec3(wall.start), toVec3(wall.end)],
    holes: openings
      .filter((o) => o.hostWallId === wall.id)
      .map((o) => holeJson(o, defaults)),
    height: defaults.wall_height,
    depth: defaults.wall_depth,
    extra_height: defaults.wall_extra_height,
  };
}

/**
 * Room-door-room triples: both directions for a door between two rooms,
 * one triple with a null target for a door to the outside.
 */
export function roomDoorRoomTriples(openings: SceneOpening[]): RdrTriple[] {
  const triples: RdrTriple[] = [];
  for (const opening of openings) {
    if (opening.type !== "door") continue;
    if (opening.roomIds.length === 2) {
      const [a, b] = opening.roomIds;
      triples.push([a, opening.id, b], [b, opening.id, a]);
    } else if (opening.roomIds.length === 1) {
      triples.push([opening.roomIds[0], opening.id, null]);
    }
  }
  return triples;
}

/**
 * Build the architecture part of a scene-state document: one Wall element
 * per wall (openings as holes), then a Floor and a Ceiling per room. Floor
 * and ceiling rings are the room outline followed by its holes.
 */
export function toArchJson(
  result: ConversionResult,
  config: ExportConfig,
  sceneId: string,
): ArchJson {
  const defaults = config.arch_defaults;
  const toVec3 = planToFloor(config.axis);
  const { scene } = result;

  const elements: ArchElementJson[] = scene.walls.map((wall) =>
    wallJson(wall, scene.openings, defaults, toVec3),
  );

  for (const room of scene.rooms) {
    const outline = [room.polygon, ...room.holes].map((ring) => ring.map(toVec3));
    elements.push({
      id: `${room.id}_f`,
      type: "Floor",
      roomId: room.id,
      points: outline,
      depth: defaults.floor_depth,
    });
    elements.push({
      id: `${room.id}_c`,
      type: "Ceiling",
      roomId: room.id,
      points: outline.map((ring) => ring.map((p): Vec3 => [...p])),
      offset: [0, defaults.wall_height, 0],
      depth: defaults.ceiling_depth,
    });
  }

  return {
    version: defaults.version,
    id: sceneId,
    up: [...defaults.up],
    front: [...defaults.front],
    scaleToMeters: defaults.scale_to_meters,
    defaults: {
      Wall: {
        depth: defaults.wall_depth,
        extraHeight: defaults.wall_extra_height,
      },
      Ceiling: { depth: defaults.ceiling_depth },
      Floor: { depth: defaults.floor_depth },
    },
    elements,
    rooms: scene.rooms.map((room) => ({ id: room.id, types: [room.label] })),
    rdr: roomDoorRoomTriples(scene.openings),
  };
}

export function toSceneState(
  result: ConversionResult,
  config: ExportConfig,
  sceneId: string,
): SceneStateJson {
  const [ux, uy, uz] = config.arch_defaults.up;
  const [fx, fy, fz] = config.arch_defaults.front;
  return {
    format: "sceneState",
    scene: {
      up: { x: ux, y: uy, z: uz },
      front: { x: fx, y: fy, z: fz },
      unit: config.arch_defaults.scale_to_meters,
      arch: toArchJson(result, config, sceneId),
      object: [],
    },
    selected: [],
  };
}

/** Object boxes as min/max corner pairs on the floor plane (x, z). */
export function toObjectAabbs(
  objects: ObjectBox[],
  config: Pick<ConverterConfig, "axis">,
): ObjectAabbJson {
  const toVec3 = planToFloor(config.axis);
  return {
    objects: objects.map((o) => {
      const [ax, , az] = toVec3({ x: o.box.x, y: o.box.y });
      const [bx, , bz] = toVec3({ x: o.box.x + o.box.width, y: o.box.y + o.box.height });
      return {
        type: o.class,
        bound_box: {
          p1: [Math.min(ax, bx), Math.min(az, bz)],
          p2: [Math.max(ax, bx), Math.max(az, bz)],
        },
      };
    }),
  };
}
